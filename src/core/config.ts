import { homedir } from "os";
import { join } from "path";
import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { ValidationError, formatError } from "./errors";

export const PROVIDER_NAMES = ["openai", "claude"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

/** How often (in conversations) progress callbacks fire. */
export const DEFAULT_PROGRESS_INTERVAL = 100;
export const DEFAULT_SEARCH_LIMIT = 10;
export const MAX_SEARCH_LIMIT = 1000;

export const ChatdigConfigSchema = z.object({
  defaultProvider: z.enum(PROVIDER_NAMES).optional(),
  defaultLimit: z.number().int().min(1).max(MAX_SEARCH_LIMIT).default(DEFAULT_SEARCH_LIMIT),
  progressInterval: z.number().int().min(1).default(DEFAULT_PROGRESS_INTERVAL),
});

export type ChatdigConfig = z.infer<typeof ChatdigConfigSchema>;

/**
 * Get the chatdig home directory.
 * Defaults to ~/.chatdig, can be overridden via CHATDIG_HOME.
 */
export function getChatdigDir(): string {
  return process.env.CHATDIG_HOME || join(homedir(), ".chatdig");
}

/**
 * Get the path to the optional config.json file.
 */
export function getConfigPath(): string {
  return join(getChatdigDir(), "config.json");
}

/**
 * Load settings from config.json, then apply environment overrides
 * (CHATDIG_PROVIDER, CHATDIG_LIMIT). A missing file yields the defaults.
 */
export function loadConfig(configPath: string = getConfigPath()): ChatdigConfig {
  let fileSettings: unknown = {};

  if (existsSync(configPath)) {
    try {
      fileSettings = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new ValidationError(`Invalid config file ${configPath}: ${formatError(error)}`);
    }
  }

  const parsed = ChatdigConfigSchema.safeParse(fileSettings);
  if (!parsed.success) {
    throw ValidationError.fromZod(`config file ${configPath}`, parsed.error);
  }

  return applyEnvOverrides(parsed.data);
}

function applyEnvOverrides(config: ChatdigConfig): ChatdigConfig {
  const overrides: Record<string, unknown> = { ...config };

  if (process.env.CHATDIG_PROVIDER) {
    overrides.defaultProvider = process.env.CHATDIG_PROVIDER;
  }
  if (process.env.CHATDIG_LIMIT) {
    overrides.defaultLimit = Number(process.env.CHATDIG_LIMIT);
  }

  const parsed = ChatdigConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw ValidationError.fromZod("environment settings", parsed.error);
  }
  return parsed.data;
}

/**
 * All config paths in one object for convenience.
 */
export function getAllConfigPaths() {
  return {
    chatdigDir: getChatdigDir(),
    configFile: getConfigPath(),
  };
}
