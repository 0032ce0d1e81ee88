import { PROVIDER_NAMES, type ProviderName } from "../core/config";
import { SchemaVersionError, ValidationError } from "../core/errors";
import { streamJsonArray } from "../utils/json-stream";
import { claudeProvider } from "./claude";
import { openaiProvider } from "./openai";
import type { ConversationProvider } from "./provider";

export const PROVIDERS = {
  openai: openaiProvider,
  claude: claudeProvider,
} satisfies Record<ProviderName, ConversationProvider>;

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

function hasKey(value: unknown, key: string): boolean {
  return value !== null && typeof value === "object" && !Array.isArray(value) && key in value;
}

/**
 * Sniff the export format from its first conversation: `chat_messages`
 * means Claude, `mapping` means OpenAI. An empty array defaults to OpenAI.
 */
export async function detectProvider(filePath: string): Promise<ProviderName> {
  for await (const first of streamJsonArray(filePath)) {
    if (hasKey(first, "chat_messages")) return "claude";
    if (hasKey(first, "mapping")) return "openai";
    throw new SchemaVersionError(
      "Unsupported export format. Expected an OpenAI export (with 'mapping') or a Claude export (with 'chat_messages')."
    );
  }
  return "openai";
}

/**
 * Resolve the adapter for a file: an explicit provider name wins,
 * otherwise the format is detected from the file's contents.
 */
export async function getProvider(provider: string | undefined, filePath: string): Promise<ConversationProvider> {
  if (provider === undefined) {
    return PROVIDERS[await detectProvider(filePath)];
  }
  if (!isProviderName(provider)) {
    throw new ValidationError(`Invalid provider '${provider}'. Must be one of: ${PROVIDER_NAMES.join(", ")}`);
  }
  return PROVIDERS[provider];
}

export { openaiProvider, claudeProvider };
export * from "./provider";
