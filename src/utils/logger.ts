import chalk from "chalk";

const levels: Record<string, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

// Read on every call so tests and the CLI can change LOG_LEVEL at runtime
function getCurrentLevel(): number {
  const level = process.env.LOG_LEVEL || "info";
  return levels[level] ?? levels.info;
}

function isDebugEnabled(): boolean {
  return process.env.DEBUG === "true";
}

const colors = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  success: chalk.green,
  debug: chalk.gray,
};

const emojis = {
  error: "❌",
  warn: "⚠️",
  info: "ℹ️",
  success: "✅",
  debug: "🔍",
};

/**
 * Console logger. Everything goes to stderr so that stdout carries only
 * command output (JSON, markdown, tables).
 */
export const logger = {
  error: (message: string, error?: unknown) => {
    if (getCurrentLevel() >= levels.error) {
      console.error(colors.error(`${emojis.error} ${message}`), error ?? "");
    }
  },

  warn: (message: string, ...args: unknown[]) => {
    if (getCurrentLevel() >= levels.warn) {
      console.error(colors.warn(`${emojis.warn} ${message}`), ...args);
    }
  },

  info: (message: string, ...args: unknown[]) => {
    if (getCurrentLevel() >= levels.info) {
      console.error(colors.info(`${emojis.info} ${message}`), ...args);
    }
  },

  success: (message: string, ...args: unknown[]) => {
    if (getCurrentLevel() >= levels.info) {
      console.error(colors.success(`${emojis.success} ${message}`), ...args);
    }
  },

  debug: (message: string, ...args: unknown[]) => {
    if (isDebugEnabled() && getCurrentLevel() >= levels.debug) {
      console.error(colors.debug(`${emojis.debug} ${message}`), ...args);
    }
  },
};
