/**
 * Format utilities for terminal output
 */

/**
 * Truncate text with ellipsis
 */
export function truncateWithEllipsis(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen - 1) + "…";
}

/**
 * Collapse newlines and runs of whitespace so a value fits on one table row
 */
export function singleLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Calculate available width for the title column
 * Based on terminal width minus fixed columns
 */
export function getTitleWidth(terminalWidth?: number): number {
  const termWidth = terminalWidth ?? process.stdout.columns ?? 120;
  // Reserved: id(10) + created(18) + msgs(6) + score(7) + spacing(4)
  const reserved = 10 + 18 + 6 + 7 + 4;
  return Math.max(20, termWidth - reserved);
}

/**
 * Format a date as "YYYY-MM-DD HH:MM" in UTC
 */
export function formatDate(date: Date | null): string {
  if (!date) return "—";
  return date.toISOString().slice(0, 16).replace("T", " ");
}

/**
 * Format a normalized score with two decimals
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Format a duration in seconds for display
 * - Under a minute: seconds
 * - Under an hour: minutes
 * - Under a day: hours and minutes
 * - Otherwise: days and hours
 */
export function formatDuration(seconds: number): string {
  const s = Math.round(seconds);
  if (s < 60) return `${s}s`;
  if (s < 3600) return `${Math.floor(s / 60)}m`;
  if (s < 86400) return `${Math.floor(s / 3600)}h ${Math.floor((s % 3600) / 60)}m`;
  return `${Math.floor(s / 86400)}d ${Math.floor((s % 86400) / 3600)}h`;
}

/**
 * Format large counts with K/M/B suffixes
 */
export function formatLargeNumber(n: number): string {
  if (n >= 1000000000) return `${(n / 1000000000).toFixed(2)}B`;
  if (n >= 1000000) return `${(n / 1000000).toFixed(2)}M`;
  if (n >= 1000) return `${(n / 1000).toFixed(2)}K`;
  return String(n);
}
