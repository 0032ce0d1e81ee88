import type { Message } from "../core/models";
import { tokenize } from "./tokenize";

/**
 * True when every keyword has at least one of its tokens in the text.
 * A keyword without tokens ("!!!") never matches; an empty keyword list is
 * trivially satisfied.
 */
export function keywordsAllPresent(text: string, keywords: readonly string[]): boolean {
  if (keywords.length === 0) return true;
  const textTokens = new Set(tokenize(text));
  return keywords.every((keyword) => {
    const tokens = tokenize(keyword);
    return tokens.length > 0 && tokens.some((token) => textTokens.has(token));
  });
}

/**
 * True when at least one token of any keyword occurs in the text.
 */
export function keywordsAnyPresent(text: string, keywords: readonly string[]): boolean {
  if (keywords.length === 0 || !text) return false;
  const textTokens = new Set(tokenize(text));
  return keywords.some((keyword) => tokenize(keyword).some((token) => textTokens.has(token)));
}

/**
 * Case-insensitive literal substring match, OR across phrases.
 * Phrases are never tokenized: "algo-insights" does not match "algorithm insights".
 */
export function phraseMatches(text: string, phrases: readonly string[]): boolean {
  if (phrases.length === 0 || !text) return false;
  const lower = text.toLowerCase();
  return phrases.some((phrase) => phrase.length > 0 && lower.includes(phrase.toLowerCase()));
}

/**
 * True means "drop": one of the exclude keywords' tokens occurs in the text.
 */
export function excludeFilter(text: string, excludeKeywords: readonly string[]): boolean {
  return keywordsAnyPresent(text, excludeKeywords);
}

/**
 * Ids of messages (in message order) whose content contains any keyword token
 * or any phrase.
 */
export function findMatchedMessageIds(
  messages: readonly Message[],
  keywords: readonly string[],
  phrases: readonly string[]
): string[] {
  return messages
    .filter((m) => keywordsAnyPresent(m.content, keywords) || phraseMatches(m.content, phrases))
    .map((m) => m.id);
}
