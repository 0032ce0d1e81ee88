/**
 * Tokenizer shared by scoring, matching and snippet logic.
 *
 * Lower-cases the text, then emits in order:
 * - each maximal run of ASCII letters/digits ("python3")
 * - each single non-ASCII letter or non-decimal numeric character ("你", "é")
 *
 * Punctuation, whitespace, underscores and non-ASCII decimal digits produce
 * no tokens. No stemming, no stop words.
 */
const TOKEN_PATTERN = /[a-z0-9]+|[\p{L}\p{Nl}\p{No}]/gu;

export function tokenize(text: string): string[] {
  if (!text) return [];
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Tokenize every keyword and concatenate the tokens, so a keyword typed as
 * "machine learning" or "编程" contributes each of its tokens.
 */
export function tokenizeKeywords(keywords: readonly string[]): string[] {
  return keywords.flatMap((keyword) => tokenize(keyword));
}

/**
 * Number of tokens in the text, as used for BM25 document lengths.
 */
export function tokenCount(text: string): number {
  return tokenize(text).length;
}
