import type { Message } from "../core/models";

export const SNIPPET_MAX_LENGTH = 100;
/** Characters of context kept before the first match */
export const SNIPPET_LEADING_CONTEXT = 20;
export const FALLBACK_EMPTY = "[Content unavailable]";
export const FALLBACK_NO_MATCH = "[No content matched]";

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

interface Grapheme {
  text: string;
  /** UTF-16 offset of the grapheme in the source string */
  offset: number;
}

function splitGraphemes(text: string): Grapheme[] {
  return Array.from(segmenter.segment(text), (s) => ({ text: s.segment, offset: s.index }));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * UTF-16 offset of the earliest case-insensitive occurrence of any keyword, or -1.
 */
function findFirstMatch(text: string, keywords: readonly string[]): number {
  let first = -1;
  for (const keyword of keywords) {
    if (!keyword) continue;
    const match = new RegExp(escapeRegExp(keyword), "iu").exec(text);
    if (match && (first === -1 || match.index < first)) {
      first = match.index;
    }
  }
  return first;
}

/**
 * Bounded preview of `text` around the first keyword occurrence.
 *
 * Lengths are counted in grapheme clusters. `matchCount === 0` means the
 * conversation matched on metadata only, so the preview starts at the top.
 */
export function extractSnippet(text: string, keywords: readonly string[], matchCount = 1): string {
  const content = text.trim();
  if (!content) {
    return FALLBACK_EMPTY;
  }

  const graphemes = splitGraphemes(content);
  const matchOffset = matchCount > 0 ? findFirstMatch(content, keywords) : -1;
  const matchIndex = matchOffset >= 0 ? graphemes.findIndex((g) => g.offset >= matchOffset) : -1;

  const start = matchIndex > 0 ? Math.max(0, matchIndex - SNIPPET_LEADING_CONTEXT) : 0;
  const end = start + SNIPPET_MAX_LENGTH;

  let snippet = graphemes
    .slice(start, end)
    .map((g) => g.text)
    .join("");

  if (end < graphemes.length) {
    snippet = snippet.trimEnd() + "...";
  }

  if (start > 0) {
    // Drop the partial word at the cut when a space is close enough
    const space = snippet.indexOf(" ");
    snippet = space > 0 && space < SNIPPET_LEADING_CONTEXT ? "..." + snippet.slice(space + 1) : "..." + snippet;
  }

  if (matchCount > 1) {
    snippet += ` (+${matchCount - 1} more matches)`;
  }

  return snippet;
}

export interface MessageSnippet {
  snippet: string;
  matchCount: number;
}

/**
 * Snippet from the first message (in `messages` order) whose id was matched.
 */
export function extractSnippetFromMessages(
  messages: readonly Message[],
  keywords: readonly string[],
  matchedMessageIds: readonly string[]
): MessageSnippet {
  if (messages.length === 0) {
    return { snippet: FALLBACK_EMPTY, matchCount: 0 };
  }
  if (matchedMessageIds.length === 0) {
    return { snippet: FALLBACK_NO_MATCH, matchCount: 0 };
  }

  const matched = new Set(matchedMessageIds);
  const first = messages.find((m) => matched.has(m.id));
  if (!first) {
    return { snippet: FALLBACK_NO_MATCH, matchCount: 0 };
  }

  const matchCount = matchedMessageIds.length;
  return { snippet: extractSnippet(first.content, keywords, matchCount), matchCount };
}
