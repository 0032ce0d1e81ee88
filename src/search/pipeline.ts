import type { Conversation, Message } from "../core/models";
import { DEFAULT_PROGRESS_INTERVAL } from "../core/config";
import { logger } from "../utils/logger";
import { BM25Scorer, averageDocumentLength, normalizeScore } from "./bm25";
import { excludeFilter, findMatchedMessageIds, keywordsAllPresent, phraseMatches } from "./matchers";
import {
  hasDateFilter,
  hasExcludeKeywords,
  hasKeywordSearch,
  hasMessageCountFilter,
  hasPhraseSearch,
  hasTitleFilter,
  type SearchQuery,
  type SearchResult,
  type SortField,
} from "./query";
import { extractSnippet, extractSnippetFromMessages } from "./snippet";

export interface PipelineOptions {
  /** Called every `progressInterval` conversations read, then once with the total */
  onProgress?: (count: number) => void;
  progressInterval?: number;
}

/** One conversation that survived the structural filters */
export interface CorpusEntry {
  conversation: Conversation;
  /** Messages left after the role filter */
  messages: readonly Message[];
  text: string;
}

export interface Hit {
  entry: CorpusEntry;
  score: number;
  keywordMatched: boolean;
  phraseMatched: boolean;
  /** True when the query has no text criteria at all */
  unconstrained: boolean;
}

// ============================================
// Structural filters
// ============================================

function utcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function passesStructuralFilters(conversation: Conversation, query: SearchQuery): boolean {
  if (hasTitleFilter(query) && query.titleFilter) {
    if (!conversation.title.toLowerCase().includes(query.titleFilter.toLowerCase())) {
      return false;
    }
  }

  if (hasDateFilter(query)) {
    const day = utcDate(conversation.createdAt);
    if (query.fromDate !== undefined && day < query.fromDate) return false;
    if (query.toDate !== undefined && day > query.toDate) return false;
  }

  if (hasMessageCountFilter(query)) {
    const count = conversation.messages.length;
    if (query.minMessages !== undefined && count < query.minMessages) return false;
    if (query.maxMessages !== undefined && count > query.maxMessages) return false;
  }

  return true;
}

/**
 * Title plus contents without a role filter; contents only with one,
 * since the title is not attributable to a role.
 */
export function buildSearchText(conversation: Conversation, messages: readonly Message[], roleFiltered: boolean): string {
  const contents = messages.map((m) => m.content).join(" ");
  return roleFiltered ? contents : `${conversation.title} ${contents}`;
}

// ============================================
// Sorting
// ============================================

/**
 * Order by Unicode code point. Plain `<` compares UTF-16 code units, which
 * puts astral characters (surrogate pairs) before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(j) ?? 0;
    if (left !== right) return left < right ? -1 : 1;
    i += left > 0xffff ? 2 : 1;
    j += right > 0xffff ? 2 : 1;
  }
  return a.length - i === b.length - j ? 0 : a.length - i < b.length - j ? -1 : 1;
}

function comparePrimary(a: Hit, b: Hit, sortBy: SortField): number {
  const left = a.entry.conversation;
  const right = b.entry.conversation;
  switch (sortBy) {
    case "score":
      return a.score - b.score;
    case "date":
      return (left.updatedAt ?? left.createdAt).getTime() - (right.updatedAt ?? right.createdAt).getTime();
    case "title":
      return compareCodePoints(left.title.toLowerCase(), right.title.toLowerCase());
    case "messages":
      return left.messages.length - right.messages.length;
  }
}

/**
 * Order by the query's sort field; equal keys always fall back to
 * conversation id ascending, in both sort orders.
 */
export function sortHits<T extends Hit>(hits: T[], query: Pick<SearchQuery, "sortBy" | "sortOrder">): T[] {
  const direction = query.sortOrder === "desc" ? -1 : 1;
  return [...hits].sort((a, b) => {
    const primary = Math.sign(comparePrimary(a, b, query.sortBy)) * direction;
    if (primary !== 0) return primary;
    return compareCodePoints(a.entry.conversation.id, b.entry.conversation.id);
  });
}

// ============================================
// Pipeline
// ============================================

/**
 * Filter, score, rank and materialize search results over a conversation stream.
 *
 * Ranking needs corpus-wide statistics, so the stream is drained before the
 * first result is yielded; only conversations passing the structural filters
 * are kept.
 */
export async function* searchConversations(
  conversations: AsyncIterable<Conversation>,
  query: SearchQuery,
  options: PipelineOptions = {}
): AsyncGenerator<SearchResult> {
  const { onProgress, progressInterval = DEFAULT_PROGRESS_INTERVAL } = options;
  const roleFiltered = query.roleFilter !== undefined;

  // 1-3: structural filters, role scoping, corpus build
  const corpus: CorpusEntry[] = [];
  let read = 0;
  for await (const conversation of conversations) {
    read++;
    if (onProgress && read % progressInterval === 0) {
      onProgress(read);
    }

    if (!passesStructuralFilters(conversation, query)) continue;

    const messages = roleFiltered
      ? conversation.messages.filter((m) => m.role === query.roleFilter)
      : conversation.messages;
    if (messages.length === 0) continue;

    corpus.push({ conversation, messages, text: buildSearchText(conversation, messages, roleFiltered) });
  }
  onProgress?.(read);

  if (corpus.length === 0) {
    return;
  }

  const texts = corpus.map((entry) => entry.text);
  const avgDocLength = averageDocumentLength(texts);
  logger.debug(`Scoring ${corpus.length} of ${read} conversations (avg length ${avgDocLength.toFixed(1)})`);
  const scorer = new BM25Scorer(texts, avgDocLength);

  const keywords = query.keywords ?? [];
  const phrases = query.phrases ?? [];
  const textSearch = hasKeywordSearch(query) || hasPhraseSearch(query);

  // 4-5: match, score, exclude
  const hits: Hit[] = [];
  for (const entry of corpus) {
    let score = 0;
    let keywordMatched = false;
    let phraseMatched = false;

    if (hasKeywordSearch(query)) {
      if (query.matchMode === "all") {
        if (keywordsAllPresent(entry.text, keywords)) {
          score = scorer.score(entry.text, keywords);
          keywordMatched = true;
        }
      } else {
        score = scorer.score(entry.text, keywords);
        keywordMatched = score > 0;
      }
    }

    if (hasPhraseSearch(query) && phraseMatches(entry.text, phrases)) {
      phraseMatched = true;
      if (score === 0) score = 1;
    }

    if (textSearch && !keywordMatched && !phraseMatched) continue;
    if (!textSearch) score = 1;

    if (hasExcludeKeywords(query) && excludeFilter(entry.text, query.excludeKeywords ?? [])) continue;

    hits.push({ entry, score, keywordMatched, phraseMatched, unconstrained: !textSearch });
  }

  // 6-8: sort, normalize, limit
  const ranked = sortHits(hits, query).slice(0, query.limit);

  // 9: materialize
  const snippetTerms = [...keywords, ...phrases];
  for (const hit of ranked) {
    const { conversation, messages } = hit.entry;
    const matchedMessageIds = findMatchedMessageIds(
      messages,
      hit.keywordMatched ? keywords : [],
      hit.phraseMatched ? phrases : []
    );
    const snippet =
      matchedMessageIds.length > 0
        ? extractSnippetFromMessages(messages, snippetTerms, matchedMessageIds).snippet
        : extractSnippet(messages[0].content, snippetTerms, 0);

    yield Object.freeze({
      conversation,
      score: hit.unconstrained ? 1 : normalizeScore(hit.score),
      matchedMessageIds: Object.freeze(matchedMessageIds),
      snippet,
    });
  }
}
