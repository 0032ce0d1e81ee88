import { z } from "zod";
import { DEFAULT_SEARCH_LIMIT, MAX_SEARCH_LIMIT } from "../core/config";
import { ValidationError } from "../core/errors";
import { MESSAGE_ROLES, type Conversation, type MessageRole } from "../core/models";

export const MATCH_MODES = ["any", "all"] as const;
export const SORT_FIELDS = ["score", "date", "title", "messages"] as const;
export const SORT_ORDERS = ["asc", "desc"] as const;

export type MatchMode = (typeof MATCH_MODES)[number];
export type SortField = (typeof SORT_FIELDS)[number];
export type SortOrder = (typeof SORT_ORDERS)[number];

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const isoDate = z
  .string()
  .regex(DATE_PATTERN, "expected a YYYY-MM-DD date")
  .refine((value) => !isNaN(Date.parse(`${value}T00:00:00Z`)), "not a calendar date");

const termList = z.array(z.string()).transform((terms) => terms.filter((t) => t.trim().length > 0));

const SearchQuerySchema = z
  .object({
    keywords: termList.optional(),
    phrases: termList.optional(),
    matchMode: z.enum(MATCH_MODES).default("any"),
    excludeKeywords: termList.optional(),
    roleFilter: z.enum(MESSAGE_ROLES).optional(),
    titleFilter: z.string().optional(),
    fromDate: isoDate.optional(),
    toDate: isoDate.optional(),
    minMessages: z.number().int().min(1).optional(),
    maxMessages: z.number().int().min(1).optional(),
    sortBy: z.enum(SORT_FIELDS).default("score"),
    sortOrder: z.enum(SORT_ORDERS).default("desc"),
    limit: z.number().int().min(1).max(MAX_SEARCH_LIMIT).default(DEFAULT_SEARCH_LIMIT),
  })
  .strict()
  .refine((q) => !q.fromDate || !q.toDate || q.fromDate <= q.toDate, {
    message: "fromDate must not be after toDate",
    path: ["fromDate"],
  })
  .refine((q) => q.minMessages === undefined || q.maxMessages === undefined || q.minMessages <= q.maxMessages, {
    message: "minMessages must not exceed maxMessages",
    path: ["minMessages"],
  });

export type SearchQueryInput = z.input<typeof SearchQuerySchema>;

/**
 * Declarative, immutable search configuration. Reusable across files.
 */
export interface SearchQuery {
  readonly keywords?: readonly string[];
  readonly phrases?: readonly string[];
  readonly matchMode: MatchMode;
  readonly excludeKeywords?: readonly string[];
  readonly roleFilter?: MessageRole;
  readonly titleFilter?: string;
  /** Inclusive, YYYY-MM-DD, compared with the UTC date of createdAt */
  readonly fromDate?: string;
  readonly toDate?: string;
  readonly minMessages?: number;
  readonly maxMessages?: number;
  readonly sortBy: SortField;
  readonly sortOrder: SortOrder;
  readonly limit: number;
}

export interface SearchResult {
  readonly conversation: Conversation;
  /** Normalized to [0, 1] */
  readonly score: number;
  readonly matchedMessageIds: readonly string[];
  readonly snippet: string | null;
}

/**
 * Validate a query. Throws ValidationError on out-of-range or inconsistent fields.
 */
export function createSearchQuery(input: SearchQueryInput = {}): SearchQuery {
  return parseSearchQuery(input);
}

/**
 * Validate untyped input (CLI flags, JSON) into a SearchQuery.
 */
export function parseSearchQuery(input: unknown): SearchQuery {
  const parsed = SearchQuerySchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod("search query", parsed.error);
  }
  const { keywords, phrases, excludeKeywords, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    keywords: keywords && Object.freeze(keywords),
    phrases: phrases && Object.freeze(phrases),
    excludeKeywords: excludeKeywords && Object.freeze(excludeKeywords),
  });
}

export function hasKeywordSearch(query: SearchQuery): boolean {
  return (query.keywords?.length ?? 0) > 0;
}

export function hasPhraseSearch(query: SearchQuery): boolean {
  return (query.phrases?.length ?? 0) > 0;
}

export function hasExcludeKeywords(query: SearchQuery): boolean {
  return (query.excludeKeywords?.length ?? 0) > 0;
}

export function hasTitleFilter(query: SearchQuery): boolean {
  return (query.titleFilter?.trim().length ?? 0) > 0;
}

export function hasDateFilter(query: SearchQuery): boolean {
  return query.fromDate !== undefined || query.toDate !== undefined;
}

export function hasMessageCountFilter(query: SearchQuery): boolean {
  return query.minMessages !== undefined || query.maxMessages !== undefined;
}
