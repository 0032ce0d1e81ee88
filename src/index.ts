/**
 * chatdig library entry point.
 *
 * @example
 * const provider = await getProvider(undefined, "conversations.json");
 * const query = createSearchQuery({ keywords: ["python"], limit: 5 });
 * for await (const result of provider.search("conversations.json", query)) {
 *   console.log(result.conversation.title, result.score);
 * }
 */

// Models
export * from "./core/models";
export * from "./core/conversation";
export * from "./core/errors";

// Config
export {
  PROVIDER_NAMES,
  DEFAULT_PROGRESS_INTERVAL,
  DEFAULT_SEARCH_LIMIT,
  MAX_SEARCH_LIMIT,
  loadConfig,
  getChatdigDir,
  getConfigPath,
} from "./core/config";
export type { ProviderName, ChatdigConfig } from "./core/config";

// Adapters
export * from "./adapters";
export { parseOpenAIConversation } from "./adapters/openai";
export { parseClaudeConversation } from "./adapters/claude";

// Search
export * from "./search/query";
export { searchConversations } from "./search/pipeline";
export type { PipelineOptions } from "./search/pipeline";
export { BM25Scorer, normalizeScore } from "./search/bm25";
export { tokenize } from "./search/tokenize";
export { extractSnippet } from "./search/snippet";

// Statistics and export
export * from "./core/statistics";
export * from "./export/markdown";
