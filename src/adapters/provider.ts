import type { ProviderName } from "../core/config";
import { DEFAULT_PROGRESS_INTERVAL } from "../core/config";
import { ValidationError } from "../core/errors";
import type { Conversation, Message } from "../core/models";
import { getMessageById } from "../core/conversation";
import { searchConversations } from "../search/pipeline";
import type { SearchQuery, SearchResult } from "../search/query";
import { streamJsonArray } from "../utils/json-stream";
import { logger } from "../utils/logger";

// ============================================
// Types
// ============================================

export type ProgressCallback = (count: number) => void;
export type SkipCallback = (conversationId: string, reason: string) => void;

export interface StreamOptions {
  /** Called every `progressInterval` conversations (default 100) */
  onProgress?: ProgressCallback;
  /** Called once per malformed conversation that was skipped */
  onSkip?: SkipCallback;
  progressInterval?: number;
}

export interface MessageLookupOptions {
  /** Restricts the scan to one conversation (id or 4+ character prefix) */
  conversationId?: string;
}

export interface MessageMatch {
  message: Message;
  conversation: Conversation;
}

/**
 * Capabilities every export format provides. Instances hold no state;
 * each call opens its own stream.
 */
export interface ConversationProvider {
  readonly name: ProviderName;
  streamConversations(filePath: string, options?: StreamOptions): AsyncGenerator<Conversation>;
  search(filePath: string, query: SearchQuery, options?: StreamOptions): AsyncGenerator<SearchResult>;
  getConversationById(filePath: string, idOrPrefix: string): Promise<Conversation | null>;
  getMessageById(filePath: string, messageId: string, options?: MessageLookupOptions): Promise<MessageMatch | null>;
}

export interface ProviderDefinition {
  name: ProviderName;
  /** Normalize one raw array element. Throws ValidationError for malformed records. */
  parseConversation(raw: unknown): Conversation;
  /** Best-effort id of a raw element, for skip reports */
  recordId(raw: unknown): string;
}

/** Prefix lookups need at least this many characters */
export const MIN_ID_PREFIX_LENGTH = 4;

// ============================================
// Shared behaviour
// ============================================

export function matchesConversationId(conversationId: string, idOrPrefix: string): boolean {
  const id = conversationId.toLowerCase();
  const wanted = idOrPrefix.toLowerCase();
  return id === wanted || (wanted.length >= MIN_ID_PREFIX_LENGTH && id.startsWith(wanted));
}

async function* streamExport(
  definition: ProviderDefinition,
  filePath: string,
  options: StreamOptions
): AsyncGenerator<Conversation> {
  const { onProgress, onSkip, progressInterval = DEFAULT_PROGRESS_INTERVAL } = options;
  let count = 0;

  for await (const raw of streamJsonArray(filePath)) {
    let conversation: Conversation;
    try {
      conversation = definition.parseConversation(raw);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      const id = definition.recordId(raw);
      logger.warn(`Skipped malformed ${definition.name} conversation ${id}: ${error.message}`);
      onSkip?.(id, error.message);
      continue;
    }

    count++;
    if (onProgress && count % progressInterval === 0) {
      onProgress(count);
    }
    yield conversation;
  }
}

async function findConversation(
  conversations: AsyncIterable<Conversation>,
  idOrPrefix: string
): Promise<Conversation | null> {
  // Leaving the loop early closes the underlying file
  for await (const conversation of conversations) {
    if (matchesConversationId(conversation.id, idOrPrefix)) {
      return conversation;
    }
  }
  return null;
}

/**
 * Build a ConversationProvider from a record parser.
 */
export function defineProvider(definition: ProviderDefinition): ConversationProvider {
  const provider: ConversationProvider = {
    name: definition.name,

    streamConversations(filePath, options = {}) {
      return streamExport(definition, filePath, options);
    },

    search(filePath, query, options = {}) {
      const { onProgress, onSkip, progressInterval } = options;
      return searchConversations(provider.streamConversations(filePath, { onSkip, progressInterval }), query, {
        onProgress,
        progressInterval,
      });
    },

    getConversationById(filePath, idOrPrefix) {
      return findConversation(provider.streamConversations(filePath), idOrPrefix);
    },

    async getMessageById(filePath, messageId, options = {}) {
      if (options.conversationId !== undefined) {
        const conversation = await provider.getConversationById(filePath, options.conversationId);
        const message = conversation && getMessageById(conversation, messageId);
        return conversation && message ? { message, conversation } : null;
      }

      for await (const conversation of provider.streamConversations(filePath)) {
        const message = getMessageById(conversation, messageId);
        if (message) {
          return { message, conversation };
        }
      }
      return null;
    },
  };

  return Object.freeze(provider);
}
