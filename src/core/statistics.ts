import type { ConversationProvider, StreamOptions } from "../adapters/provider";
import type { Conversation, MessageRole } from "./models";
import { logger } from "../utils/logger";

export interface ConversationSummary {
  id: string;
  title: string;
  messageCount: number;
}

export interface ExportStatistics {
  totalConversations: number;
  totalMessages: number;
  /** Earliest createdAt, null for an empty export */
  earliestDate: Date | null;
  /** Latest updatedAt (or createdAt), null for an empty export */
  latestDate: Date | null;
  averageMessages: number;
  largestConversation: ConversationSummary | null;
  smallestConversation: ConversationSummary | null;
  skippedCount: number;
}

export type RoleCount = Record<MessageRole, number>;

export interface ConversationStatistics {
  conversationId: string;
  title: string;
  createdAt: Date;
  updatedAt: Date | null;
  messageCount: number;
  messageCountByRole: RoleCount;
  firstMessage: Date | null;
  lastMessage: Date | null;
  durationSeconds: number;
  /** null when there are fewer than two messages */
  averageGapSeconds: number | null;
}

function summarize(conversation: Conversation): ConversationSummary {
  return { id: conversation.id, title: conversation.title, messageCount: conversation.messages.length };
}

/**
 * Export-wide statistics in a single streaming pass.
 */
export async function calculateStatistics(
  filePath: string,
  provider: ConversationProvider,
  options: StreamOptions = {}
): Promise<ExportStatistics> {
  const stats: ExportStatistics = {
    totalConversations: 0,
    totalMessages: 0,
    earliestDate: null,
    latestDate: null,
    averageMessages: 0,
    largestConversation: null,
    smallestConversation: null,
    skippedCount: 0,
  };

  const onSkip = (conversationId: string, reason: string) => {
    stats.skippedCount++;
    options.onSkip?.(conversationId, reason);
  };

  for await (const conversation of provider.streamConversations(filePath, { ...options, onSkip })) {
    const count = conversation.messages.length;
    stats.totalConversations++;
    stats.totalMessages += count;

    if (!stats.earliestDate || conversation.createdAt < stats.earliestDate) {
      stats.earliestDate = conversation.createdAt;
    }
    const latest = conversation.updatedAt ?? conversation.createdAt;
    if (!stats.latestDate || latest > stats.latestDate) {
      stats.latestDate = latest;
    }
    if (!stats.largestConversation || count > stats.largestConversation.messageCount) {
      stats.largestConversation = summarize(conversation);
    }
    if (!stats.smallestConversation || count < stats.smallestConversation.messageCount) {
      stats.smallestConversation = summarize(conversation);
    }
  }

  stats.averageMessages = stats.totalConversations > 0 ? stats.totalMessages / stats.totalConversations : 0;
  logger.debug(`Statistics for ${filePath}: ${stats.totalConversations} conversations, ${stats.skippedCount} skipped`);
  return stats;
}

/**
 * Per-conversation statistics over an already materialized conversation.
 */
export function calculateConversationStatistics(conversation: Conversation): ConversationStatistics {
  const messageCountByRole: RoleCount = { user: 0, assistant: 0, system: 0 };
  for (const message of conversation.messages) {
    messageCountByRole[message.role]++;
  }

  const { messages } = conversation;
  const first = messages[0]?.timestamp ?? null;
  const last = messages[messages.length - 1]?.timestamp ?? null;
  const durationSeconds = first && last ? (last.getTime() - first.getTime()) / 1000 : 0;

  let averageGapSeconds: number | null = null;
  if (messages.length >= 2) {
    let totalGap = 0;
    for (let i = 1; i < messages.length; i++) {
      totalGap += messages[i].timestamp.getTime() - messages[i - 1].timestamp.getTime();
    }
    averageGapSeconds = totalGap / (messages.length - 1) / 1000;
  }

  return {
    conversationId: conversation.id,
    title: conversation.title,
    createdAt: conversation.createdAt,
    updatedAt: conversation.updatedAt,
    messageCount: messages.length,
    messageCountByRole,
    firstMessage: first,
    lastMessage: last,
    durationSeconds: Math.max(0, durationSeconds),
    averageGapSeconds,
  };
}
