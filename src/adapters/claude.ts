/**
 * Anthropic Claude export adapter.
 *
 * Export root: array of conversations
 *   { uuid, name, created_at, updated_at, chat_messages: [...] }
 * Messages are flat (no threading):
 *   { uuid, text, content: [{ type, text? , ... }], sender, created_at }
 * Timestamps are ISO-8601 strings, usually ending in "Z".
 */

import { z } from "zod";
import { ValidationError } from "../core/errors";
import {
  UNTITLED_CONVERSATION,
  createConversation,
  createMessage,
  createPlaceholderMessage,
  type Conversation,
  type Message,
  type MessageRole,
} from "../core/models";
import { logger } from "../utils/logger";
import { defineProvider } from "./provider";

// ============================================
// Raw export schema
// ============================================

const ClaudeConversationSchema = z
  .object({
    uuid: z.string().min(1),
    name: z.string().nullish(),
    created_at: z.string(),
    updated_at: z.string().nullish(),
    chat_messages: z.array(z.unknown()).nullish(),
  })
  .passthrough();

const ClaudeMessageSchema = z
  .object({
    uuid: z.string().default(""),
    text: z.string().nullish(),
    content: z.array(z.unknown()).nullish(),
    sender: z.string().default("assistant"),
    created_at: z.string().nullish(),
  })
  .passthrough();

const TextBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

// ============================================
// Parsing
// ============================================

const SENDER_MAPPING = new Map<string, MessageRole>([
  ["human", "user"],
  ["assistant", "assistant"],
]);

export function parseClaudeTimestamp(value: string): Date | null {
  if (!value.trim()) return null;
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

/**
 * Join the text blocks of a structured content array. tool_use, tool_result
 * and any other block types carry no conversational text and are skipped.
 */
export function extractClaudeContent(blocks: readonly unknown[]): string {
  const texts: string[] = [];
  for (const block of blocks) {
    const textBlock = TextBlockSchema.safeParse(block);
    if (textBlock.success && textBlock.data.text) {
      texts.push(textBlock.data.text);
    }
  }
  return texts.join("\n");
}

function parseMessage(rawMessage: unknown, conversationCreatedAt: Date): Message {
  const parsed = ClaudeMessageSchema.safeParse(rawMessage);
  if (!parsed.success) {
    throw ValidationError.fromZod("Claude message", parsed.error);
  }

  const message = parsed.data;
  const content = extractClaudeContent(message.content ?? []) || message.text || "";
  const mappedRole = SENDER_MAPPING.get(message.sender);

  return createMessage({
    id: message.uuid,
    content,
    role: mappedRole ?? "assistant",
    timestamp: parseClaudeTimestamp(message.created_at ?? "") ?? conversationCreatedAt,
    parentId: null,
    metadata: mappedRole ? {} : { originalSender: message.sender },
  });
}

export function parseClaudeConversation(raw: unknown): Conversation {
  const parsed = ClaudeConversationSchema.safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.fromZod("Claude conversation", parsed.error);
  }

  const data = parsed.data;
  const createdAt = parseClaudeTimestamp(data.created_at);
  if (!createdAt) {
    throw new ValidationError(`Invalid Claude conversation: created_at is not a timestamp (${data.created_at})`);
  }

  let updatedAt: Date | null = null;
  if (data.updated_at) {
    updatedAt = parseClaudeTimestamp(data.updated_at);
    if (!updatedAt) {
      throw new ValidationError(`Invalid Claude conversation: updated_at is not a timestamp (${data.updated_at})`);
    }
  }

  const messages: Message[] = [];
  for (const rawMessage of data.chat_messages ?? []) {
    try {
      messages.push(parseMessage(rawMessage, createdAt));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      logger.warn(`Skipping malformed message in conversation ${data.uuid}: ${error.message}`);
    }
  }

  return createConversation({
    id: data.uuid,
    title: data.name?.trim() ? data.name : UNTITLED_CONVERSATION,
    createdAt,
    updatedAt,
    messages: messages.length > 0 ? messages : [createPlaceholderMessage(data.uuid, createdAt)],
    metadata: {},
  });
}

function recordId(raw: unknown): string {
  const candidate = z.object({ uuid: z.string() }).safeParse(raw);
  return candidate.success && candidate.data.uuid ? candidate.data.uuid : "unknown";
}

export const claudeProvider = defineProvider({
  name: "claude",
  parseConversation: parseClaudeConversation,
  recordId,
});
