/**
 * OpenAI ChatGPT export adapter.
 *
 * Export root: array of conversations
 *   { id, title, create_time, update_time, mapping, current_node?, moderation_results? }
 * where `mapping` is a tree keyed by node id:
 *   { [nodeId]: { message: {...} | null, parent: string | null, children: string[] } }
 * Timestamps are Unix seconds (fractional).
 */

import { z } from "zod";
import { ValidationError } from "../core/errors";
import {
  UNTITLED_CONVERSATION,
  createConversation,
  createMessage,
  createPlaceholderMessage,
  type Conversation,
  type ImageRef,
  type Message,
  type MessageRole,
} from "../core/models";
import { logger } from "../utils/logger";
import { defineProvider } from "./provider";

// ============================================
// Raw export schema
// ============================================

const OpenAIConversationSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().nullable(),
    create_time: z.number(),
    update_time: z.number().nullish(),
    mapping: z.record(z.unknown()).nullish(),
    current_node: z.string().nullish(),
    moderation_results: z.array(z.unknown()).nullish(),
  })
  .passthrough();

const OpenAINodeSchema = z
  .object({
    message: z.unknown().nullish(),
    parent: z.string().nullish(),
    children: z.array(z.string()).nullish(),
  })
  .passthrough();

const OpenAIMessageSchema = z
  .object({
    id: z.string().min(1),
    author: z.object({ role: z.string() }).passthrough(),
    content: z.unknown().optional(),
    create_time: z.number().nullish(),
    update_time: z.number().nullish(),
  })
  .passthrough();

const OpenAIContentSchema = z
  .object({
    content_type: z.string().default("text"),
    parts: z.array(z.unknown()).nullish(),
  })
  .passthrough();

const ImagePartSchema = z
  .object({
    content_type: z.literal("image_asset_pointer"),
    asset_pointer: z.string().min(1),
    size_bytes: z.number().int().nonnegative().nullish(),
    width: z.number().int().nonnegative().nullish(),
    height: z.number().int().nonnegative().nullish(),
  })
  .passthrough();

type OpenAINode = z.infer<typeof OpenAINodeSchema>;

// ============================================
// Parsing
// ============================================

const ROLE_MAPPING = new Map<string, MessageRole>([
  ["user", "user"],
  ["assistant", "assistant"],
  ["system", "system"],
  // Tool invocations are assistant actions
  ["tool", "assistant"],
]);

export function normalizeOpenAIRole(rawRole: string): MessageRole {
  return ROLE_MAPPING.get(rawRole) ?? "assistant";
}

function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

function firstStringPart(parts: readonly unknown[] | null | undefined): string | undefined {
  const first = parts?.[0];
  return typeof first === "string" ? first : undefined;
}

/**
 * Text parts joined by spaces; image_asset_pointer parts become ImageRefs.
 */
function parseMultimodalParts(parts: readonly unknown[]): { text: string; images: ImageRef[] } {
  const textParts: string[] = [];
  const images: ImageRef[] = [];

  for (const part of parts) {
    if (typeof part === "string") {
      textParts.push(part);
      continue;
    }
    const image = ImagePartSchema.safeParse(part);
    if (image.success) {
      images.push({
        assetPointer: image.data.asset_pointer,
        sizeBytes: image.data.size_bytes ?? null,
        width: image.data.width ?? null,
        height: image.data.height ?? null,
      });
    } else {
      logger.debug("Skipping non-image multimodal part");
    }
  }

  return { text: textParts.join(" "), images };
}

export function extractOpenAIContent(rawContent: unknown): { text: string; images: ImageRef[] } {
  const parsed = OpenAIContentSchema.safeParse(rawContent);
  if (!parsed.success) {
    return { text: "", images: [] };
  }

  const { content_type: contentType, parts } = parsed.data;
  switch (contentType) {
    case "text":
      return { text: firstStringPart(parts) ?? "", images: [] };
    case "multimodal_text":
      return parseMultimodalParts(parts ?? []);
    case "code":
      return { text: firstStringPart(parts) ?? "[Code]", images: [] };
    case "image_asset_pointer":
    case "image":
      return { text: "[Image]", images: [] };
    default:
      return { text: `[${contentType}]`, images: [] };
  }
}

function parseMessage(rawMessage: unknown, node: OpenAINode): Message {
  const parsed = OpenAIMessageSchema.safeParse(rawMessage);
  if (!parsed.success) {
    throw ValidationError.fromZod("OpenAI message", parsed.error);
  }

  const message = parsed.data;
  const rawRole = message.author.role;
  const { text, images } = extractOpenAIContent(message.content);

  return createMessage({
    id: message.id,
    content: text,
    role: normalizeOpenAIRole(rawRole),
    // Missing timestamps sort first instead of failing the message
    timestamp: fromUnixSeconds(message.create_time ?? 0),
    parentId: node.parent ?? null,
    images,
    metadata: {
      originalRole: rawRole,
      updateTime: message.update_time ?? null,
    },
  });
}

/**
 * Collect the messages of a mapping tree, skipping navigation nodes
 * (message: null) and malformed messages, sorted by timestamp.
 */
export function extractMessagesFromMapping(mapping: Record<string, unknown>, conversationId: string): Message[] {
  const messages: Message[] = [];

  for (const [nodeId, rawNode] of Object.entries(mapping)) {
    const node = OpenAINodeSchema.safeParse(rawNode);
    if (!node.success || node.data.message === null || node.data.message === undefined) {
      continue;
    }
    try {
      messages.push(parseMessage(node.data.message, node.data));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      logger.warn(`Skipping malformed message in node ${nodeId} of conversation ${conversationId}: ${error.message}`);
    }
  }

  return messages.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

export function parseOpenAIConversation(raw: unknown): Conversation {
  const parsed = OpenAIConversationSchema.safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.fromZod("OpenAI conversation", parsed.error);
  }

  const data = parsed.data;
  const createdAt = fromUnixSeconds(data.create_time);
  const messages = extractMessagesFromMapping(data.mapping ?? {}, data.id);

  return createConversation({
    id: data.id,
    title: data.title?.trim() ? data.title : UNTITLED_CONVERSATION,
    createdAt,
    updatedAt: data.update_time === null || data.update_time === undefined ? null : fromUnixSeconds(data.update_time),
    messages: messages.length > 0 ? messages : [createPlaceholderMessage(data.id, createdAt)],
    metadata: {
      currentNode: data.current_node ?? null,
      moderationResults: data.moderation_results ?? [],
    },
  });
}

function recordId(raw: unknown): string {
  const candidate = z.object({ id: z.string() }).safeParse(raw);
  return candidate.success && candidate.data.id ? candidate.data.id : "unknown";
}

export const openaiProvider = defineProvider({
  name: "openai",
  parseConversation: parseOpenAIConversation,
  recordId,
});
