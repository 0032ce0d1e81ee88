import { z } from "zod";
import { ValidationError } from "./errors";

// ============================================
// Types
// ============================================

export const MESSAGE_ROLES = ["user", "assistant", "system"] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

/**
 * Provider-specific side channel. Not part of the stable contract;
 * search and sort never read it.
 */
export type Metadata = Readonly<Record<string, unknown>>;

export interface ImageRef {
  readonly assetPointer: string;
  readonly sizeBytes: number | null;
  readonly width: number | null;
  readonly height: number | null;
}

export interface Message {
  readonly id: string;
  readonly content: string;
  readonly role: MessageRole;
  /** Always set; adapters fall back to the epoch or the conversation's createdAt */
  readonly timestamp: Date;
  /** null for root messages */
  readonly parentId: string | null;
  readonly images: readonly ImageRef[];
  readonly metadata: Metadata;
}

export interface Conversation {
  readonly id: string;
  readonly title: string;
  readonly createdAt: Date;
  readonly updatedAt: Date | null;
  /** Never empty */
  readonly messages: readonly Message[];
  readonly metadata: Metadata;
}

export const UNTITLED_CONVERSATION = "(No title)";
export const EMPTY_CONVERSATION_CONTENT = "(Empty conversation)";

// ============================================
// Schemas
// ============================================

const ImageRefSchema = z.object({
  assetPointer: z.string().min(1),
  sizeBytes: z.number().int().nonnegative().nullable().default(null),
  width: z.number().int().nonnegative().nullable().default(null),
  height: z.number().int().nonnegative().nullable().default(null),
});

const MessageSchema = z.object({
  id: z.string().min(1, "message id must not be empty"),
  content: z.string(),
  role: z.enum(MESSAGE_ROLES),
  timestamp: z.date(),
  parentId: z.string().min(1).nullable().default(null),
  images: z.array(ImageRefSchema).default([]),
  metadata: z.record(z.unknown()).default({}),
});

const ConversationSchema = z
  .object({
    id: z.string().min(1, "conversation id must not be empty"),
    title: z.string().min(1, "title must not be empty"),
    createdAt: z.date(),
    updatedAt: z.date().nullable().default(null),
    messages: z.array(z.custom<Message>((value) => value !== null && typeof value === "object")).min(1),
    metadata: z.record(z.unknown()).default({}),
  })
  .refine((conversation) => !conversation.updatedAt || conversation.updatedAt >= conversation.createdAt, {
    message: "updatedAt must not be earlier than createdAt",
    path: ["updatedAt"],
  });

export type MessageInput = z.input<typeof MessageSchema>;
export type ConversationInput = z.input<typeof ConversationSchema>;

// ============================================
// Factories
// ============================================

/**
 * Validate and freeze a message record.
 * Throws ValidationError when an invariant does not hold.
 */
export function createMessage(input: MessageInput): Message {
  const parsed = MessageSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod("message", parsed.error);
  }
  const { images, metadata, ...fields } = parsed.data;
  return Object.freeze({
    ...fields,
    images: Object.freeze(images.map((image) => Object.freeze(image))),
    metadata: Object.freeze(metadata),
  });
}

/**
 * Validate and freeze a conversation record. Messages must already be
 * built with createMessage.
 */
export function createConversation(input: ConversationInput): Conversation {
  const parsed = ConversationSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod("conversation", parsed.error);
  }
  const { messages, metadata, ...fields } = parsed.data;
  return Object.freeze({
    ...fields,
    messages: Object.freeze([...messages]),
    metadata: Object.freeze(metadata),
  });
}

/**
 * Synthetic message used when a conversation has no parseable messages.
 */
export function createPlaceholderMessage(conversationId: string, timestamp: Date): Message {
  return createMessage({
    id: `${conversationId}-placeholder`,
    content: EMPTY_CONVERSATION_CONTENT,
    role: "system",
    timestamp,
    parentId: null,
    metadata: { isPlaceholder: true },
  });
}

export function isMessageRole(value: string): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}
