import type { Conversation, Message } from "../core/models";

export interface MarkdownOptions {
  /** Include system and placeholder messages (omitted by default) */
  includeSystem?: boolean;
}

const ROLE_HEADINGS = {
  user: "👤 User",
  assistant: "🤖 Assistant",
  system: "⚙️ System",
} as const;

/** ISO-8601 without milliseconds: 2024-01-15T10:30:00Z */
export function formatTimestamp(date: Date | null): string {
  return date ? date.toISOString().replace(/\.\d{3}Z$/, "Z") : "N/A";
}

function renderHeader(conversation: Conversation, messageCount: number): string[] {
  const lines = [`# ${conversation.title}`, "", `Created: ${formatTimestamp(conversation.createdAt)}`];
  if (conversation.updatedAt) {
    lines.push(`Updated: ${formatTimestamp(conversation.updatedAt)}`);
  }
  lines.push(`Messages: ${messageCount} ${messageCount === 1 ? "message" : "messages"}`, "", "---");
  return lines;
}

function renderMessage(message: Message): string[] {
  const lines = [`## ${ROLE_HEADINGS[message.role]} · ${formatTimestamp(message.timestamp)}`, ""];
  for (const image of message.images) {
    lines.push(`![Image](${image.assetPointer})`, "");
  }
  lines.push(message.content.trim());
  return lines;
}

/**
 * Render a conversation as a markdown document.
 */
export function renderConversationMarkdown(conversation: Conversation, options: MarkdownOptions = {}): string {
  const messages = options.includeSystem
    ? conversation.messages
    : conversation.messages.filter((m) => m.role !== "system");

  const lines = [...renderHeader(conversation, messages.length), ""];
  messages.forEach((message, i) => {
    lines.push(...renderMessage(message));
    if (i < messages.length - 1) {
      lines.push("", "---", "");
    }
  });

  return lines.join("\n") + "\n";
}
