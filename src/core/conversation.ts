import type { Conversation, Message } from "./models";

/**
 * Tree navigation over a conversation's messages.
 *
 * Messages reference their parent by id; for flat exports every message is a root.
 */

export function messageCount(conversation: Conversation): number {
  return conversation.messages.length;
}

export function isRootMessage(message: Message): boolean {
  return message.parentId === null;
}

export function getMessageById(conversation: Conversation, messageId: string): Message | null {
  return conversation.messages.find((m) => m.id === messageId) ?? null;
}

export function getRootMessages(conversation: Conversation): Message[] {
  return conversation.messages.filter(isRootMessage);
}

export function getChildren(conversation: Conversation, messageId: string): Message[] {
  return conversation.messages.filter((m) => m.parentId === messageId);
}

/**
 * Walk from a message up to its root. Returned oldest first.
 * Stops at a parent id that is not part of the conversation, and at cycles.
 */
export function getThread(conversation: Conversation, messageId: string): Message[] {
  const thread: Message[] = [];
  const seen = new Set<string>();
  let current = getMessageById(conversation, messageId);

  while (current && !seen.has(current.id)) {
    seen.add(current.id);
    thread.unshift(current);
    current = current.parentId ? getMessageById(conversation, current.parentId) : null;
  }

  return thread;
}

/**
 * Every root-to-leaf path in the message tree.
 */
export function getAllThreads(conversation: Conversation): Message[][] {
  const childrenByParent = new Map<string, Message[]>();
  for (const message of conversation.messages) {
    if (message.parentId === null) continue;
    const siblings = childrenByParent.get(message.parentId) || [];
    siblings.push(message);
    childrenByParent.set(message.parentId, siblings);
  }

  const threads: Message[][] = [];
  const visit = (message: Message, path: Message[]): void => {
    const nextPath = [...path, message];
    const children = childrenByParent.get(message.id) || [];
    const unvisited = children.filter((child) => !nextPath.includes(child));
    if (unvisited.length === 0) {
      threads.push(nextPath);
      return;
    }
    for (const child of unvisited) {
      visit(child, nextPath);
    }
  };

  for (const root of getRootMessages(conversation)) {
    visit(root, []);
  }

  return threads;
}

/**
 * All message contents joined by single spaces.
 */
export function flattenMessages(conversation: Conversation): string {
  return conversation.messages.map((m) => m.content).join(" ");
}
