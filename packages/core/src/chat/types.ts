/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const MESSAGE_ROLES = ['user', 'assistant', 'system'] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export function isMessageRole(value: string): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

/**
 * One stored turn of a session. Never mutated after it is appended.
 */
export interface ChatMessage {
  readonly role: MessageRole;
  readonly content: string;
  /** ISO-8601 time the message was appended. */
  readonly timestamp: string;
}

/**
 * A message as sent to the remote model: no timestamp.
 */
export interface ApiMessage {
  role: MessageRole;
  content: string;
}

/** Session name to ordered message list, in creation order. */
export type SessionMap = Map<string, ChatMessage[]>;

export const chatMessageSchema = z.object({
  role: z.enum(MESSAGE_ROLES),
  content: z.string(),
  timestamp: z.string(),
});

/**
 * Shape of the persisted history document: session name to messages.
 */
export const sessionDocumentSchema = z.record(z.array(chatMessageSchema));

export type SessionDocument = z.infer<typeof sessionDocumentSchema>;

export function createMessage(
  role: MessageRole,
  content: string,
  now: Date = new Date(),
): ChatMessage {
  if (!isMessageRole(role)) {
    throw new TypeError(`Invalid message role: ${String(role)}`);
  }
  return Object.freeze({ role, content, timestamp: now.toISOString() });
}

export interface SessionStats {
  sessionName: string;
  totalMessages: number;
  userMessages: number;
  assistantMessages: number;
  systemMessages: number;
}

export interface SessionSummary {
  name: string;
  messageCount: number;
  active: boolean;
}

export interface SessionHistory {
  sessionName: string;
  messages: readonly ChatMessage[];
}
