/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ApiMessage, ChatMessage } from './types.js';

export function toApiMessages(messages: readonly ChatMessage[]): ApiMessage[] {
  return messages.map(({ role, content }) => ({ role, content }));
}

/**
 * The context sent with one request: the last `maxContextMessages` messages,
 * oldest first. Stored history is left as it is.
 */
export function buildContextWindow(
  messages: readonly ChatMessage[],
  maxContextMessages: number,
): ApiMessage[] {
  if (maxContextMessages <= 0) {
    return [];
  }
  const start = Math.max(0, messages.length - maxContextMessages);
  return toApiMessages(messages.slice(start));
}

/**
 * Storage retention. History is cut back to the newest `maxHistoryMessages`
 * only once it grows past twice that, so appends do not trim one by one.
 * Returns the input array when nothing is trimmed.
 */
export function trimHistory<T>(
  messages: readonly T[],
  maxHistoryMessages: number,
): readonly T[] {
  if (messages.length <= maxHistoryMessages * 2) {
    return messages;
  }
  return messages.slice(messages.length - maxHistoryMessages);
}
