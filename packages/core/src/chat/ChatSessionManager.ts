/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomUUID } from 'node:crypto';
import type { ChatSettings } from '../config/chatSettings.js';
import { DebugLogger } from '../debug/index.js';
import { resolveHistoryPath } from '../utils/paths.js';
import { ok, type Result } from '../utils/result.js';
import {
  buildContextWindow,
  toApiMessages,
  trimHistory,
} from './contextWindow.js';
import type {
  InvalidSessionOperationError,
  PersistenceError,
  SessionError,
} from './errors.js';
import type { SessionStore } from './SessionStore.js';
import {
  createMessage,
  type ApiMessage,
  type ChatMessage,
  type MessageRole,
  type SessionHistory,
  type SessionStats,
  type SessionSummary,
} from './types.js';

const logger = new DebugLogger('parley:chat:manager');

export function generateSessionName(): string {
  return `session_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

/**
 * Session lifecycle and message history on top of a {@link SessionStore},
 * applying the context window and retention limits from the live settings.
 */
export class ChatSessionManager {
  constructor(
    private readonly store: SessionStore,
    private readonly settings: ChatSettings,
  ) {
    settings.subscribe((config, changed) => {
      if (changed.includes('historyFile')) {
        store.relocate(resolveHistoryPath(config.historyFile));
      }
    });
  }

  get currentSession(): string {
    return this.store.currentSession;
  }

  /**
   * Appends to the current session, then trims it if it has grown past the
   * retention band.
   */
  addMessage(role: MessageRole, content: string): ChatMessage {
    const message = createMessage(role, content);
    const length = this.store.append(message);

    const { maxHistoryMessages } = this.settings.get();
    const messages = this.store.getMessages();
    const trimmed = trimHistory(messages, maxHistoryMessages);
    if (trimmed !== messages) {
      this.store.replaceMessages(this.store.currentSession, [...trimmed]);
      logger.debug(
        () =>
          `Trimmed ${this.store.currentSession} from ${length} to ${trimmed.length} messages`,
      );
    }
    return message;
  }

  getContext(): ApiMessage[] {
    return buildContextWindow(
      this.store.getMessages(),
      this.settings.get().maxContextMessages,
    );
  }

  getMessagesForApi(): ApiMessage[] {
    return toApiMessages(this.store.getMessages());
  }

  getCurrentSessionLength(): number {
    return this.store.getMessages().length;
  }

  async clearHistory(): Promise<Result<void, PersistenceError>> {
    this.store.replaceMessages(this.store.currentSession, []);
    return this.store.save();
  }

  /**
   * Makes `name` the current session, creating it empty when needed.
   */
  switchSession(name: string): Result<string, InvalidSessionOperationError> {
    const session = this.store.createOrGet(name);
    if (!session.ok) {
      return session;
    }
    this.store.setCurrent(session.value.name);
    logger.debug(() => `Switched to session ${session.value.name}`);
    return ok(session.value.name);
  }

  newSession(name?: string): Result<string, InvalidSessionOperationError> {
    return this.switchSession(name ?? generateSessionName());
  }

  deleteSession(name: string): Promise<Result<void, SessionError>> {
    return this.store.delete(name);
  }

  renameSession(
    oldName: string,
    newName: string,
  ): Promise<Result<void, SessionError>> {
    return this.store.rename(oldName, newName);
  }

  saveHistory(): Promise<Result<void, PersistenceError>> {
    return this.store.save();
  }

  getStats(): SessionStats {
    const messages = this.store.getMessages();
    const count = (role: MessageRole) =>
      messages.filter((message) => message.role === role).length;
    return {
      sessionName: this.store.currentSession,
      totalMessages: messages.length,
      userMessages: count('user'),
      assistantMessages: count('assistant'),
      systemMessages: count('system'),
    };
  }

  getHistory(): SessionHistory {
    return {
      sessionName: this.store.currentSession,
      messages: [...this.store.getMessages()],
    };
  }

  listSessions(): SessionSummary[] {
    return this.store.names().map((name) => ({
      name,
      messageCount: this.store.getMessages(name).length,
      active: name === this.store.currentSession,
    }));
  }
}
