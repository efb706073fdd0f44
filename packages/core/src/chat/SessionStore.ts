/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import type { SessionDocumentStorage } from '../storage/SessionDocumentStorage.js';
import { err, ok, type Result } from '../utils/result.js';
import {
  InvalidSessionOperationError,
  SessionConflictError,
  SessionNotFoundError,
  type PersistenceError,
  type SessionError,
} from './errors.js';
import type { ChatMessage, SessionMap } from './types.js';

const logger = new DebugLogger('parley:chat:store');

export interface Session {
  name: string;
  messages: readonly ChatMessage[];
}

export interface SessionStoreOptions {
  /**
   * Receives load and save failures. The store carries on with its
   * in-memory state either way.
   */
  onPersistenceError?: (error: PersistenceError) => void;
  /** Clock for the start-up session name. */
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `chat_YYYYMMDD_HHMMSS` in local time.
 */
export function formatStartupSessionName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `chat_${day}_${time}`;
}

function uniqueName(sessions: SessionMap, base: string): string {
  let candidate = base;
  for (let suffix = 2; sessions.has(candidate); suffix++) {
    candidate = `${base}_${suffix}`;
  }
  return candidate;
}

function validateName(
  name: string,
): Result<string, InvalidSessionOperationError> {
  const trimmed = name.trim();
  if (!trimmed) {
    return err(
      new InvalidSessionOperationError('Session name must not be empty.'),
    );
  }
  return ok(trimmed);
}

/**
 * Process-wide session state: every named session plus the pointer to the
 * active one. The active session always exists.
 */
export class SessionStore {
  private sessions: SessionMap;
  private current: string;

  private constructor(
    private readonly storage: SessionDocumentStorage,
    sessions: SessionMap,
    current: string,
    private readonly onPersistenceError: (error: PersistenceError) => void,
  ) {
    this.sessions = sessions;
    this.current = current;
  }

  /**
   * Loads the persisted sessions and starts a fresh, timestamp-named session
   * as the current one. Earlier sessions stay available but are not resumed.
   */
  static async open(
    storage: SessionDocumentStorage,
    options: SessionStoreOptions = {},
  ): Promise<SessionStore> {
    const report =
      options.onPersistenceError ??
      ((error: PersistenceError) => logger.error(error.message));
    const { sessions, error } = await storage.load();
    if (error) {
      report(error);
    }

    const now = options.now ?? (() => new Date());
    const startup = uniqueName(sessions, formatStartupSessionName(now()));
    sessions.set(startup, []);
    logger.debug(() => `Started session ${startup}`);

    return new SessionStore(storage, sessions, startup, report);
  }

  get currentSession(): string {
    return this.current;
  }

  get filePath(): string {
    return this.storage.getFilePath();
  }

  /**
   * Sends later saves to another document. Sessions already in memory are
   * kept; nothing is read from the new file.
   */
  relocate(filePath: string): void {
    this.storage.setFilePath(filePath);
    logger.debug(() => `History document moved to ${filePath}`);
  }

  names(): string[] {
    return Array.from(this.sessions.keys());
  }

  has(name: string): boolean {
    return this.sessions.has(name);
  }

  getMessages(name: string = this.current): readonly ChatMessage[] {
    return this.sessions.get(name) ?? [];
  }

  /**
   * Returns the named session, registering an empty one when absent.
   */
  createOrGet(name: string): Result<Session, InvalidSessionOperationError> {
    const validated = validateName(name);
    if (!validated.ok) {
      return validated;
    }
    const key = validated.value;
    let messages = this.sessions.get(key);
    if (!messages) {
      messages = [];
      this.sessions.set(key, messages);
      logger.debug(() => `Created session ${key}`);
    }
    return ok({ name: key, messages });
  }

  setCurrent(name: string): Result<void, SessionNotFoundError> {
    if (!this.sessions.has(name)) {
      return err(new SessionNotFoundError(name));
    }
    this.current = name;
    return ok(undefined);
  }

  append(message: ChatMessage): number {
    const messages = this.sessions.get(this.current) ?? [];
    messages.push(message);
    this.sessions.set(this.current, messages);
    return messages.length;
  }

  replaceMessages(name: string, messages: ChatMessage[]): void {
    if (this.sessions.has(name)) {
      this.sessions.set(name, messages);
    }
  }

  async delete(name: string): Promise<Result<void, SessionError>> {
    if (!this.sessions.has(name)) {
      return err(new SessionNotFoundError(name));
    }
    if (name === this.current) {
      return err(
        new InvalidSessionOperationError(
          'Cannot delete current session. Switch to another session first.',
        ),
      );
    }

    this.sessions.delete(name);
    logger.debug(() => `Deleted session ${name}`);
    await this.save();
    return ok(undefined);
  }

  async rename(
    oldName: string,
    newName: string,
  ): Promise<Result<void, SessionError>> {
    if (!this.sessions.has(oldName)) {
      return err(new SessionNotFoundError(oldName));
    }
    const validated = validateName(newName);
    if (!validated.ok) {
      return validated;
    }
    const target = validated.value;
    if (this.sessions.has(target)) {
      return err(new SessionConflictError(target));
    }

    // Rebuild so the renamed session keeps its place in listings
    const renamed: SessionMap = new Map();
    for (const [name, messages] of this.sessions) {
      renamed.set(name === oldName ? target : name, messages);
    }
    this.sessions = renamed;
    if (this.current === oldName) {
      this.current = target;
    }
    logger.debug(() => `Renamed session ${oldName} to ${target}`);

    await this.save();
    return ok(undefined);
  }

  /**
   * Writes every session to the history document. Failures go to the
   * persistence error handler and are also returned.
   */
  async save(): Promise<Result<void, PersistenceError>> {
    const result = await this.storage.save(this.sessions);
    if (!result.ok) {
      this.onPersistenceError(result.error);
    }
    return result;
  }

  /** Copy of the current state, for inspection. */
  snapshot(): SessionMap {
    return new Map(
      Array.from(
        this.sessions,
        ([name, messages]): [string, ChatMessage[]] => [name, [...messages]],
      ),
    );
  }
}
