/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { PersistenceError } from '../chat/errors.js';
import {
  sessionDocumentSchema,
  type SessionDocument,
  type SessionMap,
} from '../chat/types.js';
import { DebugLogger } from '../debug/index.js';
import { getErrorMessage, isNodeError } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';

const logger = new DebugLogger('parley:storage:sessions');

/** Session set used when the history document cannot be read. */
export const FALLBACK_SESSION_NAME = 'default';

export interface SessionLoadResult {
  sessions: SessionMap;
  /** Set when the document existed but could not be read or parsed. */
  error?: PersistenceError;
}

/**
 * Reads and writes the history document: one JSON object mapping session
 * name to its ordered message list. Neither operation throws.
 */
export class SessionDocumentStorage {
  constructor(private filePath: string) {}

  getFilePath(): string {
    return this.filePath;
  }

  /** Points later loads and saves at another document. */
  setFilePath(filePath: string): void {
    this.filePath = filePath;
  }

  async load(): Promise<SessionLoadResult> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        logger.debug(() => `No history document at ${this.filePath}`);
        return { sessions: new Map() };
      }
      return this.fallback(error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return this.fallback(error);
    }

    const document = sessionDocumentSchema.safeParse(parsed);
    if (!document.success) {
      const issue = document.error.issues[0];
      return this.fallback(
        document.error,
        issue
          ? `${issue.path.join('.') || 'document'}: ${issue.message}`
          : 'invalid history document',
      );
    }

    const sessions: SessionMap = new Map();
    for (const [name, messages] of Object.entries(document.data)) {
      sessions.set(name, messages);
    }
    logger.debug(() => `Loaded ${sessions.size} session(s)`, {
      path: this.filePath,
    });
    return { sessions };
  }

  /**
   * Replaces the document with the full session map. The JSON is written to
   * a sibling temp file first and renamed over the target.
   */
  async save(sessions: SessionMap): Promise<Result<void, PersistenceError>> {
    const document: SessionDocument = {};
    for (const [name, messages] of sessions) {
      document[name] = messages.map(({ role, content, timestamp }) => ({
        role,
        content,
        timestamp,
      }));
    }
    const tempPath = `${this.filePath}.tmp`;

    try {
      await fs.promises.mkdir(path.dirname(path.resolve(this.filePath)), {
        recursive: true,
      });
      await fs.promises.writeFile(
        tempPath,
        JSON.stringify(document, null, 2),
        'utf-8',
      );
      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      logger.error('Failed to save history document:', error);
      return err(
        new PersistenceError('save', this.filePath, {
          cause: error,
          detail: getErrorMessage(error),
        }),
      );
    }

    logger.debug(() => `Saved ${sessions.size} session(s)`, {
      path: this.filePath,
    });
    return ok(undefined);
  }

  private fallback(cause: unknown, detail?: string): SessionLoadResult {
    logger.warn('History document unreadable, starting from fallback:', cause);
    return {
      sessions: new Map([[FALLBACK_SESSION_NAME, []]]),
      error: new PersistenceError('load', this.filePath, {
        cause,
        detail: detail ?? getErrorMessage(cause),
      }),
    };
  }
}
