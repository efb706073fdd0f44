/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SessionDocumentStorage } from '../storage/SessionDocumentStorage.js';
import { formatStartupSessionName, SessionStore } from './SessionStore.js';
import { createMessage, type ChatMessage } from './types.js';

const STARTED_AT = new Date(2025, 0, 2, 3, 4, 5);
const STARTUP_NAME = 'chat_20250102_030405';

function message(content: string): ChatMessage {
  return createMessage('user', content, new Date('2025-01-02T03:04:05.000Z'));
}

describe('formatStartupSessionName', () => {
  it('uses zero-padded local date and time', () => {
    expect(formatStartupSessionName(new Date(2024, 10, 9, 8, 7, 6))).toBe(
      'chat_20241109_080706',
    );
  });
});

describe('SessionStore', () => {
  let tempDir: string;
  let filePath: string;
  let storage: SessionDocumentStorage;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'parley-store-'));
    filePath = join(tempDir, 'history.json');
    storage = new SessionDocumentStorage(filePath);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function open(onPersistenceError = vi.fn()) {
    return SessionStore.open(storage, {
      now: () => STARTED_AT,
      onPersistenceError,
    });
  }

  async function seed(names: string[]): Promise<void> {
    await storage.save(
      new Map(
        names.map((name): [string, ChatMessage[]] => [name, [message(name)]]),
      ),
    );
  }

  describe('open()', () => {
    it('starts a fresh timestamp-named session on an empty store', async () => {
      const store = await open();

      expect(store.currentSession).toBe(STARTUP_NAME);
      expect(store.names()).toEqual([STARTUP_NAME]);
      expect(store.getMessages()).toEqual([]);
    });

    it('keeps earlier sessions without resuming them', async () => {
      await seed(['work']);

      const store = await open();

      expect(store.names()).toEqual(['work', STARTUP_NAME]);
      expect(store.currentSession).toBe(STARTUP_NAME);
      expect(store.getMessages('work')).toHaveLength(1);
    });

    it('suffixes the start-up name when it is already taken', async () => {
      await seed([STARTUP_NAME, `${STARTUP_NAME}_2`]);

      const store = await open();

      expect(store.currentSession).toBe(`${STARTUP_NAME}_3`);
    });

    it('reports an unreadable document and starts from the fallback', async () => {
      writeFileSync(filePath, '[', 'utf-8');
      const onPersistenceError = vi.fn();

      const store = await open(onPersistenceError);

      expect(onPersistenceError).toHaveBeenCalledTimes(1);
      expect(onPersistenceError.mock.calls[0][0].operation).toBe('load');
      expect(store.names()).toEqual(['default', STARTUP_NAME]);
    });
  });

  describe('createOrGet()', () => {
    it('registers a new empty session once', async () => {
      const store = await open();

      const first = store.createOrGet('notes');
      store.append(message('x'));
      const second = store.createOrGet('  notes  ');

      expect(first.ok && first.value.name).toBe('notes');
      expect(second.ok && second.value.messages).toEqual([]);
      expect(store.names()).toEqual([STARTUP_NAME, 'notes']);
    });

    it('rejects blank names', async () => {
      const store = await open();

      const result = store.createOrGet('   ');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('InvalidOperation');
      }
    });
  });

  describe('setCurrent()', () => {
    it('fails for an unknown session', async () => {
      const store = await open();

      const result = store.setCurrent('missing');

      expect(result.ok).toBe(false);
      expect(store.currentSession).toBe(STARTUP_NAME);
    });
  });

  describe('delete()', () => {
    it('removes another session and persists the change', async () => {
      await seed(['old']);
      const store = await open();

      const result = await store.delete('old');
      const reloaded = await storage.load();

      expect(result.ok).toBe(true);
      expect(store.names()).toEqual([STARTUP_NAME]);
      expect(Array.from(reloaded.sessions.keys())).toEqual([STARTUP_NAME]);
    });

    it('refuses to delete the active session', async () => {
      const store = await open();
      store.append(message('keep me'));
      const before = store.snapshot();

      const result = await store.delete(STARTUP_NAME);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('InvalidOperation');
        expect(result.error.message).toBe(
          'Cannot delete current session. Switch to another session first.',
        );
      }
      expect(store.snapshot()).toEqual(before);
    });

    it('reports an unknown session', async () => {
      const store = await open();

      const result = await store.delete('ghost');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('NotFound');
        expect(result.error.message).toBe("Session 'ghost' not found.");
      }
    });
  });

  describe('rename()', () => {
    it('moves messages and keeps the listing order', async () => {
      await seed(['a', 'b']);
      const store = await open();

      const result = await store.rename('a', 'alpha');

      expect(result.ok).toBe(true);
      expect(store.names()).toEqual(['alpha', 'b', STARTUP_NAME]);
      expect(store.getMessages('alpha')[0].content).toBe('a');
      expect(store.has('a')).toBe(false);
    });

    it('follows the active session', async () => {
      const store = await open();
      store.append(message('hello'));

      await store.rename(STARTUP_NAME, 'renamed');

      expect(store.currentSession).toBe('renamed');
      expect(store.getMessages()).toHaveLength(1);
    });

    it('rejects a name that is already taken', async () => {
      await seed(['a', 'b']);
      const store = await open();
      const before = store.snapshot();

      const result = await store.rename('a', 'b');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('Conflict');
        expect(result.error.message).toBe("Session 'b' already exists.");
      }
      expect(store.snapshot()).toEqual(before);
    });

    it('reports an unknown source session', async () => {
      const store = await open();

      const result = await store.rename('ghost', 'spirit');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('NotFound');
      }
    });
  });

  describe('save()', () => {
    it('hands write failures to the persistence handler', async () => {
      const blocker = join(tempDir, 'blocker');
      writeFileSync(blocker, 'file', 'utf-8');
      const onPersistenceError = vi.fn();
      const store = await SessionStore.open(
        new SessionDocumentStorage(join(blocker, 'history.json')),
        { now: () => STARTED_AT, onPersistenceError },
      );
      onPersistenceError.mockClear();

      const result = await store.save();

      expect(result.ok).toBe(false);
      expect(onPersistenceError).toHaveBeenCalledTimes(1);
      expect(onPersistenceError.mock.calls[0][0].operation).toBe('save');
    });
  });
});
