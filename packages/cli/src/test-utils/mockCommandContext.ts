/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import {
  ChatSessionManager,
  ChatSettings,
  SessionDocumentStorage,
  SessionStore,
  loadChatConfig,
} from '@parley/core';
import { FakeModelService } from '@parley/core/test-utils';
import type { CommandContext } from '../ui/commands/types.js';

export interface MockCommandContextOverrides {
  invocation?: CommandContext['invocation'];
  services?: Partial<CommandContext['services']>;
  ui?: Partial<CommandContext['ui']>;
  commands?: CommandContext['commands'];
}

/** Start time of the default session store: session `chat_20250102_030405`. */
export const MOCK_STARTED_AT = new Date(2025, 0, 2, 3, 4, 5);

/**
 * Creates a CommandContext for use in tests, backed by a real session store
 * in a temporary directory. UI functions are pre-mocked with `vi.fn()`;
 * `prompt` answers `null` unless overridden.
 */
export const createMockCommandContext = async (
  overrides: MockCommandContextOverrides = {},
): Promise<CommandContext> => {
  const settings =
    overrides.services?.settings ??
    new ChatSettings(loadChatConfig({ OPENAI_API_KEY: 'test-secret' }));
  const sessions =
    overrides.services?.sessions ??
    new ChatSessionManager(
      await SessionStore.open(
        new SessionDocumentStorage(
          join(mkdtempSync(join(tmpdir(), 'parley-cmd-')), '.chat_history'),
        ),
        { now: () => MOCK_STARTED_AT },
      ),
      settings,
    );

  return {
    invocation: overrides.invocation ?? { raw: '', name: '', args: '' },
    services: {
      sessions,
      settings,
      modelService: overrides.services?.modelService ?? new FakeModelService(),
    },
    ui: {
      addItem: overrides.ui?.addItem ?? vi.fn(),
      prompt: overrides.ui?.prompt ?? vi.fn().mockResolvedValue(null),
    },
    commands: overrides.commands ?? [],
  };
};
