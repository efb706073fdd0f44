/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { quitCommand } from './quitCommand.js';
import { createMockCommandContext } from '../../test-utils/mockCommandContext.js';

describe('quitCommand', () => {
  it('asks the loop to quit', async () => {
    const context = await createMockCommandContext();
    if (!quitCommand.action) {
      throw new Error('Command has no action');
    }

    expect(await quitCommand.action(context, '')).toEqual({ type: 'quit' });
    expect(context.ui.addItem).not.toHaveBeenCalled();
  });

  it('answers to /exit and /quit', () => {
    expect([quitCommand.name, ...(quitCommand.altNames ?? [])]).toEqual([
      'exit',
      'quit',
    ]);
  });
});
