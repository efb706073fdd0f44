/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { streamCommand } from './streamCommand.js';
import { createMockCommandContext } from '../../test-utils/mockCommandContext.js';

describe('streamCommand', () => {
  it('toggles streaming off and on again', async () => {
    const context = await createMockCommandContext();
    if (!streamCommand.action) {
      throw new Error('Command has no action');
    }

    const first = await streamCommand.action(context, '');
    expect(first).toEqual({
      type: 'message',
      messageType: 'success',
      content: 'Streaming mode disabled',
    });
    expect(context.services.settings.get().streamingEnabled).toBe(false);

    const second = await streamCommand.action(context, '');
    expect(second).toEqual({
      type: 'message',
      messageType: 'success',
      content: 'Streaming mode enabled',
    });
    expect(context.services.settings.get().streamingEnabled).toBe(true);
  });
});
