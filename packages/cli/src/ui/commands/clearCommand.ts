/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CommandKind, type SlashCommand } from './types.js';

export const clearCommand: SlashCommand = {
  name: 'clear',
  description: 'Clear the current session history',
  kind: CommandKind.BUILT_IN,
  action: async (context) => {
    // A failed save has already gone to the store's error reporter; the
    // in-memory history is cleared either way.
    await context.services.sessions.clearHistory();
    return {
      type: 'message',
      messageType: 'success',
      content: 'Chat history cleared.',
    };
  },
};
