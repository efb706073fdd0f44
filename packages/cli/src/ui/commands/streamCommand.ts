/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CommandKind, type SlashCommand } from './types.js';

export const streamCommand: SlashCommand = {
  name: 'stream',
  description: 'Toggle streaming mode',
  kind: CommandKind.BUILT_IN,
  action: (context) => {
    const { settings } = context.services;
    const streamingEnabled = !settings.get().streamingEnabled;
    settings.update({ streamingEnabled });
    return {
      type: 'message',
      messageType: 'success',
      content: `Streaming mode ${streamingEnabled ? 'enabled' : 'disabled'}`,
    };
  },
};
