/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CommandKind, type SlashCommand } from './types.js';
import { MessageType } from '../types.js';

export const statsCommand: SlashCommand = {
  name: 'stats',
  description: 'Show message counts for the current session',
  kind: CommandKind.BUILT_IN,
  action: (context) => {
    context.ui.addItem({
      type: MessageType.STATS,
      stats: context.services.sessions.getStats(),
    });
  },
};
