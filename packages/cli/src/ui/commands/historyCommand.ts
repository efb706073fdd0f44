/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CommandKind, type SlashCommand } from './types.js';
import { MessageType } from '../types.js';

export const historyCommand: SlashCommand = {
  name: 'history',
  description: 'Show conversation history',
  kind: CommandKind.BUILT_IN,
  action: (context) => {
    const { sessionName, messages } =
      context.services.sessions.getHistory();
    context.ui.addItem({ type: MessageType.HISTORY, sessionName, messages });
  },
};
