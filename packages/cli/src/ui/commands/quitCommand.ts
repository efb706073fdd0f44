/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CommandKind, type SlashCommand } from './types.js';

export const quitCommand: SlashCommand = {
  name: 'exit',
  altNames: ['quit'],
  description: 'Save the history and exit',
  kind: CommandKind.BUILT_IN,
  // The interactive loop does the final save when it sees this.
  action: () => ({ type: 'quit' }),
};
