/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SlashCommand } from '../ui/commands/types.js';
import type { ICommandLoader } from './types.js';
import { clearCommand } from '../ui/commands/clearCommand.js';
import { configCommand } from '../ui/commands/configCommand.js';
import { helpCommand } from '../ui/commands/helpCommand.js';
import { historyCommand } from '../ui/commands/historyCommand.js';
import { quitCommand } from '../ui/commands/quitCommand.js';
import { sessionCommand } from '../ui/commands/sessionCommand.js';
import { statsCommand } from '../ui/commands/statsCommand.js';
import { streamCommand } from '../ui/commands/streamCommand.js';
import { systemCommand } from '../ui/commands/systemCommand.js';

/**
 * Loads the hard-coded slash commands, in the order help lists them.
 */
export class BuiltinCommandLoader implements ICommandLoader {
  async loadCommands(_signal: AbortSignal): Promise<SlashCommand[]> {
    return [
      helpCommand,
      historyCommand,
      statsCommand,
      clearCommand,
      systemCommand,
      streamCommand,
      sessionCommand,
      configCommand,
      quitCommand,
    ];
  }
}
