/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SlashCommand } from '../ui/commands/types.js';

/**
 * A source of slash commands.
 */
export interface ICommandLoader {
  /**
   * @param signal An AbortSignal to allow cancellation.
   */
  loadCommands(signal: AbortSignal): Promise<SlashCommand[]>;
}
