/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { BuiltinCommandLoader } from './BuiltinCommandLoader.js';
import { CommandKind } from '../ui/commands/types.js';

describe('BuiltinCommandLoader', () => {
  it('loads every built-in command in help order', async () => {
    const commands = await new BuiltinCommandLoader().loadCommands(
      new AbortController().signal,
    );

    expect(commands.map((cmd) => cmd.name)).toEqual([
      'help',
      'history',
      'stats',
      'clear',
      'system',
      'stream',
      'session',
      'config',
      'exit',
    ]);
    expect(commands.every((cmd) => cmd.kind === CommandKind.BUILT_IN)).toBe(
      true,
    );
  });

  it('gives every command a unique name and alias', async () => {
    const commands = await new BuiltinCommandLoader().loadCommands(
      new AbortController().signal,
    );
    const names = commands.flatMap((cmd) => [
      cmd.name,
      ...(cmd.altNames ?? []),
    ]);

    expect(new Set(names).size).toBe(names.length);
  });
});
