/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { parseSlashCommand } from './commands.js';
import { CommandKind, type SlashCommand } from '../ui/commands/types.js';

const switchCommand: SlashCommand = {
  name: 'switch',
  description: 'switch',
  kind: CommandKind.BUILT_IN,
};

const sessionCommand: SlashCommand = {
  name: 'session',
  description: 'sessions',
  kind: CommandKind.BUILT_IN,
  subCommands: [switchCommand],
};

const exitCommand: SlashCommand = {
  name: 'exit',
  altNames: ['quit'],
  description: 'exit',
  kind: CommandKind.BUILT_IN,
};

const systemCommand: SlashCommand = {
  name: 'system',
  description: 'system',
  kind: CommandKind.BUILT_IN,
};

const commands = [sessionCommand, exitCommand, systemCommand];

describe('parseSlashCommand', () => {
  it('ignores input that is not a command', () => {
    expect(parseSlashCommand('hello /session', commands)).toEqual({
      commandToExecute: undefined,
      commandName: '',
      args: '',
      canonicalPath: [],
    });
  });

  it('matches names case-insensitively and trims the arguments', () => {
    expect(parseSlashCommand('  /SYSTEM   be terse  ', commands)).toEqual({
      commandToExecute: systemCommand,
      commandName: 'system',
      args: 'be terse',
      canonicalPath: ['system'],
    });
  });

  it('matches aliases', () => {
    expect(parseSlashCommand('/quit', commands).commandToExecute).toBe(
      exitCommand,
    );
  });

  it('resolves a sub-command and passes on the rest', () => {
    expect(parseSlashCommand('/session switch  my work', commands)).toEqual({
      commandToExecute: switchCommand,
      commandName: 'session',
      args: 'my work',
      canonicalPath: ['session', 'switch'],
    });
  });

  it('keeps the parent when the first argument is not a sub-command', () => {
    expect(parseSlashCommand('/session bogus x', commands)).toEqual({
      commandToExecute: sessionCommand,
      commandName: 'session',
      args: 'bogus x',
      canonicalPath: ['session'],
    });
  });

  it('reports the typed name of an unknown command', () => {
    expect(parseSlashCommand('/Nope now', commands)).toEqual({
      commandToExecute: undefined,
      commandName: 'nope',
      args: 'now',
      canonicalPath: [],
    });
  });
});
