/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SlashCommand } from '../ui/commands/types.js';

export interface ParsedSlashCommand {
  commandToExecute: SlashCommand | undefined;
  /** The command name as typed, lower-cased and without the slash. */
  commandName: string;
  args: string;
  /** Names of the resolved command and sub-command. */
  canonicalPath: string[];
}

function findByName(
  commands: readonly SlashCommand[],
  name: string,
): SlashCommand | undefined {
  return commands.find(
    (cmd) =>
      cmd.name.toLowerCase() === name ||
      cmd.altNames?.some((alt) => alt.toLowerCase() === name),
  );
}

function splitFirstWord(text: string): [string, string] {
  const spaceIndex = text.search(/\s/);
  return spaceIndex === -1
    ? [text, '']
    : [text.substring(0, spaceIndex), text.substring(spaceIndex + 1).trim()];
}

/**
 * Parses a slash command string and finds the matching command, descending
 * one level into sub-commands when the first argument names one.
 */
export function parseSlashCommand(
  rawQuery: string,
  commands: readonly SlashCommand[],
): ParsedSlashCommand {
  const trimmed = rawQuery.trim();
  if (!trimmed.startsWith('/')) {
    return {
      commandToExecute: undefined,
      commandName: '',
      args: '',
      canonicalPath: [],
    };
  }

  const [word, args] = splitFirstWord(trimmed.substring(1));
  const commandName = word.toLowerCase();
  const commandToExecute = findByName(commands, commandName);
  if (!commandToExecute) {
    return {
      commandToExecute: undefined,
      commandName,
      args,
      canonicalPath: [],
    };
  }

  const canonicalPath: string[] = [commandToExecute.name];
  if (commandToExecute.subCommands && args) {
    const [subName, subArgs] = splitFirstWord(args);
    const subCommand = findByName(
      commandToExecute.subCommands,
      subName.toLowerCase(),
    );
    if (subCommand) {
      canonicalPath.push(subCommand.name);
      return {
        commandToExecute: subCommand,
        commandName,
        args: subArgs,
        canonicalPath,
      };
    }
  }

  return { commandToExecute, commandName, args, canonicalPath };
}
