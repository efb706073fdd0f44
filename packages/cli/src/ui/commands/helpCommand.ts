/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CommandKind, type SlashCommand } from './types.js';
import { MessageType, type HelpEntry } from '../types.js';

const FILE_INPUT_HELP: HelpEntry[] = [
  { usage: '@<file>', description: 'Send the contents of a file' },
  { usage: '@', description: 'Send the contents of the default input file' },
];

function usageOf(command: SlashCommand, prefix: string): string {
  const names = [command.name, ...(command.altNames ?? [])]
    .map((name) => `${prefix}${name}`)
    .join(', ');
  return command.argumentHint ? `${names} ${command.argumentHint}` : names;
}

/**
 * One help line per visible command and per sub-command, followed by the
 * file input forms.
 */
export function buildHelpEntries(
  commands: readonly SlashCommand[],
): HelpEntry[] {
  const entries: HelpEntry[] = [];
  for (const command of commands) {
    if (command.hidden) {
      continue;
    }
    entries.push({
      usage: usageOf(command, '/'),
      description: command.description,
    });
    for (const sub of command.subCommands ?? []) {
      if (!sub.hidden) {
        entries.push({
          usage: usageOf(sub, `/${command.name} `),
          description: sub.description,
        });
      }
    }
  }
  return [...entries, ...FILE_INPUT_HELP];
}

export const helpCommand: SlashCommand = {
  name: 'help',
  altNames: ['?'],
  description: 'Show this help message',
  kind: CommandKind.BUILT_IN,
  action: (context) => {
    context.ui.addItem({
      type: MessageType.HELP,
      commands: buildHelpEntries(context.commands),
    });
  },
};
