/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  CommandKind,
  type CommandContext,
  type MessageActionReturn,
  type SlashCommand,
} from './types.js';
import { MessageType } from '../types.js';

const error = (content: string): MessageActionReturn => ({
  type: 'message',
  messageType: 'error',
  content,
});

const success = (content: string): MessageActionReturn => ({
  type: 'message',
  messageType: 'success',
  content,
});

function showSessions(context: CommandContext): void {
  context.ui.addItem({
    type: MessageType.SESSION_LIST,
    sessions: context.services.sessions.listSessions(),
  });
}

const listCommand: SlashCommand = {
  name: 'list',
  description: 'List all sessions',
  kind: CommandKind.BUILT_IN,
  action: (context) => showSessions(context),
};

const switchCommand: SlashCommand = {
  name: 'switch',
  description: 'Switch to a session, creating it if needed',
  argumentHint: '<name>',
  kind: CommandKind.BUILT_IN,
  action: (context, args) => {
    const name = args.trim();
    if (!name) {
      return error('Usage: /session switch <name>');
    }
    const switched = context.services.sessions.switchSession(name);
    return switched.ok
      ? success(`Switched to session: ${switched.value}`)
      : error(switched.error.message);
  },
};

const newCommand: SlashCommand = {
  name: 'new',
  description: 'Start a new session',
  argumentHint: '[name]',
  kind: CommandKind.BUILT_IN,
  action: (context, args) => {
    const created = context.services.sessions.newSession(
      args.trim() || undefined,
    );
    return created.ok
      ? success(`Switched to session: ${created.value}`)
      : error(created.error.message);
  },
};

const deleteCommand: SlashCommand = {
  name: 'delete',
  description: 'Delete a session other than the current one',
  argumentHint: '<name>',
  kind: CommandKind.BUILT_IN,
  action: async (context, args) => {
    const name = args.trim();
    if (!name) {
      return error('Usage: /session delete <name>');
    }
    const deleted = await context.services.sessions.deleteSession(name);
    return deleted.ok
      ? success(`Session '${name}' deleted.`)
      : error(deleted.error.message);
  },
};

const renameCommand: SlashCommand = {
  name: 'rename',
  description: 'Rename a session',
  argumentHint: '<old> <new>',
  kind: CommandKind.BUILT_IN,
  action: async (context, args) => {
    const names = args.split(/\s+/).filter(Boolean);
    if (names.length !== 2) {
      return error('Usage: /session rename <old> <new>');
    }
    const [oldName, newName] = names;
    const renamed = await context.services.sessions.renameSession(
      oldName,
      newName,
    );
    return renamed.ok
      ? success(`Session renamed from '${oldName}' to '${newName}'.`)
      : error(renamed.error.message);
  },
};

export const sessionCommand: SlashCommand = {
  name: 'session',
  description: 'Manage sessions (lists them without a sub-command)',
  kind: CommandKind.BUILT_IN,
  subCommands: [
    listCommand,
    switchCommand,
    newCommand,
    deleteCommand,
    renameCommand,
  ],
  // Runs only without arguments; unknown sub-commands are rejected earlier.
  action: (context) => showSessions(context),
};
