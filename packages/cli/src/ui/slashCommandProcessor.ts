/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ChatError, DebugLogger, getErrorMessage } from '@parley/core';
import { parseSlashCommand } from '../utils/commands.js';
import type {
  CommandContext,
  MessageActionReturn,
  SlashCommand,
} from './commands/types.js';
import { MessageType, type HistoryItem } from './types.js';

const logger = new DebugLogger('parley:cli:commands');

/** A `/command` or sub-command that no loaded command answers to. */
export class UnknownCommandError extends ChatError {
  readonly kind = 'UnknownCommand';
}

export type SlashCommandOutcome =
  | { type: 'handled' }
  | { type: 'quit' }
  | { type: 'unknown'; error: UnknownCommandError };

function toHistoryItem(result: MessageActionReturn): HistoryItem {
  switch (result.messageType) {
    case 'info':
      return { type: MessageType.INFO, text: result.content };
    case 'success':
      return { type: MessageType.SUCCESS, text: result.content };
    case 'warning':
      return { type: MessageType.WARNING, text: result.content };
    case 'error':
      return { type: MessageType.ERROR, text: result.content };
    default: {
      const unhandled: never = result.messageType;
      throw new Error(`Unhandled message type: ${String(unhandled)}`);
    }
  }
}

/**
 * Resolves a `/command` line against the loaded commands and runs it.
 */
export class SlashCommandProcessor {
  constructor(
    private readonly commands: readonly SlashCommand[],
    private readonly context: Omit<CommandContext, 'invocation' | 'commands'>,
  ) {}

  get slashCommands(): readonly SlashCommand[] {
    return this.commands;
  }

  async handleSlashCommand(rawQuery: string): Promise<SlashCommandOutcome> {
    const { commandToExecute, commandName, args, canonicalPath } =
      parseSlashCommand(rawQuery, this.commands);

    if (!commandToExecute) {
      return this.unknown(`Unknown command: /${commandName}`);
    }
    if (commandToExecute.subCommands && canonicalPath.length === 1 && args) {
      const [subName] = args.split(/\s+/, 1);
      return this.unknown(
        `Unknown ${commandToExecute.name} subcommand: ${subName}`,
      );
    }
    if (!commandToExecute.action) {
      return this.unknown(`Unknown command: /${canonicalPath.join(' ')}`);
    }

    const context: CommandContext = {
      ...this.context,
      commands: this.commands,
      invocation: { raw: rawQuery, name: commandToExecute.name, args },
    };
    logger.debug(() => `Running /${canonicalPath.join(' ')}`);

    try {
      const result = await commandToExecute.action(context, args);
      if (!result) {
        return { type: 'handled' };
      }
      switch (result.type) {
        case 'quit':
          return { type: 'quit' };
        case 'message':
          this.context.ui.addItem(toHistoryItem(result));
          return { type: 'handled' };
        default: {
          const unhandled: never = result;
          throw new Error(
            `Unhandled slash command result: ${JSON.stringify(unhandled)}`,
          );
        }
      }
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error(() => `/${canonicalPath.join(' ')} failed: ${message}`);
      this.context.ui.addItem({
        type: MessageType.ERROR,
        text: `Command failed: ${message}`,
      });
      return { type: 'handled' };
    }
  }

  private unknown(message: string): SlashCommandOutcome {
    return { type: 'unknown', error: new UnknownCommandError(message) };
  }
}
