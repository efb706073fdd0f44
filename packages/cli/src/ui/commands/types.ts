/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  ChatSessionManager,
  ChatSettings,
  ModelService,
} from '@parley/core';
import type { HistoryItem } from '../types.js';

export interface PromptOptions {
  /** Hide the typed answer. */
  secret?: boolean;
}

// Grouped dependencies for clarity and easier mocking
export interface CommandContext {
  // Invocation properties for when commands are called.
  invocation?: {
    /** The raw, untrimmed input string from the user. */
    raw: string;
    /** The primary name of the command that was matched. */
    name: string;
    /** The arguments string that follows the command name. */
    args: string;
  };
  services: {
    sessions: ChatSessionManager;
    settings: ChatSettings;
    modelService: ModelService;
  };
  ui: {
    /** Prints an item above the prompt. */
    addItem: (item: HistoryItem) => void;
    /**
     * Asks the user a question on the input line. Resolves to `null` when
     * input ends or the question is interrupted.
     */
    prompt: (
      question: string,
      options?: PromptOptions,
    ) => Promise<string | null>;
  };
  /** Every registered top-level command, for help output. */
  commands: readonly SlashCommand[];
}

/** The return type for a command action that results in the app quitting. */
export interface QuitActionReturn {
  type: 'quit';
}

/**
 * The return type for a command action that results in a simple message
 * being displayed to the user.
 */
export interface MessageActionReturn {
  type: 'message';
  messageType: 'info' | 'success' | 'warning' | 'error';
  content: string;
}

export type SlashCommandActionReturn = MessageActionReturn | QuitActionReturn;

export enum CommandKind {
  BUILT_IN = 'built-in',
}

// The standardized contract for any command in the system.
export interface SlashCommand {
  name: string;
  altNames?: string[];
  description: string;
  /** Shown after the command name in help, e.g. `<name>`. */
  argumentHint?: string;
  hidden?: boolean;

  kind: CommandKind;

  // The action to run. Optional for parent commands that only group sub-commands.
  action?: (
    context: CommandContext,
    args: string,
  ) =>
    | void
    | SlashCommandActionReturn
    | Promise<void | SlashCommandActionReturn>;

  subCommands?: SlashCommand[];
}
