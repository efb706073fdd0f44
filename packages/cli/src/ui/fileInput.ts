/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  DebugLogger,
  getErrorMessage,
  isNodeError,
  type ChatSettings,
} from '@parley/core';
import type { CommandContext } from './commands/types.js';
import { MessageType } from './types.js';

const logger = new DebugLogger('parley:cli:file-input');

export interface FileInputDeps {
  settings: ChatSettings;
  ui: CommandContext['ui'];
  cwd?: string;
}

/**
 * Loads a message body for `@path` input. An empty path means the default
 * input file. With confirmation enabled the content is shown and must be
 * accepted with `y` or `yes`. Returns `null` when nothing should be sent.
 */
export async function loadInputFile(
  pathArg: string,
  { settings, ui, cwd = process.cwd() }: FileInputDeps,
): Promise<string | null> {
  const { defaultInputFile, confirmBeforeSend } = settings.get();
  const filePath = pathArg.trim() || defaultInputFile;

  let content: string;
  try {
    content = (await readFile(resolve(cwd, filePath), 'utf-8')).trim();
  } catch (error) {
    logger.debug(() => `Reading ${filePath} failed: ${String(error)}`);
    ui.addItem({
      type: MessageType.ERROR,
      text:
        isNodeError(error) && error.code === 'ENOENT'
          ? `File not found: ${filePath}`
          : `Error reading file: ${getErrorMessage(error)}`,
    });
    return null;
  }

  if (!content) {
    ui.addItem({
      type: MessageType.WARNING,
      text: `File is empty: ${filePath}`,
    });
    return null;
  }

  if (confirmBeforeSend) {
    ui.addItem({
      type: MessageType.WARNING,
      text: `File content (${filePath}):`,
    });
    ui.addItem({ type: MessageType.PANEL, title: filePath, text: content });
    const answer = (await ui.prompt('Send this? (y/n): '))?.trim() ?? '';
    if (!['y', 'yes'].includes(answer.toLowerCase())) {
      ui.addItem({ type: MessageType.WARNING, text: 'Cancelled' });
      return null;
    }
  }

  ui.addItem({ type: MessageType.SUCCESS, text: `Loaded from ${filePath}` });
  return content;
}
