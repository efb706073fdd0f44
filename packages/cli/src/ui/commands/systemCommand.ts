/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CommandKind, type SlashCommand } from './types.js';

export const systemCommand: SlashCommand = {
  name: 'system',
  description: 'Show or set the system prompt',
  argumentHint: '[text]',
  kind: CommandKind.BUILT_IN,
  action: (context, args) => {
    const { settings } = context.services;
    const prompt = args.trim();
    if (!prompt) {
      return {
        type: 'message',
        messageType: 'info',
        content: `Current system prompt: ${settings.get().systemPrompt}`,
      };
    }

    const updated = settings.update({ systemPrompt: prompt });
    if (!updated.ok) {
      return {
        type: 'message',
        messageType: 'error',
        content: updated.error.message,
      };
    }
    return {
      type: 'message',
      messageType: 'success',
      content: 'System prompt updated.',
    };
  },
};
