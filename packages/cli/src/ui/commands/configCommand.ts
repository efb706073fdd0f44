/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  CHAT_SETTING_KEYS,
  maskApiKey,
  resolveSettingKey,
  type ChatConfig,
  type ChatSettingKey,
} from '@parley/core';
import {
  CommandKind,
  type CommandContext,
  type MessageActionReturn,
  type SlashCommand,
} from './types.js';
import { MessageType, type ConfigEntry } from '../types.js';

const message = (
  messageType: MessageActionReturn['messageType'],
  content: string,
): MessageActionReturn => ({ type: 'message', messageType, content });

function displayValue(
  config: Readonly<ChatConfig>,
  key: ChatSettingKey,
): string {
  if (key === 'apiKey') {
    return maskApiKey(config.apiKey) ?? 'Not set';
  }
  const value = config[key];
  return value === undefined ? 'Not set' : String(value);
}

export function describeConfig(config: Readonly<ChatConfig>): ConfigEntry[] {
  return CHAT_SETTING_KEYS.map((key) => ({
    name: key,
    value: displayValue(config, key),
  }));
}

/**
 * Asks for the connection settings one by one; an empty answer keeps the
 * current value.
 */
async function promptForConnection(
  context: CommandContext,
): Promise<MessageActionReturn> {
  const { ui, services } = context;
  ui.addItem({
    type: MessageType.WARNING,
    text: 'Enter new values (leave empty to keep current):',
  });

  const apiKey = await ui.prompt('API Key: ', { secret: true });
  if (apiKey === null) {
    return message('warning', 'Cancelled');
  }
  const baseURL = await ui.prompt('Base URL: ');
  if (baseURL === null) {
    return message('warning', 'Cancelled');
  }
  const model = await ui.prompt('Model: ');
  if (model === null) {
    return message('warning', 'Cancelled');
  }

  const updated = services.settings.update({
    apiKey: apiKey.trim() || undefined,
    baseURL: baseURL.trim() || undefined,
    model: model.trim() || undefined,
  });
  return updated.ok
    ? message('success', 'Configuration updated.')
    : message('error', updated.error.message);
}

function setOption(
  context: CommandContext,
  args: string,
): MessageActionReturn {
  const [option = ''] = args.split(/\s+/, 1);
  const value = args.slice(option.length).trim();
  const key = resolveSettingKey(option);
  if (!key) {
    return message('error', `Unknown option: ${option}`);
  }
  if (!value) {
    return message('error', 'Usage: /config <option> <value>');
  }

  const changes: Partial<Record<ChatSettingKey, unknown>> = {};
  changes[key] = value;
  const updated = context.services.settings.update(changes);
  if (!updated.ok) {
    return message('error', updated.error.message);
  }
  return message(
    'success',
    `${key} set to ${displayValue(updated.value, key)}`,
  );
}

export const configCommand: SlashCommand = {
  name: 'config',
  description: 'Show or change the configuration',
  argumentHint: '[option value]',
  kind: CommandKind.BUILT_IN,
  action: async (context, args) => {
    const trimmed = args.trim();
    if (trimmed) {
      return setOption(context, trimmed);
    }

    context.ui.addItem({
      type: MessageType.CONFIG,
      entries: describeConfig(context.services.settings.get()),
    });
    return promptForConnection(context);
  },
};
