/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { InvalidOperationError } from '../chat/errors.js';
import { DebugLogger } from '../debug/index.js';
import { FatalConfigError } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';

const logger = new DebugLogger('parley:config');

const FLAG_VALUES = [
  'true',
  '1',
  'yes',
  'on',
  'false',
  '0',
  'no',
  'off',
] as const;
const TRUE_VALUES = new Set<string>(['true', '1', 'yes', 'on']);

const flag = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(FLAG_VALUES))
    .transform((value) => TRUE_VALUES.has(value)),
]);

const positiveInt = z.coerce.number().int().positive();

export const chatConfigSchema = z.object({
  apiKey: z.string().trim().min(1).optional(),
  baseURL: z.string().trim().url().default('https://api.deepseek.com'),
  model: z.string().trim().min(1).default('deepseek-chat'),
  systemPrompt: z.string().default('You are a helpful assistant'),
  maxContextMessages: positiveInt.default(20),
  maxHistoryMessages: positiveInt.default(1000),
  maxTokens: positiveInt.default(4096),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  streamingEnabled: flag.default(true),
  confirmBeforeSend: flag.default(true),
  historyFile: z.string().trim().min(1).default('.chat_history'),
  defaultInputFile: z.string().trim().min(1).default('input.txt'),
  autoSaveInterval: positiveInt.default(4),
  requestTimeoutMs: positiveInt.optional(),
});

export type ChatConfig = z.output<typeof chatConfigSchema>;

export type ChatSettingKey = keyof ChatConfig;

/** Environment variable behind each option. */
export const CHAT_CONFIG_ENV: Record<ChatSettingKey, string> = {
  apiKey: 'OPENAI_API_KEY',
  baseURL: 'OPENAI_BASE_URL',
  model: 'LLM_MODEL',
  systemPrompt: 'SYSTEM_PROMPT',
  maxContextMessages: 'MAX_CONTEXT_MESSAGES',
  maxHistoryMessages: 'MAX_HISTORY_MESSAGES',
  maxTokens: 'MAX_TOKENS',
  temperature: 'LLM_TEMPERATURE',
  streamingEnabled: 'STREAMING_MODE',
  confirmBeforeSend: 'CONFIRM_BEFORE_SEND',
  historyFile: 'HISTORY_FILE',
  defaultInputFile: 'DEFAULT_INPUT_FILE',
  autoSaveInterval: 'AUTO_SAVE_INTERVAL',
  requestTimeoutMs: 'REQUEST_TIMEOUT_MS',
};

export const CHAT_SETTING_KEYS = Object.keys(CHAT_CONFIG_ENV).filter(
  (key): key is ChatSettingKey => key in CHAT_CONFIG_ENV,
);

/**
 * Resolves a user-typed option name: `maxTokens`, `max_tokens`,
 * `max-tokens` and `MAX_TOKENS` all name the same option.
 */
export function resolveSettingKey(name: string): ChatSettingKey | undefined {
  const normalized = name.replace(/[-_]/g, '').toLowerCase();
  return CHAT_SETTING_KEYS.find(
    (key) =>
      key.toLowerCase() === normalized ||
      CHAT_CONFIG_ENV[key].replace(/_/g, '').toLowerCase() === normalized,
  );
}

export class InvalidSettingError extends InvalidOperationError {}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ');
}

/**
 * Builds the configuration from environment variables, with explicit
 * overrides (command line flags) taking precedence. Empty variables count
 * as unset.
 */
export function loadChatConfig(
  env: NodeJS.ProcessEnv,
  overrides: Partial<Record<ChatSettingKey, unknown>> = {},
): ChatConfig {
  const raw: Partial<Record<ChatSettingKey, unknown>> = {};
  for (const key of CHAT_SETTING_KEYS) {
    const value = env[CHAT_CONFIG_ENV[key]];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  for (const key of CHAT_SETTING_KEYS) {
    if (overrides[key] !== undefined) {
      raw[key] = overrides[key];
    }
  }

  const parsed = chatConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FatalConfigError(
      `Invalid configuration: ${describeIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

type SettingsListener = (
  config: Readonly<ChatConfig>,
  changed: ChatSettingKey[],
) => void;

/**
 * Live configuration shared by the chat components. Values are read at use
 * time, so an update applies to the next request without a restart.
 */
export class ChatSettings {
  private config: ChatConfig;
  private readonly listeners = new Set<SettingsListener>();

  constructor(initial: ChatConfig = chatConfigSchema.parse({})) {
    this.config = { ...initial };
  }

  get(): Readonly<ChatConfig> {
    return this.config;
  }

  /**
   * Validates and applies a partial update. Nothing changes when any value
   * is invalid.
   */
  update(
    changes: Partial<Record<ChatSettingKey, unknown>>,
  ): Result<Readonly<ChatConfig>, InvalidSettingError> {
    const defined: Partial<Record<ChatSettingKey, unknown>> = {};
    for (const key of CHAT_SETTING_KEYS) {
      if (changes[key] !== undefined) {
        defined[key] = changes[key];
      }
    }
    const parsed = chatConfigSchema.partial().safeParse(defined);
    if (!parsed.success) {
      return err(new InvalidSettingError(describeIssues(parsed.error)));
    }

    const next: ChatConfig = { ...this.config, ...parsed.data };
    const changed = CHAT_SETTING_KEYS.filter(
      (key) => next[key] !== this.config[key],
    );
    if (changed.length === 0) {
      return ok(this.config);
    }

    this.config = next;
    logger.debug(() => `Settings changed: ${changed.join(', ')}`);
    this.listeners.forEach((listener) => listener(this.config, changed));
    return ok(this.config);
  }

  subscribe(listener: SettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
