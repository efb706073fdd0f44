/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it, vi } from 'vitest';
import {
  ChatSettings,
  loadChatConfig,
  resolveSettingKey,
} from './chatSettings.js';
import { FatalConfigError } from '../utils/errors.js';

describe('loadChatConfig', () => {
  it('falls back to the defaults for an empty environment', () => {
    expect(loadChatConfig({})).toEqual({
      baseURL: 'https://api.deepseek.com',
      model: 'deepseek-chat',
      systemPrompt: 'You are a helpful assistant',
      maxContextMessages: 20,
      maxHistoryMessages: 1000,
      maxTokens: 4096,
      temperature: 0.7,
      streamingEnabled: true,
      confirmBeforeSend: true,
      historyFile: '.chat_history',
      defaultInputFile: 'input.txt',
      autoSaveInterval: 4,
    });
  });

  it('reads and coerces environment variables', () => {
    const config = loadChatConfig({
      OPENAI_API_KEY: 'test-key',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      LLM_MODEL: 'local-model',
      MAX_CONTEXT_MESSAGES: '6',
      STREAMING_MODE: 'False',
      CONFIRM_BEFORE_SEND: '0',
      REQUEST_TIMEOUT_MS: '30000',
    });

    expect(config).toMatchObject({
      apiKey: 'test-key',
      baseURL: 'http://localhost:8080/v1',
      model: 'local-model',
      maxContextMessages: 6,
      streamingEnabled: false,
      confirmBeforeSend: false,
      requestTimeoutMs: 30000,
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadChatConfig({ OPENAI_API_KEY: '' }).apiKey).toBeUndefined();
  });

  it('lets overrides win over the environment', () => {
    const config = loadChatConfig(
      { LLM_MODEL: 'from-env' },
      { model: 'from-flag', streamingEnabled: false },
    );

    expect(config.model).toBe('from-flag');
    expect(config.streamingEnabled).toBe(false);
  });

  it('rejects invalid values with a fatal configuration error', () => {
    expect(() => loadChatConfig({ MAX_TOKENS: 'lots' })).toThrow(
      FatalConfigError,
    );
    expect(() => loadChatConfig({ MAX_HISTORY_MESSAGES: '-1' })).toThrow(
      /maxHistoryMessages/,
    );
  });
});

describe('resolveSettingKey', () => {
  it.each([
    ['maxTokens', 'maxTokens'],
    ['max_tokens', 'maxTokens'],
    ['max-tokens', 'maxTokens'],
    ['MAX_TOKENS', 'maxTokens'],
    ['base_url', 'baseURL'],
    ['OPENAI_API_KEY', 'apiKey'],
    ['api_key', 'apiKey'],
    ['streaming_enabled', 'streamingEnabled'],
  ])('maps %s to %s', (input, expected) => {
    expect(resolveSettingKey(input)).toBe(expected);
  });

  it('returns undefined for unknown names', () => {
    expect(resolveSettingKey('colour')).toBeUndefined();
  });
});

describe('ChatSettings', () => {
  it('applies valid updates and notifies listeners with the changed keys', () => {
    const settings = new ChatSettings(loadChatConfig({}));
    const listener = vi.fn();
    settings.subscribe(listener);

    const result = settings.update({ model: 'other-model', maxTokens: '512' });

    expect(result.ok).toBe(true);
    expect(settings.get().model).toBe('other-model');
    expect(settings.get().maxTokens).toBe(512);
    expect(listener).toHaveBeenCalledWith(settings.get(), [
      'model',
      'maxTokens',
    ]);
  });

  it('leaves every value untouched when one is invalid', () => {
    const settings = new ChatSettings(loadChatConfig({}));

    const result = settings.update({ model: 'other-model', maxTokens: 0 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidOperation');
      expect(result.error.message).toContain('maxTokens');
    }
    expect(settings.get().model).toBe('deepseek-chat');
  });

  it('does not notify when nothing changes', () => {
    const settings = new ChatSettings(loadChatConfig({}));
    const listener = vi.fn();
    const unsubscribe = settings.subscribe(listener);

    settings.update({ model: 'deepseek-chat' });
    unsubscribe();
    settings.update({ model: 'after-unsubscribe' });

    expect(listener).not.toHaveBeenCalled();
  });
});
