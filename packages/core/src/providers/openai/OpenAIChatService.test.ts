/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import { ChatSettings, loadChatConfig } from '../../config/chatSettings.js';
import { OpenAIChatService, toRequestMessages } from './OpenAIChatService.js';

const { mockCreate, MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    constructor(
      readonly status: number | undefined,
      message: string,
    ) {
      super(message);
    }
  }
  return { mockCreate: vi.fn(), MockAPIError };
});

vi.mock('openai', () => {
  const MockOpenAI = vi.fn().mockImplementation(function () {
    return { chat: { completions: { create: mockCreate } } };
  });
  return { default: Object.assign(MockOpenAI, { APIError: MockAPIError }) };
});

function chunk(content: string | null) {
  return { choices: [{ index: 0, delta: { content } }] };
}

async function* chunks(...contents: Array<string | null>) {
  for (const content of contents) {
    yield chunk(content);
  }
}

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const fragments: string[] = [];
  for await (const fragment of iterable) {
    fragments.push(fragment);
  }
  return fragments;
}

describe('OpenAIChatService', () => {
  let settings: ChatSettings;
  let service: OpenAIChatService;

  beforeEach(() => {
    vi.clearAllMocks();
    settings = new ChatSettings(
      loadChatConfig({
        OPENAI_API_KEY: 'test-secret',
        OPENAI_BASE_URL: 'http://localhost:8080/v1',
        LLM_MODEL: 'test-model',
        MAX_TOKENS: '256',
      }),
    );
    service = new OpenAIChatService(settings);
  });

  describe('toRequestMessages', () => {
    it('prepends the system prompt', () => {
      expect(
        toRequestMessages({
          messages: [{ role: 'user', content: 'hi' }],
          systemPrompt: 'Be brief',
        }),
      ).toEqual([
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'hi' },
      ]);
    });

    it('sends no system message for an empty prompt', () => {
      expect(
        toRequestMessages({
          messages: [{ role: 'assistant', content: 'ok' }],
          systemPrompt: '',
        }),
      ).toEqual([{ role: 'assistant', content: 'ok' }]);
    });
  });

  describe('chat()', () => {
    it('returns the reply of a non-streamed completion', async () => {
      mockCreate.mockResolvedValueOnce({
        choices: [
          { index: 0, message: { content: 'Hi there' }, finish_reason: 'stop' },
        ],
      });

      const result = await service.chat({
        messages: [{ role: 'user', content: 'hi' }],
        systemPrompt: 'Be kind',
      });

      expect(result).toEqual({ ok: true, value: 'Hi there' });
      expect(mockCreate).toHaveBeenCalledWith(
        {
          model: 'test-model',
          messages: [
            { role: 'system', content: 'Be kind' },
            { role: 'user', content: 'hi' },
          ],
          temperature: 0.7,
          max_tokens: 256,
          stream: false,
        },
        { signal: undefined },
      );
    });

    it('builds the client from the connection settings', async () => {
      mockCreate.mockResolvedValueOnce({
        choices: [{ message: { content: '' }, finish_reason: 'stop' }],
      });

      await service.chat({ messages: [] });

      expect(OpenAI).toHaveBeenCalledWith(
        expect.objectContaining({
          apiKey: 'test-secret',
          baseURL: 'http://localhost:8080/v1',
        }),
      );
    });

    it('aggregates a streamed reply', async () => {
      mockCreate.mockResolvedValueOnce(chunks('Hel', null, 'lo'));

      const result = await service.chat({ messages: [], stream: true });

      expect(result).toEqual({ ok: true, value: 'Hello' });
    });

    it('wraps API failures with their status', async () => {
      mockCreate.mockRejectedValueOnce(new MockAPIError(401, 'Unauthorized'));

      const result = await service.chat({ messages: [] });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('ServiceError');
        expect(result.error.message).toBe('API Error: Unauthorized');
        expect(result.error.status).toBe(401);
      }
    });

    it('wraps other failures as unexpected', async () => {
      mockCreate.mockRejectedValueOnce(new Error('socket hang up'));

      const result = await service.chat({ messages: [] });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Unexpected error: socket hang up');
        expect(result.error.status).toBeUndefined();
      }
    });

    it('treats a reply without choices as a failure', async () => {
      mockCreate.mockResolvedValueOnce({ choices: [] });

      const result = await service.chat({ messages: [] });

      expect(result.ok).toBe(false);
    });
  });

  describe('stream()', () => {
    it('yields non-empty fragments in order', async () => {
      mockCreate.mockResolvedValueOnce(chunks('Hel', '', 'lo, ', null, 'world'));

      const fragments = await collect(
        service.stream({ messages: [{ role: 'user', content: 'hi' }] }),
      );

      expect(fragments).toEqual(['Hel', 'lo, ', 'world']);
      expect(mockCreate.mock.calls[0][0].stream).toBe(true);
    });

    it('does not call the endpoint until iterated', () => {
      service.stream({ messages: [] });

      expect(mockCreate).not.toHaveBeenCalled();
    });

    it('throws a ServiceError when the stream breaks', async () => {
      mockCreate.mockResolvedValueOnce(
        (async function* () {
          yield chunk('Par');
          throw new Error('connection reset');
        })(),
      );
      const fragments: string[] = [];

      const consume = async () => {
        for await (const fragment of service.stream({ messages: [] })) {
          fragments.push(fragment);
        }
      };

      await expect(consume()).rejects.toMatchObject({
        kind: 'ServiceError',
        message: 'Stream error: connection reset',
      });
      expect(fragments).toEqual(['Par']);
    });
  });

  describe('settings changes', () => {
    it('rebuilds the client after the API key changes', async () => {
      mockCreate.mockResolvedValue({
        choices: [{ message: { content: 'ok' }, finish_reason: 'stop' }],
      });

      await service.chat({ messages: [] });
      await service.chat({ messages: [] });
      settings.update({ apiKey: 'test-secret-2' });
      await service.chat({ messages: [] });

      expect(OpenAI).toHaveBeenCalledTimes(2);
      expect(OpenAI).toHaveBeenLastCalledWith(
        expect.objectContaining({ apiKey: 'test-secret-2' }),
      );
    });

    it('reads the model at request time', async () => {
      mockCreate.mockResolvedValue({
        choices: [{ message: { content: 'ok' }, finish_reason: 'stop' }],
      });

      settings.update({ model: 'other-model' });
      await service.chat({ messages: [] });

      expect(mockCreate.mock.calls[0][0].model).toBe('other-model');
      expect(OpenAI).toHaveBeenCalledTimes(1);
    });
  });

  describe('validateConnection()', () => {
    it('sends one small request', async () => {
      mockCreate.mockResolvedValueOnce({ choices: [] });

      await expect(service.validateConnection()).resolves.toBe(true);
      expect(mockCreate).toHaveBeenCalledWith({
        model: 'test-model',
        messages: [{ role: 'user', content: 'Hello' }],
        max_tokens: 10,
      });
    });

    it('reports failure without throwing', async () => {
      mockCreate.mockRejectedValueOnce(new MockAPIError(500, 'boom'));

      await expect(service.validateConnection()).resolves.toBe(false);
    });

    it('fails without an API key', async () => {
      const unconfigured = new OpenAIChatService(
        new ChatSettings(loadChatConfig({})),
      );

      await expect(unconfigured.validateConnection()).resolves.toBe(false);
      expect(mockCreate).not.toHaveBeenCalled();
    });
  });

  it('describes the endpoint with a masked key', () => {
    expect(service.describe()).toEqual({
      baseURL: 'http://localhost:8080/v1',
      model: 'test-model',
      maskedApiKey: '*******cret',
    });
    expect(service.isConfigured()).toBe(true);
  });
});
