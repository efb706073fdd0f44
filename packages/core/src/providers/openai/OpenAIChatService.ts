/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import OpenAI from 'openai';
import { ServiceError } from '../../chat/errors.js';
import type { ApiMessage } from '../../chat/types.js';
import type {
  ChatSettingKey,
  ChatSettings,
} from '../../config/chatSettings.js';
import { DebugLogger } from '../../debug/index.js';
import { getErrorMessage } from '../../utils/errors.js';
import { err, ok, type Result } from '../../utils/result.js';
import {
  maskApiKey,
  type ChatRequest,
  type ModelService,
  type ServiceDescription,
} from '../ModelService.js';

type RequestMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

const logger = new DebugLogger('parley:provider:openai');

/** Settings baked into the SDK client; a change means a new client. */
const CLIENT_SETTINGS: ReadonlySet<ChatSettingKey> = new Set([
  'apiKey',
  'baseURL',
  'requestTimeoutMs',
]);

function toRequestMessage({ role, content }: ApiMessage): RequestMessage {
  switch (role) {
    case 'system':
      return { role: 'system', content };
    case 'assistant':
      return { role: 'assistant', content };
    case 'user':
      return { role: 'user', content };
    default: {
      const unknownRole: never = role;
      throw new TypeError(`Unsupported message role: ${String(unknownRole)}`);
    }
  }
}

export function toRequestMessages(request: ChatRequest): RequestMessage[] {
  const messages: RequestMessage[] = [];
  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }
  for (const message of request.messages) {
    messages.push(toRequestMessage(message));
  }
  return messages;
}

/**
 * Maps an SDK or transport failure onto the chat error taxonomy.
 */
export function toServiceError(error: unknown, prefix?: string): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }
  if (error instanceof OpenAI.APIError) {
    return new ServiceError(`${prefix ?? 'API Error'}: ${error.message}`, {
      cause: error,
      status: error.status,
    });
  }
  return new ServiceError(
    `${prefix ?? 'Unexpected error'}: ${getErrorMessage(error)}`,
    { cause: error },
  );
}

/**
 * Chat completions against any OpenAI-compatible endpoint. Connection
 * settings are read from the live {@link ChatSettings}; the SDK client is
 * built lazily and rebuilt after the key, base URL or timeout change.
 */
export class OpenAIChatService implements ModelService {
  private client?: OpenAI;
  private readonly unsubscribe: () => void;

  constructor(private readonly settings: ChatSettings) {
    this.unsubscribe = settings.subscribe((_config, changed) => {
      if (this.client && changed.some((key) => CLIENT_SETTINGS.has(key))) {
        logger.debug(() => `Client settings changed: ${changed.join(', ')}`);
        this.client = undefined;
      }
    });
  }

  isConfigured(): boolean {
    return Boolean(this.settings.get().apiKey);
  }

  describe(): ServiceDescription {
    const { apiKey, baseURL, model } = this.settings.get();
    return { baseURL, model, maskedApiKey: maskApiKey(apiKey) };
  }

  async chat(request: ChatRequest): Promise<Result<string, ServiceError>> {
    if (request.stream) {
      let text = '';
      try {
        for await (const fragment of this.stream(request)) {
          text += fragment;
        }
      } catch (error) {
        return err(toServiceError(error));
      }
      return ok(text);
    }

    try {
      const completion = await this.getClient().chat.completions.create(
        { ...this.buildParams(request), stream: false },
        { signal: request.signal },
      );
      const choice = completion.choices[0];
      if (!choice) {
        return err(
          new ServiceError('Unexpected error: response has no choices'),
        );
      }
      logger.debug(
        () =>
          `Completion finished (${choice.finish_reason}), ${completion.usage?.total_tokens ?? 0} tokens`,
      );
      return ok(choice.message.content ?? '');
    } catch (error) {
      logger.debug(() => `Completion failed: ${getErrorMessage(error)}`);
      return err(toServiceError(error));
    }
  }

  async *stream(request: ChatRequest): AsyncGenerator<string> {
    let chunks: AsyncIterable<OpenAI.Chat.Completions.ChatCompletionChunk>;
    try {
      chunks = await this.getClient().chat.completions.create(
        { ...this.buildParams(request), stream: true },
        { signal: request.signal },
      );
    } catch (error) {
      throw toServiceError(error);
    }

    try {
      for await (const chunk of chunks) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield content;
        }
      }
    } catch (error) {
      throw toServiceError(error, 'Stream error');
    }
  }

  async validateConnection(): Promise<boolean> {
    if (!this.isConfigured()) {
      logger.warn('Connection test skipped: no API key');
      return false;
    }
    try {
      await this.getClient().chat.completions.create({
        model: this.settings.get().model,
        messages: [{ role: 'user', content: 'Hello' }],
        max_tokens: 10,
      });
      return true;
    } catch (error) {
      logger.warn(() => `Connection test failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  dispose(): void {
    this.unsubscribe();
    this.client = undefined;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const { apiKey, baseURL, requestTimeoutMs } = this.settings.get();
      logger.debug(() => `Creating client for ${baseURL}`);
      this.client = new OpenAI({
        apiKey: apiKey ?? '',
        baseURL,
        timeout: requestTimeoutMs,
      });
    }
    return this.client;
  }

  private buildParams(request: ChatRequest) {
    const config = this.settings.get();
    return {
      model: config.model,
      messages: toRequestMessages(request),
      temperature: request.temperature ?? config.temperature,
      max_tokens: config.maxTokens,
    };
  }
}
