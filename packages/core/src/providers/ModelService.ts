/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ServiceError } from '../chat/errors.js';
import type { ApiMessage } from '../chat/types.js';
import type { Result } from '../utils/result.js';

export interface ChatRequest {
  messages: readonly ApiMessage[];
  /** Sent ahead of `messages` as a system message when non-empty. */
  systemPrompt?: string;
  temperature?: number;
  stream?: boolean;
  signal?: AbortSignal;
}

export interface ServiceDescription {
  baseURL: string;
  model: string;
  /** API key with all but the last four characters hidden. */
  maskedApiKey?: string;
}

/**
 * A remote chat-completion backend.
 */
export interface ModelService {
  isConfigured(): boolean;

  /**
   * Resolves with the whole reply. With `stream: true` the fragments are
   * consumed internally.
   */
  chat(request: ChatRequest): Promise<Result<string, ServiceError>>;

  /**
   * Lazily yields reply fragments in order. Failures are thrown from the
   * iterator as `ServiceError`.
   */
  stream(request: ChatRequest): AsyncIterable<string>;

  /** Sends one minimal request. Never throws. */
  validateConnection(): Promise<boolean>;

  describe(): ServiceDescription;
}

export function maskApiKey(apiKey: string | undefined): string | undefined {
  if (!apiKey) {
    return undefined;
  }
  if (apiKey.length <= 4) {
    return '*'.repeat(apiKey.length);
  }
  return `${'*'.repeat(Math.min(apiKey.length - 4, 8))}${apiKey.slice(-4)}`;
}
