/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  InvalidOperationError,
  ServiceError,
  type ChatError,
} from './errors.js';
import type { FragmentSink } from './presenter.js';

const logger = new DebugLogger('parley:chat:stream');

export type AggregateResult =
  | { status: 'complete'; text: string }
  | { status: 'failed'; text: string; error: ChatError }
  | { status: 'cancelled'; text: string };

export function toStreamError(error: unknown): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }
  return new ServiceError(`Stream error: ${getErrorMessage(error)}`, {
    cause: error,
  });
}

/**
 * Drains one streamed reply: every fragment goes to the sink as soon as it
 * arrives and is added to the running text. Serves a single response.
 */
export class StreamingResponseAggregator {
  private consumed = false;

  constructor(private readonly sink: FragmentSink) {}

  async aggregate(
    fragments: AsyncIterable<string>,
    signal?: AbortSignal,
  ): Promise<AggregateResult> {
    if (this.consumed) {
      return {
        status: 'failed',
        text: '',
        error: new InvalidOperationError(
          'This response has already been aggregated.',
        ),
      };
    }
    this.consumed = true;

    let text = '';
    let count = 0;
    try {
      for await (const fragment of fragments) {
        if (signal?.aborted) {
          break;
        }
        text += fragment;
        count++;
        this.sink.showFragment(fragment);
      }
    } catch (error) {
      this.sink.endStream();
      if (signal?.aborted) {
        logger.debug(() => `Stream cancelled after ${count} fragment(s)`);
        return { status: 'cancelled', text };
      }
      const serviceError = toStreamError(error);
      logger.warn(
        () => `Stream failed after ${count} fragment(s): ${serviceError.message}`,
      );
      this.sink.showError(serviceError);
      return { status: 'failed', text, error: serviceError };
    }

    this.sink.endStream();
    if (signal?.aborted) {
      logger.debug(() => `Stream cancelled after ${count} fragment(s)`);
      return { status: 'cancelled', text };
    }
    logger.debug(() => `Stream complete: ${count} fragment(s)`);
    return { status: 'complete', text };
  }
}
