/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ServiceError } from '../chat/errors.js';
import type {
  ChatRequest,
  ModelService,
  ServiceDescription,
} from '../providers/ModelService.js';
import { err, ok, type Result } from '../utils/result.js';

export interface FakeReply {
  fragments: string[];
  /** Thrown after the fragments, as a failure part way through. */
  error?: Error;
  /** After the fragments, wait until the request is aborted. */
  hangUntilAborted?: boolean;
}

export function textReply(text: string): FakeReply {
  return { fragments: [text] };
}

function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  if (!signal) {
    return Promise.reject(new Error('A hanging reply needs an abort signal'));
  }
  return new Promise<never>((_resolve, reject) => {
    const abort = () => reject(new Error('Request was aborted.'));
    if (signal.aborted) {
      abort();
      return;
    }
    signal.addEventListener('abort', abort, { once: true });
  });
}

function asServiceError(error: Error): ServiceError {
  return error instanceof ServiceError
    ? error
    : new ServiceError(error.message, { cause: error });
}

/**
 * In-process model service that plays back queued replies and records the
 * requests it receives.
 */
export class FakeModelService implements ModelService {
  configured = true;
  connectionOk = true;
  readonly requests: ChatRequest[] = [];
  private readonly replies: FakeReply[] = [];

  enqueue(...replies: FakeReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  isConfigured(): boolean {
    return this.configured;
  }

  describe(): ServiceDescription {
    return { baseURL: 'http://localhost:0/v1', model: 'fake-model' };
  }

  async chat(request: ChatRequest): Promise<Result<string, ServiceError>> {
    this.requests.push(request);
    const reply = this.next();
    if (reply.hangUntilAborted) {
      try {
        await waitForAbort(request.signal);
      } catch (error) {
        return err(new ServiceError(String(error), { cause: error }));
      }
    }
    if (reply.error) {
      return err(asServiceError(reply.error));
    }
    return ok(reply.fragments.join(''));
  }

  async *stream(request: ChatRequest): AsyncGenerator<string> {
    this.requests.push(request);
    const reply = this.next();
    for (const fragment of reply.fragments) {
      yield fragment;
    }
    if (reply.hangUntilAborted) {
      await waitForAbort(request.signal);
    }
    if (reply.error) {
      throw asServiceError(reply.error);
    }
  }

  async validateConnection(): Promise<boolean> {
    return this.connectionOk;
  }

  private next(): FakeReply {
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('FakeModelService has no queued reply');
    }
    return reply;
  }
}
