/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ChatSettings } from '../config/chatSettings.js';
import { DebugLogger } from '../debug/index.js';
import type { ChatRequest, ModelService } from '../providers/ModelService.js';
import type { ChatSessionManager } from './ChatSessionManager.js';
import {
  InvalidOperationError,
  NotConfiguredError,
  type ChatError,
} from './errors.js';
import type { ChatPresenter } from './presenter.js';
import {
  StreamingResponseAggregator,
  type AggregateResult,
} from './StreamingResponseAggregator.js';

const logger = new DebugLogger('parley:chat:orchestrator');

export type TurnState = 'idle' | 'awaiting_model';

export type TurnOutcome =
  | { status: 'not_configured'; error: NotConfiguredError }
  | { status: 'success'; reply: string; autoSaved: boolean }
  | { status: 'failed'; error: ChatError; partial: string }
  | { status: 'cancelled'; partial: string };

export interface SendMessageOptions {
  /** Aborting cancels the request in flight. */
  signal?: AbortSignal;
}

/**
 * Runs one user turn: record the message, send the context window to the
 * model, present the reply and record it. One request at a time.
 */
export class ConversationOrchestrator {
  private state: TurnState = 'idle';

  constructor(
    private readonly sessions: ChatSessionManager,
    private readonly modelService: ModelService,
    private readonly settings: ChatSettings,
    private readonly presenter: ChatPresenter,
  ) {}

  get turnState(): TurnState {
    return this.state;
  }

  async sendMessage(
    content: string,
    options: SendMessageOptions = {},
  ): Promise<TurnOutcome> {
    if (this.state !== 'idle') {
      const error = new InvalidOperationError(
        'A request is already in progress.',
      );
      this.presenter.showError(error);
      return { status: 'failed', error, partial: '' };
    }
    if (!this.modelService.isConfigured()) {
      const error = new NotConfiguredError();
      this.presenter.showError(error);
      return { status: 'not_configured', error };
    }

    this.state = 'awaiting_model';
    try {
      return await this.runTurn(content, options.signal);
    } finally {
      this.state = 'idle';
    }
  }

  private async runTurn(
    content: string,
    signal: AbortSignal | undefined,
  ): Promise<TurnOutcome> {
    this.sessions.addMessage('user', content);

    const { systemPrompt, streamingEnabled, temperature } = this.settings.get();
    const request: ChatRequest = {
      messages: this.sessions.getContext(),
      systemPrompt,
      temperature,
      signal,
    };
    logger.debug(
      () =>
        `Sending ${request.messages.length} message(s), streaming=${streamingEnabled}`,
    );

    this.presenter.showThinking();
    const reply = streamingEnabled
      ? await new StreamingResponseAggregator(this.presenter).aggregate(
          this.modelService.stream(request),
          signal,
        )
      : await this.requestReply(request, signal);

    switch (reply.status) {
      case 'cancelled':
        logger.debug('Turn cancelled');
        return { status: 'cancelled', partial: reply.text };
      case 'failed':
        logger.debug(() => `Turn failed: ${reply.error.message}`);
        return { status: 'failed', error: reply.error, partial: reply.text };
      case 'complete':
        break;
      default: {
        const unhandled: never = reply;
        throw new Error(`Unhandled reply: ${JSON.stringify(unhandled)}`);
      }
    }

    if (!streamingEnabled) {
      this.presenter.showReply(reply.text);
    }
    this.sessions.addMessage('assistant', reply.text);
    const autoSaved = await this.autoSave();
    return { status: 'success', reply: reply.text, autoSaved };
  }

  private async requestReply(
    request: ChatRequest,
    signal: AbortSignal | undefined,
  ): Promise<AggregateResult> {
    const result = await this.modelService.chat(request);
    if (signal?.aborted) {
      return { status: 'cancelled', text: '' };
    }
    if (!result.ok) {
      this.presenter.showError(result.error);
      return { status: 'failed', text: '', error: result.error };
    }
    return { status: 'complete', text: result.value };
  }

  /**
   * Saves every `autoSaveInterval` messages of the current session.
   */
  private async autoSave(): Promise<boolean> {
    const length = this.sessions.getCurrentSessionLength();
    if (length % this.settings.get().autoSaveInterval !== 0) {
      return false;
    }
    const saved = await this.sessions.saveHistory();
    logger.debug(() => `Auto-save at ${length} messages: ${saved.ok}`);
    return saved.ok;
  }
}
