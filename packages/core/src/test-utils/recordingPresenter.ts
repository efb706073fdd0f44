/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ChatError } from '../chat/errors.js';
import type { ChatPresenter } from '../chat/presenter.js';

export type PresenterEvent =
  | { type: 'thinking' }
  | { type: 'fragment'; text: string }
  | { type: 'end' }
  | { type: 'error'; error: ChatError }
  | { type: 'reply'; text: string };

/**
 * Presenter that records every call in order.
 */
export class RecordingPresenter implements ChatPresenter {
  readonly events: PresenterEvent[] = [];

  showThinking(): void {
    this.events.push({ type: 'thinking' });
  }

  showFragment(fragment: string): void {
    this.events.push({ type: 'fragment', text: fragment });
  }

  endStream(): void {
    this.events.push({ type: 'end' });
  }

  showError(error: ChatError): void {
    this.events.push({ type: 'error', error });
  }

  showReply(text: string): void {
    this.events.push({ type: 'reply', text });
  }

  get fragments(): string[] {
    return this.events.flatMap((event) =>
      event.type === 'fragment' ? [event.text] : [],
    );
  }

  get errors(): ChatError[] {
    return this.events.flatMap((event) =>
      event.type === 'error' ? [event.error] : [],
    );
  }
}
