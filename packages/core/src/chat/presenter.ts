/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ChatError } from './errors.js';

/**
 * Receives a streamed reply as it is produced.
 */
export interface FragmentSink {
  showFragment(fragment: string): void;
  /** The stream ended, normally or not. */
  endStream(): void;
  showError(error: ChatError): void;
}

/**
 * Everything the conversation flow shows the user. Terminal rendering lives
 * in the CLI; tests record the calls.
 */
export interface ChatPresenter extends FragmentSink {
  /** A request went out and no reply has arrived yet. */
  showThinking(): void;
  /** A complete, non-streamed reply. */
  showReply(text: string): void;
}
