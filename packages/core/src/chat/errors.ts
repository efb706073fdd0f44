/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type ChatErrorKind =
  | 'NotConfigured'
  | 'ServiceError'
  | 'NotFound'
  | 'Conflict'
  | 'InvalidOperation'
  | 'UnknownCommand'
  | 'PersistenceError';

/**
 * Base for every recoverable error the chat core reports. None of them end
 * the process; callers receive them as values and hand them to a presenter.
 */
export abstract class ChatError extends Error {
  abstract readonly kind: ChatErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotConfiguredError extends ChatError {
  readonly kind = 'NotConfigured';

  constructor(
    message = 'Model service is not configured. Use /config to set an API key.',
  ) {
    super(message);
  }
}

/**
 * A failed remote call: transport, authentication, rate limiting, a
 * malformed response, or a timeout.
 */
export class ServiceError extends ChatError {
  readonly kind = 'ServiceError';
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

export class SessionNotFoundError extends ChatError {
  readonly kind = 'NotFound';

  constructor(readonly sessionName: string) {
    super(`Session '${sessionName}' not found.`);
  }
}

export class SessionConflictError extends ChatError {
  readonly kind = 'Conflict';

  constructor(readonly sessionName: string) {
    super(`Session '${sessionName}' already exists.`);
  }
}

/** A request that is not allowed in the current state. */
export class InvalidOperationError extends ChatError {
  readonly kind = 'InvalidOperation';
}

export class InvalidSessionOperationError extends InvalidOperationError {}

export type SessionError =
  | SessionNotFoundError
  | SessionConflictError
  | InvalidSessionOperationError;

export class PersistenceError extends ChatError {
  readonly kind = 'PersistenceError';

  constructor(
    readonly operation: 'load' | 'save',
    readonly filePath: string,
    options?: { cause?: unknown; detail?: string },
  ) {
    super(
      `Error ${operation === 'load' ? 'loading' : 'saving'} history (${filePath}): ${options?.detail ?? 'unknown error'}`,
      { cause: options?.cause },
    );
  }
}
