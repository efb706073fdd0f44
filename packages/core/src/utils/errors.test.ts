/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  FatalConfigError,
  FatalError,
  getErrorMessage,
  isNodeError,
} from './errors.js';
import { expandHomeDir } from './paths.js';

describe('getErrorMessage', () => {
  it('returns the message of an Error', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(getErrorMessage(42)).toBe('42');
  });
});

describe('isNodeError', () => {
  it('recognises errors carrying a code', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });

    expect(isNodeError(error)).toBe(true);
    expect(isNodeError(new Error('plain'))).toBe(false);
  });
});

describe('FatalConfigError', () => {
  it('is a fatal error with exit code 3', () => {
    const error = new FatalConfigError('Invalid configuration');

    expect(error).toBeInstanceOf(FatalError);
    expect(error.exitCode).toBe(3);
    expect(error.name).toBe('FatalConfigError');
  });
});

describe('expandHomeDir', () => {
  it('expands a leading tilde', () => {
    expect(expandHomeDir('~')).toBe(homedir());
    expect(expandHomeDir('~/chats.json')).toBe(join(homedir(), 'chats.json'));
  });

  it('leaves other paths alone', () => {
    expect(expandHomeDir('./chats~.json')).toBe('./chats~.json');
  });
});
