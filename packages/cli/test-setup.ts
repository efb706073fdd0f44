/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Set NODE_ENV to test if not already set
process.env.NODE_ENV = process.env.NODE_ENV || 'test';

// Colour and debug settings from the developer's shell stay out of test runs
for (const name of [
  'NO_COLOR',
  'FORCE_COLOR',
  'DEBUG',
  'PARLEY_DEBUG',
  'DEBUG_ENABLED',
  'DEBUG_OUTPUT',
]) {
  delete process.env[name];
}
