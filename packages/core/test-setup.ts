/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Debug settings from the developer's shell stay out of test runs
for (const name of ['DEBUG', 'PARLEY_DEBUG', 'DEBUG_ENABLED', 'DEBUG_OUTPUT']) {
  delete process.env[name];
}
