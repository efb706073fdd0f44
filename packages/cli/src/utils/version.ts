/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DebugLogger, getErrorMessage } from '@parley/core';

const logger = new DebugLogger('parley:cli:version');

const packageJsonSchema = z.object({ version: z.string() });

/** Version from the CLI's package.json, or `unknown` when it cannot be read. */
export async function getCliVersion(): Promise<string> {
  try {
    const raw = await readFile(
      new URL('../../package.json', import.meta.url),
      'utf-8',
    );
    const parsed = packageJsonSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : 'unknown';
  } catch (error) {
    logger.debug(() => `Cannot read package.json: ${getErrorMessage(error)}`);
    return 'unknown';
  }
}
