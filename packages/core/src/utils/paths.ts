/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';
import * as path from 'node:path';

export const PARLEY_DIR = '.parley';

/**
 * Replaces a leading `~` with the user's home directory.
 */
export function expandHomeDir(target: string): string {
  if (target === '~') {
    return os.homedir();
  }
  if (target.startsWith('~/') || target.startsWith('~\\')) {
    return path.join(os.homedir(), target.slice(2));
  }
  return target;
}

/** Absolute location of the history document named in the settings. */
export function resolveHistoryPath(historyFile: string): string {
  return path.resolve(expandHomeDir(historyFile));
}
