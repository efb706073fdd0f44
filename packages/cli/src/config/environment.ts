/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import { homedir } from 'node:os';
import * as path from 'node:path';
import * as dotenv from 'dotenv';
import { DebugLogger, PARLEY_DIR, getErrorMessage } from '@parley/core';

const logger = new DebugLogger('parley:cli:env');

/**
 * Finds the `.env` file nearest to `startDir`, preferring `.parley/.env`
 * over `.env` in each directory. Falls back to the home directory.
 */
export function findEnvFile(
  startDir: string,
  homeDir: string = homedir(),
): string | null {
  let currentDir = path.resolve(startDir);
  while (true) {
    const parleyEnvPath = path.join(currentDir, PARLEY_DIR, '.env');
    if (fs.existsSync(parleyEnvPath)) {
      return parleyEnvPath;
    }
    const envPath = path.join(currentDir, '.env');
    if (fs.existsSync(envPath)) {
      return envPath;
    }
    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir || !parentDir) {
      const homeParleyEnvPath = path.join(homeDir, PARLEY_DIR, '.env');
      if (fs.existsSync(homeParleyEnvPath)) {
        return homeParleyEnvPath;
      }
      const homeEnvPath = path.join(homeDir, '.env');
      if (fs.existsSync(homeEnvPath)) {
        return homeEnvPath;
      }
      return null;
    }
    currentDir = parentDir;
  }
}

export interface LoadEnvironmentOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

/**
 * Copies variables from the nearest `.env` file into `env`. Variables
 * already set in the shell win. Returns the file that was read, if any.
 */
export function loadEnvironment(
  options: LoadEnvironmentOptions = {},
): string | null {
  const env = options.env ?? process.env;
  const envFilePath = findEnvFile(
    options.cwd ?? process.cwd(),
    options.homeDir,
  );
  if (!envFilePath) {
    return null;
  }

  try {
    const parsedEnv = dotenv.parse(fs.readFileSync(envFilePath, 'utf-8'));
    for (const key in parsedEnv) {
      if (Object.hasOwn(parsedEnv, key) && !Object.hasOwn(env, key)) {
        env[key] = parsedEnv[key];
      }
    }
  } catch (error) {
    logger.warn(
      () => `Could not read ${envFilePath}: ${getErrorMessage(error)}`,
    );
    return null;
  }
  logger.debug(() => `Loaded environment from ${envFilePath}`);
  return envFilePath;
}
