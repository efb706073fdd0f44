/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface DebugOutputConfig {
  target: string;
  directory?: string;
}

export type DebugLevel = 'debug' | 'log' | 'info' | 'warn' | 'error';

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[];
  level: string;
  output: DebugOutputConfig | string;
  redactPatterns: string[];
}

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: DebugLevel;
  message: string;
  args?: unknown[];
  runId: string;
  pid: number;
}
