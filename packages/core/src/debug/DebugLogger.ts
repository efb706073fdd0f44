/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import { FileOutput } from './FileOutput.js';
import type { DebugLevel, LogEntry } from './types.js';

const LEVEL_ORDER: Record<DebugLevel, number> = {
  debug: 0,
  log: 1,
  info: 2,
  warn: 3,
  error: 4,
};

function isDebugLevel(value: string): value is DebugLevel {
  return value in LEVEL_ORDER;
}

type MessageOrFn = string | (() => string);

/**
 * Namespaced diagnostic logger. Messages may be passed as functions so that
 * nothing is formatted while the namespace is disabled.
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;
  private readonly _configManager: ConfigurationManager;
  private readonly _fileOutput: FileOutput;
  private _enabled: boolean;
  private readonly boundOnConfigChange: () => void;

  /**
   * Returns the cached logger for a namespace, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._configManager = ConfigurationManager.getInstance();
    this._fileOutput = FileOutput.getInstance();
    this._enabled = this.checkEnabled();
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  get fileOutput(): FileOutput {
    return this._fileOutput;
  }

  debug(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.logWithLevel('debug', messageOrFn, args);
  }

  log(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.logWithLevel('log', messageOrFn, args);
  }

  warn(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.logWithLevel('warn', messageOrFn, args);
  }

  error(messageOrFn: MessageOrFn, ...args: unknown[]): void {
    this.logWithLevel('error', messageOrFn, args);
  }

  private logWithLevel(
    level: DebugLevel,
    messageOrFn: MessageOrFn,
    args: unknown[],
  ): void {
    if (!this._enabled || !this.passesLevel(level)) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }
    message = this.redactSensitive(message);

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message,
      args: args.length > 0 ? args : undefined,
      runId: this._fileOutput.runId,
      pid: process.pid,
    };

    const target = this._configManager.getOutputTarget();
    if (target.includes('file')) {
      void this._fileOutput.write(entry);
    }
    if (target.includes('stderr')) {
      this.debugInstance(message, ...args);
    }
  }

  private passesLevel(level: DebugLevel): boolean {
    const configured = this._configManager.getEffectiveConfig().level;
    if (!isDebugLevel(configured)) {
      return true;
    }
    return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }
    return config.namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }
    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }
    return false;
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
    const directory = this._configManager.getOutputDirectory();
    if (directory) {
      this._fileOutput.setDirectory(directory);
    }
  }

  async dispose(): Promise<void> {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
    await this._fileOutput.dispose();
  }
}
