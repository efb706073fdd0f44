/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { expandHomeDir, PARLEY_DIR } from '../utils/paths.js';
import type { LogEntry } from './types.js';

const LOG_FILE_DATE_LENGTH = 10;

/**
 * Batched JSONL writer for debug log entries. One file per run; a new file
 * is started once the current one passes `maxFileSize`.
 */
export class FileOutput {
  private static instance: FileOutput | undefined;
  private debugDir: string;
  private currentLogFile: string;
  private writeQueue: LogEntry[] = [];
  private isWriting = false;
  private disposed = false;
  private flushTimeout: NodeJS.Timeout | null = null;
  private readonly maxFileSize = 10 * 1024 * 1024;
  private readonly maxQueueSize = 1000;
  private readonly batchSize = 50;
  private readonly flushInterval = 1000;
  private readonly debugRunId: string;

  private constructor(directory: string) {
    this.debugDir = expandHomeDir(directory);
    this.debugRunId = process.env.PARLEY_DEBUG_RUN_ID || String(process.pid);
    this.currentLogFile = this.generateLogFileName();
  }

  static getInstance(): FileOutput {
    if (!FileOutput.instance) {
      FileOutput.instance = new FileOutput(`~/${PARLEY_DIR}/debug`);
    }
    return FileOutput.instance;
  }

  get runId(): string {
    return this.debugRunId;
  }

  get logFile(): string {
    return this.currentLogFile;
  }

  setDirectory(directory: string): void {
    const expanded = expandHomeDir(directory);
    if (expanded !== this.debugDir) {
      this.debugDir = expanded;
      this.currentLogFile = this.generateLogFileName();
    }
  }

  async write(entry: LogEntry): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.writeQueue.push(entry);
    if (this.writeQueue.length > this.maxQueueSize) {
      this.writeQueue = this.writeQueue.slice(-this.maxQueueSize);
    }

    if (this.writeQueue.length >= this.batchSize || !this.isWriting) {
      await this.flushQueue();
    }
    if (this.writeQueue.length > 0) {
      this.startFlushTimer();
    }
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }
    await this.flushQueue(true);
  }

  private startFlushTimer(): void {
    if (this.disposed || this.flushTimeout) {
      return;
    }
    this.flushTimeout = setTimeout(() => {
      this.flushTimeout = null;
      void this.flushQueue().then(() => {
        if (this.writeQueue.length > 0) {
          this.startFlushTimer();
        }
      });
    }, this.flushInterval);
    // Never keep the process alive just to flush debug output
    this.flushTimeout.unref();
  }

  private async flushQueue(force = false): Promise<void> {
    if (
      this.isWriting ||
      this.writeQueue.length === 0 ||
      (this.disposed && !force)
    ) {
      return;
    }

    this.isWriting = true;
    const entries = this.writeQueue.splice(0, this.batchSize);

    try {
      await fs.mkdir(this.debugDir, { recursive: true, mode: 0o700 });
      await this.checkFileRotation();
      const jsonl = entries.map((entry) => JSON.stringify(entry)).join('\n');
      await fs.appendFile(this.currentLogFile, `${jsonl}\n`, {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (error) {
      console.error('FileOutput: failed to write log entries:', error);
      if (this.writeQueue.length < this.maxQueueSize / 2) {
        this.writeQueue.unshift(...entries);
      }
    } finally {
      this.isWriting = false;
    }
  }

  private async checkFileRotation(): Promise<void> {
    try {
      const stats = await fs.stat(this.currentLogFile);
      if (stats.size >= this.maxFileSize) {
        this.currentLogFile = this.generateLogFileName();
      }
    } catch {
      // not created yet
    }
  }

  private generateLogFileName(): string {
    const now = new Date();
    const datePart = now.toISOString().slice(0, LOG_FILE_DATE_LENGTH);
    const timePart = now.toTimeString().slice(0, 8).replace(/:/g, '-');
    return join(
      this.debugDir,
      `parley-debug-${this.debugRunId}-${datePart}-${timePart}.jsonl`,
    );
  }
}
