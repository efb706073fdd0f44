/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createInterface, type Interface } from 'node:readline';
import { Writable } from 'node:stream';
import type { TextOutput } from './TerminalPresenter.js';

export type LineResult =
  | { type: 'line'; text: string }
  | { type: 'interrupted' }
  | { type: 'closed' };

export interface LineInputOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: TextOutput;
}

/**
 * Output for readline that can stop echoing while a secret is typed.
 */
class MaskableOutput extends Writable {
  muted = false;

  constructor(private readonly target: TextOutput) {
    super({ decodeStrings: false });
  }

  override _write(
    chunk: string | Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (!this.muted) {
      this.target.write(
        typeof chunk === 'string' ? chunk : chunk.toString('utf8'),
      );
    }
    callback();
  }
}

/**
 * Line-oriented prompt over stdin. Lines typed while nobody is reading are
 * queued; Ctrl-C either interrupts the pending read or goes to the
 * interrupt handler.
 */
export class LineInput {
  private readonly rl: Interface;
  private readonly screen: TextOutput;
  private readonly output: MaskableOutput;
  private readonly queued: string[] = [];
  private pending?: (result: LineResult) => void;
  private interruptHandler?: () => void;
  private closed = false;

  constructor(options: LineInputOptions = {}) {
    const input = options.input ?? process.stdin;
    this.screen = options.output ?? process.stdout;
    this.output = new MaskableOutput(this.screen);
    this.rl = createInterface({
      input,
      output: this.output,
      terminal: input.isTTY === true,
    });
    this.rl.on('line', (line) => this.deliver({ type: 'line', text: line }));
    this.rl.on('SIGINT', () => this.interrupt());
    this.rl.on('close', () => {
      this.closed = true;
      this.settle({ type: 'closed' });
    });
  }

  /** Called on Ctrl-C while no read is pending. */
  onInterrupt(handler: () => void): void {
    this.interruptHandler = handler;
  }

  read(prompt: string): Promise<LineResult> {
    const next = this.queued.shift();
    if (next !== undefined) {
      return Promise.resolve({ type: 'line', text: next });
    }
    if (this.closed) {
      return Promise.resolve({ type: 'closed' });
    }
    return new Promise<LineResult>((resolve) => {
      this.pending = resolve;
      this.rl.setPrompt(prompt);
      this.rl.prompt();
    });
  }

  /**
   * Reads one line without echoing it. Falls back to {@link read} for a
   * line that was typed ahead.
   */
  async readSecret(prompt: string): Promise<LineResult> {
    if (this.queued.length > 0 || this.closed) {
      return this.read(prompt);
    }
    this.rl.setPrompt('');
    this.screen.write(prompt);
    this.output.muted = true;
    try {
      return await new Promise<LineResult>((resolve) => {
        this.pending = resolve;
      });
    } finally {
      this.output.muted = false;
      this.screen.write('\n');
    }
  }

  interrupt(): void {
    if (this.pending) {
      this.settle({ type: 'interrupted' });
      return;
    }
    this.interruptHandler?.();
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private deliver(result: { type: 'line'; text: string }): void {
    if (this.pending) {
      this.settle(result);
    } else {
      this.queued.push(result.text);
    }
  }

  private settle(result: LineResult): void {
    const pending = this.pending;
    this.pending = undefined;
    pending?.(result);
  }
}
