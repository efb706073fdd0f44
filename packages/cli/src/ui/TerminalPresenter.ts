/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { ChatError, ChatPresenter, ChatMessage } from '@parley/core';
import { MessageType, type HelpEntry, type HistoryItem } from './types.js';
import {
  createMarkdownRenderer,
  type MarkdownRenderer,
} from './utils/markdown.js';
import { formatPanel, formatTable, padDisplay } from './utils/textLayout.js';

/** Where the presenter writes; `process.stdout` in the CLI. */
export interface TextOutput {
  write(text: string): unknown;
}

const RULE_WIDTH = 40;

/**
 * Renders chat output and command results as terminal text. Complete
 * replies and history entries go through the markdown renderer; streamed
 * fragments are written as they arrive.
 */
export class TerminalPresenter implements ChatPresenter {
  private streaming = false;

  constructor(
    private readonly out: TextOutput = process.stdout,
    private readonly color: ChalkInstance = chalk,
    private readonly renderMarkdown: MarkdownRenderer = createMarkdownRenderer(
      color,
    ),
  ) {}

  showThinking(): void {
    this.line();
    this.line(this.color.cyan('Thinking...'));
    this.line();
  }

  showFragment(fragment: string): void {
    this.streaming = true;
    this.out.write(fragment);
  }

  endStream(): void {
    if (this.streaming) {
      this.line();
      this.line();
      this.streaming = false;
    }
  }

  showError(error: ChatError): void {
    this.addItem({ type: MessageType.ERROR, text: error.message });
  }

  showReply(text: string): void {
    this.line(this.color.bold.green('Assistant:'));
    this.line(this.renderMarkdown(text));
    this.line();
  }

  blankLine(): void {
    this.line();
  }

  showWelcome(commands: HelpEntry[]): void {
    const body = [
      'Type your message and press Enter to chat.',
      '',
      ...this.helpLines(commands),
    ].join('\n');
    this.lines(formatPanel('Welcome to Parley', body, this.color.cyan));
  }

  addItem(item: HistoryItem): void {
    switch (item.type) {
      case MessageType.INFO:
        this.line(item.text);
        break;
      case MessageType.SUCCESS:
        this.line(this.color.green(`✓ ${item.text}`));
        break;
      case MessageType.WARNING:
        this.line(this.color.yellow(item.text));
        break;
      case MessageType.ERROR:
        this.line(this.color.red(`✗ ${item.text}`));
        break;
      case MessageType.HELP:
        this.lines(
          formatPanel(
            'Help',
            this.helpLines(item.commands).join('\n'),
            this.color.cyan,
          ),
        );
        break;
      case MessageType.HISTORY:
        this.renderHistory(item.sessionName, item.messages);
        break;
      case MessageType.STATS:
        this.lines(
          formatTable(
            ['Metric', 'Value'],
            [
              ['Session', item.stats.sessionName],
              ['Total Messages', String(item.stats.totalMessages)],
              ['User Messages', String(item.stats.userMessages)],
              ['Assistant Messages', String(item.stats.assistantMessages)],
              ['System Messages', String(item.stats.systemMessages)],
            ],
            {
              title: this.color.bold('Session Statistics'),
              columnStyles: [this.color.cyan, this.color.magenta],
            },
          ),
        );
        break;
      case MessageType.SESSION_LIST:
        this.lines(
          formatTable(
            ['Name', 'Messages', 'Active'],
            item.sessions.map((session) => [
              session.name,
              String(session.messageCount),
              session.active ? '✓' : '',
            ]),
            {
              title: this.color.bold('Available Sessions'),
              columnStyles: [
                this.color.cyan,
                this.color.magenta,
                this.color.green,
              ],
            },
          ),
        );
        break;
      case MessageType.CONFIG:
        this.line(this.color.bold('Current Configuration:'));
        for (const entry of item.entries) {
          this.line(`${entry.name}: ${entry.value}`);
        }
        break;
      case MessageType.PANEL:
        this.lines(formatPanel(item.title, item.text, this.color.cyan));
        break;
      default: {
        const unhandled: never = item;
        throw new Error(`Unknown history item: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private renderHistory(
    sessionName: string,
    messages: readonly ChatMessage[],
  ): void {
    if (messages.length === 0) {
      this.line(this.color.yellow('No conversation history.'));
      return;
    }
    this.line(this.color.bold.blue(`CONVERSATION HISTORY: ${sessionName}`));
    messages.forEach((message, index) => {
      const paint =
        message.role === 'assistant'
          ? this.color.bold.green
          : this.color.bold.blue;
      const heading = `[${index + 1}] ${message.role.toUpperCase()} (${message.timestamp})`;
      this.line();
      this.line(paint(heading));
      this.line(this.renderMarkdown(message.content));
      this.line('-'.repeat(RULE_WIDTH));
    });
  }

  private helpLines(commands: HelpEntry[]): string[] {
    const width = Math.max(...commands.map((entry) => entry.usage.length));
    return commands.map(
      (entry) => `${padDisplay(entry.usage, width)}  ${entry.description}`,
    );
  }

  private lines(lines: string[]): void {
    for (const text of lines) {
      this.line(text);
    }
  }

  private line(text = ''): void {
    this.out.write(`${text}\n`);
  }
}
