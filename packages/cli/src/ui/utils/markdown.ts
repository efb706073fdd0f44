/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ChalkInstance } from 'chalk';
import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

export type MarkdownRenderer = (text: string) => string;

/**
 * Markdown to terminal text, styled with `color` so output follows the
 * presenter's colour level. Trailing blank lines are dropped.
 */
export function createMarkdownRenderer(color: ChalkInstance): MarkdownRenderer {
  const marked = new Marked(
    markedTerminal({
      code: color.yellow,
      blockquote: color.gray.italic,
      html: color.gray,
      heading: color.green.bold,
      firstHeading: color.magenta.bold,
      hr: color.reset,
      listitem: color.reset,
      table: color.reset,
      paragraph: color.reset,
      strong: color.bold,
      em: color.italic,
      codespan: color.yellow,
      del: color.dim.strikethrough,
      link: color.blue,
      href: color.blue.underline,
      showSectionPrefix: false,
      reflowText: false,
      emoji: false,
      tab: 2,
    }),
  );
  return (text) => {
    const rendered = marked.parse(text, { async: false });
    if (typeof rendered !== 'string') {
      throw new TypeError('Markdown rendering did not complete synchronously');
    }
    return rendered.replace(/\n+$/, '');
  };
}
