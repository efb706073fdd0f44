/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import stringWidth from 'string-width';

type Style = (text: string) => string;

const plain: Style = (text) => text;

/** Pads to a display width; wide characters count as two columns. */
export function padDisplay(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - stringWidth(text)));
}

export interface TableOptions {
  title?: string;
  headerStyle?: Style;
  /** Per-column cell style, applied after padding. */
  columnStyles?: Style[];
}

/**
 * Lays out rows as aligned columns under a header and rule line.
 */
export function formatTable(
  headers: string[],
  rows: string[][],
  options: TableOptions = {},
): string[] {
  const widths = headers.map((header, column) =>
    Math.max(
      stringWidth(header),
      ...rows.map((row) => stringWidth(row[column] ?? '')),
    ),
  );
  const headerStyle = options.headerStyle ?? plain;
  const renderRow = (cells: string[], styleFor: (column: number) => Style) =>
    widths
      .map((width, column) =>
        styleFor(column)(padDisplay(cells[column] ?? '', width)),
      )
      .join('  ')
      .trimEnd();

  const lines: string[] = [];
  if (options.title) {
    lines.push(options.title);
  }
  lines.push(renderRow(headers, () => headerStyle));
  lines.push(widths.map((width) => '─'.repeat(width)).join('  '));
  for (const row of rows) {
    lines.push(
      renderRow(row, (column) => options.columnStyles?.[column] ?? plain),
    );
  }
  return lines;
}

/**
 * Draws a rounded box around the body lines, with the title in the top edge.
 */
export function formatPanel(
  title: string,
  body: string,
  borderStyle: Style = plain,
): string[] {
  const lines = body.split('\n');
  const inner = Math.max(
    stringWidth(title) + 2,
    ...lines.map((line) => stringWidth(line)),
  );
  const top = `╭─ ${title} ${'─'.repeat(inner - stringWidth(title) - 2)}─╮`;
  const bottom = `╰${'─'.repeat(inner + 2)}╯`;
  return [
    borderStyle(top),
    ...lines.map(
      (line) =>
        `${borderStyle('│')} ${padDisplay(line, inner)} ${borderStyle('│')}`,
    ),
    borderStyle(bottom),
  ];
}
