/**
 * Line layout for rules, panels, tables and trees.
 *
 * Every function returns finished terminal lines (ANSI included, no
 * trailing newline) for a given total width.
 */

import type { ChalkInstance } from 'chalk';
import type {
  KeyValueRow,
  Padding,
  PanelBody,
  PanelSpec,
  RuleSpec,
  StyledSpan,
  TableSpec,
  TreeNode,
} from '../../core/models/index.js';
import { toJson } from '../../core/console/structure.js';
import { getDisplayWidth, padToWidth, truncateText, wrapText } from '../../shared/utils/text.js';
import { getBoxChars, type BoxRow } from './boxes.js';
import { applyStyle } from './styleDescriptor.js';
import { formatSpans, spansWidth, splitLines, withDefaultStyle, wrapSpans } from './spans.js';

const RULE_CHAR = '─';
const DEFAULT_PANEL_PADDING: Padding = [0, 1];
const TABLE_TITLE_STYLE = 'italic';
const LINE_NUMBER_STYLE = 'dim';
const MIN_COLUMN_WIDTH = 3;

/** A rendered content line and its display width */
interface Cell {
  text: string;
  width: number;
}

function cell(chalk: ChalkInstance, spans: readonly StyledSpan[]): Cell {
  return { text: formatSpans(chalk, spans), width: spansWidth(spans) };
}

/** Normalize padding to [top, right, bottom, left] */
export function normalizePadding(padding: Padding = DEFAULT_PANEL_PADDING): [number, number, number, number] {
  if (typeof padding === 'number') {
    return [padding, padding, padding, padding];
  }
  if (padding.length === 2) {
    const [vertical, horizontal] = padding;
    return [vertical, horizontal, vertical, horizontal];
  }
  const [top, right, bottom, left] = padding;
  return [top, right, bottom, left];
}

// ---------- Rule ----------

export function renderRule(chalk: ChalkInstance, spec: RuleSpec, width: number): string {
  const line = (length: number): string => applyStyle(chalk, RULE_CHAR.repeat(Math.max(0, length)), spec.lineStyle);
  if (!spec.title || spec.title.length === 0) {
    return line(width);
  }

  const titleWidth = spansWidth(spec.title);
  const maxTitle = Math.max(1, width - 4);
  const title = titleWidth > maxTitle
    ? [{ text: truncateText(spec.title.map((span) => span.text).join(''), maxTitle), style: spec.title[0]?.style }]
    : spec.title;
  const rendered = cell(chalk, title);
  const side = Math.max(0, width - rendered.width - 2);
  const left = Math.floor(side / 2);
  return `${line(left)} ${rendered.text} ${line(side - left)}`;
}

// ---------- Panel ----------

function highlightJsonLine(chalk: ChalkInstance, line: string): string {
  return line.replace(
    /("(?:[^"\\]|\\.)*")(\s*:)?|\b(true|false|null)\b|(-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)/g,
    (match: string, str?: string, colon?: string, literal?: string, num?: string) => {
      if (str !== undefined) {
        return colon !== undefined
          ? applyStyle(chalk, str, 'bold blue') + colon
          : applyStyle(chalk, str, 'green');
      }
      if (literal !== undefined) return applyStyle(chalk, literal, 'italic bright_magenta');
      if (num !== undefined) return applyStyle(chalk, num, 'bold cyan');
      return match;
    },
  );
}

/**
 * Keys are right-aligned in a column of at most half the width; values wrap
 * under their first line.
 */
function keyValueLines(
  chalk: ChalkInstance,
  rows: readonly KeyValueRow[],
  keyStyle: string,
  valueStyle: string,
  maxWidth: number,
): Cell[] {
  const naturalKeyWidth = Math.max(0, ...rows.map((row) => getDisplayWidth(row.key)));
  const keyWidth = Math.min(naturalKeyWidth, Math.max(1, Math.floor(maxWidth / 2)));
  const available = Math.max(1, maxWidth - keyWidth - 1);
  const indent = ' '.repeat(keyWidth + 1);

  return rows.flatMap((row) => {
    const key = applyStyle(chalk, padToWidth(truncateText(row.key, keyWidth), keyWidth, 'right'), keyStyle);
    const valueLines = splitLines(withDefaultStyle(row.value, valueStyle))
      .flatMap((line) => wrapSpans(line, available));
    return valueLines.map((line, index) => {
      const value = cell(chalk, line);
      const prefix = index === 0 ? `${key} ` : indent;
      return { text: prefix + value.text, width: keyWidth + 1 + value.width };
    });
  });
}

function codeLines(chalk: ChalkInstance, body: Extract<PanelBody, { kind: 'code' }>, maxWidth: number): Cell[] {
  const source = body.code.replace(/\n$/, '').split('\n');
  const gutterWidth = body.lineNumbers ? String(source.length).length + 1 : 0;
  const available = Math.max(1, maxWidth - gutterWidth);
  const lines: Cell[] = [];

  source.forEach((text, index) => {
    const pieces = body.wrap ? wrapText(text, available) : [truncateText(text, available)];
    pieces.forEach((piece, pieceIndex) => {
      const number = pieceIndex === 0 ? String(index + 1) : '';
      const gutter = body.lineNumbers
        ? applyStyle(chalk, `${number.padStart(gutterWidth - 1)} `, LINE_NUMBER_STYLE)
        : '';
      lines.push({ text: gutter + piece, width: gutterWidth + getDisplayWidth(piece) });
    });
  });
  return lines;
}

function bodyLines(chalk: ChalkInstance, body: PanelBody, maxWidth: number): Cell[] {
  switch (body.kind) {
    case 'text':
      return splitLines(body.spans)
        .flatMap((line) => wrapSpans(line, maxWidth))
        .map((line) => cell(chalk, line));
    case 'keyValue':
      return keyValueLines(chalk, body.rows, body.keyStyle, body.valueStyle, maxWidth);
    case 'json':
      return toJson(body.data, 2)
        .split('\n')
        .map((line) => truncateText(line, maxWidth))
        .map((line) => ({ text: highlightJsonLine(chalk, line), width: getDisplayWidth(line) }));
    case 'code':
      return codeLines(chalk, body, maxWidth);
  }
}

function horizontalEdge(chalk: ChalkInstance, row: BoxRow, innerWidth: number, borderStyle: string, title?: string): string {
  const paint = (text: string): string => applyStyle(chalk, text, borderStyle);
  if (!title) {
    return paint(row.left + row.horizontal.repeat(innerWidth) + row.right);
  }
  const label = ` ${truncateText(title, Math.max(1, innerWidth - 2))} `;
  const side = Math.max(0, innerWidth - getDisplayWidth(label));
  const left = Math.floor(side / 2);
  return paint(row.left + row.horizontal.repeat(left)) + paint(label) + paint(row.horizontal.repeat(side - left) + row.right);
}

export function renderPanel(chalk: ChalkInstance, spec: PanelSpec, width: number): string[] {
  const box = getBoxChars(spec.box);
  const [top, right, bottom, left] = normalizePadding(spec.padding);
  const maxContent = Math.max(1, width - 2 - left - right);

  const content = bodyLines(chalk, spec.body, maxContent);
  const contentWidth = Math.max(0, ...content.map((line) => line.width));
  const titleWidth = spec.title ? getDisplayWidth(spec.title) + 2 : 0;
  const innerContent = spec.expand
    ? maxContent
    : Math.min(maxContent, Math.max(contentWidth, titleWidth - left - right));
  const innerWidth = innerContent + left + right;

  const border = (text: string): string => applyStyle(chalk, text, spec.borderStyle);
  const interior = (text: string): string => applyStyle(chalk, text, spec.style);
  const blankRow = border(box.mid.left) + interior(' '.repeat(innerWidth)) + border(box.mid.right);

  const lines: string[] = [horizontalEdge(chalk, box.top, innerWidth, spec.borderStyle, spec.title)];
  for (let i = 0; i < top; i++) lines.push(blankRow);
  for (const line of content) {
    const fill = ' '.repeat(Math.max(0, innerContent - line.width));
    lines.push(
      border(box.mid.left)
      + interior(' '.repeat(left))
      + line.text
      + interior(fill + ' '.repeat(right))
      + border(box.mid.right),
    );
  }
  for (let i = 0; i < bottom; i++) lines.push(blankRow);
  lines.push(horizontalEdge(chalk, box.bottom, innerWidth, spec.borderStyle));
  return lines;
}

// ---------- Table ----------

/** Shrink or grow column widths to fit the available width */
function fitColumns(natural: number[], available: number, expand: boolean): number[] {
  const total = natural.reduce((sum, w) => sum + w, 0);
  if (total > available) {
    const widths = [...natural];
    let excess = total - available;
    while (excess > 0) {
      const widest = widths.indexOf(Math.max(...widths));
      const current = widths[widest] ?? 0;
      if (current <= MIN_COLUMN_WIDTH) break;
      widths[widest] = current - 1;
      excess--;
    }
    return widths;
  }
  if (expand && natural.length > 0) {
    const extra = available - total;
    const share = Math.floor(extra / natural.length);
    const remainder = extra % natural.length;
    return natural.map((w, index) => w + share + (index < remainder ? 1 : 0));
  }
  return natural;
}

function tableEdge(row: BoxRow, widths: number[]): string {
  return row.left + widths.map((w) => row.horizontal.repeat(w + 2)).join(row.divider) + row.right;
}

function tableRow(row: BoxRow, cells: string[]): string {
  return row.left + cells.map((text) => ` ${text} `).join(row.divider) + row.right;
}

export function renderTable(chalk: ChalkInstance, spec: TableSpec, width: number): string[] {
  const box = getBoxChars(spec.box);
  const columnCount = Math.max(spec.headers.length, ...spec.rows.map((row) => row.length));
  const natural = Array.from({ length: columnCount }, (_, col) =>
    Math.max(
      getDisplayWidth(spec.headers[col] ?? ''),
      ...spec.rows.map((row) => getDisplayWidth(row[col] ?? '')),
    ));
  const chrome = columnCount * 3 + 1;
  const widths = fitColumns(natural, Math.max(columnCount, width - chrome), spec.expand);

  const fit = (text: string, col: number): string => {
    const columnWidth = widths[col] ?? 0;
    return padToWidth(truncateText(text, columnWidth), columnWidth);
  };
  const isBlank = (line: string): boolean => line.trim().length === 0;

  const lines: string[] = [];
  const tableWidth = widths.reduce((sum, w) => sum + w, 0) + chrome;
  if (spec.title) {
    lines.push(applyStyle(chalk, padToWidth(truncateText(spec.title, tableWidth), tableWidth, 'center'), TABLE_TITLE_STYLE));
  }

  const topEdge = tableEdge(box.top, widths);
  if (!isBlank(topEdge)) lines.push(topEdge);

  if (spec.headers.length > 0) {
    const headerCells = widths.map((_, col) => applyStyle(chalk, fit(spec.headers[col] ?? '', col), spec.headerStyle));
    lines.push(tableRow(box.head, headerCells));
    const separator = tableEdge(box.headRow, widths);
    if (!isBlank(separator)) lines.push(separator);
  }

  for (const row of spec.rows) {
    lines.push(tableRow(box.mid, widths.map((_, col) => fit(row[col] ?? '', col))));
  }

  const bottomEdge = tableEdge(box.bottom, widths);
  if (!isBlank(bottomEdge)) lines.push(bottomEdge);
  return lines;
}

// ---------- Tree ----------

const TREE_BRANCH = '├── ';
const TREE_LAST = '└── ';
const TREE_PIPE = '│   ';
const TREE_SPACE = '    ';

export function renderTree(chalk: ChalkInstance, root: TreeNode): string[] {
  const lines: string[] = [formatSpans(chalk, root.label)];

  const walk = (node: TreeNode, prefix: string): void => {
    node.children.forEach((child, index) => {
      const last = index === node.children.length - 1;
      lines.push(prefix + (last ? TREE_LAST : TREE_BRANCH) + formatSpans(chalk, child.label));
      walk(child, prefix + (last ? TREE_SPACE : TREE_PIPE));
    });
  };
  walk(root, '');
  return lines;
}
