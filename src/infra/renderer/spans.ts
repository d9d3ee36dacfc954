/**
 * Helpers for laying out styled spans.
 */

import type { ChalkInstance } from 'chalk';
import type { StyledSpan } from '../../core/models/index.js';
import { getDisplayWidth, isFullWidth } from '../../shared/utils/text.js';
import { applyStyle } from './styleDescriptor.js';

export type SpanLine = StyledSpan[];

export function spansWidth(line: readonly StyledSpan[]): number {
  return line.reduce((width, span) => width + getDisplayWidth(span.text), 0);
}

export function plainText(line: readonly StyledSpan[]): string {
  return line.map((span) => span.text).join('');
}

export function formatSpans(chalk: ChalkInstance, spans: readonly StyledSpan[]): string {
  return spans.map((span) => applyStyle(chalk, span.text, span.style)).join('');
}

/** Split spans on newlines, keeping each piece's style */
export function splitLines(spans: readonly StyledSpan[]): SpanLine[] {
  const lines: SpanLine[] = [[]];
  for (const span of spans) {
    const parts = span.text.split('\n');
    parts.forEach((part, index) => {
      if (index > 0) {
        lines.push([]);
      }
      if (part) {
        lines[lines.length - 1]?.push({ text: part, style: span.style });
      }
    });
  }
  return lines;
}

/** Hard-wrap one line of spans to a display width */
export function wrapSpans(line: readonly StyledSpan[], width: number): SpanLine[] {
  if (width <= 0 || spansWidth(line) <= width) {
    return [[...line]];
  }
  const lines: SpanLine[] = [];
  let current: SpanLine = [];
  let currentWidth = 0;

  for (const span of line) {
    let text = '';
    for (const char of span.text) {
      const charWidth = isFullWidth(char.codePointAt(0) ?? 0) ? 2 : 1;
      if (currentWidth + charWidth > width) {
        if (text) current.push({ text, style: span.style });
        lines.push(current);
        current = [];
        currentWidth = 0;
        text = '';
      }
      text += char;
      currentWidth += charWidth;
    }
    if (text) current.push({ text, style: span.style });
  }
  lines.push(current);
  return lines;
}

/** Give unstyled spans a default style */
export function withDefaultStyle(line: readonly StyledSpan[], style: string): SpanLine {
  return line.map((span) => (span.style ? span : { text: span.text, style }));
}
