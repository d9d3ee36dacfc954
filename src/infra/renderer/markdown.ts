/**
 * Lightweight markdown to styled lines.
 *
 * Covers headings, bullet and numbered lists, block quotes, fenced code,
 * horizontal rules and inline `code`, **bold** and *italic*. Anything else
 * passes through as plain text.
 */

import type { MarkdownSpec, StyledSpan } from '../../core/models/index.js';
import type { SpanLine } from './spans.js';

const INLINE_PATTERN = /(\*\*[^*]+\*\*|__[^_]+__|`[^`]+`|\*[^*\s][^*]*\*|_[^_\s][^_]*_)/g;
const HEADING_PATTERN = /^(#{1,6})\s+(.*)$/;
const BULLET_PATTERN = /^(\s*)[-*+]\s+(.*)$/;
const NUMBERED_PATTERN = /^(\s*)(\d+)[.)]\s+(.*)$/;
const RULE_PATTERN = /^\s*([-*_])(\s*\1){2,}\s*$/;
const FENCE_PATTERN = /^\s*(```|~~~)/;

/** Split inline markup into spans */
export function parseInline(text: string, codeStyle: string, baseStyle?: string): StyledSpan[] {
  const spans: StyledSpan[] = [];
  const join = (style: string): string => (baseStyle ? `${baseStyle} ${style}` : style);
  let last = 0;

  for (const match of text.matchAll(INLINE_PATTERN)) {
    const token = match[0];
    const index = match.index ?? 0;
    if (index > last) {
      spans.push({ text: text.slice(last, index), style: baseStyle });
    }
    if (token.startsWith('**') || token.startsWith('__')) {
      spans.push({ text: token.slice(2, -2), style: join('bold') });
    } else if (token.startsWith('`')) {
      spans.push({ text: token.slice(1, -1), style: codeStyle });
    } else {
      spans.push({ text: token.slice(1, -1), style: join('italic') });
    }
    last = index + token.length;
  }
  if (last < text.length) {
    spans.push({ text: text.slice(last), style: baseStyle });
  }
  return spans;
}

export function markdownLines(spec: MarkdownSpec, width: number): SpanLine[] {
  const lines: SpanLine[] = [];
  let inFence = false;

  for (const raw of spec.text.replace(/\r\n/g, '\n').split('\n')) {
    if (FENCE_PATTERN.test(raw)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) {
      lines.push([{ text: `    ${raw}`, style: spec.codeStyle }]);
      continue;
    }

    const heading = HEADING_PATTERN.exec(raw);
    if (heading) {
      const level = heading[1]?.length ?? 1;
      const style = level === 1 ? `${spec.headingStyle} bold underline` : `${spec.headingStyle} bold`;
      lines.push(parseInline(heading[2] ?? '', spec.codeStyle, style));
      continue;
    }

    if (RULE_PATTERN.test(raw)) {
      lines.push([{ text: '─'.repeat(Math.max(1, width)), style: 'dim' }]);
      continue;
    }

    const bullet = BULLET_PATTERN.exec(raw);
    if (bullet) {
      lines.push([{ text: `${bullet[1] ?? ''} • ` }, ...parseInline(bullet[2] ?? '', spec.codeStyle)]);
      continue;
    }

    const numbered = NUMBERED_PATTERN.exec(raw);
    if (numbered) {
      lines.push([
        { text: `${numbered[1] ?? ''} ${numbered[2] ?? ''}. ` },
        ...parseInline(numbered[3] ?? '', spec.codeStyle),
      ]);
      continue;
    }

    if (raw.startsWith('>')) {
      lines.push([{ text: '▌ ', style: 'dim' }, ...parseInline(raw.replace(/^>\s?/, ''), spec.codeStyle, 'italic')]);
      continue;
    }

    lines.push(parseInline(raw, spec.codeStyle));
  }
  return lines;
}
