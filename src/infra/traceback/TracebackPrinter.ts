/**
 * Error pretty-printing through a Renderer.
 *
 * Prints a panel titled with the error name, bordered in the `error` role:
 * the message first, then the stack frames dimmed, then each `cause`.
 */

import type { Renderer, StyleDescriptor, StyledSpan, TracebackPrinter } from '../../core/models/index.js';

const FRAME_STYLE = 'dim';
const MAX_CAUSE_DEPTH = 5;

type StyleLookup = (role: string) => StyleDescriptor;

function stackFrames(error: Error): string[] {
  if (!error.stack) return [];
  return error.stack
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.startsWith('at '));
}

export class RendererTracebackPrinter implements TracebackPrinter {
  constructor(
    private readonly renderer: Renderer,
    private readonly style: StyleLookup,
  ) {}

  print(error: unknown): void {
    if (!(error instanceof Error)) {
      this.renderer.panel({
        body: { kind: 'text', spans: [{ text: String(error), style: this.style('error') }] },
        title: 'Thrown value',
        borderStyle: this.style('error'),
        box: 'rounded',
        expand: true,
      });
      return;
    }

    this.renderer.panel({
      body: { kind: 'text', spans: this.describe(error) },
      title: error.name || 'Error',
      borderStyle: this.style('error'),
      box: 'rounded',
      expand: true,
    });
  }

  private describe(error: Error): StyledSpan[] {
    const spans: StyledSpan[] = [];
    let current: unknown = error;
    for (let depth = 0; current instanceof Error && depth <= MAX_CAUSE_DEPTH; depth++) {
      if (depth > 0) {
        spans.push({ text: `\n\nCaused by ${current.name}: `, style: this.style('warning') });
      }
      spans.push({ text: current.message, style: this.style('error') });
      for (const frame of stackFrames(current)) {
        spans.push({ text: `\n  ${frame}`, style: FRAME_STYLE });
      }
      current = current.cause;
    }
    return spans;
  }
}
