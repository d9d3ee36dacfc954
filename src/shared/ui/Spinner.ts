/**
 * Terminal spinner for long-running operations.
 *
 * Animates only on a TTY; on other streams start/stop write nothing, so
 * piped output never collects carriage-return frames.
 */

import { getDisplayWidth } from '../utils/text.js';

export interface SpinnerOptions {
  output?: NodeJS.WritableStream & { isTTY?: boolean };
  /** Paint a frame glyph (colour it) */
  paintFrame?: (frame: string) => string;
  intervalMs?: number;
}

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

/** Spinner for async operations */
export class Spinner {
  private intervalId?: ReturnType<typeof setInterval>;
  private currentFrame = 0;
  private lastWidth = 0;
  private readonly output: NodeJS.WritableStream & { isTTY?: boolean };
  private readonly paintFrame: (frame: string) => string;
  private readonly intervalMs: number;

  constructor(
    private message: string,
    options: SpinnerOptions = {},
  ) {
    this.output = options.output ?? process.stdout;
    this.paintFrame = options.paintFrame ?? ((frame) => frame);
    this.intervalMs = options.intervalMs ?? 80;
  }

  get isSpinning(): boolean {
    return this.intervalId !== undefined;
  }

  start(): void {
    if (this.intervalId || !this.output.isTTY) {
      return;
    }
    this.draw();
    this.intervalId = setInterval(() => this.draw(), this.intervalMs);
  }

  /** Stop and clear the spinner line; safe to call more than once */
  stop(finalMessage?: string): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.output.write('\r' + ' '.repeat(this.lastWidth) + '\r');
    }
    if (finalMessage) {
      this.output.write(finalMessage + '\n');
    }
  }

  update(message: string): void {
    this.message = message;
  }

  private draw(): void {
    const frame = SPINNER_FRAMES[this.currentFrame] ?? SPINNER_FRAMES[0];
    const line = `${this.paintFrame(frame)} ${this.message}`;
    // Clear leftovers when the message got shorter
    const width = getDisplayWidth(this.message) + 2;
    const padding = ' '.repeat(Math.max(0, this.lastWidth - width));
    this.output.write(`\r${line}${padding}`);
    this.lastWidth = Math.max(this.lastWidth, width);
    this.currentFrame = (this.currentFrame + 1) % SPINNER_FRAMES.length;
  }
}
