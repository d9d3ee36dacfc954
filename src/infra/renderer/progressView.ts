/**
 * Terminal progress display.
 *
 * On a TTY the task lines are redrawn in place; elsewhere nothing is drawn
 * until stop(), which prints the final state once (unless transient).
 */

import type { ChalkInstance } from 'chalk';
import type { ProgressSpec, ProgressTaskSnapshot, ProgressView } from '../../core/models/index.js';
import { SPINNER_FRAMES } from '../../shared/ui/Spinner.js';
import { applyStyle } from './styleDescriptor.js';

const BAR_WIDTH = 40;
const BAR_CHAR = '━';
const FRAME_MS = 80;
const DONE_GLYPH = '✔';

const CURSOR_UP = (lines: number): string => `\x1b[${lines}A`;
const CLEAR_LINE = '\x1b[2K';

/** Format milliseconds as H:MM:SS */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/** Percentage as a right-aligned three-digit field, `  -%` when unknown */
export function formatPercentage(task: ProgressTaskSnapshot): string {
  if (task.total === undefined) return '  -%';
  if (task.total === 0) return '100%';
  const percentage = Math.min(100, Math.floor((task.completed / task.total) * 100));
  return `${String(percentage).padStart(3)}%`;
}

export function estimateRemaining(task: ProgressTaskSnapshot, now: number): number | null {
  if (task.total === undefined || task.completed <= 0) return null;
  const elapsed = now - task.startedAt;
  return (elapsed / task.completed) * Math.max(0, task.total - task.completed);
}

export class TerminalProgressView implements ProgressView {
  private drawnLines = 0;

  constructor(
    private readonly chalk: ChalkInstance,
    private readonly spec: ProgressSpec,
    private readonly output: NodeJS.WritableStream & { isTTY?: boolean },
  ) {}

  render(tasks: readonly ProgressTaskSnapshot[], now: number): void {
    if (!this.output.isTTY) return;
    this.redraw(this.formatTasks(tasks, now));
  }

  stop(tasks: readonly ProgressTaskSnapshot[], now: number): void {
    if (this.output.isTTY) {
      if (this.spec.transient) {
        this.clear();
      } else {
        this.redraw(this.formatTasks(tasks, now));
      }
      this.drawnLines = 0;
      return;
    }
    if (!this.spec.transient) {
      for (const line of this.formatTasks(tasks, now)) {
        this.output.write(line + '\n');
      }
    }
  }

  formatTasks(tasks: readonly ProgressTaskSnapshot[], now: number): string[] {
    const frame = SPINNER_FRAMES[Math.floor(now / FRAME_MS) % SPINNER_FRAMES.length] ?? SPINNER_FRAMES[0];
    return tasks.map((task) => this.formatTask(task, now, frame));
  }

  private formatTask(task: ProgressTaskSnapshot, now: number, frame: string): string {
    const glyph = task.finished ? applyStyle(this.chalk, DONE_GLYPH, this.spec.barStyle) : frame;
    const description = applyStyle(this.chalk, this.spec.description ?? task.description, this.spec.descriptionStyle);
    const parts = [glyph, description, this.formatBar(task), formatPercentage(task)];
    if (this.spec.showSpeed) {
      const remaining = estimateRemaining(task, now);
      parts.push(formatDuration(now - task.startedAt));
      parts.push(remaining === null ? '-:--:--' : formatDuration(remaining));
    }
    return parts.join(' ');
  }

  private formatBar(task: ProgressTaskSnapshot): string {
    let ratio = 0;
    if (task.total === 0) {
      ratio = 1;
    } else if (task.total !== undefined) {
      ratio = Math.min(1, task.completed / task.total);
    }
    const filled = Math.floor(ratio * BAR_WIDTH);
    return applyStyle(this.chalk, BAR_CHAR.repeat(filled), this.spec.barStyle)
      + applyStyle(this.chalk, BAR_CHAR.repeat(BAR_WIDTH - filled), 'dim');
  }

  private redraw(lines: string[]): void {
    let out = this.drawnLines > 0 ? CURSOR_UP(this.drawnLines) : '';
    for (const line of lines) {
      out += `${CLEAR_LINE}${line}\n`;
    }
    // Clear lines left over from removed tasks
    for (let i = lines.length; i < this.drawnLines; i++) {
      out += `${CLEAR_LINE}\n`;
    }
    const written = Math.max(lines.length, this.drawnLines);
    if (written > lines.length) {
      out += CURSOR_UP(written - lines.length);
    }
    this.output.write(out);
    this.drawnLines = lines.length;
  }

  private clear(): void {
    if (this.drawnLines === 0) return;
    let out = CURSOR_UP(this.drawnLines);
    for (let i = 0; i < this.drawnLines; i++) {
      out += `${CLEAR_LINE}\n`;
    }
    out += CURSOR_UP(this.drawnLines);
    this.output.write(out);
  }
}
