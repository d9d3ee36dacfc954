/**
 * Line input from the terminal.
 *
 * Hidden input is real: while the answer is typed, readline's echo goes to
 * a muted output, so the characters never reach the terminal.
 */

import * as readline from 'node:readline';
import { Writable } from 'node:stream';
import type { TerminalInput } from '../../core/models/index.js';

/** Forwards writes to a target stream unless muted */
export class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    // Decided per write, so echo queued while muted never leaks out later
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

export interface ReadlineTerminalInputOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
}

function pauseSafely(stream: NodeJS.ReadableStream & { destroyed?: boolean }): void {
  if (stream.readable && !stream.destroyed) {
    stream.pause();
  }
}

export class ReadlineTerminalInput implements TerminalInput {
  private readonly input: NodeJS.ReadableStream & { isTTY?: boolean; destroyed?: boolean };
  private readonly output: NodeJS.WritableStream;

  constructor(options: ReadlineTerminalInputOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  /**
   * Show `prompt` and resolve with the line typed (untrimmed).
   * A closed input resolves with an empty string.
   */
  readLine(prompt: string, options: { hidden?: boolean } = {}): Promise<string> {
    const output = new MutableOutput(this.output);
    const rl = readline.createInterface({
      input: this.input,
      output,
      terminal: this.input.isTTY === true,
    });

    return new Promise((resolve) => {
      let answered = false;

      rl.once('line', (line) => {
        answered = true;
        if (options.hidden) {
          output.muted = false;
          this.output.write('\n');
        }
        rl.close();
        pauseSafely(this.input);
        resolve(line);
      });

      rl.once('close', () => {
        if (!answered) {
          resolve('');
        }
      });

      output.write(prompt);
      output.muted = options.hidden ?? false;
    });
  }
}
