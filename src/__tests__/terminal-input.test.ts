import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { MutableOutput, ReadlineTerminalInput } from '../shared/prompt/index.js';
import { CapturedOutput } from './helpers/recording-renderer.js';

function createInput() {
  const input = new PassThrough();
  const output = new CapturedOutput();
  return { input, output, terminal: new ReadlineTerminalInput({ input, output }) };
}

describe('ReadlineTerminalInput', () => {
  it('should write the prompt and resolve the typed line', async () => {
    const { input, output, terminal } = createInput();
    const answer = terminal.readLine('Name: ');
    input.write('  Ada Lovelace \n');

    await expect(answer).resolves.toBe('  Ada Lovelace ');
    expect(output.text()).toBe('Name: ');
  });

  it('should end hidden input with a newline', async () => {
    const { input, output, terminal } = createInput();
    const answer = terminal.readLine('Token: ', { hidden: true });
    input.write('test-secret\n');

    await expect(answer).resolves.toBe('test-secret');
    expect(output.text()).toBe('Token: \n');
  });

  it('should resolve an empty string when input closes', async () => {
    const { input, terminal } = createInput();
    const answer = terminal.readLine('Name: ');
    input.end();

    await expect(answer).resolves.toBe('');
  });
});

describe('MutableOutput', () => {
  it('should drop writes while muted', () => {
    const target = new CapturedOutput();
    const output = new MutableOutput(target);
    output.write('a');
    output.muted = true;
    output.write('b');
    output.muted = false;
    output.write('c');
    expect(target.text()).toBe('ac');
  });

  it('should decide muting when a write is made, not when the target drains', async () => {
    class SlowOutput extends CapturedOutput {
      override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.chunks.push(chunk.toString());
        setImmediate(callback);
      }
    }
    const target = new SlowOutput();
    const output = new MutableOutput(target);

    output.write('a');
    output.muted = true;
    output.write('b');
    output.write('c');
    output.muted = false;
    output.write('d');
    await new Promise((resolve) => setImmediate(resolve));
    await new Promise((resolve) => setImmediate(resolve));

    expect(target.text()).toBe('ad');
  });
});
