import { describe, it, expect, afterEach } from 'vitest';
import {
  RendererTracebackPrinter,
  getActiveTracebackPrinter,
  installTracebackHandler,
  uninstallTracebackHandler,
} from '../infra/traceback/index.js';
import type { TracebackPrinter } from '../core/models/index.js';
import { RecordingRenderer } from './helpers/recording-renderer.js';

const ROLE_STYLES: Record<string, string> = { error: 'bold red', warning: 'bold yellow' };
const lookup = (role: string): string => ROLE_STYLES[role] ?? '';

function printedPanel(error: unknown) {
  const renderer = new RecordingRenderer();
  new RendererTracebackPrinter(renderer, lookup).print(error);
  const call = renderer.single();
  if (call.method !== 'panel') {
    throw new Error(`Expected a panel, got ${call.method}`);
  }
  return call.spec;
}

describe('RendererTracebackPrinter', () => {
  it('should title the panel with the error name', () => {
    const spec = printedPanel(new RangeError('out of range'));
    expect(spec).toMatchObject({ title: 'RangeError', borderStyle: 'bold red', box: 'rounded', expand: true });
  });

  it('should show the message then dimmed stack frames', () => {
    const spec = printedPanel(new Error('boom'));
    if (spec.body.kind !== 'text') throw new Error('Expected a text body');

    const [message, ...frames] = spec.body.spans;
    expect(message).toEqual({ text: 'boom', style: 'bold red' });
    expect(frames.length).toBeGreaterThan(0);
    for (const frame of frames) {
      expect(frame.style).toBe('dim');
      expect(frame.text.startsWith('\n  at ')).toBe(true);
    }
  });

  it('should follow the cause chain', () => {
    const spec = printedPanel(new Error('outer', { cause: new TypeError('inner') }));
    if (spec.body.kind !== 'text') throw new Error('Expected a text body');

    const visible = spec.body.spans.filter((span) => span.style !== 'dim');
    expect(visible).toEqual([
      { text: 'outer', style: 'bold red' },
      { text: '\n\nCaused by TypeError: ', style: 'bold yellow' },
      { text: 'inner', style: 'bold red' },
    ]);
  });

  it('should stop after five causes', () => {
    let error = new Error('e0');
    for (let i = 1; i <= 9; i++) {
      error = new Error(`e${i}`, { cause: error });
    }
    const spec = printedPanel(error);
    if (spec.body.kind !== 'text') throw new Error('Expected a text body');

    const causes = spec.body.spans.filter((span) => span.text.startsWith('\n\nCaused by'));
    expect(causes).toHaveLength(5);
  });

  it('should print non-Error values as text', () => {
    const spec = printedPanel('plain string');
    expect(spec).toMatchObject({
      title: 'Thrown value',
      body: { kind: 'text', spans: [{ text: 'plain string', style: 'bold red' }] },
    });
  });
});

describe('traceback handler', () => {
  afterEach(() => {
    uninstallTracebackHandler();
  });

  it('should print uncaught exceptions through the last installed printer', () => {
    const before = process.listenerCount('uncaughtExceptionMonitor');
    const seen: string[] = [];
    const first: TracebackPrinter = { print: () => seen.push('first') };
    const second: TracebackPrinter = { print: () => seen.push('second') };

    installTracebackHandler(first);
    installTracebackHandler(second);
    expect(process.listenerCount('uncaughtExceptionMonitor')).toBe(before + 1);
    expect(getActiveTracebackPrinter()).toBe(second);

    const listeners = process.listeners('uncaughtExceptionMonitor');
    const listener = listeners[listeners.length - 1];
    listener?.(new Error('crash'), 'uncaughtException');
    expect(seen).toEqual(['second']);
  });

  it('should remove its listener on uninstall', () => {
    const before = process.listenerCount('uncaughtExceptionMonitor');
    installTracebackHandler({ print: () => undefined });
    uninstallTracebackHandler();
    expect(process.listenerCount('uncaughtExceptionMonitor')).toBe(before);
    expect(getActiveTracebackPrinter()).toBeNull();
  });
});
