/**
 * Tests for TerminalRenderer layout (colour disabled)
 */

import { describe, it, expect } from 'vitest';
import { TerminalRenderer } from '../infra/renderer/index.js';
import { CapturedOutput } from './helpers/recording-renderer.js';

function createRenderer(width: number) {
  const output = new CapturedOutput();
  const renderer = new TerminalRenderer({ output, colorLevel: 0, width });
  return { output, renderer };
}

describe('TerminalRenderer', () => {
  it('should write span lines without styles at colour level 0', () => {
    const { output, renderer } = createRenderer(20);
    renderer.line([{ text: 'a', style: 'bold' }, { text: 'b' }]);
    renderer.blank(2);
    expect(output.text()).toBe('ab\n\n\n');
  });

  it('should style spans when colour is enabled', () => {
    const renderer = new TerminalRenderer({ output: new CapturedOutput(), colorLevel: 1 });
    expect(renderer.formatSpans([{ text: 'x', style: 'bold' }])).toBe('\x1b[1mx\x1b[22m');
  });

  it('should take the width from the stream when not fixed', () => {
    const output = new CapturedOutput();
    output.columns = 42;
    expect(new TerminalRenderer({ output }).width).toBe(42);
    expect(new TerminalRenderer({ output: new CapturedOutput() }).width).toBe(80);
  });

  it('should draw plain and titled rules across the width', () => {
    const { output, renderer } = createRenderer(10);
    renderer.rule({});
    renderer.rule({ title: [{ text: 'Hi' }] });
    expect(output.lines()).toEqual(['──────────', '─── Hi ───']);
  });

  it('should fit a panel to its content', () => {
    const { output, renderer } = createRenderer(30);
    renderer.panel({
      body: { kind: 'text', spans: [{ text: 'Hello' }] },
      title: 'T',
      borderStyle: 'cyan',
      box: 'rounded',
      expand: false,
    });
    expect(output.lines()).toEqual([
      '╭── T ──╮',
      '│ Hello │',
      '╰───────╯',
    ]);
  });

  it('should draw a double box', () => {
    const { output, renderer } = createRenderer(30);
    renderer.panel({
      body: { kind: 'text', spans: [{ text: 'ok' }] },
      borderStyle: 'magenta',
      box: 'double',
      expand: false,
    });
    expect(output.lines()).toEqual(['╔════╗', '║ ok ║', '╚════╝']);
  });

  it('should right-align keys in a key/value panel', () => {
    const { output, renderer } = createRenderer(30);
    renderer.panel({
      body: {
        kind: 'keyValue',
        rows: [
          { key: 'env', value: [{ text: 'prod' }] },
          { key: 'replicas', value: [{ text: '3' }] },
        ],
        keyStyle: 'bold',
        valueStyle: 'white',
      },
      borderStyle: 'cyan',
      box: 'rounded',
      expand: false,
    });
    expect(output.lines()).toEqual([
      '╭───────────────╮',
      '│      env prod │',
      '│ replicas 3    │',
      '╰───────────────╯',
    ]);
  });

  it('should wrap long values under their first line in a key/value panel', () => {
    const { output, renderer } = createRenderer(20);
    renderer.panel({
      body: {
        kind: 'keyValue',
        rows: [{ key: 'token', value: [{ text: 'abcdefghijklmnopqrst' }] }],
        keyStyle: 'bold',
        valueStyle: 'white',
      },
      borderStyle: 'cyan',
      box: 'rounded',
      expand: false,
    });
    expect(output.lines()).toEqual([
      `╭${'─'.repeat(18)}╮`,
      '│ token abcdefghij │',
      '│       klmnopqrst │',
      `╰${'─'.repeat(18)}╯`,
    ]);
  });

  it('should number code lines inside an expanded panel', () => {
    const { output, renderer } = createRenderer(20);
    renderer.panel({
      body: { kind: 'code', code: 'a\nb', language: 'typescript', lineNumbers: true, wrap: false },
      borderStyle: 'magenta',
      box: 'rounded',
      expand: true,
      padding: [1, 0],
    });
    expect(output.lines()).toEqual([
      `╭${'─'.repeat(18)}╮`,
      `│${' '.repeat(18)}│`,
      `│1 a${' '.repeat(15)}│`,
      `│2 b${' '.repeat(15)}│`,
      `│${' '.repeat(18)}│`,
      `╰${'─'.repeat(18)}╯`,
    ]);
  });

  it('should wrap long code lines when asked', () => {
    const { output, renderer } = createRenderer(10);
    renderer.panel({
      body: { kind: 'code', code: 'abcdefghij', language: 'bash', lineNumbers: true, wrap: true },
      borderStyle: 'magenta',
      box: 'rounded',
      expand: true,
      padding: 0,
    });
    expect(output.lines()).toEqual([
      '╭────────╮',
      '│1 abcdef│',
      '│  ghij  │',
      '╰────────╯',
    ]);
  });

  it('should pretty-print JSON panels', () => {
    const { output, renderer } = createRenderer(30);
    renderer.panel({
      body: { kind: 'json', data: { a: 1 } },
      borderStyle: 'cyan',
      box: 'ascii',
      expand: false,
    });
    expect(output.lines()).toEqual([
      '+----------+',
      '| {        |',
      '|   "a": 1 |',
      '| }        |',
      '+----------+',
    ]);
  });

  it('should truncate JSON lines wider than the panel', () => {
    const { output, renderer } = createRenderer(14);
    renderer.panel({
      body: { kind: 'json', data: { key: 'abcdefghijkl' } },
      borderStyle: 'cyan',
      box: 'ascii',
      expand: false,
    });
    expect(output.lines()).toEqual([
      '+------------+',
      '| {          |',
      '|   "key": … |',
      '| }          |',
      '+------------+',
    ]);
  });

  it('should draw a table with a header separator', () => {
    const { output, renderer } = createRenderer(80);
    renderer.table({
      headers: ['Key', 'Value'],
      rows: [['ENV', 'prod']],
      title: 'T',
      headerStyle: 'bold magenta',
      box: 'rounded',
      expand: false,
    });
    expect(output.lines()).toEqual([
      '       T       ',
      '╭─────┬───────╮',
      '│ Key │ Value │',
      '├─────┼───────┤',
      '│ ENV │ prod  │',
      '╰─────┴───────╯',
    ]);
  });

  it('should shrink wide columns to fit the width', () => {
    const { output, renderer } = createRenderer(15);
    renderer.table({
      headers: ['Name'],
      rows: [['abcdefghijklmnopqrst']],
      headerStyle: 'bold',
      box: 'ascii',
      expand: false,
    });
    expect(output.lines()).toEqual([
      '+-------------+',
      '| Name        |',
      '|-------------|',
      '| abcdefghij… |',
      '+-------------+',
    ]);
  });

  it('should draw tree guides', () => {
    const { output, renderer } = createRenderer(40);
    renderer.tree({
      label: [{ text: 'Root' }],
      children: [
        { label: [{ text: 'a' }], children: [{ label: [{ text: 'a1' }], children: [] }] },
        { label: [{ text: 'b' }], children: [] },
      ],
    });
    expect(output.lines()).toEqual(['Root', '├── a', '│   └── a1', '└── b']);
  });

  it('should render markdown blocks', () => {
    const { output, renderer } = createRenderer(80);
    renderer.markdown({
      text: '# Title\n- item **bold**\n```\ncode\n```',
      headingStyle: 'cyan',
      codeStyle: 'magenta',
    });
    expect(output.lines()).toEqual(['Title', ' • item bold', '    code']);
  });

  it('should not animate a status spinner on a non-TTY stream', () => {
    const { output, renderer } = createRenderer(40);
    const status = renderer.status({ text: 'Working', spinnerStyle: 'cyan' });
    status.update('Still working');
    status.stop();
    expect(output.text()).toBe('');
  });
});
