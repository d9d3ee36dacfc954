/**
 * Themed, verbosity-gated console facade.
 *
 * Every rendering call follows the same protocol:
 * 1. ask the verbosity gate; a denied call returns with no output at all
 * 2. resolve style roles against the active theme and per-call overrides
 * 3. mask secrets when asked to
 * 4. hand resolved styles and structured content to the Renderer
 *
 * Each facade owns its state and its Renderer, so differently themed
 * facades can coexist in one process.
 */

import {
  ConsoleSettingsSchema,
  StyleOverridesSchema,
  type BoxStyle,
  type ConsoleSettingsInput,
  type ConsoleStateSnapshot,
  type CustomStyleOverrides,
  type EventLevel,
  type OutputCategory,
  type Padding,
  type PanelBody,
  type Renderer,
  type StatusHandle,
  type StyleDescriptor,
  type StyleMapping,
  type StyleRole,
  type StyledSpan,
  type TerminalInput,
  type ThemeName,
  type TracebackPrinter,
  type VerbosityLevel,
} from '../models/index.js';
import { ThemeRegistry, eventRole } from '../theme/index.js';
import { allows } from '../verbosity/index.js';
import { ProgressTracker } from '../progress/index.js';
import { ConsoleState } from './ConsoleState.js';
import { resolveBoxStyle } from './boxStyle.js';
import { formatEventPrefix } from './eventLine.js';
import { buildTree, describeValue, stringifyScalar, toJson } from './structure.js';
import { maskSecret } from '../../shared/utils/mask.js';
import { createLogger } from '../../shared/utils/debug.js';
import { loadBuiltinThemes } from '../../infra/resources/index.js';
import { TerminalRenderer } from '../../infra/renderer/index.js';
import { RendererTracebackPrinter, installTracebackHandler } from '../../infra/traceback/index.js';
import { ReadlineTerminalInput } from '../../shared/prompt/index.js';

const log = createLogger('console');

type MessageKind = 'success' | 'info' | 'warning' | 'error';

const MESSAGE_GLYPHS: Record<MessageKind, string> = {
  success: '✅',
  info: 'ℹ️',
  warning: '⚠️',
  error: '❌',
};

const DEFAULT_RULE_LABEL_STYLE = '#cccccc';
const CODE_PADDING: Padding = [1, 0];
const YES_ANSWERS = new Set(['y', 'yes', 'true', '1']);

const SPACER_SIZES: Record<string, number> = {
  small: 1,
  s: 1,
  medium: 2,
  m: 2,
  large: 3,
  l: 3,
};

const NOOP_STATUS: StatusHandle = {
  update: () => undefined,
  stop: () => undefined,
};

export type SpacerSize = number | 'small' | 's' | 'medium' | 'm' | 'large' | 'l';

export interface ConsoleOptions extends ConsoleSettingsInput {
  renderer?: Renderer;
  input?: TerminalInput;
  tracebackPrinter?: TracebackPrinter;
  registry?: ThemeRegistry;
  /** Clock for event timestamps */
  clock?: () => Date;
}

export interface PanelOptions {
  title?: string;
  /** Interior style */
  style?: StyleDescriptor;
  borderStyle?: StyleDescriptor;
  box?: BoxStyle | string;
  expand?: boolean;
  padding?: Padding;
}

export interface RuleOptions {
  labelStyle?: StyleDescriptor;
  lineStyle?: StyleDescriptor;
}

export interface CodeOptions {
  language?: string;
  title?: string;
  wrap?: boolean;
  lineNumbers?: boolean;
}

export interface TableOptions {
  title?: string;
  headerStyle?: StyleDescriptor;
  expand?: boolean;
  box?: BoxStyle | string;
}

export interface KeyValueOptions {
  secret?: boolean;
  keep?: number;
  mask?: string;
}

export interface ProgressOptions {
  transient?: boolean;
  showSpeed?: boolean;
  description?: string;
}

function resolveSpacerLines(size: SpacerSize): number {
  if (typeof size === 'number') {
    return Number.isFinite(size) ? Math.max(0, Math.trunc(size)) : 1;
  }
  return SPACER_SIZES[size] ?? 1;
}

function formatCell(value: unknown): string {
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
    return toJson(value);
  }
  return stringifyScalar(value);
}

export class ConsoleFacade {
  private readonly state: ConsoleState;
  private readonly renderer: Renderer;
  private readonly input: TerminalInput;
  private readonly tracebackPrinter: TracebackPrinter;
  private readonly clock: () => Date;

  /** @throws UnknownThemeError */
  constructor(options: ConsoleOptions = {}) {
    const { renderer, input, tracebackPrinter, registry, clock, ...rawSettings } = options;
    const settings = ConsoleSettingsSchema.parse(rawSettings);

    this.state = new ConsoleState(registry ?? new ThemeRegistry(loadBuiltinThemes()), {
      theme: settings.theme,
      customStyles: settings.customStyles,
      verbosity: settings.verbosity,
      emoji: settings.emoji,
      timestamps: settings.timestamps,
    });
    this.renderer = renderer ?? new TerminalRenderer();
    this.input = input ?? new ReadlineTerminalInput();
    this.tracebackPrinter = tracebackPrinter
      ?? new RendererTracebackPrinter(this.renderer, (role) => this.style(role));
    this.clock = clock ?? (() => new Date());

    if (settings.enableTracebacks) {
      installTracebackHandler(this.tracebackPrinter);
    }
    log.debug('Console created', { theme: this.state.theme, verbosity: this.state.verbosity });
  }

  // ---------- State ----------

  get theme(): ThemeName {
    return this.state.theme;
  }

  get verbosity(): VerbosityLevel {
    return this.state.verbosity;
  }

  get styles(): StyleMapping {
    return this.state.styles;
  }

  get emoji(): boolean {
    return this.state.emoji;
  }

  get timestamps(): boolean {
    return this.state.timestamps;
  }

  snapshot(): ConsoleStateSnapshot {
    return this.state.snapshot();
  }

  /**
   * Switch to another builtin theme with optional overrides.
   * Overrides are validated as at construction (descriptors must be non-empty).
   * @throws UnknownThemeError or ZodError, leaving the current theme active
   */
  setTheme(theme: string, customStyles?: CustomStyleOverrides): void {
    const previous = this.state.theme;
    const overrides = customStyles === undefined ? undefined : StyleOverridesSchema.parse(customStyles);
    this.state.setTheme(theme, overrides);
    log.debug('Theme changed', { from: previous, to: this.state.theme });
  }

  /** Set verbosity; values outside 0..3 are clamped */
  setVerbosity(level: number): void {
    const applied = this.state.setVerbosity(level);
    log.debug('Verbosity changed', { requested: level, applied });
  }

  /** Resolve a style role against the active theme */
  style(role: StyleRole, override?: StyleDescriptor): StyleDescriptor {
    return this.state.styleResolver.resolve(role, override);
  }

  /** Whether a call of this category (and event level) would produce output */
  isEnabled(category: OutputCategory, level?: EventLevel | string): boolean {
    return allows(this.state.verbosity, category, level);
  }

  // ---------- Structure ----------

  header(message: string, options: { style?: StyleDescriptor } = {}): void {
    if (!this.isEnabled('MESSAGE')) return;
    const style = this.style('header', options.style);
    this.spacer();
    this.renderer.rule({ title: [{ text: message, style }], lineStyle: this.style('rule') });
    this.spacer();
  }

  rule(label = '', options: RuleOptions = {}): void {
    if (!this.isEnabled('MESSAGE')) return;
    const lineStyle = this.style('rule', options.lineStyle);
    if (!label) {
      this.renderer.rule({ lineStyle });
      return;
    }
    const labelStyle = options.labelStyle || DEFAULT_RULE_LABEL_STYLE;
    this.renderer.rule({ title: [{ text: label, style: labelStyle }], lineStyle });
  }

  /** Blank lines: a count, or small/medium/large (1/2/3) */
  spacer(size: SpacerSize = 1): void {
    if (!this.isEnabled('MESSAGE')) return;
    const lines = resolveSpacerLines(size);
    if (lines > 0) {
      this.renderer.blank(lines);
    }
  }

  panel(message: string | readonly StyledSpan[], options: PanelOptions = {}): void {
    if (!this.isEnabled('MESSAGE')) return;
    const spans = typeof message === 'string' ? [{ text: message }] : message;
    this.renderer.panel({
      body: { kind: 'text', spans },
      title: options.title,
      style: options.style,
      borderStyle: this.style('panel', options.borderStyle),
      box: resolveBoxStyle(options.box),
      expand: options.expand ?? false,
      padding: options.padding,
    });
  }

  markdown(text: string): void {
    if (!this.isEnabled('MESSAGE')) return;
    this.renderer.markdown({
      text,
      headingStyle: this.style('info'),
      codeStyle: this.style('code.border'),
    });
  }

  /** Code block with line numbers inside a `code.border` panel */
  code(code: string, options: CodeOptions = {}): void {
    if (!this.isEnabled('MESSAGE')) return;
    const body: PanelBody = {
      kind: 'code',
      code,
      language: options.language ?? 'typescript',
      lineNumbers: options.lineNumbers ?? true,
      wrap: options.wrap ?? false,
    };
    this.renderer.panel({
      body,
      title: options.title,
      borderStyle: this.style('code.border'),
      box: resolveBoxStyle(),
      expand: true,
      padding: CODE_PADDING,
    });
  }

  // ---------- Messages ----------

  success(message: string): void {
    this.message('success', message);
  }

  info(message: string): void {
    this.message('info', message);
  }

  warning(message: string): void {
    this.message('warning', message);
  }

  error(message: string): void {
    this.message('error', message);
  }

  /**
   * Leveled event line. Hidden below verbosity 2; DEBUG events need 3.
   * Only the prefix carries the level's style.
   */
  event(message: string, level: EventLevel | string = 'INFO'): void {
    const lvl = level.toUpperCase();
    if (!this.isEnabled('EVENT', lvl)) return;
    const prefix = formatEventPrefix(lvl, this.state.timestamps ? this.clock() : undefined);
    this.renderer.line([
      { text: prefix, style: this.style(eventRole(lvl)) },
      { text: message },
    ]);
  }

  printException(error: unknown): void {
    if (!this.isEnabled('MESSAGE')) return;
    this.tracebackPrinter.print(error);
  }

  // ---------- Data ----------

  table(headers: readonly string[], rows: readonly (readonly unknown[])[], options: TableOptions = {}): void {
    if (!this.isEnabled('MESSAGE')) return;
    this.renderer.table({
      headers: headers.map(String),
      rows: rows.map((row) => row.map(formatCell)),
      title: options.title,
      headerStyle: this.style('table.header', options.headerStyle),
      box: resolveBoxStyle(options.box),
      expand: options.expand ?? false,
    });
  }

  /** Flat key → value grid inside a panel */
  dictionary(
    data: Readonly<Record<string, unknown>> | ReadonlyMap<unknown, unknown>,
    options: { title?: string; expand?: boolean } = {},
  ): void {
    if (!this.isEnabled('MESSAGE')) return;
    const entries = data instanceof Map ? [...data.entries()] : Object.entries(data);
    this.renderer.panel({
      body: {
        kind: 'keyValue',
        rows: entries.map(([key, value]) => ({ key: String(key), value: describeValue(value) })),
        keyStyle: this.style('key'),
        valueStyle: this.style('value'),
      },
      title: options.title,
      borderStyle: this.style('panel'),
      box: resolveBoxStyle(),
      expand: options.expand ?? true,
    });
  }

  json(data: unknown, options: { title?: string } = {}): void {
    if (!this.isEnabled('MESSAGE')) return;
    this.renderer.panel({
      body: { kind: 'json', data },
      title: options.title,
      borderStyle: this.style('panel'),
      box: resolveBoxStyle(),
      expand: true,
    });
  }

  tree(data: unknown, options: { title?: string } = {}): void {
    if (!this.isEnabled('MESSAGE')) return;
    this.renderer.tree(buildTree(data, options.title ?? 'Structure', this.style('info')));
  }

  /** `key: value` line; `secret` masks all but the first `keep` characters */
  keyValue(key: string, value: unknown, options: KeyValueOptions = {}): void {
    if (!this.isEnabled('MESSAGE')) return;
    const display = options.secret
      ? maskSecret(value, options.keep ?? 3, options.mask ?? '*')
      : stringifyScalar(value);
    this.renderer.line([
      { text: key, style: this.style('key') },
      { text: ': ' },
      { text: display, style: this.style('value') },
    ]);
  }

  // ---------- Progress / Spinners ----------

  /**
   * Run `fn` while a spinner shows `text`. The spinner is stopped on every
   * exit path, including a thrown error or rejected promise.
   */
  async status<T>(text: string, fn: (status: StatusHandle) => T | Promise<T>): Promise<T> {
    const handle = this.isEnabled('MESSAGE')
      ? this.renderer.status({ text, spinnerStyle: this.style('info') })
      : NOOP_STATUS;
    try {
      return await fn(handle);
    } finally {
      handle.stop();
    }
  }

  /** Progress tracker; silent (counting only) when output is suppressed */
  progress(options: ProgressOptions = {}): ProgressTracker {
    if (!this.isEnabled('MESSAGE')) {
      return new ProgressTracker(null);
    }
    const view = this.renderer.progress({
      transient: options.transient ?? true,
      showSpeed: options.showSpeed ?? true,
      description: options.description || undefined,
      barStyle: this.style('success'),
      descriptionStyle: this.style('info'),
    });
    return new ProgressTracker(view);
  }

  // ---------- Prompts ----------

  /**
   * Ask for a line of text. Prompts are never suppressed by verbosity.
   * With `password`, typed characters are not echoed.
   */
  async prompt(message: string, options: { password?: boolean } = {}): Promise<string> {
    const suffix = options.password ? ' (hidden)' : '';
    const text = this.renderer.formatSpans([{ text: `${message}${suffix}`, style: this.style('accent') }]);
    return this.input.readLine(`${text} `, { hidden: options.password ?? false });
  }

  /** Yes/no question; empty input returns the default */
  async confirm(message: string, defaultYes = true): Promise<boolean> {
    const hint = defaultYes ? 'Y/n' : 'y/N';
    const text = this.renderer.formatSpans([{ text: `${message} [${hint}]`, style: this.style('accent') }]);
    const answer = (await this.input.readLine(`${text} `)).trim().toLowerCase();
    if (!answer) {
      return defaultYes;
    }
    return YES_ANSWERS.has(answer);
  }

  // ---------- Internals ----------

  private message(kind: MessageKind, message: string): void {
    if (!this.isEnabled('MESSAGE')) return;
    const spans: StyledSpan[] = [];
    if (this.state.emoji) {
      spans.push({ text: `${MESSAGE_GLYPHS[kind]} ` });
    }
    spans.push({ text: message, style: this.style(kind) });
    this.renderer.line(spans);
  }
}
