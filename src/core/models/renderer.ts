/**
 * Renderer collaborator contract.
 *
 * The facade resolves every style before calling into a Renderer, so
 * implementations only ever see descriptors and structured content.
 */

import type { BoxStyle, StyleDescriptor, StyledSpan } from './types.js';

/** Inner padding as [vertical, horizontal] or [top, right, bottom, left] */
export type Padding = number | readonly [number, number] | readonly [number, number, number, number];

export interface RuleSpec {
  title?: readonly StyledSpan[];
  lineStyle?: StyleDescriptor;
}

export interface KeyValueRow {
  key: string;
  value: readonly StyledSpan[];
}

export type PanelBody =
  | { kind: 'text'; spans: readonly StyledSpan[] }
  | { kind: 'keyValue'; rows: readonly KeyValueRow[]; keyStyle: StyleDescriptor; valueStyle: StyleDescriptor }
  | { kind: 'json'; data: unknown }
  | { kind: 'code'; code: string; language: string; lineNumbers: boolean; wrap: boolean };

export interface PanelSpec {
  body: PanelBody;
  title?: string;
  borderStyle: StyleDescriptor;
  /** Interior style applied to the content area */
  style?: StyleDescriptor;
  box: BoxStyle;
  expand: boolean;
  padding?: Padding;
}

export interface TableSpec {
  headers: readonly string[];
  rows: readonly (readonly string[])[];
  title?: string;
  headerStyle: StyleDescriptor;
  box: BoxStyle;
  expand: boolean;
}

export interface TreeNode {
  label: readonly StyledSpan[];
  children: TreeNode[];
}

export interface MarkdownSpec {
  text: string;
  headingStyle: StyleDescriptor;
  codeStyle: StyleDescriptor;
}

export interface StatusSpec {
  text: string;
  spinnerStyle: StyleDescriptor;
}

/** Live spinner started by a Renderer */
export interface StatusHandle {
  update(text: string): void;
  stop(): void;
}

export interface ProgressSpec {
  transient: boolean;
  showSpeed: boolean;
  /** Fixed description shown instead of each task's own */
  description?: string;
  barStyle: StyleDescriptor;
  descriptionStyle: StyleDescriptor;
}

/** Point-in-time view of one progress task */
export interface ProgressTaskSnapshot {
  id: number;
  description: string;
  completed: number;
  total?: number;
  startedAt: number;
  finished: boolean;
}

/** Drawing surface for a progress tracker */
export interface ProgressView {
  render(tasks: readonly ProgressTaskSnapshot[], now: number): void;
  stop(tasks: readonly ProgressTaskSnapshot[], now: number): void;
}

/** Terminal drawing capability consumed by the facade */
export interface Renderer {
  line(spans: readonly StyledSpan[]): void;
  blank(count: number): void;
  rule(spec: RuleSpec): void;
  panel(spec: PanelSpec): void;
  table(spec: TableSpec): void;
  tree(root: TreeNode): void;
  markdown(spec: MarkdownSpec): void;
  /** Compose spans into a single terminal string (used for prompts) */
  formatSpans(spans: readonly StyledSpan[]): string;
  status(spec: StatusSpec): StatusHandle;
  progress(spec: ProgressSpec): ProgressView;
}

/** Reads a line of text from the terminal */
export interface TerminalInput {
  readLine(prompt: string, options?: { hidden?: boolean }): Promise<string>;
}

/** Pretty-prints an error and its stack */
export interface TracebackPrinter {
  print(error: unknown): void;
}
