/**
 * Default Renderer: draws to a writable stream with chalk.
 *
 * Colour depth comes from chalk's own detection unless a level is given;
 * width comes from the stream's `columns` (80 when unknown).
 */

import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import type {
  MarkdownSpec,
  PanelSpec,
  ProgressSpec,
  ProgressView,
  Renderer,
  RuleSpec,
  StatusHandle,
  StatusSpec,
  StyledSpan,
  TableSpec,
  TreeNode,
} from '../../core/models/index.js';
import { Spinner } from '../../shared/ui/Spinner.js';
import { renderPanel, renderRule, renderTable, renderTree } from './layout.js';
import { markdownLines } from './markdown.js';
import { TerminalProgressView } from './progressView.js';
import { formatSpans, wrapSpans } from './spans.js';
import { applyStyle } from './styleDescriptor.js';

const DEFAULT_WIDTH = 80;

export type OutputStream = NodeJS.WritableStream & { isTTY?: boolean; columns?: number };

export interface TerminalRendererOptions {
  output?: OutputStream;
  /** 0 disables colour; defaults to chalk's detected level */
  colorLevel?: ColorSupportLevel;
  /** Fixed width in columns */
  width?: number;
}

export class TerminalRenderer implements Renderer {
  private readonly output: OutputStream;
  private readonly chalk: ChalkInstance;
  private readonly fixedWidth?: number;

  constructor(options: TerminalRendererOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.chalk = new Chalk({ level: options.colorLevel ?? chalk.level });
    this.fixedWidth = options.width;
  }

  get width(): number {
    return this.fixedWidth ?? this.output.columns ?? DEFAULT_WIDTH;
  }

  formatSpans(spans: readonly StyledSpan[]): string {
    return formatSpans(this.chalk, spans);
  }

  line(spans: readonly StyledSpan[]): void {
    this.write(this.formatSpans(spans));
  }

  blank(count: number): void {
    for (let i = 0; i < count; i++) {
      this.write('');
    }
  }

  rule(spec: RuleSpec): void {
    this.write(renderRule(this.chalk, spec, this.width));
  }

  panel(spec: PanelSpec): void {
    this.writeLines(renderPanel(this.chalk, spec, this.width));
  }

  table(spec: TableSpec): void {
    this.writeLines(renderTable(this.chalk, spec, this.width));
  }

  tree(root: TreeNode): void {
    this.writeLines(renderTree(this.chalk, root));
  }

  markdown(spec: MarkdownSpec): void {
    const lines = markdownLines(spec, this.width)
      .flatMap((line) => wrapSpans(line, this.width))
      .map((line) => this.formatSpans(line));
    this.writeLines(lines);
  }

  status(spec: StatusSpec): StatusHandle {
    const spinner = new Spinner(spec.text, {
      output: this.output,
      paintFrame: (frame) => applyStyle(this.chalk, frame, spec.spinnerStyle),
    });
    spinner.start();
    return {
      update: (text) => spinner.update(text),
      stop: () => spinner.stop(),
    };
  }

  progress(spec: ProgressSpec): ProgressView {
    return new TerminalProgressView(this.chalk, spec, this.output);
  }

  private write(line: string): void {
    this.output.write(line + '\n');
  }

  private writeLines(lines: readonly string[]): void {
    if (lines.length > 0) {
      this.output.write(lines.join('\n') + '\n');
    }
  }
}
