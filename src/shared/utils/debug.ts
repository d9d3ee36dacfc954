/**
 * Debug logging for prettyterm internals.
 *
 * Diagnostic lines (theme switches, verbosity changes, config loading) are
 * appended to a log file when debug is enabled, and mirrored to stderr when
 * verbose console output is on. They never go through a ConsoleFacade, so
 * they are not subject to verbosity gating.
 */

import { existsSync, appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig } from '../../core/models/types.js';

export type DebugLogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface ComponentLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Debug logger singleton.
 * Manages file-based debug logging and verbose console output.
 */
export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private enabled = false;
  private logFile: string | null = null;
  private initialized = false;
  private verboseConsole = false;

  private constructor() {}

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    DebugLogger.instance = null;
  }

  /** Default log file: <projectDir>/.prettyterm/logs/debug-<timestamp>.log */
  static defaultLogFile(projectDir: string): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    return join(projectDir, '.prettyterm', 'logs', `debug-${timestamp}.log`);
  }

  /** Initialize from config. Later calls are ignored until reset(). */
  init(config?: DebugConfig, projectDir?: string): void {
    if (this.initialized) {
      return;
    }
    this.initialized = true;
    this.enabled = config?.enabled ?? false;
    if (!this.enabled) {
      return;
    }

    this.logFile = config?.logFile ?? (projectDir ? DebugLogger.defaultLogFile(projectDir) : null);
    if (!this.logFile) {
      return;
    }

    const logDir = dirname(this.logFile);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    const header = [
      '='.repeat(60),
      'prettyterm debug log',
      `Started: ${new Date().toISOString()}`,
      `Project: ${projectDir ?? 'N/A'}`,
      '='.repeat(60),
      '',
    ].join('\n');
    writeFileSync(this.logFile, header, 'utf-8');
  }

  /** Reset state (for testing) */
  reset(): void {
    this.enabled = false;
    this.logFile = null;
    this.initialized = false;
    this.verboseConsole = false;
  }

  setVerboseConsole(enabled: boolean): void {
    this.verboseConsole = enabled;
  }

  isVerboseConsole(): boolean {
    return this.verboseConsole;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getLogFile(): string | null {
    return this.logFile;
  }

  private static formatFileLine(level: DebugLogLevel, component: string, message: string, data?: unknown): string {
    const line = `[${new Date().toISOString()}] [${level}] [${component}] ${message}`;
    if (data === undefined) {
      return line;
    }
    try {
      const serialized = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
      return `${line}\n${serialized}`;
    } catch {
      return `${line}\n[Unable to serialize data]`;
    }
  }

  /** Write a log entry to stderr (verbose) and/or the log file */
  write(level: DebugLogLevel, component: string, message: string, data?: unknown): void {
    if (this.verboseConsole) {
      const time = new Date().toISOString().slice(11, 23);
      process.stderr.write(`[${time}] [${level}] [${component}] ${message}\n`);
    }

    if (!this.enabled || !this.logFile) {
      return;
    }

    try {
      appendFileSync(this.logFile, DebugLogger.formatFileLine(level, component, message, data) + '\n', 'utf-8');
    } catch {
      // Logging must never interrupt rendering
    }
  }
}

// ---- Module-level shortcuts ----

export function initDebugLogger(config?: DebugConfig, projectDir?: string): void {
  DebugLogger.getInstance().init(config, projectDir);
}

export function resetDebugLogger(): void {
  DebugLogger.getInstance().reset();
}

export function setVerboseConsole(enabled: boolean): void {
  DebugLogger.getInstance().setVerboseConsole(enabled);
}

export function isDebugEnabled(): boolean {
  return DebugLogger.getInstance().isEnabled();
}

export function getDebugLogFile(): string | null {
  return DebugLogger.getInstance().getLogFile();
}

/**
 * Component logger bound lazily, so loggers created at module load
 * still see a logger initialized later by the CLI.
 */
export function createLogger(component: string): ComponentLogger {
  return {
    debug: (message, data) => DebugLogger.getInstance().write('DEBUG', component, message, data),
    info: (message, data) => DebugLogger.getInstance().write('INFO', component, message, data),
    warn: (message, data) => DebugLogger.getInstance().write('WARN', component, message, data),
    error: (message, data) => DebugLogger.getInstance().write('ERROR', component, message, data),
  };
}
