/**
 * Tests for debug logging utilities
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readFileSync, mkdtempSync, rmSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  createLogger,
  getDebugLogFile,
  initDebugLogger,
  isDebugEnabled,
  resetDebugLogger,
  setVerboseConsole,
} from '../shared/utils/debug.js';

describe('debug logging', () => {
  let projectDir: string;

  beforeEach(() => {
    resetDebugLogger();
    projectDir = mkdtempSync(join(tmpdir(), 'prettyterm-debug-'));
  });

  afterEach(() => {
    resetDebugLogger();
    vi.restoreAllMocks();
    rmSync(projectDir, { recursive: true, force: true });
  });

  describe('initDebugLogger', () => {
    it('should not enable debug when config is undefined', () => {
      initDebugLogger(undefined, projectDir);
      expect(isDebugEnabled()).toBe(false);
      expect(getDebugLogFile()).toBeNull();
    });

    it('should not enable debug when enabled is false', () => {
      initDebugLogger({ enabled: false }, projectDir);
      expect(isDebugEnabled()).toBe(false);
    });

    it('should write the log under the project .prettyterm/logs directory', () => {
      initDebugLogger({ enabled: true }, projectDir);

      const logFile = getDebugLogFile();
      expect(logFile).not.toBeNull();
      if (logFile) {
        expect(dirname(logFile)).toBe(join(projectDir, '.prettyterm', 'logs'));
        expect(existsSync(logFile)).toBe(true);
        expect(readFileSync(logFile, 'utf-8')).toContain('prettyterm debug log');
      }
    });

    it('should honour an explicit log file', () => {
      const logFile = join(projectDir, 'nested', 'custom.log');
      initDebugLogger({ enabled: true, logFile }, projectDir);
      expect(getDebugLogFile()).toBe(logFile);
      expect(existsSync(logFile)).toBe(true);
    });

    it('should ignore later calls until reset', () => {
      initDebugLogger({ enabled: false }, projectDir);
      initDebugLogger({ enabled: true }, projectDir);
      expect(isDebugEnabled()).toBe(false);
    });
  });

  describe('createLogger', () => {
    it('should append component lines with data to the log file', () => {
      const logFile = join(projectDir, 'debug.log');
      initDebugLogger({ enabled: true, logFile }, projectDir);

      const log = createLogger('console');
      log.debug('Theme changed', { from: 'dark', to: 'light' });
      log.error('Render failed');

      const content = readFileSync(logFile, 'utf-8');
      expect(content).toMatch(/\[DEBUG\] \[console\] Theme changed\n\{\n {2}"from": "dark",\n {2}"to": "light"\n\}/);
      expect(content).toMatch(/\[ERROR\] \[console\] Render failed\n/);
    });

    it('should write nothing when disabled', () => {
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      createLogger('console').info('quiet');
      expect(stderrSpy).not.toHaveBeenCalled();
    });

    it('should mirror lines to stderr in verbose mode', () => {
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setVerboseConsole(true);

      createLogger('config').warn('Fallback used');

      expect(stderrSpy).toHaveBeenCalledTimes(1);
      expect(stderrSpy.mock.calls[0]?.[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[WARN\] \[config\] Fallback used\n$/);
    });
  });
});
