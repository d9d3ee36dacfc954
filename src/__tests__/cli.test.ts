/**
 * Tests for CLI option handling and the mask command
 */

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { applyCliOverrides, getConsole, program } from '../app/cli/program.js';
import '../app/cli/commands.js';
import { uninstallTracebackHandler } from '../infra/traceback/index.js';
import { resetDebugLogger } from '../shared/utils/debug.js';
import { stripAnsi } from '../shared/utils/text.js';

describe('applyCliOverrides', () => {
  const defaults = { emoji: true, timestamps: true };

  it('should keep loaded settings when no flag is given', () => {
    expect(applyCliOverrides({ theme: 'light', emoji: false, verbosity: 2 }, defaults, () => false))
      .toEqual({ theme: 'light', emoji: false, verbosity: 2 });
  });

  it('should let explicit flags win', () => {
    const settings = applyCliOverrides(
      { theme: 'light', timestamps: true, verbosity: 2 },
      { theme: 'mono', verbosity: 3, emoji: true, timestamps: false },
      (name) => name === 'timestamps',
    );
    expect(settings).toEqual({ theme: 'mono', timestamps: false, verbosity: 3 });
  });
});

describe('prettyterm program', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'prettyterm-cli-'));
    vi.stubEnv('PRETTYTERM_CONFIG_DIR', configDir);
    resetDebugLogger();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    uninstallTracebackHandler();
    resetDebugLogger();
    rmSync(configDir, { recursive: true, force: true });
  });

  it('should refuse console access before a command runs', () => {
    expect(() => getConsole()).toThrow('Console is not initialized');
  });

  it('should register the subcommands', () => {
    expect(program.commands.map((command) => command.name())).toEqual(['demo', 'themes', 'mask', 'config']);
  });

  it('should mask a value with the global options applied', async () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await program.parseAsync(['node', 'prettyterm', '--theme', 'mono', '--verbosity', '2', 'mask', 'hunter2', '--keep', '2']);

    const written = stdoutSpy.mock.calls.map((call) => String(call[0])).join('');
    expect(stripAnsi(written)).toBe('secret: hu*****\n');
    expect(getConsole().theme).toBe('mono');
    expect(getConsole().verbosity).toBe(2);
  });
});
