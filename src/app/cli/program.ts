/**
 * Commander program setup
 *
 * Creates the Command instance, registers global options,
 * and sets up the preAction hook that loads config and builds the console.
 */

import { createRequire } from 'node:module';
import { resolve } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod/v4';
import { ConsoleFacade } from '../../core/console/index.js';
import type { ConsoleSettingsInput } from '../../core/models/index.js';
import { loadConsoleConfig, type LoadedConsoleConfig } from '../../infra/config/index.js';
import { initDebugLogger, createLogger, setVerboseConsole } from '../../shared/utils/debug.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = z.object({ version: z.string() }).parse(require('../../../package.json'));

const log = createLogger('cli');

export type GlobalOptions = {
  theme?: string;
  verbosity?: number;
  emoji: boolean;
  timestamps: boolean;
  debug?: boolean;
};

/** Resolved cwd shared across commands via preAction hook */
export let resolvedCwd = '';

let activeConsole: ConsoleFacade | null = null;
let activeConfig: LoadedConsoleConfig | null = null;

export { cliVersion };

export const program = new Command();

function parseVerbosity(value: string): number {
  const level = Number(value);
  if (!Number.isInteger(level)) {
    throw new InvalidArgumentError('Verbosity must be an integer (0-3).');
  }
  return level;
}

program
  .name('prettyterm')
  .description('Themed, verbosity-aware terminal output')
  .version(cliVersion);

// --- Global options ---
program
  .option('--theme <name>', 'Theme to use (dark|light|mono)')
  .option('-v, --verbosity <level>', 'Verbosity 0-3 (0 silent, 2 shows events, 3 debug events)', parseVerbosity)
  .option('--no-emoji', 'Drop the glyph before success/info/warning/error lines')
  .option('--no-timestamps', 'Omit timestamps from event lines')
  .option('--debug', 'Write a debug log and mirror it to stderr');

/**
 * Merge CLI flags over loaded settings.
 * `--no-*` flags only win when they were actually given on the command line.
 */
export function applyCliOverrides(
  settings: ConsoleSettingsInput,
  opts: GlobalOptions,
  isFromCli: (name: keyof GlobalOptions) => boolean,
): ConsoleSettingsInput {
  return {
    ...settings,
    ...(opts.theme !== undefined ? { theme: opts.theme } : {}),
    ...(opts.verbosity !== undefined ? { verbosity: opts.verbosity } : {}),
    ...(isFromCli('emoji') ? { emoji: opts.emoji } : {}),
    ...(isFromCli('timestamps') ? { timestamps: opts.timestamps } : {}),
  };
}

/** Console built by the preAction hook */
export function getConsole(): ConsoleFacade {
  if (!activeConsole) {
    throw new Error('Console is not initialized; commands must run through the program.');
  }
  return activeConsole;
}

export function getLoadedConfig(): LoadedConsoleConfig {
  if (!activeConfig) {
    throw new Error('Configuration is not loaded; commands must run through the program.');
  }
  return activeConfig;
}

// Common initialization for all commands
program.hook('preAction', () => {
  resolvedCwd = resolve(process.cwd());

  const opts = program.opts<GlobalOptions>();
  const loaded = loadConsoleConfig(resolvedCwd);
  const debugRequested = opts.debug === true;
  const debugConfig = debugRequested ? { ...loaded.debug, enabled: true } : loaded.debug;

  initDebugLogger(debugConfig, resolvedCwd);
  if (debugRequested) {
    setVerboseConsole(true);
  }

  const settings = applyCliOverrides(
    loaded.settings,
    opts,
    (name) => program.getOptionValueSource(name) === 'cli',
  );
  activeConfig = { ...loaded, settings };
  activeConsole = new ConsoleFacade(settings);

  log.info('prettyterm CLI starting', {
    version: cliVersion,
    cwd: resolvedCwd,
    sources: loaded.sources,
    theme: activeConsole.theme,
    verbosity: activeConsole.verbosity,
  });
});
