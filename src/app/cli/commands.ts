/**
 * CLI subcommand definitions
 *
 * Registers all named subcommands (demo, themes, mask, config).
 */

import { InvalidArgumentError } from 'commander';
import { ThemeRegistry } from '../../core/theme/index.js';
import { loadBuiltinThemes } from '../../infra/resources/index.js';
import { runDemo } from '../../features/demo/index.js';
import { showThemeSwatches, showThemeTable } from '../../features/themes/index.js';
import { showConfig } from '../../features/config/index.js';
import { program, getConsole, getLoadedConfig } from './program.js';

function parseKeep(value: string): number {
  const keep = Number(value);
  if (!Number.isInteger(keep) || keep < 0) {
    throw new InvalidArgumentError('Keep must be a non-negative integer.');
  }
  return keep;
}

program
  .command('demo')
  .description('Walk through every output feature')
  .option('--no-prompts', 'Skip the interactive prompt section')
  .action(async (opts: { prompts: boolean }) => {
    await runDemo(getConsole(), { interactive: opts.prompts ? undefined : false });
  });

program
  .command('themes')
  .description('List builtin themes, or show the swatches of one')
  .argument('[name]', 'Theme to preview')
  .action((name?: string) => {
    const cu = getConsole();
    if (name) {
      cu.setTheme(name);
    } else {
      showThemeTable(cu, new ThemeRegistry(loadBuiltinThemes()));
    }
    showThemeSwatches(cu);
  });

program
  .command('mask')
  .description('Print a value with all but its first characters masked')
  .argument('<value>', 'Secret value')
  .option('-k, --keep <n>', 'Characters to leave visible', parseKeep, 3)
  .option('-c, --char <char>', 'Mask character', '*')
  .option('--key <name>', 'Label printed before the value', 'secret')
  .action((value: string, opts: { keep: number; char: string; key: string }) => {
    getConsole().keyValue(opts.key, value, { secret: true, keep: opts.keep, mask: opts.char });
  });

program
  .command('config')
  .description('Show the effective configuration and where it came from')
  .action(() => {
    showConfig(getConsole(), getLoadedConfig());
  });
