#!/usr/bin/env node

/**
 * prettyterm CLI entry point
 *
 * Import order matters: program setup → commands → parse.
 */

import { program } from './program.js';
import './commands.js';
import { ConfigError } from '../../infra/config/index.js';
import { UnknownThemeError } from '../../core/theme/index.js';
import { getErrorMessage } from '../../shared/utils/error.js';
import { EXIT_CONFIG_ERROR, EXIT_GENERAL_ERROR, EXIT_SIGINT } from '../../exitCodes.js';

process.on('SIGINT', () => {
  process.exit(EXIT_SIGINT);
});

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`prettyterm: ${getErrorMessage(err)}\n`);
  const configFailure = err instanceof ConfigError || err instanceof UnknownThemeError;
  process.exit(configFailure ? EXIT_CONFIG_ERROR : EXIT_GENERAL_ERROR);
});
