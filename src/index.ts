/**
 * prettyterm - themed, verbosity-aware terminal output
 *
 * This module exports the public API for programmatic usage.
 */

import { ConsoleFacade, type ConsoleOptions } from './core/console/index.js';

// Models
export * from './core/models/index.js';

// Console
export * from './core/console/index.js';
export * from './core/theme/index.js';
export * from './core/verbosity/index.js';
export * from './core/progress/index.js';

// Rendering, input and tracebacks
export * from './infra/renderer/index.js';
export * from './infra/traceback/index.js';
export * from './shared/prompt/index.js';

// Configuration
export * from './infra/config/index.js';
export { loadBuiltinThemes, getBuiltinThemesDir } from './infra/resources/index.js';

// Utilities
export { maskSecret } from './shared/utils/mask.js';
export { getErrorMessage } from './shared/utils/error.js';
export {
  createLogger,
  initDebugLogger,
  resetDebugLogger,
  setVerboseConsole,
  isDebugEnabled,
  getDebugLogFile,
  type ComponentLogger,
  type DebugLogLevel,
} from './shared/utils/debug.js';

/** Shorthand for `new ConsoleFacade(options)` */
export function createConsole(options: ConsoleOptions = {}): ConsoleFacade {
  return new ConsoleFacade(options);
}
