/**
 * Effective configuration view for the `config` command
 */

import type { ConsoleFacade } from '../../core/console/index.js';
import type { LoadedConsoleConfig } from '../../infra/config/index.js';
import { getDebugLogFile, isDebugEnabled } from '../../shared/utils/debug.js';

export function showConfig(cu: ConsoleFacade, loaded: LoadedConsoleConfig): void {
  const state = cu.snapshot();
  cu.dictionary({
    theme: state.theme,
    verbosity: state.verbosity,
    emoji: state.emoji,
    timestamps: state.timestamps,
    custom_styles: loaded.settings.customStyles ?? {},
    debug: isDebugEnabled(),
    debug_log: getDebugLogFile() ?? '-',
  }, { title: 'Effective configuration' });

  if (loaded.sources.length === 0) {
    cu.info('No config files found; using defaults and environment.');
    return;
  }
  for (const source of loaded.sources) {
    cu.keyValue('source', source);
  }
}
