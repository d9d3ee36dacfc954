/**
 * Console configuration loader.
 *
 * Sources, lowest precedence first:
 * 1. ~/.prettyterm/config.yaml (or $PRETTYTERM_CONFIG_DIR/config.yaml)
 * 2. <project>/.prettyterm/config.yaml
 * 3. PRETTYTERM_* environment variables
 *
 * Example config.yaml:
 *   theme: light
 *   verbosity: 2
 *   timestamps: false
 *   custom_styles:
 *     success: "bold #22c55e"
 *   debug:
 *     enabled: true
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { ConsoleConfigFileSchema } from '../../core/models/index.js';
import type { ConsoleSettingsInput, DebugConfig } from '../../core/models/index.js';
import { createLogger } from '../../shared/utils/debug.js';
import { getErrorMessage } from '../../shared/utils/error.js';
import { applyConsoleConfigEnvOverrides } from './env/config-env-overrides.js';
import { ConfigError } from './errors.js';
import { getGlobalConfigPath, getProjectConfigPath } from './paths.js';

const log = createLogger('config');

export interface LoadedConsoleConfig {
  /** Settings ready to pass to ConsoleFacade */
  settings: ConsoleSettingsInput;
  debug?: DebugConfig;
  /** Config files that existed and were read */
  sources: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a YAML config file; a missing or empty file yields {} */
export function readConfigFile(filePath: string): Record<string, unknown> {
  if (!existsSync(filePath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${filePath}: ${getErrorMessage(err)}`, { cause: err });
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/** Merge two raw configs; `custom_styles` and `debug` merge key by key */
export function mergeRawConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base, ...override };
  for (const key of ['custom_styles', 'debug']) {
    const baseSection = base[key];
    const overrideSection = override[key];
    if (isRecord(baseSection) && isRecord(overrideSection)) {
      merged[key] = { ...baseSection, ...overrideSection };
    }
  }
  return merged;
}

export function loadConsoleConfig(projectDir: string, env: NodeJS.ProcessEnv = process.env): LoadedConsoleConfig {
  const sources: string[] = [];
  let raw: Record<string, unknown> = {};

  for (const filePath of [getGlobalConfigPath(), getProjectConfigPath(projectDir)]) {
    if (existsSync(filePath)) {
      raw = mergeRawConfig(raw, readConfigFile(filePath));
      sources.push(filePath);
    }
  }
  applyConsoleConfigEnvOverrides(raw, env);

  const result = ConsoleConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const config = result.data;
  log.debug('Loaded console config', { sources, theme: config.theme, verbosity: config.verbosity });

  return {
    settings: {
      theme: config.theme,
      emoji: config.emoji,
      timestamps: config.timestamps,
      verbosity: config.verbosity,
      enableTracebacks: config.enable_tracebacks,
      customStyles: config.custom_styles,
    },
    debug: config.debug ? { enabled: config.debug.enabled, logFile: config.debug.log_file } : undefined,
    sources,
  };
}
