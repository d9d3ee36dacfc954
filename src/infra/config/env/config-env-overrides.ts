/**
 * PRETTYTERM_* environment overrides for config files.
 *
 * Variable names are generated from snake_case config paths:
 * `debug.log_file` → `PRETTYTERM_DEBUG_LOG_FILE`.
 */

import { ConfigError } from '../errors.js';

type EnvValueType = 'string' | 'boolean' | 'number' | 'json';

interface EnvSpec {
  path: string;
  type: EnvValueType;
}

const ENV_PREFIX = 'PRETTYTERM';

function normalizeEnvSegment(segment: string): string {
  return segment
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toUpperCase();
}

export function envVarNameFromPath(path: string): string {
  const key = path
    .split('.')
    .map(normalizeEnvSegment)
    .filter((segment) => segment.length > 0)
    .join('_');
  return `${ENV_PREFIX}_${key}`;
}

function parseEnvValue(envKey: string, raw: string, type: EnvValueType): unknown {
  switch (type) {
    case 'string':
      return raw;
    case 'boolean': {
      const normalized = raw.trim().toLowerCase();
      if (normalized === 'true' || normalized === '1') return true;
      if (normalized === 'false' || normalized === '0') return false;
      throw new ConfigError(`${envKey} must be one of: true, false`);
    }
    case 'number': {
      const value = Number(raw.trim());
      if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new ConfigError(`${envKey} must be a number`);
      }
      return value;
    }
    case 'json':
      try {
        return JSON.parse(raw);
      } catch {
        throw new ConfigError(`${envKey} must be valid JSON`);
      }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNested(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const leaf = parts.pop();
  if (!leaf) return;

  let current = target;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = value;
}

const CONSOLE_ENV_SPECS: readonly EnvSpec[] = [
  { path: 'theme', type: 'string' },
  { path: 'emoji', type: 'boolean' },
  { path: 'timestamps', type: 'boolean' },
  { path: 'verbosity', type: 'number' },
  { path: 'enable_tracebacks', type: 'boolean' },
  { path: 'custom_styles', type: 'json' },
  { path: 'debug', type: 'json' },
  { path: 'debug.enabled', type: 'boolean' },
  { path: 'debug.log_file', type: 'string' },
];

/** Apply PRETTYTERM_* variables to a raw (snake_case) config object */
export function applyConsoleConfigEnvOverrides(
  target: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): void {
  for (const spec of CONSOLE_ENV_SPECS) {
    const envKey = envVarNameFromPath(spec.path);
    const raw = env[envKey];
    if (raw === undefined) continue;
    setNested(target, spec.path, parseEnvValue(envKey, raw, spec.type));
  }
}
