/**
 * Embedded resources for prettyterm
 *
 * Resources are organized into:
 * - builtins/themes/ - Builtin theme presets, one YAML file per theme
 */

import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { ThemeStylesSchema } from '../../core/models/index.js';
import type { StyleMapping, ThemeName } from '../../core/models/index.js';

/**
 * Get the resources directory path
 * Supports both development (src/) and production (dist/) environments
 */
export function getResourcesDir(): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  // From src/infra/resources or dist/infra/resources, go up to project root then into builtins/
  return join(currentDir, '..', '..', '..', 'builtins');
}

/** Get the builtin themes directory (builtins/themes) */
export function getBuiltinThemesDir(): string {
  return join(getResourcesDir(), 'themes');
}

/**
 * Load and validate a builtin theme file.
 * A theme missing a required role fails here, not at render time.
 */
export function loadBuiltinTheme(name: ThemeName, themesDir = getBuiltinThemesDir()): StyleMapping {
  const filePath = join(themesDir, `${name}.yaml`);
  const raw: unknown = parseYaml(readFileSync(filePath, 'utf-8'));
  const parsed = ThemeStylesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Invalid builtin theme '${name}' (${filePath}): ${issues}`);
  }
  return Object.freeze({ ...parsed.data });
}

let builtinThemes: Readonly<Record<ThemeName, StyleMapping>> | null = null;

/** All builtin themes, loaded once per process and frozen */
export function loadBuiltinThemes(): Readonly<Record<ThemeName, StyleMapping>> {
  if (!builtinThemes) {
    const themes: Record<ThemeName, StyleMapping> = {
      dark: loadBuiltinTheme('dark'),
      light: loadBuiltinTheme('light'),
      mono: loadBuiltinTheme('mono'),
    };
    builtinThemes = Object.freeze(themes);
  }
  return builtinThemes;
}
