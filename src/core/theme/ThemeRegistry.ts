/**
 * Theme registry: maps a theme name plus optional overrides
 * to a fully merged style mapping.
 */

import { THEME_NAMES } from '../models/index.js';
import type { CustomStyleOverrides, StyleMapping, ThemeName } from '../models/index.js';
import { UnknownThemeError } from './errors.js';

function isThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some((name) => name === value);
}

export class ThemeRegistry {
  constructor(private readonly presets: Readonly<Record<ThemeName, StyleMapping>>) {}

  /** Builtin theme names */
  names(): readonly ThemeName[] {
    return THEME_NAMES;
  }

  /**
   * Canonical theme name for a case-insensitive identifier.
   * @throws UnknownThemeError if the name is not a preset
   */
  normalize(themeName: string): ThemeName {
    const name = themeName.trim().toLowerCase();
    if (!isThemeName(name)) {
      throw new UnknownThemeError(themeName, THEME_NAMES);
    }
    return name;
  }

  /** The unmodified preset for a theme */
  preset(themeName: string): StyleMapping {
    return this.presets[this.normalize(themeName)];
  }

  /**
   * Merge overrides on top of a preset, role by role.
   * Roles the preset does not know are added as-is.
   */
  resolve(themeName: string, overrides?: CustomStyleOverrides): StyleMapping {
    const base = this.preset(themeName);
    return Object.freeze({ ...base, ...(overrides ?? {}) });
  }
}
