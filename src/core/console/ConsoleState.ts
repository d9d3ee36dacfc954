/**
 * Per-facade console state.
 *
 * Only two transitions exist: setTheme and setVerbosity. Each one either
 * applies completely or leaves the state untouched.
 */

import type {
  ConsoleStateSnapshot,
  CustomStyleOverrides,
  StyleMapping,
  ThemeName,
  VerbosityLevel,
} from '../models/index.js';
import { StyleResolver, type ThemeRegistry } from '../theme/index.js';
import { clampVerbosity } from '../verbosity/index.js';

export interface ConsoleStateInit {
  theme: string;
  customStyles?: CustomStyleOverrides;
  verbosity: number;
  emoji: boolean;
  timestamps: boolean;
}

export class ConsoleState {
  private themeName: ThemeName;
  private styleMapping: StyleMapping;
  private resolver: StyleResolver;
  private level: VerbosityLevel;
  readonly emoji: boolean;
  readonly timestamps: boolean;

  /** @throws UnknownThemeError */
  constructor(
    private readonly registry: ThemeRegistry,
    init: ConsoleStateInit,
  ) {
    this.themeName = registry.normalize(init.theme);
    this.styleMapping = registry.resolve(this.themeName, init.customStyles);
    this.resolver = new StyleResolver(this.styleMapping, this.themeName);
    this.level = clampVerbosity(init.verbosity);
    this.emoji = init.emoji;
    this.timestamps = init.timestamps;
  }

  get theme(): ThemeName {
    return this.themeName;
  }

  get styles(): StyleMapping {
    return this.styleMapping;
  }

  get verbosity(): VerbosityLevel {
    return this.level;
  }

  get styleResolver(): StyleResolver {
    return this.resolver;
  }

  /**
   * Switch theme. Everything is resolved before any field is assigned,
   * so an unknown name leaves the previous theme active.
   * @throws UnknownThemeError
   */
  setTheme(theme: string, customStyles?: CustomStyleOverrides): void {
    const name = this.registry.normalize(theme);
    const styles = this.registry.resolve(name, customStyles);
    const resolver = new StyleResolver(styles, name);

    this.themeName = name;
    this.styleMapping = styles;
    this.resolver = resolver;
  }

  /** Set verbosity, clamped into 0..3 */
  setVerbosity(level: number): VerbosityLevel {
    this.level = clampVerbosity(level);
    return this.level;
  }

  snapshot(): ConsoleStateSnapshot {
    return {
      theme: this.themeName,
      styles: this.styleMapping,
      verbosity: this.level,
      emoji: this.emoji,
      timestamps: this.timestamps,
    };
  }
}
