/**
 * Core type definitions for prettyterm
 */

/** Builtin theme identifiers */
export const THEME_NAMES = ['dark', 'light', 'mono'] as const;

export type ThemeName = (typeof THEME_NAMES)[number];

/** Event levels, in increasing severity */
export const EVENT_LEVELS = ['DEBUG', 'INFO', 'SUCCESS', 'WARNING', 'ERROR'] as const;

export type EventLevel = (typeof EVENT_LEVELS)[number];

/** Style roles every builtin theme must define */
export const REQUIRED_STYLE_ROLES = [
  'accent',
  'rule',
  'success',
  'info',
  'warning',
  'error',
  'panel',
  'header',
  'table.header',
  'key',
  'value',
  'code.border',
  'event.INFO',
  'event.SUCCESS',
  'event.WARNING',
  'event.ERROR',
] as const;

export type RequiredStyleRole = (typeof REQUIRED_STYLE_ROLES)[number];

/** Event roles are `event.<LEVEL>`; levels outside EventLevel are allowed */
export type EventStyleRole = `event.${string}`;

/** A style role name. Themes are open maps, so any string is a valid role. */
export type StyleRole = RequiredStyleRole | EventStyleRole | (string & {});

/**
 * Opaque style descriptor in renderer syntax,
 * e.g. `"bold white on #3b82f6"`.
 */
export type StyleDescriptor = string;

/** Role → descriptor mapping of a resolved theme */
export type StyleMapping = Readonly<Record<string, StyleDescriptor>>;

/** Role → descriptor overrides merged on top of a theme */
export type CustomStyleOverrides = Readonly<Record<string, StyleDescriptor>>;

/** Verbosity dial: 0 silent, 1 messages, 2 events, 3 debug events */
export type VerbosityLevel = 0 | 1 | 2 | 3;

/** Category of a gated output call */
export type OutputCategory = 'MESSAGE' | 'EVENT';

/** A run of text with an optional resolved style */
export interface StyledSpan {
  text: string;
  style?: StyleDescriptor;
}

/** Border shapes for panels and tables */
export const BOX_STYLES = [
  'rounded',
  'square',
  'heavy',
  'double',
  'ascii',
  'minimal',
  'minimal_heavy',
  'minimal_double',
  'simple',
  'simple_heavy',
  'simple_head',
] as const;

export type BoxStyle = (typeof BOX_STYLES)[number];

/** Debug log configuration */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

/** Snapshot of a facade's mutable state */
export interface ConsoleStateSnapshot {
  theme: ThemeName;
  styles: StyleMapping;
  verbosity: VerbosityLevel;
  emoji: boolean;
  timestamps: boolean;
}
