/**
 * Errors raised while resolving themes and style roles.
 */

/** Thrown when a theme identifier is not one of the builtin presets */
export class UnknownThemeError extends Error {
  readonly code = 'UNKNOWN_THEME';

  constructor(
    readonly theme: string,
    readonly validThemes: readonly string[],
  ) {
    super(`Unknown theme '${theme}'. Choose from: ${validThemes.join(', ')}`);
    this.name = 'UnknownThemeError';
  }
}

/**
 * Thrown when a non-event role has no override and no entry in the
 * active mapping. Builtin themes never trigger it; custom roles can.
 */
export class MissingStyleRoleError extends Error {
  readonly code = 'MISSING_STYLE_ROLE';

  constructor(
    readonly role: string,
    readonly theme: string,
  ) {
    super(`Style role '${role}' is not defined by theme '${theme}'`);
    this.name = 'MissingStyleRoleError';
  }
}
