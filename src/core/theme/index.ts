export { ThemeRegistry } from './ThemeRegistry.js';
export { StyleResolver, eventRole, isEventRole } from './StyleResolver.js';
export { UnknownThemeError, MissingStyleRoleError } from './errors.js';
