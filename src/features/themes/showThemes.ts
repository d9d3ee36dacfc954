/**
 * Theme listing and swatches for the `themes` command
 */

import type { ConsoleFacade } from '../../core/console/index.js';
import { REQUIRED_STYLE_ROLES, type StyledSpan } from '../../core/models/index.js';
import type { ThemeRegistry } from '../../core/theme/index.js';

/** Table of every required role and its descriptor in each builtin theme */
export function showThemeTable(cu: ConsoleFacade, registry: ThemeRegistry): void {
  const names = registry.names();
  const rows = REQUIRED_STYLE_ROLES.map((role) => [
    role,
    ...names.map((name) => registry.preset(name)[role] ?? ''),
  ]);
  cu.table(['Role', ...names], rows, { title: 'Builtin themes' });
}

/** Each role of the active theme, drawn in its own style */
export function showThemeSwatches(cu: ConsoleFacade): void {
  const spans: StyledSpan[] = [];
  Object.keys(cu.styles).forEach((role, index) => {
    if (index > 0) {
      spans.push({ text: '\n' });
    }
    spans.push({ text: role, style: cu.style(role) });
  });
  cu.panel(spans, { title: `Theme: ${cu.theme}` });
}
