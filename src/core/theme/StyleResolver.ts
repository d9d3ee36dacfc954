/**
 * Style resolution against an active mapping.
 *
 * Lookup order:
 * 1. explicit per-call override (non-empty)
 * 2. exact role in the mapping
 * 3. for `event.<LEVEL>` roles only, the `info` role
 */

import type { EventStyleRole, StyleDescriptor, StyleMapping, StyleRole } from '../models/index.js';
import { MissingStyleRoleError } from './errors.js';

const EVENT_ROLE_PREFIX = 'event.';
const EVENT_FALLBACK_ROLE = 'info';

/** Build the style role for an event level (`event.WARNING`) */
export function eventRole(level: string): EventStyleRole {
  return `${EVENT_ROLE_PREFIX}${level.toUpperCase()}`;
}

export function isEventRole(role: string): role is EventStyleRole {
  return role.startsWith(EVENT_ROLE_PREFIX);
}

export class StyleResolver {
  constructor(
    private readonly styles: StyleMapping,
    private readonly themeName: string,
  ) {}

  resolve(role: StyleRole, explicitOverride?: StyleDescriptor): StyleDescriptor {
    if (explicitOverride) {
      return explicitOverride;
    }

    const exact = this.styles[role];
    if (exact !== undefined) {
      return exact;
    }

    if (isEventRole(role)) {
      const fallback = this.styles[EVENT_FALLBACK_ROLE];
      if (fallback !== undefined) {
        return fallback;
      }
    }

    throw new MissingStyleRoleError(role, this.themeName);
  }
}
