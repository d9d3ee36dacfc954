/**
 * Zod schemas for theme files, console settings and config files
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';
import { clampVerbosity } from '../verbosity/VerbosityGate.js';
import { REQUIRED_STYLE_ROLES } from './types.js';

/** Role → descriptor map; descriptors must be non-empty */
export const StyleOverridesSchema = z.record(z.string(), z.string().min(1));

/**
 * Builtin theme file schema.
 * Extra roles are allowed; every required role must be present.
 */
export const ThemeStylesSchema = StyleOverridesSchema.superRefine((styles, ctx) => {
  for (const role of REQUIRED_STYLE_ROLES) {
    if (!(role in styles)) {
      ctx.addIssue({
        code: 'custom',
        message: `missing style role '${role}'`,
        path: [role],
      });
    }
  }
});

/** Console construction settings (plain-data part of ConsoleOptions) */
export const ConsoleSettingsSchema = z.object({
  theme: z.string().default('dark'),
  emoji: z.boolean().default(true),
  timestamps: z.boolean().default(true),
  /** Any number, NaN and infinities included; clamped into 0..3 */
  verbosity: z
    .custom<number>((value) => typeof value === 'number', { message: 'verbosity must be a number' })
    .default(1)
    .transform(clampVerbosity),
  enableTracebacks: z.boolean().default(true),
  customStyles: StyleOverridesSchema.optional(),
});

/** Debug logging section of a config file */
export const DebugConfigFileSchema = z.object({
  enabled: z.boolean().default(false),
  log_file: z.string().optional(),
});

/** On-disk config file (config.yaml), snake_case keys */
export const ConsoleConfigFileSchema = z.object({
  theme: z.string().optional(),
  emoji: z.boolean().optional(),
  timestamps: z.boolean().optional(),
  verbosity: z.number().optional(),
  enable_tracebacks: z.boolean().optional(),
  custom_styles: StyleOverridesSchema.optional(),
  debug: DebugConfigFileSchema.optional(),
});

export type ConsoleSettings = z.infer<typeof ConsoleSettingsSchema>;
export type ConsoleSettingsInput = z.input<typeof ConsoleSettingsSchema>;
export type ConsoleConfigFile = z.infer<typeof ConsoleConfigFileSchema>;
