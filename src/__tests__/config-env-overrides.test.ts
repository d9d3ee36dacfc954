import { describe, expect, it } from 'vitest';
import { ConfigError, applyConsoleConfigEnvOverrides, envVarNameFromPath } from '../infra/config/index.js';

describe('config env overrides', () => {
  it('should convert dotted and camelCase paths to PRETTYTERM env variable names', () => {
    expect(envVarNameFromPath('theme')).toBe('PRETTYTERM_THEME');
    expect(envVarNameFromPath('debug.log_file')).toBe('PRETTYTERM_DEBUG_LOG_FILE');
    expect(envVarNameFromPath('enableTracebacks')).toBe('PRETTYTERM_ENABLE_TRACEBACKS');
  });

  it('should apply typed values from generated env names', () => {
    const raw: Record<string, unknown> = { theme: 'dark' };
    applyConsoleConfigEnvOverrides(raw, {
      PRETTYTERM_THEME: 'mono',
      PRETTYTERM_EMOJI: 'false',
      PRETTYTERM_TIMESTAMPS: '1',
      PRETTYTERM_VERBOSITY: '3',
      PRETTYTERM_CUSTOM_STYLES: '{"success":"bold"}',
    });

    expect(raw).toEqual({
      theme: 'mono',
      emoji: false,
      timestamps: true,
      verbosity: 3,
      custom_styles: { success: 'bold' },
    });
  });

  it('should merge nested debug keys into an existing section', () => {
    const raw: Record<string, unknown> = { debug: { enabled: false, log_file: '/tmp/a.log' } };
    applyConsoleConfigEnvOverrides(raw, { PRETTYTERM_DEBUG_ENABLED: 'true' });
    expect(raw.debug).toEqual({ enabled: true, log_file: '/tmp/a.log' });
  });

  it('should leave the config alone without variables', () => {
    const raw: Record<string, unknown> = { verbosity: 2 };
    applyConsoleConfigEnvOverrides(raw, {});
    expect(raw).toEqual({ verbosity: 2 });
  });

  it('should reject malformed values', () => {
    expect(() => applyConsoleConfigEnvOverrides({}, { PRETTYTERM_VERBOSITY: 'loud' }))
      .toThrow('PRETTYTERM_VERBOSITY must be a number');
    expect(() => applyConsoleConfigEnvOverrides({}, { PRETTYTERM_EMOJI: 'maybe' }))
      .toThrow(ConfigError);
    expect(() => applyConsoleConfigEnvOverrides({}, { PRETTYTERM_CUSTOM_STYLES: '{oops' }))
      .toThrow('PRETTYTERM_CUSTOM_STYLES must be valid JSON');
  });
});
