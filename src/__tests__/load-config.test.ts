/**
 * Tests for config file discovery, merge order and validation
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigError,
  getGlobalConfigPath,
  getProjectConfigPath,
  loadConsoleConfig,
  mergeRawConfig,
  readConfigFile,
} from '../infra/config/index.js';

describe('loadConsoleConfig', () => {
  let root: string;
  let globalDir: string;
  let projectDir: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'prettyterm-config-'));
    globalDir = join(root, 'global');
    projectDir = join(root, 'project');
    mkdirSync(globalDir, { recursive: true });
    mkdirSync(join(projectDir, '.prettyterm'), { recursive: true });
    vi.stubEnv('PRETTYTERM_CONFIG_DIR', globalDir);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(root, { recursive: true, force: true });
  });

  const writeGlobal = (content: string) => writeFileSync(getGlobalConfigPath(), content);
  const writeProject = (content: string) => writeFileSync(getProjectConfigPath(projectDir), content);

  it('should resolve paths from the config dir variable and the project', () => {
    expect(getGlobalConfigPath()).toBe(join(globalDir, 'config.yaml'));
    expect(getProjectConfigPath(projectDir)).toBe(join(projectDir, '.prettyterm', 'config.yaml'));
  });

  it('should return empty settings when no file exists', () => {
    expect(loadConsoleConfig(projectDir, {})).toEqual({ settings: {}, debug: undefined, sources: [] });
  });

  it('should layer project over global, then environment', () => {
    writeGlobal([
      'theme: light',
      'verbosity: 2',
      'custom_styles:',
      '  success: bold',
      '  key: underline',
    ].join('\n'));
    writeProject([
      'verbosity: 3',
      'custom_styles:',
      '  key: italic',
      'debug:',
      '  enabled: true',
    ].join('\n'));

    const loaded = loadConsoleConfig(projectDir, { PRETTYTERM_TIMESTAMPS: 'false' });

    expect(loaded.settings).toEqual({
      theme: 'light',
      verbosity: 3,
      timestamps: false,
      customStyles: { success: 'bold', key: 'italic' },
    });
    expect(loaded.debug).toEqual({ enabled: true });
    expect(loaded.sources).toEqual([getGlobalConfigPath(), getProjectConfigPath(projectDir)]);
  });

  it('should map snake_case keys to settings', () => {
    writeProject('enable_tracebacks: false\nemoji: false\n');
    expect(loadConsoleConfig(projectDir, {}).settings).toEqual({ enableTracebacks: false, emoji: false });
  });

  it('should report schema violations with their path', () => {
    writeProject('verbosity: high\n');
    expect(() => loadConsoleConfig(projectDir, {})).toThrow(/^Invalid configuration: verbosity: /);
  });

  it('should reject empty style descriptors', () => {
    writeProject('custom_styles:\n  success: ""\n');
    expect(() => loadConsoleConfig(projectDir, {})).toThrow(ConfigError);
  });
});

describe('readConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'prettyterm-read-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should treat missing and empty files as empty config', () => {
    expect(readConfigFile(join(dir, 'missing.yaml'))).toEqual({});
    writeFileSync(join(dir, 'empty.yaml'), '');
    expect(readConfigFile(join(dir, 'empty.yaml'))).toEqual({});
  });

  it('should reject invalid YAML', () => {
    const file = join(dir, 'broken.yaml');
    writeFileSync(file, 'theme: [unclosed\n');
    expect(() => readConfigFile(file)).toThrow(`Failed to parse ${file}`);
  });

  it('should reject a file that is not a mapping', () => {
    const file = join(dir, 'list.yaml');
    writeFileSync(file, '- a\n- b\n');
    expect(() => readConfigFile(file)).toThrow(`Config file must contain a mapping: ${file}`);
  });
});

describe('mergeRawConfig', () => {
  it('should merge custom_styles and debug key by key and replace the rest', () => {
    expect(mergeRawConfig(
      { theme: 'dark', custom_styles: { a: 'x', b: 'y' }, debug: { enabled: true } },
      { theme: 'mono', custom_styles: { b: 'z' }, debug: { log_file: '/tmp/d.log' } },
    )).toEqual({
      theme: 'mono',
      custom_styles: { a: 'x', b: 'z' },
      debug: { enabled: true, log_file: '/tmp/d.log' },
    });
  });
});
