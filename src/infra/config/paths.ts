/**
 * Path utilities for prettyterm configuration
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const CONFIG_FILE_NAME = 'config.yaml';

/** Get global config directory (~/.prettyterm or PRETTYTERM_CONFIG_DIR) */
export function getGlobalConfigDir(): string {
  return process.env.PRETTYTERM_CONFIG_DIR || join(homedir(), '.prettyterm');
}

/** Get global config file path */
export function getGlobalConfigPath(): string {
  return join(getGlobalConfigDir(), CONFIG_FILE_NAME);
}

/** Get project config directory (.prettyterm in project) */
export function getProjectConfigDir(projectDir: string): string {
  return join(resolve(projectDir), '.prettyterm');
}

/** Get project config file path */
export function getProjectConfigPath(projectDir: string): string {
  return join(getProjectConfigDir(projectDir), CONFIG_FILE_NAME);
}
