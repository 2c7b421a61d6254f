import { join } from 'node:path';
import { homedir } from 'node:os';

export const APP_DIR_NAME = 'pawplan';
export const HOUSEHOLD_FILE = 'household.json';
export const FILE_ENV_VAR = 'PAWPLAN_FILE';

/** Returns the platform-appropriate data directory */
export function getDataDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', APP_DIR_NAME);
  }
  if (platform === 'win32') {
    return join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR_NAME);
  }
  // Linux / other
  return join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR_NAME);
}

/** Returns the platform-appropriate default household file path */
export function getDefaultHouseholdPath(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  return join(getDataDir(env, platform), HOUSEHOLD_FILE);
}

/**
 * Resolve the household file.
 * Priority: explicit --file > PAWPLAN_FILE > platform data directory.
 */
export function resolveHouseholdPath(explicit: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return explicit;
  const fromEnv = env[FILE_ENV_VAR];
  if (fromEnv) return fromEnv;
  return getDefaultHouseholdPath(env);
}
