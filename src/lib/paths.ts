import { homedir } from 'os';
import { join } from 'path';

// topusers home directory (can be overridden for testing)
export const TOPUSERS_HOME = process.env.TOPUSERS_HOME || join(homedir(), '.topusers');

// Config files
export const CONFIG_DIR = TOPUSERS_HOME;
export const CONFIG_FILE = join(CONFIG_DIR, 'config.toml');

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? homedir() + path.slice(1) : path;
}
