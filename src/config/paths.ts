/**
 * Centralized Path Definitions
 *
 * ~/.docent/            (or $DOCENT_HOME)
 * ├── docent.db         SQLite database
 * └── config.toml       user configuration
 *
 * Resolved on each call so tests can point DOCENT_HOME at a temp dir.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export function getDocentDir(): string {
  const override = process.env.DOCENT_HOME?.trim();
  return override ? override : join(homedir(), '.docent');
}

export function getDbPath(): string {
  return join(getDocentDir(), 'docent.db');
}

export function getConfigPath(): string {
  return join(getDocentDir(), 'config.toml');
}
