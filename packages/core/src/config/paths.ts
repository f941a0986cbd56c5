/**
 * @verigate/core - Path resolution and directory management
 *
 * Resolves VERIGATE_HOME, VERIGATE_STATE_DIR, and ensures the required
 * subdirectories exist at startup.
 */

import { mkdirSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Resolve the gateway home directory.
 * Priority: VERIGATE_HOME env var > ~/.verigate
 */
export function resolveHome(): string {
  const fromEnv = process.env['VERIGATE_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.verigate');
}

/**
 * Resolve the state directory (database, logs).
 * Priority: VERIGATE_STATE_DIR env var > VERIGATE_HOME
 */
export function resolveStateDir(): string {
  const fromEnv = process.env['VERIGATE_STATE_DIR'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return resolveHome();
}

/** Standard subdirectory names */
export const SUBDIR_NAMES = {
  data: 'data',
  logs: 'logs',
} as const;

export interface GatewayPaths {
  home: string;
  stateDir: string;
  config: string; // verigate.json
  data: string;
  logs: string;
  database: string; // data/verigate.db
}

/**
 * Build the full set of gateway paths.
 * Does NOT create directories -- call `ensureDirectories` for that.
 */
export function buildPaths(): GatewayPaths {
  const home = resolveHome();
  const stateDir = resolveStateDir();
  const data = join(stateDir, SUBDIR_NAMES.data);

  return {
    home,
    stateDir,
    config: join(home, 'verigate.json'),
    data,
    logs: join(stateDir, SUBDIR_NAMES.logs),
    database: join(data, 'verigate.db'),
  };
}

/**
 * Ensure all standard directories exist.
 */
export function ensureDirectories(paths?: GatewayPaths): GatewayPaths {
  const p = paths ?? buildPaths();

  for (const dir of [p.home, p.stateDir, p.data, p.logs]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  return p;
}
