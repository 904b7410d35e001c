import * as os from 'os';
import * as path from 'path';
import { CratefitDirectories } from '../types/index.js';
import { CRATEFIT_DIRS, DIR_PATTERNS } from '../constants/index.js';

/**
 * Get cratefit directories using the dotfile convention.
 * Uses ~/.cratefit on all platforms (like AWS CLI with ~/.aws).
 */
export function getCratefitDirectories(homeDir: string = os.homedir()): CratefitDirectories {
  const cratefitDir = path.join(homeDir, DIR_PATTERNS.CRATEFIT);

  return {
    config: cratefitDir,
    cache: path.join(cratefitDir, CRATEFIT_DIRS.CACHE)
  };
}

/**
 * Directory holding one JSON record per crate inside a cache root.
 */
export function getCrateRecordsDir(cacheDir: string): string {
  return path.join(cacheDir, CRATEFIT_DIRS.CRATES);
}
