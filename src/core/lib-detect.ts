/**
 * liblz4 discovery
 *
 * Searches the usual shared-library directories (distro lib dirs, Homebrew,
 * Termux) plus the working directory for a copy of liblz4, so the CLI can
 * report a concrete path instead of relying on the loader's search order.
 */

import { existsSync, statSync } from 'fs';
import { join } from 'path';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LIB_NAMES = [
  'liblz4.so.1',
  'liblz4.so',
  'liblz4.1.dylib',
  'liblz4.dylib',
  'liblz4.dll',
];

const SYSTEM_LIB_DIRS = [
  '/usr/lib',
  '/usr/lib64',
  '/usr/local/lib',
  '/usr/lib/x86_64-linux-gnu',
  '/usr/lib/aarch64-linux-gnu',
  '/lib/x86_64-linux-gnu',
  '/lib/aarch64-linux-gnu',
  '/opt/homebrew/lib',
  '/data/data/com.termux/files/usr/lib',
];

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Safely check whether `p` exists and is a regular file.
 */
function isFile(p: string): boolean {
  try {
    return existsSync(p) && statSync(p).isFile();
  } catch {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Directories to search, most specific first: an explicit override, the
 * working directory and its `lib/` folder, `$PREFIX/lib` (Termux sets
 * PREFIX), then the system directories.
 */
export function lz4SearchDirs(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
  const dirs = [cwd, join(cwd, 'lib')];
  if (env.PREFIX) dirs.push(join(env.PREFIX, 'lib'));
  if (env.LZ4_LIB_DIR) dirs.unshift(env.LZ4_LIB_DIR);
  return [...dirs, ...SYSTEM_LIB_DIRS];
}

/**
 * Search for liblz4 in the given directories.
 *
 * @returns Absolute paths where a library file was found, in search order.
 */
export function findLz4Candidates(dirs: string[] = lz4SearchDirs()): string[] {
  const found: string[] = [];
  const seen = new Set<string>();

  for (const dir of dirs) {
    for (const name of LIB_NAMES) {
      const p = join(dir, name);
      if (seen.has(p)) continue;
      seen.add(p);
      if (isFile(p)) found.push(p);
    }
  }

  return found;
}
