/**
 * Permission Normalizer
 *
 * Gives the owner read and write access to everything an extraction
 * produced (plus search access on directories). Group and other bits are
 * left exactly as the archive set them. Symlinks are not followed.
 */

import { type Stats, promises as fs } from 'fs';
import * as path from 'path';
import type { PermissionWarning } from '../errors/archive-errors';

const OWNER_DIRECTORY_BITS = 0o700;
const OWNER_FILE_BITS = 0o600;

function warningFor(target: string, error: unknown): PermissionWarning {
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'permission', path: target, message };
}

async function widen(
  target: string,
  mode: number,
  bits: number
): Promise<PermissionWarning | null> {
  const current = mode & 0o7777;
  if ((current & bits) === bits) return null;
  try {
    await fs.chmod(target, current | bits);
    return null;
  } catch (error) {
    return warningFor(target, error);
  }
}

/**
 * Normalize `root` and everything below it.
 * Never throws: every failure comes back as a warning.
 */
export async function normalizePermissions(root: string): Promise<PermissionWarning[]> {
  const warnings: PermissionWarning[] = [];
  const pending: string[] = [root];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;

    let stats: Stats;
    try {
      stats = await fs.lstat(current);
    } catch (error) {
      warnings.push(warningFor(current, error));
      continue;
    }
    if (stats.isSymbolicLink()) continue;

    if (stats.isDirectory()) {
      // Directories are opened up first so their children can be reached.
      const warning = await widen(current, stats.mode, OWNER_DIRECTORY_BITS);
      if (warning) warnings.push(warning);
      try {
        const children = await fs.readdir(current);
        for (const child of children) pending.push(path.join(current, child));
      } catch (error) {
        warnings.push(warningFor(current, error));
      }
    } else {
      const warning = await widen(current, stats.mode, OWNER_FILE_BITS);
      if (warning) warnings.push(warning);
    }
  }

  return warnings;
}
