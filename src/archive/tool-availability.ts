/**
 * Tool Availability
 *
 * Resolves program names to absolute paths through PATH, once per name.
 * Hits and misses are both cached for the lifetime of the instance.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface ToolResolver {
  /** Absolute path of the program, or null when it is not installed */
  resolve(program: string): string | null;
}

const WINDOWS_EXTENSIONS = ['.exe', '.cmd', '.bat', '.com'];

function isExecutableFile(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    // Missing or not executable: keep searching
    return false;
  }
}

export class ToolAvailability implements ToolResolver {
  private readonly cache = new Map<string, string | null>();

  constructor(
    private readonly searchPath: string = process.env.PATH ?? '',
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  resolve(program: string): string | null {
    const cached = this.cache.get(program);
    if (cached !== undefined) return cached;

    const found = this.search(program);
    this.cache.set(program, found);
    return found;
  }

  private search(program: string): string | null {
    if (program.includes('/') || program.includes(path.sep)) {
      return isExecutableFile(program) ? path.resolve(program) : null;
    }

    const isWindows = this.platform === 'win32';
    const delimiter = isWindows ? ';' : ':';
    const names = isWindows
      ? [program, ...WINDOWS_EXTENSIONS.map((ext) => program + ext)]
      : [program];

    for (const dir of this.searchPath.split(delimiter)) {
      if (!dir) continue;
      for (const name of names) {
        const candidate = path.join(dir, name);
        if (isExecutableFile(candidate)) return candidate;
      }
    }
    return null;
  }
}

/** The process-wide cache. Populated lazily, never invalidated. */
export const toolAvailability = new ToolAvailability();
