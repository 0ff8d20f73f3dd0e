/**
 * Version Command Handler
 *
 * Handle --version command for peel.
 */

import * as fs from 'fs';
import * as path from 'path';

let cachedVersion: string | undefined;

/** Version from package.json, two levels above both src/commands and dist/commands */
export function getVersion(): string {
  if (cachedVersion !== undefined) return cachedVersion;
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, '../../package.json'), 'utf8')
    );
    const version =
      typeof raw === 'object' && raw !== null && 'version' in raw ? raw.version : undefined;
    cachedVersion = typeof version === 'string' ? version : 'unknown';
  } catch {
    cachedVersion = 'unknown';
  }
  return cachedVersion;
}

/**
 * Handle version command
 */
export function handleVersionCommand(): void {
  console.log(`peel ${getVersion()}`);
}
