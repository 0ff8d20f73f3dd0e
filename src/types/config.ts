/**
 * Peel Run Configuration Types
 * Resolved once per invocation from CLI flags and PEEL_* environment variables.
 */

import type { ExtractionMode } from '../archive/layers';

/**
 * Where the single top-level entry of an archive ends up when its name
 * differs from the archive's base name.
 */
export type SingleEntryDisposition = 'inside' | 'rename' | 'here';

export const SINGLE_ENTRY_DISPOSITIONS: readonly SingleEntryDisposition[] = [
  'inside',
  'rename',
  'here',
];

/**
 * Logging threshold. Lower numbers are chattier.
 * 10 debug, 20 info, 30 warn (default), 40 error, 50 silent.
 */
export type VerbosityLevel = 10 | 20 | 30 | 40 | 50;

export interface RunOptions {
  mode: ExtractionMode;
  recursive: boolean;
  overwrite: boolean;
  flat: boolean;
  /** False when -n was given or stdin is not a terminal */
  interactive: boolean;
  /** Permanent single-entry answer; undefined means ask (or default to inside) */
  oneEntry?: SingleEntryDisposition;
  password?: string;
  verbosity: VerbosityLevel;
  /** Maximum nesting depth followed by --recursive */
  maxDepth: number;
  /** Directory every relative input and every output is resolved against */
  workingDir: string;
}

/**
 * Environment variables (string-only constraint)
 */
export type EnvVars = Record<string, string | undefined>;

/**
 * Type guards
 */
export function isSingleEntryDisposition(value: unknown): value is SingleEntryDisposition {
  return (
    typeof value === 'string' && (SINGLE_ENTRY_DISPOSITIONS as readonly string[]).includes(value)
  );
}
