/**
 * Run Options Resolution
 *
 * Turns parsed command-line flags and PEEL_* environment variables into the
 * immutable RunOptions value every component receives. Flags win over the
 * environment; a malformed environment value is a usage error, not ignored.
 */

import { UsageError } from '../errors/archive-errors';
import type { ExtractionMode } from '../archive/layers';
import {
  type EnvVars,
  type RunOptions,
  type SingleEntryDisposition,
  SINGLE_ENTRY_DISPOSITIONS,
  isSingleEntryDisposition,
} from '../types/config';
import { verbosityFromCounts } from '../utils/logger';

export const DEFAULT_MAX_DEPTH = 8;

export const ENV_NONINTERACTIVE = 'PEEL_NONINTERACTIVE';
export const ENV_ONE_ENTRY = 'PEEL_ONE_ENTRY';
export const ENV_PASSWORD = 'PEEL_PASSWORD';
export const ENV_MAX_DEPTH = 'PEEL_MAX_DEPTH';

/** Flags as parsed from argv, before environment defaults apply */
export interface CliFlags {
  mode: ExtractionMode;
  recursive: boolean;
  overwrite: boolean;
  flat: boolean;
  noninteractive: boolean;
  /** Raw --one value, validated here */
  oneEntry?: string;
  password?: string;
  verbose: number;
  quiet: number;
}

export interface ResolveContext {
  env: EnvVars;
  stdinIsTTY: boolean;
  cwd: string;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);
const FALSY = new Set(['', '0', 'false', 'no', 'off']);

function parseBooleanEnv(name: string, value: string | undefined): boolean {
  if (value === undefined) return false;
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  throw new UsageError(`${name} must be 1 or 0, got "${value}"`);
}

/** A disposition, or any prefix that names only one ("h" for here) */
export function parseOneEntry(value: string, source: string): SingleEntryDisposition {
  const normalized = value.trim().toLowerCase();
  if (isSingleEntryDisposition(normalized)) return normalized;
  const matches = normalized
    ? SINGLE_ENTRY_DISPOSITIONS.filter((choice) => choice.startsWith(normalized))
    : [];
  if (matches.length === 1) return matches[0];
  throw new UsageError(
    `${source} must be one of ${SINGLE_ENTRY_DISPOSITIONS.join(', ')}, got "${value}"`
  );
}

export function parseMaxDepth(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return DEFAULT_MAX_DEPTH;
  if (!/^\d+$/.test(value.trim())) {
    throw new UsageError(`${ENV_MAX_DEPTH} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value.trim(), 10);
}

export function resolveRunOptions(flags: CliFlags, context: ResolveContext): RunOptions {
  const { env } = context;

  const noninteractive =
    flags.noninteractive || parseBooleanEnv(ENV_NONINTERACTIVE, env[ENV_NONINTERACTIVE]);

  const envOneEntry = env[ENV_ONE_ENTRY];
  let oneEntry: SingleEntryDisposition | undefined;
  if (flags.oneEntry !== undefined) {
    oneEntry = parseOneEntry(flags.oneEntry, '--one');
  } else if (envOneEntry) {
    oneEntry = parseOneEntry(envOneEntry, ENV_ONE_ENTRY);
  }

  const password = flags.password ?? (env[ENV_PASSWORD] || undefined);

  return Object.freeze({
    mode: flags.mode,
    recursive: flags.recursive,
    overwrite: flags.overwrite,
    flat: flags.flat,
    interactive: !noninteractive && context.stdinIsTTY,
    oneEntry,
    password,
    verbosity: verbosityFromCounts(flags.verbose, flags.quiet),
    maxDepth: parseMaxDepth(env[ENV_MAX_DEPTH]),
    workingDir: context.cwd,
  });
}
