/**
 * Maps a failed stage's exit status and output to the most specific error.
 */

import {
  ExtractionToolError,
  PasswordProtectedError,
  type ToolFailure,
  UnsupportedCompressionError,
} from '../errors/archive-errors';

const PASSWORD_PATTERNS: readonly RegExp[] = [
  /wrong password/i,
  /incorrect password/i,
  /password is incorrect/i,
  /unable to get password/i,
  /enter password/i,
  /password required/i,
  /requires a password/i,
  /encrypted archive/i,
  /encrypted file/i,
];

const UNSUPPORTED_COMPRESSION_PATTERNS: readonly RegExp[] = [
  /unsupported compression method/i,
  /unknown compression method/i,
  /compression method \S+ not supported/i,
  /unsupported method/i,
  /need PK compat\. v\d/i,
];

/**
 * Entry names reported as unwritable. Tools that exit with a warning status
 * print these and carry on with the rest of the archive.
 */
const FAILED_ENTRY_PATTERNS: readonly RegExp[] = [
  /^\s*(?:error:\s+)?cannot create\s+(.+?)\s*$/i,
  /^\s*checkdir error:\s+cannot create\s+(.+?)\s*$/i,
  /^\s*ERROR: Can ?not open output file\s*:\s*(?:[^:]+:\s*)?(.+?)\s*$/i,
  /^\s*\S+: (.+?): Cannot open: .+$/,
];

export function looksPasswordProtected(output: string): boolean {
  return PASSWORD_PATTERNS.some((pattern) => pattern.test(output));
}

export function looksUnsupportedCompression(output: string): boolean {
  return UNSUPPORTED_COMPRESSION_PATTERNS.some((pattern) => pattern.test(output));
}

/**
 * Build the error for a stage that failed.
 * `output` is stderr plus whatever prompt text the tool wrote to stdout.
 */
export function classifyFailure(
  failure: ToolFailure,
  output = failure.stderr
): ExtractionToolError {
  if (looksPasswordProtected(output)) return new PasswordProtectedError(failure);
  if (looksUnsupportedCompression(output)) return new UnsupportedCompressionError(failure);
  return new ExtractionToolError(failure);
}

/** Names of entries the tool says it could not write, in order, without duplicates. */
export function failedEntries(stderr: string): string[] {
  const names: string[] = [];
  for (const line of stderr.split(/\r?\n/)) {
    for (const pattern of FAILED_ENTRY_PATTERNS) {
      const match = pattern.exec(line);
      if (match && match[1] && !names.includes(match[1])) {
        names.push(match[1]);
        break;
      }
    }
  }
  return names;
}
