/**
 * Centralized error handling for the CLI entry point.
 */

import { fail } from '../utils/ui';
import { ArchiveError, isArchiveError } from './archive-errors';

export * from './archive-errors';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

type CleanupFn = () => void;

const cleanupCallbacks = new Set<CleanupFn>();

/**
 * Register a callback to run when the process bails out early.
 * Returns an unregister function.
 */
export function registerCleanup(fn: CleanupFn): () => void {
  cleanupCallbacks.add(fn);
  return () => {
    cleanupCallbacks.delete(fn);
  };
}

/**
 * Run and clear every registered cleanup callback.
 * A throwing callback does not stop the others.
 */
export function runCleanup(): void {
  for (const fn of Array.from(cleanupCallbacks)) {
    cleanupCallbacks.delete(fn);
    try {
      fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(fail(`Cleanup failed: ${message}`));
    }
  }
}

export function exitCodeFor(error: unknown): number {
  if (!isArchiveError(error)) return EXIT_FAILURE;
  switch (error.kind) {
    case 'usage':
      return EXIT_USAGE;
    case 'interrupted':
      return EXIT_INTERRUPTED;
    default:
      return EXIT_FAILURE;
  }
}

function formatError(error: unknown): string {
  if (error instanceof ArchiveError && error.archive) {
    return `${error.archive}: ${error.message}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Report an error that escaped command handling and return the exit code.
 */
export function handleError(error: unknown): number {
  console.error(fail(formatError(error)));
  if (isArchiveError(error) && error.kind === 'usage') {
    console.error("Run 'peel --help' for usage information");
  }
  runCleanup();
  return exitCodeFor(error);
}
