/**
 * --list-extensions: every file suffix the classifier recognises, sorted.
 */

import { supportedSuffixes } from '../archive/suffix-table';

export function handleListExtensionsCommand(write: (line: string) => void = console.log): void {
  for (const suffix of supportedSuffixes()) {
    write(suffix);
  }
}
