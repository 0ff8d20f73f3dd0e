/**
 * Terminal styling for peel's stderr output and help text.
 *
 * Constraints:
 * - ASCII status markers only: [X], [!], [i]
 * - Plain text when stdout is not a terminal or NO_COLOR is set
 * - Spinners only on an interactive stderr
 *
 * @module utils/ui
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import ora from 'ora';
import type { SemanticColor, SpinnerController, TableOptions } from '../types/utils';

const PRIMARY = '#00ECFA';

function useColors(): boolean {
  if (process.env.FORCE_COLOR) return true;
  if (process.env.NO_COLOR) return false;
  return !!process.stdout.isTTY;
}

/** Stderr is a terminal and nothing asked for plain output */
export function isInteractive(): boolean {
  return !!process.stderr.isTTY && !process.env.CI && !process.env.NO_COLOR;
}

// =============================================================================
// COLOR
// =============================================================================

export function color(text: string, semantic: SemanticColor): string {
  if (!useColors()) return text;

  switch (semantic) {
    case 'error':
      return chalk.red.bold(text);
    case 'warning':
      return chalk.yellow(text);
    case 'info':
      return chalk.cyan(text);
    case 'primary':
      return chalk.hex(PRIMARY).bold(text);
    case 'command':
      return chalk.yellow.bold(text);
  }
}

export function dim(text: string): string {
  if (!useColors()) return text;
  return chalk.dim(text);
}

// =============================================================================
// STATUS MARKERS
// =============================================================================

export function fail(message: string): string {
  return `${color('[X]', 'error')} ${message}`;
}

export function warn(message: string): string {
  return `${color('[!]', 'warning')} ${message}`;
}

export function info(message: string): string {
  return `${color('[i]', 'info')} ${message}`;
}

// =============================================================================
// SUMMARY TABLE
// =============================================================================

const ASCII_CHARS = {
  top: '-',
  'top-mid': '+',
  'top-left': '+',
  'top-right': '+',
  bottom: '-',
  'bottom-mid': '+',
  'bottom-left': '+',
  'bottom-right': '+',
  left: '|',
  'left-mid': '+',
  mid: '-',
  'mid-mid': '+',
  right: '|',
  'right-mid': '+',
  middle: '|',
};

export function table(rows: string[][], options: TableOptions = {}): string {
  const tableInstance = new Table({
    wordWrap: true,
    // cli-table3 wants a head as wide as the rows, so it is only passed when set
    ...(options.head && options.head.length > 0
      ? { head: options.head.map((h) => color(h, 'primary')) }
      : {}),
    ...(options.style === 'ascii' ? { chars: ASCII_CHARS } : {}),
    style: { head: [], border: [] },
  });

  rows.forEach((row) => tableInstance.push(row));
  return tableInstance.toString();
}

// =============================================================================
// SPINNER
// =============================================================================

const SILENT_SPINNER: SpinnerController = {
  update: () => {},
  stop: () => {},
};

/** Start a spinner on stderr; a no-op controller when stderr is not interactive. */
export function spinner(text: string): SpinnerController {
  if (!isInteractive()) return SILENT_SPINNER;

  const s = ora({ text, color: 'cyan', stream: process.stderr }).start();
  return {
    update: (next: string) => {
      s.text = next;
    },
    stop: () => {
      s.stop();
    },
  };
}

// =============================================================================
// HELP HEADINGS
// =============================================================================

export function subheader(text: string): string {
  return color(text, 'primary');
}

/** Section title framed with ═══ */
export function sectionHeader(title: string): string {
  return color(`═══ ${title} ═══`, 'primary');
}
