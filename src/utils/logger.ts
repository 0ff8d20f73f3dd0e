/**
 * Verbosity-aware logger.
 *
 * Built once from RunOptions.verbosity and handed to every component.
 * Messages go to stderr through the UI status prefixes; tests swap the sink.
 */

import { dim, fail, info, warn } from './ui';
import type { VerbosityLevel } from '../types/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (level: LogLevel, line: string) => void;

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

function decorate(level: LogLevel, message: string): string {
  switch (level) {
    case 'error':
      return fail(message);
    case 'warn':
      return warn(message);
    case 'info':
      return info(message);
    case 'debug':
      return dim(`[peel] ${message}`);
  }
}

export class Logger {
  constructor(
    readonly threshold: VerbosityLevel = 30,
    private readonly sink: LogSink = stderrSink
  ) {}

  isEnabled(level: LogLevel): boolean {
    return LEVEL_VALUES[level] >= this.threshold;
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  /** Multi-line tool output, indented under a heading. */
  block(level: LogLevel, heading: string, body: string): void {
    const trimmed = body.replace(/\s+$/, '');
    if (!trimmed) return;
    const indented = trimmed
      .split('\n')
      .map((line) => `    ${line}`)
      .join('\n');
    this.write(level, `${heading}\n${indented}`);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    this.sink(level, decorate(level, message));
  }
}

/**
 * Map -v/-q counts to a threshold. Warnings show by default.
 */
export function verbosityFromCounts(verbose: number, quiet: number): VerbosityLevel {
  const raw = 30 + 10 * (quiet - verbose);
  const clamped = Math.min(50, Math.max(10, raw));
  switch (clamped) {
    case 10:
      return 10;
    case 20:
      return 20;
    case 30:
      return 30;
    case 40:
      return 40;
    default:
      return 50;
  }
}

/** Logger that records lines in memory instead of printing them. */
export function createMemoryLogger(threshold: VerbosityLevel = 10): {
  logger: Logger;
  lines: Array<{ level: LogLevel; line: string }>;
} {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const logger = new Logger(threshold, (level, line) => {
    lines.push({ level, line });
  });
  return { logger, lines };
}
