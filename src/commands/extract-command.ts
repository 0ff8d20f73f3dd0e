/**
 * Extract Command Handler
 *
 * The default (and only) peel command: extract, list or pull metadata out
 * of every positional argument, in order, then report.
 */

import {
  type ExtractionResult,
  ExtractionEngine,
  type EngineDependencies,
} from '../archive/extraction-engine';
import type { ToolResolver } from '../archive/tool-availability';
import { type CliFlags, resolveRunOptions } from '../config/run-options';
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK } from '../errors';
import { UsageError } from '../errors/archive-errors';
import type { EnvVars, RunOptions } from '../types/config';
import type { SpinnerController } from '../types/utils';
import { Logger } from '../utils/logger';
import { InteractivePrompt, type Prompter } from '../utils/prompt';
import { spinner, table } from '../utils/ui';
import { type CommandLifecycle, runCommand } from './command-lifecycle';
import { type ValueOption, scanValueOption, splitAtSeparator } from './option-scanner';

const PASSWORD_OPTION: ValueOption = { long: '--password', short: 'p' };
const ONE_ENTRY_OPTION: ValueOption = { long: '--one', aliases: ['--one-entry'] };

type BooleanFlag = 'recursive' | 'overwrite' | 'flat' | 'noninteractive' | 'list' | 'metadata';
type CountFlag = 'verbose' | 'quiet';
type FlagTarget = BooleanFlag | CountFlag;

const LONG_FLAGS: Record<string, FlagTarget> = {
  '--recursive': 'recursive',
  '--overwrite': 'overwrite',
  '--flat': 'flat',
  '--no-directory': 'flat',
  '--noninteractive': 'noninteractive',
  '--list': 'list',
  '--table': 'list',
  '--metadata': 'metadata',
  '--verbose': 'verbose',
  '--quiet': 'quiet',
};

const SHORT_FLAGS: Record<string, FlagTarget> = {
  r: 'recursive',
  o: 'overwrite',
  f: 'flat',
  n: 'noninteractive',
  l: 'list',
  t: 'list',
  m: 'metadata',
  v: 'verbose',
  q: 'quiet',
};

export const KNOWN_FLAGS: readonly string[] = [
  ...Object.keys(LONG_FLAGS),
  ...Object.keys(SHORT_FLAGS).map((letter) => `-${letter}`),
  '--password',
  '-p',
  '--one',
  '--one-entry',
];

export interface ParsedExtractArgs {
  inputs: string[];
  recursive: boolean;
  overwrite: boolean;
  flat: boolean;
  noninteractive: boolean;
  list: boolean;
  metadata: boolean;
  verbose: number;
  quiet: number;
  oneEntry?: string;
  password?: string;
  unknownFlags: string[];
  /** Value-taking flags given without a value */
  missingValues: string[];
}

function emptyParsedArgs(): ParsedExtractArgs {
  return {
    inputs: [],
    recursive: false,
    overwrite: false,
    flat: false,
    noninteractive: false,
    list: false,
    metadata: false,
    verbose: 0,
    quiet: 0,
    unknownFlags: [],
    missingValues: [],
  };
}

function applyFlag(parsed: ParsedExtractArgs, target: FlagTarget): void {
  if (target === 'verbose' || target === 'quiet') {
    parsed[target] += 1;
  } else {
    parsed[target] = true;
  }
}

export function parseExtractArgs(rawArgs: readonly string[]): ParsedExtractArgs {
  const parsed = emptyParsedArgs();
  const { options, operands } = splitAtSeparator(rawArgs);

  const password = scanValueOption(options, PASSWORD_OPTION, KNOWN_FLAGS);
  const oneEntry = scanValueOption(password.remaining, ONE_ENTRY_OPTION, KNOWN_FLAGS);
  parsed.password = password.value;
  parsed.oneEntry = oneEntry.value;
  if (password.missing) parsed.missingValues.push(PASSWORD_OPTION.long);
  if (oneEntry.missing) parsed.missingValues.push(ONE_ENTRY_OPTION.long);

  for (const token of oneEntry.remaining) {
    if (token.startsWith('--')) {
      const target = LONG_FLAGS[token];
      if (target) applyFlag(parsed, target);
      else parsed.unknownFlags.push(token);
    } else if (token.startsWith('-') && token.length > 1) {
      for (const letter of token.slice(1)) {
        const target = SHORT_FLAGS[letter];
        if (target) applyFlag(parsed, target);
        else parsed.unknownFlags.push(`-${letter}`);
      }
    } else {
      parsed.inputs.push(token);
    }
  }

  parsed.inputs.push(...operands);
  return parsed;
}

export function validateExtractArgs(parsed: ParsedExtractArgs): void {
  if (parsed.unknownFlags.length > 0) {
    throw new UsageError(`unknown option: ${parsed.unknownFlags.join(', ')}`);
  }
  if (parsed.missingValues.length > 0) {
    throw new UsageError(`${parsed.missingValues[0]} requires a value`);
  }
  if (parsed.list && parsed.metadata) {
    throw new UsageError('--list and --metadata cannot be used together');
  }
  if (parsed.inputs.length === 0) {
    throw new UsageError('no archives given');
  }
}

export function toCliFlags(parsed: ParsedExtractArgs): CliFlags {
  return {
    mode: parsed.list ? 'list' : parsed.metadata ? 'metadata' : 'extract',
    recursive: parsed.recursive,
    overwrite: parsed.overwrite,
    flat: parsed.flat,
    noninteractive: parsed.noninteractive,
    oneEntry: parsed.oneEntry,
    password: parsed.password,
    verbose: parsed.verbose,
    quiet: parsed.quiet,
  };
}

/** 130 after an interrupt, 1 when any input failed or was only partly extracted, else 0 */
export function exitCodeForResults(results: readonly ExtractionResult[]): number {
  if (results.some((result) => result.error?.kind === 'interrupted')) return EXIT_INTERRUPTED;
  if (results.some((result) => result.status !== 'success')) return EXIT_FAILURE;
  return EXIT_OK;
}

export interface CommandOutput {
  stdout(line: string): void;
  stderr(line: string): void;
}

const processOutput: CommandOutput = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

/** Collaborators a caller (or a test) may replace */
export interface ExtractCommandDependencies {
  env?: EnvVars;
  stdinIsTTY?: boolean;
  cwd?: string;
  logger?: Logger;
  resolver?: ToolResolver;
  prompter?: Prompter | null;
  signal?: AbortSignal;
  spinner?: ((text: string) => SpinnerController) | null;
  output?: CommandOutput;
}

interface ExtractExecution {
  options: RunOptions;
  results: ExtractionResult[];
  logger: Logger;
}

const STATUS_LABELS: Record<ExtractionResult['status'], string> = {
  success: 'ok',
  partial: 'partial',
  failed: 'failed',
};

function summaryRow(result: ExtractionResult): string[] {
  const detail = result.error
    ? result.error.message
    : result.spec?.mode === 'list'
      ? `${result.listing.length} entries`
      : (result.destination?.path ?? '');
  return [result.input, STATUS_LABELS[result.status], detail];
}

function renderListings(results: readonly ExtractionResult[], output: CommandOutput): void {
  const multiple = results.length > 1;
  let first = true;
  for (const result of results) {
    if (result.status === 'failed') continue;
    if (multiple) {
      if (!first) output.stdout('');
      output.stdout(`${result.input}:`);
    }
    first = false;
    result.listing.forEach((entry) => output.stdout(entry));
  }
}

function reportFailures(results: readonly ExtractionResult[], logger: Logger): void {
  for (const result of results) {
    const { error } = result;
    if (!error || error.kind === 'interrupted') continue;
    logger.error(`${result.input}: ${error.message}`);
    if (error.stderr && logger.isEnabled('info')) {
      logger.block('info', 'tool output:', error.stderr);
    }
  }
  const interrupted = results.find((result) => result.error?.kind === 'interrupted');
  if (interrupted?.error) {
    logger.error(`${interrupted.input}: ${interrupted.error.message}`);
  }
}

export function createExtractCommand(
  deps: ExtractCommandDependencies = {}
): CommandLifecycle<ParsedExtractArgs, ExtractExecution> {
  const output = deps.output ?? processOutput;

  return {
    parse: parseExtractArgs,
    validate: validateExtractArgs,
    async execute(parsed) {
      const options = resolveRunOptions(toCliFlags(parsed), {
        env: deps.env ?? process.env,
        stdinIsTTY: deps.stdinIsTTY ?? Boolean(process.stdin.isTTY),
        cwd: deps.cwd ?? process.cwd(),
      });
      const logger = deps.logger ?? new Logger(options.verbosity);

      const engineDeps: EngineDependencies = {
        logger,
        resolver: deps.resolver,
        prompter:
          deps.prompter !== undefined
            ? deps.prompter
            : options.interactive
              ? new InteractivePrompt()
              : null,
        signal: deps.signal,
        spinner:
          deps.spinner !== undefined
            ? (deps.spinner ?? undefined)
            : options.verbosity === 30
              ? (text: string) => spinner(text)
              : undefined,
      };

      const engine = new ExtractionEngine(options, engineDeps);
      const results = await engine.run(parsed.inputs);
      return { options, results, logger };
    },
    render({ options, results, logger }) {
      if (options.mode === 'list') renderListings(results, output);
      reportFailures(results, logger);

      if (results.length > 1 && logger.isEnabled('warn')) {
        output.stderr(
          table(results.map(summaryRow), {
            head: ['Archive', 'Result', 'Output'],
            style: 'ascii',
          })
        );
      }
    },
    exitCode({ results }) {
      if (deps.signal?.aborted) return EXIT_INTERRUPTED;
      return exitCodeForResults(results);
    },
  };
}

/**
 * Handle the extract command
 * @returns process exit code
 */
export async function handleExtractCommand(
  rawArgs: readonly string[],
  deps: ExtractCommandDependencies = {}
): Promise<number> {
  return runCommand(rawArgs, createExtractCommand(deps));
}
