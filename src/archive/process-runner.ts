/**
 * Process Runner
 *
 * Executes a compiled pipeline. Stages connected by 'next' run together as
 * one segment of piped child processes; a stage that writes a file, or
 * whose output is consumed by peel, ends its segment. Segments run in order,
 * so a materialized file is complete before anything reads it.
 */

import { type ChildProcess, spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExtractionInterruptedError, registerCleanup } from '../errors';
import type { Logger } from '../utils/logger';
import { killWithEscalation } from '../utils/process-utils';
import { classifyFailure } from './error-classifier';
import {
  type CompiledPipeline,
  type PipelineStage,
  SCRATCH_TOKEN,
  type StageCwd,
} from './pipeline-compiler';

/** The parts of a compiled pipeline the runner needs */
export type RunnablePipeline = Pick<CompiledPipeline, 'archive' | 'stages' | 'usesScratch'>;

/** Tail of stderr kept per stage */
const STDERR_LIMIT = 64 * 1024;
/** Tail of relayed stdout kept for failure classification */
const RELAY_TAIL_LIMIT = 8 * 1024;

export interface RunPipelineOptions {
  /** Working directory of 'destination' stages */
  destination: string;
  logger: Logger;
  signal?: AbortSignal;
  /** Delay before a terminated stage is killed outright */
  killGraceMs?: number;
}

export interface StageOutcome {
  program: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
  /** Exited with a status the tool documents as a warning */
  warning: boolean;
}

export interface PipelineRun {
  /** Output of 'capture' stages */
  stdout: string;
  stages: StageOutcome[];
  /** stderr of stages that exited with a warning status */
  warnings: string[];
}

interface RunningStage {
  stage: PipelineStage;
  child: ChildProcess;
  stderr: string;
  stdoutTail: string;
  done: Promise<{ exitCode: number | null; signal: NodeJS.Signals | null }>;
}

interface FailedStage {
  running: RunningStage;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

function keepTail(text: string, limit: number): string {
  return text.length > limit ? text.slice(text.length - limit) : text;
}

/** Split stages into groups joined by pipes. */
export function segmentsOf(stages: readonly PipelineStage[]): PipelineStage[][] {
  const segments: PipelineStage[][] = [];
  let current: PipelineStage[] = [];
  for (const stage of stages) {
    current.push(stage);
    if (stage.stdout !== 'next') {
      segments.push(current);
      current = [];
    }
  }
  if (current.length > 0) segments.push(current);
  return segments;
}

class SegmentRunner {
  private readonly running: RunningStage[] = [];
  private readonly openFds: number[] = [];
  captured = '';

  constructor(
    private readonly directories: Record<StageCwd, string | null>,
    private readonly logger: Logger
  ) {}

  resolvePath(target: string, cwd: string): string {
    const scratch = this.directories.scratch;
    const expanded =
      scratch !== null && target.startsWith(SCRATCH_TOKEN)
        ? path.join(scratch, target.slice(SCRATCH_TOKEN.length))
        : target;
    return path.resolve(cwd, expanded);
  }

  start(segment: readonly PipelineStage[]): RunningStage[] {
    try {
      for (const stage of segment) {
        this.running.push(this.spawnStage(stage, this.running[this.running.length - 1]));
      }
    } catch (error) {
      this.terminate(0);
      throw error;
    } finally {
      for (const fd of this.openFds.splice(0)) fs.closeSync(fd);
    }
    return this.running;
  }

  terminate(graceMs: number): void {
    for (const { child } of this.running) {
      if (child.exitCode === null && child.signalCode === null) {
        killWithEscalation(child, graceMs);
      }
    }
  }

  private workingDirectory(stage: PipelineStage): string {
    const dir = this.directories[stage.cwd];
    if (dir === null) throw new Error(`no ${stage.cwd} directory for ${stage.program}`);
    return dir;
  }

  private openFd(target: string, flags: 'r' | 'w'): number {
    const fd = fs.openSync(target, flags);
    this.openFds.push(fd);
    return fd;
  }

  private spawnStage(stage: PipelineStage, previous: RunningStage | undefined): RunningStage {
    const cwd = this.workingDirectory(stage);
    const stdin =
      stage.stdin === 'none'
        ? 'ignore'
        : stage.stdin === 'previous'
          ? 'pipe'
          : this.openFd(this.resolvePath(stage.stdin.path, cwd), 'r');
    const stdout =
      stage.stdout === 'discard'
        ? 'ignore'
        : typeof stage.stdout === 'object'
          ? this.openFd(this.resolvePath(stage.stdout.path, cwd), 'w')
          : 'pipe';
    const args = stage.args.map((arg) =>
      this.directories.scratch !== null
        ? arg.replaceAll(SCRATCH_TOKEN, this.directories.scratch)
        : arg
    );

    const child = spawn(stage.executable, args, { cwd, stdio: [stdin, stdout, 'pipe'] });
    const running: RunningStage = {
      stage,
      child,
      stderr: '',
      stdoutTail: '',
      done: Promise.resolve({ exitCode: null, signal: null }),
    };

    if (stage.stdin === 'previous' && previous?.child.stdout && child.stdin) {
      const upstream = previous.child.stdout;
      upstream.pipe(child.stdin);
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        // The consumer quit early; drain the producer so it is not left blocked.
        const reason = error.code ?? error.message;
        this.logger.debug(`${stage.program} stopped reading its input (${reason})`);
        upstream.unpipe();
        upstream.resume();
      });
    }

    child.stderr?.on('data', (chunk: Buffer) => {
      running.stderr = keepTail(running.stderr + chunk.toString(), STDERR_LIMIT);
    });

    if (stage.stdout === 'capture') {
      child.stdout?.on('data', (chunk: Buffer) => {
        this.captured += chunk.toString();
      });
    } else if (stage.stdout === 'relay') {
      child.stdout?.on('data', (chunk: Buffer) => {
        const text = chunk.toString();
        running.stdoutTail = keepTail(running.stdoutTail + text, RELAY_TAIL_LIMIT);
        for (const line of text.split(/\r?\n/)) {
          if (line.trim()) this.logger.debug(`${stage.program}: ${line}`);
        }
      });
    }

    running.done = new Promise((resolve) => {
      let settled = false;
      child.on('error', (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        running.stderr += `${error.message}\n`;
        resolve({ exitCode: null, signal: null });
      });
      child.on('close', (exitCode, signal) => {
        if (settled) return;
        settled = true;
        resolve({ exitCode, signal });
      });
    });

    return running;
  }
}

function isFailure(stage: PipelineStage, outcome: StageOutcome): boolean {
  if (outcome.signal) return true;
  if (outcome.exitCode === 0) return false;
  return outcome.exitCode === null || !stage.warningExitCodes.includes(outcome.exitCode);
}

/**
 * Run every stage of `pipeline`.
 * @throws ExtractionToolError (or a subclass) for the first stage that failed
 * @throws ExtractionInterruptedError when `signal` aborts the run
 */
export async function runPipeline(
  pipeline: RunnablePipeline,
  options: RunPipelineOptions
): Promise<PipelineRun> {
  const { logger, signal } = options;
  const graceMs = options.killGraceMs ?? 3000;
  const scratch = pipeline.usesScratch
    ? await fs.promises.mkdtemp(path.join(os.tmpdir(), 'peel-'))
    : null;
  const unregister = scratch
    ? registerCleanup(() => fs.rmSync(scratch, { recursive: true, force: true }))
    : () => undefined;

  const directories: Record<StageCwd, string | null> = {
    destination: options.destination,
    scratch,
    neutral: os.tmpdir(),
  };
  const run: PipelineRun = { stdout: '', stages: [], warnings: [] };

  try {
    for (const segment of segmentsOf(pipeline.stages)) {
      if (signal?.aborted) throw new ExtractionInterruptedError(pipeline.archive, null);

      const runner = new SegmentRunner(directories, logger);
      const onAbort = () => runner.terminate(graceMs);
      signal?.addEventListener('abort', onAbort, { once: true });

      let results: RunningStage[];
      let exits: Array<{ exitCode: number | null; signal: NodeJS.Signals | null }>;
      try {
        results = runner.start(segment);
        exits = await Promise.all(results.map((running) => running.done));
      } finally {
        signal?.removeEventListener('abort', onAbort);
      }

      if (signal?.aborted) throw new ExtractionInterruptedError(pipeline.archive, null);
      run.stdout += runner.captured;

      // Stages run concurrently; the first one that failed explains the others.
      let failed: FailedStage | null = null;
      for (const [index, running] of results.entries()) {
        const { exitCode, signal: exitSignal } = exits[index];
        const outcome: StageOutcome = {
          program: running.stage.program,
          exitCode,
          signal: exitSignal,
          stderr: running.stderr,
          warning: false,
        };
        run.stages.push(outcome);
        logger.debug(
          `${running.stage.program} exited with ${exitSignal ?? `status ${exitCode ?? 'unknown'}`}`
        );
        // A producer whose consumer finished early dies of SIGPIPE; that is not its failure.
        if (exitSignal === 'SIGPIPE') continue;
        if (isFailure(running.stage, outcome)) {
          failed = failed ?? { running, exitCode, signal: exitSignal };
        } else if (exitCode !== 0) {
          outcome.warning = true;
          if (running.stderr.trim()) run.warnings.push(running.stderr.trim());
        }
      }

      if (failed) {
        const { running } = failed;
        throw classifyFailure(
          {
            archive: pipeline.archive,
            program: running.stage.program,
            description: running.stage.description,
            exitCode: failed.exitCode,
            signal: failed.signal,
            stderr: running.stderr,
          },
          `${running.stderr}\n${running.stdoutTail}`
        );
      }
    }
    return run;
  } finally {
    unregister();
    if (scratch) await fs.promises.rm(scratch, { recursive: true, force: true });
  }
}
