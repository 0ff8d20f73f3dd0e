/**
 * Extraction Engine
 *
 * Drives each input through classify -> compile -> run -> normalize ->
 * place, then optionally recurses into nested archives. Inputs are handled
 * one at a time, in order; a failure is recorded on that input's result and
 * the next input still runs. Only an interrupt stops the loop.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ArchiveError,
  ExtractionInterruptedError,
  ExtractionToolError,
  type PermissionWarning,
  UnrecognizedFormatError,
  isArchiveError,
} from '../errors/archive-errors';
import type { RunOptions } from '../types/config';
import type { SpinnerController } from '../types/utils';
import type { Logger } from '../utils/logger';
import type { Prompter } from '../utils/prompt';
import { archiveBaseName } from './archive-naming';
import { downloadArchive, isUrl } from './downloader';
import { failedEntries } from './error-classifier';
import {
  type ClassificationSource,
  classifyArchive,
  contentFallback,
  looksCompressed,
} from './format-classifier';
import { InteractionController } from './interaction-controller';
import {
  type ExtractionMode,
  type LayerList,
  describeLayers,
  terminalContainer,
} from './layers';
import { parseListing } from './list-parsers';
import {
  type Destination,
  type Placement,
  type PlacementPolicy,
  createStaging,
  listTree,
  placeOutput,
  planDestination,
  salvageStaging,
} from './output-placement';
import { normalizePermissions } from './permission-normalizer';
import {
  compileMemberListing,
  compilePipeline,
  describePipeline,
  needsMemberListing,
} from './pipeline-compiler';
import { type PipelineRun, type RunnablePipeline, runPipeline } from './process-runner';
import {
  type AncestorArchive,
  type NestedScan,
  RecursionController,
  findNestedArchives,
} from './recursion-controller';
import { type ToolResolver, toolAvailability } from './tool-availability';

export type ExtractionStatus = 'success' | 'partial' | 'failed';

/** One input, classified */
export interface ArchiveSpec {
  /** The argument as given, or the nested archive's path */
  input: string;
  /** Absolute path of the local file */
  path: string;
  layers: LayerList;
  classifiedBy: ClassificationSource;
  mode: ExtractionMode;
  /** 0 for command-line inputs, n for archives found n levels down */
  depth: number;
}

export interface ExtractionResult {
  input: string;
  spec: ArchiveSpec | null;
  status: ExtractionStatus;
  error: ArchiveError | null;
  destination: Destination | null;
  /** Top-level paths written */
  placed: string[];
  /** What this run moved into place; differs from `placed` when merging */
  written: string[];
  /** Entry names (list mode) */
  listing: string[];
  /** Entries a tool reported it could not write, plus nested archives that failed */
  failedEntries: string[];
  /** Tool output from warning exits */
  warnings: string[];
  permissionWarnings: PermissionWarning[];
  /** Nested archives left alone: no --recursive, or the user declined */
  nestedFound: number;
  nested: ExtractionResult[];
}

export interface EngineDependencies {
  logger: Logger;
  resolver?: ToolResolver;
  /** Used for interactive questions; null or absent means defaults only */
  prompter?: Prompter | null;
  signal?: AbortSignal;
  /** Progress indicator shown while a pipeline runs */
  spinner?: (text: string) => SpinnerController;
}

interface ExtractAttempt {
  /** Follow nested archives; null means ask (or take the default) */
  recurse: boolean | null;
  /** Salvage a failed run's output instead of discarding it */
  keepPartial: boolean;
}

function emptyResult(input: string): ExtractionResult {
  return {
    input,
    spec: null,
    status: 'success',
    error: null,
    destination: null,
    placed: [],
    written: [],
    listing: [],
    failedEntries: [],
    warnings: [],
    permissionWarnings: [],
    nestedFound: 0,
    nested: [],
  };
}

export function toArchiveError(error: unknown, input: string): ArchiveError {
  if (isArchiveError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ArchiveError('filesystem', message, { archive: input, cause: error });
}

export class ExtractionEngine {
  private readonly logger: Logger;
  private readonly resolver: ToolResolver;
  private readonly controller: InteractionController;
  /** Nested archives never prompt: a lone entry stays inside, collisions get suffixes */
  private readonly nestedController: InteractionController;
  private readonly recursion: RecursionController;

  constructor(
    private readonly options: RunOptions,
    private readonly deps: EngineDependencies
  ) {
    this.logger = deps.logger;
    this.resolver = deps.resolver ?? toolAvailability;
    this.controller = new InteractionController(
      { interactive: options.interactive, oneEntry: options.oneEntry },
      deps.prompter ?? null,
      deps.logger
    );
    this.nestedController = new InteractionController(
      { interactive: false, oneEntry: 'inside' },
      null,
      deps.logger
    );
    this.recursion = new RecursionController(options.maxDepth, deps.logger);
  }

  /** Process every input in order. Stops early only when interrupted. */
  async run(inputs: readonly string[]): Promise<ExtractionResult[]> {
    const results: ExtractionResult[] = [];
    for (const input of inputs) {
      if (this.deps.signal?.aborted) break;
      const result = await this.processInput(input);
      results.push(result);
      await this.report(result, inputs.length > 1);
      if (result.error?.kind === 'interrupted') break;
    }
    return results;
  }

  async processInput(input: string): Promise<ExtractionResult> {
    const result = emptyResult(input);
    try {
      const local = isUrl(input)
        ? await downloadArchive(input, {
            workingDir: this.options.workingDir,
            logger: this.logger,
            resolver: this.resolver,
            signal: this.deps.signal,
          })
        : path.resolve(this.options.workingDir, input);
      const stats = await fs.stat(local).catch(() => null);
      if (!stats) throw new ArchiveError('filesystem', 'no such file', { archive: input });
      if (!stats.isFile()) {
        throw new ArchiveError('filesystem', 'not a regular file', { archive: input });
      }

      const classification = await classifyArchive(local);
      const spec: ArchiveSpec = {
        input,
        path: local,
        layers: classification.layers,
        classifiedBy: classification.source,
        mode: this.options.mode,
        depth: 0,
      };
      result.spec = spec;
      const basis = classification.source === 'extension' ? 'file name' : 'content';
      this.logger.debug(`${input}: ${describeLayers(spec.layers)} (from ${basis})`);

      if (spec.mode === 'list') {
        await this.list(spec, result);
      } else {
        await this.extractTopLevel(spec, result);
      }
    } catch (error) {
      result.status = 'failed';
      result.error = toArchiveError(error, input);
    }
    return result;
  }

  /**
   * Extract a command-line input. When the tool rejects a file whose name
   * and content disagree, the content gets one more try.
   */
  private async extractTopLevel(
    spec: ArchiveSpec,
    result: ExtractionResult
  ): Promise<void> {
    const ancestors = this.options.recursive ? [await this.recursion.enterRoot(spec.path)] : [];
    const recurse = this.options.recursive ? true : null;
    const fallback =
      spec.classifiedBy === 'extension' ? await contentFallback(spec.path, spec.layers) : null;
    const workingDir = this.options.workingDir;

    try {
      await this.extract(spec, result, this.controller, workingDir, ancestors, {
        recurse,
        keepPartial: fallback === null,
      });
    } catch (error) {
      if (!fallback || !(error instanceof ExtractionToolError) || error.kind !== 'extraction-tool') {
        throw error;
      }
      this.logger.info(
        `${spec.input}: not a ${describeLayers(spec.layers)} after all; ` +
          `trying it as ${describeLayers(fallback)}`
      );
      const retry: ArchiveSpec = { ...spec, layers: fallback, classifiedBy: 'content' };
      result.spec = retry;
      result.destination = null;
      await this.extract(retry, result, this.controller, workingDir, ancestors, {
        recurse,
        keepPartial: true,
      });
    }
  }

  private async list(spec: ArchiveSpec, result: ExtractionResult): Promise<void> {
    if (!terminalContainer(spec.layers)) {
      // A plain compressed file holds exactly one entry: its decompressed self.
      if (!(await looksCompressed(spec.path))) throw new UnrecognizedFormatError(spec.path);
      result.listing = [archiveBaseName(path.basename(spec.path), spec.layers)];
      return;
    }

    const members = needsMemberListing(spec.layers) ? await this.listMembers(spec) : undefined;
    const pipeline = compilePipeline(
      {
        archive: spec.path,
        layers: spec.layers,
        mode: 'list',
        password: this.options.password,
        interactive: this.options.interactive,
        members,
      },
      this.resolver
    );
    const run = await this.execute(pipeline, os.tmpdir(), `Listing ${spec.input}`);
    result.listing =
      pipeline.output.kind === 'listing' ? parseListing(pipeline.output.format, run.stdout) : [];
    this.collectWarnings(spec, run, result);
  }

  private async listMembers(spec: ArchiveSpec): Promise<string[]> {
    const members = compileMemberListing({ archive: spec.path, layers: spec.layers }, this.resolver);
    const run = await this.execute(members, os.tmpdir(), null);
    return parseListing('lines', run.stdout).map((line) => line.trim());
  }

  private async extract(
    spec: ArchiveSpec,
    result: ExtractionResult,
    controller: InteractionController,
    workingDir: string,
    ancestors: readonly AncestorArchive[],
    attempt: ExtractAttempt
  ): Promise<void> {
    // Everything that can fail without touching the filesystem happens first.
    const members = needsMemberListing(spec.layers) ? await this.listMembers(spec) : undefined;
    const pipeline = compilePipeline(
      {
        archive: spec.path,
        layers: spec.layers,
        mode: spec.mode,
        password: this.options.password,
        interactive: this.options.interactive,
        members,
      },
      this.resolver
    );

    const baseName = archiveBaseName(path.basename(spec.path), spec.layers);
    const fileOutput = pipeline.output.kind === 'file' ? pipeline.output.name : undefined;
    const policy: PlacementPolicy = {
      workingDir,
      overwrite: this.options.overwrite,
      flat: this.options.flat,
      controller,
    };
    const destination = await planDestination(
      baseName,
      fileOutput ?? baseName,
      fileOutput !== undefined,
      policy,
      spec.input
    );
    result.destination = destination;

    const staging = await createStaging(workingDir);
    let run: PipelineRun;
    try {
      run = await this.execute(pipeline, staging, `Extracting ${spec.input}`);
    } catch (error) {
      if (!attempt.keepPartial && !(error instanceof ExtractionInterruptedError)) {
        await fs.rm(staging, { recursive: true, force: true });
        throw error;
      }
      const partial = await salvageStaging(staging, destination, workingDir, spec.input);
      if (error instanceof ExtractionInterruptedError) {
        throw new ExtractionInterruptedError(spec.input, partial);
      }
      if (partial) {
        result.destination = { ...destination, path: partial };
        result.placed = [partial];
        result.written = [partial];
        this.logger.warn(`${spec.input}: partial output left in ${partial}`);
      }
      throw error;
    }

    result.permissionWarnings.push(...(await normalizePermissions(staging)));
    for (const warning of result.permissionWarnings) {
      this.logger.warn(`${warning.path}: ${warning.message}`);
    }

    let placement: Placement;
    try {
      placement = await placeOutput({
        archive: spec.input,
        staging,
        destination,
        policy,
        alwaysWrap: pipeline.alwaysWrap,
        fileOutput,
      });
    } catch (error) {
      await fs.rm(staging, { recursive: true, force: true });
      throw error;
    }
    result.destination = placement.destination;
    result.placed = placement.placed;
    result.written = placement.written;
    if (placement.placed.length === 0) {
      this.logger.warn(`${spec.input}: archive is empty; nothing was written`);
    }
    this.collectWarnings(spec, run, result);

    // Only what this run wrote: a merge target may hold the user's own archives.
    const scan = await findNestedArchives(placement.written);
    if (scan.archives.length === 0) return;
    const follow = attempt.recurse ?? (await this.askToRecurse(spec, scan, controller, workingDir));
    if (!follow) {
      result.nestedFound = scan.archives.length;
      return;
    }

    const chain = ancestors.length > 0 ? ancestors : [await this.recursion.enterRoot(spec.path)];
    for (const found of scan.archives) {
      if (this.deps.signal?.aborted) break;
      const decision = await this.recursion.decide(found.path, spec.depth + 1, chain);
      if (!decision.follow) continue;

      const child = emptyResult(found.path);
      result.nested.push(child);
      try {
        const classification = await classifyArchive(found.path);
        const childSpec: ArchiveSpec = {
          input: found.path,
          path: found.path,
          layers: classification.layers,
          classifiedBy: classification.source,
          mode: 'extract',
          depth: spec.depth + 1,
        };
        child.spec = childSpec;
        await this.extract(
          childSpec,
          child,
          this.nestedController,
          path.dirname(found.path),
          [...chain, decision.ancestor],
          { recurse: true, keepPartial: true }
        );
        // A partial child keeps its archive so the rest can be recovered.
        if (child.status === 'success') await fs.rm(found.path, { force: true });
      } catch (error) {
        child.status = 'failed';
        child.error = toArchiveError(error, found.path);
        if (child.error.kind === 'interrupted') throw child.error;
        this.logger.warn(`${found.path}: ${child.error.message}`);
      }

      if (child.status !== 'success') {
        result.status = 'partial';
        result.failedEntries.push(found.path);
      }
    }
  }

  private async askToRecurse(
    spec: ArchiveSpec,
    scan: NestedScan,
    controller: InteractionController,
    workingDir: string
  ): Promise<boolean> {
    const choice = await controller.resolveRecursion({
      archive: spec.input,
      nested: scan.archives.map((found) => path.relative(workingDir, found.path)),
      fileCount: scan.fileCount,
    });
    return choice === 'always' || choice === 'once';
  }

  private collectWarnings(spec: ArchiveSpec, run: PipelineRun, result: ExtractionResult): void {
    for (const text of run.warnings) {
      result.warnings.push(text);
      result.failedEntries.push(...failedEntries(text));
      this.logger.block('warn', `${spec.input}: the extraction tool reported problems`, text);
    }
    if (result.failedEntries.length > 0) result.status = 'partial';
  }

  private async execute(
    pipeline: RunnablePipeline,
    destination: string,
    label: string | null
  ): Promise<PipelineRun> {
    const described = describePipeline(pipeline);
    const password = this.options.password;
    this.logger.debug(password ? described.split(password).join('****') : described);

    const spin = label && this.deps.spinner ? this.deps.spinner(label) : null;
    try {
      return await runPipeline(pipeline, {
        destination,
        logger: this.logger,
        signal: this.deps.signal,
      });
    } finally {
      spin?.stop();
    }
  }

  /** The placed tree at info level, and a hint when nested archives were left alone. */
  private async report(result: ExtractionResult, multiple: boolean): Promise<void> {
    if (result.status === 'failed' || result.spec?.mode === 'list') return;

    if (this.logger.isEnabled('info') && result.written.length > 0) {
      try {
        const lines = await listTree(result.written, this.options.workingDir);
        if (multiple) {
          this.logger.block('info', `${result.input}:`, lines.join('\n'));
        } else {
          lines.forEach((line) => this.logger.info(line));
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`${result.input}: could not list the extracted files (${message})`);
      }
    }

    if (result.nestedFound > 0) {
      this.logger.info(
        `${result.input} contains ${result.nestedFound} other archive file(s); ` +
          'use --recursive to extract them'
      );
    }
  }
}
