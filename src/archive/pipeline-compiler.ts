/**
 * Pipeline Compiler
 *
 * Turns a layer list and a mode into the ordered list of processes that
 * peels it. Compilation is pure apart from tool lookups: nothing is spawned
 * and nothing is written, so a failure here (missing tool, unsupported mode)
 * leaves the filesystem untouched.
 */

import * as path from 'path';
import {
  ExtractionToolError,
  UnrecognizedFormatError,
  UnsupportedModeError,
} from '../errors/archive-errors';
import { archiveBaseName, metadataFileName } from './archive-naming';
import { classifyByName } from './format-classifier';
import {
  type ExtractionMode,
  type Layer,
  type LayerList,
  compressionLayers,
  terminalContainer,
  toLayerList,
} from './layers';
import { type ToolResolver, toolAvailability } from './tool-availability';
import {
  COMPRESSION_TOOLS,
  CONTAINER_TOOLS,
  type CommandTemplate,
  type DirectStrategy,
  type ListFormat,
  type MemberStrategy,
  type ResolvedCommand,
  resolveCommand,
  resolveContainerTool,
  resolveFirstAvailable,
} from './tool-registry';

/** Replaced by the runner with the pipeline's private scratch directory */
export const SCRATCH_TOKEN = '{scratch}';

export interface FileRef {
  kind: 'file';
  /** Absolute, or relative to the stage's working directory */
  path: string;
}

export type StageInput = 'none' | 'previous' | FileRef;
export type StageOutput = 'discard' | 'next' | 'relay' | 'capture' | FileRef;
export type StageCwd = 'destination' | 'scratch' | 'neutral';

export interface PipelineStage {
  program: string;
  executable: string;
  args: string[];
  stdin: StageInput;
  stdout: StageOutput;
  cwd: StageCwd;
  /** Names the layer in error messages, e.g. "gzip" or "Zip file" */
  description: string;
  warningExitCodes: readonly number[];
}

export type PipelineOutput =
  | { kind: 'tree' }
  | { kind: 'file'; name: string }
  | { kind: 'listing'; format: ListFormat };

export interface CompiledPipeline {
  archive: string;
  mode: ExtractionMode;
  layers: LayerList;
  stages: readonly [PipelineStage, ...PipelineStage[]];
  output: PipelineOutput;
  usesScratch: boolean;
  /** Output keeps its own directory even when it holds a single entry */
  alwaysWrap: boolean;
}

export interface CompileRequest {
  /** Absolute path of the archive */
  archive: string;
  layers: LayerList;
  mode: ExtractionMode;
  password?: string;
  /** Whether a tool may stop to ask on the terminal; false when unset */
  interactive?: boolean;
  /** Members of an ar archive, as listed by the member listing */
  members?: readonly string[];
}

interface TemplateValues {
  archive?: string;
  member?: string;
}

/** What the tools are told about passwords */
interface Credentials {
  password: string | undefined;
  interactive: boolean;
}

function passwordArgs(template: CommandTemplate, credentials: Credentials): readonly string[] {
  const { password, interactive } = credentials;
  if (password !== undefined) {
    return (template.passwordArgs ?? []).map((piece) => piece.replaceAll('{password}', password));
  }
  if (!interactive && template.batchPasswordArgs) return template.batchPasswordArgs;
  return template.noPasswordArgs ?? [];
}

function instantiate(
  template: CommandTemplate,
  values: TemplateValues,
  credentials: Credentials
): string[] {
  const args: string[] = [];
  for (const arg of template.args) {
    if (arg === '{password}') {
      args.push(...passwordArgs(template, credentials));
      continue;
    }
    let filled = arg;
    if (values.archive !== undefined) filled = filled.replaceAll('{archive}', values.archive);
    if (values.member !== undefined) filled = filled.replaceAll('{member}', values.member);
    args.push(filled);
  }
  return args;
}

type DataSource = FileRef | { kind: 'stream' };

/**
 * Accumulates stages while tracking where the data currently is: still in a
 * file, or flowing out of the last stage's stdout.
 */
class StageBuilder {
  readonly stages: PipelineStage[] = [];
  usesScratch = false;
  private source: DataSource;
  private segmentStart = 0;

  constructor(
    archive: string,
    private readonly cwd: StageCwd,
    private readonly credentials: Credentials
  ) {
    this.source = { kind: 'file', path: archive };
  }

  /** Stage that reads the current data on stdin */
  stream(command: ResolvedCommand, values: TemplateValues, description: string): void {
    this.push(command, values, description, this.source.kind === 'file' ? this.source : 'previous');
  }

  /** Stage that takes its input from a path argument and reads nothing on stdin */
  fromPath(command: ResolvedCommand, values: TemplateValues, description: string): void {
    this.push(command, values, description, 'none');
  }

  /**
   * Path of the current data. A stream is first written to a file in the
   * scratch directory; the stages producing it run there too.
   */
  pathFor(name: string): string {
    if (this.source.kind === 'file') return this.source.path;
    const materialized = `${SCRATCH_TOKEN}/${name}`;
    this.stages[this.stages.length - 1].stdout = { kind: 'file', path: materialized };
    for (let i = this.segmentStart; i < this.stages.length; i++) {
      this.stages[i].cwd = 'scratch';
    }
    this.segmentStart = this.stages.length;
    this.usesScratch = true;
    this.source = { kind: 'file', path: materialized };
    return materialized;
  }

  /** Route the final stage's output */
  finish(stdout: StageOutput): void {
    this.stages[this.stages.length - 1].stdout = stdout;
  }

  private push(
    command: ResolvedCommand,
    values: TemplateValues,
    description: string,
    stdin: StageInput
  ): void {
    this.stages.push({
      program: command.template.program,
      executable: command.executable,
      args: instantiate(command.template, values, this.credentials),
      stdin,
      stdout: 'next',
      cwd: this.cwd,
      description,
      warningExitCodes: command.template.warningExitCodes ?? [],
    });
    this.source = { kind: 'stream' };
  }
}

/** Name of a materialized intermediate: the archive name minus one suffix per filter. */
function materializedName(archive: string, filterCount: number): string {
  const pieces = path.basename(archive).split('.');
  const kept = pieces.slice(0, Math.max(1, pieces.length - filterCount)).join('.');
  return kept || 'payload';
}

function decodeAll(
  builder: StageBuilder,
  layers: readonly Layer[],
  resolver: ToolResolver,
  archive: string
): void {
  for (const layer of layers) {
    if (layer.kind !== 'compression') continue;
    const entry = COMPRESSION_TOOLS[layer.id];
    builder.stream(resolveFirstAvailable(entry.decoders, resolver, archive), {}, entry.description);
  }
}

function runContainerTool(
  builder: StageBuilder,
  strategy: DirectStrategy,
  mode: 'extract' | 'list',
  description: string,
  context: { archive: string; resolver: ToolResolver; materializeAs: string }
): ListFormat | null {
  const { tool, executable } = resolveContainerTool(
    strategy.candidates,
    mode,
    context.resolver,
    context.archive
  );
  const template: CommandTemplate = tool[mode];
  const command: ResolvedCommand = { template, executable };

  if (tool.input === 'stdin') {
    builder.stream(command, {}, description);
  } else {
    builder.fromPath(command, { archive: builder.pathFor(context.materializeAs) }, description);
  }

  if (mode === 'list') {
    builder.finish('capture');
    return tool.list.format;
  }
  builder.finish('relay');
  return null;
}

interface CompileContext {
  request: CompileRequest;
  resolver: ToolResolver;
  builder: StageBuilder;
}

/**
 * Compile the part of a pipeline that follows an unwrap step: optional
 * filters, then either a direct container or a file.
 */
function compileInner(
  context: CompileContext,
  inner: LayerList,
  fileName: string
): PipelineOutput {
  const { request, resolver, builder } = context;
  decodeAll(builder, inner, resolver, request.archive);
  const container = terminalContainer(inner);

  if (!container) {
    if (request.mode === 'list') {
      throw new UnsupportedModeError('compressed member', 'list', request.archive);
    }
    builder.finish({ kind: 'file', path: fileName });
    return { kind: 'file', name: fileName };
  }

  const entry = CONTAINER_TOOLS[container.id];
  if (entry.strategy.kind !== 'direct') {
    throw new UnrecognizedFormatError(request.archive);
  }
  const format = runContainerTool(
    builder,
    entry.strategy,
    request.mode === 'list' ? 'list' : 'extract',
    entry.description,
    { archive: request.archive, resolver, materializeAs: fileName }
  );
  return format ? { kind: 'listing', format } : { kind: 'tree' };
}

function findMember(
  strategy: MemberStrategy,
  request: CompileRequest,
  description: string
): string {
  const pattern = request.mode === 'metadata' ? strategy.metadataMember : strategy.dataMember;
  const member = request.members?.find((name) => pattern.test(name));
  if (member) return member;
  throw new ExtractionToolError(
    {
      archive: request.archive,
      program: strategy.listMembers.program,
      description,
      exitCode: 0,
      signal: null,
      stderr: '',
    },
    'extraction-tool',
    `${description} has no member matching ${pattern.source}`
  );
}

function stageCwdFor(mode: ExtractionMode): StageCwd {
  return mode === 'list' ? 'neutral' : 'destination';
}

/**
 * Compile `request` into a pipeline.
 * @throws UnsupportedModeError when the format cannot do what was asked
 * @throws MissingToolError when no candidate program is installed
 */
export function compilePipeline(
  request: CompileRequest,
  resolver: ToolResolver = toolAvailability
): CompiledPipeline {
  const { archive, layers, mode } = request;
  const fileName = path.basename(archive);
  const builder = new StageBuilder(archive, stageCwdFor(mode), {
    password: request.password,
    interactive: request.interactive ?? false,
  });
  const context: CompileContext = { request, resolver, builder };
  const filters = compressionLayers(layers);
  const container = terminalContainer(layers);
  const materializeAs = materializedName(archive, filters.length);

  let output: PipelineOutput;
  let alwaysWrap = false;

  if (!container) {
    if (mode !== 'extract') {
      throw new UnsupportedModeError('compressed file', mode, archive);
    }
    decodeAll(builder, layers, resolver, archive);
    const name = archiveBaseName(fileName, layers);
    builder.finish({ kind: 'file', path: name });
    output = { kind: 'file', name };
  } else {
    const entry = CONTAINER_TOOLS[container.id];
    alwaysWrap = entry.alwaysWrap ?? false;
    const { strategy } = entry;

    switch (strategy.kind) {
      case 'direct': {
        if (mode === 'metadata') {
          throw new UnsupportedModeError(entry.description, mode, archive);
        }
        decodeAll(builder, layers, resolver, archive);
        const format = runContainerTool(builder, strategy, mode, entry.description, {
          archive,
          resolver,
          materializeAs,
        });
        output = format ? { kind: 'listing', format } : { kind: 'tree' };
        break;
      }

      case 'unwrap': {
        const step = mode === 'metadata' ? strategy.metadata : strategy.extract;
        if (!step) throw new UnsupportedModeError(entry.description, mode, archive);
        const inner = toLayerList(step.inner);
        if (!inner) throw new UnrecognizedFormatError(archive);
        decodeAll(builder, layers, resolver, archive);
        const command = resolveCommand(step.unwrap, resolver, archive);
        if (step.input === 'stdin') {
          builder.stream(command, {}, step.description);
        } else {
          builder.fromPath(command, { archive: builder.pathFor(materializeAs) }, step.description);
        }
        output = compileInner(context, inner, metadataFileName(fileName));
        break;
      }

      case 'member': {
        const member = findMember(strategy, request, entry.description);
        const inner = classifyByName(member);
        if (!inner) throw new UnrecognizedFormatError(`${archive}(${member})`);
        decodeAll(builder, layers, resolver, archive);
        const command = resolveCommand(strategy.unwrap, resolver, archive);
        builder.fromPath(
          command,
          { archive: builder.pathFor(materializeAs), member },
          `${entry.description} member ${member}`
        );
        output = compileInner(context, inner, member);
        break;
      }
    }
  }

  const [first, ...rest] = builder.stages;
  if (!first) throw new UnrecognizedFormatError(archive);
  return {
    archive,
    mode,
    layers,
    stages: [first, ...rest],
    output,
    usesScratch: builder.usesScratch,
    alwaysWrap,
  };
}

/** True when the payload can only be found after listing the archive's members. */
export function needsMemberListing(layers: LayerList): boolean {
  const container = terminalContainer(layers);
  return container !== null && CONTAINER_TOOLS[container.id].strategy.kind === 'member';
}

/**
 * Pipeline that prints the member names of an ar-style package, one per
 * line. Its output feeds `CompileRequest.members`.
 */
export function compileMemberListing(
  request: Pick<CompileRequest, 'archive' | 'layers'>,
  resolver: ToolResolver = toolAvailability
): CompiledPipeline {
  const { archive, layers } = request;
  const container = terminalContainer(layers);
  const entry = container ? CONTAINER_TOOLS[container.id] : null;
  if (!entry || entry.strategy.kind !== 'member') {
    const format = entry?.description ?? 'compressed file';
    throw new UnsupportedModeError(format, 'member listing', archive);
  }

  const builder = new StageBuilder(archive, 'neutral', {
    password: undefined,
    interactive: false,
  });
  const filters = compressionLayers(layers);
  decodeAll(builder, layers, resolver, archive);
  const command = resolveCommand(entry.strategy.listMembers, resolver, archive);
  builder.fromPath(
    command,
    { archive: builder.pathFor(materializedName(archive, filters.length)) },
    entry.description
  );
  builder.finish('capture');

  const [first, ...rest] = builder.stages;
  if (!first) throw new UnrecognizedFormatError(archive);
  return {
    archive,
    mode: 'list',
    layers,
    stages: [first, ...rest],
    output: { kind: 'listing', format: 'lines' },
    usesScratch: builder.usesScratch,
    alwaysWrap: true,
  };
}

/** One-line rendering of a pipeline for debug logs, e.g. `gzip -dc < a.tgz | tar -x -f -` */
export function describePipeline(pipeline: Pick<CompiledPipeline, 'stages'>): string {
  const parts: string[] = [];
  for (const stage of pipeline.stages) {
    let text = [stage.program, ...stage.args].join(' ');
    if (typeof stage.stdin === 'object') text += ` < ${stage.stdin.path}`;
    if (typeof stage.stdout === 'object') text += ` > ${stage.stdout.path}`;
    parts.push(text);
    if (stage.stdout !== 'next') parts.push(';');
    else parts.push('|');
  }
  parts.pop();
  return parts.join(' ');
}
