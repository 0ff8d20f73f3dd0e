/**
 * Archive Error Taxonomy
 *
 * Every failure peel reports is an ArchiveError subclass. The `kind`
 * discriminator lets callers switch on the failure without instanceof chains.
 */

export type ArchiveErrorKind =
  | 'unrecognized-format'
  | 'missing-tool'
  | 'unsupported-mode'
  | 'extraction-tool'
  | 'password-protected'
  | 'unsupported-compression'
  | 'destination-collision'
  | 'download'
  | 'interrupted'
  | 'filesystem'
  | 'usage';

interface ArchiveErrorOptions {
  archive?: string;
  stderr?: string;
  cause?: unknown;
}

export class ArchiveError extends Error {
  readonly kind: ArchiveErrorKind;
  readonly archive?: string;
  readonly stderr?: string;

  constructor(kind: ArchiveErrorKind, message: string, options: ArchiveErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ArchiveError';
    this.kind = kind;
    if (options.archive !== undefined) this.archive = options.archive;
    if (options.stderr !== undefined) this.stderr = options.stderr;
  }
}

export class UnrecognizedFormatError extends ArchiveError {
  constructor(archive: string) {
    super('unrecognized-format', 'not a known archive type', { archive });
    this.name = 'UnrecognizedFormatError';
  }
}

export class MissingToolError extends ArchiveError {
  constructor(
    public readonly tool: string,
    archive?: string
  ) {
    super('missing-tool', `required program "${tool}" is not installed`, { archive });
    this.name = 'MissingToolError';
  }
}

export class UnsupportedModeError extends ArchiveError {
  constructor(
    public readonly format: string,
    public readonly mode: string,
    archive?: string
  ) {
    super('unsupported-mode', `${format} archives do not support ${mode} mode`, { archive });
    this.name = 'UnsupportedModeError';
  }
}

export interface ToolFailure {
  archive: string;
  program: string;
  description: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
}

function describeExit(failure: ToolFailure): string {
  if (failure.signal) return `was killed by ${failure.signal}`;
  return `returned status code ${failure.exitCode ?? 'unknown'}`;
}

export class ExtractionToolError extends ArchiveError {
  readonly program: string;
  readonly exitCode: number | null;

  constructor(failure: ToolFailure, kind: ArchiveErrorKind = 'extraction-tool', message?: string) {
    super(
      kind,
      message ?? `${failure.description} error: '${failure.program}' ${describeExit(failure)}`,
      { archive: failure.archive, stderr: failure.stderr }
    );
    this.name = 'ExtractionToolError';
    this.program = failure.program;
    this.exitCode = failure.exitCode;
  }
}

export class PasswordProtectedError extends ExtractionToolError {
  constructor(failure: ToolFailure) {
    super(
      failure,
      'password-protected',
      'archive is encrypted; pass the password with --password ' +
        `(${failure.program} ${describeExit(failure)})`
    );
    this.name = 'PasswordProtectedError';
  }
}

export class UnsupportedCompressionError extends ExtractionToolError {
  constructor(failure: ToolFailure) {
    super(
      failure,
      'unsupported-compression',
      `'${failure.program}' does not support the compression method used in this archive`
    );
    this.name = 'UnsupportedCompressionError';
  }
}

export class DestinationCollisionError extends ArchiveError {
  constructor(
    public readonly target: string,
    archive?: string,
    detail = 'already exists and no free name was found'
  ) {
    super('destination-collision', `"${target}" ${detail}`, { archive });
    this.name = 'DestinationCollisionError';
  }
}

export class DownloadError extends ArchiveError {
  constructor(url: string, detail: string) {
    super('download', `could not download ${url}: ${detail}`, { archive: url });
    this.name = 'DownloadError';
  }
}

export class ExtractionInterruptedError extends ArchiveError {
  constructor(
    archive: string,
    public readonly destination: string | null
  ) {
    super(
      'interrupted',
      destination
        ? `interrupted; contents of ${destination} are indeterminate`
        : 'interrupted before any output was written',
      { archive }
    );
    this.name = 'ExtractionInterruptedError';
  }
}

export class UsageError extends ArchiveError {
  constructor(message: string) {
    super('usage', message);
    this.name = 'UsageError';
  }
}

/** Non-fatal: the permission normalizer could not widen an entry. */
export interface PermissionWarning {
  kind: 'permission';
  path: string;
  message: string;
}

export function isArchiveError(error: unknown): error is ArchiveError {
  return error instanceof ArchiveError;
}
