/**
 * Tool Registry
 *
 * One row per layer: which external programs peel it, with what arguments,
 * and what they can do. Adding a format means adding a row here and a
 * suffix in data/suffixes.json.
 *
 * Argument templates use placeholders filled in by the pipeline compiler:
 *   {archive}   absolute path of the archive (or its materialized copy)
 *   {member}    member name inside an ar/tar wrapper
 *   {password}  expands to passwordArgs, or noPasswordArgs when none was given
 *               (batchPasswordArgs instead when nobody can answer a prompt)
 */

import { MissingToolError } from '../errors/archive-errors';
import type { CompressionId, ContainerId, LayerId } from './layers';
import type { ToolResolver } from './tool-availability';

export type ListFormat =
  | 'lines'
  | '7z'
  | 'unrar'
  | 'lsar'
  | 'cabextract'
  | 'lha'
  | 'arj'
  | 'unshield';

export interface CommandTemplate {
  program: string;
  args: readonly string[];
  passwordArgs?: readonly string[];
  noPasswordArgs?: readonly string[];
  /**
   * Used instead of noPasswordArgs in non-interactive runs, for tools that
   * ask for a password on the terminal even when stdin is not one
   */
  batchPasswordArgs?: readonly string[];
  /** Exit statuses that signal warnings rather than failure */
  warningExitCodes?: readonly number[];
}

/** How a container tool receives the archive */
export type ArchiveInput = 'stdin' | 'path';

export interface ContainerTool {
  input: ArchiveInput;
  extract: CommandTemplate;
  list: CommandTemplate & { format: ListFormat };
}

/** Containers opened directly by one of several interchangeable tools */
export interface DirectStrategy {
  kind: 'direct';
  candidates: readonly [ContainerTool, ...ContainerTool[]];
}

/**
 * Containers that wrap another archive: an unwrap command emits the inner
 * stream, which is then peeled like an ordinary layer list.
 */
export interface UnwrapStep {
  unwrap: CommandTemplate;
  input: ArchiveInput;
  inner: readonly [LayerId, ...LayerId[]];
  /** Short label used in error messages */
  description: string;
}

export interface UnwrapStrategy {
  kind: 'unwrap';
  extract: UnwrapStep;
  metadata?: UnwrapStep;
}

/**
 * Debian packages: the payload member's name (and so its compression) is
 * only known after listing the ar archive.
 */
export interface MemberStrategy {
  kind: 'member';
  listMembers: CommandTemplate;
  unwrap: CommandTemplate;
  dataMember: RegExp;
  metadataMember: RegExp;
  /** Container the member decompresses to */
  inner: ContainerId;
}

export type ContainerStrategy = DirectStrategy | UnwrapStrategy | MemberStrategy;

export interface ContainerEntry {
  id: ContainerId;
  description: string;
  strategy: ContainerStrategy;
  /** Output always gets its own directory; the single-entry heuristic is skipped */
  alwaysWrap?: boolean;
}

export interface CompressionEntry {
  id: CompressionId;
  description: string;
  /** Streaming decoders, stdin to stdout, in order of preference */
  decoders: readonly [CommandTemplate, ...CommandTemplate[]];
}

// =============================================================================
// COMPRESSION FILTERS
// =============================================================================

export const COMPRESSION_TOOLS: Record<CompressionId, CompressionEntry> = {
  gzip: {
    id: 'gzip',
    description: 'gzip',
    decoders: [
      { program: 'gzip', args: ['-dc'] },
      { program: 'pigz', args: ['-dc'] },
    ],
  },
  bzip2: {
    id: 'bzip2',
    description: 'bzip2',
    decoders: [
      { program: 'bzip2', args: ['-dc'] },
      { program: 'lbzip2', args: ['-dc'] },
    ],
  },
  xz: { id: 'xz', description: 'xz', decoders: [{ program: 'xz', args: ['-dc'] }] },
  lzma: {
    id: 'lzma',
    description: 'lzma',
    decoders: [
      { program: 'lzma', args: ['-dc'] },
      { program: 'xz', args: ['--format=lzma', '-dc'] },
    ],
  },
  compress: {
    id: 'compress',
    description: 'compress (.Z)',
    decoders: [
      { program: 'gzip', args: ['-dc'] },
      { program: 'uncompress', args: ['-c'] },
    ],
  },
  lrzip: { id: 'lrzip', description: 'lrzip', decoders: [{ program: 'lrzcat', args: ['-q'] }] },
  lzip: { id: 'lzip', description: 'lzip', decoders: [{ program: 'lzip', args: ['-cd'] }] },
  brotli: {
    id: 'brotli',
    description: 'brotli',
    decoders: [{ program: 'brotli', args: ['--decompress', '--stdout'] }],
  },
  zstd: { id: 'zstd', description: 'zstd', decoders: [{ program: 'zstd', args: ['-dcq'] }] },
};

// =============================================================================
// CONTAINERS
// =============================================================================

const SEVEN_ZIP_TOOLS: readonly [ContainerTool, ...ContainerTool[]] = [
  {
    input: 'path',
    extract: {
      program: '7z',
      args: ['x', '-y', '{password}', '{archive}'],
      passwordArgs: ['-p{password}'],
      warningExitCodes: [1],
    },
    list: { program: '7z', args: ['l', '-ba', '{archive}'], format: '7z' },
  },
  {
    input: 'path',
    extract: {
      program: '7za',
      args: ['x', '-y', '{password}', '{archive}'],
      passwordArgs: ['-p{password}'],
      warningExitCodes: [1],
    },
    list: { program: '7za', args: ['l', '-ba', '{archive}'], format: '7z' },
  },
];

const TAR_TOOL: ContainerTool = {
  input: 'stdin',
  extract: { program: 'tar', args: ['-x', '-f', '-'] },
  list: { program: 'tar', args: ['-t', '-f', '-'], format: 'lines' },
};

const CPIO_TOOL: ContainerTool = {
  input: 'stdin',
  extract: {
    program: 'cpio',
    args: ['-i', '--make-directories', '--quiet', '--no-absolute-filenames'],
  },
  list: { program: 'cpio', args: ['-t', '--quiet'], format: 'lines' },
};

export const CONTAINER_TOOLS: Record<ContainerId, ContainerEntry> = {
  tar: { id: 'tar', description: 'tar file', strategy: { kind: 'direct', candidates: [TAR_TOOL] } },
  cpio: {
    id: 'cpio',
    description: 'cpio file',
    strategy: { kind: 'direct', candidates: [CPIO_TOOL] },
  },
  zip: {
    id: 'zip',
    description: 'Zip file',
    strategy: {
      kind: 'direct',
      candidates: [
        {
          input: 'path',
          extract: {
            program: 'unzip',
            args: ['-q', '{password}', '{archive}'],
            passwordArgs: ['-P', '{password}'],
            // unzip reads its prompt from /dev/tty; an empty password fails instead
            batchPasswordArgs: ['-P', ''],
            warningExitCodes: [1],
          },
          list: { program: 'zipinfo', args: ['-1', '{archive}'], format: 'lines' },
        },
        ...SEVEN_ZIP_TOOLS,
      ],
    },
  },
  '7z': {
    id: '7z',
    description: '7z file',
    strategy: { kind: 'direct', candidates: SEVEN_ZIP_TOOLS },
  },
  msi: {
    id: 'msi',
    description: 'Windows Installer package',
    strategy: { kind: 'direct', candidates: SEVEN_ZIP_TOOLS },
  },
  dmg: {
    id: 'dmg',
    description: 'Apple disk image',
    strategy: { kind: 'direct', candidates: SEVEN_ZIP_TOOLS },
  },
  rar: {
    id: 'rar',
    description: 'RAR archive',
    strategy: {
      kind: 'direct',
      candidates: [
        {
          input: 'path',
          extract: {
            program: 'unrar',
            args: ['x', '-y', '{password}', '{archive}'],
            passwordArgs: ['-p{password}'],
            // "-p-" stops unrar from asking for a password on the terminal
            noPasswordArgs: ['-p-'],
            warningExitCodes: [1],
          },
          list: { program: 'unrar', args: ['v', '{archive}'], format: 'unrar' },
        },
        {
          input: 'path',
          extract: {
            program: 'unar',
            args: ['-D', '{password}', '{archive}'],
            passwordArgs: ['-p', '{password}'],
          },
          list: { program: 'lsar', args: ['{archive}'], format: 'lsar' },
        },
      ],
    },
  },
  cab: {
    id: 'cab',
    description: 'CAB archive',
    strategy: {
      kind: 'direct',
      candidates: [
        {
          input: 'path',
          extract: { program: 'cabextract', args: ['-q', '{archive}'] },
          list: { program: 'cabextract', args: ['-l', '{archive}'], format: 'cabextract' },
        },
      ],
    },
  },
  lzh: {
    id: 'lzh',
    description: 'LZH file',
    strategy: {
      kind: 'direct',
      candidates: [
        {
          input: 'path',
          extract: { program: 'lha', args: ['xq', '{archive}'] },
          list: { program: 'lha', args: ['l', '{archive}'], format: 'lha' },
        },
      ],
    },
  },
  arj: {
    id: 'arj',
    description: 'ARJ archive',
    strategy: {
      kind: 'direct',
      candidates: [
        {
          input: 'path',
          extract: {
            program: 'arj',
            args: ['x', '-y', '{password}', '{archive}'],
            passwordArgs: ['-g{password}'],
            warningExitCodes: [1],
          },
          list: { program: 'arj', args: ['v', '{archive}'], format: 'arj' },
        },
      ],
    },
  },
  installshield: {
    id: 'installshield',
    description: 'InstallShield archive',
    strategy: {
      kind: 'direct',
      candidates: [
        {
          input: 'path',
          extract: { program: 'unshield', args: ['x', '{archive}'] },
          list: { program: 'unshield', args: ['l', '{archive}'], format: 'unshield' },
        },
      ],
    },
  },
  rpm: {
    id: 'rpm',
    description: 'RPM',
    alwaysWrap: true,
    strategy: {
      kind: 'unwrap',
      extract: {
        unwrap: { program: 'rpm2cpio', args: ['-'] },
        input: 'stdin',
        inner: ['cpio'],
        description: 'rpm2cpio',
      },
    },
  },
  gem: {
    id: 'gem',
    description: 'Ruby gem',
    alwaysWrap: true,
    strategy: {
      kind: 'unwrap',
      extract: {
        unwrap: { program: 'tar', args: ['-xO', '-f', '-', 'data.tar.gz'] },
        input: 'stdin',
        inner: ['gzip', 'tar'],
        description: 'data.tar.gz extraction',
      },
      metadata: {
        unwrap: { program: 'tar', args: ['-xO', '-f', '-', 'metadata.gz'] },
        input: 'stdin',
        inner: ['gzip'],
        description: 'metadata.gz extraction',
      },
    },
  },
  deb: {
    id: 'deb',
    description: 'Debian package',
    alwaysWrap: true,
    strategy: {
      kind: 'member',
      listMembers: { program: 'ar', args: ['t', '{archive}'] },
      unwrap: { program: 'ar', args: ['p', '{archive}', '{member}'] },
      dataMember: /^data\.tar(\.[A-Za-z0-9]+)?$/,
      metadataMember: /^control\.tar(\.[A-Za-z0-9]+)?$/,
      inner: 'tar',
    },
  },
};

// =============================================================================
// LOOKUPS
// =============================================================================

export interface ResolvedCommand {
  template: CommandTemplate;
  executable: string;
}

/**
 * Pick the first template whose program is installed.
 * @throws MissingToolError naming the preferred program when none is
 */
export function resolveFirstAvailable(
  templates: readonly [CommandTemplate, ...CommandTemplate[]],
  resolver: ToolResolver,
  archive?: string
): ResolvedCommand {
  for (const template of templates) {
    const executable = resolver.resolve(template.program);
    if (executable) return { template, executable };
  }
  throw new MissingToolError(templates[0].program, archive);
}

export function resolveCommand(
  template: CommandTemplate,
  resolver: ToolResolver,
  archive?: string
): ResolvedCommand {
  return resolveFirstAvailable([template], resolver, archive);
}

/** Candidate that can handle `mode`, preferring earlier entries that are installed. */
export function resolveContainerTool(
  candidates: DirectStrategy['candidates'],
  mode: 'extract' | 'list',
  resolver: ToolResolver,
  archive?: string
): { tool: ContainerTool; executable: string } {
  for (const tool of candidates) {
    const executable = resolver.resolve(tool[mode].program);
    if (executable) return { tool, executable };
  }
  throw new MissingToolError(candidates[0][mode].program, archive);
}
