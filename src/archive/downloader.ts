/**
 * URL inputs
 *
 * Fetches a remote archive into the working directory with an external
 * downloader (wget, else curl) before it is classified. The local name is
 * the URL's basename; an existing file of that name is never reused.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  DownloadError,
  ExtractionInterruptedError,
  UsageError,
  isArchiveError,
} from '../errors/archive-errors';
import type { Logger } from '../utils/logger';
import { type RunnablePipeline, runPipeline } from './process-runner';
import { type ToolResolver, toolAvailability } from './tool-availability';

const URL_SCHEMES = ['http:', 'https:', 'ftp:'];

interface DownloaderTool {
  program: string;
  args: (url: string, target: string) => string[];
}

const DOWNLOADERS: readonly DownloaderTool[] = [
  { program: 'wget', args: (url, target) => ['--quiet', '--output-document', target, url] },
  {
    program: 'curl',
    args: (url, target) => [
      '--fail',
      '--silent',
      '--show-error',
      '--location',
      '--output',
      target,
      url,
    ],
  },
];

export function isUrl(input: string): boolean {
  try {
    return URL_SCHEMES.includes(new URL(input).protocol);
  } catch {
    return false;
  }
}

/** Local file name for a URL: the last path segment, decoded. */
export function downloadFileName(url: string): string {
  const { pathname } = new URL(url);
  let name = path.posix.basename(pathname);
  try {
    name = decodeURIComponent(name);
  } catch {
    // Malformed escapes: keep the raw segment
  }
  if (!name || name === '.' || name === '..' || name.includes('/')) {
    throw new UsageError(`cannot derive a file name from ${url}`);
  }
  return name;
}

export interface DownloadOptions {
  workingDir: string;
  logger: Logger;
  resolver?: ToolResolver;
  signal?: AbortSignal;
}

/**
 * Download `url` and return the local path.
 * @throws UsageError when the target file already exists
 * @throws DownloadError when no downloader is installed or the transfer fails
 */
export async function downloadArchive(url: string, options: DownloadOptions): Promise<string> {
  const resolver = options.resolver ?? toolAvailability;
  const target = path.join(options.workingDir, downloadFileName(url));

  const existing = await fs.lstat(target).catch(() => null);
  if (existing) {
    throw new UsageError(`${target} already exists; not downloading ${url} over it`);
  }

  for (const tool of DOWNLOADERS) {
    const executable = resolver.resolve(tool.program);
    if (!executable) continue;

    options.logger.info(`downloading ${url}`);
    const pipeline: RunnablePipeline = {
      archive: url,
      stages: [
        {
          program: tool.program,
          executable,
          args: tool.args(url, target),
          stdin: 'none',
          stdout: 'discard',
          cwd: 'destination',
          description: 'download',
          warningExitCodes: [],
        },
      ],
      usesScratch: false,
    };

    try {
      await runPipeline(pipeline, {
        destination: options.workingDir,
        logger: options.logger,
        signal: options.signal,
      });
      return target;
    } catch (error) {
      await fs.rm(target, { force: true });
      if (error instanceof ExtractionInterruptedError) throw error;
      const detail = isArchiveError(error) ? (error.stderr ?? '').trim() : '';
      throw new DownloadError(url, detail || `${tool.program} failed`);
    }
  }

  const programs = DOWNLOADERS.map((tool) => tool.program).join(' nor ');
  throw new DownloadError(url, `neither ${programs} is installed`);
}
