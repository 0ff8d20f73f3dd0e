/**
 * Recursion Controller
 *
 * Finds archives inside freshly extracted output and decides which of them
 * may be extracted in turn. Loops are cut three ways: a depth bound, a set
 * of canonical paths already entered, and content digests of the archives
 * on the current chain (an archive holding a copy of itself).
 */

import { createHash } from 'crypto';
import { createReadStream, promises as fs } from 'fs';
import * as path from 'path';
import type { Logger } from '../utils/logger';
import { classifyByName } from './format-classifier';
import type { LayerList } from './layers';

export interface NestedArchive {
  path: string;
  layers: LayerList;
}

/** One archive on the chain from a top-level input down to the current one */
export interface AncestorArchive {
  path: string;
  digest: string;
}

export type RecursionDecision =
  | { follow: true; ancestor: AncestorArchive }
  | { follow: false; reason: 'depth' | 'visited' | 'self-copy' };

export async function fileDigest(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export interface NestedScan {
  archives: NestedArchive[];
  /** Regular files seen, archives included */
  fileCount: number;
}

/** Archives below `roots`, recognised by name. Symlinks are not followed. */
export async function findNestedArchives(roots: readonly string[]): Promise<NestedScan> {
  const scan: NestedScan = { archives: [], fileCount: 0 };
  const visit = async (target: string): Promise<void> => {
    const stats = await fs.lstat(target);
    if (stats.isSymbolicLink()) return;
    if (stats.isDirectory()) {
      for (const entry of (await fs.readdir(target)).sort()) {
        await visit(path.join(target, entry));
      }
      return;
    }
    if (!stats.isFile()) return;
    scan.fileCount++;
    const layers = classifyByName(path.basename(target));
    if (layers) scan.archives.push({ path: target, layers });
  };
  for (const root of roots) await visit(root);
  return scan;
}

export class RecursionController {
  private readonly visited = new Set<string>();

  constructor(
    readonly maxDepth: number,
    private readonly logger: Logger
  ) {}

  /** Record a top-level input so a nested copy of the same path is not re-entered. */
  async enterRoot(archivePath: string): Promise<AncestorArchive> {
    const canonical = await fs.realpath(archivePath);
    this.visited.add(canonical);
    return { path: canonical, digest: await fileDigest(canonical) };
  }

  /**
   * Whether `nested`, found `depth` levels below a top-level input, should
   * be extracted. `ancestors` is the chain that produced it.
   */
  async decide(
    nested: string,
    depth: number,
    ancestors: readonly AncestorArchive[]
  ): Promise<RecursionDecision> {
    if (depth > this.maxDepth) {
      this.logger.warn(`${nested}: not extracted, nesting is deeper than ${this.maxDepth} levels`);
      return { follow: false, reason: 'depth' };
    }

    const canonical = await fs.realpath(nested);
    if (this.visited.has(canonical)) {
      this.logger.debug(`${nested}: already extracted in this run`);
      return { follow: false, reason: 'visited' };
    }

    const digest = await fileDigest(canonical);
    const copyOf = ancestors.find((ancestor) => ancestor.digest === digest);
    if (copyOf) {
      this.logger.warn(`${nested}: is a copy of ${copyOf.path}; not extracting it again`);
      return { follow: false, reason: 'self-copy' };
    }

    this.visited.add(canonical);
    return { follow: true, ancestor: { path: canonical, digest } };
  }
}
