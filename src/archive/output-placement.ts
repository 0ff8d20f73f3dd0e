/**
 * Output Placement Policy
 *
 * Extraction always lands in a private staging directory inside the
 * working directory first. This module picks the final name before the
 * tools run, then moves the staged tree there afterwards, applying the
 * collision, flat and single-entry rules.
 */

import { type Stats, promises as fs } from 'fs';
import * as path from 'path';
import { DestinationCollisionError } from '../errors/archive-errors';
import type { SingleEntryDisposition } from '../types/config';
import type { InteractionController } from './interaction-controller';

/** Highest numeric suffix tried before a collision is reported as unresolved */
export const MAX_COLLISION_SUFFIX = 99;

export const STAGING_PREFIX = '.peel-';

/**
 * How the destination is written:
 * - fresh: the name did not exist; the output is renamed into place
 * - merge: the name exists and --overwrite (or the user) allowed writing into it
 * - flat:  everything goes straight into the working directory
 */
export type DestinationMode = 'fresh' | 'merge' | 'flat';

export interface Destination {
  /** Archive name with its recognised suffixes removed */
  baseName: string;
  /** Absolute final path: a directory, a single file, or the working directory when flat */
  path: string;
  mode: DestinationMode;
  /** Set once the single-entry heuristic has run */
  disposition: SingleEntryDisposition | null;
}

export interface PlacementPolicy {
  workingDir: string;
  overwrite: boolean;
  flat: boolean;
  controller: InteractionController;
}

export interface Placement {
  destination: Destination;
  /** Top-level paths that now hold the archive's contents */
  placed: string[];
  /**
   * Roots of what was moved out of staging. Equal to `placed` unless the
   * output was merged into existing directories, whose older contents are
   * not listed.
   */
  written: string[];
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}

/** `name-N`, or `stem-N.ext` for names with a short extension */
export function suffixedName(name: string, n: number, isFile: boolean): string {
  if (isFile) {
    const ext = path.extname(name);
    if (ext && ext !== name && ext.length <= 5) {
      return `${name.slice(0, -ext.length)}-${n}${ext}`;
    }
  }
  return `${name}-${n}`;
}

export async function findFreeName(
  dir: string,
  name: string,
  isFile: boolean,
  archive?: string
): Promise<string> {
  if (!(await exists(path.join(dir, name)))) return path.join(dir, name);
  for (let n = 1; n <= MAX_COLLISION_SUFFIX; n++) {
    const candidate = path.join(dir, suffixedName(name, n, isFile));
    if (!(await exists(candidate))) return candidate;
  }
  throw new DestinationCollisionError(path.join(dir, name), archive);
}

/**
 * Choose where `name` goes in the working directory. Runs before any
 * extraction I/O; a taken name is resolved by the controller (numeric
 * suffix unless the user says otherwise).
 */
export async function resolveTarget(
  name: string,
  isFile: boolean,
  policy: PlacementPolicy,
  archive: string
): Promise<{ path: string; mode: 'fresh' | 'merge' }> {
  const target = path.join(policy.workingDir, name);
  if (!(await exists(target))) return { path: target, mode: 'fresh' };
  if (policy.overwrite) return { path: target, mode: 'merge' };

  const choice = await policy.controller.resolveCollision(archive, target);
  switch (choice) {
    case 'overwrite':
      return { path: target, mode: 'merge' };
    case 'skip':
      throw new DestinationCollisionError(target, archive, 'already exists; skipped');
    case 'suffix':
      return {
        path: await findFreeName(policy.workingDir, name, isFile, archive),
        mode: 'fresh',
      };
  }
}

export async function planDestination(
  baseName: string,
  outputName: string,
  isFile: boolean,
  policy: PlacementPolicy,
  archive: string
): Promise<Destination> {
  if (policy.flat) {
    return { baseName, path: policy.workingDir, mode: 'flat', disposition: null };
  }
  const target = await resolveTarget(outputName, isFile, policy, archive);
  return { baseName, path: target.path, mode: target.mode, disposition: null };
}

export async function createStaging(workingDir: string): Promise<string> {
  return fs.mkdtemp(path.join(workingDir, STAGING_PREFIX));
}

/**
 * Move `source` onto `target`. Directories are merged entry by entry;
 * anything else replaces what was there. Returns the roots of the moved
 * subtrees, in sorted order.
 */
export async function mergeInto(source: string, target: string): Promise<string[]> {
  const sourceStats = await fs.lstat(source);
  let targetStats: Stats;
  try {
    targetStats = await fs.lstat(target);
  } catch {
    await fs.rename(source, target);
    return [target];
  }

  if (sourceStats.isDirectory() && targetStats.isDirectory()) {
    const written: string[] = [];
    for (const entry of (await fs.readdir(source)).sort()) {
      written.push(...(await mergeInto(path.join(source, entry), path.join(target, entry))));
    }
    await fs.rmdir(source);
    return written;
  }

  await fs.rm(target, { recursive: true, force: true });
  await fs.rename(source, target);
  return [target];
}

/**
 * Move `source` to `target`, which was free when the destination was
 * planned. If something took the name since, the next free suffix is used.
 */
async function moveFresh(
  source: string,
  target: string,
  isFile: boolean,
  archive: string
): Promise<string> {
  const free = (await exists(target))
    ? await findFreeName(path.dirname(target), path.basename(target), isFile, archive)
    : target;
  await fs.rename(source, free);
  return free;
}

interface Moved {
  path: string;
  written: string[];
}

async function moveTo(
  source: string,
  destination: Destination,
  isFile: boolean,
  archive: string
): Promise<Moved> {
  if (destination.mode === 'merge') {
    return { path: destination.path, written: await mergeInto(source, destination.path) };
  }
  const placed = await moveFresh(source, destination.path, isFile, archive);
  return { path: placed, written: [placed] };
}

function placedAt(destination: Destination, moved: Moved): Placement {
  return {
    destination: { ...destination, path: moved.path },
    placed: [moved.path],
    written: moved.written,
  };
}

export interface PlaceRequest {
  archive: string;
  staging: string;
  destination: Destination;
  policy: PlacementPolicy;
  /** Skip the single-entry heuristic and keep everything in one directory */
  alwaysWrap: boolean;
  /** The output is one named file (plain compressed input, gem metadata) */
  fileOutput?: string;
}

/**
 * Move staged output to its final place and remove the staging directory.
 * Returns the placed top-level paths; empty when the archive was empty.
 */
export async function placeOutput(request: PlaceRequest): Promise<Placement> {
  const { archive, staging, policy } = request;
  const destination: Destination = { ...request.destination };
  const entries = (await fs.readdir(staging)).sort();

  if (entries.length === 0) {
    await fs.rmdir(staging);
    return { destination, placed: [], written: [] };
  }

  if (destination.mode === 'flat') {
    const placed: string[] = [];
    const written: string[] = [];
    for (const entry of entries) {
      const target = path.join(policy.workingDir, entry);
      written.push(...(await mergeInto(path.join(staging, entry), target)));
      placed.push(target);
    }
    await fs.rmdir(staging);
    return { destination, placed, written };
  }

  if (request.fileOutput && entries.length === 1 && entries[0] === request.fileOutput) {
    const moved = await moveTo(path.join(staging, entries[0]), destination, true, archive);
    await fs.rmdir(staging);
    return placedAt(destination, moved);
  }

  if (request.alwaysWrap || entries.length > 1) {
    return placedAt(destination, await moveTo(staging, destination, false, archive));
  }

  const [entry] = entries;
  const entryPath = path.join(staging, entry);
  const entryIsFile = !(await fs.lstat(entryPath)).isDirectory();

  if (entry === destination.baseName) {
    // Already named after the archive: no extra nesting.
    const moved = await moveTo(entryPath, destination, entryIsFile, archive);
    await fs.rmdir(staging);
    return placedAt(destination, moved);
  }

  const disposition = await policy.controller.resolveSingleEntry({
    archive,
    entry,
    entryType: entryIsFile ? 'file' : 'directory',
    baseName: destination.baseName,
  });
  destination.disposition = disposition;

  switch (disposition) {
    case 'inside':
      return placedAt(destination, await moveTo(staging, destination, false, archive));
    case 'rename': {
      const moved = await moveTo(entryPath, destination, entryIsFile, archive);
      await fs.rmdir(staging);
      return placedAt(destination, moved);
    }
    case 'here': {
      const own = await resolveTarget(entry, entryIsFile, policy, archive);
      const moved = await moveTo(
        entryPath,
        { ...destination, path: own.path, mode: own.mode },
        entryIsFile,
        archive
      );
      await fs.rmdir(staging);
      return placedAt(destination, moved);
    }
  }
}

/**
 * Move whatever a failed or interrupted run left in staging to the planned
 * destination, or remove staging when it is empty. Returns the path that
 * now holds partial output, or null.
 */
export async function salvageStaging(
  staging: string,
  destination: Destination,
  workingDir: string,
  archive: string
): Promise<string | null> {
  const entries = await fs.readdir(staging);
  if (entries.length === 0) {
    await fs.rmdir(staging);
    return null;
  }
  if (destination.mode === 'flat') {
    for (const entry of entries) {
      await mergeInto(path.join(staging, entry), path.join(workingDir, entry));
    }
    await fs.rmdir(staging);
    return workingDir;
  }
  return (await moveTo(staging, destination, false, archive)).path;
}

/** Placed files and directories, relative to `root`, directories with a trailing slash. */
export async function listTree(paths: readonly string[], root: string): Promise<string[]> {
  const lines: string[] = [];
  const visit = async (target: string): Promise<void> => {
    const stats = await fs.lstat(target);
    const relative = path.relative(root, target) || '.';
    if (stats.isDirectory()) {
      lines.push(`${relative}/`);
      for (const entry of (await fs.readdir(target)).sort()) {
        await visit(path.join(target, entry));
      }
    } else {
      lines.push(relative);
    }
  };
  for (const target of paths) await visit(target);
  return lines;
}
