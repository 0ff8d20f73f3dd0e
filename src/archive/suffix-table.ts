/**
 * Suffix Table
 *
 * Loads the recognised file-name suffixes from data/suffixes.json and
 * answers which layers a file name declares.
 */

import suffixData from './data/suffixes.json';
import {
  type CompressionId,
  type ContainerId,
  type LayerId,
  type LayerList,
  isCompressionId,
  isContainerId,
  toLayerList,
} from './layers';

interface SuffixTable {
  compression: Map<string, CompressionId>;
  containers: Map<string, ContainerId>;
  aliases: Map<string, LayerId[]>;
}

function loadTable(): SuffixTable {
  const compression = new Map<string, CompressionId>();
  for (const [ext, id] of Object.entries(suffixData.compression)) {
    if (!isCompressionId(id)) throw new Error(`suffixes.json: unknown compression "${id}"`);
    compression.set(ext, id);
  }

  const containers = new Map<string, ContainerId>();
  for (const [ext, id] of Object.entries(suffixData.containers)) {
    if (!isContainerId(id)) throw new Error(`suffixes.json: unknown container "${id}"`);
    containers.set(ext, id);
  }

  const aliases = new Map<string, LayerId[]>();
  for (const [ext, ids] of Object.entries(suffixData.aliases)) {
    const layers: LayerId[] = [];
    for (const id of ids) {
      if (!isCompressionId(id) && !isContainerId(id)) {
        throw new Error(`suffixes.json: unknown layer "${id}" for .${ext}`);
      }
      layers.push(id);
    }
    aliases.set(ext, layers);
  }

  return { compression, containers, aliases };
}

const TABLE = loadTable();

/** Exact match first, then a lowercase retry so `.TAR.GZ` and `.Zip` still resolve. */
function lookup<T>(map: Map<string, T>, ext: string): T | undefined {
  return map.get(ext) ?? map.get(ext.toLowerCase());
}

export interface SuffixMatch {
  /** File name with the recognised suffix removed */
  base: string;
  /** The recognised suffix including its leading dot(s) */
  suffix: string;
  layers: LayerList;
}

/**
 * Split a file name into base and the longest recognised compound suffix.
 * `base + suffix` always reproduces the input.
 */
export function splitSuffix(fileName: string): SuffixMatch | null {
  const pieces = fileName.split('.');

  if (pieces.length >= 3) {
    const inner = pieces[pieces.length - 2];
    const outer = pieces[pieces.length - 1];
    const container = lookup(TABLE.containers, inner);
    const compression = lookup(TABLE.compression, outer);
    const base = pieces.slice(0, -2).join('.');
    if (container && compression && base) {
      const layers = toLayerList([compression, container]);
      if (layers) return { base, suffix: `.${inner}.${outer}`, layers };
    }
  }

  if (pieces.length >= 2) {
    const ext = pieces[pieces.length - 1];
    const base = pieces.slice(0, -1).join('.');
    if (!base) return null;
    const ids: LayerId[] | undefined =
      lookup(TABLE.aliases, ext) ??
      mapSingle(lookup(TABLE.compression, ext)) ??
      mapSingle(lookup(TABLE.containers, ext));
    const layers = ids ? toLayerList(ids) : null;
    if (layers) return { base, suffix: `.${ext}`, layers };
  }

  return null;
}

function mapSingle(id: LayerId | undefined): LayerId[] | undefined {
  return id ? [id] : undefined;
}

/** Every recognised suffix, sorted, without leading dots. */
export function supportedSuffixes(): string[] {
  const suffixes = new Set<string>([
    ...TABLE.compression.keys(),
    ...TABLE.containers.keys(),
    ...TABLE.aliases.keys(),
  ]);
  // Compound forms compose from the two tables; only the tarball ones are worth listing.
  for (const compression of TABLE.compression.keys()) {
    suffixes.add(`tar.${compression}`);
  }
  return Array.from(suffixes).sort();
}
