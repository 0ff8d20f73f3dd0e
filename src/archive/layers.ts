/**
 * Layer Model
 *
 * A layer is one encoding wrapped around an archive's payload: either a
 * compression filter (peeled by a streaming decoder) or the terminal
 * container format. Layer lists are ordered outermost first.
 */

export const COMPRESSION_IDS = [
  'gzip',
  'bzip2',
  'xz',
  'lzma',
  'compress',
  'lrzip',
  'lzip',
  'brotli',
  'zstd',
] as const;

export const CONTAINER_IDS = [
  'tar',
  'zip',
  'cpio',
  'rpm',
  'deb',
  'gem',
  '7z',
  'cab',
  'rar',
  'lzh',
  'arj',
  'installshield',
  'msi',
  'dmg',
] as const;

export type CompressionId = (typeof COMPRESSION_IDS)[number];
export type ContainerId = (typeof CONTAINER_IDS)[number];
export type LayerId = CompressionId | ContainerId;

export interface CompressionLayer {
  kind: 'compression';
  id: CompressionId;
}

export interface ContainerLayer {
  kind: 'container';
  id: ContainerId;
}

export type Layer = CompressionLayer | ContainerLayer;

/** Non-empty by construction; an unrecognised file never yields a layer list. */
export type LayerList = readonly [Layer, ...Layer[]];

/** What the caller wants done with an archive */
export type ExtractionMode = 'extract' | 'list' | 'metadata';

export function isCompressionId(value: string): value is CompressionId {
  return (COMPRESSION_IDS as readonly string[]).includes(value);
}

export function isContainerId(value: string): value is ContainerId {
  return (CONTAINER_IDS as readonly string[]).includes(value);
}

export function toLayer(id: LayerId): Layer {
  return isCompressionId(id) ? { kind: 'compression', id } : { kind: 'container', id };
}

export function toLayerList(ids: readonly LayerId[]): LayerList | null {
  if (ids.length === 0) return null;
  const [first, ...rest] = ids;
  return [toLayer(first), ...rest.map(toLayer)];
}

/** The container a list ends in, or null for a plain compressed file. */
export function terminalContainer(layers: LayerList): ContainerLayer | null {
  const last = layers[layers.length - 1];
  return last.kind === 'container' ? last : null;
}

export function compressionLayers(layers: LayerList): CompressionLayer[] {
  return layers.filter((layer): layer is CompressionLayer => layer.kind === 'compression');
}

export function describeLayers(layers: readonly Layer[]): string {
  return layers.map((layer) => layer.id).join(' > ');
}
