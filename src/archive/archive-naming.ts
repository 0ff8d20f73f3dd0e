/**
 * Archive base names: the name an archive's output is given once its
 * recognised suffixes are gone.
 */

import { type LayerList, terminalContainer } from './layers';
import { splitSuffix } from './suffix-table';

/** Unknown trailing extensions shorter than this are still treated as extensions. */
const GUESSED_EXTENSION_MAX = 5;

function fallbackBaseName(fileName: string): string {
  const pieces = fileName.split('.');
  if (pieces.length > 1 && pieces[pieces.length - 1].length < GUESSED_EXTENSION_MAX) {
    const base = pieces.slice(0, -1).join('.');
    if (base) return base;
  }
  return fileName;
}

function genericBaseName(fileName: string): string {
  return splitSuffix(fileName)?.base ?? fallbackBaseName(fileName);
}

/** hello_1.0-1_amd64.deb -> hello_1.0-1 */
function debBaseName(fileName: string): string {
  const pieces = fileName.split('_');
  if (pieces.length === 1) return genericBaseName(fileName);
  const last = pieces[pieces.length - 1];
  if (last.length > 10 || !last.endsWith('.deb')) return genericBaseName(fileName);
  return pieces.slice(0, -1).join('_');
}

/** hello-1.0-1.x86_64.rpm -> hello-1.0-1 */
function rpmBaseName(fileName: string): string {
  const pieces = fileName.split('.');
  if (pieces.length === 1) return fileName;
  if (pieces[pieces.length - 1] !== 'rpm') return genericBaseName(fileName);
  pieces.pop();
  if (pieces.length > 1 && pieces[pieces.length - 1].length < 8) pieces.pop();
  return pieces.join('.');
}

/**
 * Base name for an archive's output.
 * Plain compressed files lose only their compression suffix.
 */
export function archiveBaseName(fileName: string, layers: LayerList): string {
  const container = terminalContainer(layers);

  if (!container) {
    const match = splitSuffix(fileName);
    if (match && match.layers.every((layer) => layer.kind === 'compression')) return match.base;
    return fallbackBaseName(fileName);
  }

  switch (container.id) {
    case 'deb':
      return debBaseName(fileName);
    case 'rpm':
      return rpmBaseName(fileName);
    default:
      return genericBaseName(fileName);
  }
}

/** Name of the file gem metadata is decompressed into */
export function metadataFileName(fileName: string): string {
  return `${fileName}-metadata.txt`;
}
