/**
 * Format Classifier
 *
 * Decides which layers wrap a file. A fully recognised suffix is
 * authoritative; content sniffing runs when the name says nothing, and
 * again when a tool rejects a file whose name turned out to be wrong.
 * Reads at most the head of the file (and, for .exe, its tail).
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { UnrecognizedFormatError } from '../errors/archive-errors';
import { type LayerId, type LayerList, terminalContainer, toLayerList } from './layers';
import { splitSuffix } from './suffix-table';

export const SNIFF_BYTES = 4096;
/** How much compressed data is inflated in-process to peek under gzip */
const GZIP_PEEK_BYTES = 64 * 1024;
/** End-of-central-directory record plus the longest zip comment */
const ZIP_TAIL_BYTES = 22 + 0xffff;

export type ClassificationSource = 'extension' | 'content';

export interface Classification {
  layers: LayerList;
  source: ClassificationSource;
}

interface MagicSignature {
  offset: number;
  bytes: number[];
  layers: LayerId[];
}

function ascii(text: string): number[] {
  return Array.from(text, (ch) => ch.charCodeAt(0));
}

// Order matters: longer and more specific signatures first.
const MAGIC_SIGNATURES: MagicSignature[] = [
  { offset: 0, bytes: ascii('!<arch>\ndebian-binary'), layers: ['deb'] },
  { offset: 0, bytes: [0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c], layers: ['7z'] },
  { offset: 0, bytes: [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00], layers: ['xz'] },
  { offset: 0, bytes: ascii('Rar!\x1a\x07'), layers: ['rar'] },
  { offset: 0, bytes: [0x28, 0xb5, 0x2f, 0xfd], layers: ['zstd'] },
  { offset: 0, bytes: [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1], layers: ['msi'] },
  { offset: 0, bytes: [0xed, 0xab, 0xee, 0xdb], layers: ['rpm'] },
  { offset: 0, bytes: ascii('PK\x03\x04'), layers: ['zip'] },
  { offset: 0, bytes: ascii('PK\x05\x06'), layers: ['zip'] },
  { offset: 0, bytes: ascii('MSCF'), layers: ['cab'] },
  { offset: 0, bytes: ascii('ISc('), layers: ['installshield'] },
  { offset: 0, bytes: ascii('LZIP'), layers: ['lzip'] },
  { offset: 0, bytes: ascii('LRZI'), layers: ['lrzip'] },
  { offset: 0, bytes: ascii('070701'), layers: ['cpio'] },
  { offset: 0, bytes: ascii('070702'), layers: ['cpio'] },
  { offset: 0, bytes: ascii('070707'), layers: ['cpio'] },
  { offset: 0, bytes: [0xc7, 0x71], layers: ['cpio'] },
  { offset: 0, bytes: [0x71, 0xc7], layers: ['cpio'] },
  { offset: 0, bytes: ascii('BZh'), layers: ['bzip2'] },
  { offset: 0, bytes: [0x1f, 0x9d], layers: ['compress'] },
  { offset: 0, bytes: [0x60, 0xea], layers: ['arj'] },
  { offset: 0, bytes: [0x5d, 0x00, 0x00], layers: ['lzma'] },
];

function matchesAt(buffer: Buffer, offset: number, bytes: number[]): boolean {
  if (buffer.length < offset + bytes.length) return false;
  return bytes.every((byte, index) => buffer[offset + index] === byte);
}

function isTarHeader(buffer: Buffer): boolean {
  return matchesAt(buffer, 257, ascii('ustar'));
}

/** Name of the first member in a tar header block */
function firstTarMember(buffer: Buffer): string {
  const end = buffer.indexOf(0, 0);
  return buffer.subarray(0, end >= 0 && end < 100 ? end : 100).toString('latin1');
}

function isLzhHeader(buffer: Buffer): boolean {
  // "-lh?-" or "-lz?-" method id at offset 2
  return (
    buffer.length >= 7 &&
    buffer[2] === 0x2d &&
    buffer[3] === 0x6c &&
    (buffer[4] === 0x68 || buffer[4] === 0x7a) &&
    buffer[6] === 0x2d
  );
}

function sniffContainer(head: Buffer): LayerId | null {
  if (isTarHeader(head)) {
    return firstTarMember(head) === 'metadata.gz' ? 'gem' : 'tar';
  }
  if (isLzhHeader(head)) return 'lzh';
  return null;
}

/**
 * Inflate the start of a gzip stream without tools to see what it wraps.
 * Truncated input is expected; Z_SYNC_FLUSH returns what was decoded so far.
 */
function peekUnderGzip(head: Buffer): LayerId | null {
  try {
    const inner = zlib.gunzipSync(head, { finishFlush: zlib.constants.Z_SYNC_FLUSH });
    if (isTarHeader(inner)) return 'tar';
    if (
      matchesAt(inner, 0, ascii('070701')) ||
      matchesAt(inner, 0, ascii('070702')) ||
      matchesAt(inner, 0, ascii('070707'))
    ) {
      return 'cpio';
    }
    return null;
  } catch {
    // Corrupt stream: still report gzip and let the decoder say why.
    return null;
  }
}

/**
 * Identify layers from leading bytes alone.
 */
export function sniffLayers(head: Buffer): LayerId[] | null {
  if (matchesAt(head, 0, [0x1f, 0x8b])) {
    const inner = peekUnderGzip(head);
    return inner ? ['gzip', inner] : ['gzip'];
  }
  for (const signature of MAGIC_SIGNATURES) {
    if (matchesAt(head, signature.offset, signature.bytes)) return signature.layers;
  }
  const container = sniffContainer(head);
  return container ? [container] : null;
}

async function readRange(filePath: string, position: number, length: number): Promise<Buffer> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, position);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

async function readHead(filePath: string, length: number): Promise<Buffer> {
  return readRange(filePath, 0, length);
}

/**
 * Self-extracting executables carry a zip whose end-of-central-directory
 * record sits near the end of the file.
 */
export async function hasEmbeddedZip(filePath: string): Promise<boolean> {
  const { size } = await fs.stat(filePath);
  const length = Math.min(size, ZIP_TAIL_BYTES);
  const tail = await readRange(filePath, size - length, length);
  return tail.lastIndexOf(Buffer.from('PK\x05\x06', 'latin1')) >= 0;
}

/**
 * Classify by name only. Used when scanning extracted trees for nested
 * archives, where opening every file would be wasteful.
 */
export function classifyByName(fileName: string): LayerList | null {
  return splitSuffix(fileName)?.layers ?? null;
}

/**
 * Classify a file on disk.
 * @throws UnrecognizedFormatError when neither the name nor the content is known
 */
export async function classifyArchive(filePath: string): Promise<Classification> {
  const fileName = path.basename(filePath);
  const byName = splitSuffix(fileName);

  if (byName) {
    const last = byName.layers[byName.layers.length - 1];
    // .cab is shared by Microsoft cabinets and InstallShield; the header decides.
    if (byName.layers.length === 1 && last.id === 'cab') {
      const head = await readHead(filePath, SNIFF_BYTES);
      if (matchesAt(head, 0, ascii('ISc('))) {
        return { layers: [{ kind: 'container', id: 'installshield' }], source: 'content' };
      }
    }
    return { layers: byName.layers, source: 'extension' };
  }

  if (/\.exe$/i.test(fileName)) {
    if (await hasEmbeddedZip(filePath)) {
      return { layers: [{ kind: 'container', id: 'zip' }], source: 'content' };
    }
    throw new UnrecognizedFormatError(filePath);
  }

  const head = await readHead(filePath, Math.max(SNIFF_BYTES, GZIP_PEEK_BYTES));
  const sniffed = sniffLayers(head);
  const layers = sniffed ? toLayerList(sniffed) : null;
  if (!layers) throw new UnrecognizedFormatError(filePath);
  return { layers, source: 'content' };
}

/**
 * Layers the content points to, when they end in a different container
 * than `byName` does; null otherwise.
 */
export async function contentFallback(
  filePath: string,
  byName: LayerList
): Promise<LayerList | null> {
  const head = await readHead(filePath, Math.max(SNIFF_BYTES, GZIP_PEEK_BYTES));
  const sniffed = sniffLayers(head);
  const layers = sniffed ? toLayerList(sniffed) : null;
  if (!layers) return null;
  const container = terminalContainer(layers);
  if (!container || container.id === terminalContainer(byName)?.id) return null;
  return layers;
}

/** True when the content starts like any known compression filter. */
export async function looksCompressed(filePath: string): Promise<boolean> {
  const head = await readHead(filePath, SNIFF_BYTES);
  const sniffed = sniffLayers(head);
  if (!sniffed) return false;
  return toLayerList(sniffed)?.[0].kind === 'compression';
}
