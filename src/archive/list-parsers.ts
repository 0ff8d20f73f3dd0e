/**
 * Listing parsers: reduce each tool's listing output to entry names.
 */

import type { ListFormat } from './tool-registry';

type ListParser = (lines: string[]) => string[];

function nonEmpty(lines: string[]): string[] {
  return lines.filter((line) => line.trim() !== '');
}

/**
 * `7z l -ba` pads date and time (19), attributes (5), size (12) and
 * compressed size (12) to fixed widths; the name starts after them and
 * may contain spaces.
 */
const SEVEN_ZIP_NAME_COLUMN = 53;

const parseSevenZip: ListParser = (lines) =>
  lines
    .filter((line) => line.length > SEVEN_ZIP_NAME_COLUMN)
    .map((line) => line.slice(SEVEN_ZIP_NAME_COLUMN));

/** `unrar v`: names sit between two dashed borders, alternating with detail lines */
const parseUnrar: ListParser = (lines) => {
  const border = /^-+$/;
  const names: string[] = [];
  let inside = false;
  let isName = true;
  for (const line of lines) {
    if (border.test(line.trim())) {
      if (inside) break;
      inside = true;
      continue;
    }
    if (!inside) continue;
    if (isName) names.push(line.trim());
    isName = !isName;
  }
  return names;
};

/** `lsar`: a header line, then `name (details)` */
const parseLsar: ListParser = (lines) =>
  nonEmpty(lines)
    .slice(1)
    .map((line) => {
      const detail = line.lastIndexOf('(');
      return (detail > 0 ? line.slice(0, detail) : line).trim();
    });

/** `cabextract -l`: a table after a `---+---` border, the name in the third column */
const parseCabextract: ListParser = (lines) => {
  const border = /^[-+]+$/;
  const start = lines.findIndex((line) => border.test(line.trim()));
  if (start < 0) return [];
  const names: string[] = [];
  for (const line of lines.slice(start + 1)) {
    const columns = line.split(' | ');
    if (columns.length < 3) break;
    names.push(columns.slice(2).join(' | '));
  }
  return names;
};

/** Index where the name column starts in a border like `---- ----- --------` */
function borderNameIndex(line: string): number | null {
  if (!/^[- ]+$/.test(line) || !line.includes('-')) return null;
  const lastSpace = line.lastIndexOf(' ');
  return lastSpace < 0 ? null : lastSpace + 1;
}

/** `lha l`: rows between two dashed borders, the name starting under the last column */
const parseLha: ListParser = (lines) => {
  const start = lines.findIndex((line) => borderNameIndex(line) !== null);
  if (start < 0) return [];
  const nameIndex = borderNameIndex(lines[start]) ?? 0;
  const names: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (borderNameIndex(line) !== null) break;
    const name = line.slice(nameIndex).trim();
    if (name) names.push(name);
  }
  return names;
};

/** `arj v`: `001) name` */
const parseArj: ListParser = (lines) => {
  const prefix = /^\d+\)\s+/;
  const names: string[] = [];
  for (const line of lines) {
    const match = prefix.exec(line);
    if (match) names.push(line.slice(match[0].length).trim());
  }
  return names;
};

/** `unshield l`: `  <size>  name` rows, ended by a dashed footer */
const parseUnshield: ListParser = (lines) => {
  const prefix = /^\s+\d+\s+/;
  const footer = /^\s+-+\s+-+\s*$/;
  const names: string[] = [];
  for (const line of lines) {
    if (footer.test(line)) break;
    const match = prefix.exec(line);
    if (match) names.push(line.slice(match[0].length).trim());
  }
  return names;
};

const PARSERS: Record<ListFormat, ListParser> = {
  lines: nonEmpty,
  '7z': parseSevenZip,
  unrar: parseUnrar,
  lsar: parseLsar,
  cabextract: parseCabextract,
  lha: parseLha,
  arj: parseArj,
  unshield: parseUnshield,
};

export function parseListing(format: ListFormat, output: string): string[] {
  return PARSERS[format](output.split(/\r?\n/));
}
