import { supportedSuffixes } from '../archive/suffix-table';
import { color, dim, sectionHeader, subheader } from '../utils/ui';
import { getVersion } from './version-command';

/**
 * Print a major section with ═══ borders
 * Format:
 *   ═══ TITLE ═══
 *   Subtitle line
 *
 *   flag    Description
 */
function printMajorSection(title: string, subtitles: string[], items: [string, string][]): void {
  console.log(sectionHeader(title));

  for (const subtitle of subtitles) {
    console.log(`  ${dim(subtitle)}`);
  }

  console.log('');

  const maxCmdLen = Math.max(...items.map(([cmd]) => cmd.length));

  for (const [cmd, desc] of items) {
    const paddedCmd = cmd.padEnd(maxCmdLen + 2);
    console.log(`  ${color(paddedCmd, 'command')} ${desc}`);
  }

  console.log('');
}

/**
 * Print a sub-section with colored title
 * Format:
 *   Title:
 *     label    Description
 */
function printSubSection(title: string, items: [string, string][]): void {
  console.log(subheader(`${title}:`));

  const maxCmdLen = Math.max(...items.map(([cmd]) => cmd.length));

  for (const [cmd, desc] of items) {
    const paddedCmd = cmd.padEnd(maxCmdLen + 2);
    console.log(`  ${color(paddedCmd, 'command')} ${desc}`);
  }

  console.log('');
}

/**
 * Display usage information for peel
 */
export function handleHelpCommand(): void {
  console.log(subheader(`peel v${getVersion()}`));
  console.log('  Extract any archive into one predictable directory.');
  console.log('');

  console.log(subheader('Usage:'));
  console.log(`  ${color('peel', 'command')} [options] archive [archive ...]`);
  console.log(`  ${color('peel', 'command')} [options] https://example.com/archive.tar.gz`);
  console.log('');

  printMajorSection(
    'Extraction',
    ['Each archive lands in a directory named after it'],
    [
      ['-r, --recursive', 'Also extract archives found inside the output'],
      ['--one, --one-entry WHAT', 'Lone entry goes inside, rename or here'],
      ['-o, --overwrite', 'Write into an existing directory of the same name'],
      ['-f, --flat', 'Extract straight into the current directory'],
      ['    --no-directory', 'Same as --flat'],
      ['-p, --password PW', 'Password for encrypted archives'],
      ['-n, --noninteractive', 'Never ask; use the default answers'],
    ]
  );

  printMajorSection(
    'Other Modes',
    ['These replace extraction'],
    [
      ['-l, -t, --list, --table', 'List archive contents'],
      ['-m, --metadata', 'Extract package metadata (deb, gem)'],
      ['--list-extensions', 'Print every recognised file suffix'],
    ]
  );

  printSubSection('Output', [
    ['-v, --verbose', 'Show more (repeat for debug output)'],
    ['-q, --quiet', 'Show less (repeat to hide errors too)'],
    ['-h, --help', 'Show this help'],
    ['--version', 'Show version'],
  ]);

  printSubSection('Environment', [
    ['PEEL_NONINTERACTIVE=1', 'Same as -n'],
    ['PEEL_ONE_ENTRY=WHAT', 'Same as --one'],
    ['PEEL_PASSWORD=PW', 'Same as --password'],
    ['PEEL_MAX_DEPTH=N', 'Deepest nesting --recursive follows (default 8)'],
  ]);

  console.log(dim(`  ${supportedSuffixes().length} file suffixes recognised`));
  console.log('');
}
