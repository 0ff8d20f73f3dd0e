import { parseListing } from '../../../src/archive/list-parsers';

describe('parseListing', () => {
  it('reads one name per line and drops blanks', () => {
    expect(parseListing('lines', 'report/\nreport/a.txt\n\n')).toEqual(['report/', 'report/a.txt']);
  });

  it('takes the name column of 7z listings', () => {
    const output = [
      '2024-01-01 00:00:00 ....A           12           10  docs/readme.txt',
      '2024-01-01 00:00:00 D....            0            0  docs',
      '',
    ].join('\n');

    expect(parseListing('7z', output)).toEqual(['docs/readme.txt', 'docs']);
  });

  it('keeps spaces in 7z names, including files without a compressed size', () => {
    const output = [
      '2024-01-01 00:00:00 ....A            9           10  my file.txt',
      '2024-01-01 00:00:00 ....A            4               notes/a b.txt',
    ].join('\n');

    expect(parseListing('7z', output)).toEqual(['my file.txt', 'notes/a b.txt']);
  });

  it('reads names between the unrar borders, skipping detail lines', () => {
    const output = [
      'UNRAR 6.00 freeware',
      '',
      'Archive: fake.rar',
      '-------------------------------------------',
      ' song.mp3',
      '    12     12 100% 01-01-24 00:00 -rw-r--r-- 00000000 m3b 2.9',
      ' lyrics/song.txt',
      '    40     30  75% 01-01-24 00:00 -rw-r--r-- 00000000 m3b 2.9',
      '-------------------------------------------',
      '    52     42  80%',
    ].join('\n');

    expect(parseListing('unrar', output)).toEqual(['song.mp3', 'lyrics/song.txt']);
  });

  it('strips lsar details and its header line', () => {
    const output = 'fake.rar: RAR\nREADME.md\nsrc/main.c  (120 B)\n';

    expect(parseListing('lsar', output)).toEqual(['README.md', 'src/main.c']);
  });

  it('reads the name column of cabextract tables', () => {
    const output = [
      'Viewing cabinet: setup.cab',
      ' File size | Date       Time     | Name',
      '-----------+---------------------+-------------',
      '       120 | 01.01.2024 00:00:00 | readme.txt',
      '      4096 | 01.01.2024 00:00:00 | bin/tool.exe',
      '',
      'All done, no errors.',
    ].join('\n');

    expect(parseListing('cabextract', output)).toEqual(['readme.txt', 'bin/tool.exe']);
  });

  it('reads the name column under the last lha border column', () => {
    const border = '---------- ----------- ------- ------ ------------ ----------';
    const nameColumn = border.lastIndexOf(' ') + 1;
    const output = [
      'PERMISSION  UID  GID      SIZE  RATIO     STAMP           NAME',
      border,
      '[generic]                   12 100.0% Jan  1 00:00'.padEnd(nameColumn) + 'hello.txt',
      '[generic]                   40  80.0% Jan  1 00:00'.padEnd(nameColumn) + 'dir/b.txt',
      border,
      ' Total         2 files      52  90.0% Jan  1 00:00',
    ].join('\n');

    expect(parseListing('lha', output)).toEqual(['hello.txt', 'dir/b.txt']);
  });

  it('reads numbered arj entries', () => {
    const output = [
      'Processing archive: x.arj',
      'Sequence/Pathname/Comment/Chapters',
      '------------ ---------- ---------- -----',
      '001) readme.txt',
      ' 11 UNIX              12         12 1.000 24-01-01 00:00:00 -rw-r--r--',
      '002) src/a.c',
      ' 11 UNIX              40         30 0.750 24-01-01 00:00:00 -rw-r--r--',
    ].join('\n');

    expect(parseListing('arj', output)).toEqual(['readme.txt', 'src/a.c']);
  });

  it('reads unshield rows up to the footer', () => {
    const output = [
      'Cabinet: data1.hdr',
      '  12  readme.txt',
      '  40  bin/app.exe',
      ' --------  -------',
      '           2 files',
    ].join('\n');

    expect(parseListing('unshield', output)).toEqual(['readme.txt', 'bin/app.exe']);
  });
});
