import { describeLayers, toLayerList } from '../../../src/archive/layers';
import { splitSuffix, supportedSuffixes } from '../../../src/archive/suffix-table';

describe('suffix-table', () => {
  describe('splitSuffix', () => {
    it('splits a compound tarball suffix into compression then container', () => {
      const match = splitSuffix('report.tar.gz');

      expect(match?.base).toBe('report');
      expect(match?.suffix).toBe('.tar.gz');
      expect(match && describeLayers(match.layers)).toBe('gzip > tar');
    });

    it('expands single-suffix aliases', () => {
      expect(splitSuffix('photos.tgz')?.layers).toEqual(toLayerList(['gzip', 'tar']));
      expect(splitSuffix('backup.tzst')?.layers).toEqual(toLayerList(['zstd', 'tar']));
    });

    it('composes any container with a trailing compression suffix', () => {
      expect(splitSuffix('image.cpio.xz')?.layers).toEqual(toLayerList(['xz', 'cpio']));
      expect(splitSuffix('bundle.7z.gz')?.layers).toEqual(toLayerList(['gzip', '7z']));
    });

    it('maps zip aliases and lone compression suffixes', () => {
      expect(splitSuffix('book.epub')?.layers).toEqual(toLayerList(['zip']));
      expect(splitSuffix('notes.txt.gz')?.layers).toEqual(toLayerList(['gzip']));
      expect(splitSuffix('notes.txt.gz')?.base).toBe('notes.txt');
      expect(splitSuffix('old.Z')?.layers).toEqual(toLayerList(['compress']));
    });

    it('falls back to a lowercase lookup', () => {
      const match = splitSuffix('ARCHIVE.TAR.GZ');

      expect(match?.base).toBe('ARCHIVE');
      expect(match?.layers).toEqual(toLayerList(['gzip', 'tar']));
    });

    it('returns null for unknown suffixes and suffix-only names', () => {
      expect(splitSuffix('notes.txt')).toBeNull();
      expect(splitSuffix('README')).toBeNull();
      expect(splitSuffix('.gz')).toBeNull();
    });

    it('reproduces the file name from base plus suffix for every listed suffix', () => {
      for (const suffix of supportedSuffixes()) {
        const fileName = `sample.${suffix}`;
        const match = splitSuffix(fileName);

        expect(match?.base).toBe('sample');
        expect(match && match.base + match.suffix).toBe(fileName);
      }
    });
  });

  describe('supportedSuffixes', () => {
    it('is sorted and covers containers, aliases and tarball compounds', () => {
      const suffixes = supportedSuffixes();

      expect(suffixes).toEqual([...suffixes].sort());
      expect(suffixes).toContain('deb');
      expect(suffixes).toContain('tgz');
      expect(suffixes).toContain('tar.xz');
      expect(new Set(suffixes).size).toBe(suffixes.length);
    });
  });
});
