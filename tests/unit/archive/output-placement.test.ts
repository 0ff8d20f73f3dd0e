import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InteractionController } from '../../../src/archive/interaction-controller';
import {
  type Destination,
  type PlacementPolicy,
  createStaging,
  findFreeName,
  listTree,
  placeOutput,
  planDestination,
  salvageStaging,
  suffixedName,
} from '../../../src/archive/output-placement';
import { DestinationCollisionError } from '../../../src/errors/archive-errors';
import type { SingleEntryDisposition } from '../../../src/types/config';
import { createMemoryLogger } from '../../../src/utils/logger';
import { ScriptedPrompter } from '../../../src/utils/prompt';
import { listDir } from '../../helpers/fake-tools';

describe('suffixedName', () => {
  it('numbers directories at the end and files before a short extension', () => {
    expect(suffixedName('report', 1, false)).toBe('report-1');
    expect(suffixedName('notes.txt', 2, true)).toBe('notes-2.txt');
    expect(suffixedName('notes.txt', 2, false)).toBe('notes.txt-2');
    expect(suffixedName('.bashrc', 1, true)).toBe('.bashrc-1');
    expect(suffixedName('data.longext', 3, true)).toBe('data.longext-3');
  });
});

describe('output placement', () => {
  let workingDir: string;

  beforeEach(async () => {
    workingDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'peel-place-')));
  });

  afterEach(async () => {
    await fs.rm(workingDir, { recursive: true, force: true });
  });

  function policy(
    overrides: Partial<PlacementPolicy> = {},
    oneEntry?: SingleEntryDisposition,
    answers: string[] | null = null
  ): PlacementPolicy {
    const { logger } = createMemoryLogger();
    return {
      workingDir,
      overwrite: false,
      flat: false,
      controller: new InteractionController(
        { interactive: answers !== null, oneEntry },
        answers === null ? null : new ScriptedPrompter(answers),
        logger
      ),
      ...overrides,
    };
  }

  /** Staging directory holding the given files (names ending in "/" are directories) */
  async function stage(entries: string[]): Promise<string> {
    const staging = await createStaging(workingDir);
    for (const entry of entries) {
      const target = path.join(staging, entry);
      if (entry.endsWith('/')) {
        await fs.mkdir(target, { recursive: true });
      } else {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, entry);
      }
    }
    return staging;
  }

  describe('findFreeName', () => {
    it('returns the name itself when free, otherwise the first free suffix', async () => {
      expect(await findFreeName(workingDir, 'data', false)).toBe(path.join(workingDir, 'data'));

      await fs.mkdir(path.join(workingDir, 'data'));
      await fs.mkdir(path.join(workingDir, 'data-1'));

      expect(await findFreeName(workingDir, 'data', false)).toBe(path.join(workingDir, 'data-2'));
    });
  });

  describe('planDestination', () => {
    it('keeps a free name', async () => {
      const destination = await planDestination('report', 'report', false, policy(), 'r.tgz');

      expect(destination).toEqual({
        baseName: 'report',
        path: path.join(workingDir, 'report'),
        mode: 'fresh',
        disposition: null,
      });
    });

    it('suffixes a taken name by default', async () => {
      await fs.mkdir(path.join(workingDir, 'bundle'));

      const destination = await planDestination('bundle', 'bundle', false, policy(), 'b.zip');

      expect(destination.path).toBe(path.join(workingDir, 'bundle-1'));
      expect(destination.mode).toBe('fresh');
    });

    it('merges into a taken name with overwrite', async () => {
      await fs.mkdir(path.join(workingDir, 'bundle'));

      const destination = await planDestination(
        'bundle',
        'bundle',
        false,
        policy({ overwrite: true }),
        'b.zip'
      );

      expect(destination.path).toBe(path.join(workingDir, 'bundle'));
      expect(destination.mode).toBe('merge');
    });

    it('skips when the user keeps the existing output', async () => {
      await fs.mkdir(path.join(workingDir, 'bundle'));

      await expect(
        planDestination('bundle', 'bundle', false, policy({}, undefined, ['k']), 'b.zip')
      ).rejects.toBeInstanceOf(DestinationCollisionError);
    });

    it('targets the working directory when flat', async () => {
      const destination = await planDestination(
        'bundle',
        'bundle',
        false,
        policy({ flat: true }),
        'b.zip'
      );

      expect(destination).toMatchObject({ path: workingDir, mode: 'flat' });
    });
  });

  describe('placeOutput', () => {
    async function place(
      entries: string[],
      baseName: string,
      placementPolicy: PlacementPolicy,
      extra: { alwaysWrap?: boolean; fileOutput?: string } = {}
    ) {
      const staging = await stage(entries);
      const destination = await planDestination(
        baseName,
        extra.fileOutput ?? baseName,
        extra.fileOutput !== undefined,
        placementPolicy,
        'archive'
      );
      return placeOutput({
        archive: 'archive',
        staging,
        destination,
        policy: placementPolicy,
        alwaysWrap: extra.alwaysWrap ?? false,
        fileOutput: extra.fileOutput,
      });
    }

    it('wraps several top-level entries in a directory named after the archive', async () => {
      const placement = await place(['a.txt', 'b/', 'b/c.txt'], 'data', policy());

      expect(placement.placed).toEqual([path.join(workingDir, 'data')]);
      expect(placement.written).toEqual(placement.placed);
      expect(await listDir(workingDir)).toEqual(['data/', 'data/a.txt', 'data/b/', 'data/b/c.txt']);
    });

    it('does not nest a single entry already named after the archive', async () => {
      await place(['report/', 'report/a.txt'], 'report', policy());

      expect(await listDir(workingDir)).toEqual(['report/', 'report/a.txt']);
    });

    it('puts a mismatched single entry inside a new directory by default', async () => {
      const placement = await place(['data.csv'], 'data', policy());

      expect(placement.destination.disposition).toBe('inside');
      expect(await listDir(workingDir)).toEqual(['data/', 'data/data.csv']);
    });

    it('renames a mismatched single entry', async () => {
      await place(['holiday/', 'holiday/1.jpg'], 'photos', policy({}, 'rename'));

      expect(await listDir(workingDir)).toEqual(['photos/', 'photos/1.jpg']);
    });

    it('places a mismatched single entry here under its own name', async () => {
      await fs.mkdir(path.join(workingDir, 'holiday'));

      const placement = await place(['holiday/', 'holiday/1.jpg'], 'photos', policy({}, 'here'));

      expect(placement.placed).toEqual([path.join(workingDir, 'holiday-1')]);
      expect(await listDir(workingDir)).toEqual(['holiday-1/', 'holiday-1/1.jpg', 'holiday/']);
    });

    it('always wraps when asked to', async () => {
      await place(['hello/', 'hello/x'], 'hello', policy(), { alwaysWrap: true });

      expect(await listDir(workingDir)).toEqual(['hello/', 'hello/hello/', 'hello/hello/x']);
    });

    it('moves a single output file into place', async () => {
      const placement = await place(['notes.txt'], 'notes.txt', policy(), {
        fileOutput: 'notes.txt',
      });

      expect(placement.placed).toEqual([path.join(workingDir, 'notes.txt')]);
      expect(await listDir(workingDir)).toEqual(['notes.txt']);
    });

    it('merges flat output into the working directory', async () => {
      await fs.mkdir(path.join(workingDir, 'docs'));
      await fs.writeFile(path.join(workingDir, 'docs', 'old.txt'), 'old');

      const placement = await place(
        ['docs/', 'docs/new.txt', 'top.txt'],
        'x',
        policy({ flat: true })
      );

      expect(placement.placed).toEqual([
        path.join(workingDir, 'docs'),
        path.join(workingDir, 'top.txt'),
      ]);
      expect(placement.written).toEqual([
        path.join(workingDir, 'docs', 'new.txt'),
        path.join(workingDir, 'top.txt'),
      ]);
      expect(await listDir(workingDir)).toEqual([
        'docs/',
        'docs/new.txt',
        'docs/old.txt',
        'top.txt',
      ]);
    });

    it('merges into an existing directory with overwrite, replacing files', async () => {
      await fs.mkdir(path.join(workingDir, 'data'));
      await fs.writeFile(path.join(workingDir, 'data', 'a.txt'), 'old');
      await fs.writeFile(path.join(workingDir, 'data', 'keep.txt'), 'kept');

      const placement = await place(['a.txt', 'b.txt'], 'data', policy({ overwrite: true }));

      expect(placement.placed).toEqual([path.join(workingDir, 'data')]);
      expect(placement.written).toEqual([
        path.join(workingDir, 'data', 'a.txt'),
        path.join(workingDir, 'data', 'b.txt'),
      ]);
      expect(await listDir(workingDir)).toEqual([
        'data/',
        'data/a.txt',
        'data/b.txt',
        'data/keep.txt',
      ]);
      expect(await fs.readFile(path.join(workingDir, 'data', 'a.txt'), 'utf8')).toBe('a.txt');
    });

    it('places nothing for an empty archive and removes staging', async () => {
      const placement = await place([], 'empty', policy());

      expect(placement.placed).toEqual([]);
      expect(await listDir(workingDir)).toEqual([]);
    });
  });

  describe('salvageStaging', () => {
    const destination = (): Destination => ({
      baseName: 'broken',
      path: path.join(workingDir, 'broken'),
      mode: 'fresh',
      disposition: null,
    });

    it('keeps partial output under the planned name', async () => {
      const staging = await stage(['half.txt']);

      const salvaged = await salvageStaging(staging, destination(), workingDir, 'broken.zip');

      expect(salvaged).toBe(path.join(workingDir, 'broken'));
      expect(await listDir(workingDir)).toEqual(['broken/', 'broken/half.txt']);
    });

    it('removes an empty staging directory', async () => {
      const staging = await stage([]);

      expect(await salvageStaging(staging, destination(), workingDir, 'broken.zip')).toBeNull();
      expect(await listDir(workingDir)).toEqual([]);
    });
  });

  describe('listTree', () => {
    it('lists placed paths relative to the working directory', async () => {
      await fs.mkdir(path.join(workingDir, 'data', 'sub'), { recursive: true });
      await fs.writeFile(path.join(workingDir, 'data', 'b.txt'), '');
      await fs.writeFile(path.join(workingDir, 'data', 'sub', 'a.txt'), '');
      await fs.writeFile(path.join(workingDir, 'lone.txt'), '');

      const lines = await listTree(
        [path.join(workingDir, 'data'), path.join(workingDir, 'lone.txt')],
        workingDir
      );

      expect(lines).toEqual(['data/', 'data/b.txt', 'data/sub/', 'data/sub/a.txt', 'lone.txt']);
    });
  });
});
