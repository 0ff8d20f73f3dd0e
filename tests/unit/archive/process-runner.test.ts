import { promises as fs } from 'fs';
import * as path from 'path';
import type { PipelineStage } from '../../../src/archive/pipeline-compiler';
import { runPipeline, segmentsOf } from '../../../src/archive/process-runner';
import {
  ExtractionInterruptedError,
  ExtractionToolError,
  PasswordProtectedError,
} from '../../../src/errors/archive-errors';
import { createMemoryLogger } from '../../../src/utils/logger';
import {
  FAKE_TOOLS,
  type FakeWorkspace,
  createWorkspace,
  listDir,
  removeWorkspace,
  writeFakeArchive,
} from '../../helpers/fake-tools';

function stage(
  workspace: FakeWorkspace,
  program: string,
  overrides: Partial<PipelineStage> = {}
): PipelineStage {
  return {
    program,
    executable: path.join(workspace.binDir, program),
    args: [],
    stdin: 'none',
    stdout: 'relay',
    cwd: 'destination',
    description: program,
    warningExitCodes: [],
    ...overrides,
  };
}

describe('segmentsOf', () => {
  const base: Omit<PipelineStage, 'program' | 'stdout'> = {
    executable: '/bin/true',
    args: [],
    stdin: 'none',
    cwd: 'destination',
    description: 'x',
    warningExitCodes: [],
  };

  it('breaks after every stage that does not pipe onward', () => {
    const stages: PipelineStage[] = [
      { ...base, program: 'gzip', stdout: 'next' },
      { ...base, program: 'cat', stdout: { kind: 'file', path: '{scratch}/a.7z' } },
      { ...base, program: '7z', stdout: 'relay' },
    ];

    expect(segmentsOf(stages).map((segment) => segment.map((s) => s.program))).toEqual([
      ['gzip', 'cat'],
      ['7z'],
    ]);
  });
});

describe('runPipeline', () => {
  let workspace: FakeWorkspace;

  beforeEach(async () => {
    workspace = await createWorkspace({
      gzip: FAKE_TOOLS.passthrough,
      tar: FAKE_TOOLS.tar,
      unzip: FAKE_TOOLS.unzip,
      failing: FAKE_TOOLS.failing,
      sleeper: FAKE_TOOLS.sleeper,
    });
  });

  afterEach(async () => {
    await removeWorkspace(workspace);
  });

  it('pipes a decoder into a container in the destination', async () => {
    const archive = await writeFakeArchive(workspace.root, 'report.tar.gz', {
      'report/': '',
      'report/a.txt': 'alpha',
    });
    const { logger } = createMemoryLogger();

    const run = await runPipeline(
      {
        archive,
        usesScratch: false,
        stages: [
          stage(workspace, 'gzip', { stdin: { kind: 'file', path: archive }, stdout: 'next' }),
          stage(workspace, 'tar', { args: ['-x', '-f', '-'], stdin: 'previous' }),
        ],
      },
      { destination: workspace.workDir, logger }
    );

    expect(await listDir(workspace.workDir)).toEqual(['report/', 'report/a.txt']);
    expect(run.stages.map((outcome) => outcome.exitCode)).toEqual([0, 0]);
    expect(run.warnings).toEqual([]);
  });

  it('collects the output of capture stages', async () => {
    const archive = await writeFakeArchive(workspace.root, 'x.tar', { 'a.txt': '', 'b.txt': '' });
    const { logger } = createMemoryLogger();

    const run = await runPipeline(
      {
        archive,
        usesScratch: false,
        stages: [
          stage(workspace, 'tar', {
            args: ['-t', '-f', '-'],
            stdin: { kind: 'file', path: archive },
            stdout: 'capture',
            cwd: 'neutral',
          }),
        ],
      },
      { destination: workspace.workDir, logger }
    );

    expect(run.stdout).toBe('a.txt\nb.txt\n');
    expect(await listDir(workspace.workDir)).toEqual([]);
  });

  it('materializes through a scratch file and removes it afterwards', async () => {
    const archive = await writeFakeArchive(workspace.root, 'bundle.zip.gz', { 'inner.txt': 'x' });
    const { logger } = createMemoryLogger();

    await runPipeline(
      {
        archive,
        usesScratch: true,
        stages: [
          stage(workspace, 'gzip', {
            stdin: { kind: 'file', path: archive },
            stdout: { kind: 'file', path: '{scratch}/bundle.zip' },
            cwd: 'scratch',
          }),
          stage(workspace, 'unzip', { args: ['-q', '{scratch}/bundle.zip'] }),
        ],
      },
      { destination: workspace.workDir, logger }
    );

    expect(await fs.readFile(path.join(workspace.workDir, 'inner.txt'), 'utf8')).toBe('x');
  });

  it('reports the failing stage with its status and stderr', async () => {
    const { logger } = createMemoryLogger();

    const attempt = runPipeline(
      {
        archive: '/data/broken.bin',
        usesScratch: false,
        stages: [stage(workspace, 'failing', { description: 'broken file' })],
      },
      { destination: workspace.workDir, logger }
    );

    await expect(attempt).rejects.toBeInstanceOf(ExtractionToolError);
    await expect(attempt).rejects.toMatchObject({
      message: "broken file error: 'failing' returned status code 2",
      exitCode: 2,
      stderr: 'fatal: data is corrupt\n',
      archive: '/data/broken.bin',
    });
  });

  it('classifies password failures', async () => {
    const archive = await writeFakeArchive(workspace.root, 'locked.zip', {
      __password: 'test-secret',
      'locked.txt': 'hidden',
    });
    const { logger } = createMemoryLogger();

    await expect(
      runPipeline(
        { archive, usesScratch: false, stages: [stage(workspace, 'unzip', { args: [archive] })] },
        { destination: workspace.workDir, logger }
      )
    ).rejects.toBeInstanceOf(PasswordProtectedError);
  });

  it('treats documented warning statuses as success with warnings', async () => {
    const archive = await writeFakeArchive(workspace.root, 'odd.zip', {
      'ok.txt': 'fine',
      __warn: 'error:  cannot create bad/name.txt',
    });
    const { logger } = createMemoryLogger();

    const run = await runPipeline(
      {
        archive,
        usesScratch: false,
        stages: [stage(workspace, 'unzip', { args: [archive], warningExitCodes: [1] })],
      },
      { destination: workspace.workDir, logger }
    );

    expect(run.stages[0]).toMatchObject({ exitCode: 1, warning: true });
    expect(run.warnings).toEqual(['error:  cannot create bad/name.txt']);
  });

  it('terminates running stages when aborted', async () => {
    const controller = new AbortController();
    const { logger } = createMemoryLogger();

    const attempt = runPipeline(
      { archive: '/data/slow.bin', usesScratch: false, stages: [stage(workspace, 'sleeper')] },
      { destination: workspace.workDir, logger, signal: controller.signal, killGraceMs: 100 }
    );
    setTimeout(() => controller.abort(), 200);

    await expect(attempt).rejects.toBeInstanceOf(ExtractionInterruptedError);
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { logger } = createMemoryLogger();

    await expect(
      runPipeline(
        { archive: '/data/x.bin', usesScratch: false, stages: [stage(workspace, 'sleeper')] },
        { destination: workspace.workDir, logger, signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(ExtractionInterruptedError);
  });
});
