import { promises as fs } from 'fs';
import * as path from 'path';
import { downloadArchive, downloadFileName, isUrl } from '../../../src/archive/downloader';
import { DownloadError, UsageError } from '../../../src/errors/archive-errors';
import { createMemoryLogger } from '../../../src/utils/logger';
import {
  FAKE_TOOLS,
  type FakeWorkspace,
  createWorkspace,
  removeWorkspace,
} from '../../helpers/fake-tools';

describe('isUrl', () => {
  it('accepts http, https and ftp URLs only', () => {
    expect(isUrl('https://example.com/a.zip')).toBe(true);
    expect(isUrl('ftp://example.com/a.tar.gz')).toBe(true);
    expect(isUrl('file:///tmp/a.zip')).toBe(false);
    expect(isUrl('a.zip')).toBe(false);
    expect(isUrl('/tmp/a.zip')).toBe(false);
  });
});

describe('downloadFileName', () => {
  it('uses the decoded last path segment', () => {
    expect(downloadFileName('https://example.com/files/my%20docs.zip?x=1')).toBe('my docs.zip');
  });

  it('rejects URLs without a file name', () => {
    expect(() => downloadFileName('https://example.com/')).toThrow(UsageError);
  });
});

describe('downloadArchive', () => {
  let workspace: FakeWorkspace;

  afterEach(async () => {
    await removeWorkspace(workspace);
  });

  it('saves the file under its URL name in the working directory', async () => {
    workspace = await createWorkspace({ wget: FAKE_TOOLS.wget });
    const { logger } = createMemoryLogger();

    const local = await downloadArchive('https://example.com/files/remote.zip', {
      workingDir: workspace.workDir,
      logger,
      resolver: workspace.resolver,
    });

    expect(local).toBe(path.join(workspace.workDir, 'remote.zip'));
    expect(JSON.parse(await fs.readFile(local, 'utf8'))).toEqual({ 'fetched.txt': 'remote' });
  });

  it('refuses to replace an existing file', async () => {
    workspace = await createWorkspace({ wget: FAKE_TOOLS.wget });
    await fs.writeFile(path.join(workspace.workDir, 'remote.zip'), 'mine');
    const { logger } = createMemoryLogger();

    await expect(
      downloadArchive('https://example.com/remote.zip', {
        workingDir: workspace.workDir,
        logger,
        resolver: workspace.resolver,
      })
    ).rejects.toBeInstanceOf(UsageError);
    expect(await fs.readFile(path.join(workspace.workDir, 'remote.zip'), 'utf8')).toBe('mine');
  });

  it('reports the downloader stderr when the transfer fails', async () => {
    workspace = await createWorkspace({ wget: FAKE_TOOLS.failing });
    const { logger } = createMemoryLogger();

    const attempt = downloadArchive('https://example.com/remote.zip', {
      workingDir: workspace.workDir,
      logger,
      resolver: workspace.resolver,
    });

    await expect(attempt).rejects.toBeInstanceOf(DownloadError);
    await expect(attempt).rejects.toThrow(
      'could not download https://example.com/remote.zip: fatal: data is corrupt'
    );
  });

  it('fails when neither downloader is installed', async () => {
    workspace = await createWorkspace({});
    const { logger } = createMemoryLogger();

    await expect(
      downloadArchive('https://example.com/remote.zip', {
        workingDir: workspace.workDir,
        logger,
        resolver: workspace.resolver,
      })
    ).rejects.toThrow('neither wget nor curl is installed');
  });
});
