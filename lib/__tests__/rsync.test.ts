import { describe, it, expect, vi } from 'vitest';
import { createSyncConfig } from '../config';
import { TransferError, TransportError } from '../errors';
import { Logger } from '../logger';
import { buildRsyncArgs, runRsync } from '../rsync';

const config = createSyncConfig({ sourcePath: '/proj', targetHost: 'user@host', targetPath: '/home/user/proj' });

function recordingLogger(): Logger & { traces: string[] } {
  const traces: string[] = [];
  return {
    traces,
    info: () => undefined,
    trace: line => traces.push(line),
    error: () => undefined,
  };
}

describe('buildRsyncArgs', () => {
  it('builds an archive mode transfer over ssh', () => {
    expect(buildRsyncArgs(config)).toEqual([
      '-e', 'ssh -p 22',
      '-av',
      '--exclude=target/',
      '/proj/',
      'user@host:/home/user/proj',
    ]);
  });

  it('adds dry run and delete flags', () => {
    expect(buildRsyncArgs(config, { dryRun: true, removeExtraFiles: true, verbose: false })).toEqual([
      '-e', 'ssh -p 22',
      '-a',
      '--dry-run',
      '--delete',
      '--exclude=target/',
      '/proj/',
      'user@host:/home/user/proj',
    ]);
  });

  it('passes the source without trailing separator in directory mode', () => {
    const directory = createSyncConfig({ sourcePath: '/proj/', targetHost: 'user@host', targetPath: '/home/user', transferMode: 'directory' });

    expect(buildRsyncArgs(directory).slice(-2)).toEqual(['/proj', 'user@host:/home/user']);
  });

  it('hands the private key to the remote shell', () => {
    const withKey = createSyncConfig({ ...config, privateKey: '/keys/id_test' });

    expect(buildRsyncArgs(withKey).slice(0, 2)).toEqual(['-e', 'ssh -p 22 -i /keys/id_test']);
  });

  it('emits one exclude per pattern', () => {
    const many = createSyncConfig({ ...config, excludePatterns: ['target/', '*.log', '/.git/'] });

    expect(buildRsyncArgs(many).filter(arg => arg.startsWith('--exclude'))).toEqual([
      '--exclude=target/',
      '--exclude=*.log',
      '--exclude=/.git/',
    ]);
  });
});

describe('runRsync', () => {
  it('echoes the command and runs it', async () => {
    const launcher = vi.fn().mockResolvedValue(0);
    const logger = recordingLogger();

    await runRsync(config, {}, launcher, logger);

    expect(logger.traces).toEqual(["rsync -e 'ssh -p 22' -av --exclude=target/ /proj/ user@host:/home/user/proj"]);
    expect(launcher).toHaveBeenCalledWith('rsync', buildRsyncArgs(config));
  });

  it('fails with the exit status of rsync', async () => {
    const launcher = vi.fn().mockResolvedValue(23);

    const result = runRsync(config, {}, launcher, recordingLogger());

    await expect(result).rejects.toBeInstanceOf(TransferError);
    await expect(result).rejects.toThrow('Remote Error: rsync exited with status 23');
    await expect(result).rejects.toHaveProperty('exitCode', 23);
  });

  it('reports a remote shell failure as a transport error', async () => {
    const launcher = vi.fn().mockResolvedValue(255);

    const result = runRsync(config, {}, launcher, recordingLogger());

    await expect(result).rejects.toBeInstanceOf(TransportError);
    await expect(result).rejects.toHaveProperty('exitCode', 255);
  });
});
