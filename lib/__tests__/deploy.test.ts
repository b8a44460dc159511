import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import Bluebird from 'bluebird';
import chalk from 'chalk';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import deploy from '../../index';
import { ConfigurationError } from '../errors';
import { Logger } from '../logger';

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: message => lines.push(message),
    trace: () => undefined,
    error: () => undefined,
  };
}

describe('deploy', () => {
  let level: typeof chalk.level;
  let root: string;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'rsync-deploy-index-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('prints the header and runs the sync', async () => {
    const logger = recordingLogger();
    const launcher = vi.fn().mockResolvedValue(0);
    const probe = { check: vi.fn().mockResolvedValue(undefined) };

    const result = deploy({ sourcePath: root, targetHost: 'user@host', targetPath: '/home/user/proj' }, {}, { logger, launcher, probe });

    expect(result).toBeInstanceOf(Bluebird);
    await result;
    expect(logger.lines).toEqual([
      '* Deploying to host user@host',
      `* local dir  = ${root}/`,
      '* remote dir = user@host:/home/user/proj',
      '* mode       = contents',
      '',
    ]);
    expect(launcher).toHaveBeenCalledTimes(1);
  });

  it('marks a dry run in the header', async () => {
    const logger = recordingLogger();
    const launcher = vi.fn().mockResolvedValue(0);

    await deploy(
      { sourcePath: root, targetHost: 'user@host', targetPath: '/srv', transferMode: 'directory' },
      { dryRun: true, checkTransport: false },
      { logger, launcher }
    );

    expect(logger.lines[3]).toBe('* mode       = directory (dry run)');
    expect(launcher.mock.calls[0][1]).toContain('--dry-run');
  });

  it('rejects an unset target host before touching the network', async () => {
    const launcher = vi.fn();
    const probe = { check: vi.fn() };

    await expect(deploy({ sourcePath: root, targetPath: '/srv' }, {}, { logger: recordingLogger(), launcher, probe }))
      .rejects.toBeInstanceOf(ConfigurationError);
    expect(probe.check).not.toHaveBeenCalled();
    expect(launcher).not.toHaveBeenCalled();
  });
});
