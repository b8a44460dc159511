import { SyncConfig, SyncOptions, resolveSyncOptions } from './config';
import { TransferError, TransportError } from './errors';
import { Logger, consoleLogger } from './logger';
import { ProcessLauncher, spawnProcess } from './process';
import { formatTransportCommand } from './transport';
import { formatCommand } from './util';

export const RSYNC_COMMAND = 'rsync';

/**
 * rsync's exit status when the remote shell could not be started or died
 */
export const RSYNC_REMOTE_SHELL_FAILURE = 255;

/**
 * Build the rsync argument vector
 */
export function buildRsyncArgs(config: SyncConfig, options?: SyncOptions): string[] {
  const opts = resolveSyncOptions(options);
  const args = ['-e', formatTransportCommand(config), opts.verbose ? '-av' : '-a'];

  if (opts.dryRun) {
    args.push('--dry-run');
  }
  if (opts.removeExtraFiles) {
    args.push('--delete');
  }

  for (const pattern of config.excludePatterns) {
    args.push(`--exclude=${pattern}`);
  }

  args.push(config.sourcePath, `${config.targetHost}:${config.targetPath}`);
  return args;
}

/**
 * Echo and run rsync, failing on any non-zero status
 */
export async function runRsync(
  config: SyncConfig,
  options?: SyncOptions,
  launcher: ProcessLauncher = spawnProcess,
  logger: Logger = consoleLogger
): Promise<void> {
  const args = buildRsyncArgs(config, options);

  logger.trace(formatCommand(RSYNC_COMMAND, args));
  const code = await launcher(RSYNC_COMMAND, args);

  if (code === 0) {
    return;
  }
  if (code === RSYNC_REMOTE_SHELL_FAILURE) {
    throw new TransportError(`Connection Error: Remote shell failed for ${config.targetHost} (rsync exit ${code})`);
  }
  throw new TransferError(`Remote Error: rsync exited with status ${code}`, code);
}
