import { SyncConfig } from './config';
import { TransportError } from './errors';
import { Logger, silentLogger } from './logger';
import { ProcessLauncher, spawnProcess } from './process';
import { formatCommand } from './util';

/**
 * Command run on the remote host by the connection check
 */
export const CHECK_REMOTE_COMMAND = 'true';

export interface TransportProbe {
  check(config: SyncConfig): Promise<void>;
}

/**
 * argv of the remote shell rsync talks through
 */
export function buildTransportCommand(config: SyncConfig): string[] {
  const args = ['ssh', '-p', String(config.targetPort)];

  if (config.privateKey) {
    args.push('-i', config.privateKey);
  }

  for (const [key, value] of Object.entries(config.sshOptions)) {
    args.push('-o', `${key}=${value}`);
  }

  return args;
}

/**
 * The remote shell as the single string rsync takes with `-e`
 */
export function formatTransportCommand(config: SyncConfig): string {
  const [command, ...args] = buildTransportCommand(config);
  return formatCommand(command, args);
}

/**
 * argv of the connection check: the transport command running `true` remotely
 */
export function buildCheckCommand(config: SyncConfig): string[] {
  return [...buildTransportCommand(config), config.targetHost, CHECK_REMOTE_COMMAND];
}

/**
 * Runs the same ssh command rsync will use, so the user's ssh config,
 * keys and known hosts apply, and fails before rsync is started.
 */
export class SshTransportProbe implements TransportProbe {
  constructor(
    private launcher: ProcessLauncher = spawnProcess,
    private logger: Logger = silentLogger
  ) {}

  async check(config: SyncConfig): Promise<void> {
    const [command, ...args] = buildCheckCommand(config);

    this.logger.trace(formatCommand(command, args));
    const code = await this.launcher(command, args);

    if (code !== 0) {
      throw new TransportError(`Connection Error: ssh to ${config.targetHost} exited with status ${code}`, code);
    }
  }
}
