import { SyncConfig, SyncOptions, resolveSyncOptions } from './config';
import { Logger, consoleLogger } from './logger';
import { verifySourceDirectory } from './manifest';
import { ProcessLauncher, spawnProcess } from './process';
import { runRsync } from './rsync';
import { SshTransportProbe, TransportProbe } from './transport';

export interface SyncRunnerDeps {
  probe?: TransportProbe;
  launcher?: ProcessLauncher;
  logger?: Logger;
}

/**
 * One-shot push of a local directory to a remote host
 * @class
 */
export class SyncRunner {
  /**
   * Config object
   */
  readonly config: SyncConfig;

  /**
   * Options object
   */
  readonly options: Required<SyncOptions>;

  /**
   * Checks that the remote host accepts an ssh connection.
   * Defaults to running ssh through the same launcher as rsync.
   */
  probe: TransportProbe;

  /**
   * Runs rsync
   */
  launcher: ProcessLauncher;

  logger: Logger;

  /**
   * Constructor
   */
  constructor(config: SyncConfig, options?: SyncOptions, deps: SyncRunnerDeps = {}) {
    this.config = config;
    this.options = resolveSyncOptions(options);
    this.logger = deps.logger ?? consoleLogger;
    this.launcher = deps.launcher ?? spawnProcess;
    this.probe = deps.probe ?? new SshTransportProbe(this.launcher, this.logger);
  }

  /**
   * Local directory root, as handed to rsync
   */
  get localRoot(): string {
    return this.config.sourcePath;
  }

  /**
   * Remote destination in rsync's `host:path` form
   */
  get remoteRoot(): string {
    return `${this.config.targetHost}:${this.config.targetPath}`;
  }

  /**
   * Run every step in order. The first failure rejects and nothing after it runs.
   */
  async run(): Promise<void> {
    await verifySourceDirectory(this.config.sourcePath);

    if (this.options.checkTransport) {
      await this.probe.check(this.config);
    }

    await runRsync(this.config, this.options, this.launcher, this.logger);
  }
}
