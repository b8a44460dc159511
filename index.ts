import Bluebird from 'bluebird';
import chalk from 'chalk';
import { SyncConfigInput, SyncOptions, createSyncConfig } from './lib/config';
import { SyncRunner, SyncRunnerDeps } from './lib/syncRunner';

export function deploy(config: SyncConfigInput, options?: SyncOptions, deps?: SyncRunnerDeps): Bluebird<void> {
  return Bluebird.try(() => {
    const runner = new SyncRunner(createSyncConfig(config), options, deps);
    const log = runner.logger;

    log.info(chalk.green(`* Deploying to host ${runner.config.targetHost}`));
    log.info(chalk.grey('* local dir  = ') + runner.localRoot);
    log.info(chalk.grey('* remote dir = ') + runner.remoteRoot);
    log.info(chalk.grey('* mode       = ') + runner.config.transferMode + (runner.options.dryRun ? ' (dry run)' : ''));
    log.info('');

    return runner.run();
  });
}

export default deploy;
export * from './lib/config';
export * from './lib/errors';
export * from './lib/logger';
export * from './lib/manifest';
export * from './lib/process';
export * from './lib/rsync';
export * from './lib/syncRunner';
export * from './lib/transport';
