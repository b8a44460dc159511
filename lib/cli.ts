import { Command, CommanderError, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import deploy from '../index';
import { SyncConfigInput, TRANSFER_MODES, loadConfigFromEnv, parsePort, parseTransferMode } from './config';
import { ConfigurationError, errorMessage, exitCodeOf } from './errors';
import { consoleLogger } from './logger';
import { EntryStatus, buildManifest, summarize } from './manifest';
import { SyncRunnerDeps } from './syncRunner';

interface CliOptions {
  source?: string;
  host?: string;
  port?: number;
  path?: string;
  exclude?: string[];
  mode?: SyncConfigInput['transferMode'];
  identity?: string;
  sshOption?: string[];
  dryRun?: boolean;
  delete?: boolean;
  check: boolean;
  list?: boolean;
}

function label(status: EntryStatus): string {
  switch (status) {
    case 'dir': return chalk.cyan('D');
    case 'file': return chalk.yellow('F');
    case 'link': return chalk.blue('L');
    case 'excluded': return chalk.gray('X');
    case 'error': return chalk.red('!');
  }
}

function toArgumentError<T>(parse: (value: string) => T): (value: string) => T {
  return value => {
    try {
      return parse(value);
    } catch (err) {
      throw new InvalidArgumentError(errorMessage(err));
    }
  };
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function parseSshOptions(entries: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const entry of entries) {
    const eq = entry.indexOf('=');
    if (eq <= 0) {
      throw new ConfigurationError(`Config Error: Expected ssh option as key=value, got ${entry}`);
    }
    result[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return result;
}

function overridesFrom(options: CliOptions): SyncConfigInput {
  return {
    sourcePath: options.source,
    targetHost: options.host,
    targetPort: options.port,
    targetPath: options.path,
    excludePatterns: options.exclude,
    transferMode: options.mode,
    privateKey: options.identity,
    sshOptions: options.sshOption ? parseSshOptions(options.sshOption) : undefined,
  };
}

async function listManifest(sourcePath: string, patterns: readonly string[], deps: SyncRunnerDeps): Promise<void> {
  const log = deps.logger ?? consoleLogger;
  const entries = await buildManifest(sourcePath, patterns);

  for (const entry of entries) {
    log.info(`[ ${label(entry.status)} ] ${entry.path}`);
  }

  const summary = summarize(entries);
  log.info('');
  log.info(chalk.grey(`${summary.file} files, ${summary.dir} directories, ${summary.link} links, ${summary.excluded} excluded, ${summary.error} unreadable`));
}

export function createProgram(env: NodeJS.ProcessEnv = process.env, deps: SyncRunnerDeps = {}): Command {
  const program = new Command();

  program
    .name('rsync-deploy')
    .exitOverride()
    .description('Push a local directory to a remote host with rsync over ssh')
    .version('1.0.0')
    .option('-s, --source <dir>', 'local directory (env DEPLOY_SOURCE_PATH, default: cwd)')
    .option('-H, --host <user@host>', 'remote host (env DEPLOY_TARGET_HOST)')
    .option('-p, --port <port>', 'ssh port (env DEPLOY_TARGET_PORT, default: 22)', toArgumentError(value => parsePort(value, 'port')))
    .option('-P, --path <dir>', 'absolute remote directory (env DEPLOY_TARGET_PATH)')
    .option('-x, --exclude <pattern>', 'exclude pattern, repeatable (env DEPLOY_EXCLUDE, default: target/)', collect)
    .option('-m, --mode <mode>', `transfer mode: ${TRANSFER_MODES.join(' | ')} (env DEPLOY_TRANSFER_MODE)`, toArgumentError(parseTransferMode))
    .option('-i, --identity <file>', 'private key passed to ssh with -i (env DEPLOY_PRIVATE_KEY)')
    .option('-o, --ssh-option <key=value>', 'extra ssh option, repeatable', collect)
    .option('-n, --dry-run', 'show what would be transferred')
    .option('--delete', 'delete remote files that do not exist locally')
    .option('--no-check', 'skip the ssh connection check')
    .option('-l, --list', 'list the local files a sync would consider and exit')
    .action(async (options: CliOptions) => {
      const config = loadConfigFromEnv(env, process.cwd(), overridesFrom(options));

      if (options.list) {
        await listManifest(config.sourcePath, config.excludePatterns, deps);
        return;
      }

      await deploy(config, {
        dryRun: options.dryRun ?? false,
        removeExtraFiles: options.delete ?? false,
        checkTransport: options.check,
      }, deps);
    });

  return program;
}

/**
 * Run the CLI and resolve the process exit code
 */
export async function main(argv: readonly string[], env: NodeJS.ProcessEnv = process.env, deps: SyncRunnerDeps = {}): Promise<number> {
  const log = deps.logger ?? consoleLogger;

  try {
    await createProgram(env, deps).parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (err) {
    // commander has already printed its own usage errors
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    log.error(errorMessage(err));
    return exitCodeOf(err);
  }
}
