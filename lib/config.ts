import * as path from 'path';
import { ConfigurationError } from './errors';
import { chomp, withTrailing } from './util';

/**
 * `contents` copies what is inside the source directory into the target path,
 * `directory` creates the source directory itself under the target path.
 */
export type TransferMode = 'contents' | 'directory';

export const TRANSFER_MODES: readonly TransferMode[] = ['contents', 'directory'];

export const DEFAULT_PORT = 22;

export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = ['target/'];

export interface SyncConfig {
  readonly sourcePath: string;
  readonly targetHost: string;
  readonly targetPort: number;
  readonly targetPath: string;
  readonly excludePatterns: readonly string[];
  readonly transferMode: TransferMode;
  readonly privateKey?: string;
  readonly sshOptions: Readonly<Record<string, string>>;
}

export interface SyncConfigInput {
  sourcePath?: string;
  targetHost?: string;
  targetPort?: number;
  targetPath?: string;
  excludePatterns?: readonly string[];
  transferMode?: TransferMode;
  privateKey?: string;
  sshOptions?: Readonly<Record<string, string>>;
}

export interface SyncOptions {
  dryRun?: boolean;
  removeExtraFiles?: boolean;
  checkTransport?: boolean;
  verbose?: boolean;
}

export const DEFAULT_SYNC_OPTIONS: Readonly<Required<SyncOptions>> = {
  dryRun: false,
  removeExtraFiles: false,
  checkTransport: true,
  verbose: true,
};

export interface RemoteTarget {
  username?: string;
  host: string;
}

export function resolveSyncOptions(options?: SyncOptions): Required<SyncOptions> {
  return {
    ...DEFAULT_SYNC_OPTIONS,
    ...options,
  };
}

/**
 * Split `user@host` into its parts
 */
export function parseTarget(targetHost: string): RemoteTarget {
  const at = targetHost.lastIndexOf('@');
  const username = at === -1 ? undefined : targetHost.slice(0, at);
  const host = targetHost.slice(at + 1);

  if (!host) {
    throw new ConfigurationError(`Config Error: No host name in target ${targetHost}`);
  }
  if (username === '') {
    throw new ConfigurationError(`Config Error: Empty user name in target ${targetHost}`);
  }
  if (/[\s:]/.test(targetHost)) {
    throw new ConfigurationError(`Config Error: Invalid target host ${targetHost}`);
  }

  return username === undefined ? { host } : { username, host };
}

/**
 * Source path as rsync must receive it for the given transfer mode.
 * A trailing separator makes rsync copy the directory contents.
 */
export function normalizeSourcePath(sourcePath: string, mode: TransferMode): string {
  if (mode === 'contents') {
    return withTrailing(sourcePath, path.sep);
  }
  return chomp(sourcePath, path.sep) || path.sep;
}

function required(value: string | undefined, name: string): string {
  if (value === undefined || value.trim() === '') {
    throw new ConfigurationError(`Config Error: ${name} is not set`);
  }
  return value.trim();
}

function validatePort(port: number): number {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Config Error: targetPort must be an integer between 1 and 65535, got ${port}`);
  }
  return port;
}

function validateSshOptions(options: Readonly<Record<string, string>>): Record<string, string> {
  const result: Record<string, string> = {};

  for (const [key, value] of Object.entries(options)) {
    if (!/^[A-Za-z][A-Za-z0-9]*$/.test(key)) {
      throw new ConfigurationError(`Config Error: Invalid ssh option name ${key}`);
    }
    result[key] = value;
  }

  return result;
}

/**
 * Build the immutable configuration of a run. Throws before any I/O happens.
 */
export function createSyncConfig(input: SyncConfigInput, cwd: string = process.cwd()): SyncConfig {
  const targetHost = required(input.targetHost, 'targetHost');
  const targetPath = required(input.targetPath, 'targetPath');
  const transferMode = input.transferMode ?? 'contents';

  parseTarget(targetHost);

  if (!path.posix.isAbsolute(targetPath)) {
    throw new ConfigurationError(`Config Error: targetPath must be absolute, got ${targetPath}`);
  }
  if (!TRANSFER_MODES.includes(transferMode)) {
    throw new ConfigurationError(`Config Error: Unknown transfer mode ${transferMode}`);
  }

  const excludePatterns = (input.excludePatterns ?? DEFAULT_EXCLUDE_PATTERNS)
    .map(pattern => pattern.trim())
    .filter(pattern => pattern !== '');

  return Object.freeze({
    sourcePath: normalizeSourcePath(path.resolve(cwd, input.sourcePath ?? cwd), transferMode),
    targetHost,
    targetPort: validatePort(input.targetPort ?? DEFAULT_PORT),
    targetPath,
    excludePatterns: Object.freeze([...new Set(excludePatterns)]),
    transferMode,
    privateKey: input.privateKey ? path.resolve(cwd, input.privateKey) : undefined,
    sshOptions: Object.freeze(validateSshOptions(input.sshOptions ?? {})),
  });
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function requiredEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = envValue(env, key);
  if (value === undefined) {
    throw new ConfigurationError(`Config Error: ${key} is not set`);
  }
  return value;
}

export function parseTransferMode(value: string): TransferMode {
  const mode = TRANSFER_MODES.find(m => m === value);
  if (!mode) {
    throw new ConfigurationError(`Config Error: Unknown transfer mode ${value}, expected one of ${TRANSFER_MODES.join(', ')}`);
  }
  return mode;
}

export function parsePort(value: string, name: string = 'targetPort'): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`Config Error: ${name} must be a positive integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Read the configuration from environment variables.
 *
 * - DEPLOY_TARGET_HOST: `user@host` (required)
 * - DEPLOY_TARGET_PATH: absolute remote path (required)
 * - DEPLOY_SOURCE_PATH: local directory (default: cwd)
 * - DEPLOY_TARGET_PORT: ssh port (default: 22)
 * - DEPLOY_EXCLUDE: comma separated exclude patterns (default: target/)
 * - DEPLOY_TRANSFER_MODE: contents | directory (default: contents)
 * - DEPLOY_PRIVATE_KEY: private key passed to ssh with -i
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  overrides: SyncConfigInput = {}
): SyncConfig {
  const port = envValue(env, 'DEPLOY_TARGET_PORT');
  const exclude = envValue(env, 'DEPLOY_EXCLUDE');
  const mode = envValue(env, 'DEPLOY_TRANSFER_MODE');

  return createSyncConfig({
    sourcePath: overrides.sourcePath ?? envValue(env, 'DEPLOY_SOURCE_PATH'),
    targetHost: overrides.targetHost ?? requiredEnv(env, 'DEPLOY_TARGET_HOST'),
    targetPath: overrides.targetPath ?? requiredEnv(env, 'DEPLOY_TARGET_PATH'),
    targetPort: overrides.targetPort ?? (port === undefined ? undefined : parsePort(port, 'DEPLOY_TARGET_PORT')),
    excludePatterns: overrides.excludePatterns ?? (exclude === undefined ? undefined : exclude.split(',')),
    transferMode: overrides.transferMode ?? (mode === undefined ? undefined : parseTransferMode(mode)),
    privateKey: overrides.privateKey ?? envValue(env, 'DEPLOY_PRIVATE_KEY'),
    sshOptions: overrides.sshOptions,
  }, cwd);
}
