/**
 * Base class of every failure that aborts a deploy run
 */
export class DeployError extends Error {
  constructor(message: string, public readonly exitCode: number) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A required setting is missing or invalid, or the local source cannot be used
 */
export class ConfigurationError extends DeployError {
  constructor(message: string) {
    super(message, 1);
  }
}

/**
 * The ssh connection to the remote host could not be established
 */
export class TransportError extends DeployError {
  constructor(message: string, exitCode: number = 255) {
    super(message, exitCode === 0 ? 255 : exitCode);
  }
}

/**
 * rsync itself failed
 */
export class TransferError extends DeployError {
  constructor(message: string, exitCode: number = 1) {
    super(message, exitCode === 0 ? 1 : exitCode);
  }
}

export function exitCodeOf(err: unknown): number {
  return err instanceof DeployError ? err.exitCode : 1;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Error code of a Node.js system error, if any
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
