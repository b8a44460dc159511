import { spawn } from 'child_process';
import { constants } from 'os';
import { TransferError, errnoCode } from './errors';

/**
 * Runs a command to completion and resolves its exit status
 */
export type ProcessLauncher = (command: string, args: readonly string[]) => Promise<number>;

function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

/**
 * Spawn a process with the terminal attached so its output reaches the user unmodified
 */
export const spawnProcess: ProcessLauncher = (command, args) => {
  return new Promise<number>((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: 'inherit' });

    child.once('error', err => {
      if (errnoCode(err) === 'ENOENT') {
        reject(new TransferError(`Local Error: ${command} not found`, 127));
      } else {
        reject(new TransferError(`Local Error: Cannot run ${command}: ${err.message}`));
      }
    });

    child.once('close', (code, signal) => {
      if (code !== null) {
        resolve(code);
      } else if (signal !== null) {
        resolve(signalExitCode(signal));
      } else {
        resolve(1);
      }
    });
  });
};
