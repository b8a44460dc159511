import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  /**
   * Echo a command before it runs
   */
  trace(commandLine: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: message => console.log(message),
  trace: commandLine => console.error(chalk.gray('+ ' + commandLine)),
  error: message => console.error(chalk.red(message)),
};

export const silentLogger: Logger = {
  info: () => undefined,
  trace: () => undefined,
  error: () => undefined,
};
