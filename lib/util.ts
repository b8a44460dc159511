/**
 * Escapes regexp special chars
 */
export function escapeRegExp(str: string): string {
  return str.replace(/[\-\[\]\/\{\}\(\)\*\+\?\.\\\^\$\|]/g, '\\$&');
}

/**
 * Trim trailing char
 */
export function chomp(str: string, char: string): string {
  return str.replace(new RegExp(escapeRegExp(char) + '+$'), '');
}

/**
 * Ensure exactly one trailing char
 */
export function withTrailing(str: string, char: string): string {
  return chomp(str, char) + char;
}

/**
 * Quote an argument for display in a POSIX shell, only when it needs it
 */
export function quoteShellArg(arg: string): string {
  if (arg !== '' && /^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return "'" + arg.replace(/'/g, "'\\''") + "'";
}

/**
 * Render a command line the way `set -x` would echo it
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteShellArg).join(' ');
}
