const SAFE_ARGUMENT = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote one argument for a POSIX shell
 *
 * Arguments made only of safe characters are left as they are; everything
 * else is single-quoted, with embedded single quotes written as '\''.
 */
export function quoteShellArgument(argument: string): string {
  if (argument.length > 0 && SAFE_ARGUMENT.test(argument)) {
    return argument;
  }
  return `'${argument.replace(/'/g, `'\\''`)}'`;
}

/**
 * Join argv tokens into a command line that a POSIX shell parses back into the same tokens
 */
export function toCommandLine(argv: readonly string[]): string {
  return argv.map(quoteShellArgument).join(" ");
}
