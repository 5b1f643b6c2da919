// Command-line quoting for single arguments.
// Callers that build a command line themselves quote with quoteSingleArgument and
// run with quoteArgs: false; the runner reverses it with unquoteArgument before spawning.

const NEEDS_QUOTES = /[\s"]/;

/** Wrap an argument in double quotes when it contains whitespace or quotes. */
export function quoteSingleArgument(arg: string): string {
  if (arg.length === 0) return '""';
  if (isQuoted(arg)) return arg;
  if (!NEEDS_QUOTES.test(arg)) return arg;
  return `"${arg.replace(/"/g, '\\"')}"`;
}

/** Strip one level of surrounding double quotes added by quoteSingleArgument. */
export function unquoteArgument(arg: string): string {
  if (!isQuoted(arg)) return arg;
  return arg.slice(1, -1).replace(/\\"/g, '"');
}

function isQuoted(arg: string): boolean {
  return arg.length >= 2 && arg.startsWith('"') && arg.endsWith('"');
}
