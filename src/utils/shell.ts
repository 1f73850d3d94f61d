/**
 * Quote a value for a POSIX shell command line.
 *
 * @example
 * quoteShellArg("it's") // 'it'\''s'
 */
export function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
