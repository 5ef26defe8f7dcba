/**
 * argv consumption shared by both executables.
 *
 * Every helper removes what it consumed, so whatever remains afterwards is unknown.
 */

/**
 * True if any of `names` was present; all occurrences are removed.
 */
export function takeFlag(argv: string[], ...names: string[]): boolean {
  let found = false;
  for (const name of names) {
    for (let index = argv.indexOf(name); index !== -1; index = argv.indexOf(name)) {
      argv.splice(index, 1);
      found = true;
    }
  }
  return found;
}

/**
 * Value of `--flag value` or `--flag=value`, or `undefined` when absent.
 */
export function takeOption(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inline = argv.findIndex((arg) => arg.startsWith(prefix));
  let value: string | undefined;
  if (inline !== -1) {
    value = argv[inline]?.slice(prefix.length);
    argv.splice(inline, 1);
  } else {
    const index = argv.indexOf(flag);
    if (index === -1) return undefined;
    value = argv[index + 1];
    argv.splice(index, value === undefined ? 1 : 2);
  }
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

export function assertNoUnknownFlags(argv: readonly string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}
