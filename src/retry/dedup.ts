/**
 * Collapse repeated lines, keeping each one where it first appeared.
 * Every kept line ends in a newline; no lines gives the empty string.
 */
export function dedup(lines: readonly string[]): string {
  let out = '';
  for (const line of new Set(lines)) {
    out += line + '\n';
  }
  return out;
}
