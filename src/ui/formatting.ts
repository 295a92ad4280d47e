/**
 * Plain-text formatting helpers for command output.
 */

/**
 * Join lines, skipping null, undefined and false (for conditional lines).
 */
export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => line !== undefined && line !== null && line !== false)
    .join('\n');
}

/**
 * Title followed by indented lines.
 */
export function section(title: string, content: string[], indent: number = 2): string {
  const lines = [title, ...content.map((line) => ' '.repeat(indent) + line)];
  return lines.join('\n');
}

/**
 * `label: value` rows with labels padded to a common width.
 */
export function keyValueLines(rows: Array<[string, string]>): string[] {
  const width = Math.max(0, ...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${`${label}:`.padEnd(width + 1)} ${value}`);
}
