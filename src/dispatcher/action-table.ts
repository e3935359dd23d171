/**
 * Plain-text tables for the setup diagnostics.
 *
 * @example
 * renderTable(['Path', 'Private'], [['/blog', '/blog/index']]);
 * // .-------+-------------.
 * // | Path  | Private     |
 * // +-------+-------------+
 * // | /blog | /blog/index |
 * // '-------+-------------'
 */

export function renderTable(
  columns: readonly string[],
  rows: ReadonlyArray<readonly string[]>
): string {
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...rows.map((row) => (row[index] ?? '').length))
  );

  const rule = (left: string, right: string): string =>
    `${left}${widths.map((width) => '-'.repeat(width + 2)).join('+')}${right}`;
  const line = (cells: readonly string[]): string =>
    `| ${widths.map((width, index) => (cells[index] ?? '').padEnd(width)).join(' | ')} |`;

  return [
    rule('.', '.'),
    line(columns),
    rule('+', '+'),
    ...rows.map(line),
    rule("'", "'"),
  ].join('\n');
}
