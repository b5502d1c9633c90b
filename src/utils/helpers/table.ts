/**
 * Render rows as a bordered grid:
 *
 * ```
 * +-------+------+
 * | Alert | Risk |
 * +=======+======+
 * | XSS   | High |
 * +-------+------+
 * ```
 *
 * `paint` may decorate a cell after padding (colours must not affect widths).
 */
export function renderGrid(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  paint?: (text: string, row: number, col: number) => string
): string[] {
  const widths = headers.map((header, col) => Math.max(header.length, ...rows.map((row) => (row[col] ?? '').length)));

  const border = (fill: string): string => `+${widths.map((w) => fill.repeat(w + 2)).join('+')}+`;
  const line = (cells: readonly string[], rowIndex?: number): string =>
    `| ${widths
      .map((width, col) => {
        const padded = (cells[col] ?? '').padEnd(width);
        return paint && rowIndex !== undefined ? paint(padded, rowIndex, col) : padded;
      })
      .join(' | ')} |`;

  const lines = [border('-'), line(headers), border('=')];
  rows.forEach((row, i) => {
    lines.push(line(row, i), border('-'));
  });
  return lines;
}
