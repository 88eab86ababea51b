import type { ChalkInstance } from 'chalk';
import type { Frame } from '@vnquote/contracts';

/**
 * Render a frame as an aligned text table with a bold header and a row count.
 *
 * @example
 * ```typescript
 * renderTable(frame, chalk);
 * // time                       open  high  low   close  volume
 * // 2024-01-02T07:00:00+07:00  87.5  88.1  87.2  87.9   100
 * // 1 row
 * ```
 */
export function renderTable<Row extends object>(frame: Frame<Row>, c: ChalkInstance): string {
  if (frame.rows.length === 0) {
    return c.dim(`No rows for ${frame.meta.symbol}`);
  }

  const cells = frame.rows.map((row) => frame.columns.map((column) => String(row[column])));
  const widths = frame.columns.map((column, i) =>
    Math.max(column.length, ...cells.map((line) => line[i]?.length ?? 0))
  );
  const layout = (line: readonly string[]): string =>
    line
      .map((cell, i) => cell.padEnd(widths[i] ?? 0))
      .join('  ')
      .trimEnd();

  const count = frame.rows.length === 1 ? '1 row' : `${frame.rows.length} rows`;
  return [c.bold(layout(frame.columns)), ...cells.map(layout), c.dim(count)].join('\n');
}
