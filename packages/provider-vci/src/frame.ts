import type { Frame, FrameMeta } from '@vnquote/contracts';

/**
 * Freeze rows and metadata into a frame.
 */
export function createFrame<Row extends object>(
  columns: readonly (keyof Row & string)[],
  rows: readonly Row[],
  meta: FrameMeta
): Frame<Row> {
  return Object.freeze({
    columns: Object.freeze([...columns]),
    rows: Object.freeze(rows.map((row) => Object.freeze({ ...row }))),
    meta: Object.freeze({ ...meta }),
  });
}

/**
 * Serialize a frame's rows as a JSON array of records, columns in frame order.
 *
 * @example
 * ```typescript
 * toJsonRecords(frame);
 * // '[{"price":87.5,"volume":1200,"buyVolume":700,"sellVolume":500,"undefinedVolume":0}]'
 * ```
 */
export function toJsonRecords<Row extends object>(frame: Frame<Row>): string {
  return JSON.stringify(frame.rows, [...frame.columns]);
}
