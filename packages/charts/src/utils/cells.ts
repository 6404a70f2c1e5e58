/**
 * Cell helpers shared by the aggregator, builders and overlays
 */

import type { CellValue, ColumnKind, ResolvedColumn, TableRow } from '@trade-charts/shared';
import type { PlotValue } from '../types.js';

/**
 * Identity key for grouping: Dates compare by timestamp, and the type prefix
 * keeps 2020 and "2020" apart.
 */
export function cellKey(value: CellValue): string {
  if (value instanceof Date) {
    return `d:${value.getTime()}`;
  }
  return typeof value === 'number' ? `n:${value}` : `s:${value}`;
}

/**
 * Human-readable form of a cell (series names, error messages)
 */
export function cellLabel(value: CellValue): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

export function toPlotValue(value: CellValue): PlotValue {
  return value instanceof Date ? value.toISOString() : value;
}

export function isNumericCell(value: CellValue | undefined): value is number {
  return typeof value === 'number';
}

export function detectColumnKind(values: readonly CellValue[]): ColumnKind {
  if (values.every((value) => typeof value === 'number')) {
    return 'numeric';
  }
  if (values.every((value) => value instanceof Date)) {
    return 'date';
  }
  return 'categorical';
}

/**
 * Read a column the validator has already checked
 */
export function readCell(row: TableRow, column: ResolvedColumn): CellValue {
  const value = row[column.name];
  if (value === undefined) {
    throw new Error(`Row has no value for validated column "${column.name}"`);
  }
  return value;
}

/**
 * Map x values to positions on a numeric axis.
 *
 * Numbers keep their value. Dates are ranked by time and categorical values
 * by first appearance, giving ordinal indices 0..n-1.
 */
export function xPositions(values: readonly CellValue[], kind: ColumnKind): number[] {
  if (kind === 'numeric') {
    return values.map((value) => (typeof value === 'number' ? value : Number.NaN));
  }

  const distinct = new Map<string, CellValue>();
  for (const value of values) {
    const key = cellKey(value);
    if (!distinct.has(key)) {
      distinct.set(key, value);
    }
  }

  const ordered = [...distinct.entries()];
  if (kind === 'date') {
    ordered.sort(([, a], [, b]) => timeOf(a) - timeOf(b));
  }

  const rank = new Map(ordered.map(([key], index) => [key, index]));
  return values.map((value) => rank.get(cellKey(value)) ?? Number.NaN);
}

function timeOf(value: CellValue): number {
  return value instanceof Date ? value.getTime() : Number.NaN;
}

/**
 * Stable sort of rows along the x axis
 */
export function orderByX(rows: readonly TableRow[], x: ResolvedColumn): TableRow[] {
  const positions = xPositions(
    rows.map((row) => readCell(row, x)),
    x.kind
  );
  return rows
    .map((row, index) => ({ row, position: positions[index] ?? Number.NaN, index }))
    .sort((a, b) => a.position - b.position || a.index - b.index)
    .map((entry) => entry.row);
}

export interface SeriesRows {
  name: string;
  rows: TableRow[];
}

/**
 * Split rows into series by a color column, first-seen order.
 * Without a color column everything lands in one series named `fallbackName`.
 */
export function splitSeries(
  rows: readonly TableRow[],
  color: ResolvedColumn | undefined,
  fallbackName: string
): SeriesRows[] {
  if (!color) {
    return [{ name: fallbackName, rows: [...rows] }];
  }

  const series = new Map<string, SeriesRows>();
  for (const row of rows) {
    const value = readCell(row, color);
    const key = cellKey(value);
    const existing = series.get(key);
    if (existing) {
      existing.rows.push(row);
    } else {
      series.set(key, { name: cellLabel(value), rows: [row] });
    }
  }
  return [...series.values()];
}
