/**
 * Heatmap: the dataset pivoted into a grid with one row per x value and one
 * column per color value (group-by value when there is no color column).
 * Cells hold y; cells with no row stay 0.
 *
 * With neither a color nor a group-by column the grid counts (x, y) pairs.
 */

import type { CellValue, ResolvedColumn, TableRow } from '@trade-charts/shared';
import type { ChartRequest } from '../schemas/chart-request.schema.js';
import { HeatmapPivotError, NonNumericColumnError } from '../errors.js';
import { cellKey, cellLabel, readCell, toPlotValue, xPositions } from '../utils/cells.js';
import type { AggregatedDataset, BuiltChart, HeatmapTrace, PlottedPoint } from '../types.js';
import { createLayout } from './common.js';

export interface PivotGrid {
  rowKeys: CellValue[];
  columnKeys: CellValue[];
  /** cells[row][column], undefined where no row landed */
  cells: (number | undefined)[][];
}

export function buildHeatmapChart(dataset: AggregatedDataset, request: ChartRequest): BuiltChart {
  const { x, y } = dataset.columns;
  const columnDimension = dataset.columns.color ?? dataset.columns.groupBy;

  const grid = columnDimension
    ? pivotValues(dataset.rows, x, columnDimension, y)
    : pivotCounts(dataset.rows, x, y);

  const trace: HeatmapTrace = {
    type: 'heatmap',
    name: y.name,
    x: grid.columnKeys.map(toPlotValue),
    y: grid.rowKeys.map(toPlotValue),
    z: grid.cells.map((row) => row.map((cell) => cell ?? 0)),
    colorscale: 'Viridis',
  };

  const points: PlottedPoint[] = [];
  grid.cells.forEach((row, rowIndex) => {
    row.forEach((cell, columnIndex) => {
      const rowKey = grid.rowKeys[rowIndex];
      const columnKey = grid.columnKeys[columnIndex];
      if (cell !== undefined && rowKey !== undefined && columnKey !== undefined) {
        points.push({ x: columnKey, y: rowKey, value: cell });
      }
    });
  });

  const columnAxis = columnDimension ?? y;
  const layout = createLayout(
    request,
    { title: columnAxis.name, kind: columnAxis.kind },
    { title: x.name, kind: x.kind }
  );

  return { traces: [trace], layout, points };
}

/**
 * Pivot y values into a grid keyed by (x, column)
 *
 * @throws HeatmapPivotError when two rows share a (x, column) cell
 * @throws NonNumericColumnError when a y value is not a number
 */
export function pivotValues(
  rows: readonly TableRow[],
  x: ResolvedColumn,
  column: ResolvedColumn,
  y: ResolvedColumn
): PivotGrid {
  const grid = createGrid(rows, x, column);

  for (const row of rows) {
    const rowValue = readCell(row, x);
    const columnValue = readCell(row, column);
    const value = readCell(row, y);
    if (typeof value !== 'number') {
      throw new NonNumericColumnError(y.name, cellLabel(value));
    }

    const cellRow = grid.cellRow(rowValue);
    const columnIndex = grid.columnIndex(columnValue);
    if (cellRow[columnIndex] !== undefined) {
      throw new HeatmapPivotError(x.name, cellLabel(rowValue), column.name, cellLabel(columnValue));
    }
    cellRow[columnIndex] = value;
  }

  return grid.pivot;
}

/**
 * Count rows per (x, y) pair
 */
export function pivotCounts(rows: readonly TableRow[], x: ResolvedColumn, y: ResolvedColumn): PivotGrid {
  const grid = createGrid(rows, x, y);

  for (const row of rows) {
    const cellRow = grid.cellRow(readCell(row, x));
    const columnIndex = grid.columnIndex(readCell(row, y));
    cellRow[columnIndex] = (cellRow[columnIndex] ?? 0) + 1;
  }

  return grid.pivot;
}

/**
 * Empty grid with rows and columns each ordered along their axis
 */
function createGrid(rows: readonly TableRow[], x: ResolvedColumn, column: ResolvedColumn) {
  const orderedRowKeys = axisKeys(rows, x);
  const columnKeys = axisKeys(rows, column);

  const rowIndex = new Map(orderedRowKeys.map((value, index) => [cellKey(value), index]));
  const columnIndex = new Map(columnKeys.map((value, index) => [cellKey(value), index]));
  const cells: (number | undefined)[][] = orderedRowKeys.map(() =>
    columnKeys.map((): number | undefined => undefined)
  );

  return {
    pivot: { rowKeys: orderedRowKeys, columnKeys, cells } satisfies PivotGrid,
    cellRow(value: CellValue): (number | undefined)[] {
      const row = cells[rowIndex.get(cellKey(value)) ?? -1];
      if (!row) {
        throw new Error(`No pivot row for ${cellLabel(value)}`);
      }
      return row;
    },
    columnIndex(value: CellValue): number {
      const index = columnIndex.get(cellKey(value));
      if (index === undefined) {
        throw new Error(`No pivot column for ${cellLabel(value)}`);
      }
      return index;
    },
  };
}

/**
 * Distinct values of a column: numbers ascending, dates by time, text first-seen
 */
function axisKeys(rows: readonly TableRow[], column: ResolvedColumn): CellValue[] {
  const keys = distinct(rows.map((row) => readCell(row, column)));
  const positions = xPositions(keys, column.kind);
  return keys
    .map((value, index) => ({ value, position: positions[index] ?? index }))
    .sort((a, b) => a.position - b.position)
    .map((entry) => entry.value);
}

function distinct(values: readonly CellValue[]): CellValue[] {
  const seen = new Map<string, CellValue>();
  for (const value of values) {
    const key = cellKey(value);
    if (!seen.has(key)) {
      seen.set(key, value);
    }
  }
  return [...seen.values()];
}
