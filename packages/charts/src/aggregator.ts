/**
 * Group-by aggregation
 *
 * Collapses rows sharing a group-by value into one row whose y cell holds the
 * reduction of the group. Partitions keep the order in which their key first
 * appears; columns keep their order.
 */

import { DataFrame, Series, type IDataFrame } from 'data-forge';
import type { CellValue, TableRow } from '@trade-charts/shared';
import type { AggregationMethod } from './schemas/chart-request.schema.js';
import { NonNumericColumnError } from './errors.js';
import { cellKey, cellLabel, isNumericCell } from './utils/cells.js';
import type { AggregatedDataset, ValidatedInput } from './types.js';

/**
 * Aggregate validated rows by the request's group-by column
 *
 * @returns the input unchanged when no group-by column is set
 * @throws NonNumericColumnError for sum/mean/max/min over non-numeric y values
 */
export function aggregateRows(input: ValidatedInput): AggregatedDataset {
  const { rows, request, columns } = input;
  const groupBy = columns.groupBy;

  if (!groupBy) {
    return { rows, columns, grouped: false };
  }

  const yName = columns.y.name;
  const frame = new DataFrame<number, TableRow>(rows);

  const aggregated = frame
    .groupBy((row) => cellKey(row[groupBy.name] ?? ''))
    .select((group) => {
      const first = group.first();
      return { ...first, [yName]: reduceGroup(group, yName, request.aggregation) };
    })
    .toArray();

  return {
    rows: aggregated,
    columns: { ...columns, y: { name: yName, kind: 'numeric' } },
    grouped: true,
  };
}

/**
 * Reduce one partition's y column
 */
export function reduceGroup(
  group: IDataFrame<number, TableRow>,
  yName: string,
  method: AggregationMethod
): number {
  if (method === 'count') {
    return group.count();
  }

  const values = group.deflate((row) => row[yName]).toArray();
  const numbers = values.filter(isNumericCell);
  if (numbers.length !== values.length) {
    const offender = values.find((value) => !isNumericCell(value));
    throw new NonNumericColumnError(yName, describeCell(offender));
  }

  const series = new Series<number, number>(numbers);
  switch (method) {
    case 'sum':
      return series.sum();
    case 'mean':
      return series.average();
    case 'max':
      return series.max();
    case 'min':
      return series.min();
  }
}

function describeCell(value: CellValue | undefined): string {
  if (value === undefined) return 'a missing value';
  return typeof value === 'string' ? `"${value}"` : cellLabel(value);
}
