/**
 * Input validation
 *
 * Checks the table and the request before anything is aggregated or drawn,
 * and resolves the request into typed values the later stages trust.
 */

import type { z } from 'zod';
import { CellValueSchema, type CellValue, type InputTable, type ResolvedColumn } from '@trade-charts/shared';
import {
  AggregationMethodSchema,
  ChartRequestSchema,
  ChartTypeSchema,
  type ChartRequest,
} from './schemas/chart-request.schema.js';
import {
  EmptyDataError,
  InvalidAggregationError,
  InvalidCellValueError,
  InvalidChartTypeError,
  InvalidParameterError,
  MissingColumnError,
} from './errors.js';
import { detectColumnKind } from './utils/cells.js';
import type { ChartRequestOptions, ColumnSchema, ValidatedInput } from './types.js';

/**
 * Validate a table against a chart request
 *
 * @throws EmptyDataError when the table has no rows
 * @throws InvalidChartTypeError / InvalidAggregationError for unknown enum values
 * @throws InvalidParameterError for any other malformed option
 * @throws MissingColumnError naming every referenced column the table lacks
 * @throws InvalidCellValueError when a referenced cell is absent or unusable
 */
export function validateChartInput(data: InputTable, options: ChartRequestOptions = {}): ValidatedInput {
  if (data.length === 0) {
    throw new EmptyDataError();
  }

  const request = resolveRequest(options);

  const available = new Set<string>();
  for (const row of data) {
    for (const key of Object.keys(row)) {
      available.add(key);
    }
  }

  const referenced = referencedColumns(request);
  const missing = referenced.filter((name) => !available.has(name));
  if (missing.length > 0) {
    throw new MissingColumnError(missing);
  }

  const rows = data.map((row) => ({ ...row }));

  const resolve = (name: string): ResolvedColumn => {
    const values: CellValue[] = rows.map((row, index) => checkCell(row[name], name, index));
    return { name, kind: detectColumnKind(values) };
  };

  const columns: ColumnSchema = {
    x: resolve(request.xColumn),
    y: resolve(request.yColumn),
  };
  if (request.colorColumn !== undefined) {
    columns.color = resolve(request.colorColumn);
  }
  if (request.groupBy !== undefined) {
    columns.groupBy = resolve(request.groupBy);
  }

  return { rows, request, columns };
}

/**
 * Apply defaults and map schema failures onto the error taxonomy
 */
export function resolveRequest(options: ChartRequestOptions): ChartRequest {
  const parsed = ChartRequestSchema.safeParse(options);
  if (parsed.success) {
    return Object.freeze(parsed.data);
  }

  const issues = parsed.error.issues;
  if (hasIssue(issues, 'chartType')) {
    throw new InvalidChartTypeError(String(options.chartType), ChartTypeSchema.options);
  }
  if (hasIssue(issues, 'aggregation')) {
    throw new InvalidAggregationError(String(options.aggregation), AggregationMethodSchema.options);
  }

  const [first] = issues;
  const parameter = first ? first.path.map(String).join('.') : 'request';
  throw new InvalidParameterError(parameter, first?.message ?? 'invalid request');
}

function hasIssue(issues: readonly z.ZodIssue[], field: keyof ChartRequestOptions): boolean {
  return issues.some((issue) => issue.path[0] === field);
}

/**
 * Columns the request needs, in x, y, color, group-by order, without repeats
 */
function referencedColumns(request: ChartRequest): string[] {
  const names = [request.xColumn, request.yColumn, request.colorColumn, request.groupBy];
  const unique: string[] = [];
  for (const name of names) {
    if (name !== undefined && !unique.includes(name)) {
      unique.push(name);
    }
  }
  return unique;
}

function checkCell(value: unknown, column: string, rowIndex: number): CellValue {
  if (value === undefined) {
    throw new InvalidCellValueError(column, rowIndex, 'value is missing');
  }
  const parsed = CellValueSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidCellValueError(
      column,
      rowIndex,
      `expected a number, string or Date (got ${describe(value)})`
    );
  }
  return parsed.data;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'an invalid Date';
  if (typeof value === 'number') return String(value);
  return typeof value;
}
