/**
 * Tests for group-by aggregation
 */

import { describe, it, expect } from 'vitest';
import type { TableRow } from '@trade-charts/shared';
import { aggregateRows } from './aggregator.js';
import { validateChartInput } from './validator.js';
import { NonNumericColumnError } from './errors.js';
import type { ChartRequestOptions } from './types.js';

/**
 * Helper: yearly rows for a few countries
 */
function createTradeRows(): TableRow[] {
  return [
    { year: 2020, country: 'Canada', trade_value: 500, partner: 'USA' },
    { year: 2020, country: 'USA', trade_value: 1000, partner: 'Mexico' },
    { year: 2021, country: 'Canada', trade_value: 700, partner: 'USA' },
    { year: 2021, country: 'USA', trade_value: 1200, partner: 'Canada' },
    { year: 2022, country: 'Mexico', trade_value: 300, partner: 'USA' },
    { year: 2022, country: 'USA', trade_value: 1400, partner: 'Mexico' },
  ];
}

function aggregate(rows: TableRow[], options: ChartRequestOptions) {
  return aggregateRows(validateChartInput(rows, { xColumn: 'year', yColumn: 'trade_value', ...options }));
}

describe('aggregateRows', () => {
  it('should return the input unchanged without a group-by column', () => {
    const input = validateChartInput(createTradeRows(), { yColumn: 'trade_value' });
    const result = aggregateRows(input);

    expect(result.grouped).toBe(false);
    expect(result.rows).toBe(input.rows);
    expect(result.columns).toBe(input.columns);
  });

  it('should sum per group in first-seen order', () => {
    const result = aggregate(createTradeRows(), { groupBy: 'country', aggregation: 'sum' });

    expect(result.grouped).toBe(true);
    expect(result.rows.map((row) => row['country'])).toEqual(['Canada', 'USA', 'Mexico']);
    expect(result.rows.map((row) => row['trade_value'])).toEqual([1200, 3600, 300]);
  });

  it('should keep the first row of each group and the column order', () => {
    const result = aggregate(createTradeRows(), { groupBy: 'country' });

    expect(result.rows[1]).toEqual({ year: 2020, country: 'USA', trade_value: 3600, partner: 'Mexico' });
    expect(Object.keys(result.rows[1]!)).toEqual(['year', 'country', 'trade_value', 'partner']);
  });

  it('should preserve the total across groups for sum', () => {
    const rows = createTradeRows();
    const total = rows.reduce((sum, row) => sum + Number(row['trade_value']), 0);

    for (const groupBy of ['country', 'year', 'partner']) {
      const result = aggregate(rows, { groupBy, aggregation: 'sum' });
      const grouped = result.rows.reduce((sum, row) => sum + Number(row['trade_value']), 0);
      expect(grouped).toBe(total);
    }
  });

  it('should count rows per group', () => {
    const result = aggregate(createTradeRows(), { groupBy: 'partner', aggregation: 'count' });

    expect(result.rows.map((row) => [row['partner'], row['trade_value']])).toEqual([
      ['USA', 3],
      ['Mexico', 2],
      ['Canada', 1],
    ]);
  });

  it('should count regardless of the y column type', () => {
    const rows: TableRow[] = [
      { region: 'EU', status: 'pending' },
      { region: 'EU', status: 'cleared' },
      { region: 'APAC', status: 'cleared' },
    ];

    const result = aggregateRows(
      validateChartInput(rows, { xColumn: 'region', yColumn: 'status', groupBy: 'region', aggregation: 'count' })
    );

    expect(result.rows.map((row) => row['status'])).toEqual([2, 1]);
    expect(result.columns.y).toEqual({ name: 'status', kind: 'numeric' });
  });

  it('should compute mean, max and min', () => {
    const rows = createTradeRows();

    expect(aggregate(rows, { groupBy: 'country', aggregation: 'mean' }).rows.map((r) => r['trade_value'])).toEqual([
      600, 1200, 300,
    ]);
    expect(aggregate(rows, { groupBy: 'country', aggregation: 'max' }).rows.map((r) => r['trade_value'])).toEqual([
      700, 1400, 300,
    ]);
    expect(aggregate(rows, { groupBy: 'country', aggregation: 'min' }).rows.map((r) => r['trade_value'])).toEqual([
      500, 1000, 300,
    ]);
  });

  it('should reject numeric reductions over non-numeric values', () => {
    const rows: TableRow[] = [
      { year: 2020, country: 'USA', trade_value: 1000 },
      { year: 2021, country: 'USA', trade_value: 'n/a' },
    ];

    expect(() => aggregate(rows, { groupBy: 'country', aggregation: 'sum' })).toThrow(NonNumericColumnError);
    expect(() => aggregate(rows, { groupBy: 'country', aggregation: 'mean' })).toThrow(
      'Column "trade_value" must be numeric (found "n/a")'
    );
  });

  it('should group dates by timestamp', () => {
    const rows: TableRow[] = [
      { day: new Date('2023-05-01T00:00:00Z'), trade_value: 10 },
      { day: new Date('2023-05-02T00:00:00Z'), trade_value: 5 },
      { day: new Date('2023-05-01T00:00:00Z'), trade_value: 20 },
    ];

    const result = aggregateRows(
      validateChartInput(rows, { xColumn: 'day', yColumn: 'trade_value', groupBy: 'day' })
    );

    expect(result.rows.map((row) => row['trade_value'])).toEqual([30, 5]);
  });

  it('should keep numbers and their string spelling in separate groups', () => {
    const rows: TableRow[] = [
      { code: 2020, trade_value: 1 },
      { code: '2020', trade_value: 2 },
    ];

    const result = aggregateRows(
      validateChartInput(rows, { xColumn: 'code', yColumn: 'trade_value', groupBy: 'code' })
    );

    expect(result.rows).toHaveLength(2);
  });
});
