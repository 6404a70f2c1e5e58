/**
 * Tests for the per-type chart builders
 */

import { describe, it, expect } from 'vitest';
import type { TableRow } from '@trade-charts/shared';
import { aggregateRows } from '../aggregator.js';
import { validateChartInput } from '../validator.js';
import { HeatmapPivotError, NonNumericColumnError } from '../errors.js';
import type { BarTrace, ChartRequestOptions, HeatmapTrace, SeriesTrace } from '../types.js';
import { buildFigure } from './index.js';

/**
 * Helper: two countries over three years, deliberately out of year order
 */
function createTradeRows(): TableRow[] {
  return [
    { year: 2022, country: 'USA', trade_value: 120 },
    { year: 2020, country: 'USA', trade_value: 100 },
    { year: 2021, country: 'USA', trade_value: 110 },
    { year: 2020, country: 'Canada', trade_value: 50 },
    { year: 2022, country: 'Canada', trade_value: 70 },
  ];
}

function build(rows: TableRow[], options: ChartRequestOptions) {
  const input = validateChartInput(rows, { xColumn: 'year', yColumn: 'trade_value', ...options });
  return buildFigure(aggregateRows(input), input.request);
}

describe('line chart', () => {
  it('should draw a single series ordered by x without a color column', () => {
    const built = build(createTradeRows().slice(0, 3), { chartType: 'line' });

    expect(built.traces).toEqual([
      {
        type: 'scatter',
        mode: 'lines+markers',
        name: 'trade_value',
        x: [2020, 2021, 2022],
        y: [100, 110, 120],
        line: { color: '#3b82f6', width: 2 },
      },
    ]);
    expect(built.points).toHaveLength(3);
  });

  it('should draw one series per color value with distinct colors', () => {
    const built = build(createTradeRows(), { chartType: 'line', colorColumn: 'country' });
    const traces = built.traces as SeriesTrace[];

    expect(traces.map((t) => t.name)).toEqual(['USA', 'Canada']);
    expect(traces[1]!.x).toEqual([2020, 2022]);
    expect(traces[1]!.y).toEqual([50, 70]);
    expect(traces[0]!.line!.color).not.toBe(traces[1]!.line!.color);
  });

  it('should keep categorical x values in first-seen order', () => {
    const rows: TableRow[] = [
      { quarter: 'Q3', value: 3 },
      { quarter: 'Q1', value: 1 },
      { quarter: 'Q2', value: 2 },
    ];

    const input = validateChartInput(rows, { xColumn: 'quarter' });
    const built = buildFigure(aggregateRows(input), input.request);

    expect((built.traces[0] as SeriesTrace).x).toEqual(['Q3', 'Q1', 'Q2']);
    expect(built.layout.xaxis.type).toBe('category');
  });

  it('should emit dates as ISO strings on a date axis', () => {
    const rows: TableRow[] = [
      { month: new Date('2023-02-01T00:00:00Z'), value: 2 },
      { month: new Date('2023-01-01T00:00:00Z'), value: 1 },
    ];

    const input = validateChartInput(rows, { xColumn: 'month' });
    const built = buildFigure(aggregateRows(input), input.request);

    expect((built.traces[0] as SeriesTrace).x).toEqual(['2023-01-01T00:00:00.000Z', '2023-02-01T00:00:00.000Z']);
    expect(built.layout.xaxis.type).toBe('date');
  });
});

describe('bar chart', () => {
  it('should draw one bar per row at its x category', () => {
    const built = build(createTradeRows().slice(0, 3), { chartType: 'bar' });
    const [trace] = built.traces as BarTrace[];

    expect(trace!.type).toBe('bar');
    expect(trace!.x).toEqual([2022, 2020, 2021]);
    expect(trace!.y).toEqual([120, 100, 110]);
    expect(built.layout.barmode).toBe('stack');
  });

  it('should stack rows that share a category without a color column', () => {
    const built = build(createTradeRows(), { chartType: 'bar', barMode: 'group' });

    expect(built.traces).toHaveLength(1);
    expect(built.layout.barmode).toBe('stack');
  });

  it('should group bars by color column', () => {
    const built = build(createTradeRows(), { chartType: 'bar', colorColumn: 'country' });

    expect(built.traces.map((t) => t.name)).toEqual(['USA', 'Canada']);
    expect(built.layout.barmode).toBe('group');
  });

  it('should stack bars on request', () => {
    const built = build(createTradeRows(), { chartType: 'bar', colorColumn: 'country', barMode: 'stack' });

    expect(built.layout.barmode).toBe('stack');
  });
});

describe('scatter chart', () => {
  it('should draw one marker per row in row order', () => {
    const built = build(createTradeRows(), { chartType: 'scatter' });
    const [trace] = built.traces as SeriesTrace[];

    expect(trace!.mode).toBe('markers');
    expect(trace!.x).toEqual([2022, 2020, 2021, 2020, 2022]);
    expect(trace!.y).toEqual([120, 100, 110, 50, 70]);
    expect(built.points).toHaveLength(5);
  });

  it('should color markers by the color column', () => {
    const built = build(createTradeRows(), { chartType: 'scatter', colorColumn: 'country' });
    const traces = built.traces as SeriesTrace[];

    expect(traces.map((t) => t.marker!.color)).toEqual(['#3b82f6', '#ef4444']);
  });
});

describe('area chart', () => {
  it('should stack one area per color value, ordered by x', () => {
    const built = build(createTradeRows(), { chartType: 'area', colorColumn: 'country' });
    const traces = built.traces as SeriesTrace[];

    expect(traces.map((t) => t.name)).toEqual(['USA', 'Canada']);
    expect(traces.every((t) => t.stackgroup === 'one')).toBe(true);
    expect(traces[0]!.x).toEqual([2020, 2021, 2022]);
    expect(traces[0]!.y).toEqual([100, 110, 120]);
  });
});

describe('heatmap chart', () => {
  it('should pivot x against the color column', () => {
    const built = build(createTradeRows(), { chartType: 'heatmap', colorColumn: 'country' });
    const [trace] = built.traces as HeatmapTrace[];

    expect(trace!.y).toEqual([2020, 2021, 2022]);
    expect(trace!.x).toEqual(['USA', 'Canada']);
    expect(trace!.z).toEqual([
      [100, 50],
      [110, 0],
      [120, 70],
    ]);
    expect(trace!.colorscale).toBe('Viridis');
    expect(built.layout.xaxis.title.text).toBe('country');
    expect(built.layout.yaxis.title.text).toBe('year');
  });

  it('should only report filled cells as plotted points', () => {
    const built = build(createTradeRows(), { chartType: 'heatmap', colorColumn: 'country' });

    expect(built.points).toHaveLength(5);
    expect(built.points[0]).toEqual({ x: 'USA', y: 2020, value: 100 });
  });

  it('should fail on duplicate cells', () => {
    const rows = [...createTradeRows(), { year: 2020, country: 'USA', trade_value: 5 }];

    expect(() => build(rows, { chartType: 'heatmap', colorColumn: 'country' })).toThrow(HeatmapPivotError);
    expect(() => build(rows, { chartType: 'heatmap', colorColumn: 'country' })).toThrow(
      'Heatmap pivot has more than one value for year=2020, country=USA; group or aggregate the data first'
    );
  });

  it('should pivot against the group-by column when there is no color column', () => {
    const built = build(createTradeRows(), { chartType: 'heatmap', groupBy: 'country', aggregation: 'sum' });
    const [trace] = built.traces as HeatmapTrace[];

    // one row per country, each keeping its first year
    expect(trace!.y).toEqual([2020, 2022]);
    expect(trace!.x).toEqual(['USA', 'Canada']);
    expect(trace!.z).toEqual([
      [0, 120],
      [330, 0],
    ]);
  });

  it('should count (x, y) pairs without a column dimension', () => {
    const rows: TableRow[] = [
      { year: 2020, status: 'cleared' },
      { year: 2020, status: 'cleared' },
      { year: 2020, status: 'held' },
      { year: 2021, status: 'held' },
    ];

    const input = validateChartInput(rows, { chartType: 'heatmap', yColumn: 'status' });
    const [trace] = buildFigure(aggregateRows(input), input.request).traces as HeatmapTrace[];

    expect(trace!.y).toEqual([2020, 2021]);
    expect(trace!.x).toEqual(['cleared', 'held']);
    expect(trace!.z).toEqual([
      [2, 1],
      [0, 1],
    ]);
  });

  it('should order numeric columns ascending', () => {
    const rows: TableRow[] = [
      { year: 2021, tariff: 30 },
      { year: 2020, tariff: 10 },
      { year: 2020, tariff: 20 },
      { year: 2021, tariff: 10 },
    ];

    const input = validateChartInput(rows, { chartType: 'heatmap', yColumn: 'tariff' });
    const built = buildFigure(aggregateRows(input), input.request);
    const [trace] = built.traces as HeatmapTrace[];

    expect(trace!.y).toEqual([2020, 2021]);
    expect(trace!.x).toEqual([10, 20, 30]);
    expect(trace!.z).toEqual([
      [1, 1, 0],
      [1, 0, 1],
    ]);
    expect(built.layout.xaxis.type).toBe('linear');
  });

  it('should need numeric values to pivot', () => {
    const rows: TableRow[] = [{ year: 2020, country: 'USA', trade_value: 'n/a' }];

    expect(() => build(rows, { chartType: 'heatmap', colorColumn: 'country' })).toThrow(NonNumericColumnError);
  });
});

describe('layout', () => {
  it('should apply height and width', () => {
    const built = build(createTradeRows(), { height: 320, width: 640, title: 'Exports' });

    expect(built.layout.height).toBe(320);
    expect(built.layout.width).toBe(640);
    expect(built.layout.autosize).toBe(false);
    expect(built.layout.title.text).toBe('Exports');
  });

  it('should leave width to the renderer when unset', () => {
    const built = build(createTradeRows(), { chartType: 'scatter', width: null });

    expect(built.layout).not.toHaveProperty('width');
    expect(built.layout.autosize).toBe(true);
  });

  it('should use the dark palette', () => {
    const built = build(createTradeRows(), { theme: 'dark' });

    expect(built.layout.paper_bgcolor).toBe('#1a1a1a');
    expect(built.layout.plot_bgcolor).toBe('#0e0e0e');
    expect(built.layout.font.color).toBe('#e0e0e0');
  });
});
