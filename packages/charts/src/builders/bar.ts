/**
 * Bar chart: one bar per row at its x category. A color column splits the
 * bars into traces that Plotly groups or stacks per `barMode`; without one,
 * rows sharing a category stack.
 */

import type { ChartRequest } from '../schemas/chart-request.schema.js';
import { readCell, splitSeries, toPlotValue } from '../utils/cells.js';
import type { AggregatedDataset, BarTrace, BuiltChart, PlottedPoint } from '../types.js';
import { createLayout, seriesColor } from './common.js';

export function buildBarChart(dataset: AggregatedDataset, request: ChartRequest): BuiltChart {
  const { x, y, color } = dataset.columns;
  const traces: BarTrace[] = [];
  const points: PlottedPoint[] = [];

  splitSeries(dataset.rows, color, y.name).forEach((series, index) => {
    traces.push({
      type: 'bar',
      name: series.name,
      x: series.rows.map((row) => toPlotValue(readCell(row, x))),
      y: series.rows.map((row) => toPlotValue(readCell(row, y))),
      marker: { color: seriesColor(index) },
    });

    for (const row of series.rows) {
      const value = readCell(row, y);
      points.push({ x: readCell(row, x), y: value, value, series: series.name });
    }
  });

  const layout = createLayout(request, { title: x.name, kind: x.kind }, { title: y.name, kind: y.kind });
  // one trace has nothing to group, so rows sharing a category stack
  layout.barmode = color ? request.barMode : 'stack';

  return { traces, layout, points };
}
