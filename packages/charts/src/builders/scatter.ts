/**
 * Scatter chart: one marker per row, colored by the color column.
 */

import type { ChartRequest } from '../schemas/chart-request.schema.js';
import { readCell, splitSeries, toPlotValue } from '../utils/cells.js';
import type { AggregatedDataset, BuiltChart, PlottedPoint, SeriesTrace } from '../types.js';
import { createLayout, seriesColor } from './common.js';

export function buildScatterChart(dataset: AggregatedDataset, request: ChartRequest): BuiltChart {
  const { x, y, color } = dataset.columns;
  const traces: SeriesTrace[] = [];
  const points: PlottedPoint[] = [];

  splitSeries(dataset.rows, color, y.name).forEach((series, index) => {
    traces.push({
      type: 'scatter',
      mode: 'markers',
      name: series.name,
      x: series.rows.map((row) => toPlotValue(readCell(row, x))),
      y: series.rows.map((row) => toPlotValue(readCell(row, y))),
      marker: { color: seriesColor(index), size: 8 },
    });

    for (const row of series.rows) {
      const value = readCell(row, y);
      points.push({ x: readCell(row, x), y: value, value, series: series.name });
    }
  });

  return {
    traces,
    layout: createLayout(request, { title: x.name, kind: x.kind }, { title: y.name, kind: y.kind }),
    points,
  };
}
