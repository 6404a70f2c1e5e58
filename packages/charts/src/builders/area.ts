/**
 * Area chart: stacked areas, one per color value in first-seen order,
 * each ordered along x.
 */

import type { ChartRequest } from '../schemas/chart-request.schema.js';
import { orderByX, readCell, splitSeries, toPlotValue } from '../utils/cells.js';
import type { AggregatedDataset, BuiltChart, PlottedPoint, SeriesTrace } from '../types.js';
import { createLayout, seriesColor } from './common.js';

const STACK_GROUP = 'one';

export function buildAreaChart(dataset: AggregatedDataset, request: ChartRequest): BuiltChart {
  const { x, y, color } = dataset.columns;
  const traces: SeriesTrace[] = [];
  const points: PlottedPoint[] = [];

  splitSeries(dataset.rows, color, y.name).forEach((series, index) => {
    const ordered = orderByX(series.rows, x);

    traces.push({
      type: 'scatter',
      mode: 'lines',
      name: series.name,
      x: ordered.map((row) => toPlotValue(readCell(row, x))),
      y: ordered.map((row) => toPlotValue(readCell(row, y))),
      line: { color: seriesColor(index), width: 1 },
      stackgroup: STACK_GROUP,
    });

    for (const row of ordered) {
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
