import type { ChartRequest, ChartType } from '../schemas/chart-request.schema.js';
import type { AggregatedDataset, BuiltChart } from '../types.js';
import { buildAreaChart } from './area.js';
import { buildBarChart } from './bar.js';
import { buildHeatmapChart } from './heatmap.js';
import { buildLineChart } from './line.js';
import { buildScatterChart } from './scatter.js';

export type ChartBuilder = (dataset: AggregatedDataset, request: ChartRequest) => BuiltChart;

/**
 * Builder per chart type
 */
export const CHART_BUILDERS: Readonly<Record<ChartType, ChartBuilder>> = {
  line: buildLineChart,
  bar: buildBarChart,
  scatter: buildScatterChart,
  area: buildAreaChart,
  heatmap: buildHeatmapChart,
};

/**
 * Chart types that take a trend line overlay
 */
export const TREND_CHART_TYPES: ReadonlySet<ChartType> = new Set<ChartType>(['line', 'scatter']);

export function buildFigure(dataset: AggregatedDataset, request: ChartRequest): BuiltChart {
  return CHART_BUILDERS[request.chartType](dataset, request);
}

export { buildAreaChart, buildBarChart, buildHeatmapChart, buildLineChart, buildScatterChart };
export { pivotCounts, pivotValues, type PivotGrid } from './heatmap.js';
export { THEME_COLORS, SERIES_COLORS } from './common.js';
