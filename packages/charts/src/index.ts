/**
 * @trade-charts/charts - chart construction engine
 *
 * Turns an in-memory trade-statistics table into a Plotly figure
 * description (line, bar, scatter, area or heatmap).
 *
 * @example
 * ```typescript
 * import { buildChart } from '@trade-charts/charts';
 *
 * const figure = buildChart(rows, {
 *   chartType: 'line',
 *   xColumn: 'year',
 *   yColumn: 'trade_value',
 *   showTrend: true,
 * });
 * ```
 */

export { buildChart, type BuildChartContext } from './build-chart.js';
export { validateChartInput, resolveRequest } from './validator.js';
export { aggregateRows, reduceGroup } from './aggregator.js';
export {
  buildFigure,
  CHART_BUILDERS,
  TREND_CHART_TYPES,
  THEME_COLORS,
  SERIES_COLORS,
  pivotCounts,
  pivotValues,
  type ChartBuilder,
  type PivotGrid,
} from './builders/index.js';
export {
  applyOverlays,
  computeAnnotations,
  computeOverlays,
  computeTrendLine,
  formatValue,
  trendOmission,
} from './overlays.js';
export { loadChartsConfig, getChartsLogger, type ChartsConfig } from './config.js';
export * from './errors.js';
export * from './schemas/chart-request.schema.js';
export type {
  AggregatedDataset,
  AxisLayout,
  AxisType,
  BarTrace,
  BuiltChart,
  ChartFigure,
  ChartRequestOptions,
  ChartTrace,
  ColumnSchema,
  FigureAnnotation,
  FigureConfig,
  FigureLayout,
  HeatmapTrace,
  OverlaySet,
  PlottedPoint,
  PlotValue,
  SeriesTrace,
  TrendLine,
  ValidatedInput,
} from './types.js';
