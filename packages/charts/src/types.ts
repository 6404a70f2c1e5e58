/**
 * Chart engine types
 *
 * The figure shapes follow Plotly's trace/layout vocabulary so the output can
 * be handed to `Plotly.newPlot` without translation.
 */

import type { CellValue, ResolvedColumn, TableRow } from '@trade-charts/shared';
import type {
  AggregationMethod,
  BarMode,
  ChartRequest,
  ChartTheme,
  ChartType,
} from './schemas/chart-request.schema.js';

export type { AggregationMethod, BarMode, ChartRequest, ChartTheme, ChartType };

/**
 * Options accepted from callers before validation.
 * Chart type and aggregation arrive as plain strings and are only trusted
 * once the validator has resolved them.
 */
export interface ChartRequestOptions {
  chartType?: string;
  xColumn?: string;
  yColumn?: string;
  title?: string;
  colorColumn?: string;
  groupBy?: string;
  aggregation?: string;
  showTrend?: boolean;
  showAnnotations?: boolean;
  /** Height in pixels */
  height?: number;
  /** Width in pixels, null/undefined for auto-size */
  width?: number | null;
  theme?: string;
  barMode?: string;
}

/**
 * Columns referenced by a request, resolved against the table
 */
export interface ColumnSchema {
  x: ResolvedColumn;
  y: ResolvedColumn;
  color?: ResolvedColumn;
  groupBy?: ResolvedColumn;
}

/**
 * Output of the validator
 */
export interface ValidatedInput {
  /** Shallow copy of the input rows */
  rows: readonly TableRow[];
  request: ChartRequest;
  columns: ColumnSchema;
}

/**
 * Output of the aggregator
 */
export interface AggregatedDataset {
  rows: readonly TableRow[];
  columns: ColumnSchema;
  /** True when rows were collapsed by the group-by column */
  grouped: boolean;
}

/**
 * Value as it travels to the renderer (Dates become ISO strings)
 */
export type PlotValue = number | string;

export type AxisType = 'linear' | 'date' | 'category';

export interface SeriesTrace {
  type: 'scatter';
  mode: 'lines+markers' | 'markers' | 'lines';
  name: string;
  x: PlotValue[];
  y: PlotValue[];
  line?: { color: string; width: number; dash?: 'solid' | 'dash' | 'dot' };
  marker?: { color: string; size: number };
  /** Set on area traces so Plotly stacks them */
  stackgroup?: string;
  showlegend?: boolean;
}

export interface BarTrace {
  type: 'bar';
  name: string;
  x: PlotValue[];
  y: PlotValue[];
  marker: { color: string };
}

export interface HeatmapTrace {
  type: 'heatmap';
  name: string;
  /** Column keys */
  x: PlotValue[];
  /** Row keys */
  y: PlotValue[];
  /** z[row][column] */
  z: number[][];
  colorscale: 'Viridis';
}

export type ChartTrace = SeriesTrace | BarTrace | HeatmapTrace;

export interface FigureAnnotation {
  x: PlotValue;
  y: PlotValue;
  text: string;
  showarrow: boolean;
  arrowhead?: number;
  arrowsize?: number;
  arrowwidth?: number;
  arrowcolor?: string;
  ax?: number;
  ay?: number;
  yshift?: number;
}

export interface AxisLayout {
  title: { text: string };
  type: AxisType;
  gridcolor: string;
  showgrid: boolean;
}

export interface FigureLayout {
  title: { text: string; font: { color: string; size: number } };
  height: number;
  /** Omitted when the renderer should size the chart */
  width?: number;
  autosize: boolean;
  paper_bgcolor: string;
  plot_bgcolor: string;
  font: { color: string };
  showlegend: boolean;
  xaxis: AxisLayout;
  yaxis: AxisLayout;
  barmode?: BarMode;
  annotations: FigureAnnotation[];
}

export interface FigureConfig {
  responsive: boolean;
  displayModeBar: boolean;
  modeBarButtonsToRemove: string[];
}

/**
 * A point as drawn, kept for the overlay stage
 */
export interface PlottedPoint {
  /** Horizontal coordinate */
  x: CellValue;
  /** Vertical coordinate */
  y: CellValue;
  /** Value the point represents (differs from y only for heatmap cells) */
  value: CellValue;
  /** Series the point belongs to */
  series?: string;
}

export interface TrendLine {
  slope: number;
  intercept: number;
  /** Whether slope/intercept are expressed over ordinal x positions */
  ordinal: boolean;
  start: { x: PlotValue; y: number };
  end: { x: PlotValue; y: number };
}

export interface OverlaySet {
  trendLine: TrendLine | null;
  annotations: FigureAnnotation[];
}

/**
 * What a chart builder hands to the overlay stage
 */
export interface BuiltChart {
  traces: ChartTrace[];
  layout: FigureLayout;
  points: PlottedPoint[];
}

/**
 * Self-contained figure description, owned by the caller
 */
export interface ChartFigure {
  data: ChartTrace[];
  layout: FigureLayout;
  config: FigureConfig;
  overlays: OverlaySet;
}
