/**
 * Overlays computed from the points a builder actually drew:
 * least-squares trend line and per-point value labels.
 */

import type { CellValue, ColumnKind } from '@trade-charts/shared';
import type { ChartRequest } from './schemas/chart-request.schema.js';
import { THEME_COLORS } from './builders/common.js';
import { TREND_CHART_TYPES } from './builders/index.js';
import { cellLabel, toPlotValue, xPositions } from './utils/cells.js';
import type {
  BuiltChart,
  ChartFigure,
  ColumnSchema,
  FigureAnnotation,
  FigureConfig,
  OverlaySet,
  PlottedPoint,
  SeriesTrace,
  TrendLine,
} from './types.js';

/**
 * Fit y = slope * x + intercept over the plotted points.
 *
 * Dates and categorical x values are fitted over their ordinal position.
 *
 * @returns null when fewer than two distinct x values exist or a y value is not numeric
 */
export function computeTrendLine(points: readonly PlottedPoint[], xKind: ColumnKind): TrendLine | null {
  const ys: number[] = [];
  for (const point of points) {
    if (typeof point.value !== 'number') {
      return null;
    }
    ys.push(point.value);
  }

  const xs = xPositions(
    points.map((point) => point.x),
    xKind
  );
  if (new Set(xs).size < 2) {
    return null;
  }

  const n = xs.length;
  const meanX = xs.reduce((sum, value) => sum + value, 0) / n;
  const meanY = ys.reduce((sum, value) => sum + value, 0) / n;

  let sxy = 0;
  let sxx = 0;
  xs.forEach((xValue, i) => {
    const dx = xValue - meanX;
    sxy += dx * ((ys[i] ?? meanY) - meanY);
    sxx += dx * dx;
  });

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  let low = 0;
  let high = 0;
  xs.forEach((xValue, i) => {
    if (xValue < (xs[low] ?? xValue)) low = i;
    if (xValue > (xs[high] ?? xValue)) high = i;
  });

  const endpoint = (index: number): TrendLine['start'] => {
    const position = xs[index] ?? meanX;
    const raw = points[index]?.x ?? position;
    return { x: toPlotValue(raw), y: intercept + slope * position };
  };

  return {
    slope,
    intercept,
    ordinal: xKind !== 'numeric',
    start: endpoint(low),
    end: endpoint(high),
  };
}

const INTEGER_FORMAT = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const DECIMAL_FORMAT = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Label text for a value: integers with thousands separators, other numbers
 * with two decimals, anything else verbatim.
 */
export function formatValue(value: CellValue): string {
  if (typeof value !== 'number') {
    return cellLabel(value);
  }
  return Number.isInteger(value) ? INTEGER_FORMAT.format(value) : DECIMAL_FORMAT.format(value);
}

/**
 * One label per plotted point
 */
export function computeAnnotations(points: readonly PlottedPoint[], request: ChartRequest): FigureAnnotation[] {
  const arrowColor = THEME_COLORS[request.theme].text;

  return points.map((point): FigureAnnotation => {
    const base = {
      x: toPlotValue(point.x),
      y: toPlotValue(point.y),
      text: formatValue(point.value),
    };

    switch (request.chartType) {
      case 'bar':
        return { ...base, showarrow: false, yshift: 10 };
      case 'heatmap':
        return { ...base, showarrow: false };
      case 'line':
      case 'scatter':
      case 'area':
        return {
          ...base,
          showarrow: true,
          arrowhead: 2,
          arrowsize: 1,
          arrowwidth: 2,
          arrowcolor: arrowColor,
          ax: 0,
          ay: -40,
        };
    }
  });
}

/**
 * Why a request gets no trend line before any fitting, or null when it may get one.
 *
 * Line series split by a color column are separate series; a scatter keeps one
 * fit over every marker.
 */
export function trendOmission(request: ChartRequest, columns: ColumnSchema): string | null {
  if (!request.showTrend) {
    return 'not requested';
  }
  if (!TREND_CHART_TYPES.has(request.chartType)) {
    return 'chart type does not take a trend line';
  }
  if (request.chartType === 'line' && columns.color) {
    return 'line series are split by a color column';
  }
  return null;
}

/**
 * Work out which overlays a request gets for the drawn points
 */
export function computeOverlays(built: BuiltChart, request: ChartRequest, columns: ColumnSchema): OverlaySet {
  const trendLine =
    trendOmission(request, columns) === null ? computeTrendLine(built.points, columns.x.kind) : null;

  return {
    trendLine,
    annotations: request.showAnnotations ? computeAnnotations(built.points, request) : [],
  };
}

const FIGURE_CONFIG: Readonly<FigureConfig> = {
  responsive: true,
  displayModeBar: true,
  modeBarButtonsToRemove: ['lasso2d', 'select2d'],
};

/**
 * Attach overlays to a built chart, producing the final figure
 */
export function applyOverlays(built: BuiltChart, overlays: OverlaySet, request: ChartRequest): ChartFigure {
  const data = [...built.traces];

  if (overlays.trendLine) {
    const trend: SeriesTrace = {
      type: 'scatter',
      mode: 'lines',
      name: 'Trend',
      x: [overlays.trendLine.start.x, overlays.trendLine.end.x],
      y: [overlays.trendLine.start.y, overlays.trendLine.end.y],
      line: { color: THEME_COLORS[request.theme].trend, width: 2, dash: 'dash' },
      showlegend: true,
    };
    data.push(trend);
  }

  return {
    data,
    layout: { ...built.layout, annotations: [...built.layout.annotations, ...overlays.annotations] },
    config: { ...FIGURE_CONFIG, modeBarButtonsToRemove: [...FIGURE_CONFIG.modeBarButtonsToRemove] },
    overlays,
  };
}
