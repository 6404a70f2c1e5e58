/**
 * Layout pieces shared by every chart builder
 */

import type { ColumnKind } from '@trade-charts/shared';
import type { ChartRequest, ChartTheme } from '../schemas/chart-request.schema.js';
import type { AxisLayout, AxisType, FigureLayout } from '../types.js';

/**
 * Color palette per theme
 */
export const THEME_COLORS = {
  dark: {
    background: '#0e0e0e',
    paper: '#1a1a1a',
    text: '#e0e0e0',
    grid: '#2a2a2a',
    trend: '#ef4444',
  },
  light: {
    background: '#ffffff',
    paper: '#f5f5f5',
    text: '#1a1a1a',
    grid: '#e0e0e0',
    trend: '#dc2626',
  },
} as const satisfies Record<ChartTheme, Record<string, string>>;

/**
 * Discrete colors handed out to series in order
 */
export const SERIES_COLORS = [
  '#3b82f6',
  '#ef4444',
  '#22c55e',
  '#a855f7',
  '#f59e0b',
  '#06b6d4',
  '#ec4899',
  '#84cc16',
  '#6b7280',
  '#f97316',
] as const;

export function seriesColor(index: number): string {
  return SERIES_COLORS[index % SERIES_COLORS.length] ?? SERIES_COLORS[0];
}

export function axisTypeFor(kind: ColumnKind): AxisType {
  switch (kind) {
    case 'numeric':
      return 'linear';
    case 'date':
      return 'date';
    case 'categorical':
      return 'category';
  }
}

export interface AxisOptions {
  title: string;
  kind: ColumnKind;
}

/**
 * Base layout: title, dimensions, theme and axes; no annotations yet
 */
export function createLayout(request: ChartRequest, xAxis: AxisOptions, yAxis: AxisOptions): FigureLayout {
  const colors = THEME_COLORS[request.theme];

  const axis = (options: AxisOptions): AxisLayout => ({
    title: { text: options.title },
    type: axisTypeFor(options.kind),
    gridcolor: colors.grid,
    showgrid: true,
  });

  const layout: FigureLayout = {
    title: {
      text: request.title,
      font: { color: colors.text, size: 16 },
    },
    height: request.height,
    autosize: request.width == null,
    paper_bgcolor: colors.paper,
    plot_bgcolor: colors.background,
    font: { color: colors.text },
    showlegend: true,
    xaxis: axis(xAxis),
    yaxis: axis(yAxis),
    annotations: [],
  };

  if (request.width != null) {
    layout.width = request.width;
  }

  return layout;
}
