/**
 * Chart construction pipeline
 *
 * validate -> aggregate -> build -> overlays, synchronously, with no I/O.
 * The returned figure shares nothing with the input or with other calls, so
 * caching by (table, options) is left to the caller.
 */

import type { InputTable, Logger } from '@trade-charts/shared';
import { aggregateRows } from './aggregator.js';
import { buildFigure } from './builders/index.js';
import { getChartsLogger } from './config.js';
import { ChartError } from './errors.js';
import { applyOverlays, computeOverlays, trendOmission } from './overlays.js';
import { validateChartInput } from './validator.js';
import type { ChartFigure, ChartRequestOptions } from './types.js';

export interface BuildChartContext {
  /** Logger to use instead of the engine default */
  logger?: Logger;
}

/**
 * Build a figure description from a trade-statistics table
 *
 * @example
 * ```typescript
 * const figure = buildChart(rows, {
 *   chartType: 'bar',
 *   xColumn: 'year',
 *   yColumn: 'trade_value',
 *   colorColumn: 'country',
 *   groupBy: 'country',
 *   aggregation: 'sum',
 * });
 * Plotly.newPlot('chart', figure.data, figure.layout, figure.config);
 * ```
 *
 * @throws ChartError subclasses for every invalid input
 */
export function buildChart(
  data: InputTable,
  options: ChartRequestOptions = {},
  context: BuildChartContext = {}
): ChartFigure {
  const logger = context.logger ?? getChartsLogger();

  try {
    const input = validateChartInput(data, options);
    const { request } = input;
    const log = logger.child({ chartType: request.chartType });

    const dataset = aggregateRows(input);
    if (dataset.grouped) {
      log.debug('Aggregated rows', {
        groupBy: request.groupBy,
        aggregation: request.aggregation,
        inputRows: input.rows.length,
        groups: dataset.rows.length,
      });
    }

    const built = buildFigure(dataset, request);
    const overlays = computeOverlays(built, request, dataset.columns);

    if (request.showTrend && !overlays.trendLine) {
      log.debug('Trend line omitted', {
        reason:
          trendOmission(request, dataset.columns) ?? 'needs two distinct x values and numeric y values',
      });
    }

    const figure = applyOverlays(built, overlays, request);
    log.debug('Chart built', {
      traces: figure.data.length,
      points: built.points.length,
      annotations: overlays.annotations.length,
    });
    return figure;
  } catch (error) {
    if (error instanceof ChartError) {
      logger.debug('Chart rejected', { code: error.code, message: error.message });
    }
    throw error;
  }
}
