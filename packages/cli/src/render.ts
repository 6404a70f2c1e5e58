/**
 * Table in, HTML chart file out
 */

import * as fs from 'fs';
import * as path from 'path';
import { buildChart } from '@trade-charts/charts';
import type { Logger } from '@trade-charts/shared';
import type { RenderArgs } from './args.js';
import { renderChartHTML } from './chart-html.js';
import { createSampleTradeData } from './sample-data.js';
import { loadTable } from './table-loader.js';

/**
 * Build the chart the arguments describe and write it as HTML
 *
 * @returns absolute path of the written file
 */
export function renderChartFile(args: RenderArgs, logger: Logger): string {
  const table = args.input ? loadTable(args.input) : createSampleTradeData();
  logger.info('Loaded table', { source: args.input ?? 'sample', rows: table.length });

  const figure = buildChart(table, args.chart, { logger });
  if (args.chart.showTrend === true && figure.overlays.trendLine === null) {
    logger.warn('Trend line requested but not drawn', { chartType: args.chart.chartType ?? 'line' });
  }

  const output = path.resolve(args.output);
  fs.mkdirSync(path.dirname(output), { recursive: true });
  fs.writeFileSync(output, renderChartHTML(figure));
  logger.info('Chart written', { output, traces: figure.data.length });

  return output;
}
