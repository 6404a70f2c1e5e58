#!/usr/bin/env npx tsx
/**
 * Render a trade table to a standalone HTML chart
 *
 * @example
 * ```bash
 * npx tsx packages/cli/src/render-chart.ts --sample --type bar --x country \
 *   --y trade_value --group-by country --agg sum --annotations
 * ```
 */

import { ChartError } from '@trade-charts/charts';
import { createLogger, loadEnvFromRoot } from '@trade-charts/shared';
import { parseRenderArgs, USAGE } from './args.js';
import { renderChartFile } from './render.js';

loadEnvFromRoot();

const logger = createLogger({ service: 'cli', file: false });

async function main(): Promise<void> {
  const args = parseRenderArgs(process.argv.slice(2));

  renderChartFile(args, logger);

  await logger.close();
}

main().catch((error: unknown) => {
  if (error instanceof ChartError) {
    logger.error(error.message, { code: error.code });
  } else {
    logger.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
  }
  process.exitCode = 1;
});
