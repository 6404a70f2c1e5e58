/**
 * Command-line arguments for render-chart
 */

import { parseArgs } from 'util';
import type { ChartRequestOptions } from '@trade-charts/charts';

export interface RenderArgs {
  /** CSV or JSON table to chart */
  input?: string;
  /** Generate sample trade data instead of reading a file */
  sample: boolean;
  /** HTML file to write */
  output: string;
  chart: ChartRequestOptions;
}

export const USAGE = `Usage: render-chart (--input <table.csv|table.json> | --sample) [options]

Options:
  -o, --output <file>      HTML file to write (default ./chart.html)
  -t, --type <type>        line | bar | scatter | area | heatmap
  -x, --x <column>         x-axis column
  -y, --y <column>         y-axis column
  --color <column>         color column
  --group-by <column>      group rows by this column
  --agg <method>           sum | mean | count | max | min
  --trend / --no-trend     draw a trend line (line and scatter)
  --annotations            label every point
  --title <text>           chart title
  --height <px>            chart height
  --width <px>             chart width (auto when omitted)
  --theme <light|dark>     color theme
  --bar-mode <group|stack> bar layout with a color column`;

/**
 * Parse argv (without the node and script entries)
 *
 * Numbers are passed through as parsed; the chart engine rejects bad values.
 */
export function parseRenderArgs(argv: string[]): RenderArgs {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      input: { type: 'string', short: 'i' },
      sample: { type: 'boolean' },
      output: { type: 'string', short: 'o' },
      type: { type: 'string', short: 't' },
      x: { type: 'string', short: 'x' },
      y: { type: 'string', short: 'y' },
      color: { type: 'string' },
      'group-by': { type: 'string' },
      agg: { type: 'string' },
      trend: { type: 'boolean' },
      'no-trend': { type: 'boolean' },
      annotations: { type: 'boolean' },
      title: { type: 'string' },
      height: { type: 'string' },
      width: { type: 'string' },
      theme: { type: 'string' },
      'bar-mode': { type: 'string' },
    },
  });

  const sample = values.sample ?? false;
  if (!sample && !values.input) {
    throw new Error('Pass --input <file> or --sample');
  }
  if (sample && values.input) {
    throw new Error('--input and --sample cannot be combined');
  }

  let showTrend: boolean | undefined;
  if (values['no-trend']) {
    showTrend = false;
  } else if (values.trend) {
    showTrend = true;
  }

  return {
    input: values.input,
    sample,
    output: values.output ?? './chart.html',
    chart: {
      chartType: values.type,
      xColumn: values.x,
      yColumn: values.y,
      colorColumn: values.color,
      groupBy: values['group-by'],
      aggregation: values.agg,
      showTrend,
      showAnnotations: values.annotations,
      title: values.title,
      height: values.height === undefined ? undefined : Number(values.height),
      width: values.width === undefined ? undefined : Number(values.width),
      theme: values.theme,
      barMode: values['bar-mode'],
    },
  };
}
