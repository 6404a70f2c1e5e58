/**
 * Standalone HTML page for a chart figure, rendered by Plotly from its CDN
 */

import type { ChartFigure } from '@trade-charts/charts';

export const PLOTLY_CDN_URL = 'https://cdn.plot.ly/plotly-2.27.0.min.js';

/**
 * Escape text for HTML
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * JSON that can sit inside a <script> element
 */
export function toScriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

/**
 * Generate standalone HTML file with the chart
 */
export function renderChartHTML(figure: ChartFigure): string {
  const { layout } = figure;
  const maxWidth = layout.width !== undefined ? `${layout.width}px` : '100%';

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(layout.title.text)}</title>
  <script src="${PLOTLY_CDN_URL}"></script>
  <style>
    body {
      margin: 0;
      padding: 20px;
      background: ${layout.plot_bgcolor};
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
    }
    #chart {
      width: 100%;
      max-width: ${maxWidth};
      margin: 0 auto;
    }
  </style>
</head>
<body>
  <div id="chart"></div>
  <script>
    const data = ${toScriptJson(figure.data)};
    const layout = ${toScriptJson(layout)};
    const config = ${toScriptJson(figure.config)};
    Plotly.newPlot('chart', data, layout, config);
  </script>
</body>
</html>`;
}
