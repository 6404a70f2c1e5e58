import { z } from 'zod';

/**
 * Supported chart types
 */
export const ChartTypeSchema = z.enum(['line', 'bar', 'scatter', 'area', 'heatmap']);

/**
 * Reduction applied per group when grouping
 */
export const AggregationMethodSchema = z.enum(['sum', 'mean', 'count', 'max', 'min']);

export const ChartThemeSchema = z.enum(['light', 'dark']);

export const BarModeSchema = z.enum(['group', 'stack']);

const ColumnNameSchema = z.string().min(1, 'column name must not be empty');

/**
 * Chart request schema, every option defaulted
 */
export const ChartRequestSchema = z.object({
  chartType: ChartTypeSchema.default('line'),
  xColumn: ColumnNameSchema.default('year'),
  yColumn: ColumnNameSchema.default('value'),
  title: z.string().default('Trade Analysis'),
  colorColumn: ColumnNameSchema.optional(),
  groupBy: ColumnNameSchema.optional(),
  aggregation: AggregationMethodSchema.default('sum'),
  showTrend: z.boolean().default(true),
  showAnnotations: z.boolean().default(false),
  height: z.number().int().positive().default(500),
  width: z.number().int().positive().nullish(),
  theme: ChartThemeSchema.default('light'),
  barMode: BarModeSchema.default('group'),
});

export type ChartType = z.infer<typeof ChartTypeSchema>;
export type AggregationMethod = z.infer<typeof AggregationMethodSchema>;
export type ChartTheme = z.infer<typeof ChartThemeSchema>;
export type BarMode = z.infer<typeof BarModeSchema>;

/**
 * Fully defaulted, validated request
 */
export type ChartRequest = Readonly<z.output<typeof ChartRequestSchema>>;
