/**
 * Chart construction errors
 *
 * Every failure is raised before a figure exists; callers show `message`
 * to the end user as-is.
 */

export type ChartErrorCode =
  | 'EMPTY_DATA'
  | 'MISSING_COLUMN'
  | 'INVALID_CHART_TYPE'
  | 'INVALID_AGGREGATION'
  | 'INVALID_PARAMETER'
  | 'INVALID_CELL_VALUE'
  | 'NON_NUMERIC_COLUMN'
  | 'HEATMAP_PIVOT';

export class ChartError extends Error {
  readonly code: ChartErrorCode;

  constructor(code: ChartErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

export class EmptyDataError extends ChartError {
  constructor() {
    super('EMPTY_DATA', 'Input table is empty');
  }
}

export class MissingColumnError extends ChartError {
  readonly columns: string[];

  constructor(columns: string[]) {
    super('MISSING_COLUMN', `Missing required columns: ${columns.join(', ')}`);
    this.columns = columns;
  }
}

export class InvalidChartTypeError extends ChartError {
  readonly chartType: string;

  constructor(chartType: string, supported: readonly string[]) {
    super(
      'INVALID_CHART_TYPE',
      `Unsupported chart type: "${chartType}" (expected one of ${supported.join(', ')})`
    );
    this.chartType = chartType;
  }
}

export class InvalidAggregationError extends ChartError {
  readonly aggregation: string;

  constructor(aggregation: string, supported: readonly string[]) {
    super(
      'INVALID_AGGREGATION',
      `Unsupported aggregation: "${aggregation}" (expected one of ${supported.join(', ')})`
    );
    this.aggregation = aggregation;
  }
}

export class InvalidParameterError extends ChartError {
  readonly parameter: string;

  constructor(parameter: string, detail: string) {
    super('INVALID_PARAMETER', `Invalid value for "${parameter}": ${detail}`);
    this.parameter = parameter;
  }
}

export class InvalidCellValueError extends ChartError {
  readonly column: string;
  readonly rowIndex: number;

  constructor(column: string, rowIndex: number, detail: string) {
    super('INVALID_CELL_VALUE', `Row ${rowIndex}, column "${column}": ${detail}`);
    this.column = column;
    this.rowIndex = rowIndex;
  }
}

export class NonNumericColumnError extends ChartError {
  readonly column: string;

  constructor(column: string, sample: string) {
    super('NON_NUMERIC_COLUMN', `Column "${column}" must be numeric (found ${sample})`);
    this.column = column;
  }
}

export class HeatmapPivotError extends ChartError {
  readonly row: string;
  readonly column: string;

  constructor(rowColumn: string, row: string, columnColumn: string, column: string) {
    super(
      'HEATMAP_PIVOT',
      `Heatmap pivot has more than one value for ${rowColumn}=${row}, ${columnColumn}=${column}; ` +
        'group or aggregate the data first'
    );
    this.row = row;
    this.column = column;
  }
}
