/**
 * Tabular trade-statistics types
 *
 * A table is what the data-supply side hands over after flattening:
 * an ordered list of rows keyed by column name.
 */

/**
 * A single cell: numeric measure, label or point in time
 */
export type CellValue = number | string | Date;

/**
 * One row of a table, keyed by column name
 */
export type TableRow = Readonly<Record<string, CellValue>>;

/**
 * Ordered collection of rows
 */
export type InputTable = readonly TableRow[];

/**
 * How a column's values behave on an axis
 * - numeric: every value is a finite number
 * - date: every value is a Date
 * - categorical: anything else (strings or mixed values)
 */
export type ColumnKind = 'numeric' | 'date' | 'categorical';

/**
 * A referenced column, resolved against a concrete table
 */
export interface ResolvedColumn {
  name: string;
  kind: ColumnKind;
}
