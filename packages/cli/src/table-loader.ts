/**
 * Load a trade table from a CSV or JSON file
 */

import * as fs from 'fs';
import * as path from 'path';
import { JsonTableSchema, type CellValue, type InputTable, type TableRow } from '@trade-charts/shared';

const NUMBER_PATTERN = /^-?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;
// codes such as "0101" keep their leading zero
const ZERO_PADDED_PATTERN = /^-?0\d/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * ISO dates become Dates, anything else stays text
 */
export function coerceDate(text: string): CellValue {
  if (ISO_DATE_PATTERN.test(text)) {
    const date = new Date(text);
    if (!Number.isNaN(date.getTime())) {
      return date;
    }
  }
  return text;
}

/**
 * Numbers become numbers, ISO dates become Dates, anything else stays text
 */
export function coerceCell(raw: string): CellValue {
  const text = raw.trim();
  if (NUMBER_PATTERN.test(text) && !ZERO_PADDED_PATTERN.test(text)) {
    return Number(text);
  }
  return coerceDate(text);
}

/**
 * Split one CSV line, honoring double-quoted fields ("" inside quotes is a quote)
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
}

export function parseCsvTable(content: string): TableRow[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const [headerLine, ...dataLines] = lines;
  if (headerLine === undefined) {
    return [];
  }

  const header = splitCsvLine(headerLine).map((name) => name.trim());

  return dataLines.map((line, index) => {
    const cells = splitCsvLine(line);
    if (cells.length > header.length) {
      throw new Error(`CSV line ${index + 2} has ${cells.length} fields, header has ${header.length}`);
    }
    const row: Record<string, CellValue> = {};
    cells.forEach((cell, column) => {
      const name = header[column];
      if (name !== undefined) {
        row[name] = coerceCell(cell);
      }
    });
    return row;
  });
}

export function parseJsonTable(content: string): TableRow[] {
  const parsed: unknown = JSON.parse(content);
  const rows = JsonTableSchema.parse(parsed);

  return rows.map((row) => {
    const converted: Record<string, CellValue> = {};
    for (const [name, value] of Object.entries(row)) {
      converted[name] = typeof value === 'string' ? coerceDate(value) : value;
    }
    return converted;
  });
}

export function loadTable(filePath: string): InputTable {
  const content = fs.readFileSync(filePath, 'utf-8');
  const extension = path.extname(filePath).toLowerCase();

  switch (extension) {
    case '.csv':
      return parseCsvTable(content);
    case '.json':
      return parseJsonTable(content);
    default:
      throw new Error(`Unsupported table format "${extension}" (expected .csv or .json)`);
  }
}
