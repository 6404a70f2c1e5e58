import { z } from 'zod';

/**
 * Zod schema for a table cell
 */
export const CellValueSchema = z.union([z.number().finite(), z.string(), z.date()]);

/**
 * Zod schema for a table row as it arrives in JSON (no Date values)
 */
export const JsonTableSchema = z.array(z.record(z.string(), z.union([z.number().finite(), z.string()])));

