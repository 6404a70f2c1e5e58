export * from './table.schema.js';
