/**
 * Shared types for trade-charts
 */

export * from './table.js';
