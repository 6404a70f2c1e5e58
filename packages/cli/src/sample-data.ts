/**
 * Sample trade data: yearly trade value per country, with import/export
 * split and tariff rate. Deterministic for a given seed.
 */

import type { TableRow } from '@trade-charts/shared';

export const SAMPLE_YEARS = [2015, 2016, 2017, 2018, 2019, 2020, 2021, 2022, 2023] as const;
export const SAMPLE_COUNTRIES = ['USA', 'China', 'Germany', 'Japan', 'UK'] as const;

/**
 * mulberry32
 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createSampleTradeData(seed = 42): TableRow[] {
  const random = createRandom(seed);
  const rows: TableRow[] = [];

  for (const year of SAMPLE_YEARS) {
    for (const country of SAMPLE_COUNTRIES) {
      // Upward trend with +/-10% noise
      const base = 1000000 + (year - 2015) * 50000;
      const value = Math.round(base * (0.9 + 0.2 * random()));

      rows.push({
        year,
        country,
        trade_value: value,
        imports: Math.round(value * 0.6),
        exports: Math.round(value * 0.4),
        tariff_rate: Math.round((2 + 6 * random()) * 100) / 100,
      });
    }
  }

  return rows;
}
