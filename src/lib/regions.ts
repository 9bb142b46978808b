/**
 * Popcast — Region Table
 *
 * Region code → store currency, and currency → display symbol.
 * Data lives in data/regions.json.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const RegionTableSchema = z.object({
  defaultCurrency: z.string().length(3),
  currencies: z.record(z.string().length(3)),
  symbols: z.record(z.string().min(1)),
});

type RegionTable = z.infer<typeof RegionTableSchema>;

let table: RegionTable | null = null;

function loadTable(): RegionTable {
  if (!table) {
    const raw = readFileSync(new URL('../../data/regions.json', import.meta.url), 'utf-8');
    table = RegionTableSchema.parse(JSON.parse(raw));
  }
  return table;
}

/**
 * Currency for a store region. Unknown regions fall back to EUR.
 */
export function currencyForRegion(region: string): string {
  const { currencies, defaultCurrency } = loadTable();
  return currencies[region.trim().toLowerCase()] ?? defaultCurrency;
}

/**
 * Display symbol for a currency code, or the code itself.
 */
export function currencySymbol(currency: string): string {
  return loadTable().symbols[currency] ?? currency;
}
