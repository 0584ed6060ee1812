// =============================================================================
// Static Quote Provider
// Bundled G10 tables: a government yield snapshot and a swap rate stub
// =============================================================================

import { z } from 'zod';
import { createLogger } from '../lib/logger';
import { parseQuotes, type QuoteInput } from '../lib/bootstrap/quotes';
import type { Quote } from '../lib/bootstrap/types';
import type { QuoteProvider } from './types';
import governmentYields from './data/government-yields.json';
import swapRates from './data/swap-rates.json';

const log = createLogger('static-provider');

const tenorRates = z.record(z.string(), z.number().finite());

const governmentTableSchema = z.object({
  unit: z.enum(['Percent', 'Decimal']),
  timestamp: z.string().datetime({ offset: true }),
  issuers: z.record(z.string(), tenorRates),
});

const swapTableSchema = z.object({
  unit: z.enum(['Percent', 'Decimal']),
  timestamp: z.string().datetime({ offset: true }).optional(),
  currencies: z.record(z.string(), tenorRates),
});

export type GovernmentTable = z.infer<typeof governmentTableSchema>;
export type SwapTable = z.infer<typeof swapTableSchema>;

export interface StaticQuoteTables {
  government?: unknown;
  swaps?: unknown;
}

/**
 * Serves quotes from in-memory tables, by default the bundled JSON files.
 * Tables are validated once, at construction.
 */
export class StaticQuoteProvider implements QuoteProvider {
  private readonly government: GovernmentTable;
  private readonly swaps: SwapTable;

  constructor(tables: StaticQuoteTables = {}) {
    this.government = governmentTableSchema.parse(tables.government ?? governmentYields);
    this.swaps = swapTableSchema.parse(tables.swaps ?? swapRates);
  }

  async getGovernmentQuotes(issuers?: readonly string[]): Promise<Quote[]> {
    const { unit, timestamp } = this.government;
    const wanted = issuers ?? Object.keys(this.government.issuers);

    const inputs: QuoteInput[] = [];
    for (const issuer of wanted) {
      const curve = this.government.issuers[issuer];
      if (!curve) {
        log.debug({ issuer }, 'no government quotes for issuer');
        continue;
      }
      for (const [tenor, rate] of Object.entries(curve)) {
        inputs.push({ issuer, instrument: 'Government', tenor, rate, unit, timestamp });
      }
    }

    const quotes = parseQuotes(inputs);
    log.debug({ issuers: wanted.length, quotes: quotes.length }, 'served government quotes');
    return quotes;
  }

  async getSwapQuotes(currency: string): Promise<Quote[]> {
    const ccy = currency.trim().toUpperCase();
    const curve = this.swaps.currencies[ccy];
    if (!curve) {
      log.debug({ currency: ccy }, 'no swap quotes for currency');
      return [];
    }

    const { unit, timestamp } = this.swaps;
    const quotes = parseQuotes(
      Object.entries(curve).map(([tenor, rate]) => ({
        issuer: ccy,
        instrument: 'Swap',
        tenor,
        rate,
        unit,
        currency: ccy,
        ...(timestamp !== undefined ? { timestamp } : {}),
      }))
    );
    log.debug({ currency: ccy, quotes: quotes.length }, 'served swap quotes');
    return quotes;
  }

  /** Currencies with a swap table */
  get swapCurrencies(): string[] {
    return Object.keys(this.swaps.currencies);
  }
}
