// =============================================================================
// Quote Snapshots
// Validation of raw quotes and construction of par curves
// =============================================================================

import { z } from 'zod';
import { InvalidQuoteError } from '../errors';
import { buildCurve } from './curve';
import { parseTenor, type InstrumentType, type Quote, type YieldCurve } from './types';

const optionalNumber = z.number().finite().optional();

/**
 * Raw quote as handed over by a data provider.
 * `years` may be omitted when the tenor label carries it.
 */
export const quoteSchema = z
  .object({
    issuer: z.string().trim().min(1),
    instrument: z.enum(['Government', 'Swap']),
    tenor: z.string().trim().min(1),
    years: z.number().positive().finite().optional(),
    rate: z.number().finite(),
    unit: z.enum(['Percent', 'Decimal']),
    currency: z.string().trim().length(3).toUpperCase().optional(),
    previous: optionalNumber,
    high: optionalNumber,
    low: optionalNumber,
    change: optionalNumber,
    changePercent: optionalNumber,
    timestamp: z.string().datetime({ offset: true }).optional(),
  })
  .transform((q, ctx) => {
    const years = q.years ?? parseTenor(q.tenor);
    if (years === undefined || years <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `cannot derive years from tenor "${q.tenor}"`,
        path: ['tenor'],
      });
      return z.NEVER;
    }
    return { ...q, tenor: q.tenor.toUpperCase(), years };
  });

export type QuoteInput = z.input<typeof quoteSchema>;

/**
 * Validate a snapshot of raw quotes
 */
export function parseQuotes(input: unknown): Quote[] {
  const result = z.array(quoteSchema).safeParse(input);
  if (!result.success) {
    throw new InvalidQuoteError(
      'Quote snapshot failed validation',
      result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    );
  }
  return result.data.map(q => Object.freeze(q));
}

/**
 * Group quotes per instrument family and issuer, keeping snapshot order
 */
export function groupQuotes(quotes: readonly Quote[]): Map<string, Quote[]> {
  const groups = new Map<string, Quote[]>();
  for (const q of quotes) {
    const key = quoteGroupKey(q.instrument, q.issuer);
    const group = groups.get(key);
    if (group) {
      group.push(q);
    } else {
      groups.set(key, [q]);
    }
  }
  return groups;
}

export function quoteGroupKey(instrument: InstrumentType, issuer: string): string {
  return `${instrument}:${issuer}`;
}

/**
 * Build the par curve of one issuer or currency.
 * All quotes must share issuer, instrument and unit.
 */
export function buildParCurve(
  quotes: readonly Quote[],
  options: { currency?: string; referenceDate?: string } = {}
): YieldCurve {
  const first = quotes[0];
  if (!first) {
    throw new InvalidQuoteError('Cannot build a par curve from no quotes');
  }

  for (const q of quotes) {
    if (q.issuer !== first.issuer || q.instrument !== first.instrument) {
      throw new InvalidQuoteError(
        `Mixed quotes: ${q.instrument}/${q.issuer} next to ${first.instrument}/${first.issuer}`
      );
    }
    if (q.unit !== first.unit) {
      throw new InvalidQuoteError(`${first.issuer} mixes ${first.unit} and ${q.unit} rates`);
    }
  }

  const currency =
    options.currency ??
    first.currency ??
    (first.instrument === 'Swap' ? first.issuer.toUpperCase() : undefined);
  if (currency === undefined) {
    throw new InvalidQuoteError(`No currency known for ${first.issuer}`);
  }

  return buildCurve(
    quotes.map(q => ({ tenor: q.years, rate: q.rate, label: q.tenor })),
    {
      issuer: first.issuer,
      currency,
      instrument: first.instrument,
      kind: 'Par',
      unit: first.unit,
      referenceDate: options.referenceDate ?? latestDate(quotes),
    }
  );
}

function latestDate(quotes: readonly Quote[]): string | undefined {
  const stamps = quotes
    .map(q => q.timestamp)
    .filter((t): t is string => t !== undefined)
    .sort();
  const latest = stamps[stamps.length - 1];
  return latest === undefined ? undefined : latest.split('T')[0];
}
