// =============================================================================
// Quote Provider Types
// =============================================================================

import type { Quote } from '../lib/bootstrap/types';

/**
 * Source of quote snapshots. Static tables and live feeds share this
 * shape; the engine itself never fetches.
 */
export interface QuoteProvider {
  /** Government par yields, optionally restricted to some issuers */
  getGovernmentQuotes(issuers?: readonly string[]): Promise<Quote[]>;
  /** Par swap rates for one currency; none when the currency is unknown */
  getSwapQuotes(currency: string): Promise<Quote[]>;
}
