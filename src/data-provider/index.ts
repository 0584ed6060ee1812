// =============================================================================
// Quote Providers
// =============================================================================

export type { QuoteProvider } from './types';
export * from './static';
