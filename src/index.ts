// =============================================================================
// rv-curve-engine
// Yield-curve bootstrapping and relative-value spread analytics
// =============================================================================

export * from './lib/bootstrap';
export * from './lib/analytics';
export * from './lib/errors';
export * from './lib/pipeline';
export * from './config/engine';
export * from './data-provider';
export { createLogger, type Logger } from './lib/logger';
