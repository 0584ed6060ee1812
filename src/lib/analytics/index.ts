// =============================================================================
// Relative-Value Analytics
// Re-exports all modules for convenient importing
// =============================================================================

export * from './types';
export * from './spreads';
export * from './shape';
export * from './carry';
export * from './matrix';
export * from './hedging';
export * from './cache';
