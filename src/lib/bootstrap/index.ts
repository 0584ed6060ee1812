// =============================================================================
// Curve Bootstrapping Library
// Re-exports all modules for convenient importing
// =============================================================================

// Types
export * from './types';

// Quote validation and par curves
export * from './quotes';

// Curve operations
export * from './curve';

// Grid interpolation
export * from './interpolation';

// Numerical solver
export * from './solver';

// Bootstrap core
export * from './piecewise';

// Government bonds
export * from './bonds';

// Swaps
export * from './swaps';
