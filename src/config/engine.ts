// =============================================================================
// Engine Configuration
// Explicit per-call configuration: conventions, references, display grids
// =============================================================================

import { z } from 'zod';
import { DEFAULT_CARRY_HORIZONS } from '../lib/analytics/carry';
import { DEFAULT_MATRIX_TENORS } from '../lib/analytics/matrix';
import { DEFAULT_FLIES, DEFAULT_SLOPE_PAIRS } from '../lib/analytics/shape';
import { DEFAULT_FIXED_LEG_FREQUENCY } from '../lib/bootstrap/swaps';
import {
  DEFAULT_BOOTSTRAP_CONVENTIONS,
  DEFAULT_SOLVER_CONFIG,
  type BootstrapConventions,
} from '../lib/bootstrap/types';

const alignmentSchema = z.enum(['Strict', 'Nearest']);
const compoundingSchema = z.enum(['Annual', 'SemiAnnual', 'Continuous']);
const currencySchema = z.string().length(3);
const tenorYears = z.number().positive();

const conventionsSchema = z.object({
  compounding: compoundingSchema,
  frequency: z.number().int().positive(),
  alignment: alignmentSchema,
});

export const engineConfigSchema = z.object({
  referenceIssuer: z.string().min(1),
  referenceSwapCurrency: currencySchema,
  issuerCurrency: z.record(z.string(), currencySchema),
  bondConventions: z.object({
    default: conventionsSchema,
    byIssuer: z.record(z.string(), conventionsSchema),
  }),
  swapCurve: z.object({
    fixedLegFrequency: z.record(z.string(), z.number().int().positive()),
    compounding: compoundingSchema,
    alignment: alignmentSchema,
  }),
  alignment: z.object({
    GovVsBund: alignmentSchema,
    ASW: alignmentSchema,
    IrsVsEurIrs: alignmentSchema,
    shape: alignmentSchema,
  }),
  matrixTenors: z.array(z.string().regex(/^\d+(\.\d+)?[MY]$/)).min(1),
  slopePairs: z.array(
    z.object({ name: z.string().optional(), short: tenorYears, long: tenorYears })
      .refine(p => p.short < p.long, 'short tenor must be below long tenor')
  ),
  flies: z.array(
    z.object({ name: z.string().optional(), short: tenorYears, mid: tenorYears, long: tenorYears })
      .refine(f => f.short < f.mid && f.mid < f.long, 'fly tenors must increase')
  ),
  carryHorizons: z.array(z.enum(['1M', '3M'])).min(1),
  solver: z.object({
    tolerance: z.number().positive(),
    maxIterations: z.number().int().positive(),
    lowerBound: z.number(),
    upperBound: z.number(),
  }).refine(s => s.lowerBound < s.upperBound, 'solver bounds are inverted'),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  referenceIssuer: 'Germany',
  referenceSwapCurrency: 'EUR',
  issuerCurrency: {
    'United States': 'USD',
    Canada: 'CAD',
    'United Kingdom': 'GBP',
    Germany: 'EUR',
    France: 'EUR',
    Italy: 'EUR',
    Japan: 'JPY',
    Australia: 'AUD',
    'New Zealand': 'NZD',
    Sweden: 'SEK',
  },
  bondConventions: {
    default: { ...DEFAULT_BOOTSTRAP_CONVENTIONS },
    byIssuer: {
      Germany: { compounding: 'Annual', frequency: 1, alignment: 'Nearest' },
      France: { compounding: 'Annual', frequency: 1, alignment: 'Nearest' },
      Italy: { compounding: 'SemiAnnual', frequency: 2, alignment: 'Nearest' },
      Sweden: { compounding: 'Annual', frequency: 1, alignment: 'Nearest' },
    },
  },
  swapCurve: {
    fixedLegFrequency: { ...DEFAULT_FIXED_LEG_FREQUENCY },
    compounding: 'Continuous',
    alignment: 'Nearest',
  },
  alignment: {
    GovVsBund: 'Nearest',
    ASW: 'Nearest',
    IrsVsEurIrs: 'Nearest',
    shape: 'Strict',
  },
  matrixTenors: [...DEFAULT_MATRIX_TENORS],
  slopePairs: DEFAULT_SLOPE_PAIRS.map(p => ({ ...p })),
  flies: DEFAULT_FLIES.map(f => ({ ...f })),
  carryHorizons: [...DEFAULT_CARRY_HORIZONS],
  solver: { ...DEFAULT_SOLVER_CONFIG },
};

type Conventions = EngineConfig['bondConventions']['default'];
type SwapCurveSettings = EngineConfig['swapCurve'];

export type EngineConfigOverrides = Partial<
  Omit<EngineConfig, 'bondConventions' | 'swapCurve' | 'alignment' | 'solver'>
> & {
  bondConventions?: { default?: Partial<Conventions>; byIssuer?: Record<string, Conventions> };
  swapCurve?: Partial<SwapCurveSettings>;
  alignment?: Partial<EngineConfig['alignment']>;
  solver?: Partial<EngineConfig['solver']>;
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Lookup tables merge key by key; lists replace wholesale.
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const base = DEFAULT_ENGINE_CONFIG;
  const merged = {
    ...base,
    ...overrides,
    issuerCurrency: { ...base.issuerCurrency, ...overrides.issuerCurrency },
    bondConventions: {
      default: { ...base.bondConventions.default, ...overrides.bondConventions?.default },
      byIssuer: { ...base.bondConventions.byIssuer, ...overrides.bondConventions?.byIssuer },
    },
    swapCurve: {
      ...base.swapCurve,
      ...overrides.swapCurve,
      fixedLegFrequency: {
        ...base.swapCurve.fixedLegFrequency,
        ...overrides.swapCurve?.fixedLegFrequency,
      },
    },
    alignment: { ...base.alignment, ...overrides.alignment },
    solver: { ...base.solver, ...overrides.solver },
  };

  const result = engineConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid engine configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Bootstrap conventions for a government issuer
 */
export function bondConventionsFor(config: EngineConfig, issuer: string): BootstrapConventions {
  return config.bondConventions.byIssuer[issuer] ?? config.bondConventions.default;
}

/**
 * Currency of a government issuer, undefined when unmapped
 */
export function currencyOf(config: EngineConfig, issuer: string): string | undefined {
  return config.issuerCurrency[issuer];
}
