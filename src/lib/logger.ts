// =============================================================================
// Logging
// Structured pino logger shared by the refresh cycle and quote providers
// =============================================================================

import pino, { type Logger } from 'pino';
import { env } from '../config/env';

const root = pino({
  level: env.LOG_LEVEL,
  base: { service: 'rv-curve-engine' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Child logger tagged with the calling component
 */
export function createLogger(context: string): Logger {
  return root.child({ context });
}

export type { Logger };
