// =============================================================================
// Environment
// Validated process environment for the engine's ambient concerns
// =============================================================================

import { cleanEnv, str } from 'envalid';

export const env = cleanEnv(process.env, {
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
  }),
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum pino level; omissions are logged at warn',
  }),
});

export type Env = typeof env;
