import { z } from 'zod';
import type { DmartClientProps } from './core/types.js';
import type { ValidationError } from './error/validationError.js';
import { createLogger, type LogLevel } from './utils/logger.js';
import { validator } from './utils/validator.js';
import type { SafeWrapAsync } from './utils/wrap.js';

/** Environment variables read by {@link loadConfig}. */
const envSchema = z.object({
  DMART_URL: z.string().url(),
  DMART_USERNAME: z.string().min(1),
  DMART_PASSWORD: z.string().min(1),
  DMART_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DMART_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
});

/** Client settings resolved from the environment. */
export type EnvConfig = Pick<DmartClientProps, 'baseUrl' | 'username' | 'password' | 'timeout' | 'logger'> & {
  /** Present when `DMART_LOG_LEVEL` was set; a console logger at that level is then included. */
  logLevel?: LogLevel;
};

/**
 * Reads client settings from an environment map.
 *
 * @example
 * const [err, config] = await loadConfig(process.env);
 * if (err) throw err;
 * const client = new DmartClient(config);
 */
export async function loadConfig(
  env: Record<string, string | undefined> = process.env,
): SafeWrapAsync<ValidationError, EnvConfig> {
  const [err, parsed] = await validator(env, envSchema, 'environment');
  if (err) {
    return [err, null];
  }

  const config: EnvConfig = {
    baseUrl: parsed.DMART_URL,
    username: parsed.DMART_USERNAME,
    password: parsed.DMART_PASSWORD,
    timeout: parsed.DMART_TIMEOUT_MS ?? false,
  };

  if (parsed.DMART_LOG_LEVEL) {
    config.logLevel = parsed.DMART_LOG_LEVEL;
    config.logger = createLogger(parsed.DMART_LOG_LEVEL);
  }

  return [null, config];
}
