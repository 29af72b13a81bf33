import { z } from 'zod';
import { OTError, ERROR_CODES } from './error';

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Assert normal form and convergence on every result (slow, for tests)
  debugChecks: z.boolean().default(false),
});

export type Config = z.infer<typeof configSchema>;

const flagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

function parseFlag(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = flagSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new OTError(ERROR_CODES.ERR_CONFIG_INVALID, `${name} must be true, false, 1 or 0, got "${value}"`);
  }
  return parsed.data;
}

function validate(raw: unknown): Config {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw new OTError(
      ERROR_CODES.ERR_CONFIG_INVALID,
      `Invalid configuration${path ? ` at ${path}` : ''}: ${issue ? issue.message : result.error.message}`
    );
  }
  return Object.freeze(result.data);
}

/**
 * Load and validate configuration from environment
 *
 *   TEXT_OT_DEBUG_CHECKS - "true" turns on invariant assertions
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return validate({
    debugChecks: parseFlag('TEXT_OT_DEBUG_CHECKS', env.TEXT_OT_DEBUG_CHECKS),
  });
}

let active: Config | null = null;

/** The active configuration, read from the environment on first use */
export function getConfig(): Config {
  if (!active) {
    active = loadConfig();
  }
  return active;
}

/**
 * Override part of the active configuration.
 *
 * @throws OTError (ERR_CONFIG_INVALID) if an override has the wrong type
 */
export function configure(overrides: Partial<Config>): Config {
  active = validate({ ...getConfig(), ...overrides });
  return active;
}

/** Drop overrides; the next getConfig() reads the environment again */
export function resetConfig(): void {
  active = null;
}
