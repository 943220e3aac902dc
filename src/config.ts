import { z } from 'zod';
import { formatIssues } from './spec-validator.js';

// ============================================
// Engine Configuration
// ============================================

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export const MinionConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  // Policy for minionize() with a name that is already registered
  duplicateClass: z.enum(['error', 'replace']).default('error'),
});

export type MinionConfig = z.infer<typeof MinionConfigSchema>;

/**
 * Read configuration from environment variables
 *   MINION_LOG_LEVEL        silent | error | warn | info | debug
 *   MINION_DUPLICATE_CLASS  error | replace
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MinionConfig {
  const result = MinionConfigSchema.safeParse({
    logLevel: env.MINION_LOG_LEVEL || undefined,
    duplicateClass: env.MINION_DUPLICATE_CLASS || undefined,
  });

  if (!result.success) {
    throw new Error(`Invalid configuration:\n  ${formatIssues(result.error)}`);
  }

  return result.data;
}

let current: MinionConfig | undefined;

export function getConfig(): MinionConfig {
  if (!current) {
    current = loadConfig();
  }
  return current;
}

/**
 * Override individual settings for the rest of the process
 */
export function configure(overrides: Partial<MinionConfig>): MinionConfig {
  current = MinionConfigSchema.parse({ ...getConfig(), ...overrides });
  return current;
}

/**
 * Drop cached settings so the next read goes back to the environment
 */
export function resetConfig(): void {
  current = undefined;
}
