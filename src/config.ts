import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_ALIAS_COUNT } from './constants.js';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === 'boolean' ? v : ['1', 'true', 'yes'].includes(v.toLowerCase())));

const configSchema = z.object({
  // Files
  domainsFile: z.string().min(1).default('domains.txt'),
  stateFile: z.string().min(1).default('provisioning-state.json'),
  failureLogFile: z.string().min(1).default('failures.jsonl'),
  aliasesFile: z.string().min(1).default('aliases.txt'),
  reportFile: z.string().optional(),

  // Services
  forwardTo: z.string().email().optional(),
  forwardEmailApiKey: z.string().optional(),
  cloudflareApiToken: z.string().optional(),
  requestTimeoutSeconds: z.coerce.number().positive().default(30),

  // Verification
  dnsPropagationWaitSeconds: z.coerce.number().min(0).default(180),
  verificationMaxAttempts: z.coerce.number().int().min(1).default(5),
  verificationRetryDelaySeconds: z.coerce.number().min(0).default(15),

  // Aliases
  aliasCount: z.coerce.number().int().min(1).default(DEFAULT_ALIAS_COUNT),
  firstNameOnlyPercent: z.coerce.number().min(0).max(100).default(60),
  aliasMaxRetries: z.coerce.number().int().min(1).default(3),
  aliasInitialBackoffSeconds: z.coerce.number().min(0).default(2),

  dryRun: booleanFlag.default(false),
  logLevel: z.enum(LOG_LEVELS).optional(),
  nodeEnv: z.string().min(1).default('development'),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  return {
    domainsFile: env.DOMAINS_FILE,
    stateFile: env.STATE_FILE,
    failureLogFile: env.FAILURE_LOG_FILE,
    aliasesFile: env.ALIASES_FILE,
    reportFile: env.REPORT_FILE,
    forwardTo: env.FORWARD_TO,
    forwardEmailApiKey: env.FORWARD_EMAIL_API_KEY,
    cloudflareApiToken: env.CLOUDFLARE_API_TOKEN,
    requestTimeoutSeconds: env.REQUEST_TIMEOUT_SECONDS,
    dnsPropagationWaitSeconds: env.DNS_PROPAGATION_WAIT_SECONDS,
    verificationMaxAttempts: env.VERIFICATION_MAX_ATTEMPTS,
    verificationRetryDelaySeconds: env.VERIFICATION_RETRY_DELAY_SECONDS,
    aliasCount: env.ALIAS_COUNT,
    firstNameOnlyPercent: env.FIRST_NAME_ONLY_PERCENT,
    aliasMaxRetries: env.ALIAS_MAX_RETRIES,
    aliasInitialBackoffSeconds: env.ALIAS_INITIAL_BACKOFF_SECONDS,
    dryRun: env.DRY_RUN,
    logLevel: env.LOG_LEVEL?.toLowerCase(),
    nodeEnv: env.NODE_ENV,
  };
}

function dropUnset(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, v]) => v !== undefined && v !== '')
  );
}

/**
 * Build the configuration from environment variables (plus `.env`) and
 * explicit overrides such as CLI flags. Overrides win over the environment.
 */
export function loadConfig(
  overrides: Partial<ConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env,
  options: { dotenv?: boolean; envFile?: string } = {}
): Config {
  if (options.dotenv ?? true) {
    dotenv.config(options.envFile ? { path: options.envFile } : undefined);
  }

  const result = configSchema.safeParse({
    ...dropUnset(fromEnv(env)),
    ...dropUnset(overrides),
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`)
    );
  }

  return result.data;
}

/** Live runs need a destination and credentials for both services. */
export function assertLiveReady(config: Config, command: 'provision' | 'audit'): void {
  if (config.dryRun) return;

  const missing: string[] = [];
  if (command === 'provision' && !config.forwardTo) missing.push('FORWARD_TO is required');
  if (!config.forwardEmailApiKey) missing.push('FORWARD_EMAIL_API_KEY is required');
  if (!config.cloudflareApiToken) missing.push('CLOUDFLARE_API_TOKEN is required');

  if (missing.length > 0) {
    throw new ConfigError(missing);
  }
}
