import { cpus } from 'os';
import { z } from 'zod';
import { ConfigurationError } from '../types/configuration.exception';

const positiveInt = z.number().int().positive();

const routerSchema = z.object({
  maxRetries: z.number().int().nonnegative().default(3),
  circuitBreakerThreshold: positiveInt.default(5),
  backoffMultiplier: z.number().finite().min(1).default(2),
});

const retrySchema = z
  .object({
    maxAttempts: positiveInt.default(3),
    strategy: z.enum(['fixed', 'exponential', 'linear']).default('exponential'),
    initialDelay: z.number().nonnegative().default(100),
    maxDelay: z.number().nonnegative().default(2000),
    multiplier: z.number().min(1).default(2),
  })
  .refine(retry => retry.maxDelay >= retry.initialDelay, {
    message: 'maxDelay must be greater than or equal to initialDelay',
    path: ['maxDelay'],
  });

const queueSchema = z.object({
  name: z.string().min(1).default('simulations'),
  redisUrl: z.string().url().optional(),
});

export const orchestrationConfigSchema = z.object({
  pollIntervalMs: positiveInt.default(2000),
  defaultTimeoutMs: positiveInt.optional(),
  batchSize: positiveInt.default(10),
  maxWorkers: positiveInt.default(() => Math.max(cpus().length, 1)),
  router: routerSchema.default({}),
  retry: retrySchema.default({}),
  queue: queueSchema.default({}),
});

export type OrchestrationConfig = z.output<typeof orchestrationConfigSchema>;
export type OrchestrationConfigInput = z.input<typeof orchestrationConfigSchema>;

export function resolveOrchestrationConfig(input: OrchestrationConfigInput = {}): OrchestrationConfig {
  const parsed = orchestrationConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid orchestration config: ${issues.join('; ')}`);
  }

  return parsed.data;
}

const ENV_NUMBERS = {
  SIMRELAY_POLL_INTERVAL_MS: 'pollIntervalMs',
  SIMRELAY_TIMEOUT_MS: 'defaultTimeoutMs',
  SIMRELAY_BATCH_SIZE: 'batchSize',
  SIMRELAY_MAX_WORKERS: 'maxWorkers',
} as const;

const ENV_ROUTER_NUMBERS = {
  SIMRELAY_MAX_RETRIES: 'maxRetries',
  SIMRELAY_CIRCUIT_BREAKER_THRESHOLD: 'circuitBreakerThreshold',
  SIMRELAY_BACKOFF_MULTIPLIER: 'backoffMultiplier',
} as const;

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];

  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const value = Number(raw);

  if (Number.isNaN(value)) {
    throw new ConfigurationError(`Environment variable ${key} must be numeric, got "${raw}"`);
  }

  return value;
}

/**
 * Builds a config from SIMRELAY_* environment variables, falling back to defaults.
 */
export function loadOrchestrationConfig(env: NodeJS.ProcessEnv = process.env): OrchestrationConfig {
  const input: OrchestrationConfigInput = {};
  const router: NonNullable<OrchestrationConfigInput['router']> = {};
  const queue: NonNullable<OrchestrationConfigInput['queue']> = {};

  for (const [key, field] of Object.entries(ENV_NUMBERS)) {
    const value = readNumber(env, key);
    if (value !== undefined) {
      input[field] = value;
    }
  }

  for (const [key, field] of Object.entries(ENV_ROUTER_NUMBERS)) {
    const value = readNumber(env, key);
    if (value !== undefined) {
      router[field] = value;
    }
  }

  if (env.SIMRELAY_QUEUE_NAME) {
    queue.name = env.SIMRELAY_QUEUE_NAME;
  }

  if (env.SIMRELAY_REDIS_URL) {
    queue.redisUrl = env.SIMRELAY_REDIS_URL;
  }

  return resolveOrchestrationConfig({ ...input, router, queue });
}
