import { z } from 'zod';

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .optional()
  .transform((value) => value === '1' || value === 'true');

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().min(1).optional()
);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(8080),
  DATABASE_URL: optionalString,
  PARENT_WAIT_TIMEOUT_MS: positiveInt(10_000),
  PARENT_WAIT_POLL_MS: positiveInt(100),
  PARENT_WAIT_MAX_POLL_MS: positiveInt(2_000),
  WRITE_CONFLICT_RETRIES: z.coerce.number().int().min(0).max(10).default(1),
  STREAM_PAGE_SIZE: positiveInt(100),
  AUTH_DISABLE: flag,
  AUTH_DEV_SHARED_SECRET: optionalString,
  AUTH_DEV_AUDIENCE: optionalString,
  AUTH_DEV_ISSUER: optionalString,
});

export interface ServiceConfig {
  env: string;
  port: number;
  databaseUrl: string | null;
  parentWait: {
    timeoutMs: number;
    pollIntervalMs: number;
    maxPollIntervalMs: number;
  };
  writeConflictRetries: number;
  streamPageSize: number;
  auth: {
    disabled: boolean;
    sharedSecret: string | null;
    audience: string | null;
    issuer: string | null;
  };
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;
  if (data.PARENT_WAIT_MAX_POLL_MS < data.PARENT_WAIT_POLL_MS) {
    throw new ConfigError('Invalid configuration', ['PARENT_WAIT_MAX_POLL_MS must be >= PARENT_WAIT_POLL_MS']);
  }

  return {
    env: data.NODE_ENV,
    port: data.PORT,
    databaseUrl: data.DATABASE_URL ?? null,
    parentWait: {
      timeoutMs: data.PARENT_WAIT_TIMEOUT_MS,
      pollIntervalMs: data.PARENT_WAIT_POLL_MS,
      maxPollIntervalMs: data.PARENT_WAIT_MAX_POLL_MS,
    },
    writeConflictRetries: data.WRITE_CONFLICT_RETRIES,
    streamPageSize: data.STREAM_PAGE_SIZE,
    auth: {
      // Without a shared secret there is nothing to verify against.
      disabled: data.AUTH_DISABLE || !data.AUTH_DEV_SHARED_SECRET,
      sharedSecret: data.AUTH_DEV_SHARED_SECRET ?? null,
      audience: data.AUTH_DEV_AUDIENCE ?? null,
      issuer: data.AUTH_DEV_ISSUER ?? null,
    },
  };
};
