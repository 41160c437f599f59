import { z } from 'zod';

const VcapCredentialSchema = z
  .object({
    uri: z.string(),
    url: z.string(),
    jdbcUrl: z.string(),
    hostname: z.string(),
    host: z.string(),
    port: z.union([z.number(), z.string()]),
    username: z.string(),
    user: z.string(),
    password: z.string(),
    database: z.string(),
    dbname: z.string(),
  })
  .partial();

type VcapServiceCredential = z.infer<typeof VcapCredentialSchema>;

const VcapServicesSchema = z.record(z.array(z.object({ credentials: VcapCredentialSchema.optional() })));

export type LlmProvider = 'openai' | 'anthropic' | 'gemini';

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-sonnet-4-20250514',
  gemini: 'gemini-2.0-flash',
};

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => (value === undefined ? undefined : value === 'true' || value === '1'));

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  DATABASE_URL: z.string().min(1).optional(),
  VCAP_SERVICES: z.string().optional(),
  PGSSLMODE: z.string().optional(),
  LLM_PROVIDER: z.enum(['openai', 'anthropic', 'gemini']).default('openai'),
  LLM_MODEL: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_BASE_URL: z.string().url().default('https://api.anthropic.com/v1'),
  GEMINI_API_KEY: z.string().min(1).optional(),
  LLM_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  LLM_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(10000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  FEEDBACK_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  PLAN_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  CLASSIFICATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  AUTO_PLAN_ON_PROJECT_CREATE: booleanFlag,
});

export type Env = z.infer<typeof EnvSchema>;

export type LlmConfig = {
  provider: LlmProvider;
  apiKey: string;
  baseUrl: string | null;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  temperatures: {
    feedback: number;
    plan: number;
    classification: number;
  };
};

export type RetryConfig = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type AppConfig = {
  env: 'production' | 'development' | 'test';
  port: number;
  logLevel: Env['LOG_LEVEL'];
  databaseUrl: string | null;
  databaseSsl: boolean;
  llm: LlmConfig;
  retry: RetryConfig;
  workerConcurrency: number;
  autoPlanOnProjectCreate: boolean;
};

const buildConnectionStringFromCredentials = (cred: VcapServiceCredential) => {
  const user = cred.username || cred.user;
  const host = cred.hostname || cred.host;
  const database = cred.database || cred.dbname;
  if (!user || !cred.password || !host || !database) {
    return null;
  }
  const portPart = cred.port ? `:${cred.port}` : '';
  return `postgres://${encodeURIComponent(user)}:${encodeURIComponent(cred.password)}@${host}${portPart}/${database}`;
};

export const resolveDatabaseUrl = (env: Pick<Env, 'DATABASE_URL' | 'VCAP_SERVICES'>): string | null => {
  if (env.DATABASE_URL) return env.DATABASE_URL;
  if (!env.VCAP_SERVICES) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(env.VCAP_SERVICES);
  } catch (error) {
    throw new Error(`Invalid environment configuration: VCAP_SERVICES is not valid JSON (${String(error)})`);
  }
  const services = VcapServicesSchema.safeParse(raw);
  if (!services.success) {
    throw new Error(`Invalid environment configuration: VCAP_SERVICES has an unexpected shape (${services.error.message})`);
  }
  const parsed = services.data;

  for (const service of Object.values(parsed).flat()) {
    const cred = service.credentials;
    if (!cred) continue;
    if (cred.uri) return cred.uri;
    if (cred.url) return cred.url;
    if (cred.jdbcUrl) return cred.jdbcUrl.replace(/^jdbc:/, '');
    const constructed = buildConnectionStringFromCredentials(cred);
    if (constructed) return constructed;
  }
  return null;
};

const resolveApiKey = (env: Env): string | undefined => {
  switch (env.LLM_PROVIDER) {
    case 'openai':
      return env.OPENAI_API_KEY;
    case 'anthropic':
      return env.ANTHROPIC_API_KEY;
    case 'gemini':
      return env.GEMINI_API_KEY;
  }
};

const resolveBaseUrl = (env: Env): string | null => {
  switch (env.LLM_PROVIDER) {
    case 'openai':
      return env.OPENAI_BASE_URL;
    case 'anthropic':
      return env.ANTHROPIC_BASE_URL;
    case 'gemini':
      return null;
  }
};

const resolveRuntimeEnv = (value: string | undefined): AppConfig['env'] => {
  if (value === 'production' || value === 'test') return value;
  return 'development';
};

/**
 * Parses the process environment into the configuration object that every
 * component factory receives. Called once at start-up.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
  }
  const env = parsed.data;

  const apiKey = resolveApiKey(env);
  if (!apiKey) {
    throw new Error(`Invalid environment configuration: missing API key for LLM provider "${env.LLM_PROVIDER}"`);
  }
  if (env.LLM_RETRY_MAX_DELAY_MS < env.LLM_RETRY_BASE_DELAY_MS) {
    throw new Error('Invalid environment configuration: LLM_RETRY_MAX_DELAY_MS is below LLM_RETRY_BASE_DELAY_MS');
  }

  return {
    env: resolveRuntimeEnv(env.NODE_ENV),
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    databaseUrl: resolveDatabaseUrl(env),
    databaseSsl: !!env.VCAP_SERVICES && env.PGSSLMODE !== 'disable' && env.PGSSLMODE !== 'allow',
    llm: {
      provider: env.LLM_PROVIDER,
      apiKey,
      baseUrl: resolveBaseUrl(env),
      model: env.LLM_MODEL ?? DEFAULT_MODELS[env.LLM_PROVIDER],
      maxTokens: env.LLM_MAX_TOKENS,
      timeoutMs: env.LLM_TIMEOUT_MS,
      temperatures: {
        feedback: env.FEEDBACK_TEMPERATURE,
        plan: env.PLAN_TEMPERATURE,
        classification: env.CLASSIFICATION_TEMPERATURE,
      },
    },
    retry: {
      maxAttempts: env.LLM_MAX_RETRIES,
      baseDelayMs: env.LLM_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.LLM_RETRY_MAX_DELAY_MS,
    },
    workerConcurrency: env.WORKER_CONCURRENCY,
    autoPlanOnProjectCreate: env.AUTO_PLAN_ON_PROJECT_CREATE ?? true,
  };
}
