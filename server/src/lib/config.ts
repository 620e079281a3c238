import { z } from 'zod';
import { ConfigError } from './errors.js';

// Unset and empty-string variables both fall back to the schema default.
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const optionalSecret = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());

const envSchema = z.object({
  NODE_ENV: z.preprocess(blankToUndefined, z.string().default('development')),
  PORT: positiveInt(3001),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  ),
  ALLOWED_ORIGINS: z.preprocess(blankToUndefined, z.string().optional()),
  TRUST_PROXY: z.preprocess(blankToUndefined, z.enum(['true', 'false']).default('false')),
  SUBMIT_RATE_LIMIT_PER_MINUTE: positiveInt(10),
  METRICS_KEY: optionalSecret,

  TOOL_TIMEOUT_MS: positiveInt(15_000),
  TOOL_MAX_ATTEMPTS: positiveInt(3),
  TOOL_RETRY_BASE_DELAY_MS: positiveInt(500),
  RESEARCH_WAIT_TIMEOUT_MS: positiveInt(60_000),
  UPSTREAM_WAIT_TIMEOUT_MS: positiveInt(150_000),
  MAX_PARALLELISM: positiveInt(3),
  MAX_RUN_DURATION_MS: positiveInt(300_000),
  FINALIZE_RESERVE_MS: positiveInt(5_000),
  RUN_RETENTION_MS: positiveInt(30 * 60 * 1000),
  MAX_RESULTS_PER_QUERY: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(20).default(5)),

  TAVILY_API_KEY: optionalSecret,
  PERPLEXITY_API_KEY: optionalSecret,
  KAGGLE_USERNAME: optionalSecret,
  KAGGLE_KEY: optionalSecret,
  GITHUB_TOKEN: optionalSecret,
  HF_TOKEN: optionalSecret,
});

export interface PipelineSettings {
  /** Per tool call, enforced by the gateway */
  tool_timeout_ms: number;
  /** Attempts per tool call, including the first */
  tool_max_attempts: number;
  tool_retry_base_delay_ms: number;
  /** How long ResourceAsset waits for the research profile */
  research_wait_timeout_ms: number;
  /** How long FinalProposal waits for each upstream artifact */
  upstream_wait_timeout_ms: number;
  max_parallelism: number;
  max_run_duration_ms: number;
  /** Time kept free at the end of a run for FinalProposal */
  finalize_reserve_ms: number;
  run_retention_ms: number;
  max_results_per_query: number;
}

export interface ProviderCredentials {
  tavily_api_key?: string;
  perplexity_api_key?: string;
  kaggle_username?: string;
  kaggle_key?: string;
  github_token?: string;
  hf_token?: string;
}

export interface HttpSettings {
  /** Key rate limits on X-Forwarded-For instead of a shared anonymous bucket */
  trust_proxy: boolean;
  submit_rate_limit_per_minute: number;
  /** When set, /metrics requires `Authorization: Bearer <key>` */
  metrics_key?: string;
}

export interface AppConfig {
  env: string;
  port: number;
  log_level?: string;
  allowed_origins: string[] | null;
  http: HttpSettings;
  pipeline: PipelineSettings;
  credentials: ProviderCredentials;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  tool_timeout_ms: 15_000,
  tool_max_attempts: 3,
  tool_retry_base_delay_ms: 500,
  research_wait_timeout_ms: 60_000,
  upstream_wait_timeout_ms: 150_000,
  max_parallelism: 3,
  max_run_duration_ms: 300_000,
  finalize_reserve_ms: 5_000,
  run_retention_ms: 30 * 60 * 1000,
  max_results_per_query: 5,
};

/**
 * Parse and validate configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;

  if (e.FINALIZE_RESERVE_MS >= e.MAX_RUN_DURATION_MS) {
    throw new ConfigError('FINALIZE_RESERVE_MS must be smaller than MAX_RUN_DURATION_MS', [
      'FINALIZE_RESERVE_MS: must be smaller than MAX_RUN_DURATION_MS',
    ]);
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    log_level: e.LOG_LEVEL,
    allowed_origins: e.ALLOWED_ORIGINS
      ? e.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
      : null,
    http: {
      trust_proxy: e.TRUST_PROXY === 'true',
      submit_rate_limit_per_minute: e.SUBMIT_RATE_LIMIT_PER_MINUTE,
      metrics_key: e.METRICS_KEY,
    },
    pipeline: {
      tool_timeout_ms: e.TOOL_TIMEOUT_MS,
      tool_max_attempts: e.TOOL_MAX_ATTEMPTS,
      tool_retry_base_delay_ms: e.TOOL_RETRY_BASE_DELAY_MS,
      research_wait_timeout_ms: e.RESEARCH_WAIT_TIMEOUT_MS,
      upstream_wait_timeout_ms: e.UPSTREAM_WAIT_TIMEOUT_MS,
      max_parallelism: e.MAX_PARALLELISM,
      max_run_duration_ms: e.MAX_RUN_DURATION_MS,
      finalize_reserve_ms: e.FINALIZE_RESERVE_MS,
      run_retention_ms: e.RUN_RETENTION_MS,
      max_results_per_query: e.MAX_RESULTS_PER_QUERY,
    },
    credentials: {
      tavily_api_key: e.TAVILY_API_KEY,
      perplexity_api_key: e.PERPLEXITY_API_KEY,
      kaggle_username: e.KAGGLE_USERNAME,
      kaggle_key: e.KAGGLE_KEY,
      github_token: e.GITHUB_TOKEN,
      hf_token: e.HF_TOKEN,
    },
  };
}
