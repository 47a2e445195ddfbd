import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().default('0.0.0.0'),

  // Database
  DATABASE_URL: z.string().min(1),

  // Mail search/download microservice
  MAIL_API_BASE_URL: z.string().url(),
  MAIL_API_KEY: z.string().min(1),
  MAIL_SEARCH_TOP: z.coerce.number().int().positive().default(10),
  MAIL_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MAIL_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  // LLM extraction; without a key only the pattern extractor runs
  GROQ_API_KEY: z.string().optional().default(''),
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),

  // Processing
  MAX_INVOICES_PER_ATTACHMENT: z.coerce.number().int().positive().default(2),
  SCORING_POLICY_PATH: z.string().optional(),
  PROCESSING_SOURCE: z.string().default('api'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Application
  APP_VERSION: z.string().default('1.0.0'),
  SERVICE_NAME: z.string().default('invoice-intake'),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  server: { host: string; port: number };
  databaseUrl: string;
  mail: {
    baseUrl: string;
    apiKey: string;
    searchTop: number;
    searchTimeoutMs: number;
    downloadTimeoutMs: number;
  };
  llm: {
    apiKey: string | null;
    model: string;
    temperature: number;
    maxTokens: number;
  };
  processing: {
    maxInvoicesPerAttachment: number;
    scoringPolicyPath: string | undefined;
    source: string;
  };
  logging: { level: Env['LOG_LEVEL']; serviceName: string; version: string };
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

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment variables: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function toAppConfig(env: Env): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    server: { host: env.HOST, port: env.PORT },
    databaseUrl: env.DATABASE_URL,
    mail: {
      baseUrl: env.MAIL_API_BASE_URL.replace(/\/+$/, ''),
      apiKey: env.MAIL_API_KEY,
      searchTop: env.MAIL_SEARCH_TOP,
      searchTimeoutMs: env.MAIL_SEARCH_TIMEOUT_MS,
      downloadTimeoutMs: env.MAIL_DOWNLOAD_TIMEOUT_MS,
    },
    llm: {
      apiKey: env.GROQ_API_KEY.trim() === '' ? null : env.GROQ_API_KEY,
      model: env.GROQ_MODEL,
      temperature: env.LLM_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
    },
    processing: {
      maxInvoicesPerAttachment: env.MAX_INVOICES_PER_ATTACHMENT,
      scoringPolicyPath: env.SCORING_POLICY_PATH,
      source: env.PROCESSING_SOURCE,
    },
    logging: { level: env.LOG_LEVEL, serviceName: env.SERVICE_NAME, version: env.APP_VERSION },
  };
}

/**
 * Builds the application configuration. Reads `.env` first when loading from
 * the real process environment; an explicit source is used as given.
 */
export function loadConfig(source?: NodeJS.ProcessEnv): AppConfig {
  if (source === undefined) {
    dotenvConfig();
    return toAppConfig(parseEnv(process.env));
  }
  return toAppConfig(parseEnv(source));
}
