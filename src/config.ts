/**
 * Environment configuration loader for the agent team server.
 *
 * Centralizes all environment variable access with sensible defaults
 * for local development. The logger lives here too so every module
 * shares one pino instance.
 */
import dotenv from 'dotenv';
import pino from 'pino';
import { parseModelProvider, type ModelProvider } from './types/hierarchy';

dotenv.config();

export interface Config {
  port: number;
  nodeEnv: string;
  corsOrigins: string[];

  /** Agent team database (hierarchies and session transcripts) */
  db: {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
  };

  /** Provider credentials, read by the model factories */
  providers: {
    openai: { apiKey: string | undefined };
    anthropic: { apiKey: string | undefined };
    gemini: { apiKey: string | undefined };
    groq: { apiKey: string | undefined; baseUrl: string };
  };

  /** Fallbacks applied by the normalizer and the assembler */
  defaults: {
    modelProvider: string;
    modelId: string;
    delegatorModelId: string;
  };

  team: {
    maxIter: number;
    chatTimeoutMs: number;
    cacheTtlMs: number;
  };
}

function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseList(value: string | undefined, defaultValue: string[]): string[] {
  if (!value) return defaultValue;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function loadConfig(): Config {
  return {
    port: parseInt(process.env.PORT, 8000),
    nodeEnv: process.env.NODE_ENV || 'development',
    corsOrigins: parseList(process.env.CORS_ORIGINS, ['*']),

    db: {
      host: process.env.DB_HOST || 'localhost',
      port: parseInt(process.env.DB_PORT, 5432),
      username: process.env.DB_USERNAME || 'agents',
      password: process.env.DB_PASSWORD || 'agents',
      database: process.env.DB_DATABASE || 'agent_teams',
    },

    providers: {
      openai: { apiKey: process.env.OPENAI_API_KEY },
      anthropic: { apiKey: process.env.ANTHROPIC_API_KEY },
      gemini: { apiKey: process.env.GEMINI_API_KEY },
      groq: {
        apiKey: process.env.GROQ_API_KEY,
        baseUrl: process.env.GROQ_BASE_URL || 'https://api.groq.com/openai/v1/',
      },
    },

    defaults: {
      modelProvider: process.env.DEFAULT_MODEL_PROVIDER || 'gemini',
      modelId: process.env.DEFAULT_MODEL_ID || 'gemini-1.5-flash',
      delegatorModelId: process.env.DELEGATOR_MODEL_ID || 'gemini-1.5-flash',
    },

    team: {
      maxIter: parseInt(process.env.TEAM_MAX_ITER, 6),
      chatTimeoutMs: parseInt(process.env.CHAT_TIMEOUT_MS, 120_000),
      cacheTtlMs: parseInt(process.env.TEAM_CACHE_TTL_MS, 0),
    },
  };
}

/**
 * The loaded configuration object.
 * Frozen to prevent accidental modification.
 */
export const config: Config = Object.freeze(loadConfig());

const PROVIDER_KEY_VARS: Record<ModelProvider, string> = {
  openai: 'OPENAI_API_KEY',
  claude: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
  groq: 'GROQ_API_KEY',
};

export function providerApiKey(providers: Config['providers'], provider: ModelProvider): string | undefined {
  switch (provider) {
    case 'openai':
      return providers.openai.apiKey;
    case 'claude':
      return providers.anthropic.apiKey;
    case 'gemini':
      return providers.gemini.apiKey;
    case 'groq':
      return providers.groq.apiKey;
  }
}

/**
 * Validate that required configuration is present.
 * Call this at startup to fail fast if misconfigured.
 *
 * The default provider backs the delegator and every agent whose provider
 * has no key, so its key is mandatory.
 */
export function validateConfig(target: Pick<Config, 'providers' | 'defaults' | 'team'> = config): void {
  const errors: string[] = [];

  const provider = parseModelProvider(target.defaults.modelProvider);
  if (!provider) {
    errors.push(`DEFAULT_MODEL_PROVIDER '${target.defaults.modelProvider}' is not one of openai, claude, gemini, groq`);
  } else if (!providerApiKey(target.providers, provider)) {
    errors.push(`${PROVIDER_KEY_VARS[provider]} is required for the default model provider '${provider}'`);
  }

  if (target.team.maxIter < 1) {
    errors.push('TEAM_MAX_ITER must be at least 1');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n  - ${errors.join('\n  - ')}`);
  }
}

const prettyLogs = config.nodeEnv === 'development' && parseBool(process.env.LOG_PRETTY, true);

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: prettyLogs
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss',
        },
      }
    : undefined,
});
