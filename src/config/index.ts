import { LogLevel, parseLogLevel } from '../utils/logger';

/**
 * Configuration management
 * All behavior is driven by environment variables
 */

export interface Config {
  port: number;

  // Database
  database: {
    url: string;
    ssl: boolean;
  };

  // Adzuna job search API
  adzuna: {
    appId: string;
    apiKey: string;
    baseUrl: string;
  };

  // Directory holding salary-model.json and job-classifier.json
  modelsDir: string;

  logLevel: LogLevel;
}

export const DEFAULT_ADZUNA_BASE_URL = 'https://api.adzuna.com/v1/api/jobs';

export function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

// Managed/serverless databases require SSL, so production never turns it off
function isProduction(env: NodeJS.ProcessEnv): boolean {
  return env.NODE_ENV === 'production' || !!env.AWS_LAMBDA_FUNCTION_NAME;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('Missing required environment variable: DATABASE_URL');
  }

  return {
    port: parseNumber(env.PORT, 8000),
    database: {
      url: databaseUrl,
      ssl: isProduction(env) || parseBoolean(env.DATABASE_SSL, true),
    },
    adzuna: {
      appId: env.ADZUNA_APP_ID || '',
      apiKey: env.ADZUNA_API_KEY || '',
      baseUrl: env.ADZUNA_BASE_URL || DEFAULT_ADZUNA_BASE_URL,
    },
    modelsDir: env.MODELS_DIR || 'models',
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
