import dotenv from 'dotenv';
import { InvalidConfigError, MissingConfigError } from '../utils/errors';

dotenv.config();

export interface RetryConfig {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;

  // Secrets supplied by the deployment
  telegramToken: string;
  spreadsheetId: string;
  credentialsPath: string;

  sheets: {
    vocabulary: string;
    progress: string;
  };

  quiz: {
    roundSize: number;
    inactivityWindowMs: number;
  };

  storeRetry: RetryConfig;

  // Background jobs
  reconcileIntervalMinutes: number;
  vocabularyRefreshMinutes: number;
}

// Read before loadConfig() so the logger is usable while config is still being validated
export const nodeEnv = process.env.NODE_ENV || 'development';
export const logLevel = process.env.LOG_LEVEL || 'info';

function intFrom(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

// Jobs are scheduled as `*/n` in the minute field, which only repeats evenly when n divides 60
function cronMinutesFrom(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const minutes = Math.max(1, intFrom(env, name, fallback));
  if (60 % minutes !== 0) {
    throw new InvalidConfigError(name, `${minutes} does not divide 60`);
  }
  return minutes;
}

/**
 * Resolve the service configuration once at startup.
 * Throws MissingConfigError when a required secret is absent and
 * InvalidConfigError for a job interval cron cannot express.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const required = ['TELEGRAM_BOT_TOKEN', 'SPREADSHEET_ID'];
  const missing = required.filter(name => !env[name] || env[name]?.trim() === '');

  if (missing.length > 0) {
    throw new MissingConfigError(missing);
  }

  return {
    nodeEnv: env.NODE_ENV || 'development',
    port: intFrom(env, 'PORT', 8080),
    logLevel: env.LOG_LEVEL || 'info',

    telegramToken: (env.TELEGRAM_BOT_TOKEN ?? '').trim(),
    spreadsheetId: (env.SPREADSHEET_ID ?? '').trim(),
    credentialsPath: env.GOOGLE_APPLICATION_CREDENTIALS || 'credentials.json',

    sheets: {
      vocabulary: env.VOCABULARY_SHEET || 'Words',
      progress: env.PROGRESS_SHEET || 'Progress'
    },

    quiz: {
      roundSize: Math.max(1, intFrom(env, 'ROUND_SIZE', 10)),
      inactivityWindowMs: intFrom(env, 'INACTIVITY_MINUTES', 15) * 60 * 1000
    },

    storeRetry: {
      attempts: Math.max(1, intFrom(env, 'STORE_RETRY_ATTEMPTS', 3)),
      baseDelayMs: intFrom(env, 'STORE_RETRY_DELAY_MS', 500),
      maxDelayMs: intFrom(env, 'STORE_RETRY_MAX_DELAY_MS', 5000)
    },

    reconcileIntervalMinutes: cronMinutesFrom(env, 'RECONCILE_INTERVAL_MINUTES', 5),
    vocabularyRefreshMinutes: cronMinutesFrom(env, 'VOCABULARY_REFRESH_MINUTES', 30)
  };
}
