import dotenv from 'dotenv';
import { AppConfigSchema, type ValidatedAppConfig } from './schema.js';
import { ConfigurationError } from '../types/errors.js';

export const IGNORE_DOTENV_ENV_VAR = 'TRACK_RELAY_IGNORE_DOTENV';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function isTruthy(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

if (!isTruthy(process.env[IGNORE_DOTENV_ENV_VAR])) {
  dotenv.config();
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ValidatedAppConfig {
  const rawConfig = {
    spotify: {
      clientId: env.SPOTIFY_CLIENT_ID,
      clientSecret: env.SPOTIFY_CLIENT_SECRET,
      market: env.SPOTIFY_MARKET || undefined,
      searchLimit: parseInt(env.SPOTIFY_SEARCH_LIMIT || '10', 10),
      maxRetries: parseInt(env.SPOTIFY_MAX_RETRIES || '3', 10),
      retryDelayMs: parseInt(env.SPOTIFY_RETRY_DELAY_MS || '1000', 10),
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      channelId: env.TELEGRAM_CHANNEL_ID,
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
    },
    matching: {
      confidenceThreshold: parseFloat(env.MATCH_CONFIDENCE_THRESHOLD || '0.6'),
      maxCandidates: parseInt(env.MAX_CANDIDATES_PER_MESSAGE || '3', 10),
      replyOnNoMatch: isTruthy(env.REPLY_ON_NO_MATCH),
      notFoundMessage: env.NOT_FOUND_MESSAGE || 'No matching track found.',
    },
    server: {
      port: parseInt(env.PORT || '8000', 10),
      webhookTimeoutMs: parseInt(env.WEBHOOK_TIMEOUT_MS || '10000', 10),
    },
    rateLimit: {
      spotify: {
        minTime: parseInt(env.SPOTIFY_RATE_LIMIT_MIN_TIME || '250', 10),
        maxConcurrent: parseInt(env.SPOTIFY_RATE_LIMIT_MAX_CONCURRENT || '3', 10),
      },
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      format: env.LOG_FORMAT || 'text',
    },
  };

  const parsed = AppConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  return parsed.data;
}

export const config = loadConfig();

/**
 * Credentials the relay can start without, but which disable part of it.
 */
export function validateEnvironment(appConfig: ValidatedAppConfig = config): string[] {
  const missing: string[] = [];

  if (!appConfig.telegram.botToken) missing.push('TELEGRAM_BOT_TOKEN');
  if (!appConfig.spotify.clientId) missing.push('SPOTIFY_CLIENT_ID');
  if (!appConfig.spotify.clientSecret) missing.push('SPOTIFY_CLIENT_SECRET');

  return missing;
}

export function configSummary(appConfig: ValidatedAppConfig = config): Record<string, unknown> {
  return {
    port: appConfig.server.port,
    logLevel: appConfig.logging.level,
    logFormat: appConfig.logging.format,
    confidenceThreshold: appConfig.matching.confidenceThreshold,
    maxCandidates: appConfig.matching.maxCandidates,
    replyOnNoMatch: appConfig.matching.replyOnNoMatch,
    webhookSecret: appConfig.telegram.webhookSecret ? 'SET' : 'NOT SET',
    spotifyMarket: appConfig.spotify.market ?? 'any',
  };
}
