import { z } from 'zod';

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const SpotifyConfigSchema = z.object({
  clientId: optionalSecret,
  clientSecret: optionalSecret,
  market: z
    .string()
    .regex(/^[A-Z]{2}$/, 'Spotify market must be a two-letter country code')
    .optional(),
  searchLimit: z.number().int().min(1).max(50, 'Spotify search limit cannot exceed 50'),
  maxRetries: z.number().int().min(1, 'Spotify max retries must be at least 1'),
  retryDelayMs: z.number().min(0),
});

export const TelegramConfigSchema = z.object({
  botToken: optionalSecret,
  channelId: optionalSecret,
  webhookSecret: optionalSecret,
});

export const MatchingConfigSchema = z.object({
  confidenceThreshold: z
    .number()
    .min(0, 'Confidence threshold must be between 0 and 1')
    .max(1, 'Confidence threshold must be between 0 and 1'),
  maxCandidates: z.number().int().min(1).max(10, 'At most 10 candidates per message'),
  replyOnNoMatch: z.boolean(),
  notFoundMessage: z.string().min(1, 'Not-found message cannot be empty'),
});

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  webhookTimeoutMs: z.number().min(1000, 'Webhook timeout must be at least 1000ms'),
});

export const RateLimitConfigSchema = z.object({
  minTime: z.number().min(0),
  maxConcurrent: z.number().min(1),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
  format: z.enum(['text', 'json']),
});

export const AppConfigSchema = z.object({
  spotify: SpotifyConfigSchema,
  telegram: TelegramConfigSchema,
  matching: MatchingConfigSchema,
  server: ServerConfigSchema,
  rateLimit: z.object({
    spotify: RateLimitConfigSchema,
  }),
  logging: LoggingConfigSchema,
});

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
