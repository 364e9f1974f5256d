export interface SpotifyConfig {
  clientId?: string;
  clientSecret?: string;
  market?: string;
  searchLimit: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface TelegramConfig {
  botToken?: string;
  channelId?: string;
  webhookSecret?: string;
}

export interface MatchingConfig {
  confidenceThreshold: number;
  maxCandidates: number;
  replyOnNoMatch: boolean;
  notFoundMessage: string;
}

export interface ServerConfig {
  port: number;
  webhookTimeoutMs: number;
}

export interface RateLimitConfig {
  minTime: number;
  maxConcurrent: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  format: 'text' | 'json';
}

export interface AppConfig {
  spotify: SpotifyConfig;
  telegram: TelegramConfig;
  matching: MatchingConfig;
  server: ServerConfig;
  rateLimit: {
    spotify: RateLimitConfig;
  };
  logging: LoggingConfig;
}
