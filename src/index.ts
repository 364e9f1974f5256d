#!/usr/bin/env node

import { serve } from '@hono/node-server';
import { createApp } from './api/index.js';
import { CandidateExtractor } from './services/CandidateExtractor.js';
import { MatchResolver } from './services/MatchResolver.js';
import { RelayService } from './services/RelayService.js';
import { SpotifyService } from './services/SpotifyService.js';
import { TelegramService } from './services/TelegramService.js';
import { ErrorHandler } from './utils/errorHandler.js';
import { Logger } from './utils/logger.js';
import { config, configSummary, validateEnvironment } from './config/index.js';

async function main(): Promise<void> {
  Logger.info('🎵 Track link relay is starting up');

  const missingVars = validateEnvironment(config);
  if (missingVars.length > 0) {
    Logger.warn('Missing recommended environment variables', { missing: missingVars });
  } else {
    Logger.info('All critical environment variables are present');
  }
  Logger.info('Configuration summary', configSummary(config));

  const search =
    config.spotify.clientId && config.spotify.clientSecret
      ? new SpotifyService(config.spotify, config.rateLimit.spotify)
      : null;
  Logger.info(search ? 'Spotify client initialized' : 'Spotify client not initialized due to missing credentials');

  const replies = config.telegram.botToken ? new TelegramService(config.telegram) : null;
  Logger.info(replies ? 'Telegram client initialized' : 'Telegram client not initialized; replies are logged only');

  const relay = new RelayService({
    extractor: new CandidateExtractor(config.matching),
    resolver: new MatchResolver(config.matching),
    search,
    replies,
    matching: config.matching,
  });

  const app = createApp(relay, {
    webhookSecret: config.telegram.webhookSecret,
    timeoutMs: config.server.webhookTimeoutMs,
  });

  const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
    Logger.info(`Listening on port ${info.port}`);
  });

  ErrorHandler.setupGlobalHandlers(() => {
    server.close();
    Logger.info('Track link relay is shutting down');
  });
}

main().catch(ErrorHandler.handle);
