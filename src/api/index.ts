import { Hono } from 'hono';
import { webhookRoutes, type WebhookOptions } from './webhook.js';
import type { RelayService } from '../services/RelayService.js';

export function createApp(relay: RelayService, options: WebhookOptions): Hono {
  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok' }));
  app.route('/webhook', webhookRoutes(relay, options));

  return app;
}
