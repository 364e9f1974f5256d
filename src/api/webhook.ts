// Telegram webhook endpoint

import { timingSafeEqual } from 'node:crypto';
import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { TelegramUpdateSchema } from '../schemas/telegram.js';
import { RateLimitedError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { anySignal } from '../utils/abort.js';
import type { RelayService } from '../services/RelayService.js';

export const SECRET_HEADER = 'X-Telegram-Bot-Api-Secret-Token';

export interface WebhookOptions {
  webhookSecret?: string;
  timeoutMs: number;
}

function secretsMatch(expected: string, received: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

function requireSecret(secret: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (secret && !secretsMatch(secret, c.req.header(SECRET_HEADER) ?? '')) {
      Logger.warn('Rejected webhook call with a missing or wrong secret token');
      return c.json({ error: 'Unauthorized' }, 401);
    }
    await next();
  };
}

export function webhookRoutes(relay: RelayService, options: WebhookOptions): Hono {
  const app = new Hono();

  app.post('/telegram', requireSecret(options.webhookSecret), async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const parsed = TelegramUpdateSchema.safeParse(body);
    if (!parsed.success) {
      Logger.warn('Rejected malformed Telegram update', { issues: parsed.error.issues.length });
      const issues = parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      return c.json({ error: 'Invalid Telegram update', issues }, 400);
    }

    const signal = anySignal([c.req.raw.signal, AbortSignal.timeout(options.timeoutMs)]);

    try {
      const outcome = await relay.handleUpdate(parsed.data, signal);
      Logger.debug('Webhook processed', { updateId: parsed.data.update_id, outcome: outcome.status });
    } catch (error) {
      if (error instanceof RateLimitedError) {
        Logger.warn('Catalog rate limited; asking Telegram to redeliver', {
          updateId: parsed.data.update_id,
          retryAfterSeconds: error.retryAfterSeconds,
        });
        if (error.retryAfterSeconds !== undefined) {
          c.header('Retry-After', String(error.retryAfterSeconds));
        }
        return c.json({ error: 'Rate limited', retryable: true }, 429);
      }

      if (ErrorHandler.isAbort(error)) {
        Logger.warn('Webhook processing cancelled', { updateId: parsed.data.update_id });
      } else {
        Logger.error('Webhook processing failed; dropping update', {
          updateId: parsed.data.update_id,
          ...ErrorHandler.describe(error),
        });
      }
    }

    return c.body(null, 204);
  });

  return app;
}
