import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { Server } from 'http';
import type Redis from 'ioredis';

import { AppConfig, StoreMode, loadConfig } from './config/settings';
import { createRedisClient, initRedis, closeRedis } from './config/redis';
import { KeyValueStore } from './types/store';
import { RedisStore } from './utils/redisStore';
import { MemoryStore } from './utils/memoryStore';
import { SecurityLogger, errorMessage } from './utils/securityLogger';
import { LinkTokenGuard } from './security';
import { createLinkTokenRouter, linkTokenLocals, suspicionCheck } from './middleware/linkToken';

/**
 * Stand-in for "no store configured": never available, so the
 * link token falls back and the suspicion check stays disabled.
 */
const disabledStore: KeyValueStore = {
  isAvailable: () => false,
  get: async () => null,
  set: async () => undefined,
  setIfAbsent: async () => false,
  ttl: async () => -2,
};

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderPage(linkTokenUrl: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    '<title>Search</title>',
    `<link rel="stylesheet" href="${escapeHtml(linkTokenUrl)}" type="text/css">`,
    '</head>',
    '<body></body>',
    '</html>',
  ].join('\n');
}

export function createApp(guard: LinkTokenGuard, storeMode: StoreMode): Express {
  const app = express();

  app.use(helmet());

  // =====================================================
  // ROUTES
  // =====================================================

  app.use(createLinkTokenRouter(guard));

  app.get('/healthz', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      store: storeMode,
      storeAvailable: guard.isAvailable(),
    });
  });

  // Pages rate the client (renewing its ping) and embed the stylesheet link
  app.get('/', suspicionCheck(guard, { renew: true }), linkTokenLocals(guard), (req: Request, res: Response) => {
    res.type('html').send(renderPage(res.locals.linkTokenUrl ?? ''));
  });

  // =====================================================
  // ERROR HANDLER
  // =====================================================
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    SecurityLogger.error('Unhandled request error', {
      path: req.path,
      method: req.method,
      error: errorMessage(err),
    });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function createStore(config: AppConfig): { store: KeyValueStore; redis?: Redis } {
  switch (config.store) {
    case 'redis': {
      const redis = createRedisClient(config);
      return { store: new RedisStore(redis), redis };
    }
    case 'memory':
      SecurityLogger.warn('Using in-memory link token store, pings are not shared between instances');
      return { store: new MemoryStore() };
    case 'disabled':
      SecurityLogger.warn('No link token store configured, link token check disabled');
      return { store: disabledStore };
  }
}

/**
 * Sets the log threshold, then reports config warnings under it
 */
export function applyLogging(config: AppConfig): void {
  SecurityLogger.setLevel(config.logLevel);

  if (config.secretGenerated) {
    // Ping keys will not match across processes or restarts
    SecurityLogger.warn('LINK_TOKEN_SECRET not set, using a random per-process secret');
  }
}

export async function start(config: AppConfig = loadConfig()): Promise<Server> {
  applyLogging(config);

  const { store, redis } = createStore(config);
  if (redis) {
    await initRedis(redis);
  }

  const guard = new LinkTokenGuard(store, { secret: config.secret, realIp: config.realIp });
  const app = createApp(guard, config.store);

  const server = app.listen(config.port, () => {
    SecurityLogger.info('Server listening', { port: config.port, store: config.store });
  });

  const shutdown = () => {
    server.close();
    const closing = redis ? closeRedis(redis) : Promise.resolve();
    closing
      .catch((error: unknown) => {
        SecurityLogger.error('Error while closing Redis', { error: errorMessage(error) });
      })
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return server;
}
