import http from 'http';
import { env } from './config/env';
import { createApp } from './app';
import { closePool, getPool } from './lib/db';
import { MemoryTableStore } from './lib/memoryTableStore';
import { PgTableStore } from './lib/pgTableStore';
import { closeRedis } from './lib/redis';
import { ensureSchema } from './lib/schema';
import type { TableStore } from './lib/tableStore';
import { TelegramBotApi } from './lib/telegram';
import { createServices } from './services';
import { RedisLeaderboard } from './services/leaderboardService';
import { createSocketServer } from './socket/index';

async function createStore(): Promise<TableStore> {
  if (env.storeDriver === 'memory') {
    console.warn('[server] no DATABASE_URL, games are kept in memory');
    return new MemoryTableStore();
  }
  await ensureSchema();
  return new PgTableStore(getPool());
}

async function start() {
  if (!env.botToken) {
    console.warn('[server] BOT_TOKEN is not set, every initData will be rejected');
  }
  const store = await createStore();
  const services = createServices({
    store,
    leaderboard: new RedisLeaderboard(),
    bot: new TelegramBotApi(env.botToken),
    botToken: env.botToken,
    webAppUrl: env.webAppUrl,
    initDataMaxAgeSeconds: env.initDataMaxAgeSeconds,
  });

  const server = http.createServer(createApp(services));
  const io = createSocketServer(server, services);

  server.listen(env.port, () => {
    console.log(`[server] listening on http://localhost:${env.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    io.close();
    Promise.all([closePool(), closeRedis()])
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[server] shutdown failed', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

start().catch((err: unknown) => {
  console.error('[server] failed to start', err);
  process.exit(1);
});
