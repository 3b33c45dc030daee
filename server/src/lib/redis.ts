import Redis from 'ioredis';
import { env } from '../config/env';
import { errorMessage } from './errors';

let client: Redis | null = null;
let warned = false;

function createClient(): Redis {
  const r = new Redis(env.redisUrl, {
    lazyConnect: true,
    maxRetriesPerRequest: 0,
    enableOfflineQueue: false,
    retryStrategy: () => null,
    reconnectOnError: () => false,
  });
  // Logged once; callers fall back on every failed command.
  r.on('error', (err: unknown) => {
    if (warned) return;
    warned = true;
    console.warn('[redis] connection error, leaderboard served from memory:', errorMessage(err));
  });
  r.on('ready', () => {
    warned = false;
  });
  return r;
}

/** Shared leaderboard client, connected on first use. */
export async function leaderboardRedis(): Promise<Redis> {
  if (!client) client = createClient();
  if (client.status === 'wait' || client.status === 'end') {
    await client.connect();
  }
  return client;
}

export async function closeRedis(): Promise<void> {
  if (!client) return;
  const r = client;
  client = null;
  if (r.status === 'ready') {
    await r.quit();
  } else {
    r.disconnect();
  }
}
