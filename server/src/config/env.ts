import dotenv from 'dotenv';

dotenv.config();

export type StoreDriver = 'postgres' | 'memory';

function storeDriver(): StoreDriver {
  const explicit = process.env.STORE_DRIVER;
  if (explicit === 'postgres' || explicit === 'memory') return explicit;
  return process.env.DATABASE_URL ? 'postgres' : 'memory';
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: parseInt(process.env.PORT || '4000', 10),
  corsOrigin: process.env.CORS_ORIGIN || '*',
  storeDriver: storeDriver(),
  databaseUrl: process.env.DATABASE_URL || '',
  // Many managed Postgres providers (e.g., Neon) require SSL
  databaseSsl: process.env.DATABASE_SSL !== 'false',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  botToken: process.env.BOT_TOKEN || '',
  webAppUrl: (process.env.WEBAPP_URL || 'http://localhost:4000').replace(/\/+$/, ''),
  initDataMaxAgeSeconds: parseInt(process.env.INIT_DATA_MAX_AGE_SECONDS || '86400', 10),
} as const;
