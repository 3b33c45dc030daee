import express from 'express';
import cors from 'cors';
import { env } from './config/env';
import healthRouter from './routes/health';
import gamesRouter from './routes/games';
import statsRouter from './routes/stats';
import leaderboardRouter from './routes/leaderboard';
import webhookRouter from './routes/webhook';
import type { Services } from './services';

export function createApp(services: Services) {
  const app = express();

  app.use(cors({ origin: env.corsOrigin }));
  app.use(express.json());
  app.use('/mini', express.static('public'));

  app.use('/', healthRouter);
  app.use('/', gamesRouter(services));
  app.use('/', statsRouter(services));
  app.use('/', leaderboardRouter(services));
  app.use('/', webhookRouter(services));

  return app;
}
