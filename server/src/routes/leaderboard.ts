import { Router } from 'express';
import type { Services } from '../services';
import { clampLimit } from '../services/leaderboardService';

export default function leaderboardRouter({ leaderboard }: Services) {
  const router = Router();

  router.get('/leaderboard', async (req, res) => {
    try {
      const top = await leaderboard.top(clampLimit(Number(req.query.limit ?? 10)));
      res.json({ top });
    } catch (err) {
      console.error('[leaderboard] error', err);
      res.status(500).json({ error: 'leaderboard_error' });
    }
  });

  return router;
}
