import { Router } from 'express';
import { z } from 'zod';
import type { Services } from '../services';
import { sendError } from './respond';

const userIdSchema = z.coerce.number().int().positive();

export default function statsRouter({ ledger }: Services) {
  const router = Router();

  router.get('/stats/:userId', async (req, res) => {
    try {
      const record = await ledger.getStats(userIdSchema.parse(req.params.userId));
      res.json({
        stats: {
          user_id: record.userId,
          username: record.username,
          wins: record.wins,
          losses: record.losses,
          draws: record.draws,
        },
      });
    } catch (err) {
      sendError(res, err, 'stats');
    }
  });

  return router;
}
