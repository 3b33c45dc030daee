import { Router } from 'express';
import type { Services } from '../services';

export default function webhookRouter({ notifier }: Services) {
  const router = Router();

  router.post('/webhook', async (req, res) => {
    try {
      const reply = await notifier.handleUpdate(req.body);
      if (reply !== 'ignored') console.log('[webhook] /start handled:', reply);
      res.json({ ok: true });
    } catch (err) {
      console.error('[webhook] error', err);
      res.status(500).json({ error: 'webhook_error' });
    }
  });

  return router;
}
