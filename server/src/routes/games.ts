import { Router } from 'express';
import { z } from 'zod';
import { currentUser, requireInitData } from '../middleware/auth';
import type { Services } from '../services';
import { toGameView } from '../types/game';
import { sendError } from './respond';

const gameIdSchema = z.string().min(1).max(64);

const gameRefSchema = z.object({ game_id: gameIdSchema });

const moveSchema = z.object({
  game_id: gameIdSchema,
  row: z.number().int(),
  col: z.number().int(),
});

export default function gamesRouter({ gameService, auth }: Services) {
  const router = Router();
  const requireAuth = requireInitData(auth);

  router.post('/create_game', requireAuth, async (req, res) => {
    try {
      const game = await gameService.createGame(currentUser(req));
      res.json({ game: toGameView(game) });
    } catch (err) {
      sendError(res, err, 'create_game');
    }
  });

  router.post('/join_game', requireAuth, async (req, res) => {
    try {
      const body = gameRefSchema.parse(req.body);
      const game = await gameService.joinGame(currentUser(req), body.game_id);
      res.json({ game: toGameView(game) });
    } catch (err) {
      sendError(res, err, 'join_game');
    }
  });

  router.post('/start_game', requireAuth, async (req, res) => {
    try {
      const body = gameRefSchema.parse(req.body);
      const game = await gameService.startGame(currentUser(req), body.game_id);
      res.json({ game: toGameView(game) });
    } catch (err) {
      sendError(res, err, 'start_game');
    }
  });

  router.post('/make_move', requireAuth, async (req, res) => {
    try {
      const body = moveSchema.parse(req.body);
      const game = await gameService.makeMove(currentUser(req), { gameId: body.game_id, row: body.row, col: body.col });
      res.json({ game: toGameView(game) });
    } catch (err) {
      sendError(res, err, 'make_move');
    }
  });

  router.get('/game/:gameId', async (req, res) => {
    try {
      const game = await gameService.getGame(gameIdSchema.parse(req.params.gameId));
      res.json({ game: toGameView(game) });
    } catch (err) {
      sendError(res, err, 'game');
    }
  });

  return router;
}
