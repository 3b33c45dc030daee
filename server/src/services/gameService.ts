import { v4 as uuid } from 'uuid';
import { GameError, errorMessage, isGameError } from '../lib/errors';
import { KeyedMutex } from '../lib/keyedMutex';
import type { UserIdentity } from '../lib/initData';
import type { GamesRepo } from '../repositories/gamesRepo';
import type { Game, PlayerInfo } from '../types/game';
import { applyMove, emptyBoard, isOnBoard, markFor, nextTurn, outcomeOf } from './boardEngine';
import type { BroadcastDispatcher } from './broadcastService';
import type { StatsLedger } from './statsService';

export const GAME_ID_LENGTH = 8;
const MAX_ID_ATTEMPTS = 5;

export function randomGameId(): string {
  return uuid().replace(/-/g, '').slice(0, GAME_ID_LENGTH);
}

function playerOf(user: UserIdentity): PlayerInfo {
  return { id: user.id, name: user.name };
}

export interface MoveInput {
  gameId: string;
  row: number;
  col: number;
}

/**
 * Runs every game transition: create, join, start and move. Reads and writes
 * of one game happen under that game's lock, so two requests for the same
 * game never interleave their read-modify-write.
 */
export class GameService {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly games: GamesRepo,
    private readonly ledger: StatsLedger,
    private readonly dispatcher: BroadcastDispatcher,
    private readonly generateId: () => string = randomGameId,
  ) {}

  async createGame(user: UserIdentity): Promise<Game> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.generateId();
      if (await this.games.fetch(id)) continue;
      const game: Game = {
        id,
        creator: playerOf(user),
        opponent: null,
        board: emptyBoard(),
        currentTurn: user.id,
        winner: null,
        gameStarted: false,
        createdAt: new Date().toISOString(),
      };
      try {
        await this.games.create(game);
      } catch (err) {
        if (isGameError(err, 'conflict')) continue;
        throw err;
      }
      console.log(`[game] ${id} created by ${user.id}`);
      return game;
    }
    throw new GameError('conflict', `no free game id after ${MAX_ID_ATTEMPTS} attempts`);
  }

  async getGame(gameId: string): Promise<Game> {
    const game = await this.games.fetch(gameId);
    if (!game) throw new GameError('not_found', `game ${gameId} not found`);
    return game;
  }

  async joinGame(user: UserIdentity, gameId: string): Promise<Game> {
    const { game, changed } = await this.locks.runExclusive(gameId, async () => {
      const game = await this.getGame(gameId);
      if (game.creator.id === user.id || game.opponent?.id === user.id) {
        return { game, changed: false };
      }
      if (game.opponent) throw new GameError('illegal_state', 'game is full');
      if (game.winner !== null) throw new GameError('game_over', 'game is over');
      const opponent = playerOf(user);
      await this.games.mutate(gameId, { opponent });
      return { game: { ...game, opponent }, changed: true };
    });
    if (changed) {
      console.log(`[game] ${gameId} joined by ${user.id}`);
      await this.broadcast(gameId);
    }
    return game;
  }

  /** The invited opponent confirms; the creator moves first. */
  async startGame(user: UserIdentity, gameId: string): Promise<Game> {
    const { game, changed } = await this.locks.runExclusive(gameId, async () => {
      const game = await this.getGame(gameId);
      if (!game.opponent) throw new GameError('illegal_state', 'waiting for an opponent');
      if (game.opponent.id !== user.id) throw new GameError('forbidden', 'only the opponent can start the game');
      if (game.gameStarted) return { game, changed: false };
      const currentTurn = game.creator.id;
      await this.games.mutate(gameId, { gameStarted: true, currentTurn });
      return { game: { ...game, gameStarted: true, currentTurn }, changed: true };
    });
    if (changed) {
      console.log(`[game] ${gameId} started`);
      await this.broadcast(gameId);
    }
    return game;
  }

  /** Rejections leave the stored game untouched and broadcast nothing. */
  async makeMove(user: UserIdentity, input: MoveInput): Promise<Game> {
    const updated = await this.locks.runExclusive(input.gameId, async () => {
      const game = await this.getGame(input.gameId);
      if (!game.gameStarted) throw new GameError('illegal_state', 'game has not started');
      if (game.winner !== null) throw new GameError('game_over', 'game is over');
      if (game.currentTurn !== user.id) throw new GameError('out_of_turn', 'not your turn');
      if (!isOnBoard(input.row, input.col)) {
        throw new GameError('invalid_coordinates', `cell (${input.row},${input.col}) is outside the board`);
      }

      const mark = markFor(game, user.id);
      const board = applyMove(game.board, input.row, input.col, mark);
      const winner = outcomeOf(board, mark);
      const currentTurn = nextTurn(game, user.id, winner);
      await this.games.mutate(game.id, { board, currentTurn, winner });
      return { ...game, board, currentTurn, winner };
    });

    if (updated.winner !== null) {
      console.log(`[game] ${updated.id} finished: ${updated.winner}`);
      await this.recordOutcome(updated);
    }
    await this.broadcast(updated.id);
    return updated;
  }

  private async recordOutcome(game: Game): Promise<void> {
    const { creator, opponent, winner } = game;
    if (!opponent || winner === null) return;
    const tallies: Array<[PlayerInfo, 'wins' | 'losses' | 'draws']> =
      winner === 'draw'
        ? [[creator, 'draws'], [opponent, 'draws']]
        : winner === 'X'
          ? [[creator, 'wins'], [opponent, 'losses']]
          : [[opponent, 'wins'], [creator, 'losses']];
    for (const [player, field] of tallies) {
      try {
        await this.ledger.recordOutcome(player.id, player.name, field);
      } catch (err) {
        console.error(`[stats] failed to record ${field} for ${player.id} in game ${game.id}:`, errorMessage(err));
      }
    }
  }

  private async broadcast(gameId: string): Promise<void> {
    try {
      await this.dispatcher.broadcastGameState(gameId);
    } catch (err) {
      console.error(`[broadcast] game ${gameId} state push failed:`, errorMessage(err));
    }
  }
}
