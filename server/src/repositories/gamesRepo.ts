import { GameError } from '../lib/errors';
import type { TableStore } from '../lib/tableStore';
import type { Game, GamePatch, PlayerId, Winner } from '../types/game';
import type { GameRow } from '../types/store';
import { decodeBoard, encodeBoard } from './boardCodec';

function decodePlayerId(raw: string | number, gameId: string, field: string): PlayerId {
  const id = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isSafeInteger(id)) {
    throw new GameError('data_corruption', `${field} of game ${gameId} is not a player id`);
  }
  return id;
}

function decodeWinner(raw: string | null, gameId: string): Winner | null {
  if (raw === null || raw === 'X' || raw === 'O' || raw === 'draw') return raw;
  throw new GameError('data_corruption', `winner of game ${gameId} is ${JSON.stringify(raw)}`);
}

export function rowToGame(row: GameRow): Game {
  const id = row.id;
  const opponent =
    row.opponent_id === null
      ? null
      : { id: decodePlayerId(row.opponent_id, id, 'opponent_id'), name: row.opponent_name ?? '' };
  return {
    id,
    creator: { id: decodePlayerId(row.creator_id, id, 'creator_id'), name: row.creator_name },
    opponent,
    board: decodeBoard(row.board, id),
    currentTurn: row.current_turn === null ? null : decodePlayerId(row.current_turn, id, 'current_turn'),
    winner: decodeWinner(row.winner, id),
    gameStarted: row.game_started,
    createdAt: new Date(row.created_at).toISOString(),
  };
}

export function gameToRow(game: Game): GameRow {
  return {
    id: game.id,
    creator_id: String(game.creator.id),
    creator_name: game.creator.name,
    opponent_id: game.opponent ? String(game.opponent.id) : null,
    opponent_name: game.opponent?.name ?? null,
    board: encodeBoard(game.board),
    current_turn: game.currentTurn === null ? null : String(game.currentTurn),
    winner: game.winner,
    game_started: game.gameStarted,
    created_at: game.createdAt,
  };
}

function patchToRow(patch: GamePatch): Partial<GameRow> {
  const row: Partial<GameRow> = {};
  if (patch.opponent !== undefined) {
    row.opponent_id = patch.opponent ? String(patch.opponent.id) : null;
    row.opponent_name = patch.opponent?.name ?? null;
  }
  if (patch.board !== undefined) row.board = encodeBoard(patch.board);
  if (patch.currentTurn !== undefined) {
    row.current_turn = patch.currentTurn === null ? null : String(patch.currentTurn);
  }
  if (patch.winner !== undefined) row.winner = patch.winner;
  if (patch.gameStarted !== undefined) row.game_started = patch.gameStarted;
  return row;
}

/** Game store gateway: the only place game rows are encoded or decoded. */
export class GamesRepo {
  constructor(private readonly store: TableStore) {}

  async fetch(gameId: string): Promise<Game | null> {
    const row = await this.store.findOne('games', gameId);
    return row ? rowToGame(row) : null;
  }

  async create(game: Game): Promise<void> {
    const inserted = await this.store.insert('games', gameToRow(game));
    if (!inserted) throw new GameError('conflict', `game id ${game.id} is taken`);
  }

  async mutate(gameId: string, patch: GamePatch): Promise<void> {
    const updated = await this.store.update('games', gameId, patchToRow(patch));
    if (!updated) throw new GameError('not_found', `game ${gameId} not found`);
  }
}
