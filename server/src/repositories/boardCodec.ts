import { z } from 'zod';
import { GameError } from '../lib/errors';
import type { Board, Cell } from '../types/game';

// Older rows wrote empty cells as "", newer ones as null; both decode to null.
const cellSchema = z
  .union([z.literal('X'), z.literal('O'), z.literal(''), z.null()])
  .transform((cell): Cell => (cell === '' ? null : cell));

const nestedSchema = z.array(z.array(cellSchema).length(3)).length(3);

const flatSchema = z
  .array(cellSchema)
  .length(9)
  .transform((cells) => [cells.slice(0, 3), cells.slice(3, 6), cells.slice(6, 9)]);

const boardSchema = z.union([nestedSchema, flatSchema]);

export function encodeBoard(board: Board): string {
  return JSON.stringify(board.map((row) => row.map((cell) => cell ?? null)));
}

/** Accepts serialized JSON or an already parsed array; never repairs a bad board. */
export function decodeBoard(raw: unknown, gameId: string): Board {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new GameError('data_corruption', `board of game ${gameId} is not valid JSON`);
    }
  }
  const parsed = boardSchema.safeParse(value);
  if (!parsed.success) {
    throw new GameError('data_corruption', `board of game ${gameId} is not a 3x3 grid`);
  }
  return parsed.data;
}
