import { GameError } from '../lib/errors';
import type { Board, Cell, Game, PlayerId, PlayerMark, Winner } from '../types/game';

export const BOARD_SIZE = 3;

const WIN_LINES: ReadonlyArray<ReadonlyArray<readonly [number, number]>> = [
  [[0, 0], [0, 1], [0, 2]],
  [[1, 0], [1, 1], [1, 2]],
  [[2, 0], [2, 1], [2, 2]],
  [[0, 0], [1, 0], [2, 0]],
  [[0, 1], [1, 1], [2, 1]],
  [[0, 2], [1, 2], [2, 2]],
  [[0, 0], [1, 1], [2, 2]],
  [[0, 2], [1, 1], [2, 0]],
];

export function emptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null));
}

export function isOnBoard(row: number, col: number): boolean {
  const inRange = (n: number) => Number.isInteger(n) && n >= 0 && n < BOARD_SIZE;
  return inRange(row) && inRange(col);
}

/** Returns a new board; the input is left untouched. */
export function applyMove(board: Board, row: number, col: number, mark: PlayerMark): Board {
  if (!isOnBoard(row, col)) {
    throw new GameError('invalid_coordinates', `cell (${row},${col}) is outside the board`);
  }
  if (board[row][col] !== null) {
    throw new GameError('cell_occupied', `cell (${row},${col}) is taken`);
  }
  const next = board.map((cells) => cells.slice());
  next[row][col] = mark;
  return next;
}

export function checkWin(board: Board, mark: PlayerMark): boolean {
  return WIN_LINES.some((line) => line.every(([r, c]) => board[r][c] === mark));
}

export function isFull(board: Board): boolean {
  return board.every((cells) => cells.every((cell) => cell !== null));
}

// A full board that also completes a line is a win, never a draw.
export function isDraw(board: Board): boolean {
  return isFull(board) && !checkWin(board, 'X') && !checkWin(board, 'O');
}

/** Result after `mark` has moved. Only the mover can have completed a line. */
export function outcomeOf(board: Board, mark: PlayerMark): Winner | null {
  if (checkWin(board, mark)) return mark;
  if (isDraw(board)) return 'draw';
  return null;
}

export function markFor(game: Game, playerId: PlayerId): PlayerMark {
  return game.creator.id === playerId ? 'X' : 'O';
}

export function nextTurn(game: Game, actingPlayer: PlayerId, winner: Winner | null): PlayerId | null {
  if (winner !== null) return null;
  if (actingPlayer === game.creator.id) return game.opponent?.id ?? null;
  return game.creator.id;
}
