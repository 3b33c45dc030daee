export type GameErrorCode =
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'conflict'
  | 'illegal_state'
  | 'out_of_turn'
  | 'cell_occupied'
  | 'invalid_coordinates'
  | 'game_over'
  | 'data_corruption'
  | 'store_unavailable';

export const HTTP_STATUS: Record<GameErrorCode, number> = {
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  illegal_state: 409,
  out_of_turn: 409,
  cell_occupied: 409,
  invalid_coordinates: 400,
  game_over: 409,
  data_corruption: 500,
  store_unavailable: 503,
};

/**
 * Failure raised by the game core. `code` is what clients see; the message is
 * for logs and is echoed back only for client-side rejections.
 */
export class GameError extends Error {
  constructor(
    public readonly code: GameErrorCode,
    message: string = code,
  ) {
    super(message);
    this.name = 'GameError';
  }

  /** Rejections the client caused, as opposed to server-side failures. */
  get clientFacing(): boolean {
    return HTTP_STATUS[this.code] < 500;
  }
}

export function isGameError(err: unknown, code?: GameErrorCode): err is GameError {
  return err instanceof GameError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
