export type PlayerMark = 'X' | 'O';

export type Cell = PlayerMark | null;

/** Always 3 rows of 3 cells; `null` is an empty cell. */
export type Board = Cell[][];

export type Winner = PlayerMark | 'draw';

export type PlayerId = number;

export interface PlayerInfo {
  id: PlayerId;
  name: string;
}

export interface Game {
  id: string;
  creator: PlayerInfo; // plays X
  opponent: PlayerInfo | null; // plays O
  board: Board;
  currentTurn: PlayerId | null; // null once winner is set
  winner: Winner | null;
  gameStarted: boolean;
  createdAt: string; // ISO
}

export type GamePatch = Partial<Pick<Game, 'opponent' | 'board' | 'currentTurn' | 'winner' | 'gameStarted'>>;

/** Shape sent to clients over HTTP and the viewer channel. */
export interface GameView {
  game_id: string;
  creator_id: PlayerId;
  creator_name: string;
  opponent_id: PlayerId | null;
  opponent_name: string | null;
  board: Board;
  current_turn: PlayerId | null;
  winner: Winner | null;
  game_started: boolean;
  created_at: string;
}

export interface GameStateMessage {
  type: 'game';
  game: GameView;
}

export interface ChatMessage {
  type: 'chat';
  username: string;
  text: string;
  timestamp: string; // ISO
}

export type StatsField = 'wins' | 'losses' | 'draws';

export interface StatsRecord {
  userId: PlayerId;
  username: string;
  wins: number;
  losses: number;
  draws: number;
}

export function toGameView(game: Game): GameView {
  return {
    game_id: game.id,
    creator_id: game.creator.id,
    creator_name: game.creator.name,
    opponent_id: game.opponent?.id ?? null,
    opponent_name: game.opponent?.name ?? null,
    board: game.board.map((row) => row.slice()),
    current_turn: game.currentTurn,
    winner: game.winner,
    game_started: game.gameStarted,
    created_at: game.createdAt,
  };
}
