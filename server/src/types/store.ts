// Row shapes as the table store holds them. Player ids travel as decimal
// strings (Postgres bigint) and the board as serialized JSON.

export type GameRow = {
  id: string;
  creator_id: string;
  creator_name: string;
  opponent_id: string | null;
  opponent_name: string | null;
  board: unknown;
  current_turn: string | null;
  winner: string | null;
  game_started: boolean;
  created_at: string | Date;
};

export type StatsRow = {
  user_id: string;
  username: string;
  wins: number;
  losses: number;
  draws: number;
};

export type MessageRow = {
  id: string;
  game_id: string;
  user_id: string;
  username: string;
  text: string;
  created_at: string | Date;
};

export interface TableRows {
  games: GameRow;
  stats: StatsRow;
  messages: MessageRow;
}

export type TableName = keyof TableRows;
