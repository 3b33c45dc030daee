import { openPool } from './db';

export async function ensureSchema() {
  const db = await openPool();
  await db.query(`
    create table if not exists games (
      id text primary key,
      creator_id bigint not null,
      creator_name text not null,
      opponent_id bigint,
      opponent_name text,
      board text not null, -- JSON, 3x3 of 'X' | 'O' | null
      current_turn bigint,
      winner text, -- 'X' | 'O' | 'draw' | null
      game_started boolean not null default false,
      created_at timestamptz not null default now()
    );

    create table if not exists stats (
      user_id bigint primary key,
      username text not null,
      wins integer not null default 0,
      losses integer not null default 0,
      draws integer not null default 0
    );

    create table if not exists messages (
      id text primary key,
      game_id text not null,
      user_id bigint not null,
      username text not null,
      text text not null,
      created_at timestamptz not null default now()
    );

    create index if not exists idx_messages_game on messages(game_id, created_at);
  `);
}
