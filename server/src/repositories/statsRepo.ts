import { GameError } from '../lib/errors';
import type { TableStore } from '../lib/tableStore';
import type { PlayerId, StatsField, StatsRecord } from '../types/game';
import type { StatsRow } from '../types/store';

function rowToStats(row: StatsRow): StatsRecord {
  const userId = Number(row.user_id);
  if (!Number.isSafeInteger(userId)) {
    throw new GameError('data_corruption', `stats row ${row.user_id} has a bad user id`);
  }
  return {
    userId,
    username: row.username,
    wins: Number(row.wins),
    losses: Number(row.losses),
    draws: Number(row.draws),
  };
}

export class StatsRepo {
  constructor(private readonly store: TableStore) {}

  async get(playerId: PlayerId): Promise<StatsRecord | null> {
    const row = await this.store.findOne('stats', String(playerId));
    return row ? rowToStats(row) : null;
  }

  async insert(record: StatsRecord): Promise<boolean> {
    return this.store.insert('stats', {
      user_id: String(record.userId),
      username: record.username,
      wins: record.wins,
      losses: record.losses,
      draws: record.draws,
    });
  }

  async setCounter(playerId: PlayerId, username: string, field: StatsField, value: number): Promise<boolean> {
    const fields: Partial<StatsRow> = { username };
    fields[field] = value;
    return this.store.update('stats', String(playerId), fields);
  }
}
