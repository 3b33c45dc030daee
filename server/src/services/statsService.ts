import { KeyedMutex } from '../lib/keyedMutex';
import { errorMessage } from '../lib/errors';
import type { StatsRepo } from '../repositories/statsRepo';
import type { PlayerId, StatsField, StatsRecord } from '../types/game';
import type { WinsLeaderboard } from './leaderboardService';

export class StatsLedger {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly stats: StatsRepo,
    private readonly leaderboard: WinsLeaderboard,
  ) {}

  /**
   * Adds one to a counter, creating the player's row on first contact.
   * Calls for the same player are serialized in-process.
   */
  async recordOutcome(playerId: PlayerId, displayName: string, field: StatsField): Promise<StatsRecord> {
    const record = await this.locks.runExclusive(String(playerId), async () => {
      const current = await this.stats.get(playerId);
      if (current) return this.bump(current, displayName, field);
      const created: StatsRecord = { userId: playerId, username: displayName, wins: 0, losses: 0, draws: 0 };
      created[field] = 1;
      if (await this.stats.insert(created)) return created;
      // Another process created the row between our read and insert.
      const raced = await this.stats.get(playerId);
      if (!raced) throw new Error(`stats row for ${playerId} conflicted but cannot be read`);
      return this.bump(raced, displayName, field);
    });

    if (field === 'wins') {
      try {
        await this.leaderboard.recordWin(playerId, displayName);
      } catch (err) {
        console.warn(`[stats] leaderboard update failed for ${playerId}:`, errorMessage(err));
      }
    }
    return record;
  }

  async getStats(playerId: PlayerId): Promise<StatsRecord> {
    const record = await this.stats.get(playerId);
    return record ?? { userId: playerId, username: '', wins: 0, losses: 0, draws: 0 };
  }

  private async bump(current: StatsRecord, displayName: string, field: StatsField): Promise<StatsRecord> {
    const next: StatsRecord = { ...current, username: displayName };
    next[field] = current[field] + 1;
    await this.stats.setCounter(current.userId, displayName, field, next[field]);
    return next;
  }
}
