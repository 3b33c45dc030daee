import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MemoryTableStore } from '../lib/memoryTableStore';
import { StatsRepo } from '../repositories/statsRepo';
import { MemoryLeaderboard, type WinsLeaderboard } from '../services/leaderboardService';
import { StatsLedger } from '../services/statsService';

describe('StatsLedger', () => {
  let store: MemoryTableStore;
  let leaderboard: MemoryLeaderboard;
  let ledger: StatsLedger;

  beforeEach(() => {
    store = new MemoryTableStore();
    leaderboard = new MemoryLeaderboard();
    ledger = new StatsLedger(new StatsRepo(store), leaderboard);
  });

  it('creates the row on first contact with the counter at one', async () => {
    await ledger.recordOutcome(42, 'dana', 'losses');
    expect(await store.findOne('stats', '42')).toEqual({
      user_id: '42',
      username: 'dana',
      wins: 0,
      losses: 1,
      draws: 0,
    });
  });

  it('increments an existing counter and refreshes the name', async () => {
    await ledger.recordOutcome(42, 'dana', 'draws');
    const record = await ledger.recordOutcome(42, 'dana_renamed', 'draws');
    expect(record).toEqual({ userId: 42, username: 'dana_renamed', wins: 0, losses: 0, draws: 2 });
    expect(await ledger.getStats(42)).toEqual(record);
  });

  it('loses no increments when calls for one player overlap', async () => {
    await Promise.all(Array.from({ length: 5 }, () => ledger.recordOutcome(7, 'eve', 'wins')));
    expect((await ledger.getStats(7)).wins).toBe(5);
  });

  it('returns zeros for a player without a record', async () => {
    expect(await ledger.getStats(99)).toEqual({ userId: 99, username: '', wins: 0, losses: 0, draws: 0 });
  });

  it('mirrors wins, and only wins, to the leaderboard', async () => {
    await ledger.recordOutcome(1, 'frank', 'wins');
    await ledger.recordOutcome(1, 'frank', 'wins');
    await ledger.recordOutcome(2, 'gina', 'wins');
    await ledger.recordOutcome(2, 'gina', 'losses');
    expect(await leaderboard.top(10)).toEqual([
      { playerId: 1, username: 'frank', wins: 2 },
      { playerId: 2, username: 'gina', wins: 1 },
    ]);
  });

  it('keeps the stored tally when the leaderboard fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const broken: WinsLeaderboard = {
      recordWin: () => Promise.reject(new Error('cache down')),
      top: () => Promise.resolve([]),
    };
    const withBrokenBoard = new StatsLedger(new StatsRepo(store), broken);
    const record = await withBrokenBoard.recordOutcome(3, 'hal', 'wins');
    expect(record.wins).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
