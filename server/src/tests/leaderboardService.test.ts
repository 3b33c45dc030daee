import { describe, it, expect, vi, afterEach } from 'vitest';
import { clampLimit, MemoryLeaderboard, RedisLeaderboard } from '../services/leaderboardService';

describe('leaderboard', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('clamps the requested size', () => {
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(3.7)).toBe(3);
    expect(clampLimit(500)).toBe(100);
    expect(clampLimit(Number.NaN)).toBe(10);
  });

  it('ranks by wins, then by name', async () => {
    const board = new MemoryLeaderboard();
    await board.recordWin(1, 'zed');
    await board.recordWin(2, 'amy');
    await board.recordWin(1, 'zed');
    await board.recordWin(3, 'bea');

    expect(await board.top(10)).toEqual([
      { playerId: 1, username: 'zed', wins: 2 },
      { playerId: 2, username: 'amy', wins: 1 },
      { playerId: 3, username: 'bea', wins: 1 },
    ]);
    expect(await board.top(1)).toHaveLength(1);
  });

  it('keeps counting in memory while redis is unreachable', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const fallback = new MemoryLeaderboard();
    const unreachable = vi.fn(() => Promise.reject(new Error('connect ECONNREFUSED')));
    const board = new RedisLeaderboard(fallback, unreachable);

    await board.recordWin(7, 'kim');
    await board.recordWin(7, 'kim');

    expect(await board.top(5)).toEqual([{ playerId: 7, username: 'kim', wins: 2 }]);
    expect(await fallback.top(5)).toEqual([{ playerId: 7, username: 'kim', wins: 2 }]);
    expect(unreachable).toHaveBeenCalledTimes(3);
  });
});
