import type Redis from 'ioredis';
import { leaderboardRedis } from '../lib/redis';
import { errorMessage } from '../lib/errors';
import type { PlayerId } from '../types/game';

const LEADERBOARD_KEY = 'leaderboard:global'; // ZSET by wins
const USERNAMES_KEY = 'leaderboard:usernames'; // HASH playerId -> username

export interface LeaderboardRow {
  playerId: PlayerId;
  username: string;
  wins: number;
}

/** Wins cache for the leaderboard view; the stats table stays authoritative. */
export interface WinsLeaderboard {
  recordWin(playerId: PlayerId, username: string): Promise<void>;
  top(n: number): Promise<LeaderboardRow[]>;
}

export function clampLimit(n: number): number {
  if (!Number.isFinite(n)) return 10;
  return Math.max(1, Math.min(100, Math.floor(n)));
}

export class MemoryLeaderboard implements WinsLeaderboard {
  private readonly wins = new Map<PlayerId, number>();
  private readonly names = new Map<PlayerId, string>();

  async recordWin(playerId: PlayerId, username: string): Promise<void> {
    this.wins.set(playerId, (this.wins.get(playerId) ?? 0) + 1);
    this.names.set(playerId, username);
  }

  async top(n: number): Promise<LeaderboardRow[]> {
    return Array.from(this.wins.entries())
      .map(([playerId, wins]) => ({ playerId, username: this.names.get(playerId) ?? String(playerId), wins }))
      .sort((a, b) => b.wins - a.wins || a.username.localeCompare(b.username))
      .slice(0, clampLimit(n));
  }
}

/** Redis sorted set, falling back to process memory while Redis is unreachable. */
export class RedisLeaderboard implements WinsLeaderboard {
  constructor(
    private readonly fallback: MemoryLeaderboard = new MemoryLeaderboard(),
    private readonly connect: () => Promise<Redis> = leaderboardRedis,
  ) {}

  async recordWin(playerId: PlayerId, username: string): Promise<void> {
    try {
      const r = await this.connect();
      await r.zincrby(LEADERBOARD_KEY, 1, String(playerId));
      await r.hset(USERNAMES_KEY, String(playerId), username);
    } catch (err) {
      console.warn('[leaderboard] redis unavailable, recording win in memory:', errorMessage(err));
      await this.fallback.recordWin(playerId, username);
    }
  }

  async top(n: number): Promise<LeaderboardRow[]> {
    const limit = clampLimit(n);
    try {
      const r = await this.connect();
      const raw = await r.zrevrange(LEADERBOARD_KEY, 0, limit - 1, 'WITHSCORES');
      const out: Array<{ playerId: string; wins: number }> = [];
      for (let i = 0; i < raw.length; i += 2) {
        out.push({ playerId: raw[i], wins: Number(raw[i + 1] ?? '0') });
      }
      if (out.length === 0) return [];
      const names = await r.hmget(USERNAMES_KEY, ...out.map((e) => e.playerId));
      return out.map((e, idx) => ({ playerId: Number(e.playerId), username: names[idx] || e.playerId, wins: e.wins }));
    } catch (err) {
      console.warn('[leaderboard] redis unavailable, reading in-memory board:', errorMessage(err));
      return this.fallback.top(limit);
    }
  }
}
