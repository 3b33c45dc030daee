import { errorMessage } from '../lib/errors';
import { KeyedMutex } from '../lib/keyedMutex';
import type { GamesRepo } from '../repositories/gamesRepo';
import { toGameView, type ChatMessage, type Game, type GameStateMessage } from '../types/game';
import type { Channel, ConnectionRegistry, PushEvent, SocketHandle } from './connectionRegistry';

export function gameStateMessage(game: Game): GameStateMessage {
  return { type: 'game', game: toGameView(game) };
}

/**
 * Pushes authoritative state to registered sockets. Sends are fire-once: a
 * socket that misses a push gets the full state again on the next change.
 *
 * Reads and sends for one game run one after another, so a state read earlier
 * is never delivered after one read later.
 */
export class BroadcastDispatcher {
  private readonly sequencer = new KeyedMutex();

  constructor(
    private readonly games: GamesRepo,
    private readonly registry: ConnectionRegistry,
  ) {}

  /** Resolves with the number of sockets the state was delivered to. */
  async broadcastGameState(gameId: string): Promise<number> {
    return this.sequencer.runExclusive(gameId, async () => {
      this.registry.sweepDead(gameId);
      const game = await this.games.fetch(gameId);
      if (!game) return 0;
      return this.deliver(gameId, 'viewer', 'game', gameStateMessage(game));
    });
  }

  /** Initial push for a viewer that just connected. */
  async sendSnapshot(gameId: string, handle: SocketHandle): Promise<boolean> {
    return this.sequencer.runExclusive(gameId, async () => {
      const game = await this.games.fetch(gameId);
      if (!game) return false;
      return this.sendTo(gameId, handle, 'game', gameStateMessage(game));
    });
  }

  broadcastChatMessage(gameId: string, message: ChatMessage): number {
    this.registry.sweepDead(gameId);
    return this.deliver(gameId, 'chat', 'chat', message);
  }

  private deliver(gameId: string, channel: Channel, event: PushEvent, payload: unknown): number {
    let delivered = 0;
    for (const handle of this.registry.handles(gameId, channel)) {
      if (this.sendTo(gameId, handle, event, payload)) delivered++;
    }
    return delivered;
  }

  private sendTo(gameId: string, handle: SocketHandle, event: PushEvent, payload: unknown): boolean {
    if (!handle.isOpen()) {
      this.registry.unregister(gameId, handle.id);
      return false;
    }
    try {
      handle.send(event, payload);
      return true;
    } catch (err) {
      console.warn(`[broadcast] dropping socket ${handle.id} of game ${gameId}:`, errorMessage(err));
      this.registry.unregister(gameId, handle.id);
      return false;
    }
  }
}
