export type Channel = 'viewer' | 'chat';

export type PushEvent = 'game' | 'chat';

/**
 * Non-owning reference to a client connection. `isOpen()` turns false for
 * good once the transport closes; `send` throws when delivery is impossible.
 */
export interface SocketHandle {
  readonly id: string;
  isOpen(): boolean;
  send(event: PushEvent, payload: unknown): void;
}

type GameSockets = Record<Channel, Map<string, SocketHandle>>;

const CHANNELS: readonly Channel[] = ['viewer', 'chat'];

/**
 * Process-wide map of game id to the sockets watching it. Every method is
 * synchronous, so each call completes before any other connect, disconnect
 * or broadcast path can touch the map.
 */
export class ConnectionRegistry {
  private readonly games = new Map<string, GameSockets>();

  register(gameId: string, handle: SocketHandle, channel: Channel): void {
    let sockets = this.games.get(gameId);
    if (!sockets) {
      sockets = { viewer: new Map(), chat: new Map() };
      this.games.set(gameId, sockets);
    }
    sockets[channel].set(handle.id, handle);
  }

  /** Removes the socket from every channel of the game. */
  unregister(gameId: string, socketId: string): boolean {
    const sockets = this.games.get(gameId);
    if (!sockets) return false;
    let removed = false;
    for (const channel of CHANNELS) {
      removed = sockets[channel].delete(socketId) || removed;
    }
    this.dropIfEmpty(gameId, sockets);
    return removed;
  }

  /** Drops handles whose transport already closed; returns how many. */
  sweepDead(gameId: string): number {
    const sockets = this.games.get(gameId);
    if (!sockets) return 0;
    let swept = 0;
    for (const channel of CHANNELS) {
      for (const [id, handle] of sockets[channel]) {
        if (!handle.isOpen()) {
          sockets[channel].delete(id);
          swept++;
        }
      }
    }
    this.dropIfEmpty(gameId, sockets);
    return swept;
  }

  handles(gameId: string, channel: Channel): SocketHandle[] {
    const sockets = this.games.get(gameId);
    return sockets ? Array.from(sockets[channel].values()) : [];
  }

  count(gameId: string, channel?: Channel): number {
    const sockets = this.games.get(gameId);
    if (!sockets) return 0;
    if (channel) return sockets[channel].size;
    return sockets.viewer.size + sockets.chat.size;
  }

  has(gameId: string): boolean {
    return this.games.has(gameId);
  }

  /** Number of games with at least one registered socket. */
  get size(): number {
    return this.games.size;
  }

  private dropIfEmpty(gameId: string, sockets: GameSockets) {
    if (sockets.viewer.size === 0 && sockets.chat.size === 0) {
      this.games.delete(gameId);
    }
  }
}
