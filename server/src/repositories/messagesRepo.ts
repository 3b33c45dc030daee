import { v4 as uuid } from 'uuid';
import type { TableStore } from '../lib/tableStore';
import type { PlayerId } from '../types/game';

export interface NewMessage {
  gameId: string;
  userId: PlayerId;
  username: string;
  text: string;
  createdAt: string;
}

// Chat history is write-only from the server's side.
export class MessagesRepo {
  constructor(private readonly store: TableStore) {}

  async insert(message: NewMessage): Promise<string> {
    const id = uuid();
    await this.store.insert('messages', {
      id,
      game_id: message.gameId,
      user_id: String(message.userId),
      username: message.username,
      text: message.text,
      created_at: message.createdAt,
    });
    return id;
  }
}
