import { errorMessage } from '../lib/errors';
import type { UserIdentity } from '../lib/initData';
import type { MessagesRepo } from '../repositories/messagesRepo';
import type { ChatMessage } from '../types/game';
import type { BroadcastDispatcher } from './broadcastService';

export const CHAT_MAX_LENGTH = 100;

/** Cuts by code point so a surrogate pair is never split. */
export function truncateChat(text: string): string {
  const chars = Array.from(text);
  return chars.length > CHAT_MAX_LENGTH ? chars.slice(0, CHAT_MAX_LENGTH).join('') : text;
}

export class ChatService {
  constructor(
    private readonly messages: MessagesRepo,
    private readonly dispatcher: BroadcastDispatcher,
  ) {}

  async post(gameId: string, user: UserIdentity, text: string): Promise<ChatMessage> {
    const message: ChatMessage = {
      type: 'chat',
      username: user.name,
      text: truncateChat(text),
      timestamp: new Date().toISOString(),
    };
    try {
      await this.messages.insert({
        gameId,
        userId: user.id,
        username: message.username,
        text: message.text,
        createdAt: message.timestamp,
      });
    } catch (err) {
      console.warn(`[chat] could not store message for game ${gameId}:`, errorMessage(err));
    }
    this.dispatcher.broadcastChatMessage(gameId, message);
    return message;
  }
}
