import { z } from 'zod';
import type { BotApi, InlineKeyboardMarkup } from '../lib/telegram';
import type { GamesRepo } from '../repositories/gamesRepo';

const updateSchema = z.object({
  message: z
    .object({
      text: z.string().optional(),
      from: z.object({ id: z.number().int() }).optional(),
      chat: z.object({ id: z.number().int() }),
    })
    .optional(),
});

export type StartReply = 'new_game' | 'not_found' | 'full' | 'creator' | 'join' | 'ignored';

/** Answers the bot's `/start` command with a button into the mini app. */
export class NotifierService {
  constructor(
    private readonly bot: BotApi,
    private readonly games: GamesRepo,
    private readonly webAppUrl: string,
  ) {}

  miniAppUrl(gameId?: string): string {
    const base = `${this.webAppUrl}/mini/index.html`;
    return gameId ? `${base}?startapp=${encodeURIComponent(gameId)}` : base;
  }

  async handleUpdate(update: unknown): Promise<StartReply> {
    const parsed = updateSchema.safeParse(update);
    const message = parsed.success ? parsed.data.message : undefined;
    const text = message?.text?.trim();
    if (!message || !text) return 'ignored';
    const userId = message.from?.id ?? message.chat.id;

    if (text === '/start') {
      await this.bot.sendMessage(userId, 'Tap to create a new game!', this.button('Create a new game'));
      return 'new_game';
    }
    if (!text.startsWith('/start ')) return 'ignored';

    const gameId = text.slice('/start '.length).trim();
    const game = await this.games.fetch(gameId);
    if (!game) {
      await this.bot.sendMessage(userId, '❌ Game not found.');
      return 'not_found';
    }

    let reply: StartReply;
    if (game.opponent && game.opponent.id !== userId && game.creator.id !== userId) {
      await this.bot.sendMessage(userId, '❌ This game is already full.');
      reply = 'full';
    } else if (game.creator.id === userId) {
      await this.bot.sendMessage(userId, 'You created this game. Opening it…');
      reply = 'creator';
    } else {
      await this.bot.sendMessage(userId, '🎮 Join the game!');
      reply = 'join';
    }
    await this.bot.sendMessage(userId, 'Tap the button below to open the game:', this.button('Open game', gameId));
    return reply;
  }

  private button(text: string, gameId?: string): InlineKeyboardMarkup {
    return { inline_keyboard: [[{ text, web_app: { url: this.miniAppUrl(gameId) } }]] };
  }
}
