import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryTableStore } from '../lib/memoryTableStore';
import type { BotApi, InlineKeyboardMarkup } from '../lib/telegram';
import { GamesRepo } from '../repositories/gamesRepo';
import { emptyBoard } from '../services/boardEngine';
import { NotifierService } from '../services/notifierService';
import type { Game } from '../types/game';
import { ALICE, BOB, CAROL } from './utils/fakes';

class RecordingBot implements BotApi {
  readonly messages: Array<{ chatId: number; text: string; replyMarkup?: InlineKeyboardMarkup }> = [];

  async sendMessage(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void> {
    this.messages.push(replyMarkup ? { chatId, text, replyMarkup } : { chatId, text });
  }
}

function startUpdate(text: string, fromId: number): unknown {
  return { update_id: 1, message: { message_id: 1, text, from: { id: fromId }, chat: { id: fromId } } };
}

describe('NotifierService', () => {
  let bot: RecordingBot;
  let games: GamesRepo;
  let notifier: NotifierService;

  const openGame: Game = {
    id: 'abcd1234',
    creator: { id: ALICE.id, name: ALICE.name },
    opponent: null,
    board: emptyBoard(),
    currentTurn: ALICE.id,
    winner: null,
    gameStarted: false,
    createdAt: '2026-01-01T00:00:00.000Z',
  };

  beforeEach(async () => {
    bot = new RecordingBot();
    games = new GamesRepo(new MemoryTableStore());
    notifier = new NotifierService(bot, games, 'https://example.test');
    await games.create(openGame);
  });

  function openButton(gameId: string): InlineKeyboardMarkup {
    return {
      inline_keyboard: [
        [{ text: 'Open game', web_app: { url: `https://example.test/mini/index.html?startapp=${gameId}` } }],
      ],
    };
  }

  it('offers a new game on a bare /start', async () => {
    expect(await notifier.handleUpdate(startUpdate('/start', BOB.id))).toBe('new_game');
    expect(bot.messages).toEqual([
      {
        chatId: BOB.id,
        text: 'Tap to create a new game!',
        replyMarkup: {
          inline_keyboard: [[{ text: 'Create a new game', web_app: { url: 'https://example.test/mini/index.html' } }]],
        },
      },
    ]);
  });

  it('invites a new player into an open game', async () => {
    expect(await notifier.handleUpdate(startUpdate('/start abcd1234', BOB.id))).toBe('join');
    expect(bot.messages).toEqual([
      { chatId: BOB.id, text: '🎮 Join the game!' },
      { chatId: BOB.id, text: 'Tap the button below to open the game:', replyMarkup: openButton('abcd1234') },
    ]);
  });

  it('reopens the game for its creator', async () => {
    expect(await notifier.handleUpdate(startUpdate('/start abcd1234', ALICE.id))).toBe('creator');
    expect(bot.messages.map((m) => m.text)).toEqual([
      'You created this game. Opening it…',
      'Tap the button below to open the game:',
    ]);
  });

  it('tells a third user the game is full', async () => {
    await games.mutate('abcd1234', { opponent: { id: BOB.id, name: BOB.name } });
    expect(await notifier.handleUpdate(startUpdate('/start abcd1234', CAROL.id))).toBe('full');
    expect(bot.messages[0]).toEqual({ chatId: CAROL.id, text: '❌ This game is already full.' });
  });

  it('lets the seated opponent back in', async () => {
    await games.mutate('abcd1234', { opponent: { id: BOB.id, name: BOB.name } });
    expect(await notifier.handleUpdate(startUpdate('/start abcd1234', BOB.id))).toBe('join');
  });

  it('reports an unknown game without a button', async () => {
    expect(await notifier.handleUpdate(startUpdate('/start nope0000', BOB.id))).toBe('not_found');
    expect(bot.messages).toEqual([{ chatId: BOB.id, text: '❌ Game not found.' }]);
  });

  it('ignores anything that is not a /start command', async () => {
    expect(await notifier.handleUpdate(startUpdate('hello', BOB.id))).toBe('ignored');
    expect(await notifier.handleUpdate({ callback_query: {} })).toBe('ignored');
    expect(await notifier.handleUpdate('garbage')).toBe('ignored');
    expect(bot.messages).toEqual([]);
  });
});
