import type { TableStore } from '../lib/tableStore';
import type { BotApi } from '../lib/telegram';
import { GamesRepo } from '../repositories/gamesRepo';
import { MessagesRepo } from '../repositories/messagesRepo';
import { StatsRepo } from '../repositories/statsRepo';
import { BroadcastDispatcher } from './broadcastService';
import { ChatService } from './chatService';
import { ConnectionRegistry } from './connectionRegistry';
import { GameService } from './gameService';
import type { WinsLeaderboard } from './leaderboardService';
import { NotifierService } from './notifierService';
import { StatsLedger } from './statsService';

export interface ServiceOptions {
  store: TableStore;
  leaderboard: WinsLeaderboard;
  bot: BotApi;
  botToken: string;
  webAppUrl: string;
  initDataMaxAgeSeconds: number;
  generateGameId?: () => string;
}

export interface Services {
  registry: ConnectionRegistry;
  games: GamesRepo;
  dispatcher: BroadcastDispatcher;
  gameService: GameService;
  ledger: StatsLedger;
  leaderboard: WinsLeaderboard;
  chat: ChatService;
  notifier: NotifierService;
  auth: { botToken: string; maxAgeSeconds: number };
}

export function createServices(opts: ServiceOptions): Services {
  const registry = new ConnectionRegistry();
  const games = new GamesRepo(opts.store);
  const dispatcher = new BroadcastDispatcher(games, registry);
  const ledger = new StatsLedger(new StatsRepo(opts.store), opts.leaderboard);
  return {
    registry,
    games,
    dispatcher,
    ledger,
    leaderboard: opts.leaderboard,
    gameService: new GameService(games, ledger, dispatcher, opts.generateGameId),
    chat: new ChatService(new MessagesRepo(opts.store), dispatcher),
    notifier: new NotifierService(opts.bot, games, opts.webAppUrl),
    auth: { botToken: opts.botToken, maxAgeSeconds: opts.initDataMaxAgeSeconds },
  };
}
