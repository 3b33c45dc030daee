export interface InlineKeyboardMarkup {
  inline_keyboard: Array<Array<{ text: string; web_app: { url: string } }>>;
}

export interface BotApi {
  sendMessage(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void>;
}

const API_BASE = 'https://api.telegram.org';

export class TelegramBotApi implements BotApi {
  constructor(private readonly token: string) {}

  async sendMessage(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void> {
    const res = await fetch(`${API_BASE}/bot${this.token}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: chatId, text, reply_markup: replyMarkup }),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new Error(`sendMessage failed with ${res.status}: ${body}`);
    }
  }
}
