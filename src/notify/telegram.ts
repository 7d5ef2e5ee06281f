/**
 * Telegram 推送
 */
import axios from 'axios';
import type { Notifier } from './notifier';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

export class TelegramNotifier implements Notifier {
  readonly name = 'Telegram';

  constructor(
    private token: string,
    private chatId: string,
    private timeoutMs = 15000
  ) {}

  async send(title: string, body: string): Promise<void> {
    await axios.post(
      `${TELEGRAM_API_BASE}/bot${this.token}/sendMessage`,
      {
        chat_id: this.chatId,
        text: `*${title}*\n\n${body}`,
        parse_mode: 'Markdown',
      },
      { timeout: this.timeoutMs }
    );
  }
}
