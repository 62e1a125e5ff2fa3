import axios from 'axios';
import type { Logger } from '../logger';
import { formatOutcomeMessage } from './format';
import type { Notifier } from './types';

export interface HttpPoster {
  post(url: string, body: unknown): Promise<unknown>;
}

export interface TelegramOptions {
  token: string;
  chatId: string;
  client?: HttpPoster;
}

export function createTelegramNotifier(opts: TelegramOptions): Notifier {
  const client: HttpPoster = opts.client ?? axios.create({ baseURL: 'https://api.telegram.org', timeout: 5000 });
  return {
    name: 'telegram',
    async notify(event) {
      try {
        await client.post(`/bot${opts.token}/sendMessage`, {
          chat_id: opts.chatId,
          text: formatOutcomeMessage(event),
          disable_web_page_preview: true,
        });
      } catch (err) {
        // The request URL embeds the bot token; rethrow without it.
        if (axios.isAxiosError(err)) {
          const status = err.response?.status;
          const reason = status !== undefined ? `HTTP ${status}` : (err.code ?? 'network error');
          throw new Error(`telegram sendMessage failed: ${reason}`);
        }
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`telegram sendMessage failed: ${message.split(opts.token).join('<redacted>')}`);
      }
    },
  };
}

export function createLogNotifier(logger: Logger): Notifier {
  return {
    name: 'log',
    async notify(event) {
      logger.info(
        { postId: event.postId, asset: event.asset, status: event.finalStatus, error: event.error?.code },
        formatOutcomeMessage(event).split('\n')[0],
      );
    },
  };
}
