import { TelegramApiError, sanitizeNetworkError } from '../../utils/errors';
import logger from '../../utils/logger';
import {
  IMessageSender,
  SendMessageOptions,
  SendResult,
  TelegramMessage,
  TelegramUpdate,
} from './types';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

const SEND_TIMEOUT_MS = 10_000;
// Headroom on top of the long-poll timeout the server holds the request for
const UPDATES_TIMEOUT_GRACE_MS = 10_000;

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMessage(value: unknown): TelegramMessage | undefined {
  if (!isRecord(value)) return undefined;
  const { chat, message_id, text } = value;
  if (!isRecord(chat) || typeof chat.id !== 'number') return undefined;
  return {
    message_id: typeof message_id === 'number' ? message_id : 0,
    chat: { id: chat.id, type: typeof chat.type === 'string' ? chat.type : 'private' },
    text: typeof text === 'string' ? text : undefined,
  };
}

function toUpdate(value: unknown): TelegramUpdate | null {
  if (!isRecord(value) || typeof value.update_id !== 'number') {
    return null;
  }
  return { update_id: value.update_id, message: toMessage(value.message) };
}

/**
 * Thin wrapper over the two Bot API methods the bot needs.
 * The token is part of every request URL and never logged.
 */
export class TelegramClient implements IMessageSender {
  private readonly baseUrl: string;

  constructor(token: string, apiBase: string = TELEGRAM_API_BASE) {
    this.baseUrl = `${apiBase.replace(/\/+$/, '')}/bot${token}`;
  }

  async sendMessage(chatId: number, text: string, options: SendMessageOptions = {}): Promise<SendResult> {
    const payload: Json = { chat_id: chatId, text };
    if (options.parseMode) {
      payload.parse_mode = options.parseMode;
    }
    if (options.disableWebPagePreview) {
      payload.disable_web_page_preview = true;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), SEND_TIMEOUT_MS);

    try {
      const response = await fetch(`${this.baseUrl}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      const body = await this.readBody(response);
      if (response.ok && body?.ok === true) {
        return { success: true };
      }

      if (response.status === 429) {
        const parameters = body?.parameters;
        const retryAfter = isRecord(parameters) ? parameters.retry_after : undefined;
        logger.warn({ chatId, retryAfter }, 'telegram rate limited');
        return { success: false, error: `Rate limited by Telegram (retry after ${retryAfter ?? 'unknown'}s)` };
      }

      const description = typeof body?.description === 'string' ? body.description : `HTTP ${response.status}`;
      return { success: false, error: description };
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'AbortError') {
        return { success: false, error: 'Telegram request timed out (10s)' };
      }
      return { success: false, error: `Telegram request failed: ${sanitizeNetworkError(err)}` };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Long-poll for new updates. Resolves with an empty list when the server
   * timeout passes without updates; throws TelegramApiError otherwise.
   */
  async getUpdates(offset: number | undefined, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const params = new URLSearchParams({
      timeout: String(timeoutSeconds),
      allowed_updates: JSON.stringify(['message']),
    });
    if (offset !== undefined) {
      params.set('offset', String(offset));
    }

    const controller = new AbortController();
    const abort = () => controller.abort();
    signal?.addEventListener('abort', abort);
    const timeoutId = setTimeout(abort, timeoutSeconds * 1000 + UPDATES_TIMEOUT_GRACE_MS);

    let response: Response;
    let body: Json | null;
    try {
      response = await fetch(`${this.baseUrl}/getUpdates?${params}`, { signal: controller.signal });
      // The body is read under the same abort so a stalled stream cannot hang the loop
      body = await this.readBody(response);
    } catch (err: unknown) {
      throw new TelegramApiError(`getUpdates failed: ${sanitizeNetworkError(err)}`);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', abort);
    }

    if (!body || body.ok !== true) {
      const description = typeof body?.description === 'string' ? body.description : `HTTP ${response.status}`;
      const errorCode = typeof body?.error_code === 'number' ? body.error_code : response.status;
      throw new TelegramApiError(`getUpdates failed: ${description}`, errorCode);
    }

    if (!Array.isArray(body.result)) {
      throw new TelegramApiError('getUpdates failed: malformed response');
    }

    return body.result.map(toUpdate).filter((update): update is TelegramUpdate => update !== null);
  }

  private async readBody(response: Response): Promise<Json | null> {
    try {
      const body: unknown = await response.json();
      return isRecord(body) ? body : null;
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'AbortError') throw err;
      return null;
    }
  }
}
