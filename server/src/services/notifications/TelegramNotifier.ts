import logger from '../../utils/logger';
import { AvailableLocation } from '../polling/types';
import { formatAvailabilityMessage, formatStatusUpdate } from './formatters';
import { IMessageSender, INotifier, ISubscriberStore, SendMessageOptions } from './types';

const CHAT_NOT_FOUND = /chat not found/i;

export interface BroadcastSummary {
  delivered: number;
  failed: number;
  removed: number;
}

/**
 * Sends notifications to every subscribed chat, one at a time. Chats that
 * Telegram no longer knows are unsubscribed.
 */
export class TelegramNotifier implements INotifier {
  private readonly sender: IMessageSender;
  private readonly subscribers: ISubscriberStore;

  constructor(sender: IMessageSender, subscribers: ISubscriberStore) {
    this.sender = sender;
    this.subscribers = subscribers;
  }

  async notify(locations: AvailableLocation[]): Promise<void> {
    if (locations.length === 0) return;

    const summary = await this.broadcast(formatAvailabilityMessage(locations), {
      parseMode: 'Markdown',
      disableWebPagePreview: true,
    });
    logger.info({ locations: locations.length, ...summary }, 'availability notification sent');
  }

  async notifyStatus(status: string, error?: string): Promise<void> {
    const summary = await this.broadcast(formatStatusUpdate(status, error));
    logger.info({ ...summary }, 'status notification sent');
  }

  async broadcast(text: string, options?: SendMessageOptions): Promise<BroadcastSummary> {
    const summary: BroadcastSummary = { delivered: 0, failed: 0, removed: 0 };

    for (const chatId of this.subscribers.list()) {
      const result = await this.sender.sendMessage(chatId, text, options);

      if (result.success) {
        summary.delivered++;
        logger.debug({ chatId }, 'notification delivered');
        continue;
      }

      summary.failed++;
      logger.error({ chatId, error: result.error }, 'failed to send notification');

      if (result.error && CHAT_NOT_FOUND.test(result.error)) {
        this.subscribers.remove(chatId);
        summary.removed++;
        logger.info({ chatId }, 'removed subscriber with unknown chat');
      }
    }

    return summary;
  }
}
