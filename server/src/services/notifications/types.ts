import { AvailableLocation } from '../polling/types';

/**
 * Result of delivering one message to one chat.
 */
export interface SendResult {
  success: boolean;
  error?: string;
}

export type ParseMode = 'Markdown' | 'MarkdownV2' | 'HTML';

export interface SendMessageOptions {
  parseMode?: ParseMode;
  disableWebPagePreview?: boolean;
}

/**
 * Delivers availability and status messages to everyone subscribed.
 * Implementations log per-recipient failures instead of rejecting.
 */
export interface INotifier {
  notify(locations: AvailableLocation[]): Promise<void>;
  notifyStatus(status: string, error?: string): Promise<void>;
}

export interface ISubscriberStore {
  list(): number[];
  has(chatId: number): boolean;
  /** Returns false when the chat was already subscribed. */
  add(chatId: number): boolean;
  /** Returns false when the chat was not subscribed. */
  remove(chatId: number): boolean;
  readonly size: number;
}

export interface IMessageSender {
  sendMessage(chatId: number, text: string, options?: SendMessageOptions): Promise<SendResult>;
}

// Subset of the Bot API objects the bot reads

export interface TelegramChat {
  id: number;
  type: string;
}

export interface TelegramMessage {
  message_id: number;
  chat: TelegramChat;
  text?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}
