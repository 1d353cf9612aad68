import { LOCATIONS, Location } from '../../config/locations';
import logger from '../../utils/logger';
import {
  WELCOME_MESSAGE,
  formatHelpMessage,
  formatManualCheckReport,
  formatStatusReport,
} from '../notifications/formatters';
import { IMessageSender, ISubscriberStore, SendMessageOptions, TelegramMessage } from '../notifications/types';
import type { MonitorSnapshot } from '../polling/AppointmentMonitor';
import { AggregateResult } from '../polling/types';

export const SUBSCRIBED_MESSAGE =
  "✅ You've been subscribed to appointment notifications!\nI'll notify you as soon as new appointments become available.";
export const ALREADY_SUBSCRIBED_MESSAGE = "You're already subscribed!";
export const UNSUBSCRIBED_MESSAGE = "You've been unsubscribed from notifications.";
export const NOT_SUBSCRIBED_MESSAGE = "You're not subscribed.";
export const CHECKING_MESSAGE = '🔍 Checking all VHS locations for appointments...';
export const CHECK_FAILED_MESSAGE = '❌ The check could not be completed. Please try again later.';
export const UNKNOWN_COMMAND_MESSAGE = 'Unknown command. Use /help to see what I can do.';

/** What the router needs from the appointment monitor. */
export interface AvailabilityChecker {
  checkNow(): Promise<AggregateResult>;
  getSnapshot(): MonitorSnapshot;
}

export interface CommandRouterDeps {
  sender: IMessageSender;
  subscribers: ISubscriberStore;
  checker: AvailabilityChecker;
  intervalMinutes: number;
  locations?: readonly Location[];
}

type CommandHandler = (chatId: number) => Promise<void>;

/**
 * Answers bot commands sent to the bot. Text that is not a command is ignored.
 */
export class CommandRouter {
  private readonly deps: CommandRouterDeps;
  private readonly locations: readonly Location[];
  private readonly handlers: Map<string, CommandHandler>;

  constructor(deps: CommandRouterDeps) {
    this.deps = deps;
    this.locations = deps.locations ?? LOCATIONS;
    this.handlers = new Map<string, CommandHandler>([
      ['start', chatId => this.reply(chatId, WELCOME_MESSAGE)],
      ['help', chatId => this.reply(chatId, formatHelpMessage(deps.intervalMinutes, this.locations), { parseMode: 'Markdown' })],
      ['subscribe', chatId => this.subscribe(chatId)],
      ['unsubscribe', chatId => this.unsubscribe(chatId)],
      ['status', chatId => this.status(chatId)],
      ['check', chatId => this.check(chatId)],
    ]);
  }

  /**
   * `/name`, `/name@SomeBot` and `/name args` all resolve to `name`.
   */
  static parseCommand(text: string | undefined): string | null {
    const match = /^\/([a-z0-9_]+)(?:@\w+)?(?:\s|$)/i.exec(text?.trim() ?? '');
    return match ? match[1].toLowerCase() : null;
  }

  async handle(message: TelegramMessage): Promise<void> {
    const command = CommandRouter.parseCommand(message.text);
    if (!command) return;

    const chatId = message.chat.id;
    logger.info({ chatId, command }, 'bot command received');

    const handler = this.handlers.get(command);
    if (!handler) {
      await this.reply(chatId, UNKNOWN_COMMAND_MESSAGE);
      return;
    }
    await handler(chatId);
  }

  private async subscribe(chatId: number): Promise<void> {
    if (!this.deps.subscribers.add(chatId)) {
      await this.reply(chatId, ALREADY_SUBSCRIBED_MESSAGE);
      return;
    }
    logger.info({ chatId }, 'new subscriber');
    await this.reply(chatId, SUBSCRIBED_MESSAGE);
  }

  private async unsubscribe(chatId: number): Promise<void> {
    if (!this.deps.subscribers.remove(chatId)) {
      await this.reply(chatId, NOT_SUBSCRIBED_MESSAGE);
      return;
    }
    logger.info({ chatId }, 'unsubscribed');
    await this.reply(chatId, UNSUBSCRIBED_MESSAGE);
  }

  private async status(chatId: number): Promise<void> {
    const snapshot = this.deps.checker.getSnapshot();
    const text = formatStatusReport({
      subscribed: this.deps.subscribers.has(chatId),
      subscriberCount: this.deps.subscribers.size,
      intervalMinutes: this.deps.intervalMinutes,
      checkTimes: snapshot.locationCheckTimes.map(({ name, checkedAt }) => ({ name, checkedAt })),
    });
    await this.reply(chatId, text, { parseMode: 'Markdown' });
  }

  private async check(chatId: number): Promise<void> {
    await this.reply(chatId, CHECKING_MESSAGE);

    let result: AggregateResult;
    try {
      result = await this.deps.checker.checkNow();
    } catch (error) {
      logger.error({ err: error, chatId }, 'manual check failed');
      await this.reply(chatId, CHECK_FAILED_MESSAGE);
      return;
    }

    await this.reply(chatId, formatManualCheckReport(result), { disableWebPagePreview: true });
  }

  private async reply(chatId: number, text: string, options?: SendMessageOptions): Promise<void> {
    const result = await this.deps.sender.sendMessage(chatId, text, options);
    if (!result.success) {
      logger.warn({ chatId, error: result.error }, 'failed to send reply');
    }
  }
}
