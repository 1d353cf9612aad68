import { TelegramNotifier } from './TelegramNotifier';
import { IMessageSender, SendMessageOptions, SendResult } from './types';
import { InMemorySubscribers } from '../../__tests__/helpers/inMemorySubscribers';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function createSender(results: Record<number, SendResult> = {}) {
  const sendMessage = jest.fn(
    async (chatId: number, _text: string, _options?: SendMessageOptions): Promise<SendResult> =>
      results[chatId] ?? { success: true },
  );
  const sender: IMessageSender = { sendMessage };
  return { sender, sendMessage };
}

describe('TelegramNotifier', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('sends the availability message to every subscriber as Markdown without previews', async () => {
    const { sender, sendMessage } = createSender();
    const notifier = new TelegramNotifier(sender, new InMemorySubscribers([1, 2]));

    await notifier.notify([{ id: '122626', name: 'Volkshochschule Lichtenberg', slotCount: 2 }]);

    expect(sendMessage).toHaveBeenCalledTimes(2);
    expect(sendMessage.mock.calls.map(call => call[0])).toEqual([1, 2]);
    const [, text, options] = sendMessage.mock.calls[0];
    expect(text).toContain('✅ *Volkshochschule Lichtenberg* (2 bookable days)');
    expect(options).toEqual({ parseMode: 'Markdown', disableWebPagePreview: true });
  });

  it('sends nothing for an empty delta', async () => {
    const { sender, sendMessage } = createSender();
    const notifier = new TelegramNotifier(sender, new InMemorySubscribers([1]));

    await notifier.notify([]);

    expect(sendMessage).not.toHaveBeenCalled();
  });

  it('keeps going after a failed delivery', async () => {
    const { sender, sendMessage } = createSender({ 1: { success: false, error: 'Forbidden: bot was blocked by the user' } });
    const subscribers = new InMemorySubscribers([1, 2]);
    const notifier = new TelegramNotifier(sender, subscribers);

    const summary = await notifier.broadcast('hello');

    expect(sendMessage).toHaveBeenCalledTimes(2);
    expect(summary).toEqual({ delivered: 1, failed: 1, removed: 0 });
    expect(subscribers.list()).toEqual([1, 2]);
  });

  it('unsubscribes chats Telegram no longer knows', async () => {
    const { sender } = createSender({ 2: { success: false, error: 'Bad Request: chat not found' } });
    const subscribers = new InMemorySubscribers([1, 2, 3]);
    const notifier = new TelegramNotifier(sender, subscribers);

    const summary = await notifier.broadcast('hello');

    expect(summary).toEqual({ delivered: 2, failed: 1, removed: 1 });
    expect(subscribers.list()).toEqual([1, 3]);
  });

  it('sends status updates as plain text', async () => {
    const { sender, sendMessage } = createSender();
    const notifier = new TelegramNotifier(sender, new InMemorySubscribers([7]));

    await notifier.notifyStatus('Bot is experiencing issues checking appointments', 'A: Connection refused');

    expect(sendMessage).toHaveBeenCalledWith(
      7,
      '⚠️ Bot Status Update:\nBot is experiencing issues checking appointments\nError: A: Connection refused',
      undefined,
    );
  });
});
