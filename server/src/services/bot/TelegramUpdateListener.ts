import logger from '../../utils/logger';
import { TelegramMessage, TelegramUpdate } from '../notifications/types';
import { BackoffConfig, RetryBackoff } from './backoff';

const LONG_POLL_TIMEOUT_SECONDS = 30;
const DEFAULT_DRAIN_TIMEOUT_MS = 3000;

export interface UpdateSource {
  getUpdates(offset: number | undefined, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
}

export interface MessageHandler {
  handle(message: TelegramMessage): Promise<void>;
}

export interface UpdateListenerOptions {
  timeoutSeconds?: number;
  backoff?: Partial<BackoffConfig>;
  /** How long `stop()` waits for message handlers that are still running. */
  drainTimeoutMs?: number;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done);
  });
}

/**
 * Long-polls Telegram for messages and hands each one to the handler.
 * Handlers run without blocking the next poll, so a slow /check does not
 * hold up other chats. `stop()` waits a bounded time for handlers that are
 * still replying.
 */
export class TelegramUpdateListener {
  private readonly source: UpdateSource;
  private readonly handler: MessageHandler;
  private readonly timeoutSeconds: number;
  private readonly backoff: RetryBackoff;
  private readonly drainTimeoutMs: number;
  private readonly inFlight = new Set<Promise<void>>();

  private offset: number | undefined;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(source: UpdateSource, handler: MessageHandler, options: UpdateListenerOptions = {}) {
    this.source = source;
    this.handler = handler;
    this.timeoutSeconds = options.timeoutSeconds ?? LONG_POLL_TIMEOUT_SECONDS;
    this.backoff = new RetryBackoff(options.backoff);
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
  }

  start(): void {
    if (this.loop) return;
    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal);
  }

  async stop(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    await this.loop;
    await this.drain();
    this.controller = null;
    this.loop = null;
  }

  /** Message handlers started but not yet finished. */
  pendingHandlers(): number {
    return this.inFlight.size;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  /** Offset of the next update to request; every update before it is acknowledged. */
  getOffset(): number | undefined {
    return this.offset;
  }

  private async run(signal: AbortSignal): Promise<void> {
    logger.info('listening for telegram updates');

    while (!signal.aborted) {
      let updates: TelegramUpdate[];
      try {
        updates = await this.source.getUpdates(this.offset, this.timeoutSeconds, signal);
      } catch (error) {
        if (signal.aborted) break;
        const delay = this.backoff.nextDelay();
        logger.warn({ err: error, retryInMs: delay }, 'failed to fetch telegram updates');
        await sleep(delay, signal);
        continue;
      }

      this.backoff.reset();
      for (const update of updates) {
        this.offset = Math.max(this.offset ?? 0, update.update_id + 1);
        if (update.message) {
          const task: Promise<void> = this.dispatch(update.message).finally(() => {
            this.inFlight.delete(task);
          });
          this.inFlight.add(task);
        }
      }
    }

    logger.info('stopped listening for telegram updates');
  }

  private async drain(): Promise<void> {
    if (this.inFlight.size === 0) return;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(true), this.drainTimeoutMs);
      timer.unref();
    });
    const settled = Promise.all(this.inFlight).then(() => false);

    const abandoned = await Promise.race([settled, timedOut]);
    clearTimeout(timer);

    if (abandoned) {
      logger.warn({ pending: this.inFlight.size, waitedMs: this.drainTimeoutMs }, 'abandoning in-flight message handlers');
    }
  }

  private async dispatch(message: TelegramMessage): Promise<void> {
    try {
      await this.handler.handle(message);
    } catch (error) {
      logger.error({ err: error, chatId: message.chat.id }, 'failed to handle message');
    }
  }
}
