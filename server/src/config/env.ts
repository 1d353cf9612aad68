import { ConfigError } from '../utils/errors';

export interface AppConfig {
  telegramBotToken: string;
  /** Chat subscribed on startup, e.g. the operator's own chat. */
  defaultChatId: number | null;
  checkIntervalMinutes: number;
  subscribersFile: string;
  pollConcurrency: number;
  port: number;
}

const DEFAULT_CHECK_INTERVAL_MINUTES = 5;
const DEFAULT_SUBSCRIBERS_FILE = 'subscribers.json';
const DEFAULT_POLL_CONCURRENCY = 1;
const MAX_POLL_CONCURRENCY = 4;
const DEFAULT_PORT = 3001;

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw) || parseInt(raw, 10) < 1) {
    throw new ConfigError(name, `${name} must be a positive integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function parseChatId(env: NodeJS.ProcessEnv): number | null {
  const raw = env.TELEGRAM_CHAT_ID?.trim();
  if (!raw) return null;
  // Group chats have negative ids
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError('TELEGRAM_CHAT_ID', `TELEGRAM_CHAT_ID must be a numeric chat id, got "${raw}"`);
  }
  return Number(raw);
}

/**
 * Read and validate the process configuration. Call after dotenv has loaded
 * `.env`; throws ConfigError on the first invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const telegramBotToken = env.TELEGRAM_BOT_TOKEN?.trim();
  if (!telegramBotToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN', 'TELEGRAM_BOT_TOKEN not found in environment variables');
  }

  const pollConcurrency = parsePositiveInt(env, 'POLL_CONCURRENCY', DEFAULT_POLL_CONCURRENCY);
  if (pollConcurrency > MAX_POLL_CONCURRENCY) {
    throw new ConfigError(
      'POLL_CONCURRENCY',
      `POLL_CONCURRENCY must be at most ${MAX_POLL_CONCURRENCY} to stay polite to the booking site`,
    );
  }

  return {
    telegramBotToken,
    defaultChatId: parseChatId(env),
    checkIntervalMinutes: parsePositiveInt(env, 'CHECK_INTERVAL_MINUTES', DEFAULT_CHECK_INTERVAL_MINUTES),
    subscribersFile: env.SUBSCRIBERS_FILE?.trim() || DEFAULT_SUBSCRIBERS_FILE,
    pollConcurrency,
    port: parsePositiveInt(env, 'PORT', DEFAULT_PORT),
  };
}
