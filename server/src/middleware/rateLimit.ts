import rateLimit from 'express-rate-limit';

export interface RateLimitConfig {
  windowMs: number;
  max: number;
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const value = parseInt(env[name] || '', 10);
  return Number.isNaN(value) || value < 1 ? fallback : value;
}

export function parseRateLimitConfig(env: NodeJS.ProcessEnv = process.env): {
  global: RateLimitConfig;
  check: RateLimitConfig;
} {
  return {
    global: {
      windowMs: readInt(env, 'RATE_LIMIT_WINDOW_MS', 900_000),
      max: readInt(env, 'RATE_LIMIT_MAX', 300),
    },
    check: {
      windowMs: readInt(env, 'CHECK_RATE_LIMIT_WINDOW_MS', 60_000),
      max: readInt(env, 'CHECK_RATE_LIMIT_MAX', 3),
    },
  };
}

export function createGlobalRateLimit(config?: Partial<RateLimitConfig>) {
  const defaults = parseRateLimitConfig().global;
  const isDev = process.env.NODE_ENV === 'development';
  return rateLimit({
    windowMs: config?.windowMs ?? defaults.windowMs,
    max: config?.max ?? defaults.max,
    skip: isDev ? () => true : undefined,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
}

/**
 * Manual checks hit all booking-site locations, so they get a much tighter
 * budget than the read-only routes. Applies in development too.
 */
export function createCheckRateLimit(config?: Partial<RateLimitConfig>) {
  const defaults = parseRateLimitConfig().check;
  return rateLimit({
    windowMs: config?.windowMs ?? defaults.windowMs,
    max: config?.max ?? defaults.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many manual checks, please try again later' },
  });
}
