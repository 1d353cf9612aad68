import { Request, Response, NextFunction } from 'express';
import logger from './logger';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Transport-level failure talking to the booking site: connection refused,
 * DNS failure, request timeout.
 */
export class NetworkError extends AppError {
  public readonly url: string;
  public readonly timedOut: boolean;

  constructor(message: string, url: string, timedOut = false) {
    super(message, 502);
    this.url = url;
    this.timedOut = timedOut;
  }
}

/**
 * Final response of a redirect chain that was not a 200.
 */
export class HttpStatusError extends AppError {
  public readonly httpStatus: number;

  constructor(httpStatus: number) {
    super(`HTTP ${httpStatus}`, 502);
    this.httpStatus = httpStatus;
  }
}

/**
 * Availability page could not be parsed.
 */
export class PageParseError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}

/**
 * Invalid or missing environment configuration. Fatal at startup.
 */
export class ConfigError extends AppError {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(message, 500, false);
    this.variable = variable;
  }
}

/**
 * Telegram Bot API answered with `ok: false` or could not be reached.
 */
export class TelegramApiError extends AppError {
  public readonly errorCode?: number;

  constructor(message: string, errorCode?: number) {
    super(message, 502);
    this.errorCode = errorCode;
  }
}

export interface ErrorResponse {
  error: string;
}

/**
 * 4xx status carried by errors from Express middleware, such as body-parser
 * rejecting malformed JSON.
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    if (error.status >= 400 && error.status < 500) return error.status;
  }
  return undefined;
}

/**
 * Format an error for JSON response. Only operational AppErrors expose their
 * message; everything else becomes a generic body.
 */
export function formatError(error: unknown): ErrorResponse {
  if (error instanceof AppError && error.isOperational) {
    return { error: error.message };
  }
  if (clientErrorStatus(error) !== undefined) {
    return { error: 'Invalid request' };
  }
  return { error: 'Internal server error' };
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  return clientErrorStatus(error) ?? 500;
}

/**
 * Express error handling middleware
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = getErrorStatusCode(error);

  if (statusCode >= 500) {
    logger.error({ err: error, method: req.method, path: req.path }, 'request failed');
  }

  res.status(statusCode).json(formatError(error));
}

/**
 * Async route handler wrapper that forwards rejections to the error middleware
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

const URL_PATTERN = /https?:\/\/[^\s,)]+/gi;
const MAX_ERROR_LENGTH = 200;

/**
 * Known fetch/network error patterns mapped to short messages.
 */
const ERROR_SANITIZATION_MAP: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /ECONNREFUSED/i, replacement: 'Connection refused' },
  { pattern: /ECONNRESET/i, replacement: 'Connection reset' },
  { pattern: /ETIMEDOUT/i, replacement: 'Connection timed out' },
  { pattern: /ENOTFOUND|EAI_AGAIN/i, replacement: 'DNS lookup failed' },
  { pattern: /EHOSTUNREACH/i, replacement: 'Host unreachable' },
  { pattern: /ENETUNREACH/i, replacement: 'Network unreachable' },
  { pattern: /EPIPE/i, replacement: 'Connection broken' },
  { pattern: /abort|timeout/i, replacement: 'Request timed out' },
  { pattern: /certificate|self[- ]signed/i, replacement: 'TLS certificate error' },
];

/**
 * Reduce a transport error to a short message safe to show subscribers.
 * Node's fetch hides the errno in `cause`, so that is inspected first.
 */
export function sanitizeNetworkError(error: unknown): string {
  const parts: string[] = [];
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error) {
      if ('code' in cause && typeof cause.code === 'string') parts.push(cause.code);
      parts.push(cause.message);
    }
    parts.push(error.name, error.message);
  } else {
    parts.push(String(error));
  }
  const raw = parts.join(' ');

  for (const { pattern, replacement } of ERROR_SANITIZATION_MAP) {
    if (pattern.test(raw)) {
      return replacement;
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  let sanitized = message.replace(URL_PATTERN, '[redacted-url]');
  if (sanitized.length > MAX_ERROR_LENGTH) {
    sanitized = sanitized.substring(0, MAX_ERROR_LENGTH) + '...';
  }
  return sanitized || 'Unknown network error';
}
