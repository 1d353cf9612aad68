import { Request, Response, NextFunction } from 'express';
import {
  AppError,
  NetworkError,
  HttpStatusError,
  PageParseError,
  ConfigError,
  TelegramApiError,
  formatError,
  getErrorStatusCode,
  errorHandler,
  asyncHandler,
  sanitizeNetworkError,
} from './errors';

jest.mock('./logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import logger from './logger';

describe('Error classes', () => {
  it('keeps the subclass name and prototype chain', () => {
    const error = new NetworkError('Connection refused', 'https://service.berlin.de/x');
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('NetworkError');
    expect(error.url).toBe('https://service.berlin.de/x');
    expect(error.timedOut).toBe(false);
  });

  it('marks timeouts on NetworkError', () => {
    expect(new NetworkError('Request timed out', 'u', true).timedOut).toBe(true);
  });

  it('formats HttpStatusError messages from the status code', () => {
    const error = new HttpStatusError(503);
    expect(error.message).toBe('HTTP 503');
    expect(error.httpStatus).toBe(503);
  });

  it('treats ConfigError as non-operational', () => {
    const error = new ConfigError('TELEGRAM_BOT_TOKEN', 'TELEGRAM_BOT_TOKEN is required');
    expect(error.isOperational).toBe(false);
    expect(error.variable).toBe('TELEGRAM_BOT_TOKEN');
  });

  it('carries the Bot API error code', () => {
    expect(new TelegramApiError('Bad Request: chat not found', 400).errorCode).toBe(400);
  });
});

describe('formatError', () => {
  it('exposes operational error messages', () => {
    expect(formatError(new PageParseError('unexpected markup'))).toEqual({ error: 'unexpected markup' });
  });

  it('hides non-operational and unknown errors', () => {
    expect(formatError(new ConfigError('PORT', 'bad port'))).toEqual({ error: 'Internal server error' });
    expect(formatError(new Error('secret detail'))).toEqual({ error: 'Internal server error' });
  });
});

describe('getErrorStatusCode', () => {
  it('uses the AppError status code', () => {
    expect(getErrorStatusCode(new AppError('nope', 429))).toBe(429);
  });

  it('defaults to 500', () => {
    expect(getErrorStatusCode('boom')).toBe(500);
  });

  it('keeps the client status of middleware errors', () => {
    const parseFailure = Object.assign(new Error('Unexpected token n in JSON'), { status: 400 });

    expect(getErrorStatusCode(parseFailure)).toBe(400);
    expect(formatError(parseFailure)).toEqual({ error: 'Invalid request' });
  });

  it('ignores server statuses carried by plain errors', () => {
    const upstream = Object.assign(new Error('upstream'), { status: 503 });

    expect(getErrorStatusCode(upstream)).toBe(500);
    expect(formatError(upstream)).toEqual({ error: 'Internal server error' });
  });
});

describe('errorHandler middleware', () => {
  let mockReq: Partial<Request>;
  let mockRes: Partial<Response>;
  let mockNext: NextFunction;

  beforeEach(() => {
    jest.clearAllMocks();
    mockReq = { method: 'POST', path: '/api/check' };
    mockRes = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn(),
    };
    mockNext = jest.fn();
  });

  it('answers client errors without logging', () => {
    errorHandler(new AppError('Too many checks', 429), mockReq as Request, mockRes as Response, mockNext);

    expect(mockRes.status).toHaveBeenCalledWith(429);
    expect(mockRes.json).toHaveBeenCalledWith({ error: 'Too many checks' });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs server errors and hides their message', () => {
    errorHandler(new Error('db exploded'), mockReq as Request, mockRes as Response, mockNext);

    expect(mockRes.status).toHaveBeenCalledWith(500);
    expect(mockRes.json).toHaveBeenCalledWith({ error: 'Internal server error' });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});

describe('asyncHandler', () => {
  it('forwards rejections to next', async () => {
    const error = new Error('Async error');
    const next = jest.fn();
    const handler = asyncHandler(async () => {
      throw error;
    });

    handler({} as Request, {} as Response, next);
    await new Promise(resolve => setImmediate(resolve));

    expect(next).toHaveBeenCalledWith(error);
  });
});

describe('sanitizeNetworkError', () => {
  function fetchFailure(code: string, message: string): TypeError {
    const cause = Object.assign(new Error(message), { code });
    return new TypeError('fetch failed', { cause });
  }

  it('reads the errno from the fetch cause', () => {
    expect(sanitizeNetworkError(fetchFailure('ECONNREFUSED', 'connect ECONNREFUSED 1.2.3.4:443'))).toBe('Connection refused');
    expect(sanitizeNetworkError(fetchFailure('ENOTFOUND', 'getaddrinfo ENOTFOUND service.berlin.de'))).toBe('DNS lookup failed');
  });

  it('maps aborted requests to a timeout', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    expect(sanitizeNetworkError(abort)).toBe('Request timed out');
  });

  it('maps certificate failures', () => {
    expect(sanitizeNetworkError(fetchFailure('CERT_HAS_EXPIRED', 'certificate has expired'))).toBe('TLS certificate error');
  });

  it('redacts URLs from unknown messages', () => {
    expect(sanitizeNetworkError(new Error('bad thing at https://service.berlin.de/terminvereinbarung'))).toBe('bad thing at [redacted-url]');
  });

  it('caps long messages', () => {
    const result = sanitizeNetworkError(new Error('x'.repeat(300)));
    expect(result).toBe('x'.repeat(200) + '...');
  });

  it('handles non-Error values', () => {
    expect(sanitizeNetworkError('socket hang up')).toBe('socket hang up');
  });
});
