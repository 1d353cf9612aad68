import { BOOKING_BASE_URL } from '../../config/locations';
import { NetworkError, sanitizeNetworkError } from '../../utils/errors';
import logger from '../../utils/logger';
import { WalkResult } from './types';

export const MAX_REDIRECTS = 5;
export const SESSION_COOKIE_NAME = 'Zmsappointment';

const REQUEST_TIMEOUT_MS = 30_000;
const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

/**
 * The booking site turns away requests that do not look like a browser
 * navigation, so every request carries a desktop Chrome header set.
 */
export const BROWSER_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9,de;q=0.8',
  'Accept-Encoding': 'gzip, deflate, br',
  'Cache-Control': 'no-cache',
  'Pragma': 'no-cache',
  'Sec-Ch-Ua': '"Not_A Brand";v="8", "Chromium";v="120", "Google Chrome";v="120"',
  'Sec-Ch-Ua-Mobile': '?0',
  'Sec-Ch-Ua-Platform': '"macOS"',
  'Sec-Fetch-Dest': 'document',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-Site': 'none',
  'Sec-Fetch-User': '?1',
  'Upgrade-Insecure-Requests': '1',
});

export interface RedirectWalkerOptions {
  baseUrl?: string;
  maxRedirects?: number;
  timeoutMs?: number;
  cookieName?: string;
}

interface RawResponse {
  status: number;
  location: string | null;
  setCookie: string | null;
  body: string;
}

/**
 * Follows the booking site's redirect chain by hand so the session cookie set
 * on the first hop is echoed back on every later hop. Cookie state lives only
 * for the duration of one `follow` call.
 */
export class RedirectWalker {
  private readonly baseUrl: string;
  private readonly maxRedirects: number;
  private readonly timeoutMs: number;
  private readonly cookieName: string;

  constructor(options: RedirectWalkerOptions = {}) {
    this.baseUrl = (options.baseUrl ?? BOOKING_BASE_URL).replace(/\/+$/, '');
    this.maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.cookieName = options.cookieName ?? SESSION_COOKIE_NAME;
  }

  /**
   * GET `startUrl` and follow up to `maxRedirects` redirects. Running out of
   * redirects is not a failure: the last response is returned with
   * `maxRedirectsReached` set. Transport failures end the walk immediately.
   */
  async follow(startUrl: string): Promise<WalkResult> {
    const cookies = new Map<string, string>();
    let currentUrl = startUrl;
    let redirects = 0;

    for (;;) {
      let response: RawResponse;
      try {
        response = await this.request(currentUrl, cookies);
      } catch (error) {
        return { ok: false, error: this.toNetworkError(error, currentUrl) };
      }

      this.captureSessionCookie(response.setCookie, cookies);

      const location = REDIRECT_STATUSES.has(response.status) ? response.location : null;
      if (!location) {
        return {
          ok: true,
          response: { status: response.status, url: currentUrl, body: response.body, redirects, maxRedirectsReached: false },
        };
      }

      if (redirects >= this.maxRedirects) {
        logger.warn({ url: currentUrl, maxRedirects: this.maxRedirects }, 'max redirects reached');
        return {
          ok: true,
          response: { status: response.status, url: currentUrl, body: response.body, redirects, maxRedirectsReached: true },
        };
      }

      currentUrl = this.resolveLocation(location, currentUrl);
      redirects++;
      logger.debug({ to: currentUrl, redirects }, 'following redirect');
    }
  }

  private async request(url: string, cookies: Map<string, string>): Promise<RawResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = { ...BROWSER_HEADERS };
    if (cookies.size > 0) {
      headers['Cookie'] = Array.from(cookies, ([name, value]) => `${name}=${value}`).join('; ');
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        redirect: 'manual',
        signal: controller.signal,
      });

      // Drain redirect bodies too so the connection goes back to the pool
      const body = await response.text();

      return {
        status: response.status,
        location: response.headers.get('location'),
        setCookie: response.headers.get('set-cookie'),
        body,
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private captureSessionCookie(setCookie: string | null, cookies: Map<string, string>): void {
    if (!setCookie) return;

    const marker = `${this.cookieName}=`;
    const start = setCookie.indexOf(marker);
    if (start === -1) return;

    const rest = setCookie.slice(start + marker.length);
    const end = rest.indexOf(';');
    const value = end === -1 ? rest : rest.slice(0, end);

    cookies.set(this.cookieName, value);
    logger.debug({ cookie: `${value.slice(0, 10)}...` }, 'session cookie set');
  }

  private resolveLocation(location: string, currentUrl: string): string {
    if (location.startsWith('http')) return location;
    if (location.startsWith('/')) return this.baseUrl + location;
    return new URL(location, currentUrl).toString();
  }

  private toNetworkError(error: unknown, url: string): NetworkError {
    const timedOut = error instanceof Error && error.name === 'AbortError';
    const message = timedOut ? `Request timed out after ${this.timeoutMs}ms` : sanitizeNetworkError(error);
    logger.warn({ url, error: message }, 'request failed');
    return new NetworkError(message, url, timedOut);
  }
}
