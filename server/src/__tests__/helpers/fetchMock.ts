/**
 * Minimal stand-ins for fetch responses. Only the members the code under test
 * reads are implemented.
 */
export interface MockResponseInit {
  status: number;
  headers?: Record<string, string>;
  body?: string;
}

export interface MockResponse {
  status: number;
  ok: boolean;
  headers: { get(name: string): string | null };
  text: jest.Mock<Promise<string>, []>;
  json: jest.Mock<Promise<unknown>, []>;
}

export function mockResponse({ status, headers = {}, body = '' }: MockResponseInit): MockResponse {
  const lower = new Map(Object.entries(headers).map(([k, v]) => [k.toLowerCase(), v]));
  return {
    status,
    ok: status >= 200 && status < 300,
    headers: { get: (name: string) => lower.get(name.toLowerCase()) ?? null },
    text: jest.fn<Promise<string>, []>().mockResolvedValue(body),
    json: jest.fn<Promise<unknown>, []>().mockImplementation(async () => JSON.parse(body)),
  };
}

export function jsonResponse(status: number, payload: unknown): MockResponse {
  return mockResponse({ status, headers: { 'content-type': 'application/json' }, body: JSON.stringify(payload) });
}

/** A fetch failure the way Node reports it: TypeError with an errno cause. */
export function fetchFailure(code: string, message: string): TypeError {
  const cause = Object.assign(new Error(message), { code });
  return new TypeError('fetch failed', { cause });
}
