import { vi } from 'vitest';

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

export type FetchHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function textResponse(body: string, status: number, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

/**
 * Replace global fetch with a handler. Returns the list of requests seen.
 */
export function stubFetch(handler: FetchHandler): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const rawBody = typeof init?.body === 'string' ? init.body : null;
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url,
      headers: new Headers(init?.headers),
      body: rawBody === null ? null : JSON.parse(rawBody),
    };
    requests.push(request);
    return handler(request);
  });
  vi.stubGlobal('fetch', fetchMock);
  return requests;
}

export function episodeRecord(id: number, airDateUtc: string | null, overrides: Record<string, unknown> = {}) {
  return {
    id,
    title: `Episode ${id}`,
    monitored: true,
    airDateUtc,
    seasonNumber: 1,
    episodeNumber: id,
    series: { title: 'Test Show' },
    ...overrides,
  };
}

export function movieRecord(id: number, added: string | null, overrides: Record<string, unknown> = {}) {
  return {
    id,
    title: `Movie ${id}`,
    monitored: true,
    added,
    ...overrides,
  };
}

export function wantedPage(records: unknown[], page = 1, pageSize = 50, totalRecords = records.length) {
  return { page, pageSize, totalRecords, records };
}

export function commandResponse(id: number, name = 'EpisodeSearch', status = 'queued') {
  return { id, name, status, queued: '2026-03-10T12:00:00Z' };
}

/**
 * A Sonarr that lists `records` (paged by the requested pageSize) and
 * accepts every search command.
 */
export function sonarrBacklog(records: unknown[]): FetchHandler {
  let commandId = 0;
  return (request) => {
    if (request.url.pathname === '/api/v3/wanted/missing' || request.url.pathname === '/api/v3/wanted/cutoff') {
      const page = Number(request.url.searchParams.get('page') ?? '1');
      const pageSize = Number(request.url.searchParams.get('pageSize') ?? '50');
      const slice = records.slice((page - 1) * pageSize, page * pageSize);
      return jsonResponse(wantedPage(slice, page, pageSize, records.length));
    }
    if (request.url.pathname === '/api/v3/command' && request.method === 'POST') {
      commandId += 1;
      return jsonResponse(commandResponse(commandId), 201);
    }
    return jsonResponse({ message: 'NotFound' }, 404);
  };
}
