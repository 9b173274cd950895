import type { FetchLike } from '../../src/adapters/credentials/credentialBackendClient';

export type FetchCall = { url: string; method: string; body?: string; headers: Record<string, string> };

export type FetchReply = Response | Error | ((call: FetchCall) => Response | Promise<Response>);

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function emptyResponse(status: number, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, headers });
}

function headersOf(init: RequestInit): Record<string, string> {
  const result: Record<string, string> = {};
  new Headers(init.headers).forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

/**
 * Scripted fetch. `route` picks the reply for each call; calls are recorded in
 * order.
 */
export function makeFetchFake(route: (call: FetchCall) => FetchReply): { fetchImpl: FetchLike; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const call: FetchCall = {
      url,
      method: init.method ?? 'GET',
      body: typeof init.body === 'string' ? init.body : undefined,
      headers: headersOf(init),
    };
    calls.push(call);
    const reply = route(call);
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === 'function') {
      return reply(call);
    }
    return reply;
  };
  return { fetchImpl, calls };
}
