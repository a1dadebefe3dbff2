export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

export type FakeReply = { status?: number; statusText?: string; body?: unknown; raw?: string } | Error;

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

function toResponse(reply: FakeReply): Response {
  if (reply instanceof Error) throw reply;
  const text = reply.raw ?? JSON.stringify(reply.body ?? {});
  return new Response(text, {
    status: reply.status ?? 200,
    statusText: reply.statusText ?? '',
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Scripted fetch: `route` picks the replies for a request URL. Replies for
 * a route are served in order and the last one repeats.
 */
export function createFakeFetch(route: (url: URL) => FakeReply[]) {
  const requests: RecordedRequest[] = [];
  const served = new Map<string, number>();

  const fetchFn: typeof fetch = async (input, init) => {
    const url = requestUrl(input);
    const rawBody = init?.body;
    requests.push({
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : null,
    });

    const parsed = new URL(url);
    const replies = route(parsed);
    const key = parsed.pathname;
    const index = served.get(key) ?? 0;
    served.set(key, index + 1);
    return toResponse(replies[Math.min(index, replies.length - 1)]);
  };

  return { fetchFn, requests };
}
