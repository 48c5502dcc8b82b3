import { vi } from 'vitest';

export type FetchMock = ReturnType<typeof vi.fn<typeof fetch>>;

/** Streams the given pieces as a response body, one enqueue per piece. */
export function sseResponse(pieces: string[], status = 200): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const piece of pieces) controller.enqueue(encoder.encode(piece));
      controller.close();
    },
  });
  return new Response(body, { status, headers: { 'Content-Type': 'text/event-stream' } });
}

export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), { status, headers: { 'Content-Type': 'application/json' } });
}

export function stubFetch(...responses: Array<Response | Error>): FetchMock {
  const mock = vi.fn<typeof fetch>();
  for (const response of responses) {
    if (response instanceof Error) mock.mockRejectedValueOnce(response);
    else mock.mockResolvedValueOnce(response);
  }
  vi.stubGlobal('fetch', mock);
  return mock;
}

export function requestOf(mock: FetchMock, call = 0): { url: string; headers: unknown; body: unknown } {
  const [input, init] = mock.mock.calls[call] ?? [];
  const body = typeof init?.body === 'string' ? JSON.parse(init.body) : null;
  return { url: String(input), headers: init?.headers, body };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}
