import { type Mock, vi } from 'vitest';

export const credentials = {
  username: 'test-user',
  password: 'test-secret',
};

export const jsonResponse = (data: unknown, status = 200): Response =>
  new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });

export const textResponse = (body: string, status: number): Response => new Response(body, { status });

export const emptyResponse = (status = 200): Response => new Response(null, { status });

export type FetchMock = Mock<typeof fetch>;

export function stubFetch(): FetchMock {
  const mockFetch = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

export interface CapturedRequest {
  url: URL;
  method?: string;
  headers: Headers;
  body: RequestInit['body'];
  signal?: AbortSignal | null;
}

export function requestAt(mockFetch: FetchMock, index = 0): CapturedRequest {
  const call = mockFetch.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${mockFetch.mock.calls.length} time(s), expected call #${index + 1}`);
  }
  const [input, init] = call;
  return {
    url: new URL(String(input)),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: init?.body,
    signal: init?.signal,
  };
}

export function formBody(request: CapturedRequest): FormData {
  if (!(request.body instanceof FormData)) {
    throw new Error('request body is not multipart form data');
  }
  return request.body;
}

export function jsonBody(request: CapturedRequest): unknown {
  if (typeof request.body !== 'string') {
    throw new Error('request body is not a string');
  }
  return JSON.parse(request.body);
}

/** Settles with whatever the promise rejects with; fails if it resolves. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
}
