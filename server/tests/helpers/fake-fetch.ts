export interface FetchCall {
  url: string;
  headers: Headers;
  body: unknown;
}

type Responder = (call: FetchCall, signal: AbortSignal | undefined) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

export function completionBody(content: string): unknown {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1_700_000_000,
    model: 'test-model',
    choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content } }]
  };
}

/**
 * Resolves only when the request is aborted, then rejects like fetch does.
 */
export function hangUntilAborted(_call: FetchCall, signal: AbortSignal | undefined): Promise<Response> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new DOMException('The operation was aborted.', 'AbortError')));
  });
}

/**
 * In-process stand-in for the HTTP transport of the openai client.
 */
export function createFakeFetch(respond: Responder) {
  const calls: FetchCall[] = [];

  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const rawBody = init?.body;
    const call: FetchCall = {
      url,
      headers: new Headers(init?.headers),
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined
    };
    calls.push(call);
    return respond(call, init?.signal ?? undefined);
  };

  return { fetch: fetchImpl, calls };
}
