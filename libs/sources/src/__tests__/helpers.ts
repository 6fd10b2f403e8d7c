/**
 * Shared fetch stub for adapter tests
 */

export interface Reply {
  status?: number;
  json?: unknown;
  text?: string;
}

/**
 * Answer fetch calls from a URL → reply table. Unknown URLs get a 404 and
 * aborted signals reject, as with the real fetch.
 * A fresh Response is built per call since bodies are single-use.
 */
export function serve(table: Record<string, Reply>) {
  return jest.spyOn(globalThis, 'fetch').mockImplementation(async (input, init) => {
    if (init?.signal?.aborted) throw init.signal.reason;
    const reply = table[String(input)];
    if (!reply) return new Response('not found', { status: 404 });

    const body = reply.json !== undefined ? JSON.stringify(reply.json) : (reply.text ?? null);
    return new Response(init?.method === 'HEAD' ? null : body, { status: reply.status ?? 200 });
  });
}

export function base64(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64');
}

/** Headers of the nth fetch call, as passed by the client */
export function headersOf(spy: ReturnType<typeof serve>, call = 0): Record<string, unknown> {
  const headers = spy.mock.calls[call]?.[1]?.headers;
  return headers && !Array.isArray(headers) && !(headers instanceof Headers) ? headers : {};
}
