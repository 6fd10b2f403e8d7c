/**
 * HTTP client shared by the remote source adapters
 */

import type { z } from 'zod';
import type { SourceType } from '@skillforge/ipc';
import { SourceApiError, SourceDecodeError, SourceRequestError, SourcesError } from '../errors';
import { linkAbort } from '../utils/abort';

export const USER_AGENT = 'SkillForge/1.0';
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
/** Raw file bodies are cut off at 1 MiB */
export const MAX_CONTENT_BYTES = 1024 * 1024;

export interface HttpSourceClientOptions {
  source: SourceType;
  baseUrl: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface RequestOptions {
  method?: 'GET' | 'HEAD';
  headers?: Record<string, string>;
  /** Leave out the client's configured headers (credentials); only User-Agent is kept */
  anonymous?: boolean;
  signal?: AbortSignal;
}

export class HttpSourceClient {
  readonly source: SourceType;
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: HttpSourceClientOptions) {
    this.source = options.source;
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.headers = { 'User-Agent': USER_AGENT, ...options.headers };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /** Absolute URLs pass through; paths are joined onto the base URL */
  url(pathOrUrl: string): string {
    return /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`;
  }

  /**
   * GET a JSON document and validate it. Non-2xx answers reject with
   * SourceApiError, malformed bodies with SourceDecodeError.
   */
  async fetchJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, signal?: AbortSignal): Promise<T> {
    return this.withResponse(path, { signal }, async (res) => {
      await this.assertOk(res);

      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        throw new SourceDecodeError(this.source, 'invalid JSON', { cause: err });
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
        throw new SourceDecodeError(this.source, detail, { cause: parsed.error });
      }
      return parsed.data;
    });
  }

  /** GET a raw body as UTF-8 text, truncated to MAX_CONTENT_BYTES */
  async fetchText(path: string, options?: RequestOptions): Promise<string> {
    return this.withResponse(path, options ?? {}, async (res) => {
      await this.assertOk(res);
      const bytes = Buffer.from(await res.arrayBuffer());
      return bytes.subarray(0, MAX_CONTENT_BYTES).toString('utf8');
    });
  }

  /** Status code of a HEAD request */
  async probe(path: string, signal?: AbortSignal): Promise<number> {
    return this.withResponse(path, { method: 'HEAD', signal }, async (res) => res.status);
  }

  private async withResponse<T>(path: string, options: RequestOptions, handle: (res: Response) => Promise<T>): Promise<T> {
    const linked = linkAbort(options.signal, this.timeoutMs);

    try {
      const res = await fetch(this.url(path), {
        method: options.method ?? 'GET',
        headers: { ...(options.anonymous ? { 'User-Agent': USER_AGENT } : this.headers), ...options.headers },
        signal: linked.signal,
      });
      return await handle(res);
    } catch (err) {
      if (err instanceof SourcesError) throw err;
      throw new SourceRequestError(this.source, err);
    } finally {
      linked.dispose();
    }
  }

  private async assertOk(res: Response): Promise<void> {
    if (res.ok) return;
    const body = await res.text().catch(() => '');
    throw new SourceApiError(this.source, res.status, body);
  }
}

export function isApiStatus(err: unknown, ...statuses: number[]): err is SourceApiError {
  return err instanceof SourceApiError && statuses.includes(err.statusCode);
}

/**
 * Split a slash-separated skill id into path segments. Empty, `.` and `..`
 * segments make the id malformed (`null`).
 */
export function idSegments(id: string): string[] | null {
  const segments = id.split('/');
  return segments.every((s) => s !== '' && s !== '.' && s !== '..') ? segments : null;
}

/** URL path from raw segments, each percent-encoded */
export function encodePath(segments: readonly string[]): string {
  return segments.map(encodeURIComponent).join('/');
}

export function decodeBase64(content: string): string {
  return Buffer.from(content, 'base64').toString('utf8');
}
