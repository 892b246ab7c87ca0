import { z } from 'zod';

/**
 * Shape a ready service answers with. Only `status` is required; anything else
 * in the document is ignored.
 */
export const HealthStatusSchema = z.object({
  status: z.union([z.string().trim().min(1), z.number(), z.boolean()]),
});

export type HealthDecode = { ok: true; status: string } | { ok: false; reason: string };

export function decodeHealthBody(body: string): HealthDecode {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return { ok: false, reason: 'response is not JSON' };
  }
  const parsed = HealthStatusSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: 'response has no status field' };
  }
  return { ok: true, status: String(parsed.data.status) };
}

/** Fetch a URL and resolve with its body. Rejects on network errors and non-2xx answers. */
export type HealthFetcher = (url: string, signal?: AbortSignal) => Promise<string>;

export class HealthHttpError extends Error {
  constructor(
    readonly statusCode: number,
    readonly body: string,
  ) {
    super(`HTTP ${statusCode}`);
    this.name = 'HealthHttpError';
  }
}

export function createHttpFetcher(opts: { timeoutMs: number }): HealthFetcher {
  return async (url, signal) => {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(new Error(`timed out after ${opts.timeoutMs}ms`)), opts.timeoutMs);
    try {
      const res = await fetch(url, { method: 'GET', signal: controller.signal });
      const body = await res.text();
      if (!res.ok) throw new HealthHttpError(res.status, body);
      return body;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  };
}

export function buildServiceUrl(host: string, port: number, path: string): string {
  const normalized = path.startsWith('/') ? path : `/${path}`;
  return `http://${host}:${port}${normalized}`;
}
