import type { z } from 'zod';
import {
  describeError,
  UpstreamFetchError,
  type Upstream,
  UpstreamAuthError,
} from './upstream.errors';

export type UpstreamRequest<T extends z.ZodTypeAny> = {
  upstream: Upstream;
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  schema: T;
  /** Which error a failure of this call maps to. */
  failure?: 'auth' | 'fetch';
};

function fail(
  req: { upstream: Upstream; failure?: 'auth' | 'fetch' },
  message: string,
  status: number | null,
  cause?: unknown,
) {
  return req.failure === 'auth'
    ? new UpstreamAuthError(req.upstream, message, status, cause)
    : new UpstreamFetchError(req.upstream, message, status, cause);
}

/**
 * One outbound JSON call with a hard timeout. No retries: every failure is
 * thrown as an upstream error and ends the current request.
 */
export async function upstreamJson<T extends z.ZodTypeAny>(
  req: UpstreamRequest<T>,
): Promise<z.infer<T>> {
  let res: Response;
  try {
    res = await fetch(req.url, {
      method: req.method ?? 'GET',
      headers: {
        accept: 'application/json',
        ...(req.body !== undefined ? { 'content-type': 'application/json' } : {}),
        ...req.headers,
      },
      body: req.body === undefined ? undefined : JSON.stringify(req.body),
      signal: AbortSignal.timeout(req.timeoutMs),
    });
  } catch (e) {
    throw fail(req, `${req.upstream} unreachable: ${describeError(e)}`, null, e);
  }

  if (!res.ok) {
    throw fail(req, `${req.upstream} error: ${res.status}`, res.status);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (e) {
    throw fail(req, `${req.upstream} returned invalid JSON`, res.status, e);
  }

  const parsed = req.schema.safeParse(body);
  if (!parsed.success) {
    throw fail(
      req,
      `${req.upstream} returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      res.status,
      parsed.error,
    );
  }
  return parsed.data;
}
