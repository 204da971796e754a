import { HttpException, HttpStatus } from '@nestjs/common';

export type Upstream = 'swyftx' | 'coingecko';

export type UpstreamErrorBody = {
  statusCode: number;
  error: string;
  message: string;
  upstream: Upstream;
  upstreamStatus: number | null;
};

/**
 * Outbound call failed. Surfaces as 502, carrying the upstream HTTP status
 * when the upstream answered at all.
 */
export abstract class UpstreamError extends HttpException {
  readonly upstream: Upstream;
  readonly upstreamStatus: number | null;

  protected constructor(
    error: string,
    upstream: Upstream,
    message: string,
    upstreamStatus: number | null,
    cause?: unknown,
  ) {
    const body: UpstreamErrorBody = {
      statusCode: HttpStatus.BAD_GATEWAY,
      error,
      message,
      upstream,
      upstreamStatus,
    };
    super(body, HttpStatus.BAD_GATEWAY, { cause });
    this.name = error;
    this.upstream = upstream;
    this.upstreamStatus = upstreamStatus;
  }
}

export class UpstreamAuthError extends UpstreamError {
  constructor(
    upstream: Upstream,
    message: string,
    upstreamStatus: number | null = null,
    cause?: unknown,
  ) {
    super('UpstreamAuthError', upstream, message, upstreamStatus, cause);
  }
}

export class UpstreamFetchError extends UpstreamError {
  constructor(
    upstream: Upstream,
    message: string,
    upstreamStatus: number | null = null,
    cause?: unknown,
  ) {
    super('UpstreamFetchError', upstream, message, upstreamStatus, cause);
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
