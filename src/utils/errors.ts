export type ProxyErrorCode =
  | 'UPSTREAM_UNREACHABLE'
  | 'UPSTREAM_HTTP_ERROR'
  | 'UPSTREAM_TIMEOUT'
  | 'GOVERNOR_TIMEOUT'
  | 'MALFORMED_PLAYLIST'
  | 'INVALID_TOKEN'
  | 'CLIENT_DISCONNECTED';

export abstract class ProxyError extends Error {
  abstract readonly code: ProxyErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UpstreamUnreachableError extends ProxyError {
  readonly code = 'UPSTREAM_UNREACHABLE';
  readonly httpStatus = 502;

  constructor(readonly url: string, reason: string) {
    super(`Upstream unreachable: ${reason}`);
  }
}

export class UpstreamHttpError extends ProxyError {
  readonly code = 'UPSTREAM_HTTP_ERROR';
  readonly httpStatus: number;

  constructor(readonly url: string, readonly status: number) {
    super(`Upstream responded with HTTP ${status}`);
    // Client errors are meaningful to the player (404 on an expired segment), anything else is a gateway failure
    this.httpStatus = status >= 400 && status < 500 ? status : 502;
  }
}

export class UpstreamTimeoutError extends ProxyError {
  readonly code = 'UPSTREAM_TIMEOUT';
  readonly httpStatus = 504;

  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`Upstream sent no response within ${timeoutMs}ms`);
  }
}

export class GovernorTimeoutError extends ProxyError {
  readonly code = 'GOVERNOR_TIMEOUT';
  readonly httpStatus = 503;

  constructor(readonly host: string, readonly timeoutMs: number) {
    super(`No upstream slot for ${host} within ${timeoutMs}ms`);
  }
}

export class MalformedPlaylistError extends ProxyError {
  readonly code = 'MALFORMED_PLAYLIST';
  readonly httpStatus = 502;
}

export class InvalidTokenError extends ProxyError {
  readonly code = 'INVALID_TOKEN';
  readonly httpStatus = 400;
}

/** Normal early termination by the player, never answered and never counted as a failure. */
export class ClientDisconnectedError extends ProxyError {
  readonly code = 'CLIENT_DISCONNECTED';
  readonly httpStatus = 499;

  constructor() {
    super('Client disconnected');
  }
}

export function isProxyError(error: unknown): error is ProxyError {
  return error instanceof ProxyError;
}
