import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Readable } from 'stream';
import { AppConfig } from '../config/index.js';
import { FetchedDocument, UpstreamContext } from '../types/index.js';
import {
  ClientDisconnectedError,
  ProxyError,
  UpstreamHttpError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
  isProxyError
} from '../utils/errors.js';
import { Logger, getErrorMessage, maskUrl } from '../utils/logger.js';
import { clampTimeout } from '../utils/timeouts.js';

export interface FetchOptions extends UpstreamContext {
  signal?: AbortSignal;
  headers?: Record<string, string>;
  /** Conditional re-fetch validators forwarded from the player */
  ifNoneMatch?: string;
  ifModifiedSince?: string;
}

export interface StreamOptions extends UpstreamContext {
  signal?: AbortSignal;
  range?: string;
}

export interface UpstreamStream {
  status: number;
  headers: Record<string, string>;
  body: Readable;
  finalUrl: string;
}

/** The part of the fetcher the orchestrator depends on */
export interface DocumentFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchedDocument>;
}

type Headers = AxiosResponse['headers'];

function headerValue(headers: Headers, name: string): string | undefined {
  const value: unknown = headers[name];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) return value.join(', ');
  return undefined;
}

function isReadable(value: unknown): value is Readable {
  return value instanceof Readable;
}

/**
 * Buffers a stream until it ends. An abort destroys the stream and rejects with ClientDisconnectedError.
 */
export async function collectBody(body: Readable, signal?: AbortSignal): Promise<Buffer> {
  if (signal?.aborted) {
    body.destroy();
    throw new ClientDisconnectedError();
  }

  const onAbort = (): void => {
    body.destroy(new ClientDisconnectedError());
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * URL of the last hop after redirects; relative playlist URIs resolve against it.
 */
function finalUrlOf(response: AxiosResponse, requested: string): string {
  const request: unknown = response.request;
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const res: unknown = request.res;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return requested;
}

export class ManifestFetcher implements DocumentFetcher {
  private readonly logger: Logger;
  private readonly client: AxiosInstance;
  private readonly timeout: number;

  constructor(upstream: AppConfig['upstream']) {
    this.logger = new Logger('ManifestFetcher');
    this.timeout = clampTimeout(upstream.timeout);
    this.client = axios.create({
      maxRedirects: 5,
      headers: {
        'User-Agent': upstream.userAgent,
        'Accept': '*/*'
      },
      // 304 is an answer to a conditional request, everything else non-2xx is an error
      validateStatus: status => (status >= 200 && status < 300) || status === 304
    });
    this.setupInterceptors(this.client);
  }

  private setupInterceptors(client: AxiosInstance): void {
    client.interceptors.request.use(requestConfig => {
      this.logger.debug('Upstream request', {
        method: requestConfig.method?.toUpperCase(),
        url: requestConfig.url ? maskUrl(requestConfig.url) : undefined,
        responseType: requestConfig.responseType
      });
      return requestConfig;
    });

    client.interceptors.response.use(response => {
      this.logger.debug('Upstream response', {
        url: response.config.url ? maskUrl(response.config.url) : undefined,
        status: response.status,
        contentType: headerValue(response.headers, 'content-type')
      });
      return response;
    });
  }

  /**
   * Buffers a whole upstream document (playlists, metadata, subtitles).
   * The deadline covers the wait for response headers; the body may take as long as the
   * upstream needs, unless the caller aborts.
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchedDocument> {
    const headers: Record<string, string> = { ...options.headers, ...this.contextHeaders(options) };
    if (options.ifNoneMatch) headers['If-None-Match'] = options.ifNoneMatch;
    if (options.ifModifiedSince) headers['If-Modified-Since'] = options.ifModifiedSince;

    const response = await this.request<unknown>(url, {
      headers,
      signal: options.signal,
      responseType: 'stream'
    });

    const stream = response.data;
    if (!isReadable(stream)) {
      throw new UpstreamUnreachableError(url, 'response body is not a stream');
    }

    let body: Buffer;
    if (response.status === 304) {
      stream.destroy();
      body = Buffer.alloc(0);
    } else {
      try {
        body = await collectBody(stream, options.signal);
      } catch (error) {
        if (isProxyError(error)) throw error;
        this.logger.warn('Upstream body interrupted', { url: maskUrl(url), error: getErrorMessage(error) });
        throw new UpstreamUnreachableError(url, getErrorMessage(error));
      }
    }

    return {
      status: response.status,
      body,
      contentType: headerValue(response.headers, 'content-type') || '',
      finalUrl: finalUrlOf(response, url),
      etag: headerValue(response.headers, 'etag'),
      lastModified: headerValue(response.headers, 'last-modified')
    };
  }

  /**
   * Opens an upstream body as a stream without buffering it (segments, keys).
   * The caller owns the returned stream and must consume or destroy it; the signal
   * only covers the wait for response headers.
   */
  async openStream(url: string, options: StreamOptions = {}): Promise<UpstreamStream> {
    // Identity encoding keeps Content-Length and Content-Range valid for the player
    const headers: Record<string, string> = { ...this.contextHeaders(options), 'Accept-Encoding': 'identity' };
    if (options.range) headers['Range'] = options.range;

    const response = await this.request<unknown>(url, {
      headers,
      signal: options.signal,
      responseType: 'stream'
    });

    if (!isReadable(response.data)) {
      throw new UpstreamUnreachableError(url, 'response body is not a stream');
    }

    const passthrough: Record<string, string> = {};
    for (const name of Object.keys(response.headers)) {
      const value = headerValue(response.headers, name);
      if (value !== undefined) passthrough[name.toLowerCase()] = value;
    }

    return {
      status: response.status,
      headers: passthrough,
      body: response.data,
      finalUrl: finalUrlOf(response, url)
    };
  }

  private contextHeaders(context: UpstreamContext): Record<string, string> {
    const headers: Record<string, string> = {};
    if (context.referer) headers['Referer'] = context.referer;
    if (context.cookie) headers['Cookie'] = context.cookie;
    return headers;
  }

  /**
   * Runs one request under the upstream first-byte deadline. Bodies are always streamed,
   * so the timer stops as soon as response headers arrive.
   */
  private async request<T>(
    url: string,
    options: {
      headers: Record<string, string>;
      signal?: AbortSignal;
      responseType: 'stream';
    }
  ): Promise<AxiosResponse<T>> {
    if (options.signal?.aborted) {
      throw new ClientDisconnectedError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);

    const onCallerAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      return await this.client.get<T>(url, {
        headers: options.headers,
        responseType: options.responseType,
        signal: controller.signal
      });
    } catch (error) {
      throw this.translateError(error, url, timedOut, options.signal?.aborted === true);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private translateError(error: unknown, url: string, timedOut: boolean, callerAborted: boolean): ProxyError {
    if (error instanceof ProxyError) {
      return error;
    }
    // An error response body is an open stream; leaving it unread keeps the upstream socket open
    const errorBody: unknown = axios.isAxiosError(error) ? error.response?.data : undefined;
    if (isReadable(errorBody)) {
      errorBody.destroy();
    }
    if (callerAborted) {
      return new ClientDisconnectedError();
    }
    if (timedOut) {
      this.logger.warn('Upstream first-byte deadline exceeded', { url: maskUrl(url), timeoutMs: this.timeout });
      return new UpstreamTimeoutError(url, this.timeout);
    }
    if (axios.isAxiosError(error) && error.response) {
      this.logger.warn('Upstream HTTP error', { url: maskUrl(url), status: error.response.status });
      return new UpstreamHttpError(url, error.response.status);
    }

    this.logger.warn('Upstream unreachable', { url: maskUrl(url), error: getErrorMessage(error) });
    return new UpstreamUnreachableError(url, getErrorMessage(error));
  }
}
