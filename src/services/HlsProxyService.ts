import { Request, Response } from 'express';
import { pipeline } from 'stream';
import { FetchedDocument, TokenPayload } from '../types/index.js';
import { ClientDisconnectedError, isProxyError } from '../utils/errors.js';
import { Logger, getErrorMessage, maskUrl } from '../utils/logger.js';
import {
  HLS_CONTENT_TYPE,
  isPlaylistContentType,
  parsePlaylist,
  serializePlaylist
} from '../utils/playlistParser.js';
import { buildProxyPath, decodeToken } from '../utils/proxyToken.js';
import { isPlaylistUrl, rewritePlaylist } from '../utils/urlRewriter.js';
import { applyVariantLimit } from '../utils/variantFilter.js';
import { ConnectionGovernor, GovernorSlot, hostOf } from './ConnectionGovernor.js';
import { DocumentFetcher, FetchOptions, StreamOptions, UpstreamStream, collectBody } from './ManifestFetcher.js';
import { RequestLifecycle, RequestState } from './RequestLifecycle.js';

export interface UpstreamFetcher extends DocumentFetcher {
  openStream(url: string, options?: StreamOptions): Promise<UpstreamStream>;
}

export interface PlaybackOptions {
  variantLimit?: number;
  referer?: string;
  cookie?: string;
}

const SEGMENT_PASSTHROUGH_HEADERS = [
  'content-type',
  'content-length',
  'content-range',
  'accept-ranges',
  'cache-control',
  'etag',
  'last-modified',
  'expires'
];

function singleHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export class HlsProxyService {
  private readonly logger: Logger;
  private nextRequestId = 1;

  constructor(
    private readonly governor: ConnectionGovernor,
    private readonly fetcher: UpstreamFetcher,
    private readonly defaultVariantLimit: number
  ) {
    this.logger = new Logger('HlsProxyService');
  }

  /**
   * Proxy path the player should open instead of the upstream URL.
   * The quality ceiling travels in the token, so no state is kept per playback.
   */
  playbackPath(upstreamUrl: string, options: PlaybackOptions = {}): string {
    return buildProxyPath({
      url: new URL(upstreamUrl).href,
      kind: 'playlist',
      variantLimit: options.variantLimit ?? this.defaultVariantLimit,
      referer: options.referer,
      cookie: options.cookie
    });
  }

  async handle(req: Request, res: Response): Promise<void> {
    const lifecycle = new RequestLifecycle(String(this.nextRequestId++), this.logger);
    const controller = new AbortController();

    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
        lifecycle.close('client-disconnected');
      }
    });

    try {
      this.advance(lifecycle, 'decoding');
      const payload = decodeToken(req.params.token);

      this.logger.debug('Proxy request', {
        requestId: lifecycle.requestId,
        kind: payload.kind,
        url: maskUrl(payload.url)
      });

      if (payload.kind === 'playlist') {
        await this.servePlaylist(payload, req, res, lifecycle, controller.signal);
      } else {
        await this.serveSegment(payload, req, res, lifecycle, controller.signal);
      }
    } catch (error) {
      this.handleFailure(error, res, lifecycle);
    }
  }

  private async servePlaylist(
    payload: TokenPayload,
    req: Request,
    res: Response,
    lifecycle: RequestLifecycle,
    signal: AbortSignal
  ): Promise<void> {
    const options: FetchOptions = {
      referer: payload.referer,
      cookie: payload.cookie,
      signal,
      ifNoneMatch: singleHeader(req.headers['if-none-match']),
      ifModifiedSince: singleHeader(req.headers['if-modified-since'])
    };

    this.advance(lifecycle, 'governing');
    const document = await this.governor.withSlot(
      hostOf(payload.url),
      async () => {
        this.advance(lifecycle, 'fetching');
        return this.fetcher.fetch(payload.url, options);
      },
      { signal }
    );

    this.sendPlaylist(document, payload, res, lifecycle);
  }

  /**
   * Fetch → filter → rewrite, always in that order. Nothing is cached between requests,
   * a live media playlist may change every time it is asked for.
   */
  private sendPlaylist(document: FetchedDocument, payload: TokenPayload, res: Response, lifecycle: RequestLifecycle): void {
    if (document.status === 304) {
      this.advance(lifecycle, 'streaming');
      if (document.etag) res.setHeader('ETag', document.etag);
      if (document.lastModified) res.setHeader('Last-Modified', document.lastModified);
      res.status(304).end();
      lifecycle.close('completed');
      return;
    }

    const playlist = parsePlaylist(document.body.toString('utf8'));
    const filtered = payload.variantLimit !== undefined && playlist.kind === 'master'
      ? applyVariantLimit(playlist, payload.variantLimit)
      : playlist;
    const rewritten = rewritePlaylist(serializePlaylist(filtered), document.finalUrl, {
      referer: payload.referer,
      cookie: payload.cookie
    });

    this.advance(lifecycle, 'streaming');
    res.setHeader('Content-Type', document.contentType || HLS_CONTENT_TYPE);
    res.setHeader('Cache-Control', 'no-cache');
    if (document.etag) res.setHeader('ETag', document.etag);
    if (document.lastModified) res.setHeader('Last-Modified', document.lastModified);
    res.status(200).send(Buffer.from(rewritten, 'utf8'));

    this.logger.debug('Playlist served', {
      requestId: lifecycle.requestId,
      kind: playlist.kind,
      filtered: filtered !== playlist,
      bytes: rewritten.length
    });
    lifecycle.close('completed');
  }

  private async serveSegment(
    payload: TokenPayload,
    req: Request,
    res: Response,
    lifecycle: RequestLifecycle,
    signal: AbortSignal
  ): Promise<void> {
    this.advance(lifecycle, 'governing');
    const slot = await this.governor.acquire(hostOf(payload.url), { signal });

    let released = false;
    const releaseSlot = (): void => {
      if (!released) {
        released = true;
        this.governor.release(slot);
      }
    };

    let upstream: UpstreamStream;
    try {
      this.advance(lifecycle, 'fetching');
      upstream = await this.fetcher.openStream(payload.url, {
        referer: payload.referer,
        cookie: payload.cookie,
        // A playlist must arrive whole to be rewritten
        range: isPlaylistUrl(payload.url) ? undefined : singleHeader(req.headers.range),
        signal
      });
    } catch (error) {
      releaseSlot();
      throw error;
    }

    if (isPlaylistContentType(upstream.headers['content-type'])) {
      await this.serveMisclassifiedPlaylist(upstream, payload, res, lifecycle, releaseSlot, signal);
      return;
    }

    if (lifecycle.isClosed) {
      upstream.body.destroy();
      releaseSlot();
      return;
    }

    this.advance(lifecycle, 'streaming');
    res.status(upstream.status);
    for (const name of SEGMENT_PASSTHROUGH_HEADERS) {
      const value = upstream.headers[name];
      if (value !== undefined) res.setHeader(name, value);
    }

    await this.pipeSegment(upstream, res, lifecycle, slot, releaseSlot);
  }

  private pipeSegment(
    upstream: UpstreamStream,
    res: Response,
    lifecycle: RequestLifecycle,
    slot: GovernorSlot,
    releaseSlot: () => void
  ): Promise<void> {
    return new Promise<void>(resolve => {
      // pipeline tears down the upstream read when the player goes away
      pipeline(upstream.body, res, error => {
        releaseSlot();

        if (!error) {
          lifecycle.close('completed');
        } else if (!lifecycle.isClosed) {
          this.logger.warn('Segment stream aborted', {
            requestId: lifecycle.requestId,
            host: slot.host,
            error: getErrorMessage(error)
          });
          lifecycle.close('failed');
        }
        resolve();
      });
    });
  }

  /** A segment token that turned out to point at a playlist, e.g. an extensionless rendition URL. */
  private async serveMisclassifiedPlaylist(
    upstream: UpstreamStream,
    payload: TokenPayload,
    res: Response,
    lifecycle: RequestLifecycle,
    releaseSlot: () => void,
    signal: AbortSignal
  ): Promise<void> {
    let body: Buffer;
    try {
      body = await collectBody(upstream.body, signal);
    } finally {
      releaseSlot();
    }

    this.sendPlaylist(
      {
        status: upstream.status,
        body,
        contentType: upstream.headers['content-type'] || HLS_CONTENT_TYPE,
        finalUrl: upstream.finalUrl,
        etag: upstream.headers['etag'],
        lastModified: upstream.headers['last-modified']
      },
      { ...payload, kind: 'playlist' },
      res,
      lifecycle
    );
  }

  private advance(lifecycle: RequestLifecycle, next: RequestState): void {
    if (lifecycle.isClosed) {
      throw new ClientDisconnectedError();
    }
    lifecycle.transition(next);
  }

  private handleFailure(error: unknown, res: Response, lifecycle: RequestLifecycle): void {
    if (error instanceof ClientDisconnectedError || lifecycle.reason === 'client-disconnected') {
      this.logger.debug('Client went away', { requestId: lifecycle.requestId, state: lifecycle.state });
      lifecycle.close('client-disconnected');
      return;
    }

    const status = isProxyError(error) ? error.httpStatus : 500;
    this.logger.error('Proxy request failed', {
      requestId: lifecycle.requestId,
      state: lifecycle.state,
      status,
      code: isProxyError(error) ? error.code : undefined,
      error: getErrorMessage(error)
    });
    lifecycle.close('failed');

    if (res.headersSent) {
      res.destroy();
      return;
    }

    res.status(status).json({
      success: false,
      error: getErrorMessage(error),
      code: isProxyError(error) ? error.code : 'INTERNAL_ERROR'
    });
  }
}
