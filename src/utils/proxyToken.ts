import { TokenKind, TokenPayload } from '../types/index.js';
import { InvalidTokenError } from './errors.js';

export const PROXY_ROUTE_PREFIX = '/hls/';

interface WirePayload {
  u: string;
  k: TokenKind;
  r?: string;
  c?: string;
  l?: number;
}

// Players (ffmpeg-based ones in particular) pick a demuxer from the URL extension
const PASSTHROUGH_EXTENSIONS = new Set([
  'm3u8', 'm3u', 'ts', 'aac', 'ac3', 'eac3', 'mp4', 'm4s', 'm4a', 'm4v', 'mp3',
  'mpg', 'mpeg', 'mkv', 'webm', 'vtt', 'webvtt', 'srt', 'key', 'bin'
]);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseWire(token: string): unknown {
  try {
    return JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
  } catch {
    throw new InvalidTokenError('Token does not decode to JSON');
  }
}

export function encodeToken(payload: TokenPayload): string {
  const wire: WirePayload = { u: payload.url, k: payload.kind };
  if (payload.referer) wire.r = payload.referer;
  if (payload.cookie) wire.c = payload.cookie;
  if (payload.variantLimit !== undefined) wire.l = payload.variantLimit;

  return Buffer.from(JSON.stringify(wire), 'utf8').toString('base64url');
}

/**
 * Accepts a bare token or a token followed by an extension ("<token>.m3u8").
 */
export function decodeToken(raw: string): TokenPayload {
  const token = raw.split('.')[0];
  if (!token || !/^[A-Za-z0-9_-]+$/.test(token)) {
    throw new InvalidTokenError('Token is empty or not base64url');
  }

  const wire = parseWire(token);

  if (!isObject(wire) || typeof wire.u !== 'string') {
    throw new InvalidTokenError('Token is missing the upstream URL');
  }
  if (wire.k !== 'playlist' && wire.k !== 'segment') {
    throw new InvalidTokenError('Token has an unknown kind');
  }

  let protocol: string;
  try {
    protocol = new URL(wire.u).protocol;
  } catch {
    throw new InvalidTokenError('Token URL is not absolute');
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new InvalidTokenError(`Unsupported upstream protocol ${protocol}`);
  }

  const payload: TokenPayload = { url: wire.u, kind: wire.k };
  if (typeof wire.r === 'string') payload.referer = wire.r;
  if (typeof wire.c === 'string') payload.cookie = wire.c;
  if (wire.l !== undefined) {
    if (typeof wire.l !== 'number' || !Number.isInteger(wire.l) || wire.l < 1) {
      throw new InvalidTokenError('Token variant limit must be a positive integer');
    }
    payload.variantLimit = wire.l;
  }

  return payload;
}

export function tokenExtension(url: string, kind: TokenKind): string {
  let pathname = '';
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = '';
  }

  const lastSegment = pathname.substring(pathname.lastIndexOf('/') + 1);
  const dot = lastSegment.lastIndexOf('.');
  const extension = dot === -1 ? '' : lastSegment.slice(dot + 1).toLowerCase();

  if (PASSTHROUGH_EXTENSIONS.has(extension)) {
    return extension;
  }
  return kind === 'playlist' ? 'm3u8' : 'ts';
}

/** Root-relative proxy path, e.g. /hls/eyJ1Ijoi....m3u8 */
export function buildProxyPath(payload: TokenPayload): string {
  return `${PROXY_ROUTE_PREFIX}${encodeToken(payload)}.${tokenExtension(payload.url, payload.kind)}`;
}
