import { PlaylistLine, TokenKind, UpstreamContext } from '../types/index.js';
import { MalformedPlaylistError } from './errors.js';
import { splitLines } from './playlistParser.js';
import { buildProxyPath } from './proxyToken.js';

// Tags whose URI attribute points at another playlist; every other URI attribute is a segment, key or init section
const PLAYLIST_URI_TAGS = new Set(['EXT-X-MEDIA', 'EXT-X-I-FRAME-STREAM-INF', 'EXT-X-RENDITION-REPORT']);

const URI_ATTRIBUTE_REGEX = /(^|[:,])(URI=")([^"]*)(")/g;

const OPAQUE_URI_REGEX = /^(skd|data):/i;

/**
 * Resolves a playlist reference against the playlist's own URL.
 * Some providers emit "https:///path" with an empty authority, which is taken to mean the base's origin.
 */
export function resolveUpstreamUrl(baseUrl: string, reference: string): string {
  const ref = reference.trim();

  try {
    const emptyAuthority = ref.match(/^https?:\/\/\//i);
    if (emptyAuthority) {
      return new URL(ref.slice(emptyAuthority[0].length - 1), new URL(baseUrl).origin).href;
    }
    return new URL(ref, baseUrl).href;
  } catch {
    throw new MalformedPlaylistError(`Cannot resolve URI "${ref}" against the playlist URL`);
  }
}

export function isPlaylistUrl(absoluteUrl: string): boolean {
  const pathname = new URL(absoluteUrl).pathname.toLowerCase();
  return pathname.endsWith('.m3u8') || pathname.endsWith('.m3u');
}

function kindFor(absoluteUrl: string, fallback: TokenKind): TokenKind {
  return isPlaylistUrl(absoluteUrl) ? 'playlist' : fallback;
}

function proxyPathFor(reference: string, baseUrl: string, fallback: TokenKind, context: UpstreamContext): string {
  const url = resolveUpstreamUrl(baseUrl, reference);
  return buildProxyPath({
    url,
    kind: kindFor(url, fallback),
    referer: context.referer,
    cookie: context.cookie
  });
}

function rewriteTag(line: PlaylistLine, baseUrl: string, context: UpstreamContext): string {
  const fallback: TokenKind = line.tag && PLAYLIST_URI_TAGS.has(line.tag) ? 'playlist' : 'segment';

  return line.text.replace(URI_ATTRIBUTE_REGEX, (match, lead: string, open: string, value: string, close: string) => {
    if (value.trim() === '' || OPAQUE_URI_REGEX.test(value.trim())) {
      return match;
    }
    return `${lead}${open}${proxyPathFor(value, baseUrl, fallback, context)}${close}`;
  });
}

/**
 * Replaces every URI in a playlist (URI lines and URI="..." attributes) with a proxy path
 * carrying a token for the resolved upstream URL. All other bytes, line endings included, are kept.
 */
export function rewritePlaylist(text: string, baseUrl: string, context: UpstreamContext = {}): string {
  let nextUriIsPlaylist = false;

  return splitLines(text)
    .map(line => {
      if (line.type === 'tag') {
        if (line.tag === 'EXT-X-STREAM-INF') {
          nextUriIsPlaylist = true;
        }
        return rewriteTag(line, baseUrl, context) + line.eol;
      }

      if (line.type === 'uri') {
        const fallback: TokenKind = nextUriIsPlaylist ? 'playlist' : 'segment';
        nextUriIsPlaylist = false;
        return proxyPathFor(line.text, baseUrl, fallback, context) + line.eol;
      }

      return line.text + line.eol;
    })
    .join('');
}
