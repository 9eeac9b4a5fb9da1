import { Playlist, PlaylistLine, PlaylistLineType, Resolution, Variant } from '../types/index.js';
import { MalformedPlaylistError } from './errors.js';

export const HLS_CONTENT_TYPE = 'application/vnd.apple.mpegurl';

const HLS_CONTENT_TYPE_REGEX = /mpegurl|m3u8/i;

export function isPlaylistContentType(contentType: string | undefined): boolean {
  return !!contentType && HLS_CONTENT_TYPE_REGEX.test(contentType);
}

/**
 * Splits playlist text into lines, keeping each line's terminator so that
 * serializing the result reproduces the input exactly.
 */
export function splitLines(text: string): PlaylistLine[] {
  const lines: PlaylistLine[] = [];
  let start = 0;

  while (start < text.length) {
    const newline = text.indexOf('\n', start);
    if (newline === -1) {
      lines.push(classifyLine(text.slice(start), ''));
      break;
    }

    const hasCarriageReturn = newline > start && text[newline - 1] === '\r';
    const end = hasCarriageReturn ? newline - 1 : newline;
    lines.push(classifyLine(text.slice(start, end), hasCarriageReturn ? '\r\n' : '\n'));
    start = newline + 1;
  }

  return lines;
}

function classifyLine(text: string, eol: string): PlaylistLine {
  const trimmed = text.trim();
  let type: PlaylistLineType;

  if (trimmed === '') {
    type = 'blank';
  } else if (trimmed.startsWith('#EXT')) {
    const colon = trimmed.indexOf(':');
    const tag = colon === -1 ? trimmed.slice(1) : trimmed.slice(1, colon);
    return { type: 'tag', text, eol, tag };
  } else if (trimmed.startsWith('#')) {
    type = 'comment';
  } else {
    type = 'uri';
  }

  return { type, text, eol };
}

export function parsePlaylist(text: string): Playlist {
  const lines = splitLines(text);
  const header = lines.find(line => line.type !== 'blank');

  if (!header || !header.text.replace(/^\uFEFF/, '').trim().startsWith('#EXTM3U')) {
    throw new MalformedPlaylistError('Missing #EXTM3U header');
  }

  const isMaster = lines.some(line => line.tag === 'EXT-X-STREAM-INF');
  return { kind: isMaster ? 'master' : 'media', lines };
}

export function serializePlaylist(playlist: Playlist): string {
  return playlist.lines.map(line => line.text + line.eol).join('');
}

/** Value of a tag line after the first ':' */
export function tagValue(line: PlaylistLine): string {
  const colon = line.text.indexOf(':');
  return colon === -1 ? '' : line.text.slice(colon + 1).trim();
}

export function parseAttributeList(str: string): Map<string, string> {
  const attrs = new Map<string, string>();
  const regex = /([A-Z0-9-]+)=(?:"([^"]*)"|([^,]*))/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(str)) !== null) {
    attrs.set(match[1], match[2] ?? match[3]);
  }

  return attrs;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseResolution(value: string | undefined): Resolution | undefined {
  const match = value?.match(/^(\d+)x(\d+)$/i);
  if (!match) return undefined;
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

/**
 * Lists the variants of a master playlist in document order.
 * Each #EXT-X-STREAM-INF must be followed by its URI line before the next variant starts.
 */
export function extractVariants(playlist: Playlist): Variant[] {
  const variants: Variant[] = [];
  const { lines } = playlist;

  for (let i = 0; i < lines.length; i++) {
    if (lines[i].tag !== 'EXT-X-STREAM-INF') continue;

    let uriLine = -1;
    for (let j = i + 1; j < lines.length; j++) {
      if (lines[j].type === 'uri') {
        uriLine = j;
        break;
      }
      if (lines[j].tag === 'EXT-X-STREAM-INF') break;
    }

    if (uriLine === -1) {
      throw new MalformedPlaylistError(`EXT-X-STREAM-INF on line ${i + 1} has no URI`);
    }

    const attrs = parseAttributeList(tagValue(lines[i]));
    const frameRate = attrs.get('FRAME-RATE');

    variants.push({
      uri: lines[uriLine].text.trim(),
      index: variants.length,
      bandwidth: parseInteger(attrs.get('BANDWIDTH')),
      averageBandwidth: parseInteger(attrs.get('AVERAGE-BANDWIDTH')),
      resolution: parseResolution(attrs.get('RESOLUTION')),
      codecs: attrs.get('CODECS'),
      audioGroup: attrs.get('AUDIO'),
      frameRate: frameRate !== undefined && !isNaN(parseFloat(frameRate)) ? parseFloat(frameRate) : undefined,
      tagLine: i,
      uriLine
    });
    i = uriLine;
  }

  return variants;
}
