export type PlaylistKind = 'master' | 'media';

export type PlaylistLineType = 'tag' | 'comment' | 'uri' | 'blank';

export interface PlaylistLine {
  type: PlaylistLineType;
  /** Line content without its terminator */
  text: string;
  /** '\n', '\r\n' or '' for a final unterminated line */
  eol: string;
  /** Tag name without the leading '#', e.g. 'EXT-X-STREAM-INF' */
  tag?: string;
}

export interface Playlist {
  kind: PlaylistKind;
  lines: PlaylistLine[];
}

export interface Resolution {
  width: number;
  height: number;
}

export interface Variant {
  uri: string;
  /** Position among the master's variants */
  index: number;
  bandwidth?: number;
  averageBandwidth?: number;
  resolution?: Resolution;
  codecs?: string;
  audioGroup?: string;
  frameRate?: number;
  /** Index into Playlist.lines of the #EXT-X-STREAM-INF tag */
  tagLine: number;
  /** Index into Playlist.lines of the URI line */
  uriLine: number;
}

export type TokenKind = 'playlist' | 'segment';

export interface TokenPayload {
  url: string;
  kind: TokenKind;
  referer?: string;
  cookie?: string;
  variantLimit?: number;
}

export interface UpstreamContext {
  referer?: string;
  cookie?: string;
}

export type TaskKind = 'metadata' | 'subtitle';

export interface FetchedDocument {
  status: number;
  body: Buffer;
  contentType: string;
  finalUrl: string;
  etag?: string;
  lastModified?: string;
}

export interface OrchestratorTask<T = unknown> {
  id: string;
  url: string;
  kind: TaskKind;
  headers?: Record<string, string>;
  parse: (document: FetchedDocument) => T;
}

export type TaskOutcome<T = unknown> =
  | { status: 'fulfilled'; value: T; durationMs: number }
  | { status: 'failed'; code: string; message: string; durationMs: number }
  | { status: 'timedOut' };

export type AggregateStatus = 'complete' | 'partial' | 'failed';

export interface AggregateResult<T = unknown> {
  status: AggregateStatus;
  outcomes: Record<string, TaskOutcome<T>>;
  durationMs: number;
}

export interface Episode {
  id: string;
  title: string;
  number: number;
  season: number;
}

export interface Season {
  number: number;
  episodes: Episode[];
}

export type SubtitleFormat = 'vtt' | 'srt';

export interface SubtitleTrack {
  language: string;
  label: string;
  url: string;
  format: SubtitleFormat;
  content: string;
}

export interface SeasonSource {
  number: number;
  url: string;
}

export interface SubtitleSource {
  language: string;
  label: string;
  url: string;
}

export interface OpenTitleRequest {
  seasons: SeasonSource[];
  subtitles: SubtitleSource[];
  headers?: Record<string, string>;
  deadlineMs?: number;
}

export interface TitleBundle {
  status: AggregateStatus;
  seasons: Season[];
  subtitles: SubtitleTrack[];
  missing: string[];
}
