import {
  Episode,
  FetchedDocument,
  OpenTitleRequest,
  OrchestratorTask,
  Season,
  SubtitleFormat,
  SubtitleSource,
  SubtitleTrack,
  TitleBundle
} from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { FetchOrchestrator } from './FetchOrchestrator.js';

type TitlePart =
  | { type: 'season'; season: Season }
  | { type: 'subtitle'; track: SubtitleTrack };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPositiveInt(value: unknown): number | undefined {
  const parsed = typeof value === 'string' ? parseInt(value.replace(/^[^\d]+/, ''), 10) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Accepts either a bare array of episodes or an object with an "episodes" array.
 * Episodes without a number are numbered by position.
 */
export function parseEpisodeList(data: unknown, seasonNumber: number): Episode[] {
  const items = Array.isArray(data) ? data : isRecord(data) ? data.episodes : undefined;
  if (!Array.isArray(items)) {
    throw new Error(`Season ${seasonNumber} response has no episode list`);
  }

  const episodes: Episode[] = [];
  items.forEach((item: unknown, position: number) => {
    if (!isRecord(item) || (typeof item.id !== 'string' && typeof item.id !== 'number')) {
      return;
    }

    const number = toPositiveInt(item.number) ?? toPositiveInt(item.episode) ?? position + 1;
    episodes.push({
      id: String(item.id),
      title: typeof item.title === 'string' && item.title.trim() ? item.title.trim() : `Episode ${number}`,
      number,
      season: seasonNumber
    });
  });

  return episodes.sort((a, b) => a.number - b.number);
}

export function detectSubtitleFormat(content: string): SubtitleFormat | null {
  const text = content.replace(/^\uFEFF/, '');
  if (/^WEBVTT(?:[ \t]|\r?\n|$)/.test(text)) return 'vtt';
  if (/\d{2}:\d{2}:\d{2}[,.]\d{3}\s*-->\s*\d{2}:\d{2}:\d{2}[,.]\d{3}/.test(text)) return 'srt';
  return null;
}

export function seasonTaskId(number: number): string {
  return `season-${number}`;
}

export function subtitleTaskId(language: string): string {
  return `subtitle-${language}`;
}

/**
 * Loads everything a title needs before playback (episode lists per season and subtitle tracks)
 * in one gather, and folds the outcome into what the menus and the downloader consume.
 */
export class TitleService {
  private readonly logger: Logger;

  constructor(private readonly orchestrator: FetchOrchestrator) {
    this.logger = new Logger('TitleService');
  }

  async openTitle(request: OpenTitleRequest): Promise<TitleBundle> {
    const tasks: OrchestratorTask<TitlePart>[] = [
      ...request.seasons.map(source => ({
        id: seasonTaskId(source.number),
        url: source.url,
        kind: 'metadata' as const,
        headers: request.headers,
        parse: (document: FetchedDocument): TitlePart => ({
          type: 'season',
          season: {
            number: source.number,
            episodes: parseEpisodeList(JSON.parse(document.body.toString('utf8')), source.number)
          }
        })
      })),
      ...request.subtitles.map(source => ({
        id: subtitleTaskId(source.language),
        url: source.url,
        kind: 'subtitle' as const,
        headers: request.headers,
        parse: (document: FetchedDocument): TitlePart => ({
          type: 'subtitle',
          track: this.toSubtitleTrack(source, document)
        })
      }))
    ];

    const aggregate = await this.orchestrator.gather(tasks, request.deadlineMs);

    const seasons: Season[] = [];
    const subtitles: SubtitleTrack[] = [];
    const missing: string[] = [];

    for (const task of tasks) {
      const outcome = aggregate.outcomes[task.id];
      if (outcome.status !== 'fulfilled') {
        missing.push(task.id);
        continue;
      }
      if (outcome.value.type === 'season') {
        seasons.push(outcome.value.season);
      } else {
        subtitles.push(outcome.value.track);
      }
    }

    seasons.sort((a, b) => a.number - b.number);

    if (missing.length > 0) {
      this.logger.warn('Title opened with missing parts', { status: aggregate.status, missing });
    }

    return { status: aggregate.status, seasons, subtitles, missing };
  }

  private toSubtitleTrack(source: SubtitleSource, document: FetchedDocument): SubtitleTrack {
    const content = document.body.toString('utf8');
    const format = detectSubtitleFormat(content);
    if (!format) {
      throw new Error(`Subtitle ${source.language} is neither WebVTT nor SubRip`);
    }

    return {
      language: source.language,
      label: source.label,
      url: source.url,
      format,
      content
    };
  }
}
