import { Router, Request, Response } from 'express';
import { HlsProxyService } from '../services/HlsProxyService.js';
import { TitleService } from '../services/TitleService.js';
import { OpenTitleRequest, SeasonSource, SubtitleSource } from '../types/index.js';
import { Logger, getErrorMessage, maskUrl } from '../utils/logger.js';
import { MAX_TIMEOUT_MS } from '../utils/timeouts.js';

const MAX_VARIANT_LIMIT = 20;

const logger = new Logger('PlaybackAPI');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHttpUrl(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseSeasons(value: unknown): SeasonSource[] | string {
  if (value === undefined) return [];
  if (!Array.isArray(value)) return 'seasons must be an array';

  const seasons: SeasonSource[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.number !== 'number' || !Number.isInteger(entry.number) || !isHttpUrl(entry.url)) {
      return 'each season needs an integer number and an http(s) url';
    }
    seasons.push({ number: entry.number, url: entry.url });
  }
  return seasons;
}

function parseSubtitles(value: unknown): SubtitleSource[] | string {
  if (value === undefined) return [];
  if (!Array.isArray(value)) return 'subtitles must be an array';

  const subtitles: SubtitleSource[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.language !== 'string' || !entry.language || !isHttpUrl(entry.url)) {
      return 'each subtitle needs a language and an http(s) url';
    }
    const label = typeof entry.label === 'string' && entry.label ? entry.label : entry.language;
    subtitles.push({ language: entry.language, label, url: entry.url });
  }
  return subtitles;
}

function findDuplicate(values: string[]): string | undefined {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) return value;
    seen.add(value);
  }
  return undefined;
}

export function createPlaybackRouter(proxyService: HlsProxyService, titleService: TitleService): Router {
  const router = Router();

  // Turns an upstream HLS URL and a quality ceiling into the URL the player should open
  router.get('/playback', (req: Request, res: Response) => {
    const url = req.query.url;
    if (!isHttpUrl(url)) {
      return res.status(400).json({ success: false, error: 'Query parameter "url" must be an http(s) URL' });
    }

    let variantLimit: number | undefined;
    const rawLimit = queryString(req.query.limit);
    if (rawLimit !== undefined) {
      variantLimit = Number(rawLimit);
      if (!Number.isInteger(variantLimit) || variantLimit < 1 || variantLimit > MAX_VARIANT_LIMIT) {
        return res.status(400).json({
          success: false,
          error: `Query parameter "limit" must be an integer between 1 and ${MAX_VARIANT_LIMIT}`
        });
      }
    }

    const path = proxyService.playbackPath(url, {
      variantLimit,
      referer: queryString(req.query.referer),
      cookie: queryString(req.query.cookie)
    });
    const playbackUrl = `${req.protocol}://${req.get('host')}${path}`;

    logger.info('Playback URL generated', { upstream: maskUrl(url), variantLimit });

    res.json({ success: true, playbackUrl });
  });

  router.post('/titles/open', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      return res.status(400).json({ success: false, error: 'Request body must be a JSON object' });
    }

    const seasons = parseSeasons(body.seasons);
    const subtitles = parseSubtitles(body.subtitles);
    if (typeof seasons === 'string' || typeof subtitles === 'string') {
      return res.status(400).json({
        success: false,
        error: typeof seasons === 'string' ? seasons : subtitles
      });
    }

    const duplicate =
      findDuplicate(seasons.map(season => String(season.number))) ??
      findDuplicate(subtitles.map(subtitle => subtitle.language));
    if (duplicate !== undefined) {
      return res.status(400).json({ success: false, error: `Duplicate entry: ${duplicate}` });
    }

    const request: OpenTitleRequest = { seasons, subtitles };
    if (body.deadlineMs !== undefined) {
      if (
        typeof body.deadlineMs !== 'number' ||
        !Number.isInteger(body.deadlineMs) ||
        body.deadlineMs < 1 ||
        body.deadlineMs > MAX_TIMEOUT_MS
      ) {
        return res.status(400).json({
          success: false,
          error: `deadlineMs must be an integer between 1 and ${MAX_TIMEOUT_MS}`
        });
      }
      request.deadlineMs = body.deadlineMs;
    }

    try {
      const bundle = await titleService.openTitle(request);
      res.json({ success: bundle.status !== 'failed', ...bundle });
    } catch (error) {
      logger.error('Failed to open title', { error: getErrorMessage(error) });
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  });

  return router;
}
