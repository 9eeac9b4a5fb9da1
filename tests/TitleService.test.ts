import { ConnectionGovernor } from '../src/services/ConnectionGovernor.js';
import { FetchOrchestrator } from '../src/services/FetchOrchestrator.js';
import { TitleService, detectSubtitleFormat, parseEpisodeList } from '../src/services/TitleService.js';
import { FakeDocumentFetcher } from './helpers/FakeDocumentFetcher.js';

const VTT = 'WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nHello\n';
const SRT = '1\n00:00:01,000 --> 00:00:02,000\nOlá\n';

describe('TitleService', () => {
  describe('parseEpisodeList', () => {
    it('should accept a bare array and number episodes by position', () => {
      const episodes = parseEpisodeList([{ id: 10, title: ' Pilot ' }, { id: 'b' }], 1);

      expect(episodes).toEqual([
        { id: '10', title: 'Pilot', number: 1, season: 1 },
        { id: 'b', title: 'Episode 2', number: 2, season: 1 }
      ]);
    });

    it('should accept an object with an episodes array and sort by number', () => {
      const episodes = parseEpisodeList(
        {
          episodes: [
            { id: 'e3', episode: 'E03', title: 'Third' },
            { id: 'e1', number: 1, title: 'First' },
            { title: 'No id' }
          ]
        },
        2
      );

      expect(episodes).toEqual([
        { id: 'e1', title: 'First', number: 1, season: 2 },
        { id: 'e3', title: 'Third', number: 3, season: 2 }
      ]);
    });

    it('should reject a response without an episode list', () => {
      expect(() => parseEpisodeList({ data: [] }, 4)).toThrow('Season 4 response has no episode list');
    });
  });

  describe('detectSubtitleFormat', () => {
    it('should recognise WebVTT and SubRip', () => {
      expect(detectSubtitleFormat(VTT)).toBe('vtt');
      expect(detectSubtitleFormat('\uFEFFWEBVTT - English\n')).toBe('vtt');
      expect(detectSubtitleFormat(SRT)).toBe('srt');
    });

    it('should return null for anything else', () => {
      expect(detectSubtitleFormat('<html></html>')).toBeNull();
      expect(detectSubtitleFormat('WEBVTTX\n')).toBeNull();
    });
  });

  describe('openTitle', () => {
    const base = 'https://meta.example.com/title/42';
    let fetcher: FakeDocumentFetcher;
    let service: TitleService;

    beforeEach(() => {
      fetcher = new FakeDocumentFetcher();
      const governor = new ConnectionGovernor({ capacityPerHost: 4, acquireTimeout: 1000 });
      service = new TitleService(new FetchOrchestrator(governor, fetcher, 1000));
    });

    it('should load seasons and subtitles in one pass and list what is missing', async () => {
      fetcher
        .respond(`${base}/season-2.json`, JSON.stringify({ episodes: [{ id: 'e2', title: 'Second', number: 2 }, { id: 'e1', number: 1 }] }))
        .respond(`${base}/season-1.json`, JSON.stringify([{ id: 10, title: 'Pilot' }]))
        .respond(`${base}/en.vtt`, VTT)
        .respond(`${base}/pt.srt`, SRT)
        .respond(`${base}/fr.txt`, 'not a subtitle');

      const bundle = await service.openTitle({
        seasons: [
          { number: 2, url: `${base}/season-2.json` },
          { number: 1, url: `${base}/season-1.json` }
        ],
        subtitles: [
          { language: 'en', label: 'English', url: `${base}/en.vtt` },
          { language: 'pt', label: 'Português', url: `${base}/pt.srt` },
          { language: 'fr', label: 'Français', url: `${base}/fr.txt` }
        ]
      });

      expect(bundle).toEqual({
        status: 'partial',
        seasons: [
          { number: 1, episodes: [{ id: '10', title: 'Pilot', number: 1, season: 1 }] },
          {
            number: 2,
            episodes: [
              { id: 'e1', title: 'Episode 1', number: 1, season: 2 },
              { id: 'e2', title: 'Second', number: 2, season: 2 }
            ]
          }
        ],
        subtitles: [
          { language: 'en', label: 'English', url: `${base}/en.vtt`, format: 'vtt', content: VTT },
          { language: 'pt', label: 'Português', url: `${base}/pt.srt`, format: 'srt', content: SRT }
        ],
        missing: ['subtitle-fr']
      });
    });

    it('should report a failed title when nothing loads', async () => {
      const bundle = await service.openTitle({
        seasons: [{ number: 1, url: `${base}/missing.json` }],
        subtitles: []
      });

      expect(bundle).toEqual({ status: 'failed', seasons: [], subtitles: [], missing: ['season-1'] });
    });

    it('should honour the request deadline', async () => {
      fetcher.respond(`${base}/season-1.json`, '[]').hang(`${base}/en.vtt`);

      const bundle = await service.openTitle({
        seasons: [{ number: 1, url: `${base}/season-1.json` }],
        subtitles: [{ language: 'en', label: 'English', url: `${base}/en.vtt` }],
        deadlineMs: 50
      });

      expect(bundle.status).toBe('partial');
      expect(bundle.seasons).toEqual([{ number: 1, episodes: [] }]);
      expect(bundle.missing).toEqual(['subtitle-en']);
    });
  });
});
