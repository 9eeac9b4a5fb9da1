import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import http from 'http';
import { AppConfig, config as defaultConfig } from './config/index.js';
import { createHlsRouter } from './routes/hls.js';
import { createPlaybackRouter } from './routes/playback.js';
import { ConnectionGovernor } from './services/ConnectionGovernor.js';
import { FetchOrchestrator } from './services/FetchOrchestrator.js';
import { HlsProxyService, PlaybackOptions, UpstreamFetcher } from './services/HlsProxyService.js';
import { ManifestFetcher } from './services/ManifestFetcher.js';
import { TitleService } from './services/TitleService.js';
import { Logger } from './utils/logger.js';

const logger = new Logger('Server');

export interface AppDependencies {
  governor: ConnectionGovernor;
  proxyService: HlsProxyService;
  titleService: TitleService;
}

export interface RunningProxy {
  port: number;
  baseUrl: string;
  dependencies: AppDependencies;
  /** Absolute URL the external player should open instead of the upstream URL */
  playbackUrl(upstreamUrl: string, options?: PlaybackOptions): string;
  close(): Promise<void>;
}

/**
 * Wires one governor into both the proxy and the orchestrator so playback and
 * metadata loading draw from the same per-host budget.
 */
export function createDependencies(appConfig: AppConfig, fetcher?: UpstreamFetcher): AppDependencies {
  const upstream = fetcher ?? new ManifestFetcher(appConfig.upstream);
  const governor = new ConnectionGovernor({
    capacityPerHost: appConfig.governor.capacityPerHost,
    acquireTimeout: appConfig.governor.acquireTimeout
  });
  const proxyService = new HlsProxyService(governor, upstream, appConfig.playlist.variantLimit);
  const orchestrator = new FetchOrchestrator(governor, upstream, appConfig.orchestrator.deadline);
  const titleService = new TitleService(orchestrator);

  return { governor, proxyService, titleService };
}

export function createApp(dependencies: AppDependencies): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: 'hls-relay',
      governor: {
        capacityPerHost: dependencies.governor.capacity,
        hosts: dependencies.governor.allStats()
      }
    });
  });

  app.use(createHlsRouter(dependencies.proxyService));
  app.use(createPlaybackRouter(dependencies.proxyService, dependencies.titleService));

  return app;
}

export function startProxyServer(
  appConfig: AppConfig = defaultConfig,
  dependencies: AppDependencies = createDependencies(appConfig)
): Promise<RunningProxy> {
  const app = createApp(dependencies);
  const server = http.createServer(app);

  return new Promise<RunningProxy>((resolve, reject) => {
    server.once('error', reject);
    server.listen(appConfig.proxy.port, appConfig.proxy.host, () => {
      server.off('error', reject);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Proxy server is not bound to a TCP port'));
        return;
      }
      const { port } = address;
      const baseUrl = `http://${appConfig.proxy.host}:${port}`;

      logger.info('HLS proxy listening', {
        baseUrl,
        capacityPerHost: appConfig.governor.capacityPerHost,
        variantLimit: appConfig.playlist.variantLimit
      });

      resolve({
        port,
        baseUrl,
        dependencies,
        playbackUrl: (upstreamUrl, options) => `${baseUrl}${dependencies.proxyService.playbackPath(upstreamUrl, options)}`,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.closeAllConnections();
            server.close(error => (error ? rejectClose(error) : resolveClose()));
          })
      });
    });
  });
}
