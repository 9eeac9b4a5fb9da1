import { config } from './config/index.js';
import { startProxyServer } from './server.js';
import { Logger, getErrorMessage } from './utils/logger.js';

export * from './types/index.js';
export * from './utils/errors.js';
export { loadConfig } from './config/index.js';
export type { AppConfig } from './config/index.js';
export { ConnectionGovernor } from './services/ConnectionGovernor.js';
export { FetchOrchestrator, jsonTask, textTask } from './services/FetchOrchestrator.js';
export { HlsProxyService } from './services/HlsProxyService.js';
export { ManifestFetcher } from './services/ManifestFetcher.js';
export { TitleService } from './services/TitleService.js';
export { filterVariants, applyVariantLimit } from './utils/variantFilter.js';
export { rewritePlaylist, resolveUpstreamUrl } from './utils/urlRewriter.js';
export { encodeToken, decodeToken } from './utils/proxyToken.js';
export { parsePlaylist, extractVariants } from './utils/playlistParser.js';
export { createApp, createDependencies, startProxyServer } from './server.js';

const logger = new Logger('Main');

async function main(): Promise<void> {
  const proxy = await startProxyServer(config);
  const upstream = process.argv[2];

  console.log('=== HLS RELAY ===');
  console.log(`Proxy: ${proxy.baseUrl}`);
  console.log(`Health check: ${proxy.baseUrl}/health`);
  console.log(`Playback URLs: ${proxy.baseUrl}/playback?url=<upstream m3u8>&limit=3`);
  if (upstream) {
    console.log(`Open in your player: ${proxy.playbackUrl(upstream)}`);
  }

  const shutdown = (): void => {
    logger.info('Shutting down');
    proxy.close().then(
      () => process.exit(0),
      error => {
        logger.error('Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Failed to start proxy', { error: getErrorMessage(error) });
    process.exit(1);
  });
}
