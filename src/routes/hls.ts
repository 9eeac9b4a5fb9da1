import { Router, Request, Response, NextFunction } from 'express';
import { HlsProxyService } from '../services/HlsProxyService.js';

export function createHlsRouter(proxyService: HlsProxyService): Router {
  const router = Router();

  // The extension after the token is only there for players that sniff it
  router.get('/hls/:token', (req: Request, res: Response, next: NextFunction) => {
    proxyService.handle(req, res).catch(next);
  });

  return router;
}
