/**
 * Health check routes
 */

import type { Express, Request, Response } from 'express';
import type { RepositoryCache } from '../cache/RepositoryCache.js';

/**
 * Setup health check routes
 */
export function setupHealthRoutes(app: Express, cache: RepositoryCache): void {
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      cached_paths: cache.size(),
      uptime: process.uptime(),
    });
  });
}
