/**
 * Express server setup
 */

import express, { type Express as ExpressType } from 'express';
import http, { type Server as HttpServer } from 'http';
import type { RepositoryCache } from './cache/RepositoryCache.js';
import type { AppLauncher } from './launcher/AppLauncher.js';
import { setupHealthRoutes } from './routes/health.js';
import { createOpenRoutes } from './routes/open.js';
import { createRepositoryRoutes } from './routes/repositories.js';
import { Logger } from './utils/logger.js';

export interface AppDependencies {
  cache: RepositoryCache;
  launcher: AppLauncher;
  basePath: string;
  appTitle: string;
  publicDir: string;
}

/**
 * Middleware to restrict access to localhost only
 */
export function localhostOnly(req: express.Request, res: express.Response, next: express.NextFunction): void {
  const clientIp = req.ip || req.socket.remoteAddress || '';
  const isLocalhost =
    clientIp === '127.0.0.1' ||
    clientIp === '::1' ||
    clientIp === '::ffff:127.0.0.1';

  if (!isLocalhost) {
    Logger.warn('Rejected request from non-local client', { clientIp, path: req.path });
    res.status(403).json({
      error: 'FORBIDDEN',
      message: 'The dashboard is only available on localhost.',
    });
    return;
  }

  next();
}

/**
 * Create and configure Express app
 */
export function createApp(deps: AppDependencies): ExpressType {
  const app = express();

  // Middleware
  app.use(localhostOnly);
  app.use(express.json());

  // Routes
  setupHealthRoutes(app, deps.cache);
  app.use('/api', createRepositoryRoutes(deps.cache, { basePath: deps.basePath, appTitle: deps.appTitle }));
  app.use('/api', createOpenRoutes(deps.launcher, deps.basePath));

  // Dashboard page
  app.use(express.static(deps.publicDir));

  return app;
}

/**
 * Start HTTP server
 */
export function startServer(app: ExpressType, port: number, host: string): Promise<HttpServer> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}
