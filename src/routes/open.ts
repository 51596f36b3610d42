/**
 * "Open in external app" routes
 */

import { Router } from 'express';
import fs from 'fs/promises';
import path from 'path';
import type { AppLauncher } from '../launcher/AppLauncher.js';
import { InvalidRequestError, RepositoryNotFoundError } from '../errors/DashboardError.js';
import { OpenRepositoryParamsSchema } from '../schemas/repositorySchemas.js';
import { sendError } from './errorResponse.js';

export function createOpenRoutes(launcher: AppLauncher, basePath: string): Router {
  const router = Router();

  router.post('/open/:target/:name', async (req, res) => {
    try {
      const validation = OpenRepositoryParamsSchema.safeParse(req.params);
      if (!validation.success) {
        throw new InvalidRequestError(`Invalid request: ${validation.error.message}`);
      }

      const { target, name } = validation.data;
      const repoPath = path.join(basePath, name);
      const isDirectory = await fs
        .stat(repoPath)
        .then((stats) => stats.isDirectory())
        .catch(() => false);
      if (!isDirectory) {
        throw new RepositoryNotFoundError(name);
      }

      await launcher.open(target, repoPath);
      res.json({ status: 'ok', target, name });
    } catch (error) {
      sendError(res, error, 'INTERNAL_ERROR', 'Error opening repository');
    }
  });

  return router;
}
