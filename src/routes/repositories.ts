/**
 * Repository list and cache routes
 */

import { Router, type Response } from 'express';
import type { RepositoryCache } from '../cache/RepositoryCache.js';
import { InvalidRequestError } from '../errors/DashboardError.js';
import { RepositoryListQuerySchema } from '../schemas/repositorySchemas.js';
import type { RepositoryInfo, RepositorySnapshot } from '../scanner/types.js';
import { sendError } from './errorResponse.js';

export interface RepositoryRoutesOptions {
  basePath: string;
  appTitle: string;
}

/**
 * JSON shape of one repository
 */
export function toRepositoryResponse(repo: RepositoryInfo) {
  return {
    name: repo.name,
    path: repo.path,
    branch: repo.branch,
    is_dirty: repo.isDirty,
    dirty_count: repo.dirtyCount,
    branch_count: repo.branchCount,
    last_commit_message: repo.lastCommitMessage,
    last_commit_date: repo.lastCommitDate.toISOString(),
    last_commit_relative: repo.lastCommitRelative,
    remote_url: repo.remoteUrl ?? null,
    project_types: {
      ddev: repo.isDdev,
      docker: repo.isDocker,
      python: repo.isPython,
      node: repo.isNode,
      php: repo.isPhp,
      go: repo.isGo,
      rust: repo.isRust,
    },
  };
}

export function createRepositoryRoutes(cache: RepositoryCache, options: RepositoryRoutesOptions): Router {
  const router = Router();

  const sendSnapshot = (res: Response, repositories: RepositorySnapshot) => {
    res.json({
      title: options.appTitle,
      base_path: options.basePath,
      count: repositories.length,
      repositories: repositories.map(toRepositoryResponse),
    });
  };

  router.get('/repositories', async (req, res) => {
    try {
      const validation = RepositoryListQuerySchema.safeParse(req.query);
      if (!validation.success) {
        throw new InvalidRequestError(`Invalid request: ${validation.error.message}`);
      }

      const { refresh } = validation.data;
      const forceRefresh = refresh === 'true' || refresh === '1';
      const repositories = await cache.get(options.basePath, forceRefresh);
      sendSnapshot(res, repositories);
    } catch (error) {
      sendError(res, error, 'SCAN_FAILED', 'Error scanning repositories');
    }
  });

  router.post('/repositories/refresh', async (_req, res) => {
    try {
      const repositories = await cache.get(options.basePath, true);
      sendSnapshot(res, repositories);
    } catch (error) {
      sendError(res, error, 'SCAN_FAILED', 'Error scanning repositories');
    }
  });

  router.delete('/cache', (_req, res) => {
    cache.clear();
    res.json({ status: 'cleared' });
  });

  return router;
}
