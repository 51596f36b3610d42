/**
 * Time-boxed snapshot cache in front of the repository scanner
 */

import type { RepositorySnapshot } from '../scanner/types.js';
import { Logger } from '../utils/logger.js';

export const SCAN_CACHE_TTL_MS = 30 * 1000;

export type ScanFunction = (basePath: string) => Promise<RepositorySnapshot>;

interface CacheEntry {
  timestamp: number;
  repositories: RepositorySnapshot;
}

/**
 * Caches one snapshot per base path.
 *
 * The lookup before the scan and the store after it contain no `await`, so each runs
 * to completion on the event loop without interleaving. The scan itself runs between
 * them: concurrent refreshes of one path may both scan, and the last store wins.
 */
export class RepositoryCache {
  private entries = new Map<string, CacheEntry>();

  constructor(
    private readonly scanRepositories: ScanFunction,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Cached snapshot for `basePath` while younger than the TTL, a fresh scan otherwise
   */
  async get(basePath: string, forceRefresh: boolean = false): Promise<RepositorySnapshot> {
    if (!forceRefresh) {
      const entry = this.entries.get(basePath);
      if (entry && this.now() - entry.timestamp < SCAN_CACHE_TTL_MS) {
        Logger.debug('Repository cache hit', { basePath });
        return entry.repositories;
      }
    }

    Logger.debug('Repository cache miss', { basePath, forceRefresh });
    const repositories = await this.scanRepositories(basePath);
    this.entries.set(basePath, { timestamp: this.now(), repositories });
    return repositories;
  }

  clear(): void {
    this.entries.clear();
    Logger.info('Repository cache cleared');
  }

  size(): number {
    return this.entries.size;
  }
}
