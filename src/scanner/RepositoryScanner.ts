import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { Logger } from '../utils/logger.js';
import type { RepositoryInspector } from './RepositoryInspector.js';
import type { RepositoryInfo, RepositorySnapshot } from './types.js';

function compareNames(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Walks the immediate children of a base directory and inspects each one
 */
export class RepositoryScanner {
  private readonly MAX_CONCURRENT = 8;

  constructor(private readonly inspector: RepositoryInspector) {}

  /**
   * Scan `basePath` and return its repositories, most recent commit first.
   * Rejects with the filesystem error when `basePath` cannot be listed.
   */
  async scan(basePath: string): Promise<RepositorySnapshot> {
    const startedAt = Date.now();
    const entries = await fs.readdir(basePath, { withFileTypes: true });
    entries.sort(compareNames);

    const candidates: string[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith('.')) {
        continue;
      }
      const candidatePath = path.join(basePath, entry.name);
      if (await this.isDirectory(entry, candidatePath)) {
        candidates.push(candidatePath);
      }
    }

    const repositories: RepositoryInfo[] = [];
    for (let i = 0; i < candidates.length; i += this.MAX_CONCURRENT) {
      const batch = candidates.slice(i, i + this.MAX_CONCURRENT);
      const batchResults = await Promise.all(batch.map((candidate) => this.inspector.inspect(candidate)));

      batchResults.forEach((info, index) => {
        if (info) {
          repositories.push(info);
        } else {
          Logger.debug('Not a repository, skipped', { path: batch[index] });
        }
      });
    }

    // Array.prototype.sort is stable: equal dates stay in name order
    repositories.sort((a, b) => b.lastCommitDate.getTime() - a.lastCommitDate.getTime());

    Logger.info('Scanned repositories', {
      basePath,
      candidates: candidates.length,
      repositories: repositories.length,
      durationMs: Date.now() - startedAt,
    });

    return Object.freeze(repositories);
  }

  /**
   * Symlinks count when they resolve to a directory
   */
  private async isDirectory(entry: Dirent, entryPath: string): Promise<boolean> {
    if (entry.isDirectory()) {
      return true;
    }
    if (!entry.isSymbolicLink()) {
      return false;
    }
    return fs
      .stat(entryPath)
      .then((stats) => stats.isDirectory())
      .catch(() => false);
  }
}
