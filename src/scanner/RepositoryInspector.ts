import path from 'path';
import { GitCommandError } from '../errors/DashboardError.js';
import type { VcsBackend } from '../git/types.js';
import { Logger } from '../utils/logger.js';
import { detectProjectTypes } from './projectMarkers.js';
import { formatRelativeTime } from './relativeTime.js';
import {
  DETACHED_HEAD_BRANCH,
  NO_COMMITS_MESSAGE,
  NO_COMMITS_RELATIVE,
  type RepositoryInfo,
} from './types.js';

const MAX_MESSAGE_LENGTH = 60;

/**
 * First line of a commit message, cut to MAX_MESSAGE_LENGTH code points
 */
export function summarizeCommitMessage(message: string): string {
  const firstLine = message.trim().split('\n')[0];
  return Array.from(firstLine).slice(0, MAX_MESSAGE_LENGTH).join('');
}

/**
 * Classifies a directory as repository or not and extracts its metadata
 */
export class RepositoryInspector {
  constructor(
    private readonly backend: VcsBackend,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Returns null for anything that is not a readable repository root
   */
  async inspect(repoPath: string): Promise<RepositoryInfo | null> {
    if (!(await this.backend.isRepositoryRoot(repoPath))) {
      return null;
    }

    try {
      const [branch, modified, untracked, hasChanges, branches, head, remoteUrl, projectTypes] =
        await Promise.all([
          this.backend.currentBranch(repoPath),
          this.backend.modifiedFiles(repoPath),
          this.backend.untrackedFiles(repoPath),
          this.backend.hasUncommittedChanges(repoPath),
          this.backend.localBranches(repoPath),
          this.backend.headCommit(repoPath),
          this.backend.originUrl(repoPath),
          detectProjectTypes(repoPath),
        ]);

      const extractedAt = new Date(this.now());
      const dirtyCount = modified.length + untracked.length;

      const info: RepositoryInfo = {
        name: path.basename(repoPath),
        path: repoPath,
        branch: branch ?? DETACHED_HEAD_BRANCH,
        isDirty: hasChanges || dirtyCount > 0,
        dirtyCount,
        branchCount: branches.length,
        lastCommitMessage: head ? summarizeCommitMessage(head.message) : NO_COMMITS_MESSAGE,
        lastCommitDate: head ? head.committedAt : extractedAt,
        lastCommitRelative: head ? formatRelativeTime(head.committedAt, extractedAt) : NO_COMMITS_RELATIVE,
        ...(remoteUrl !== undefined && { remoteUrl }),
        ...projectTypes,
      };

      return Object.freeze(info);
    } catch (error) {
      if (error instanceof GitCommandError) {
        Logger.warn('Skipping unreadable repository', { path: repoPath, error: error.message });
        return null;
      }
      throw error;
    }
  }
}
