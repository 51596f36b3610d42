/**
 * Read-only view of a version control backend
 *
 * Expected sub-states of a repository are modelled as values: a detached HEAD is a
 * `null` branch, a repository without commits has a `null` head commit, a missing
 * origin remote is `undefined`. Methods reject only when the backend itself fails.
 */

export interface CommitSummary {
  message: string;
  committedAt: Date;
}

export interface VcsBackend {
  /** True when `dir` itself is the root of a working tree; parent directories are not searched. */
  isRepositoryRoot(dir: string): Promise<boolean>;
  currentBranch(repoPath: string): Promise<string | null>;
  /** Tracked files whose working tree content differs from the index. */
  modifiedFiles(repoPath: string): Promise<string[]>;
  untrackedFiles(repoPath: string): Promise<string[]>;
  /** Anything staged, modified or untracked. */
  hasUncommittedChanges(repoPath: string): Promise<boolean>;
  localBranches(repoPath: string): Promise<string[]>;
  headCommit(repoPath: string): Promise<CommitSummary | null>;
  originUrl(repoPath: string): Promise<string | undefined>;
}
