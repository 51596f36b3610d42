/**
 * Repository snapshot types
 */

export const DETACHED_HEAD_BRANCH = 'HEAD detached';
export const NO_COMMITS_MESSAGE = 'No commits';
export const NO_COMMITS_RELATIVE = '-';

/**
 * Project kinds detected from marker files at the repository root
 */
export interface ProjectTypeFlags {
  readonly isDdev: boolean;
  readonly isDocker: boolean;
  readonly isPython: boolean;
  readonly isNode: boolean;
  readonly isPhp: boolean;
  readonly isGo: boolean;
  readonly isRust: boolean;
}

/**
 * One discovered repository, frozen once built
 */
export interface RepositoryInfo extends ProjectTypeFlags {
  readonly name: string;
  readonly path: string;
  /** Branch name, or DETACHED_HEAD_BRANCH */
  readonly branch: string;
  readonly isDirty: boolean;
  readonly dirtyCount: number;
  readonly branchCount: number;
  readonly lastCommitMessage: string;
  /** Extraction time for repositories without commits */
  readonly lastCommitDate: Date;
  readonly lastCommitRelative: string;
  readonly remoteUrl?: string;
}

export type RepositorySnapshot = readonly RepositoryInfo[];
