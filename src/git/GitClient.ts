import { spawn } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import { GitCommandError, GitUnavailableError } from '../errors/DashboardError.js';
import type { CommitSummary, VcsBackend } from './types.js';

interface GitExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

function execGit(cwd: string, args: string[]): Promise<GitExecResult> {
  return new Promise((resolve, reject) => {
    // Optional locks off: queries must not touch the index of the inspected repository
    const proc = spawn('git', args, {
      cwd,
      env: { ...process.env, GIT_OPTIONAL_LOCKS: '0', LC_ALL: 'C' },
    });
    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (exitCode: number | null) => {
      resolve({ stdout, stderr, exitCode: exitCode ?? 1 });
    });

    proc.on('error', (error: Error) => {
      reject(new GitUnavailableError(error.message));
    });
  });
}

function splitNul(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * VcsBackend on top of the git command line
 */
export class GitClient implements VcsBackend {
  async isRepositoryRoot(dir: string): Promise<boolean> {
    // `.git` is a directory for regular clones and a file for worktrees and submodules
    const hasGitEntry = await fs
      .stat(path.join(dir, '.git'))
      .then(() => true)
      .catch(() => false);
    if (!hasGitEntry) {
      return false;
    }

    // git falls back to parent directories when `.git` is unusable, so the
    // reported top level must be the directory itself
    const result = await execGit(dir, ['rev-parse', '--show-toplevel']);
    if (result.exitCode !== 0) {
      return false;
    }

    const [topLevel, candidate] = await Promise.all([
      fs.realpath(result.stdout.trim()).catch(() => null),
      fs.realpath(dir),
    ]);
    return topLevel === candidate;
  }

  async currentBranch(repoPath: string): Promise<string | null> {
    const args = ['symbolic-ref', '--quiet', '--short', 'HEAD'];
    const result = await execGit(repoPath, args);
    if (result.exitCode === 0) {
      return result.stdout.trim();
    }
    // exit 1: HEAD is not a symbolic ref
    if (result.exitCode === 1) {
      return null;
    }
    throw new GitCommandError(args, result.exitCode, result.stderr);
  }

  async modifiedFiles(repoPath: string): Promise<string[]> {
    return splitNul(await this.run(repoPath, ['diff', '--name-only', '-z']));
  }

  async untrackedFiles(repoPath: string): Promise<string[]> {
    return splitNul(await this.run(repoPath, ['ls-files', '--others', '--exclude-standard', '-z']));
  }

  async hasUncommittedChanges(repoPath: string): Promise<boolean> {
    const output = await this.run(repoPath, ['status', '--porcelain', '--untracked-files=normal']);
    return output.trim().length > 0;
  }

  async localBranches(repoPath: string): Promise<string[]> {
    return splitLines(await this.run(repoPath, ['for-each-ref', '--format=%(refname:short)', 'refs/heads']));
  }

  async headCommit(repoPath: string): Promise<CommitSummary | null> {
    const verify = await execGit(repoPath, ['rev-parse', '--verify', '--quiet', 'HEAD']);
    if (verify.exitCode !== 0) {
      return null;
    }

    const output = await this.run(repoPath, ['log', '-1', '--format=%ct%n%B', 'HEAD']);
    const newline = output.indexOf('\n');
    const timestamp = newline === -1 ? output : output.slice(0, newline);
    const seconds = Number(timestamp.trim());
    if (!Number.isFinite(seconds)) {
      throw new GitCommandError(['log', '-1'], 0, `unexpected commit timestamp "${timestamp}"`);
    }

    return {
      message: newline === -1 ? '' : output.slice(newline + 1),
      committedAt: new Date(seconds * 1000),
    };
  }

  async originUrl(repoPath: string): Promise<string | undefined> {
    const args = ['config', '--get', 'remote.origin.url'];
    const result = await execGit(repoPath, args);
    if (result.exitCode === 0) {
      const url = result.stdout.trim();
      return url.length > 0 ? url : undefined;
    }
    // exit 1: key not set
    if (result.exitCode === 1) {
      return undefined;
    }
    throw new GitCommandError(args, result.exitCode, result.stderr);
  }

  private async run(repoPath: string, args: string[]): Promise<string> {
    const result = await execGit(repoPath, args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result.exitCode, result.stderr);
    }
    return result.stdout;
  }
}
