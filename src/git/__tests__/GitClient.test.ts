import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { EventEmitter } from 'events';
import fs from 'fs/promises';
import path from 'path';
import { tmpdir } from 'os';
import { GitClient } from '../GitClient';
import { GitCommandError, GitUnavailableError } from '../../errors/DashboardError';

interface GitReply {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  spawnError?: string;
}

let replies = new Map<string, GitReply>();

function createFakeProcess(args: string[]): EventEmitter {
  const reply = replies.get(args.join(' ')) ?? { stderr: `unexpected git ${args.join(' ')}`, exitCode: 128 };
  const proc = Object.assign(new EventEmitter(), {
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
  });

  setImmediate(() => {
    if (reply.spawnError) {
      proc.emit('error', new Error(reply.spawnError));
      return;
    }
    if (reply.stdout) {
      proc.stdout.emit('data', Buffer.from(reply.stdout));
    }
    if (reply.stderr) {
      proc.stderr.emit('data', Buffer.from(reply.stderr));
    }
    proc.emit('close', reply.exitCode ?? 0);
  });

  return proc;
}

// Mock child_process
const mockSpawn = jest.fn((_command: string, args: string[], _options: object) => createFakeProcess(args));
jest.mock('child_process', () => ({
  spawn: (command: string, args: string[], options: object) => mockSpawn(command, args, options),
}));

describe('GitClient', () => {
  let client: GitClient;
  const repoPath = '/repos/project';

  beforeEach(() => {
    replies = new Map();
    client = new GitClient();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('isRepositoryRoot', () => {
    let testRootPath: string;

    beforeEach(async () => {
      testRootPath = path.join(tmpdir(), `repo-dashboard-git-${Date.now()}`);
      await fs.mkdir(testRootPath, { recursive: true });
    });

    afterEach(async () => {
      await fs.rm(testRootPath, { recursive: true, force: true });
    });

    it('should return false without running git when there is no .git entry', async () => {
      expect(await client.isRepositoryRoot(testRootPath)).toBe(false);
      expect(mockSpawn).not.toHaveBeenCalled();
    });

    it('should return true when git reports the directory as its top level', async () => {
      await fs.mkdir(path.join(testRootPath, '.git'));
      replies.set('rev-parse --show-toplevel', { stdout: `${await fs.realpath(testRootPath)}\n` });

      expect(await client.isRepositoryRoot(testRootPath)).toBe(true);
      expect(mockSpawn).toHaveBeenCalledWith(
        'git',
        ['rev-parse', '--show-toplevel'],
        expect.objectContaining({ cwd: testRootPath })
      );
    });

    it('should accept a .git file', async () => {
      await fs.writeFile(path.join(testRootPath, '.git'), 'gitdir: ../elsewhere/.git\n');
      replies.set('rev-parse --show-toplevel', { stdout: `${await fs.realpath(testRootPath)}\n` });

      expect(await client.isRepositoryRoot(testRootPath)).toBe(true);
    });

    it('should return false for a broken .git directory', async () => {
      await fs.mkdir(path.join(testRootPath, '.git'));
      replies.set('rev-parse --show-toplevel', { stderr: 'fatal: not a git repository', exitCode: 128 });

      expect(await client.isRepositoryRoot(testRootPath)).toBe(false);
    });

    it('should return false when git resolves an enclosing repository', async () => {
      await fs.mkdir(path.join(testRootPath, '.git'));
      replies.set('rev-parse --show-toplevel', { stdout: `${path.dirname(await fs.realpath(testRootPath))}\n` });

      expect(await client.isRepositoryRoot(testRootPath)).toBe(false);
    });
  });

  it('should run git without optional locks', async () => {
    replies.set('symbolic-ref --quiet --short HEAD', { stdout: 'main\n' });
    await client.currentBranch(repoPath);

    expect(mockSpawn).toHaveBeenCalledWith(
      'git',
      ['symbolic-ref', '--quiet', '--short', 'HEAD'],
      expect.objectContaining({
        cwd: repoPath,
        env: expect.objectContaining({ GIT_OPTIONAL_LOCKS: '0' }),
      })
    );
  });

  describe('currentBranch', () => {
    it('should return the checked-out branch', async () => {
      replies.set('symbolic-ref --quiet --short HEAD', { stdout: 'feature/login\n' });
      expect(await client.currentBranch(repoPath)).toBe('feature/login');
    });

    it('should return null for a detached HEAD', async () => {
      replies.set('symbolic-ref --quiet --short HEAD', { exitCode: 1 });
      expect(await client.currentBranch(repoPath)).toBeNull();
    });

    it('should throw for other failures', async () => {
      replies.set('symbolic-ref --quiet --short HEAD', { stderr: 'fatal: corrupt', exitCode: 128 });
      await expect(client.currentBranch(repoPath)).rejects.toBeInstanceOf(GitCommandError);
    });
  });

  describe('file lists', () => {
    it('should split modified files on NUL', async () => {
      replies.set('diff --name-only -z', { stdout: 'README.md\0src/with space.ts\0' });
      expect(await client.modifiedFiles(repoPath)).toEqual(['README.md', 'src/with space.ts']);
    });

    it('should return an empty list when nothing is modified', async () => {
      replies.set('diff --name-only -z', { stdout: '' });
      expect(await client.modifiedFiles(repoPath)).toEqual([]);
    });

    it('should list untracked files', async () => {
      replies.set('ls-files --others --exclude-standard -z', { stdout: 'notes.txt\0' });
      expect(await client.untrackedFiles(repoPath)).toEqual(['notes.txt']);
    });

    it('should reject when git fails', async () => {
      replies.set('diff --name-only -z', { stderr: 'fatal: index file corrupt', exitCode: 128 });
      await expect(client.modifiedFiles(repoPath)).rejects.toThrow(
        'git diff --name-only -z exited with 128: fatal: index file corrupt'
      );
    });
  });

  describe('hasUncommittedChanges', () => {
    it('should be true when status reports entries', async () => {
      replies.set('status --porcelain --untracked-files=normal', { stdout: 'A  staged.txt\n' });
      expect(await client.hasUncommittedChanges(repoPath)).toBe(true);
    });

    it('should be false for a clean tree', async () => {
      replies.set('status --porcelain --untracked-files=normal', { stdout: '' });
      expect(await client.hasUncommittedChanges(repoPath)).toBe(false);
    });
  });

  it('should list local branches', async () => {
    replies.set('for-each-ref --format=%(refname:short) refs/heads', { stdout: 'develop\nmain\n' });
    expect(await client.localBranches(repoPath)).toEqual(['develop', 'main']);
  });

  describe('headCommit', () => {
    it('should return null when the repository has no commits', async () => {
      replies.set('rev-parse --verify --quiet HEAD', { exitCode: 1 });
      expect(await client.headCommit(repoPath)).toBeNull();
    });

    it('should parse timestamp and message', async () => {
      replies.set('rev-parse --verify --quiet HEAD', { stdout: 'abc123\n' });
      replies.set('log -1 --format=%ct%n%B HEAD', { stdout: '1700000000\nFix login\n\nLonger body\n\n' });

      const commit = await client.headCommit(repoPath);
      expect(commit).toEqual({
        message: 'Fix login\n\nLonger body\n\n',
        committedAt: new Date(1700000000 * 1000),
      });
    });
  });

  describe('originUrl', () => {
    it('should return the origin URL', async () => {
      replies.set('config --get remote.origin.url', { stdout: 'git@example.com:team/project.git\n' });
      expect(await client.originUrl(repoPath)).toBe('git@example.com:team/project.git');
    });

    it('should return undefined when no origin is configured', async () => {
      replies.set('config --get remote.origin.url', { exitCode: 1 });
      expect(await client.originUrl(repoPath)).toBeUndefined();
    });
  });

  it('should reject with GitUnavailableError when git cannot be spawned', async () => {
    replies.set('symbolic-ref --quiet --short HEAD', { spawnError: 'spawn git ENOENT' });
    await expect(client.currentBranch(repoPath)).rejects.toBeInstanceOf(GitUnavailableError);
  });
});
