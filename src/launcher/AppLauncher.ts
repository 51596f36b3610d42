import { spawn } from 'child_process';
import { LaunchError } from '../errors/DashboardError.js';
import { Logger } from '../utils/logger.js';

export const LAUNCH_TARGETS = ['editor', 'terminal', 'files'] as const;

export type LaunchTarget = (typeof LAUNCH_TARGETS)[number];

const PATH_PLACEHOLDER = '{path}';

/**
 * Split a configured command line into program and arguments.
 * `{path}` is substituted; without a placeholder the path becomes the last argument.
 */
export function buildCommand(commandLine: string, repoPath: string): { command: string; args: string[] } {
  const tokens = commandLine.trim().split(/\s+/).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    throw new LaunchError('(empty command)', 'no command configured');
  }

  const hasPlaceholder = tokens.some((token) => token.includes(PATH_PLACEHOLDER));
  const substituted = tokens.map((token) => token.replaceAll(PATH_PLACEHOLDER, repoPath));
  const [command, ...args] = substituted;

  return { command, args: hasPlaceholder ? args : [...args, repoPath] };
}

/**
 * Opens repositories in external programs
 */
export class AppLauncher {
  constructor(private readonly commands: Record<LaunchTarget, string>) {}

  /**
   * Start the program for `target`, detached from the server.
   * Resolves once the process has spawned.
   */
  open(target: LaunchTarget, repoPath: string): Promise<void> {
    const { command, args } = buildCommand(this.commands[target], repoPath);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: repoPath,
        detached: true,
        stdio: 'ignore',
      });

      child.once('spawn', () => {
        child.unref();
        Logger.info('Opened repository', { target, command, path: repoPath, pid: child.pid });
        resolve();
      });

      child.once('error', (error: Error) => {
        Logger.error('Failed to open repository', { target, command, path: repoPath, error: error.message });
        reject(new LaunchError(command, error.message));
      });
    });
  }
}
