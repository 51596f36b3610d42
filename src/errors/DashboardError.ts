/**
 * Custom error types for repo-dashboard
 */

/**
 * Base dashboard error class
 */
export class DashboardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'DashboardError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Repository directory missing under the base path
 */
export class RepositoryNotFoundError extends DashboardError {
  constructor(repoName: string) {
    super(`Repository not found: ${repoName}`, 'REPOSITORY_NOT_FOUND', 404);
    this.name = 'RepositoryNotFoundError';
  }
}

/**
 * Invalid request error
 */
export class InvalidRequestError extends DashboardError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', 400);
    this.name = 'InvalidRequestError';
  }
}

/**
 * External program could not be started
 */
export class LaunchError extends DashboardError {
  constructor(command: string, reason: string) {
    super(`Failed to launch ${command}: ${reason}`, 'LAUNCH_FAILED', 500);
    this.name = 'LaunchError';
  }
}

/**
 * The git executable is missing or cannot be run
 */
export class GitUnavailableError extends DashboardError {
  constructor(reason: string) {
    super(`git is not available: ${reason}`, 'GIT_UNAVAILABLE', 500);
    this.name = 'GitUnavailableError';
  }
}

/**
 * A git query exited with an unexpected status
 */
export class GitCommandError extends DashboardError {
  constructor(
    args: readonly string[],
    public readonly exitCode: number,
    stderr: string
  ) {
    super(`git ${args.join(' ')} exited with ${exitCode}: ${stderr.trim()}`, 'GIT_COMMAND_FAILED', 500);
    this.name = 'GitCommandError';
  }
}
