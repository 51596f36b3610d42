/**
 * Repo Dashboard - Main Entry Point
 */

import path from 'path';
import { readFileSync } from 'fs';
import { Config } from './config/Config.js';
import { GitClient } from './git/GitClient.js';
import { RepositoryInspector } from './scanner/RepositoryInspector.js';
import { RepositoryScanner } from './scanner/RepositoryScanner.js';
import { RepositoryCache } from './cache/RepositoryCache.js';
import { AppLauncher } from './launcher/AppLauncher.js';
import { createApp, startServer } from './server.js';
import { Logger, errorMessage } from './utils/logger.js';

/**
 * Read version from package.json
 */
function getVersion(): string {
  try {
    const packageJsonPath = path.resolve(__dirname, '../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
    return 'unknown';
  } catch (error) {
    Logger.warn('Could not read version from package.json', { error: errorMessage(error) });
    return 'unknown';
  }
}

/**
 * Main function
 */
async function main(): Promise<void> {
  const config = Config.load();
  Logger.info('Repo Dashboard starting', { version: getVersion() });

  // One cache for the lifetime of the process
  const scanner = new RepositoryScanner(new RepositoryInspector(new GitClient()));
  const cache = new RepositoryCache((basePath) => scanner.scan(basePath));
  const launcher = new AppLauncher(config.launchCommands);

  const app = createApp({
    cache,
    launcher,
    basePath: config.repoBasePath,
    appTitle: config.appTitle,
    publicDir: path.resolve(__dirname, '../public'),
  });

  const server = await startServer(app, config.port, config.host);
  Logger.info('Repo Dashboard running', {
    url: `http://${config.host}:${config.port}`,
    repoBasePath: config.repoBasePath,
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    Logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      Logger.info('Server closed');
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Start server
main().catch((error) => {
  Logger.error('Failed to start server', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
