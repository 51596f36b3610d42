/**
 * Configuration management for repo-dashboard
 * Handles environment variable loading and validation
 */

import dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import { Logger, parseLogLevel } from '../utils/logger.js';
import type { LaunchTarget } from '../launcher/AppLauncher.js';

/**
 * Dashboard configuration
 */
export interface DashboardConfig {
  repoBasePath: string;
  host: string;
  port: number;
  appTitle: string;
  launchCommands: Record<LaunchTarget, string>;
}

/**
 * Default command line for each quick action on the given platform
 */
export function defaultLaunchCommands(platform: NodeJS.Platform): Record<LaunchTarget, string> {
  if (platform === 'darwin') {
    return {
      editor: 'code',
      terminal: 'open -a Terminal',
      files: 'open',
    };
  }

  return {
    editor: 'code',
    terminal: 'x-terminal-emulator --working-directory={path}',
    files: 'xdg-open',
  };
}

/**
 * Configuration manager
 */
export class Config {
  private static config: DashboardConfig | null = null;

  /**
   * Load and return configuration
   * Throws error if PORT is not a valid port number
   */
  static load(): DashboardConfig {
    if (this.config) {
      return this.config;
    }

    this.loadEnvFiles();
    Logger.setLevel(parseLogLevel(process.env.LOG_LEVEL));

    const port = Number(process.env.PORT || '1899');
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      Logger.error('PORT must be an integer between 1 and 65535', { port: process.env.PORT });
      throw new Error(`Invalid PORT: ${process.env.PORT}`);
    }

    const defaults = defaultLaunchCommands(process.platform);
    const repoBasePath = path.resolve(
      process.env.REPO_BASE_PATH || path.join(os.homedir(), 'Versioncontrol', 'local')
    );

    const config: DashboardConfig = {
      repoBasePath,
      host: process.env.HOST || '127.0.0.1',
      port,
      appTitle: process.env.APP_TITLE || 'Local Repositories',
      launchCommands: {
        editor: process.env.EDITOR_COMMAND || defaults.editor,
        terminal: process.env.TERMINAL_COMMAND || defaults.terminal,
        files: process.env.FILE_BROWSER_COMMAND || defaults.files,
      },
    };
    this.config = config;

    this.logConfiguration(config);

    return config;
  }

  /**
   * Load .env files in priority order:
   * 1. DOTENV_CONFIG_PATH, when set
   * 2. .env in the project directory
   * 3. System environment variables (already loaded, never overridden)
   */
  private static loadEnvFiles(): void {
    if (process.env.DOTENV_CONFIG_PATH) {
      const explicitPath = path.isAbsolute(process.env.DOTENV_CONFIG_PATH)
        ? process.env.DOTENV_CONFIG_PATH
        : path.resolve(process.cwd(), process.env.DOTENV_CONFIG_PATH);
      dotenv.config({ path: explicitPath });
      Logger.debug('Loaded .env from DOTENV_CONFIG_PATH', { path: explicitPath });
    } else {
      const projectEnvPath = path.resolve(__dirname, '../../.env');
      dotenv.config({ path: projectEnvPath });
      Logger.debug('Loaded .env file', { path: projectEnvPath });
    }
  }

  private static logConfiguration(config: DashboardConfig): void {
    Logger.info('Repo Dashboard Configuration', {
      repoBasePath: config.repoBasePath,
      host: config.host,
      port: config.port,
      appTitle: config.appTitle,
      launchCommands: config.launchCommands,
    });

    if (config.host !== '127.0.0.1' && config.host !== 'localhost' && config.host !== '::1') {
      Logger.warn('Listening on a non-loopback host; requests from other machines are still rejected', {
        host: config.host,
      });
    }
  }

  /**
   * Get current configuration (must call load() first)
   */
  static get(): DashboardConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call Config.load() first.');
    }
    return this.config;
  }

  /**
   * Forget the loaded configuration so the next load() reads the environment again
   */
  static reset(): void {
    this.config = null;
  }
}
