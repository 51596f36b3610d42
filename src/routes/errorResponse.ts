import type { Response } from 'express';
import { DashboardError } from '../errors/DashboardError.js';
import { Logger, errorMessage } from '../utils/logger.js';

/**
 * Answer with the code and status of a DashboardError, or log and answer 500
 */
export function sendError(res: Response, error: unknown, fallbackCode: string, logMessage: string): void {
  if (error instanceof DashboardError) {
    res.status(error.statusCode).json({
      error: error.code,
      message: error.message,
    });
    return;
  }

  Logger.error(logMessage, {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  res.status(500).json({ error: fallbackCode, message: errorMessage(error) });
}
