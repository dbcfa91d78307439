/**
 * Response helpers shared by the API routes
 */

import type { Response } from 'express';
import { AgentLogger } from '../../../agents/shared/src/logger.js';
import { CoordinationError, ValidationError } from '../../../agents/shared/src/errors.js';

const logger = new AgentLogger('API');

export function sendData(res: Response, data: unknown, status = 200): void {
  res.status(status).json({ data });
}

/**
 * Map an error onto `{ error: { code, message, context } }`. Anything that is
 * not a CoordinationError is logged and reported as a 500.
 */
export function sendError(res: Response, error: unknown, operation: string): void {
  if (res.headersSent) {
    logger.warn('Error after response was sent', { operation, error });
    return;
  }
  if (error instanceof CoordinationError) {
    if (error.httpStatus >= 500) {
      logger.error(`${operation} failed`, { operation, error });
    }
    res.status(error.httpStatus).json({ error: error.toJSON() });
    return;
  }
  logger.error(`${operation} failed`, { operation, error });
  res.status(500).json({
    error: { code: 'INTERNAL', message: `Failed to ${operation}`, context: {} },
  });
}

export function parseTaskId(raw: string | undefined): number {
  const taskId = Number(raw);
  if (!Number.isInteger(taskId) || taskId < 1) {
    throw new ValidationError(`Invalid task id: ${String(raw)}`, { field: 'id' });
  }
  return taskId;
}
