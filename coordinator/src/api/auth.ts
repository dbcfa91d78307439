/**
 * API key checks
 *
 * Agents authenticate with `X-API-Key`. Outside production the well-known
 * development key is also accepted so local setups work without
 * configuration. Administrative routes additionally need `X-Admin-Key`.
 */

import type { NextFunction, Request, Response } from 'express';
import type { CoordinatorConfig } from '../../../agents/shared/src/config.js';
import { PermissionDeniedError, UnauthorizedError } from '../../../agents/shared/src/errors.js';
import { sendError } from './respond.js';

export const DEVELOPMENT_KEY = 'development-key';

export function acceptedKeys(config: CoordinatorConfig): Set<string> {
  const keys = new Set(config.server.apiKeys);
  if (config.environment !== 'production') {
    keys.add(DEVELOPMENT_KEY);
  }
  return keys;
}

export function requireApiKey(config: CoordinatorConfig) {
  const keys = acceptedKeys(config);
  return (req: Request, res: Response, next: NextFunction): void => {
    const key = req.header('x-api-key');
    if (!key || !keys.has(key)) {
      sendError(res, new UnauthorizedError(key ? 'Invalid API key' : 'Missing X-API-Key header'), 'authenticate');
      return;
    }
    next();
  };
}

export function requireAdmin(config: CoordinatorConfig) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const adminKey = config.server.adminKey;
    if (!adminKey) {
      sendError(res, new PermissionDeniedError('Administrative operations are disabled (no admin key configured)'), 'authorize');
      return;
    }
    if (req.header('x-admin-key') !== adminKey) {
      sendError(res, new PermissionDeniedError('Invalid X-Admin-Key header'), 'authorize');
      return;
    }
    next();
  };
}
