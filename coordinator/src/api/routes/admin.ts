/**
 * Administrative API Routes
 * Stale lock inspection and forced release
 */

import { Router, type Request, type Response } from 'express';
import { ForceReleaseRequestSchema } from '../../../../agents/shared/src/types.js';
import { parseInput, type Coordinator } from '../../coordinator.js';
import { parseTaskId, sendData, sendError } from '../respond.js';

export function createAdminRouter(coordinator: Coordinator): Router {
  const router = Router();

  // GET /api/v1/admin/locks/stale - Held tasks past the staleness threshold
  router.get('/locks/stale', async (_req: Request, res: Response) => {
    try {
      sendData(res, await coordinator.listStaleLocks());
    } catch (error) {
      sendError(res, error, 'list stale locks');
    }
  });

  // POST /api/v1/admin/tasks/:id/force-release
  router.post('/tasks/:id/force-release', async (req: Request, res: Response) => {
    try {
      const taskId = parseTaskId(req.params.id);
      const options = parseInput(ForceReleaseRequestSchema, req.body ?? {});
      sendData(res, await coordinator.forceRelease(taskId, options));
    } catch (error) {
      sendError(res, error, 'force-release task');
    }
  });

  return router;
}
