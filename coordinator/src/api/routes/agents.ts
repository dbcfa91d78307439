/**
 * Agent API Routes
 * Registration, listing and heartbeats
 */

import { Router, type Request, type Response } from 'express';
import type { Coordinator } from '../../coordinator.js';
import { sendData, sendError } from '../respond.js';

export function createAgentsRouter(coordinator: Coordinator): Router {
  const router = Router();

  // POST /api/v1/register - Register or re-register an agent
  router.post('/register', async (req: Request, res: Response) => {
    try {
      const agent = await coordinator.register(req.body);
      sendData(res, agent);
    } catch (error) {
      sendError(res, error, 'register agent');
    }
  });

  // GET /api/v1/agents - List registered agents
  router.get('/agents', async (_req: Request, res: Response) => {
    try {
      sendData(res, await coordinator.listAgents());
    } catch (error) {
      sendError(res, error, 'list agents');
    }
  });

  // POST /api/v1/agents/:id/heartbeat - Refresh last-seen time
  router.post('/agents/:id/heartbeat', async (req: Request, res: Response) => {
    try {
      sendData(res, await coordinator.heartbeat(req.params.id ?? ''));
    } catch (error) {
      sendError(res, error, 'record heartbeat');
    }
  });

  return router;
}
