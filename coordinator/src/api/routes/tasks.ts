/**
 * Task API Routes
 * Creation, matching (long-poll), locking and status changes
 */

import { Router, type Request, type Response } from 'express';
import {
  LockRequestSchema,
  NextTaskQuerySchema,
  PromoteRequestSchema,
  StatusRequestSchema,
  TaskListQuerySchema,
} from '../../../../agents/shared/src/types.js';
import { ValidationError } from '../../../../agents/shared/src/errors.js';
import { parseInput, type Coordinator } from '../../coordinator.js';
import { parseTaskId, sendData, sendError } from '../respond.js';

export function createTasksRouter(coordinator: Coordinator): Router {
  const router = Router();

  // POST /api/v1/tasks - Create a task
  router.post('/tasks', async (req: Request, res: Response) => {
    try {
      const task = await coordinator.createTask(req.body);
      sendData(res, task, 201);
    } catch (error) {
      sendError(res, error, 'create task');
    }
  });

  // GET /api/v1/tasks - List tasks
  router.get('/tasks', async (req: Request, res: Response) => {
    try {
      const query = parseInput(TaskListQuerySchema, req.query);
      sendData(res, await coordinator.listTasks(query));
    } catch (error) {
      sendError(res, error, 'list tasks');
    }
  });

  // GET /api/v1/tasks/next - Long-poll for the next eligible task
  router.get('/tasks/next', async (req: Request, res: Response) => {
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      const query = parseInput(NextTaskQuerySchema, req.query);
      const result = await coordinator.nextTask({ ...query, signal: controller.signal });
      if (result.outcome === 'cancelled') {
        // The client is gone; there is nobody to answer
        return;
      }
      sendData(res, result);
    } catch (error) {
      sendError(res, error, 'find next task');
    } finally {
      res.off('close', onClose);
    }
  });

  // GET /api/v1/tasks/:id - Get one task
  router.get('/tasks/:id', async (req: Request, res: Response) => {
    try {
      sendData(res, await coordinator.getTask(parseTaskId(req.params.id)));
    } catch (error) {
      sendError(res, error, 'get task');
    }
  });

  // GET /api/v1/tasks/:id/history - Status changelog of a task
  router.get('/tasks/:id/history', async (req: Request, res: Response) => {
    try {
      sendData(res, await coordinator.taskHistory(parseTaskId(req.params.id)));
    } catch (error) {
      sendError(res, error, 'get task history');
    }
  });

  // POST /api/v1/tasks/:id/promote - pending -> created
  router.post('/tasks/:id/promote', async (req: Request, res: Response) => {
    try {
      const taskId = parseTaskId(req.params.id);
      const { agentId } = parseInput(PromoteRequestSchema, req.body);
      sendData(res, await coordinator.promote(taskId, agentId));
    } catch (error) {
      sendError(res, error, 'promote task');
    }
  });

  // POST /api/v1/tasks/:id/lock - Acquire the task lock
  router.post('/tasks/:id/lock', async (req: Request, res: Response) => {
    try {
      const taskId = parseTaskId(req.params.id);
      const { agentId, executionContext } = parseInput(LockRequestSchema, req.body);
      sendData(res, await coordinator.lock(taskId, agentId, executionContext ?? null));
    } catch (error) {
      sendError(res, error, 'lock task');
    }
  });

  // PUT /api/v1/tasks/:id/status - Move a task along the state machine
  router.put('/tasks/:id/status', async (req: Request, res: Response) => {
    try {
      const taskId = parseTaskId(req.params.id);
      const { agentId, status, notes } = parseInput(StatusRequestSchema, req.body);
      sendData(res, await coordinator.setStatus(taskId, agentId, status, notes));
    } catch (error) {
      sendError(res, error, 'update task status');
    }
  });

  // GET /api/v1/changes?since= - Changelog entries after a timestamp
  router.get('/changes', async (req: Request, res: Response) => {
    try {
      const { since } = req.query;
      if (since !== undefined && typeof since !== 'string') {
        throw new ValidationError('since: expected a single timestamp', { field: 'since' });
      }
      sendData(res, await coordinator.changesSince(since));
    } catch (error) {
      sendError(res, error, 'list changes');
    }
  });

  return router;
}
