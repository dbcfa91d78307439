#!/usr/bin/env node
/**
 * taskmesh coordination API server
 * Express.js front end over the in-process Coordinator
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { fileURLToPath } from 'url';
import { resolve } from 'path';
import { AgentLogger } from '../../../agents/shared/src/logger.js';
import { brokerRegistryPath, getConfig, getEnvBoolean, type CoordinatorConfig } from '../../../agents/shared/src/config.js';
import { ValidationError } from '../../../agents/shared/src/errors.js';
import { createCoordinator, type Coordinator } from '../coordinator.js';
import { requireAdmin, requireApiKey } from './auth.js';
import { sendData, sendError } from './respond.js';
import { createAgentsRouter } from './routes/agents.js';
import { createTasksRouter } from './routes/tasks.js';
import { createAdminRouter } from './routes/admin.js';
import {
  SpawnedServiceController,
  createLifecycleBroker,
  serviceUrl,
  type BackingProcessController,
} from '../../../orchestration/index.js';

const logger = new AgentLogger('API');

export const API_VERSION = '1.0.0';

export function createApp(coordinator: Coordinator, config: CoordinatorConfig): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode}`, { latencyMs: Date.now() - start });
    });
    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    });
  });

  // Counts by status and recently active agents
  app.get('/status', (_req: Request, res: Response) => {
    try {
      sendData(res, coordinator.status());
    } catch (error) {
      sendError(res, error, 'read status');
    }
  });

  // API Routes
  const api = express.Router();
  api.use(requireApiKey(config));
  api.use(createAgentsRouter(coordinator));
  api.use(createTasksRouter(coordinator));
  api.use('/admin', requireAdmin(config), createAdminRouter(coordinator));
  app.use('/api/v1', api);

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Not found', context: {} } });
  });

  // Malformed JSON bodies and anything else that escaped a route
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendError(res, new ValidationError('Malformed JSON body'), 'parse request');
      return;
    }
    sendError(res, error, 'handle request');
  });

  return app;
}

export interface RunningServer {
  app: Express;
  server: Server;
  coordinator: Coordinator;
  url: string;
  close(): Promise<void>;
}

export async function startServer(
  config: CoordinatorConfig = getConfig(),
  coordinator: Coordinator = createCoordinator(config)
): Promise<RunningServer> {
  const app = createApp(coordinator, config);

  const server = await new Promise<Server>((resolveServer, reject) => {
    const listening = app.listen(config.server.port, config.server.host, () => resolveServer(listening));
    listening.once('error', reject);
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.server.port;
  const url = `http://${config.server.host}:${port}`;
  logger.info(`Coordination API listening on ${url}`, { path: config.store.dbPath });

  return {
    app,
    server,
    coordinator,
    url,
    close: () =>
      new Promise<void>((resolveClose, reject) => {
        // Long-poll requests are aborted through their close handlers
        server.closeAllConnections();
        server.close((error) => {
          coordinator.close();
          if (error) {
            reject(error);
            return;
          }
          resolveClose();
        });
      }),
  };
}

/**
 * Reaper for an API process the lifecycle broker spawned, so crashed clients
 * are evicted even when no live client is left to do it. When the backing
 * process to stop is this one, `shutdown` runs once the registry is written.
 */
export function startBrokerReaper(config: CoordinatorConfig, shutdown: (reason: string) => void): () => void {
  const spawner = new SpawnedServiceController({
    baseUrl: serviceUrl(config),
    startupTimeoutMs: config.broker.startupTimeoutMs,
    stopGraceMs: config.broker.stopGraceMs,
  });
  const self: BackingProcessController = {
    start: () => spawner.start(),
    stop: async (handle) => {
      if (handle.pid !== process.pid) {
        return spawner.stop(handle);
      }
      setImmediate(() => shutdown('no broker clients left'));
    },
    isRunning: async (handle) => handle.pid === process.pid || spawner.isRunning(handle),
  };
  logger.info('Reaping broker clients', { path: brokerRegistryPath(config) });
  return createLifecycleBroker(config, self).startReaper(config.broker.heartbeatMs);
}

function isMain(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url);
}

if (isMain()) {
  const config = getConfig();
  startServer(config)
    .then((running) => {
      let closing = false;
      const shutdown = (reason: string): void => {
        if (closing) return;
        closing = true;
        logger.info(`Shutting down: ${reason}`);
        running.close().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error('Shutdown failed', { error });
            process.exit(1);
          }
        );
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
      if (getEnvBoolean('COORD_BROKER_SPAWNED', false)) {
        startBrokerReaper(config, shutdown);
      }
    })
    .catch((error: unknown) => {
      logger.error('Failed to start API server', { error });
      process.exit(1);
    });
}
