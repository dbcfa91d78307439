#!/usr/bin/env node
/**
 * MCP server exposing the coordinator operations over stdio.
 *
 * On start it registers interest with the lifecycle broker, which starts the
 * coordination API if no other client has; on exit it releases that interest.
 * Set COORD_MCP_NO_AUTOSTART=true to connect to an API managed elsewhere.
 */

import { fileURLToPath } from 'url';
import { resolve } from 'path';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { getConfig, getEnvBoolean, type CoordinatorConfig } from '../../agents/shared/src/config.js';
import { CoordinatorClient } from '../../agents/shared/src/coordinatorClient.js';
import { AgentLogger } from '../../agents/shared/src/logger.js';
import type { CoordinatorOperations } from '../../agents/shared/src/types.js';
import { createLifecycleBroker } from '../../orchestration/index.js';
import type { LifecycleBroker } from '../../orchestration/lifecycleBroker.js';
import { tools } from './tools.js';
import { createToolHandler, type ToolSession } from './handlers.js';

const logger = new AgentLogger('McpServer');

export function createMcpServer(ops: CoordinatorOperations, session: ToolSession = { agent: null }): Server {
  const server = new Server(
    {
      name: 'taskmesh',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );
  const handleToolCall = createToolHandler(ops, session);

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(name, args ?? {});
  });

  return server;
}

/**
 * Keep this client's interest alive; re-acquire if it was evicted while the
 * process was suspended.
 */
function startBrokerHeartbeat(broker: LifecycleBroker, clientId: string, intervalMs: number): () => void {
  const timer = setInterval(() => {
    broker
      .heartbeat(clientId)
      .then(async (registered) => {
        if (!registered) {
          logger.warn('Broker interest was evicted, re-acquiring', { clientId });
          await broker.acquireInterest(clientId);
        }
      })
      .catch((error: unknown) => {
        logger.error('Broker heartbeat failed', { clientId, error });
      });
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}

async function main(config: CoordinatorConfig): Promise<void> {
  const clientId = `mcp-${process.pid}-${Date.now()}`;
  const autostart = !getEnvBoolean('COORD_MCP_NO_AUTOSTART', false);
  const broker = autostart ? createLifecycleBroker(config) : null;
  let stopHeartbeat = (): void => undefined;
  let stopReaper = (): void => undefined;

  if (broker) {
    const started = await broker.acquireInterest(clientId);
    logger.info(started ? 'Started coordination API' : 'Joined running coordination API', { clientId });
    stopHeartbeat = startBrokerHeartbeat(broker, clientId, config.broker.heartbeatMs);
    // Evicts bridges that crashed without releasing, so the API stops after the last one
    stopReaper = broker.startReaper(config.broker.heartbeatMs);
  }

  const client = new CoordinatorClient({
    baseUrl: config.agent.apiUrl,
    apiKey: config.agent.apiKey,
    adminKey: config.server.adminKey,
  });
  const server = createMcpServer(client);

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { clientId, status: reason });
    stopHeartbeat();
    stopReaper();
    if (broker) {
      const stopped = await broker.releaseInterest(clientId);
      if (stopped) logger.info('Stopped coordination API, no clients left');
    }
  };
  const exitAfterShutdown = (reason: string): void => {
    shutdown(reason)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to release broker interest', { clientId, error });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => exitAfterShutdown('SIGINT'));
  process.on('SIGTERM', () => exitAfterShutdown('SIGTERM'));

  server.onclose = () => exitAfterShutdown('transport closed');
  process.stdin.on('end', () => exitAfterShutdown('stdin closed'));
  await server.connect(new StdioServerTransport());
  logger.info('taskmesh MCP server started', { clientId });
}

function isMain(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url);
}

if (isMain()) {
  main(getConfig()).catch((error: unknown) => {
    logger.error('MCP server failed to start', { error });
    process.exit(1);
  });
}
