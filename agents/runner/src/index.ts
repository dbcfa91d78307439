#!/usr/bin/env tsx
/**
 * taskmesh agent process
 *
 * Usage:
 *   tsx agents/runner/src/index.ts <agent-id> <role> [skill-level]
 *
 * Each matched task runs COORD_AGENT_COMMAND with the task in TASKMESH_*
 * environment variables.
 */

import { fileURLToPath } from 'url';
import { resolve } from 'path';
import { AgentLogger } from '../../shared/src/logger.js';
import { getConfig, getEnv, requireEnv, type CoordinatorConfig } from '../../shared/src/config.js';
import { CoordinatorClient } from '../../shared/src/coordinatorClient.js';
import { RecoveryJournal } from '../../shared/src/recoveryJournal.js';
import { AgentRunner } from '../../shared/src/agentRunner.js';
import { AgentRoleSchema, SkillLevelSchema, AgentIdSchema } from '../../shared/src/types.js';
import { createCommandExecutor } from './commandExecutor.js';

export { createCommandExecutor, taskEnvironment } from './commandExecutor.js';

const logger = new AgentLogger('Agent');

export interface AgentArgs {
  agentId: string;
  role: string;
  skillLevel: string;
}

export function parseAgentArgs(argv: string[]): AgentArgs {
  const [agentId, role, skillLevel] = argv;
  return {
    agentId: agentId ?? requireEnv('COORD_AGENT_ID'),
    role: role ?? requireEnv('COORD_AGENT_ROLE'),
    skillLevel: skillLevel ?? getEnv('COORD_AGENT_SKILL', 'senior'),
  };
}

export function createAgentRunner(args: AgentArgs, config: CoordinatorConfig): AgentRunner {
  const command = config.agent.command;
  if (!command) {
    throw new Error('COORD_AGENT_COMMAND is not set');
  }

  return new AgentRunner({
    agentId: AgentIdSchema.parse(args.agentId),
    role: AgentRoleSchema.parse(args.role),
    skillLevel: SkillLevelSchema.parse(args.skillLevel),
    client: new CoordinatorClient({ baseUrl: config.agent.apiUrl, apiKey: config.agent.apiKey }),
    journal: new RecoveryJournal({ dir: config.journal.dir }),
    executor: createCommandExecutor(command),
    waitMs: Math.min(config.agent.waitMs, config.wait.maxWaitMs),
    executionTimeoutMs: config.agent.executionTimeoutMs,
  });
}

function isMain(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url);
}

if (isMain()) {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  process.once('SIGTERM', () => controller.abort());

  Promise.resolve()
    .then(() => createAgentRunner(parseAgentArgs(process.argv.slice(2)), getConfig()))
    .then(async (runner) => {
      await runner.onStartup(controller.signal);
      await runner.runContinuous(controller.signal);
    })
    .catch((error: unknown) => {
      logger.error('Agent failed', { error });
      process.exit(1);
    });
}
