/**
 * MCP Tool Handlers
 * Each call goes straight to the coordinator; nothing is cached here except
 * the agent this session registered as.
 */

import { z } from 'zod';
import { ValidationError, isCoordinationError } from '../../agents/shared/src/errors.js';
import { AgentLogger } from '../../agents/shared/src/logger.js';
import {
  AgentIdSchema,
  AgentRoleSchema,
  CreateTaskSchema,
  ForceReleaseRequestSchema,
  RegisterAgentSchema,
  SkillLevelSchema,
  TaskListQuerySchema,
  TaskStatusSchema,
  type AgentRecord,
  type CoordinatorOperations,
} from '../../agents/shared/src/types.js';

const logger = new AgentLogger('McpTools');

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface ToolSession {
  agent: AgentRecord | null;
}

export type ToolHandler = (name: string, args: Record<string, unknown>) => Promise<ToolResult>;

const TaskIdSchema = z.coerce.number().int().positive();

const TaskIdArgs = z.object({ taskId: TaskIdSchema });
const AgentArgs = z.object({ agentId: AgentIdSchema.optional() });
const TaskAgentArgs = TaskIdArgs.extend({ agentId: AgentIdSchema.optional() });
const NextTaskArgs = z.object({
  agentId: AgentIdSchema.optional(),
  role: AgentRoleSchema.optional(),
  skillLevel: SkillLevelSchema.optional(),
  waitMs: z.coerce.number().int().min(0).default(0),
});
const LockArgs = TaskAgentArgs.extend({ executionContext: z.string().nullable().optional() });
const StatusArgs = TaskAgentArgs.extend({ status: TaskStatusSchema, notes: z.string().optional() });
const ForceReleaseArgs = TaskIdArgs.merge(ForceReleaseRequestSchema);
const ChangesArgs = z.object({ since: z.string().optional() });

function parseArgs<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, args: Record<string, unknown>): Output {
  const result = schema.safeParse(args);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'arguments';
    throw new ValidationError(`${field}: ${issue?.message ?? 'invalid'}`, { field });
  }
  return result.data;
}

function text(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function failure(error: unknown): ToolResult {
  if (isCoordinationError(error)) {
    return { content: [{ type: 'text', text: JSON.stringify({ error: error.toJSON() }, null, 2) }], isError: true };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}

export function createToolHandler(ops: CoordinatorOperations, session: ToolSession = { agent: null }): ToolHandler {
  const agentIdFor = (explicit: string | undefined): string => {
    const agentId = explicit ?? session.agent?.agentId;
    if (!agentId) {
      throw new ValidationError('agentId: required until register_agent has been called', { field: 'agentId' });
    }
    return agentId;
  };

  const dispatch = async (name: string, args: Record<string, unknown>): Promise<unknown> => {
    switch (name) {
      case 'register_agent': {
        const agent = await ops.register(parseArgs(RegisterAgentSchema, args));
        session.agent = agent;
        return agent;
      }

      case 'heartbeat': {
        const { agentId } = parseArgs(AgentArgs, args);
        return ops.heartbeat(agentIdFor(agentId));
      }

      case 'list_agents':
        return ops.listAgents();

      case 'create_task': {
        const input = parseArgs(CreateTaskSchema, args);
        return ops.createTask({ ...input, createdBy: input.createdBy ?? session.agent?.agentId });
      }

      case 'get_task':
        return ops.getTask(parseArgs(TaskIdArgs, args).taskId);

      case 'list_tasks':
        return ops.listTasks(parseArgs(TaskListQuerySchema, args));

      case 'promote_task': {
        const { taskId, agentId } = parseArgs(TaskAgentArgs, args);
        return ops.promote(taskId, agentIdFor(agentId));
      }

      case 'get_next_task': {
        const query = parseArgs(NextTaskArgs, args);
        const role = query.role ?? session.agent?.role;
        const skillLevel = query.skillLevel ?? session.agent?.skillLevel;
        if (!role || !skillLevel) {
          throw new ValidationError('role: required until register_agent has been called', { field: 'role' });
        }
        return ops.nextTask({
          agentId: query.agentId ?? session.agent?.agentId,
          role,
          skillLevel,
          waitMs: query.waitMs,
        });
      }

      case 'lock_task': {
        const { taskId, agentId, executionContext } = parseArgs(LockArgs, args);
        return ops.lock(taskId, agentIdFor(agentId), executionContext ?? null);
      }

      case 'update_task_status': {
        const { taskId, agentId, status, notes } = parseArgs(StatusArgs, args);
        return ops.setStatus(taskId, agentIdFor(agentId), status, notes);
      }

      case 'force_release': {
        const { taskId, onlyIfStale, releasedBy } = parseArgs(ForceReleaseArgs, args);
        return ops.forceRelease(taskId, { onlyIfStale, releasedBy });
      }

      case 'list_stale_locks':
        return ops.listStaleLocks();

      case 'task_history':
        return ops.taskHistory(parseArgs(TaskIdArgs, args).taskId);

      case 'changes_since':
        return ops.changesSince(parseArgs(ChangesArgs, args).since);

      default:
        throw new ValidationError(`Unknown tool: ${name}`, { tool: name });
    }
  };

  return async (name, args) => {
    try {
      return text(await dispatch(name, args));
    } catch (error) {
      logger.warn('Tool call failed', { operation: name, error });
      return failure(error);
    }
  };
}
