/**
 * MCP tool definitions. Each tool maps onto exactly one coordinator operation.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

const ROLES = ['frontend_dev', 'backend_dev', 'fullstack_dev', 'qa', 'architect', 'pm'];
const SKILLS = ['junior', 'senior', 'principal'];
const STATUSES = ['pending', 'created', 'locked', 'dev_done', 'testing', 'qa_done', 'completed'];

const agentIdProperty = {
  type: 'string',
  description: 'Agent id; defaults to the agent registered in this session',
};

const taskIdProperty = {
  type: 'number',
  description: 'Task id',
};

export const tools: Tool[] = [
  {
    name: 'register_agent',
    description: 'Register (or re-register) this session as an agent. Later calls default to this agent.',
    inputSchema: {
      type: 'object',
      properties: {
        agentId: { type: 'string', description: 'Unique agent id, chosen by the caller' },
        role: { type: 'string', enum: ROLES },
        skillLevel: { type: 'string', enum: SKILLS, description: 'Default: senior' },
      },
      required: ['agentId', 'role'],
    },
  },
  {
    name: 'heartbeat',
    description: 'Refresh the last-seen time of an agent',
    inputSchema: {
      type: 'object',
      properties: { agentId: agentIdProperty },
    },
  },
  {
    name: 'list_agents',
    description: 'List registered agents',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'create_task',
    description: 'Create a task. Tasks from pm/architect are ready immediately unless staged; others start pending.',
    inputSchema: {
      type: 'object',
      properties: {
        title: { type: 'string' },
        description: { type: 'string' },
        targetRole: { type: 'string', enum: ROLES },
        skillLevel: { type: 'string', enum: SKILLS },
        complexity: { type: 'string', enum: ['minor', 'major'] },
        branch: { type: 'string' },
        notes: { type: 'string' },
        createdBy: agentIdProperty,
        stage: { type: 'boolean', description: 'Keep the task pending until promoted' },
      },
      required: ['title', 'targetRole', 'skillLevel'],
    },
  },
  {
    name: 'get_task',
    description: 'Get a task by id',
    inputSchema: {
      type: 'object',
      properties: { taskId: taskIdProperty },
      required: ['taskId'],
    },
  },
  {
    name: 'list_tasks',
    description: 'List tasks, optionally filtered by role and status',
    inputSchema: {
      type: 'object',
      properties: {
        role: { type: 'string', enum: ROLES },
        status: { type: 'string', enum: STATUSES },
        limit: { type: 'number', description: 'Default: 100, max: 500' },
      },
    },
  },
  {
    name: 'promote_task',
    description: 'Move a pending task to created (pm/architect only)',
    inputSchema: {
      type: 'object',
      properties: { taskId: taskIdProperty, agentId: agentIdProperty },
      required: ['taskId'],
    },
  },
  {
    name: 'get_next_task',
    description: 'Wait for the next task this agent may take. Does not lock it; call lock_task next.',
    inputSchema: {
      type: 'object',
      properties: {
        agentId: agentIdProperty,
        role: { type: 'string', enum: ROLES, description: 'Default: the session role' },
        skillLevel: { type: 'string', enum: SKILLS, description: 'Default: the session skill level' },
        waitMs: { type: 'number', description: 'How long to wait for work (default: 0)' },
      },
    },
  },
  {
    name: 'lock_task',
    description: 'Take exclusive ownership of a created task',
    inputSchema: {
      type: 'object',
      properties: {
        taskId: taskIdProperty,
        agentId: agentIdProperty,
        executionContext: { type: 'string', description: 'Opaque context stored with the lock' },
      },
      required: ['taskId'],
    },
  },
  {
    name: 'update_task_status',
    description: 'Move a task along its workflow (dev_done, testing, qa_done, completed, or back to created)',
    inputSchema: {
      type: 'object',
      properties: {
        taskId: taskIdProperty,
        agentId: agentIdProperty,
        status: { type: 'string', enum: STATUSES },
        notes: { type: 'string' },
      },
      required: ['taskId', 'status'],
    },
  },
  {
    name: 'force_release',
    description: 'Administratively release a held task (requires the admin key)',
    inputSchema: {
      type: 'object',
      properties: {
        taskId: taskIdProperty,
        onlyIfStale: { type: 'boolean', description: 'Refuse if the lock is not stale' },
        releasedBy: { type: 'string' },
      },
      required: ['taskId'],
    },
  },
  {
    name: 'list_stale_locks',
    description: 'List held tasks whose lock is older than the stale threshold',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'task_history',
    description: 'Status changes of one task, oldest first',
    inputSchema: {
      type: 'object',
      properties: { taskId: taskIdProperty },
      required: ['taskId'],
    },
  },
  {
    name: 'changes_since',
    description: 'Status changes of all tasks after a timestamp',
    inputSchema: {
      type: 'object',
      properties: { since: { type: 'string', description: 'ISO timestamp; omit for all' } },
    },
  },
];
