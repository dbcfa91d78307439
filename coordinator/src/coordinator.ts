/**
 * Coordinator: the in-process implementation of the operation set.
 *
 * HTTP routes, the MCP bridge and tests all go through this facade, so every
 * caller sees the same validation, permission and contention rules.
 */

import type { z } from 'zod';
import { AgentLogger } from '../../agents/shared/src/logger.js';
import type { CoordinatorConfig } from '../../agents/shared/src/config.js';
import {
  AgentNotFoundError,
  InvalidTransitionError,
  NotLockHolderError,
  PermissionDeniedError,
  TaskNotFoundError,
  ValidationError,
} from '../../agents/shared/src/errors.js';
import {
  CreateTaskSchema,
  ForceReleaseRequestSchema,
  NextTaskQuerySchema,
  RegisterAgentSchema,
  TaskListQuerySchema,
  AgentIdSchema,
  type AgentRecord,
  type CoordinatorOperations,
  type CreateTaskInput,
  type ForceReleaseOptions,
  type LockToken,
  type NextTaskQuery,
  type NextTaskResult,
  type RegisterAgentInput,
  type TaskChange,
  type TaskListQuery,
  type TaskRecord,
  type TaskStatus,
  TASK_STATUSES,
} from '../../agents/shared/src/types.js';
import { LockManager } from './lockManager.js';
import { StateMachine, type WorkflowPolicy } from './stateMachine.js';
import { SqliteTaskStore, type TaskStore } from './taskStore.js';
import { WaitCoordinator } from './waitCoordinator.js';

const ACTIVE_WINDOW_MS = 5 * 60 * 1000;

export interface CoordinatorStatus {
  tasks: Record<TaskStatus, number>;
  totalTasks: number;
  agents: number;
  activeAgents: number;
  staleLocks: number;
}

export interface CoordinatorDeps {
  store: TaskStore;
  machine: StateMachine;
  locks: LockManager;
  waits: WaitCoordinator;
  now?: () => number;
}

export function parseInput<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, value: unknown): Output {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
    throw new ValidationError(issue ? `${field ? `${field}: ` : ''}${issue.message}` : 'Invalid input', { field });
  }
  return result.data;
}

export class Coordinator implements CoordinatorOperations {
  private logger = new AgentLogger('Coordinator');
  readonly store: TaskStore;
  readonly machine: StateMachine;
  readonly locks: LockManager;
  readonly waits: WaitCoordinator;
  private now: () => number;

  constructor(deps: CoordinatorDeps) {
    this.store = deps.store;
    this.machine = deps.machine;
    this.locks = deps.locks;
    this.waits = deps.waits;
    this.now = deps.now ?? Date.now;
  }

  // ============================================
  // Agents
  // ============================================

  async register(input: RegisterAgentInput): Promise<AgentRecord> {
    const agent = parseInput(RegisterAgentSchema, input);
    const record = this.store.upsertAgent(agent);
    this.logger.info('Agent registered', { agentId: record.agentId, role: record.role });
    return record;
  }

  async heartbeat(agentId: string): Promise<AgentRecord> {
    const id = parseInput(AgentIdSchema, agentId);
    const record = this.store.touchAgent(id);
    if (!record) {
      throw new AgentNotFoundError(id);
    }
    return record;
  }

  async listAgents(): Promise<AgentRecord[]> {
    return this.store.listAgents();
  }

  private requireAgent(agentId: string): AgentRecord {
    const id = parseInput(AgentIdSchema, agentId);
    const agent = this.store.touchAgent(id);
    if (!agent) {
      throw new AgentNotFoundError(id);
    }
    return agent;
  }

  // ============================================
  // Tasks
  // ============================================

  async createTask(input: CreateTaskInput): Promise<TaskRecord> {
    const request = parseInput(CreateTaskSchema, input);
    const creator = request.createdBy ? this.requireAgent(request.createdBy) : null;
    const ready = creator !== null && this.machine.isPrivileged(creator.role) && !request.stage;

    const task = this.store.insertTask({
      title: request.title,
      description: request.description,
      targetRole: request.targetRole,
      skillLevel: request.skillLevel,
      complexity: request.complexity,
      status: ready ? 'created' : 'pending',
      branch: request.branch ?? null,
      notes: request.notes ?? null,
      createdBy: creator?.agentId ?? null,
    });
    this.logger.info('Task created', { taskId: task.id, status: task.status, role: task.targetRole });
    return task;
  }

  async getTask(taskId: number): Promise<TaskRecord> {
    return this.requireTask(taskId);
  }

  private requireTask(taskId: number): TaskRecord {
    const task = this.store.getTask(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  async listTasks(query: TaskListQuery = {}): Promise<TaskRecord[]> {
    const filter = parseInput(TaskListQuerySchema, query);
    return this.store.listTasks(filter);
  }

  async promote(taskId: number, agentId: string): Promise<TaskRecord> {
    const agent = this.requireAgent(agentId);
    if (!this.machine.isPrivileged(agent.role)) {
      throw new PermissionDeniedError(`Role ${agent.role} may not promote tasks`, { taskId, agentId, role: agent.role });
    }
    const current = this.requireTask(taskId);
    if (current.status !== 'pending') {
      throw new InvalidTransitionError(current.status, 'created', { reason: 'only pending tasks can be promoted' });
    }
    return this.applyUnlockedEdge(current, 'created', agent.agentId);
  }

  async nextTask(query: NextTaskQuery): Promise<NextTaskResult> {
    const { signal, ...rest } = query;
    const request = parseInput(NextTaskQuerySchema, rest);
    if (request.agentId) {
      this.store.touchAgent(request.agentId);
    }
    return this.waits.nextTask(request.role, request.skillLevel, { deadlineMs: request.waitMs, signal });
  }

  async lock(taskId: number, agentId: string, executionContext: string | null = null): Promise<LockToken> {
    const agent = this.requireAgent(agentId);
    this.requireTask(taskId);
    return this.locks.acquire(taskId, agent.agentId, executionContext);
  }

  async setStatus(taskId: number, agentId: string, status: TaskStatus, notes?: string): Promise<TaskRecord> {
    const agent = this.requireAgent(agentId);
    if (!TASK_STATUSES.includes(status)) {
      throw new ValidationError(`Unknown status ${String(status)}`, { status });
    }
    const current = this.requireTask(taskId);
    const edge = this.machine.resolve(current.status, status, agent.role);

    if (edge.actor.kind === 'holder') {
      if (current.lockedBy !== agent.agentId) {
        throw new NotLockHolderError(taskId, agent.agentId, current.lockedBy);
      }
      return this.locks.release(taskId, agent.agentId, status, notes);
    }
    if (edge.lockEffect === 'acquire') {
      return this.locks.claim(taskId, agent.agentId, current.status, status, notes);
    }
    return this.applyUnlockedEdge(current, status, agent.agentId, notes);
  }

  private applyUnlockedEdge(current: TaskRecord, status: TaskStatus, agentId: string, notes?: string): TaskRecord {
    const updated = this.store.conditionalUpdate({
      taskId: current.id,
      expectedStatus: current.status,
      expectedLockedBy: null,
      status,
      lockedBy: null,
      notes,
      changedBy: agentId,
    });
    if (!updated) {
      const latest = this.requireTask(current.id);
      throw new InvalidTransitionError(latest.status, status, { reason: 'task changed concurrently' });
    }
    this.logger.info('Task status changed', { taskId: current.id, agentId, status });
    return updated;
  }

  // ============================================
  // Administration and history
  // ============================================

  async forceRelease(taskId: number, options: ForceReleaseOptions = {}): Promise<TaskRecord> {
    const request = parseInput(ForceReleaseRequestSchema, options);
    return this.locks.forceRelease(taskId, request);
  }

  async listStaleLocks(): Promise<TaskRecord[]> {
    return this.locks.listStale();
  }

  async taskHistory(taskId: number): Promise<TaskChange[]> {
    this.requireTask(taskId);
    return this.store.listChanges(taskId);
  }

  async changesSince(since?: string): Promise<TaskChange[]> {
    if (since !== undefined && Number.isNaN(Date.parse(since))) {
      throw new ValidationError(`since: not a timestamp: ${since}`, { field: 'since' });
    }
    return this.store.listChangesSince(since);
  }

  status(): CoordinatorStatus {
    const tasks = this.store.countByStatus();
    const totalTasks = TASK_STATUSES.reduce((sum, status) => sum + tasks[status], 0);
    const cutoff = this.now() - ACTIVE_WINDOW_MS;
    const agents = this.store.listAgents();
    return {
      tasks,
      totalTasks,
      agents: agents.length,
      activeAgents: agents.filter((agent) => Date.parse(agent.lastSeenAt) >= cutoff).length,
      staleLocks: this.locks.listStale().length,
    };
  }

  close(): void {
    this.store.close();
  }
}

export interface CreateCoordinatorOptions {
  store?: TaskStore;
  policy?: Partial<WorkflowPolicy>;
  now?: () => number;
}

export function createCoordinator(config: CoordinatorConfig, options: CreateCoordinatorOptions = {}): Coordinator {
  const now = options.now;
  const store =
    options.store ??
    new SqliteTaskStore(config.store.dbPath, {
      busyTimeoutMs: config.store.busyTimeoutMs,
      ...(now ? { now: () => new Date(now()) } : {}),
    });
  const machine = new StateMachine({ reworkTarget: config.workflow.reworkTarget, ...options.policy });
  const locks = new LockManager(store, machine, { staleAfterMs: config.locks.staleAfterMs, ...(now ? { now } : {}) });
  const waits = new WaitCoordinator(store, { ...config.wait, ...(now ? { now } : {}) });
  return new Coordinator({ store, machine, locks, waits, ...(now ? { now } : {}) });
}
