/**
 * Shared types for taskmesh agents and the coordination service
 */

import { z } from 'zod';

// Task lifecycle
export const TASK_STATUSES = [
  'pending',
  'created',
  'locked',
  'dev_done',
  'testing',
  'qa_done',
  'completed',
] as const;
export const TaskStatusSchema = z.enum(TASK_STATUSES);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

// Statuses in which a task has a lock holder
export const HELD_STATUSES: readonly TaskStatus[] = ['locked', 'testing'];

export function isHeldStatus(status: TaskStatus): boolean {
  return HELD_STATUSES.includes(status);
}

// Skill levels, ordered junior < senior < principal
export const SKILL_LEVELS = ['junior', 'senior', 'principal'] as const;
export const SkillLevelSchema = z.enum(SKILL_LEVELS);
export type SkillLevel = z.infer<typeof SkillLevelSchema>;

export const SKILL_RANK: Record<SkillLevel, number> = {
  junior: 0,
  senior: 1,
  principal: 2,
};

export const TaskComplexitySchema = z.enum(['minor', 'major']);
export type TaskComplexity = z.infer<typeof TaskComplexitySchema>;

export const AgentRoleSchema = z.enum([
  'frontend_dev',
  'backend_dev',
  'fullstack_dev',
  'qa',
  'architect',
  'pm',
]);
export type AgentRole = z.infer<typeof AgentRoleSchema>;

export interface TaskRecord {
  id: number;
  title: string;
  description: string;
  targetRole: AgentRole;
  skillLevel: SkillLevel;
  complexity: TaskComplexity;
  status: TaskStatus;
  lockedBy: string | null;
  lockedAt: string | null;
  executionContext: string | null;
  branch: string | null;
  notes: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface AgentRecord {
  agentId: string;
  role: AgentRole;
  skillLevel: SkillLevel;
  registeredAt: string;
  lastSeenAt: string;
}

export interface LockToken {
  taskId: number;
  agentId: string;
  lockedAt: string;
  executionContext: string | null;
}

export interface TaskChange {
  id: number;
  taskId: number;
  oldStatus: TaskStatus | null;
  newStatus: TaskStatus;
  changedBy: string | null;
  notes: string | null;
  changedAt: string;
}

// Request payloads (validated on both sides of the wire)
export const AgentIdSchema = z.string().trim().min(1).max(128);

export const RegisterAgentSchema = z.object({
  agentId: AgentIdSchema,
  role: AgentRoleSchema,
  skillLevel: SkillLevelSchema.default('senior'),
});
export type RegisterAgentInput = z.input<typeof RegisterAgentSchema>;

export const CreateTaskSchema = z.object({
  title: z.string().trim().min(1).max(200),
  description: z.string().default(''),
  targetRole: AgentRoleSchema,
  skillLevel: SkillLevelSchema,
  complexity: TaskComplexitySchema.default('minor'),
  branch: z.string().nullable().optional(),
  notes: z.string().nullable().optional(),
  createdBy: AgentIdSchema.optional(),
  stage: z.boolean().default(false),
});
export type CreateTaskInput = z.input<typeof CreateTaskSchema>;

export const NextTaskQuerySchema = z.object({
  agentId: AgentIdSchema.optional(),
  role: AgentRoleSchema,
  skillLevel: SkillLevelSchema,
  waitMs: z.coerce.number().int().min(0).default(0),
});
export type NextTaskQuery = z.input<typeof NextTaskQuerySchema> & {
  signal?: AbortSignal | undefined;
};

export const LockRequestSchema = z.object({
  agentId: AgentIdSchema,
  executionContext: z.string().nullable().optional(),
});

export const StatusRequestSchema = z.object({
  agentId: AgentIdSchema,
  status: TaskStatusSchema,
  notes: z.string().optional(),
});

export const PromoteRequestSchema = z.object({
  agentId: AgentIdSchema,
});

export const ForceReleaseRequestSchema = z.object({
  onlyIfStale: z.boolean().default(false),
  releasedBy: z.string().default('admin'),
});
export type ForceReleaseOptions = z.input<typeof ForceReleaseRequestSchema>;

export const TaskListQuerySchema = z.object({
  role: AgentRoleSchema.optional(),
  status: TaskStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});
export type TaskListQuery = z.input<typeof TaskListQuerySchema>;

export type NextTaskResult =
  | { outcome: 'task'; task: TaskRecord }
  | { outcome: 'timeout'; waitedMs: number }
  | { outcome: 'cancelled' };

/**
 * The operation set every caller sees, whether it talks to the coordinator
 * in-process, over HTTP, or through the MCP tool bridge.
 */
export interface CoordinatorOperations {
  register(input: RegisterAgentInput): Promise<AgentRecord>;
  heartbeat(agentId: string): Promise<AgentRecord>;
  listAgents(): Promise<AgentRecord[]>;
  createTask(input: CreateTaskInput): Promise<TaskRecord>;
  getTask(taskId: number): Promise<TaskRecord>;
  listTasks(query?: TaskListQuery): Promise<TaskRecord[]>;
  promote(taskId: number, agentId: string): Promise<TaskRecord>;
  nextTask(query: NextTaskQuery): Promise<NextTaskResult>;
  lock(taskId: number, agentId: string, executionContext?: string | null): Promise<LockToken>;
  setStatus(taskId: number, agentId: string, status: TaskStatus, notes?: string): Promise<TaskRecord>;
  forceRelease(taskId: number, options?: ForceReleaseOptions): Promise<TaskRecord>;
  listStaleLocks(): Promise<TaskRecord[]>;
  taskHistory(taskId: number): Promise<TaskChange[]>;
  changesSince(since?: string): Promise<TaskChange[]>;
}
