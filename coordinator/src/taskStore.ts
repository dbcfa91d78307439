/**
 * Entity store for agents, tasks and the status changelog.
 *
 * Every status write goes through `conditionalUpdate`, a single
 * `UPDATE ... WHERE id = ? AND status = ? AND locked_by IS ?` whose success is
 * read from the affected-row count. Two writers racing on the same task can
 * therefore never both succeed, whichever process they run in.
 */

import { EventEmitter } from 'events';
import type Database from 'better-sqlite3';
import { AgentLogger } from '../../agents/shared/src/logger.js';
import { StoreUnavailableError, type ErrorContext } from '../../agents/shared/src/errors.js';
import type {
  AgentRecord,
  AgentRole,
  SkillLevel,
  TaskChange,
  TaskComplexity,
  TaskRecord,
  TaskStatus,
} from '../../agents/shared/src/types.js';
import { openDatabase, type OpenDatabaseOptions } from './db.js';

export interface NewTask {
  title: string;
  description: string;
  targetRole: AgentRole;
  skillLevel: SkillLevel;
  complexity: TaskComplexity;
  status: TaskStatus;
  branch: string | null;
  notes: string | null;
  createdBy: string | null;
}

export interface TaskFilter {
  role?: AgentRole | undefined;
  status?: TaskStatus | undefined;
  limit?: number | undefined;
}

export interface ConditionalUpdate {
  taskId: number;
  expectedStatus: TaskStatus;
  expectedLockedBy: string | null;
  status: TaskStatus;
  lockedBy: string | null;
  /** Left unchanged when undefined */
  executionContext?: string | null | undefined;
  /** Left unchanged when undefined */
  notes?: string | null | undefined;
  changedBy: string | null;
}

export type ChangeListener = (change: TaskChange) => void;

export interface TaskStore {
  upsertAgent(agent: { agentId: string; role: AgentRole; skillLevel: SkillLevel }): AgentRecord;
  getAgent(agentId: string): AgentRecord | null;
  touchAgent(agentId: string): AgentRecord | null;
  listAgents(): AgentRecord[];

  insertTask(task: NewTask): TaskRecord;
  getTask(taskId: number): TaskRecord | null;
  listTasks(filter?: TaskFilter): TaskRecord[];
  /** Tasks in `created` for a role, in creation order */
  listCandidates(role: AgentRole): TaskRecord[];
  /** Tasks that currently have a lock holder */
  listHeld(): TaskRecord[];
  countByStatus(): Record<TaskStatus, number>;

  /** Returns the updated task, or null when the guard did not match */
  conditionalUpdate(update: ConditionalUpdate): TaskRecord | null;

  listChanges(taskId: number): TaskChange[];
  listChangesSince(since?: string, limit?: number): TaskChange[];

  onChange(listener: ChangeListener): () => void;
  close(): void;
}

interface AgentRow {
  agent_id: string;
  role: AgentRole;
  skill_level: SkillLevel;
  registered_at: string;
  last_seen_at: string;
}

interface TaskRow {
  id: number;
  title: string;
  description: string;
  target_role: AgentRole;
  skill_level: SkillLevel;
  complexity: TaskComplexity;
  status: TaskStatus;
  locked_by: string | null;
  locked_at: string | null;
  execution_context: string | null;
  branch: string | null;
  notes: string | null;
  created_by: string | null;
  created_at: string;
  updated_at: string;
}

interface ChangeRow {
  id: number;
  task_id: number;
  old_status: TaskStatus | null;
  new_status: TaskStatus;
  changed_by: string | null;
  notes: string | null;
  changed_at: string;
}

const UNAVAILABLE_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_CANTOPEN', 'SQLITE_FULL', 'SQLITE_READONLY', 'SQLITE_CORRUPT', 'SQLITE_NOTADB'];

/**
 * Infrastructure failures become StoreUnavailable. Constraint violations and
 * programming errors pass through untouched.
 */
export function isStoreOutage(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && typeof error.code === 'string') {
    const code = error.code;
    return UNAVAILABLE_CODES.some((prefix) => code === prefix || code.startsWith(`${prefix}_`));
  }
  return error instanceof TypeError && /database connection is not open/i.test(error.message);
}

export interface SqliteTaskStoreOptions extends OpenDatabaseOptions {
  now?: () => Date;
}

export class SqliteTaskStore implements TaskStore {
  private db: Database.Database;
  private logger: AgentLogger;
  private events = new EventEmitter();
  private now: () => Date;

  constructor(dbPathOrDb: string | Database.Database, options: SqliteTaskStoreOptions = {}) {
    this.logger = new AgentLogger('TaskStore');
    this.now = options.now ?? (() => new Date());
    this.db = typeof dbPathOrDb === 'string' ? openDatabase(dbPathOrDb, options) : dbPathOrDb;
    this.events.setMaxListeners(0);
    this.logger.debug('Store opened', { path: this.db.name });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private guard<T>(operation: string, context: ErrorContext, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isStoreOutage(error)) {
        this.logger.error('Store operation failed', { operation, error });
        throw new StoreUnavailableError(operation, context, error);
      }
      throw error;
    }
  }

  // ============================================
  // Agents
  // ============================================

  upsertAgent(agent: { agentId: string; role: AgentRole; skillLevel: SkillLevel }): AgentRecord {
    return this.guard('upsertAgent', { agentId: agent.agentId }, () => {
      const now = this.timestamp();
      this.db
        .prepare<[string, AgentRole, SkillLevel, string, string]>(`
          INSERT INTO agents (agent_id, role, skill_level, registered_at, last_seen_at)
          VALUES (?, ?, ?, ?, ?)
          ON CONFLICT(agent_id) DO UPDATE SET
            role = excluded.role,
            skill_level = excluded.skill_level,
            last_seen_at = excluded.last_seen_at
        `)
        .run(agent.agentId, agent.role, agent.skillLevel, now, now);
      return this.requireAgent(agent.agentId);
    });
  }

  getAgent(agentId: string): AgentRecord | null {
    return this.guard('getAgent', { agentId }, () => {
      const row = this.db.prepare<[string], AgentRow>('SELECT * FROM agents WHERE agent_id = ?').get(agentId);
      return row ? rowToAgent(row) : null;
    });
  }

  touchAgent(agentId: string): AgentRecord | null {
    return this.guard('touchAgent', { agentId }, () => {
      const result = this.db
        .prepare<[string, string]>('UPDATE agents SET last_seen_at = ? WHERE agent_id = ?')
        .run(this.timestamp(), agentId);
      return result.changes === 1 ? this.requireAgent(agentId) : null;
    });
  }

  listAgents(): AgentRecord[] {
    return this.guard('listAgents', {}, () =>
      this.db.prepare<[], AgentRow>('SELECT * FROM agents ORDER BY registered_at, agent_id').all().map(rowToAgent)
    );
  }

  private requireAgent(agentId: string): AgentRecord {
    const row = this.db.prepare<[string], AgentRow>('SELECT * FROM agents WHERE agent_id = ?').get(agentId);
    if (!row) {
      throw new Error(`Agent ${agentId} vanished during write`);
    }
    return rowToAgent(row);
  }

  // ============================================
  // Tasks
  // ============================================

  insertTask(task: NewTask): TaskRecord {
    const { record, change } = this.guard('insertTask', { title: task.title }, () =>
      this.db.transaction(() => {
        const now = this.timestamp();
        const result = this.db
          .prepare(`
            INSERT INTO tasks (title, description, target_role, skill_level, complexity, status, branch, notes, created_by, created_at, updated_at)
            VALUES (@title, @description, @targetRole, @skillLevel, @complexity, @status, @branch, @notes, @createdBy, @now, @now)
          `)
          .run({ ...task, now });
        const taskId = Number(result.lastInsertRowid);
        const change = this.appendChange(taskId, null, task.status, task.createdBy, task.notes, now);
        return { record: this.requireTask(taskId), change };
      })()
    );
    this.emitChange(change);
    return record;
  }

  getTask(taskId: number): TaskRecord | null {
    return this.guard('getTask', { taskId }, () => {
      const row = this.db.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(taskId);
      return row ? rowToTask(row) : null;
    });
  }

  listTasks(filter: TaskFilter = {}): TaskRecord[] {
    return this.guard('listTasks', {}, () => {
      const clauses: string[] = [];
      const params: Array<string | number> = [];
      if (filter.role) {
        clauses.push('target_role = ?');
        params.push(filter.role);
      }
      if (filter.status) {
        clauses.push('status = ?');
        params.push(filter.status);
      }
      const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
      params.push(filter.limit ?? 100);
      return this.db
        .prepare<Array<string | number>, TaskRow>(`SELECT * FROM tasks ${where} ORDER BY created_at, id LIMIT ?`)
        .all(...params)
        .map(rowToTask);
    });
  }

  listCandidates(role: AgentRole): TaskRecord[] {
    return this.guard('listCandidates', { role }, () =>
      this.db
        .prepare<[AgentRole], TaskRow>(
          "SELECT * FROM tasks WHERE target_role = ? AND status = 'created' ORDER BY created_at, id"
        )
        .all(role)
        .map(rowToTask)
    );
  }

  listHeld(): TaskRecord[] {
    return this.guard('listHeld', {}, () =>
      this.db
        .prepare<[], TaskRow>("SELECT * FROM tasks WHERE status IN ('locked', 'testing') ORDER BY locked_at, id")
        .all()
        .map(rowToTask)
    );
  }

  countByStatus(): Record<TaskStatus, number> {
    return this.guard('countByStatus', {}, () => {
      const counts: Record<TaskStatus, number> = {
        pending: 0,
        created: 0,
        locked: 0,
        dev_done: 0,
        testing: 0,
        qa_done: 0,
        completed: 0,
      };
      const rows = this.db
        .prepare<[], { status: TaskStatus; count: number }>('SELECT status, COUNT(*) AS count FROM tasks GROUP BY status')
        .all();
      for (const row of rows) {
        counts[row.status] = row.count;
      }
      return counts;
    });
  }

  conditionalUpdate(update: ConditionalUpdate): TaskRecord | null {
    const outcome = this.guard(
      'conditionalUpdate',
      { taskId: update.taskId, status: update.status },
      () =>
        this.db.transaction(() => {
          const now = this.timestamp();
          const lockedAt = update.lockedBy === null ? null : now;
          const result = this.db
            .prepare(`
              UPDATE tasks SET
                status = @status,
                locked_by = @lockedBy,
                locked_at = @lockedAt,
                execution_context = CASE WHEN @setContext = 1 THEN @executionContext ELSE execution_context END,
                notes = CASE WHEN @setNotes = 1 THEN @notes ELSE notes END,
                updated_at = @now
              WHERE id = @taskId AND status = @expectedStatus AND locked_by IS @expectedLockedBy
            `)
            .run({
              taskId: update.taskId,
              expectedStatus: update.expectedStatus,
              expectedLockedBy: update.expectedLockedBy,
              status: update.status,
              lockedBy: update.lockedBy,
              lockedAt,
              setContext: update.executionContext === undefined ? 0 : 1,
              executionContext: update.executionContext ?? null,
              setNotes: update.notes === undefined ? 0 : 1,
              notes: update.notes ?? null,
              now,
            });

          if (result.changes !== 1) {
            return null;
          }
          const change = this.appendChange(
            update.taskId,
            update.expectedStatus,
            update.status,
            update.changedBy,
            update.notes ?? null,
            now
          );
          return { record: this.requireTask(update.taskId), change };
        })()
    );

    if (!outcome) return null;
    this.emitChange(outcome.change);
    return outcome.record;
  }

  private requireTask(taskId: number): TaskRecord {
    const row = this.db.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(taskId);
    if (!row) {
      throw new Error(`Task ${taskId} vanished during write`);
    }
    return rowToTask(row);
  }

  // ============================================
  // Changelog
  // ============================================

  private appendChange(
    taskId: number,
    oldStatus: TaskStatus | null,
    newStatus: TaskStatus,
    changedBy: string | null,
    notes: string | null,
    changedAt: string
  ): TaskChange {
    const result = this.db
      .prepare<[number, TaskStatus | null, TaskStatus, string | null, string | null, string]>(`
        INSERT INTO task_changes (task_id, old_status, new_status, changed_by, notes, changed_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(taskId, oldStatus, newStatus, changedBy, notes, changedAt);
    return {
      id: Number(result.lastInsertRowid),
      taskId,
      oldStatus,
      newStatus,
      changedBy,
      notes,
      changedAt,
    };
  }

  listChanges(taskId: number): TaskChange[] {
    return this.guard('listChanges', { taskId }, () =>
      this.db
        .prepare<[number], ChangeRow>('SELECT * FROM task_changes WHERE task_id = ? ORDER BY id')
        .all(taskId)
        .map(rowToChange)
    );
  }

  listChangesSince(since?: string, limit = 500): TaskChange[] {
    return this.guard('listChangesSince', {}, () =>
      this.db
        .prepare<[string, number], ChangeRow>('SELECT * FROM task_changes WHERE changed_at > ? ORDER BY id LIMIT ?')
        .all(since ?? '', limit)
        .map(rowToChange)
    );
  }

  // ============================================
  // Subscriptions and lifecycle
  // ============================================

  onChange(listener: ChangeListener): () => void {
    this.events.on('change', listener);
    return () => {
      this.events.off('change', listener);
    };
  }

  private emitChange(change: TaskChange): void {
    this.events.emit('change', change);
  }

  close(): void {
    this.events.removeAllListeners();
    if (this.db.open) {
      this.db.close();
    }
  }
}

function rowToAgent(row: AgentRow): AgentRecord {
  return {
    agentId: row.agent_id,
    role: row.role,
    skillLevel: row.skill_level,
    registeredAt: row.registered_at,
    lastSeenAt: row.last_seen_at,
  };
}

function rowToTask(row: TaskRow): TaskRecord {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    targetRole: row.target_role,
    skillLevel: row.skill_level,
    complexity: row.complexity,
    status: row.status,
    lockedBy: row.locked_by,
    lockedAt: row.locked_at,
    executionContext: row.execution_context,
    branch: row.branch,
    notes: row.notes,
    createdBy: row.created_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToChange(row: ChangeRow): TaskChange {
  return {
    id: row.id,
    taskId: row.task_id,
    oldStatus: row.old_status,
    newStatus: row.new_status,
    changedBy: row.changed_by,
    notes: row.notes,
    changedAt: row.changed_at,
  };
}
