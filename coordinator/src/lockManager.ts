/**
 * Lock manager: exclusive task ownership through conditional updates
 */

import { AgentLogger } from '../../agents/shared/src/logger.js';
import {
  AlreadyLockedError,
  InvalidTransitionError,
  LockNotStaleError,
  NotLockHolderError,
  TaskNotFoundError,
} from '../../agents/shared/src/errors.js';
import type { LockToken, TaskRecord, TaskStatus } from '../../agents/shared/src/types.js';
import type { TaskStore } from './taskStore.js';
import type { StateMachine } from './stateMachine.js';

export interface LockManagerOptions {
  staleAfterMs: number;
  now?: () => number;
}

export interface ForceReleaseRequest {
  onlyIfStale?: boolean;
  releasedBy?: string;
}

// Where an administratively released task goes
const FORCE_RELEASE_TARGET: Partial<Record<TaskStatus, TaskStatus>> = {
  locked: 'created',
  testing: 'dev_done',
};

export class LockManager {
  private logger = new AgentLogger('LockManager');
  private now: () => number;

  constructor(
    private store: TaskStore,
    private machine: StateMachine,
    private options: LockManagerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Take the lock on a `created` task. Exactly one of any number of racing
   * callers gets a token; the rest get AlreadyLocked.
   */
  acquire(taskId: number, agentId: string, executionContext: string | null = null): LockToken {
    const updated = this.store.conditionalUpdate({
      taskId,
      expectedStatus: 'created',
      expectedLockedBy: null,
      status: 'locked',
      lockedBy: agentId,
      executionContext,
      changedBy: agentId,
    });

    if (!updated) {
      const current = this.store.getTask(taskId);
      if (!current) {
        throw new TaskNotFoundError(taskId);
      }
      this.logger.debug('Lock refused', { taskId, agentId, status: current.status });
      throw new AlreadyLockedError(taskId, current.lockedBy, current.status);
    }

    this.logger.info('Lock acquired', { taskId, agentId });
    return toToken(updated);
  }

  /**
   * Take ownership on an acquiring edge other than `created -> locked`
   * (a reviewer picking up `dev_done`).
   */
  claim(taskId: number, agentId: string, from: TaskStatus, to: TaskStatus, notes?: string): TaskRecord {
    const updated = this.store.conditionalUpdate({
      taskId,
      expectedStatus: from,
      expectedLockedBy: null,
      status: to,
      lockedBy: agentId,
      notes,
      changedBy: agentId,
    });

    if (!updated) {
      const current = this.store.getTask(taskId);
      if (!current) {
        throw new TaskNotFoundError(taskId);
      }
      throw new AlreadyLockedError(taskId, current.lockedBy, current.status);
    }

    this.logger.info('Task claimed', { taskId, agentId, status: to });
    return updated;
  }

  /**
   * Release a held task to `nextStatus`. Only the holder may do this, and only
   * along a release edge of the state machine.
   */
  release(taskId: number, agentId: string, nextStatus: TaskStatus, notes?: string): TaskRecord {
    const current = this.store.getTask(taskId);
    if (!current) {
      throw new TaskNotFoundError(taskId);
    }
    if (current.lockedBy !== agentId) {
      throw new NotLockHolderError(taskId, agentId, current.lockedBy);
    }
    if (!this.machine.isReleaseEdge(current.status, nextStatus)) {
      throw new InvalidTransitionError(current.status, nextStatus, { reason: 'not a release edge' });
    }

    const updated = this.store.conditionalUpdate({
      taskId,
      expectedStatus: current.status,
      expectedLockedBy: agentId,
      status: nextStatus,
      lockedBy: null,
      notes,
      changedBy: agentId,
    });

    if (!updated) {
      // Someone (an administrator) changed the task between read and write
      const latest = this.store.getTask(taskId);
      throw new NotLockHolderError(taskId, agentId, latest?.lockedBy ?? null);
    }

    this.logger.info('Lock released', { taskId, agentId, status: nextStatus });
    return updated;
  }

  lockAgeMs(task: TaskRecord): number | null {
    if (!task.lockedAt) return null;
    return this.now() - Date.parse(task.lockedAt);
  }

  isStale(task: TaskRecord): boolean {
    const age = this.lockAgeMs(task);
    return age !== null && age > this.options.staleAfterMs;
  }

  listStale(): TaskRecord[] {
    return this.store.listHeld().filter((task) => this.isStale(task));
  }

  /**
   * Administrative release of a held task regardless of holder. Nothing calls
   * this on a timer.
   */
  forceRelease(taskId: number, request: ForceReleaseRequest = {}): TaskRecord {
    const current = this.store.getTask(taskId);
    if (!current) {
      throw new TaskNotFoundError(taskId);
    }
    const target = FORCE_RELEASE_TARGET[current.status];
    if (!target || current.lockedBy === null) {
      throw new InvalidTransitionError(current.status, 'created', { reason: 'task is not held' });
    }
    if (request.onlyIfStale && !this.isStale(current)) {
      throw new LockNotStaleError(taskId, this.lockAgeMs(current) ?? 0, this.options.staleAfterMs);
    }

    const releasedBy = request.releasedBy ?? 'admin';
    const updated = this.store.conditionalUpdate({
      taskId,
      expectedStatus: current.status,
      expectedLockedBy: current.lockedBy,
      status: target,
      lockedBy: null,
      notes: `Force-released from ${current.lockedBy} by ${releasedBy}`,
      changedBy: releasedBy,
    });

    if (!updated) {
      const latest = this.store.getTask(taskId);
      throw new InvalidTransitionError(latest?.status ?? current.status, target, { reason: 'task changed concurrently' });
    }

    this.logger.warn('Lock force-released', { taskId, agentId: current.lockedBy, status: target, releasedBy });
    return updated;
  }
}

function toToken(task: TaskRecord): LockToken {
  if (task.lockedBy === null || task.lockedAt === null) {
    throw new Error(`Task ${task.id} has no holder after locking`);
  }
  return {
    taskId: task.id,
    agentId: task.lockedBy,
    lockedAt: task.lockedAt,
    executionContext: task.executionContext,
  };
}
