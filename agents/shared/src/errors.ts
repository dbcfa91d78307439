/**
 * Coordination error taxonomy
 *
 * Every failure the core can report carries a stable code, the HTTP status the
 * API maps it to, and the context (task id, agent id, operation) a caller
 * needs to decide between retry and abort.
 */

import { TaskStatusSchema, type TaskStatus } from './types.js';

export type ErrorCode =
  // Caller / business-logic errors
  | 'INVALID_TRANSITION'
  | 'VALIDATION_FAILED'
  | 'PERMISSION_DENIED'
  | 'TASK_NOT_FOUND'
  | 'AGENT_NOT_FOUND'

  // Expected contention outcomes
  | 'ALREADY_LOCKED'
  | 'NOT_LOCK_HOLDER'
  | 'LOCK_NOT_STALE'

  // Infrastructure
  | 'STORE_UNAVAILABLE'
  | 'JOURNAL_CORRUPT'
  | 'UNAUTHORIZED'
  | 'INTERNAL';

export type ErrorContext = Record<string, string | number | boolean | null | undefined>;

export class CoordinationError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, httpStatus: number, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
    this.context = context;
  }

  toJSON(): { code: ErrorCode; message: string; context: ErrorContext } {
    return { code: this.code, message: this.message, context: this.context };
  }
}

export class InvalidTransitionError extends CoordinationError {
  readonly current: TaskStatus;
  readonly requested: TaskStatus;

  constructor(current: TaskStatus, requested: TaskStatus, context: ErrorContext = {}) {
    const reason = typeof context.reason === 'string' ? ` (${context.reason})` : '';
    super('INVALID_TRANSITION', `Invalid transition ${current} -> ${requested}${reason}`, 409, {
      ...context,
      current,
      requested,
    });
    this.current = current;
    this.requested = requested;
  }
}

export class AlreadyLockedError extends CoordinationError {
  constructor(taskId: number, heldBy: string | null, status: TaskStatus) {
    // Nobody holds it: the task is simply in a status nothing can lock from
    const context: ErrorContext =
      heldBy === null ? { taskId, heldBy, status, reason: `not pickable (status ${status})` } : { taskId, heldBy, status };
    super('ALREADY_LOCKED', `Task ${taskId} is not available for locking (status ${status})`, 409, context);
  }
}

export class NotLockHolderError extends CoordinationError {
  constructor(taskId: number, agentId: string, heldBy: string | null) {
    super('NOT_LOCK_HOLDER', `Agent ${agentId} does not hold the lock on task ${taskId}`, 409, {
      taskId,
      agentId,
      heldBy,
    });
  }
}

export class LockNotStaleError extends CoordinationError {
  constructor(taskId: number, ageMs: number, staleAfterMs: number) {
    super('LOCK_NOT_STALE', `Lock on task ${taskId} is ${ageMs}ms old, stale after ${staleAfterMs}ms`, 409, {
      taskId,
      ageMs,
      staleAfterMs,
    });
  }
}

export class StoreUnavailableError extends CoordinationError {
  constructor(operation: string, context: ErrorContext = {}, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('STORE_UNAVAILABLE', `Store unavailable during ${operation}${detail}`, 503, { ...context, operation }, { cause });
  }
}

export class JournalCorruptError extends CoordinationError {
  constructor(agentId: string, path: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('JOURNAL_CORRUPT', `Recovery journal for ${agentId} is unreadable${detail}`, 500, { agentId, path }, { cause });
  }
}

export class TaskNotFoundError extends CoordinationError {
  constructor(taskId: number) {
    super('TASK_NOT_FOUND', `Task ${taskId} not found`, 404, { taskId });
  }
}

export class AgentNotFoundError extends CoordinationError {
  constructor(agentId: string) {
    super('AGENT_NOT_FOUND', `Agent ${agentId} is not registered`, 404, { agentId });
  }
}

export class PermissionDeniedError extends CoordinationError {
  constructor(message: string, context: ErrorContext = {}) {
    super('PERMISSION_DENIED', message, 403, context);
  }
}

export class ValidationError extends CoordinationError {
  constructor(message: string, context: ErrorContext = {}) {
    super('VALIDATION_FAILED', message, 400, context);
  }
}

export class UnauthorizedError extends CoordinationError {
  constructor(message = 'Invalid API key') {
    super('UNAUTHORIZED', message, 401);
  }
}

export function isCoordinationError(error: unknown): error is CoordinationError {
  return error instanceof CoordinationError;
}

function contextString(context: ErrorContext, key: string): string | null {
  const value = context[key];
  return typeof value === 'string' ? value : null;
}

function contextNumber(context: ErrorContext, key: string): number {
  const value = context[key];
  return typeof value === 'number' ? value : Number(value ?? 0);
}

function isTaskStatus(value: unknown): value is TaskStatus {
  return TaskStatusSchema.safeParse(value).success;
}

/**
 * Rebuild a typed error from the `{ error: { code, message, context } }`
 * payload the API sends, so remote callers can branch on the same classes.
 */
export function errorFromPayload(
  payload: { code?: unknown; message?: unknown; context?: unknown },
  httpStatus: number
): CoordinationError {
  const message = typeof payload.message === 'string' ? payload.message : `Request failed with status ${httpStatus}`;
  const context: ErrorContext = {};
  if (payload.context && typeof payload.context === 'object') {
    for (const [key, value] of Object.entries(payload.context)) {
      if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        context[key] = value;
      }
    }
  }

  switch (payload.code) {
    case 'INVALID_TRANSITION': {
      const current = context.current;
      const requested = context.requested;
      if (isTaskStatus(current) && isTaskStatus(requested)) {
        return new InvalidTransitionError(current, requested, context);
      }
      break;
    }
    case 'ALREADY_LOCKED': {
      const status = context.status;
      return new AlreadyLockedError(contextNumber(context, 'taskId'), contextString(context, 'heldBy'), isTaskStatus(status) ? status : 'locked');
    }
    case 'NOT_LOCK_HOLDER':
      return new NotLockHolderError(
        contextNumber(context, 'taskId'),
        contextString(context, 'agentId') ?? 'unknown',
        contextString(context, 'heldBy')
      );
    case 'LOCK_NOT_STALE':
      return new LockNotStaleError(contextNumber(context, 'taskId'), contextNumber(context, 'ageMs'), contextNumber(context, 'staleAfterMs'));
    case 'STORE_UNAVAILABLE':
      return new StoreUnavailableError(contextString(context, 'operation') ?? 'remote call', context);
    case 'TASK_NOT_FOUND':
      return new TaskNotFoundError(contextNumber(context, 'taskId'));
    case 'AGENT_NOT_FOUND':
      return new AgentNotFoundError(contextString(context, 'agentId') ?? 'unknown');
    case 'PERMISSION_DENIED':
      return new PermissionDeniedError(message, context);
    case 'VALIDATION_FAILED':
      return new ValidationError(message, context);
    case 'UNAUTHORIZED':
      return new UnauthorizedError(message);
  }

  return new CoordinationError('INTERNAL', message, httpStatus, context);
}
