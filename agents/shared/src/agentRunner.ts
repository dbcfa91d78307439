/**
 * AgentRunner - the work loop of an agent process
 *
 * Usage:
 *   const runner = new AgentRunner({ agentId, role, skillLevel, client, journal, executor, ... });
 *
 *   // On startup: register, then reconcile the journal before any matching
 *   await runner.onStartup();
 *
 *   // Forever, until the signal aborts
 *   await runner.runContinuous(signal);
 */

import { AgentLogger } from './logger.js';
import { AlreadyLockedError, InvalidTransitionError, NotLockHolderError, StoreUnavailableError } from './errors.js';
import { sleep, withStoreRetry, type RetryOptions } from './retry.js';
import { snapshotFromTask, type JournalEntry, type RecoveryJournal } from './recoveryJournal.js';
import type { AgentRecord, AgentRole, CoordinatorOperations, SkillLevel, TaskRecord } from './types.js';

export interface ExecutionResult {
  success: boolean;
  summary?: string;
}

export interface ExecutionContext {
  signal: AbortSignal;
  executionContext: string | null;
  resumed: boolean;
}

export type TaskExecutor = (task: TaskRecord, context: ExecutionContext) => Promise<ExecutionResult>;

export interface AgentRunnerOptions {
  agentId: string;
  role: AgentRole;
  skillLevel: SkillLevel;
  client: CoordinatorOperations;
  journal: RecoveryJournal;
  executor: TaskExecutor;
  waitMs: number;
  executionTimeoutMs: number;
  executionContext?: string | null;
  /** Pause after an unexpected error before the next cycle */
  errorBackoffMs?: number;
  retry?: Omit<RetryOptions, 'signal' | 'logger' | 'operation'>;
}

export type CycleOutcome =
  | { kind: 'completed'; taskId: number }
  | { kind: 'released'; taskId: number; reason: string }
  | { kind: 'timed-out'; taskId: number }
  | { kind: 'lost'; taskId: number }
  | { kind: 'idle'; waitedMs: number }
  | { kind: 'cancelled' };

export interface StartupResult {
  agent: AgentRecord;
  recovered: JournalEntry | null;
}

export class AgentRunner {
  private logger: AgentLogger;
  private started = false;
  private resumable: JournalEntry | null = null;

  constructor(private options: AgentRunnerOptions) {
    this.logger = new AgentLogger(`Runner:${options.agentId}`);
  }

  get pendingRecovery(): JournalEntry | null {
    return this.resumable;
  }

  private retry<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withStoreRetry(fn, { ...this.options.retry, signal, logger: this.logger, operation });
  }

  /**
   * Register with the coordinator and reconcile the journal. Must complete
   * before the first request for new work.
   */
  async onStartup(signal?: AbortSignal): Promise<StartupResult> {
    const { agentId, role, skillLevel, client, journal } = this.options;
    this.logger.info('Starting up', { agentId, role });

    const agent = await this.retry('register', () => client.register({ agentId, role, skillLevel }), signal);
    const recovered = await this.retry('recover', () => journal.recover(agentId, client), signal);

    this.resumable = recovered;
    this.started = true;

    if (recovered) {
      this.logger.warn('Resuming task from previous session', { taskId: recovered.taskId, status: recovered.status });
    }
    this.logger.info('Startup complete', { agentId, status: recovered ? 'resuming' : 'fresh' });
    return { agent, recovered };
  }

  /**
   * One cycle: resume the recovered task, or wait for and lock a new one,
   * then execute it.
   */
  async runOnce(signal?: AbortSignal): Promise<CycleOutcome> {
    if (!this.started) {
      await this.onStartup(signal);
    }
    if (signal?.aborted) {
      return { kind: 'cancelled' };
    }

    const { agentId, role, skillLevel, waitMs, client, journal } = this.options;

    if (this.resumable) {
      // The held task may have been force-released or reassigned since
      const entry = await this.retry('recover', () => journal.recover(agentId, client), signal);
      this.resumable = entry;
      if (entry) {
        const task = await this.retry('getTask', () => client.getTask(entry.taskId), signal);
        return this.execute(task, entry, true, signal);
      }
    }

    while (true) {
      const result = await this.retry(
        'nextTask',
        () => client.nextTask({ agentId, role, skillLevel, waitMs, signal }),
        signal
      );
      if (result.outcome === 'cancelled') {
        return { kind: 'cancelled' };
      }
      if (result.outcome === 'timeout') {
        return { kind: 'idle', waitedMs: result.waitedMs };
      }

      const locked = await this.acquire(result.task, signal);
      if (!locked) {
        continue;
      }

      let entry: JournalEntry;
      try {
        entry = journal.record(agentId, snapshotFromTask(locked));
      } catch (error) {
        await this.abandon(locked, 'journal write failed', signal);
        throw error;
      }
      return this.execute(locked, entry, false, signal);
    }
  }

  /**
   * Lock a matched task. The lock call is never repeated: after an outage or
   * a lost race the task is read back, and a lock that did commit for this
   * agent is adopted. Returns null when the task went to someone else.
   */
  private async acquire(candidate: TaskRecord, signal: AbortSignal | undefined): Promise<TaskRecord | null> {
    const { agentId, client } = this.options;
    try {
      const token = await client.lock(candidate.id, agentId, this.options.executionContext ?? null);
      return {
        ...candidate,
        status: 'locked',
        lockedBy: token.agentId,
        lockedAt: token.lockedAt,
        executionContext: token.executionContext,
      };
    } catch (error) {
      if (!(error instanceof AlreadyLockedError || error instanceof StoreUnavailableError)) {
        throw error;
      }
      const current = await this.retry('getTask', () => client.getTask(candidate.id), signal);
      if (current.status === 'locked' && current.lockedBy === agentId) {
        this.logger.warn('Lock committed despite the error, adopting it', { taskId: candidate.id, error });
        return current;
      }
      this.logger.debug('Lost lock race, matching again', { taskId: candidate.id, status: current.status });
      return null;
    }
  }

  /** Hand a locked task back to the backlog; failures are logged */
  private async abandon(task: TaskRecord, reason: string, signal: AbortSignal | undefined): Promise<void> {
    const { agentId, client } = this.options;
    try {
      await this.retry('setStatus', () => client.setStatus(task.id, agentId, 'created', reason), signal);
      this.logger.warn('Released task', { taskId: task.id, error: reason });
    } catch (error) {
      this.logger.error('Could not release task, it stays locked until force-released', { taskId: task.id, error });
    }
  }

  private async execute(
    task: TaskRecord,
    entry: JournalEntry,
    resumed: boolean,
    signal: AbortSignal | undefined
  ): Promise<CycleOutcome> {
    const { agentId, client, journal, executor, executionTimeoutMs } = this.options;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, executionTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.info(resumed ? 'Resuming task' : 'Executing task', { taskId: task.id });

    let result: ExecutionResult;
    try {
      result = await executor(task, { signal: controller.signal, executionContext: entry.executionContext, resumed });
    } catch (error) {
      result = { success: false, summary: error instanceof Error ? error.message : String(error) };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    if (timedOut) {
      // Lock and journal stay; the next cycle resumes the same task
      this.resumable = entry;
      this.logger.warn('Execution timed out, keeping lock for retry', { taskId: task.id, latencyMs: executionTimeoutMs });
      return { kind: 'timed-out', taskId: task.id };
    }
    if (signal?.aborted) {
      // Shutting down: behave like a crash so the next start resumes
      this.resumable = entry;
      return { kind: 'cancelled' };
    }

    const next = result.success ? 'dev_done' : 'created';
    try {
      await this.retry('setStatus', () => client.setStatus(task.id, agentId, next, result.summary), signal);
    } catch (error) {
      // A force release moves the task on, so the holder edge may no longer exist
      if (error instanceof NotLockHolderError || error instanceof InvalidTransitionError) {
        this.logger.warn('Lock was taken away during execution', { taskId: task.id, error });
        journal.clear(agentId);
        this.resumable = null;
        return { kind: 'lost', taskId: task.id };
      }
      throw error;
    }

    journal.clear(agentId);
    this.resumable = null;

    if (result.success) {
      this.logger.info('Task completed', { taskId: task.id, status: next });
      return { kind: 'completed', taskId: task.id };
    }
    const reason = result.summary ?? 'execution failed';
    this.logger.warn('Task failed, released for another agent', { taskId: task.id, error: reason });
    return { kind: 'released', taskId: task.id, reason };
  }

  /**
   * Run cycles until the signal aborts. Unexpected errors are logged and
   * followed by a pause; they never end the loop.
   */
  async runContinuous(signal: AbortSignal): Promise<void> {
    const backoffMs = this.options.errorBackoffMs ?? 5_000;
    while (!signal.aborted) {
      try {
        const outcome = await this.runOnce(signal);
        if (outcome.kind === 'idle') {
          this.logger.info('No eligible work', { role: this.options.role, latencyMs: outcome.waitedMs });
        }
      } catch (error) {
        this.logger.error('Cycle failed', { error });
        await sleep(backoffMs, signal);
      }
    }
    this.logger.info('Runner stopped', { agentId: this.options.agentId });
  }
}
