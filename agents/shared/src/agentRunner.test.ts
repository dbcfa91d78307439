import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTestCoordinator, type TestCoordinator } from '../../../coordinator/src/testHelpers.js';
import type { Coordinator } from '../../../coordinator/src/coordinator.js';
import { AgentRunner, type AgentRunnerOptions, type ExecutionContext, type ExecutionResult, type TaskExecutor } from './agentRunner.js';
import { AlreadyLockedError, StoreUnavailableError } from './errors.js';
import { RecoveryJournal, snapshotFromTask } from './recoveryJournal.js';
import type { TaskRecord } from './types.js';

describe('AgentRunner', () => {
  let env: TestCoordinator;
  let coordinator: Coordinator;
  let journal: RecoveryJournal;

  const createReadyTask = (title = 'Write the importer'): Promise<TaskRecord> =>
    coordinator.createTask({ title, targetRole: 'backend_dev', skillLevel: 'junior', createdBy: 'pm-1' });

  const makeRunner = (executor: TaskExecutor, overrides: Partial<AgentRunnerOptions> = {}): AgentRunner =>
    new AgentRunner({
      agentId: 'dev-1',
      role: 'backend_dev',
      skillLevel: 'senior',
      client: coordinator,
      journal,
      executor,
      waitMs: 0,
      executionTimeoutMs: 5_000,
      errorBackoffMs: 10,
      retry: { initialDelayMs: 1, maxDelayMs: 5 },
      ...overrides,
    });

  const succeed: TaskExecutor = async () => ({ success: true, summary: 'ok' });

  beforeEach(async () => {
    env = createTestCoordinator();
    coordinator = env.coordinator;
    journal = new RecoveryJournal({ dir: env.config.journal.dir });
    await coordinator.register({ agentId: 'pm-1', role: 'pm' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    env.cleanup();
  });

  it('locks, executes and hands off a task', async () => {
    const task = await createReadyTask();
    let journaled: number | undefined;
    const runner = makeRunner(async () => {
      journaled = journal.peek('dev-1')?.taskId;
      return { success: true, summary: 'imported' };
    });

    expect(await runner.runOnce()).toEqual({ kind: 'completed', taskId: task.id });
    expect(journaled).toBe(task.id);
    expect(await coordinator.getTask(task.id)).toMatchObject({ status: 'dev_done', lockedBy: null, notes: 'imported' });
    expect(journal.peek('dev-1')).toBeNull();
  });

  it('releases a failed task back to created', async () => {
    const task = await createReadyTask();
    const runner = makeRunner(async () => ({ success: false, summary: 'tests failed' }));

    expect(await runner.runOnce()).toEqual({ kind: 'released', taskId: task.id, reason: 'tests failed' });
    expect(await coordinator.getTask(task.id)).toMatchObject({ status: 'created', lockedBy: null });
    expect(journal.peek('dev-1')).toBeNull();
  });

  it('treats a throwing executor as a failure', async () => {
    const task = await createReadyTask();
    const runner = makeRunner(async () => {
      throw new Error('executor crashed');
    });

    expect(await runner.runOnce()).toEqual({ kind: 'released', taskId: task.id, reason: 'executor crashed' });
  });

  it('reports idle when nothing is eligible', async () => {
    const outcome = await makeRunner(succeed).runOnce();
    expect(outcome.kind).toBe('idle');
  });

  it('keeps lock and journal on execution timeout, then resumes', async () => {
    const task = await createReadyTask();
    const contexts: boolean[] = [];
    let attempt = 0;
    const runner = makeRunner(
      (_task, context: ExecutionContext) => {
        contexts.push(context.resumed);
        attempt++;
        if (attempt > 1) return Promise.resolve({ success: true });
        return new Promise<ExecutionResult>((resolve) => {
          context.signal.addEventListener('abort', () => resolve({ success: false, summary: 'aborted' }));
        });
      },
      { executionTimeoutMs: 30 }
    );

    expect(await runner.runOnce()).toEqual({ kind: 'timed-out', taskId: task.id });
    expect((await coordinator.getTask(task.id)).lockedBy).toBe('dev-1');
    expect(journal.peek('dev-1')?.taskId).toBe(task.id);
    expect(runner.pendingRecovery?.taskId).toBe(task.id);

    expect(await runner.runOnce()).toEqual({ kind: 'completed', taskId: task.id });
    expect(contexts).toEqual([false, true]);
  });

  it('reports a task lost when its lock is force-released during execution', async () => {
    const task = await createReadyTask();
    const runner = makeRunner(async (current) => {
      await coordinator.forceRelease(current.id);
      return { success: true };
    });

    expect(await runner.runOnce()).toEqual({ kind: 'lost', taskId: task.id });
    expect(journal.peek('dev-1')).toBeNull();
    expect((await coordinator.getTask(task.id)).status).toBe('created');
  });

  it('matches again after losing a lock race', async () => {
    const task = await createReadyTask();
    const lock = vi.spyOn(coordinator, 'lock').mockRejectedValueOnce(new AlreadyLockedError(task.id, 'dev-9', 'locked'));
    const nextTask = vi.spyOn(coordinator, 'nextTask');

    expect(await makeRunner(succeed).runOnce()).toEqual({ kind: 'completed', taskId: task.id });
    expect(lock).toHaveBeenCalledTimes(2);
    expect(nextTask).toHaveBeenCalledTimes(2);
  });

  it('adopts a lock that committed before an outage was reported', async () => {
    const task = await createReadyTask();
    const realLock = coordinator.lock.bind(coordinator);
    const lock = vi.spyOn(coordinator, 'lock').mockImplementationOnce(async (taskId, agentId, executionContext) => {
      await realLock(taskId, agentId, executionContext);
      throw new StoreUnavailableError('lock');
    });
    let journaled: number | undefined;
    const runner = makeRunner(async () => {
      journaled = journal.peek('dev-1')?.taskId;
      return { success: true };
    });

    expect(await runner.runOnce()).toEqual({ kind: 'completed', taskId: task.id });
    expect(lock).toHaveBeenCalledTimes(1);
    expect(journaled).toBe(task.id);
    expect((await coordinator.getTask(task.id)).status).toBe('dev_done');
  });

  it('matches again when a lock attempt hits an outage without committing', async () => {
    const task = await createReadyTask();
    const lock = vi.spyOn(coordinator, 'lock').mockRejectedValueOnce(new StoreUnavailableError('lock'));
    const nextTask = vi.spyOn(coordinator, 'nextTask');

    expect(await makeRunner(succeed).runOnce()).toEqual({ kind: 'completed', taskId: task.id });
    expect(lock).toHaveBeenCalledTimes(2);
    expect(nextTask).toHaveBeenCalledTimes(2);
  });

  it('releases the task when the journal cannot be written', async () => {
    const task = await createReadyTask();
    vi.spyOn(journal, 'record').mockImplementationOnce(() => {
      throw new Error('EACCES: permission denied');
    });
    const executor = vi.fn(succeed);

    await expect(makeRunner(executor).runOnce()).rejects.toThrow('EACCES: permission denied');
    expect(executor).not.toHaveBeenCalled();
    expect(await coordinator.getTask(task.id)).toMatchObject({
      status: 'created',
      lockedBy: null,
      notes: 'journal write failed',
    });
  });

  it('does not resume a timed-out task that was reassigned meanwhile', async () => {
    const task = await createReadyTask();
    await coordinator.register({ agentId: 'dev-2', role: 'backend_dev', skillLevel: 'senior' });
    let executions = 0;
    const runner = makeRunner(
      (_task, context) => {
        executions++;
        return new Promise<ExecutionResult>((resolve) => {
          context.signal.addEventListener('abort', () => resolve({ success: false, summary: 'aborted' }));
        });
      },
      { executionTimeoutMs: 30 }
    );

    expect(await runner.runOnce()).toEqual({ kind: 'timed-out', taskId: task.id });
    await coordinator.forceRelease(task.id);
    await coordinator.lock(task.id, 'dev-2');

    expect((await runner.runOnce()).kind).toBe('idle');
    expect(executions).toBe(1);
    expect(runner.pendingRecovery).toBeNull();
    expect(journal.peek('dev-1')).toBeNull();
    expect((await coordinator.getTask(task.id)).lockedBy).toBe('dev-2');
  });

  it('retries transient store outages', async () => {
    await createReadyTask();
    vi.spyOn(coordinator, 'nextTask').mockRejectedValueOnce(new StoreUnavailableError('nextTask'));

    expect((await makeRunner(succeed).runOnce()).kind).toBe('completed');
  });

  describe('startup recovery', () => {
    const crashWhileHolding = async (): Promise<TaskRecord> => {
      const task = await createReadyTask('Interrupted work');
      await coordinator.register({ agentId: 'dev-1', role: 'backend_dev', skillLevel: 'senior' });
      await coordinator.lock(task.id, 'dev-1', 'ctx-before-crash');
      journal.record('dev-1', snapshotFromTask(await coordinator.getTask(task.id)));
      return task;
    };

    it('resumes the journaled task before asking for new work', async () => {
      const task = await crashWhileHolding();
      await createReadyTask('Newer work');
      const nextTask = vi.spyOn(coordinator, 'nextTask');
      const seen: Array<{ id: number; context: ExecutionContext }> = [];
      const runner = makeRunner(async (current, context) => {
        seen.push({ id: current.id, context });
        return { success: true };
      });

      expect(await runner.runOnce()).toEqual({ kind: 'completed', taskId: task.id });
      expect(nextTask).not.toHaveBeenCalled();
      expect(seen).toHaveLength(1);
      expect(seen[0]?.id).toBe(task.id);
      expect(seen[0]?.context.resumed).toBe(true);
      expect(seen[0]?.context.executionContext).toBe('ctx-before-crash');
    });

    it('is idempotent', async () => {
      const task = await crashWhileHolding();
      const runner = makeRunner(succeed);

      const first = await runner.onStartup();
      const second = await runner.onStartup();

      expect(first.recovered?.taskId).toBe(task.id);
      expect(second.recovered).toEqual(first.recovered);
      expect((await coordinator.getTask(task.id)).lockedBy).toBe('dev-1');
    });

    it('drops an entry the store no longer backs and takes new work', async () => {
      const task = await crashWhileHolding();
      await coordinator.forceRelease(task.id);
      const runner = makeRunner(succeed);

      const startup = await runner.onStartup();
      expect(startup.recovered).toBeNull();
      expect(journal.peek('dev-1')).toBeNull();

      // The released task is matched again like any other
      expect(await runner.runOnce()).toEqual({ kind: 'completed', taskId: task.id });
    });
  });

  it('runs cycles until aborted', async () => {
    const first = await createReadyTask('first');
    const second = await createReadyTask('second');
    const controller = new AbortController();
    const done: number[] = [];
    const runner = makeRunner(
      async (task) => {
        done.push(task.id);
        if (done.length === 2) controller.abort();
        return { success: true };
      },
      { waitMs: 20 }
    );

    await runner.runContinuous(controller.signal);

    expect(done).toEqual([first.id, second.id]);
    expect((await coordinator.getTask(first.id)).status).toBe('dev_done');
  });
});
