import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createTestCoordinator, type TestCoordinator } from '../../../coordinator/src/testHelpers.js';
import { StoreUnavailableError } from './errors.js';
import { RecoveryJournal, judgeEntry, snapshotFromTask, type JournalEntry, type TaskLookup } from './recoveryJournal.js';
import type { TaskRecord } from './types.js';

describe('RecoveryJournal', () => {
  let env: TestCoordinator;
  let journal: RecoveryJournal;

  const lockFor = async (agentId: string): Promise<TaskRecord> => {
    const { coordinator } = env;
    const task = await coordinator.createTask({
      title: 'Resumable work',
      targetRole: 'backend_dev',
      skillLevel: 'junior',
      createdBy: 'pm-1',
    });
    await coordinator.lock(task.id, agentId, 'ctx');
    return coordinator.getTask(task.id);
  };

  beforeEach(async () => {
    env = createTestCoordinator();
    journal = new RecoveryJournal({ dir: env.config.journal.dir, now: () => new Date('2026-03-01T12:00:00.000Z') });
    await env.coordinator.register({ agentId: 'pm-1', role: 'pm' });
    await env.coordinator.register({ agentId: 'dev-1', role: 'backend_dev' });
  });

  afterEach(() => {
    env.cleanup();
  });

  it('records, peeks and clears an entry', async () => {
    const task = await lockFor('dev-1');
    const entry = journal.record('dev-1', snapshotFromTask(task));

    expect(entry).toMatchObject({
      version: 1,
      agentId: 'dev-1',
      taskId: task.id,
      status: 'locked',
      executionContext: 'ctx',
      recordedAt: '2026-03-01T12:00:00.000Z',
    });
    expect(journal.peek('dev-1')).toEqual(entry);
    expect(journal.listAgents()).toEqual(['dev-1']);

    expect(journal.clear('dev-1')).toBe(true);
    expect(journal.clear('dev-1')).toBe(false);
    expect(journal.peek('dev-1')).toBeNull();
  });

  it('updates the execution context', async () => {
    const task = await lockFor('dev-1');
    journal.record('dev-1', snapshotFromTask(task));

    const updated = journal.update('dev-1', { executionContext: 'step-2' });
    expect(updated?.executionContext).toBe('step-2');
    expect(updated?.updatedAt).toBe('2026-03-01T12:00:00.000Z');
    expect(journal.update('nobody', { executionContext: null })).toBeNull();
  });

  it('recovers an entry the store still agrees with', async () => {
    const task = await lockFor('dev-1');
    const entry = journal.record('dev-1', snapshotFromTask(task));

    expect(await journal.recover('dev-1', env.coordinator)).toEqual(entry);
    expect(journal.peek('dev-1')).toEqual(entry);
  });

  it('discards an entry whose lock was force-released', async () => {
    const task = await lockFor('dev-1');
    journal.record('dev-1', snapshotFromTask(task));
    await env.coordinator.forceRelease(task.id);

    expect(await journal.recover('dev-1', env.coordinator)).toBeNull();
    expect(existsSync(journal.pathFor('dev-1'))).toBe(false);
  });

  it('discards an entry for a task that moved on or vanished', async () => {
    const task = await lockFor('dev-1');
    const entry = journal.record('dev-1', snapshotFromTask(task));

    expect(judgeEntry(entry, null)).toBe('missing');
    expect(judgeEntry(entry, { ...task, lockedBy: 'dev-9' })).toBe('reassigned');
    expect(judgeEntry(entry, { ...task, status: 'testing' })).toBe('status-changed');
    expect(judgeEntry(entry, { ...task, status: 'created', lockedBy: null })).toBe('released');

    journal.record('dev-1', { ...snapshotFromTask(task), taskId: 999 });
    expect(await journal.recover('dev-1', env.coordinator)).toBeNull();
  });

  it('keeps the entry when the store is unreachable', async () => {
    const task = await lockFor('dev-1');
    journal.record('dev-1', snapshotFromTask(task));
    const offline: TaskLookup = {
      getTask: () => Promise.reject(new StoreUnavailableError('getTask')),
    };

    await expect(journal.recover('dev-1', offline)).rejects.toThrow(StoreUnavailableError);
    expect(journal.peek('dev-1')?.taskId).toBe(task.id);
  });

  it('moves corrupt files aside and treats them as absent', async () => {
    writeFileSync(journal.pathFor('dev-1'), '{"version": 1, "agentId": "dev-1", "task');

    expect(await journal.recover('dev-1', env.coordinator)).toBeNull();
    expect(readdirSync(env.config.journal.dir)).toEqual([`agent-dev-1.json.corrupt.${Date.parse('2026-03-01T12:00:00.000Z')}`]);
  });

  it('treats an entry written for another agent as corrupt', async () => {
    const task = await lockFor('dev-1');
    const foreign: JournalEntry = { ...journal.record('dev-1', snapshotFromTask(task)), agentId: 'dev-2' };
    writeFileSync(journal.pathFor('dev-1'), JSON.stringify(foreign));

    expect(journal.peek('dev-1')).toBeNull();
    expect(existsSync(journal.pathFor('dev-1'))).toBe(false);
  });

  it('keeps agent ids with unusual characters apart', () => {
    expect(journal.pathFor('team/a b')).toBe(join(env.config.journal.dir, 'agent-team%2Fa%20b.json'));
  });

  it('refuses to snapshot a task that is not held', async () => {
    const task = await env.coordinator.createTask({ title: 'x', targetRole: 'backend_dev', skillLevel: 'junior' });
    expect(() => snapshotFromTask(task)).toThrow(`Task ${task.id} is not held (status pending)`);
  });
});
