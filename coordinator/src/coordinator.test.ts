import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  AgentNotFoundError,
  AlreadyLockedError,
  InvalidTransitionError,
  NotLockHolderError,
  PermissionDeniedError,
  TaskNotFoundError,
  ValidationError,
} from '../../agents/shared/src/errors.js';
import type { AgentRole, SkillLevel } from '../../agents/shared/src/types.js';
import type { Coordinator } from './coordinator.js';
import { createTestCoordinator, offsetClock, type TestClock, type TestCoordinator } from './testHelpers.js';

const HOUR = 60 * 60 * 1000;

describe('Coordinator', () => {
  let env: TestCoordinator;
  let coordinator: Coordinator;
  let clock: TestClock;

  const registerTeam = async (): Promise<void> => {
    await coordinator.register({ agentId: 'pm-1', role: 'pm', skillLevel: 'principal' });
    await coordinator.register({ agentId: 'dev-1', role: 'backend_dev', skillLevel: 'senior' });
    await coordinator.register({ agentId: 'dev-2', role: 'backend_dev', skillLevel: 'junior' });
    await coordinator.register({ agentId: 'qa-1', role: 'qa', skillLevel: 'senior' });
  };

  beforeEach(async () => {
    clock = offsetClock();
    env = createTestCoordinator({ locks: { staleAfterMs: HOUR } }, { now: clock.now });
    coordinator = env.coordinator;
    await registerTeam();
  });

  afterEach(() => {
    env.cleanup();
  });

  describe('createTask', () => {
    it('makes tasks from privileged creators ready at once', async () => {
      const task = await coordinator.createTask({
        title: 'Rate limiter',
        targetRole: 'backend_dev',
        skillLevel: 'senior',
        createdBy: 'pm-1',
      });
      expect(task.status).toBe('created');
      expect(task.createdBy).toBe('pm-1');
    });

    it('stages tasks on request or from other creators', async () => {
      const staged = await coordinator.createTask({
        title: 'Staged',
        targetRole: 'backend_dev',
        skillLevel: 'senior',
        createdBy: 'pm-1',
        stage: true,
      });
      const fromDev = await coordinator.createTask({
        title: 'From a developer',
        targetRole: 'backend_dev',
        skillLevel: 'senior',
        createdBy: 'dev-1',
      });
      const anonymous = await coordinator.createTask({ title: 'Anonymous', targetRole: 'qa', skillLevel: 'junior' });

      expect([staged.status, fromDev.status, anonymous.status]).toEqual(['pending', 'pending', 'pending']);
    });

    it('validates input', async () => {
      await expect(coordinator.createTask({ title: '', targetRole: 'qa', skillLevel: 'junior' })).rejects.toThrow(
        ValidationError
      );
      await expect(
        coordinator.createTask({ title: 'x', targetRole: 'qa', skillLevel: 'junior', createdBy: 'nobody' })
      ).rejects.toThrow(AgentNotFoundError);
    });
  });

  describe('promote', () => {
    it('lets privileged roles promote pending tasks', async () => {
      const task = await coordinator.createTask({ title: 'Staged', targetRole: 'backend_dev', skillLevel: 'junior' });
      const promoted = await coordinator.promote(task.id, 'pm-1');

      expect(promoted.status).toBe('created');
      await expect(coordinator.promote(task.id, 'pm-1')).rejects.toThrow(InvalidTransitionError);
    });

    it('denies everyone else', async () => {
      const task = await coordinator.createTask({ title: 'Staged', targetRole: 'backend_dev', skillLevel: 'junior' });
      await expect(coordinator.promote(task.id, 'dev-1')).rejects.toThrow(PermissionDeniedError);
      expect((await coordinator.getTask(task.id)).status).toBe('pending');
    });
  });

  it('runs a task through the whole workflow', async () => {
    const task = await coordinator.createTask({
      title: 'Add audit log',
      targetRole: 'backend_dev',
      skillLevel: 'senior',
      createdBy: 'pm-1',
    });

    const next = await coordinator.nextTask({ agentId: 'dev-1', role: 'backend_dev', skillLevel: 'senior' });
    expect(next.outcome === 'task' ? next.task.id : null).toBe(task.id);

    const token = await coordinator.lock(task.id, 'dev-1', 'ctx-1');
    expect(token).toMatchObject({ taskId: task.id, agentId: 'dev-1', executionContext: 'ctx-1' });
    await expect(coordinator.lock(task.id, 'dev-2')).rejects.toThrow(AlreadyLockedError);

    await expect(coordinator.setStatus(task.id, 'dev-2', 'dev_done')).rejects.toThrow(NotLockHolderError);
    await coordinator.setStatus(task.id, 'dev-1', 'dev_done', 'implemented');

    await expect(coordinator.setStatus(task.id, 'dev-1', 'testing')).rejects.toThrow(InvalidTransitionError);
    const testing = await coordinator.setStatus(task.id, 'qa-1', 'testing');
    expect(testing.lockedBy).toBe('qa-1');

    await coordinator.setStatus(task.id, 'qa-1', 'qa_done');
    const done = await coordinator.setStatus(task.id, 'pm-1', 'completed');
    expect(done).toMatchObject({ status: 'completed', lockedBy: null, lockedAt: null });

    const history = await coordinator.taskHistory(task.id);
    expect(history.map((change) => `${change.oldStatus ?? '-'}>${change.newStatus}:${change.changedBy ?? '-'}`)).toEqual([
      '->created:pm-1',
      'created>locked:dev-1',
      'locked>dev_done:dev-1',
      'dev_done>testing:qa-1',
      'testing>qa_done:qa-1',
      'qa_done>completed:pm-1',
    ]);
  });

  it('sends failed reviews back for rework', async () => {
    const task = await coordinator.createTask({ title: 'Fix', targetRole: 'backend_dev', skillLevel: 'junior', createdBy: 'pm-1' });
    await coordinator.lock(task.id, 'dev-2');
    await coordinator.setStatus(task.id, 'dev-2', 'dev_done');
    await coordinator.setStatus(task.id, 'qa-1', 'testing');
    const rework = await coordinator.setStatus(task.id, 'qa-1', 'created', 'missing tests');

    expect(rework).toMatchObject({ status: 'created', lockedBy: null, notes: 'missing tests' });
  });

  it('never sets locked through setStatus', async () => {
    const task = await coordinator.createTask({ title: 'x', targetRole: 'backend_dev', skillLevel: 'junior', createdBy: 'pm-1' });
    await expect(coordinator.setStatus(task.id, 'dev-1', 'locked')).rejects.toThrow(InvalidTransitionError);
  });

  it('rejects unknown tasks and agents', async () => {
    await expect(coordinator.getTask(42)).rejects.toThrow(TaskNotFoundError);
    await expect(coordinator.lock(42, 'dev-1')).rejects.toThrow(TaskNotFoundError);
    await expect(coordinator.lock(42, 'ghost')).rejects.toThrow(AgentNotFoundError);
    await expect(coordinator.heartbeat('ghost')).rejects.toThrow(AgentNotFoundError);
  });

  it('matches by role and never above the agent level', async () => {
    const levels: SkillLevel[] = ['junior', 'senior', 'principal'];
    const roles: AgentRole[] = ['backend_dev', 'frontend_dev'];
    for (const targetRole of roles) {
      for (const skillLevel of levels) {
        await coordinator.createTask({ title: `${targetRole}/${skillLevel}`, targetRole, skillLevel, createdBy: 'pm-1' });
      }
    }

    for (const skillLevel of levels) {
      const offered: string[] = [];
      const ceiling = levels.indexOf(skillLevel);
      while (true) {
        const next = await coordinator.nextTask({ role: 'backend_dev', skillLevel });
        if (next.outcome !== 'task') break;
        expect(next.task.targetRole).toBe('backend_dev');
        expect(levels.indexOf(next.task.skillLevel)).toBeLessThanOrEqual(ceiling);
        offered.push(next.task.title);
        await coordinator.lock(next.task.id, 'dev-1');
      }
      expect(offered.length).toBe(1);
    }
  });

  it('lists and force-releases stale locks', async () => {
    const task = await coordinator.createTask({ title: 'x', targetRole: 'backend_dev', skillLevel: 'junior', createdBy: 'pm-1' });
    await coordinator.lock(task.id, 'dev-1');
    expect(await coordinator.listStaleLocks()).toEqual([]);

    clock.advance(HOUR + 1);
    expect((await coordinator.listStaleLocks()).map((stale) => stale.id)).toEqual([task.id]);
    expect(coordinator.status().staleLocks).toBe(1);

    const released = await coordinator.forceRelease(task.id, { onlyIfStale: true });
    expect(released.status).toBe('created');
    await expect(coordinator.setStatus(task.id, 'dev-1', 'dev_done')).rejects.toThrow(InvalidTransitionError);
  });

  it('reports changes since a timestamp', async () => {
    await coordinator.createTask({ title: 'x', targetRole: 'backend_dev', skillLevel: 'junior', createdBy: 'pm-1' });
    const all = await coordinator.changesSince();
    expect(all).toHaveLength(1);

    const latest = all[all.length - 1];
    expect(await coordinator.changesSince(latest?.changedAt)).toEqual([]);
    await expect(coordinator.changesSince('yesterday-ish')).rejects.toThrow(ValidationError);
  });

  it('summarises the backlog', async () => {
    await coordinator.createTask({ title: 'a', targetRole: 'backend_dev', skillLevel: 'junior', createdBy: 'pm-1' });
    await coordinator.createTask({ title: 'b', targetRole: 'backend_dev', skillLevel: 'junior' });

    const status = coordinator.status();
    expect(status.totalTasks).toBe(2);
    expect(status.tasks.created).toBe(1);
    expect(status.tasks.pending).toBe(1);
    expect(status.agents).toBe(4);
    expect(status.activeAgents).toBe(4);
  });
});
