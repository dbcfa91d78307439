import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import axios from 'axios';
import { CoordinatorClient } from '../../../agents/shared/src/coordinatorClient.js';
import {
  AlreadyLockedError,
  LockNotStaleError,
  NotLockHolderError,
  PermissionDeniedError,
  TaskNotFoundError,
  UnauthorizedError,
  ValidationError,
} from '../../../agents/shared/src/errors.js';
import type { CoordinatorConfigInput } from '../../../agents/shared/src/config.js';
import { createCoordinator } from '../coordinator.js';
import { makeTempDir, offsetClock, removeTempDir, testConfig, type TestClock } from '../testHelpers.js';
import { startBrokerReaper, startServer, type RunningServer } from './server.js';

const HOUR = 60 * 60 * 1000;

describe('coordination API', () => {
  let dir: string;
  let clock: TestClock;
  let running: RunningServer;
  let client: CoordinatorClient;

  const start = async (overrides: Partial<CoordinatorConfigInput> = {}): Promise<RunningServer> => {
    const config = testConfig(dir, {
      server: { port: 0, apiKeys: ['agent-key'], adminKey: 'test-secret' },
      locks: { staleAfterMs: HOUR },
      ...overrides,
    });
    return startServer(config, createCoordinator(config, { now: clock.now }));
  };

  beforeEach(async () => {
    dir = makeTempDir();
    clock = offsetClock();
    running = await start();
    client = new CoordinatorClient({ baseUrl: running.url, apiKey: 'agent-key', adminKey: 'test-secret' });
    await client.register({ agentId: 'pm-1', role: 'pm', skillLevel: 'principal' });
    await client.register({ agentId: 'dev-1', role: 'backend_dev', skillLevel: 'senior' });
    await client.register({ agentId: 'dev-2', role: 'backend_dev', skillLevel: 'senior' });
  });

  afterEach(async () => {
    await running.close();
    removeTempDir(dir);
  });

  const createReadyTask = (title = 'Add audit log') =>
    client.createTask({ title, targetRole: 'backend_dev', skillLevel: 'senior', createdBy: 'pm-1' });

  it('answers health and status without a key', async () => {
    const health = await axios.get(`${running.url}/health`);
    expect(health.data).toMatchObject({ status: 'ok', version: '1.0.0' });

    await createReadyTask();
    const status = await axios.get(`${running.url}/status`);
    expect(status.data.data).toMatchObject({ totalTasks: 1, agents: 3, staleLocks: 0 });
    expect(status.data.data.tasks.created).toBe(1);
  });

  it('rejects requests without a valid API key', async () => {
    const anonymous = await axios.get(`${running.url}/api/v1/agents`, { validateStatus: () => true });
    expect(anonymous.status).toBe(401);
    expect(anonymous.data).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Missing X-API-Key header', context: {} },
    });

    const wrong = new CoordinatorClient({ baseUrl: running.url, apiKey: 'wrong-key' });
    await expect(wrong.listAgents()).rejects.toThrow(UnauthorizedError);

    const development = new CoordinatorClient({ baseUrl: running.url, apiKey: 'development-key' });
    expect(await development.listAgents()).toHaveLength(3);
  });

  it('refuses the development key in production', async () => {
    await running.close();
    running = await start({ environment: 'production' });

    const development = new CoordinatorClient({ baseUrl: running.url, apiKey: 'development-key' });
    await expect(development.listAgents()).rejects.toThrow(UnauthorizedError);
    const configured = new CoordinatorClient({ baseUrl: running.url, apiKey: 'agent-key' });
    expect(await configured.listAgents()).toHaveLength(3);
  });

  it('runs the workflow over HTTP', async () => {
    const task = await createReadyTask();
    expect(task.status).toBe('created');

    const next = await client.nextTask({ agentId: 'dev-1', role: 'backend_dev', skillLevel: 'senior' });
    expect(next).toMatchObject({ outcome: 'task', task: { id: task.id } });

    const token = await client.lock(task.id, 'dev-1', 'ctx-1');
    expect(token).toMatchObject({ taskId: task.id, agentId: 'dev-1', executionContext: 'ctx-1' });

    const done = await client.setStatus(task.id, 'dev-1', 'dev_done', 'implemented');
    expect(done).toMatchObject({ status: 'dev_done', lockedBy: null, notes: 'implemented' });

    const history = await client.taskHistory(task.id);
    expect(history.map((change) => change.newStatus)).toEqual(['created', 'locked', 'dev_done']);
    expect((await client.changesSince()).map((change) => change.taskId)).toEqual([task.id, task.id, task.id]);
    await expect(client.changesSince('yesterday-ish')).rejects.toThrow(ValidationError);
    expect((await client.getTask(task.id)).status).toBe('dev_done');
    expect(await client.listTasks({ status: 'dev_done' })).toHaveLength(1);
  });

  it('maps contention errors back to their classes', async () => {
    const task = await createReadyTask();
    await client.lock(task.id, 'dev-1');

    const lost = client.lock(task.id, 'dev-2');
    await expect(lost).rejects.toThrow(AlreadyLockedError);
    await expect(lost).rejects.toMatchObject({ context: { taskId: task.id, heldBy: 'dev-1' } });

    await expect(client.setStatus(task.id, 'dev-2', 'dev_done')).rejects.toThrow(NotLockHolderError);
    await expect(client.getTask(999)).rejects.toThrow(TaskNotFoundError);
    await expect(
      client.createTask({ title: '', targetRole: 'backend_dev', skillLevel: 'senior' })
    ).rejects.toThrow(ValidationError);
  });

  it('rejects invalid ids and malformed bodies', async () => {
    await expect(client.getTask(0)).rejects.toThrow(ValidationError);

    const response = await axios.post(`${running.url}/api/v1/tasks`, '{"title": ', {
      headers: { 'Content-Type': 'application/json', 'X-API-Key': 'agent-key' },
      validateStatus: () => true,
    });
    expect(response.status).toBe(400);
    expect(response.data.error).toEqual({ code: 'VALIDATION_FAILED', message: 'Malformed JSON body', context: {} });
  });

  it('wakes a long-poll when a matching task appears', async () => {
    const waiting = client.nextTask({ agentId: 'dev-1', role: 'backend_dev', skillLevel: 'senior', waitMs: 3_000 });
    await new Promise((resolve) => setTimeout(resolve, 50));
    const task = await createReadyTask('Arrives later');

    expect(await waiting).toMatchObject({ outcome: 'task', task: { id: task.id } });
  });

  it('times out a long-poll with nothing to do', async () => {
    const result = await client.nextTask({ role: 'qa', skillLevel: 'junior', waitMs: 100 });
    expect(result.outcome).toBe('timeout');
  });

  it('cancels a long-poll from the client side', async () => {
    const controller = new AbortController();
    const waiting = client.nextTask({ role: 'qa', skillLevel: 'junior', waitMs: 3_000, signal: controller.signal });
    setTimeout(() => controller.abort(), 50);

    expect(await waiting).toEqual({ outcome: 'cancelled' });
  });

  describe('admin routes', () => {
    it('require the admin key', async () => {
      const agentOnly = new CoordinatorClient({ baseUrl: running.url, apiKey: 'agent-key' });
      await expect(agentOnly.listStaleLocks()).rejects.toThrow(PermissionDeniedError);

      const wrongAdmin = new CoordinatorClient({ baseUrl: running.url, apiKey: 'agent-key', adminKey: 'other' });
      await expect(wrongAdmin.listStaleLocks()).rejects.toThrow('Invalid X-Admin-Key header');
    });

    it('are disabled without a configured admin key', async () => {
      await running.close();
      running = await start({ server: { port: 0, apiKeys: ['agent-key'] } });

      const admin = new CoordinatorClient({ baseUrl: running.url, apiKey: 'agent-key', adminKey: 'test-secret' });
      await expect(admin.listStaleLocks()).rejects.toThrow(
        'Administrative operations are disabled (no admin key configured)'
      );
    });

    it('list and force-release stale locks', async () => {
      const task = await createReadyTask();
      await client.lock(task.id, 'dev-1');

      await expect(client.forceRelease(task.id, { onlyIfStale: true })).rejects.toThrow(LockNotStaleError);
      expect(await client.listStaleLocks()).toEqual([]);

      clock.advance(HOUR + 1);
      const stale = await client.listStaleLocks();
      expect(stale.map((record) => record.id)).toEqual([task.id]);

      const released = await client.forceRelease(task.id, { onlyIfStale: true, releasedBy: 'ops' });
      expect(released).toMatchObject({
        status: 'created',
        lockedBy: null,
        notes: 'Force-released from dev-1 by ops',
      });
    });
  });
});

describe('broker reaper in a spawned API', () => {
  // Larger than any pid the kernel hands out
  const DEAD_PID = 2_147_483_646;
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('shuts this process down once its last client has crashed', async () => {
    const registryPath = join(dir, 'broker.json');
    const seen = new Date().toISOString();
    writeFileSync(
      registryPath,
      JSON.stringify({
        clients: { 'mcp-1': { pid: DEAD_PID, acquiredAt: seen, lastSeen: seen } },
        backing: { pid: process.pid, external: false, startedAt: seen },
      })
    );
    const shutdown = vi.fn();

    const stop = startBrokerReaper(testConfig(dir, { broker: { heartbeatMs: 20 } }), shutdown);
    try {
      await vi.waitFor(() => expect(shutdown).toHaveBeenCalledWith('no broker clients left'));
    } finally {
      stop();
    }

    expect(shutdown).toHaveBeenCalledTimes(1);
    expect(JSON.parse(readFileSync(registryPath, 'utf-8'))).toEqual({ clients: {}, backing: null });
  });
});
