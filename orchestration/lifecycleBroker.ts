/**
 * Process Lifecycle Broker
 *
 * Several front-end processes (MCP bridges, agents) share one coordination
 * API process. Each registers interest; the first interest starts the API,
 * the last release stops it. Clients that crash without releasing are
 * evicted once their heartbeat goes stale or their PID disappears.
 *
 * The registry is a JSON file shared by every client on the host, read and
 * written only under its file lock.
 */

import { existsSync, readFileSync, renameSync } from 'fs';
import { z } from 'zod';
import { AgentLogger } from '../agents/shared/src/logger.js';
import { atomicWrite, isProcessRunning, modifyFileWithLock, withFileLock, type LockOptions } from './fileLock.js';

const ClientEntrySchema = z.object({
  pid: z.number().int(),
  acquiredAt: z.string(),
  lastSeen: z.string(),
});
export type ClientEntry = z.infer<typeof ClientEntrySchema>;

const BackingHandleSchema = z.object({
  pid: z.number().int().nullable(),
  /** Already running when first needed; never stopped by the broker */
  external: z.boolean(),
});
export type BackingHandle = z.infer<typeof BackingHandleSchema>;

const RegistrySchema = z.object({
  clients: z.record(z.string(), ClientEntrySchema),
  backing: BackingHandleSchema.extend({ startedAt: z.string() }).nullable(),
});
export type Registry = z.infer<typeof RegistrySchema>;

export interface BackingProcessController {
  start(): Promise<BackingHandle>;
  stop(handle: BackingHandle): Promise<void>;
  isRunning(handle: BackingHandle): Promise<boolean>;
}

export interface LifecycleBrokerOptions {
  registryPath: string;
  staleAfterMs: number;
  controller: BackingProcessController;
  now?: () => number;
  isProcessAlive?: (pid: number) => boolean;
  /** File lock tuning; starting the backing process happens under the lock */
  lock?: LockOptions;
}

export interface ReapResult {
  evicted: string[];
  stopped: boolean;
}

export interface BrokerStatus {
  clients: Array<ClientEntry & { clientId: string; stale: boolean }>;
  backing: (BackingHandle & { startedAt: string; running: boolean }) | null;
}

function emptyRegistry(): Registry {
  return { clients: {}, backing: null };
}

export class LifecycleBroker {
  private logger = new AgentLogger('LifecycleBroker');
  private now: () => number;
  private isProcessAlive: (pid: number) => boolean;
  private lockOptions: LockOptions;

  constructor(private options: LifecycleBrokerOptions) {
    this.now = options.now ?? Date.now;
    this.isProcessAlive = options.isProcessAlive ?? isProcessRunning;
    this.lockOptions = { maxWaitMs: 60_000, timeoutMs: 120_000, ...options.lock };
  }

  get registryPath(): string {
    return this.options.registryPath;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  /**
   * Read the registry. A file that fails to parse or validate is backed up to
   * `<name>.corrupt.<ts>` and replaced by an empty registry.
   */
  readRegistry(): Registry {
    const file = this.options.registryPath;
    if (!existsSync(file)) {
      return emptyRegistry();
    }
    const content = readFileSync(file, 'utf-8');
    if (!content.trim()) {
      return emptyRegistry();
    }
    try {
      return RegistrySchema.parse(JSON.parse(content));
    } catch (error) {
      const backupPath = `${file}.corrupt.${this.now()}`;
      renameSync(file, backupPath);
      this.logger.error('Broker registry is corrupt, starting from empty', { path: backupPath, error });
      return emptyRegistry();
    }
  }

  private writeRegistry(registry: Registry): void {
    atomicWrite(this.options.registryPath, `${JSON.stringify(registry, null, 2)}\n`);
  }

  isStale(entry: ClientEntry): boolean {
    const age = this.now() - Date.parse(entry.lastSeen);
    return age > this.options.staleAfterMs || !this.isProcessAlive(entry.pid);
  }

  private evictStale(registry: Registry): string[] {
    const evicted: string[] = [];
    for (const [clientId, entry] of Object.entries(registry.clients)) {
      if (this.isStale(entry)) {
        delete registry.clients[clientId];
        evicted.push(clientId);
      }
    }
    if (evicted.length > 0) {
      this.logger.warn('Evicted stale clients', { clients: evicted });
    }
    return evicted;
  }

  private async stopBacking(registry: Registry): Promise<boolean> {
    const backing = registry.backing;
    if (!backing) return false;
    registry.backing = null;
    if (backing.external) {
      this.logger.info('Last client gone; backing process was not started here, leaving it running', { pid: backing.pid ?? undefined });
      return false;
    }
    await this.options.controller.stop({ pid: backing.pid, external: backing.external });
    this.logger.info('Stopped backing process', { pid: backing.pid ?? undefined });
    return true;
  }

  /**
   * Register interest. Returns true when this call started the backing
   * process. Registering twice is the same as registering once.
   */
  async acquireInterest(clientId: string, pid: number = process.pid): Promise<boolean> {
    return withFileLock(
      this.options.registryPath,
      async () => {
        const registry = this.readRegistry();
        this.evictStale(registry);

        let started = false;
        const backing = registry.backing;
        const running = backing !== null && (await this.options.controller.isRunning(backing));
        if (!running) {
          if (backing) {
            this.logger.warn('Backing process is gone, restarting', { pid: backing.pid ?? undefined });
          }
          const handle = await this.options.controller.start();
          registry.backing = { ...handle, startedAt: this.timestamp() };
          started = !handle.external;
          this.logger.info(handle.external ? 'Adopted running backing process' : 'Started backing process', {
            pid: handle.pid ?? undefined,
            clientId,
          });
        }

        const now = this.timestamp();
        const existing = registry.clients[clientId];
        registry.clients[clientId] = { pid, acquiredAt: existing?.acquiredAt ?? now, lastSeen: now };
        this.writeRegistry(registry);
        this.logger.debug('Interest acquired', { clientId, pid, count: Object.keys(registry.clients).length });
        return started;
      },
      this.lockOptions
    );
  }

  /**
   * Drop interest. Returns true when this call stopped the backing process.
   */
  async releaseInterest(clientId: string): Promise<boolean> {
    return withFileLock(
      this.options.registryPath,
      async () => {
        const registry = this.readRegistry();
        delete registry.clients[clientId];
        this.evictStale(registry);

        let stopped = false;
        if (Object.keys(registry.clients).length === 0) {
          stopped = await this.stopBacking(registry);
        }
        this.writeRegistry(registry);
        this.logger.debug('Interest released', { clientId, count: Object.keys(registry.clients).length });
        return stopped;
      },
      this.lockOptions
    );
  }

  /**
   * Refresh a client's lastSeen. Returns false when the client is not
   * registered (for example after being evicted), so it can re-acquire.
   */
  async heartbeat(clientId: string): Promise<boolean> {
    return modifyFileWithLock(
      this.options.registryPath,
      (content) => {
        const registry = this.readRegistry();
        const entry = registry.clients[clientId];
        if (!entry) {
          return { content, result: false };
        }
        entry.lastSeen = this.timestamp();
        return { content: `${JSON.stringify(registry, null, 2)}\n`, result: true };
      },
      this.lockOptions
    );
  }

  /**
   * Evict stale clients; stop the backing process when that leaves nobody.
   */
  async reapStale(): Promise<ReapResult> {
    return withFileLock(
      this.options.registryPath,
      async () => {
        const registry = this.readRegistry();
        const evicted = this.evictStale(registry);

        let stopped = false;
        if (evicted.length > 0 && Object.keys(registry.clients).length === 0) {
          stopped = await this.stopBacking(registry);
        }
        if (evicted.length > 0) {
          this.writeRegistry(registry);
        }
        return { evicted, stopped };
      },
      this.lockOptions
    );
  }

  async status(): Promise<BrokerStatus> {
    const registry = await withFileLock(this.options.registryPath, () => this.readRegistry(), this.lockOptions);
    const backing = registry.backing;
    return {
      clients: Object.entries(registry.clients).map(([clientId, entry]) => ({
        clientId,
        ...entry,
        stale: this.isStale(entry),
      })),
      backing: backing ? { ...backing, running: await this.options.controller.isRunning(backing) } : null,
    };
  }

  /**
   * Periodically reap stale clients. Returns a function that stops the timer.
   * The timer does not hold the process open unless `keepAlive` is set.
   */
  startReaper(intervalMs: number, options: { keepAlive?: boolean; onReap?: (result: ReapResult) => void } = {}): () => void {
    const timer = setInterval(() => {
      this.reapStale()
        .then((result) => options.onReap?.(result))
        .catch((error: unknown) => {
          this.logger.error('Reap failed', { error });
        });
    }, intervalMs);
    if (!options.keepAlive) {
      timer.unref();
    }
    return () => clearInterval(timer);
  }
}
