/**
 * Starts and stops the coordination API as a detached child process on
 * behalf of the lifecycle broker.
 */

import { spawn } from 'child_process';
import { fileURLToPath } from 'url';
import axios from 'axios';
import { AgentLogger } from '../agents/shared/src/logger.js';
import { sleep } from '../agents/shared/src/retry.js';
import { isProcessRunning } from './fileLock.js';
import type { BackingHandle, BackingProcessController } from './lifecycleBroker.js';

const HEALTH_POLL_MS = 250;

export interface SpawnedServiceOptions {
  /** Base URL the service answers on, e.g. http://127.0.0.1:6969 */
  baseUrl: string;
  /** Executable and arguments; defaults to this checkout's API server */
  command?: string[];
  env?: NodeJS.ProcessEnv;
  startupTimeoutMs: number;
  stopGraceMs: number;
}

/**
 * Command that runs the API server next to this module: the TypeScript
 * source through tsx when running from source, the compiled file otherwise.
 */
export function defaultServerCommand(): string[] {
  const fromSource = import.meta.url.endsWith('.ts');
  const server = fileURLToPath(new URL(`../coordinator/src/api/server.${fromSource ? 'ts' : 'js'}`, import.meta.url));
  return fromSource ? [process.execPath, '--import', 'tsx', server] : [process.execPath, server];
}

export class SpawnedServiceController implements BackingProcessController {
  private logger = new AgentLogger('BackingProcess');

  constructor(private options: SpawnedServiceOptions) {}

  async isHealthy(): Promise<boolean> {
    try {
      const response = await axios.get(`${this.options.baseUrl}/health`, { timeout: 2_000 });
      return response.status === 200;
    } catch {
      return false;
    }
  }

  async start(): Promise<BackingHandle> {
    if (await this.isHealthy()) {
      this.logger.info('Service already answering, adopting it', { url: this.options.baseUrl });
      return { pid: null, external: true };
    }

    const [executable, ...args] = this.options.command ?? defaultServerCommand();
    if (!executable) {
      throw new Error('Backing service command is empty');
    }

    const child = spawn(executable, args, {
      detached: true,
      stdio: 'ignore',
      env: { ...process.env, ...this.options.env },
    });
    child.unref();
    const pid = child.pid;
    if (pid === undefined) {
      throw new Error(`Failed to spawn ${executable}`);
    }
    this.logger.info('Spawned backing service', { pid, url: this.options.baseUrl });

    const deadline = Date.now() + this.options.startupTimeoutMs;
    while (Date.now() < deadline) {
      if (!isProcessRunning(pid)) {
        throw new Error(`Backing service exited during startup (PID ${pid})`);
      }
      if (await this.isHealthy()) {
        return { pid, external: false };
      }
      await sleep(HEALTH_POLL_MS);
    }

    await this.stop({ pid, external: false });
    throw new Error(`Backing service did not become healthy within ${this.options.startupTimeoutMs}ms`);
  }

  async stop(handle: BackingHandle): Promise<void> {
    if (handle.external || handle.pid === null) return;
    const pid = handle.pid;
    if (!isProcessRunning(pid)) return;

    process.kill(pid, 'SIGTERM');
    const deadline = Date.now() + this.options.stopGraceMs;
    while (Date.now() < deadline) {
      if (!isProcessRunning(pid)) return;
      await sleep(HEALTH_POLL_MS);
    }
    this.logger.warn('Backing service ignored SIGTERM, killing', { pid });
    process.kill(pid, 'SIGKILL');
  }

  async isRunning(handle: BackingHandle): Promise<boolean> {
    if (handle.pid !== null && !isProcessRunning(handle.pid)) {
      return false;
    }
    return this.isHealthy();
  }
}
