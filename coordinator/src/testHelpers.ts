/**
 * Fixtures shared by the coordinator, agent and MCP test suites
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, type CoordinatorConfig, type CoordinatorConfigInput } from '../../agents/shared/src/config.js';
import { createCoordinator, type Coordinator, type CreateCoordinatorOptions } from './coordinator.js';

export interface TestClock {
  now: () => number;
  advance: (ms: number) => void;
}

/** Wall clock that tests can move forward */
export function offsetClock(): TestClock {
  let offset = 0;
  return {
    now: () => Date.now() + offset,
    advance: (ms) => {
      offset += ms;
    },
  };
}

export function makeTempDir(prefix = 'taskmesh-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Configuration rooted in `dir`, with short poll intervals */
export function testConfig(dir: string, overrides: Partial<CoordinatorConfigInput> = {}): CoordinatorConfig {
  return loadConfig(
    {},
    {
      ...overrides,
      store: { dbPath: join(dir, 'taskmesh.db'), ...overrides.store },
      wait: { pollIntervalMs: 20, maxPollIntervalMs: 50, backoffFactor: 1.5, maxWaitMs: 5_000, ...overrides.wait },
      journal: { dir: join(dir, 'journal'), ...overrides.journal },
      broker: { registryPath: join(dir, 'broker.json'), ...overrides.broker },
    }
  );
}

export interface TestCoordinator {
  dir: string;
  config: CoordinatorConfig;
  coordinator: Coordinator;
  cleanup: () => void;
}

export function createTestCoordinator(
  overrides: Partial<CoordinatorConfigInput> = {},
  options: CreateCoordinatorOptions = {}
): TestCoordinator {
  const dir = makeTempDir();
  const config = testConfig(dir, overrides);
  const coordinator = createCoordinator(config, options);
  return {
    dir,
    config,
    coordinator,
    cleanup: () => {
      coordinator.close();
      removeTempDir(dir);
    },
  };
}
