/**
 * Orchestration Module - processes sharing one coordination API
 *
 * - File locking and atomic writes for shared JSON files
 * - The lifecycle broker that starts the API for its first client and stops
 *   it after its last
 *
 * Quick Start:
 *   const broker = createLifecycleBroker(getConfig());
 *   await broker.acquireInterest('mcp-1234');
 *   // ... use the API ...
 *   await broker.releaseInterest('mcp-1234');
 */

import { brokerRegistryPath, type CoordinatorConfig } from '../agents/shared/src/config.js';
import { SpawnedServiceController } from './backingProcess.js';
import { LifecycleBroker, type BackingProcessController } from './lifecycleBroker.js';

export {
  acquireLock,
  releaseLock,
  atomicWrite,
  withFileLock,
  modifyFileWithLock,
  isProcessRunning,
  LockTimeoutError,
  type LockHandle,
  type LockInfo,
  type LockOptions,
} from './fileLock.js';

export {
  LifecycleBroker,
  type BackingHandle,
  type BackingProcessController,
  type BrokerStatus,
  type ClientEntry,
  type LifecycleBrokerOptions,
  type ReapResult,
  type Registry,
} from './lifecycleBroker.js';

export { SpawnedServiceController, defaultServerCommand, type SpawnedServiceOptions } from './backingProcess.js';

export function serviceUrl(config: CoordinatorConfig): string {
  return `http://${config.server.host}:${config.server.port}`;
}

/**
 * Broker for the API described by `config`, spawning it from this checkout
 * unless another controller is given.
 */
export function createLifecycleBroker(config: CoordinatorConfig, controller?: BackingProcessController): LifecycleBroker {
  return new LifecycleBroker({
    registryPath: brokerRegistryPath(config),
    staleAfterMs: config.broker.staleAfterMs,
    controller:
      controller ??
      new SpawnedServiceController({
        baseUrl: serviceUrl(config),
        // The spawned API reaps on the same registry while it runs
        env: { COORD_BROKER_SPAWNED: 'true', COORD_BROKER_REGISTRY: brokerRegistryPath(config) },
        startupTimeoutMs: config.broker.startupTimeoutMs,
        stopGraceMs: config.broker.stopGraceMs,
      }),
  });
}
