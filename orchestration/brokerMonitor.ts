#!/usr/bin/env tsx
/**
 * Broker Monitor
 *
 * Inspects the lifecycle broker registry and evicts clients that died
 * without releasing their interest.
 *
 * Usage:
 *   tsx orchestration/brokerMonitor.ts status
 *   tsx orchestration/brokerMonitor.ts reap
 *   tsx orchestration/brokerMonitor.ts watch
 */

import { fileURLToPath } from 'url';
import { resolve } from 'path';
import { getConfig } from '../agents/shared/src/config.js';
import { createLifecycleBroker } from './index.js';
import type { LifecycleBroker } from './lifecycleBroker.js';

const USAGE = `
Broker Monitor

Usage:
  tsx orchestration/brokerMonitor.ts <command>

Commands:
  status    Show registered clients and the backing process
  reap      Evict stale clients once, stopping the API if none remain
  watch     Reap on every heartbeat interval until interrupted

Environment:
  COORD_BROKER_REGISTRY, COORD_BROKER_STALE_AFTER_MS, COORD_BROKER_HEARTBEAT_MS
`;

export interface MonitorIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultIo: MonitorIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export async function runBrokerMonitor(args: string[], broker: LifecycleBroker, io: MonitorIo = defaultIo): Promise<number> {
  const command = args[0] ?? 'status';

  switch (command) {
    case 'status': {
      const status = await broker.status();
      io.out(`Registry: ${broker.registryPath}`);
      if (status.backing) {
        const owner = status.backing.external ? 'external' : `PID ${status.backing.pid ?? '?'}`;
        io.out(`Backing:  ${owner}, started ${status.backing.startedAt}, ${status.backing.running ? 'running' : 'NOT RUNNING'}`);
      } else {
        io.out('Backing:  none');
      }
      io.out(`Clients:  ${status.clients.length}`);
      for (const client of status.clients) {
        io.out(`  - ${client.clientId} (PID ${client.pid}) last seen ${client.lastSeen}${client.stale ? ' [stale]' : ''}`);
      }
      return 0;
    }

    case 'reap': {
      const { evicted, stopped } = await broker.reapStale();
      io.out(evicted.length > 0 ? `Evicted: ${evicted.join(', ')}` : 'No stale clients');
      if (stopped) io.out('Backing process stopped');
      return 0;
    }

    default:
      io.err(`Unknown command: ${command}`);
      io.err(USAGE);
      return 1;
  }
}

function isMain(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url);
}

if (isMain()) {
  const config = getConfig();
  const broker = createLifecycleBroker(config);
  const args = process.argv.slice(2);

  if (args[0] === 'watch') {
    runBrokerMonitor(['reap'], broker).catch((error: unknown) => {
      console.error('Reap failed:', error instanceof Error ? error.message : error);
    });
    const stopReaper = broker.startReaper(config.broker.heartbeatMs, {
      keepAlive: true,
      onReap: ({ evicted, stopped }) => {
        if (evicted.length > 0) console.log(`Evicted: ${evicted.join(', ')}`);
        if (stopped) console.log('Backing process stopped');
      },
    });
    const stop = (): void => {
      stopReaper();
      process.exit(0);
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  } else {
    runBrokerMonitor(args, broker)
      .then((code) => process.exit(code))
      .catch((error: unknown) => {
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
      });
  }
}
