/**
 * Configuration management for the coordinator, agents and broker
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export const ServerConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(6969),
  apiKeys: z.array(z.string().min(1)).default([]),
  adminKey: z.string().optional(),
});
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export const StoreConfigSchema = z.object({
  dbPath: z.string().default('./taskmesh.db'),
  busyTimeoutMs: z.number().int().positive().default(5000),
});
export type StoreConfig = z.infer<typeof StoreConfigSchema>;

export const WaitConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(1000),
  maxPollIntervalMs: z.number().int().positive().default(5000),
  backoffFactor: z.number().min(1).default(1.5),
  maxWaitMs: z.number().int().positive().default(180_000),
});
export type WaitConfig = z.infer<typeof WaitConfigSchema>;

export const LockConfigSchema = z.object({
  staleAfterMs: z.number().int().positive().default(3_600_000),
});
export type LockConfig = z.infer<typeof LockConfigSchema>;

export const WorkflowConfigSchema = z.object({
  reworkTarget: z.enum(['created', 'pending']).default('created'),
});
export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;

export const JournalConfigSchema = z.object({
  dir: z.string().default(path.join(os.homedir(), '.taskmesh', 'journal')),
});
export type JournalConfig = z.infer<typeof JournalConfigSchema>;

export const BrokerConfigSchema = z.object({
  registryPath: z.string().optional(),
  staleAfterMs: z.number().int().positive().default(60_000),
  heartbeatMs: z.number().int().positive().default(15_000),
  startupTimeoutMs: z.number().int().positive().default(30_000),
  stopGraceMs: z.number().int().positive().default(5_000),
});
export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;

export const AgentConfigSchema = z.object({
  apiUrl: z.string().url().default('http://127.0.0.1:6969'),
  apiKey: z.string().default('development-key'),
  waitMs: z.number().int().min(0).default(180_000),
  executionTimeoutMs: z.number().int().positive().default(600_000),
  command: z.string().optional(),
});
export type AgentConfig = z.infer<typeof AgentConfigSchema>;

// Main configuration schema
export const CoordinatorConfigSchema = z.object({
  environment: z.enum(['development', 'staging', 'production']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  server: ServerConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  wait: WaitConfigSchema.default({}),
  locks: LockConfigSchema.default({}),
  workflow: WorkflowConfigSchema.default({}),
  journal: JournalConfigSchema.default({}),
  broker: BrokerConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
});
export type CoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;
export type CoordinatorConfigInput = z.input<typeof CoordinatorConfigSchema>;

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string): number | undefined {
  const value = env[name];
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function envList(env: Env, name: string): string[] | undefined {
  const value = env[name];
  if (!value) return undefined;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

// Drop keys whose value is undefined so zod defaults apply
function compact(section: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(section).filter(([, value]) => value !== undefined));
}

/**
 * Build a configuration from `COORD_*` environment variables. Invalid values
 * fail validation instead of silently falling back.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<CoordinatorConfigInput> = {}): CoordinatorConfig {
  return CoordinatorConfigSchema.parse({
    ...compact({
      environment: env.COORD_ENVIRONMENT,
      logLevel: env.COORD_LOG_LEVEL,
    }),
    ...overrides,
    server: {
      ...compact({
        host: env.COORD_HOST,
        port: envNumber(env, 'COORD_PORT'),
        apiKeys: envList(env, 'COORD_API_KEYS'),
        adminKey: env.COORD_ADMIN_KEY || undefined,
      }),
      ...overrides.server,
    },
    store: {
      ...compact({
        dbPath: env.COORD_DB_PATH,
        busyTimeoutMs: envNumber(env, 'COORD_BUSY_TIMEOUT_MS'),
      }),
      ...overrides.store,
    },
    wait: {
      ...compact({
        pollIntervalMs: envNumber(env, 'COORD_POLL_INTERVAL_MS'),
        maxPollIntervalMs: envNumber(env, 'COORD_MAX_POLL_INTERVAL_MS'),
        backoffFactor: envNumber(env, 'COORD_POLL_BACKOFF_FACTOR'),
        maxWaitMs: envNumber(env, 'COORD_MAX_WAIT_MS'),
      }),
      ...overrides.wait,
    },
    locks: {
      ...compact({ staleAfterMs: envNumber(env, 'COORD_LOCK_STALE_AFTER_MS') }),
      ...overrides.locks,
    },
    workflow: {
      ...compact({ reworkTarget: env.COORD_REWORK_TARGET }),
      ...overrides.workflow,
    },
    journal: {
      ...compact({ dir: env.COORD_JOURNAL_DIR }),
      ...overrides.journal,
    },
    broker: {
      ...compact({
        registryPath: env.COORD_BROKER_REGISTRY,
        staleAfterMs: envNumber(env, 'COORD_BROKER_STALE_AFTER_MS'),
        heartbeatMs: envNumber(env, 'COORD_BROKER_HEARTBEAT_MS'),
        startupTimeoutMs: envNumber(env, 'COORD_BROKER_STARTUP_TIMEOUT_MS'),
        stopGraceMs: envNumber(env, 'COORD_BROKER_STOP_GRACE_MS'),
      }),
      ...overrides.broker,
    },
    agent: {
      ...compact({
        apiUrl: env.COORD_API_URL,
        apiKey: env.COORD_API_KEY,
        waitMs: envNumber(env, 'COORD_AGENT_WAIT_MS'),
        executionTimeoutMs: envNumber(env, 'COORD_AGENT_EXECUTION_TIMEOUT_MS'),
        command: env.COORD_AGENT_COMMAND || undefined,
      }),
      ...overrides.agent,
    },
  });
}

/** Registry file for the lifecycle broker, one per API port. */
export function brokerRegistryPath(config: CoordinatorConfig): string {
  return config.broker.registryPath ?? path.join(os.tmpdir(), `taskmesh-broker-${config.server.port}.json`);
}

// Singleton instance
let configInstance: CoordinatorConfig | null = null;

export function getConfig(): CoordinatorConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function isProduction(): boolean {
  return getConfig().environment === 'production';
}

export function resetConfig(): void {
  configInstance = null;
}

// Required environment variable helper
export function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

// Optional environment variable with default
export function getEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

// Parse environment variable as boolean
export function getEnvBoolean(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}
