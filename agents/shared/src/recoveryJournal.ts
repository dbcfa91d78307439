/**
 * Crash-recovery journal
 *
 * An agent records the task it holds IMMEDIATELY after locking it, before any
 * work begins. After a crash the entry tells the restarted agent what it was
 * doing, but the entry is only trusted once the store confirms the agent
 * still holds that task in the same status.
 *
 * Usage:
 *   const journal = new RecoveryJournal({ dir });
 *   journal.record(agentId, { taskId, title, status: 'locked', ... });
 *   // ... work ...
 *   journal.clear(agentId);
 *
 *   // On startup, before asking for new work
 *   const resumed = await journal.recover(agentId, client);
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { atomicWrite } from '../../../orchestration/fileLock.js';
import { AgentLogger } from './logger.js';
import { JournalCorruptError, TaskNotFoundError } from './errors.js';
import type { CoordinatorOperations, TaskRecord } from './types.js';

const logger = new AgentLogger('RecoveryJournal');

export const JOURNAL_VERSION = 1;

export const JournalEntrySchema = z.object({
  version: z.literal(JOURNAL_VERSION),
  agentId: z.string().min(1),
  taskId: z.number().int().positive(),
  title: z.string(),
  status: z.enum(['locked', 'testing']),
  executionContext: z.string().nullable(),
  lockedAt: z.string(),
  recordedAt: z.string(),
  updatedAt: z.string().optional(),
});
export type JournalEntry = z.infer<typeof JournalEntrySchema>;

export type JournalSnapshot = Pick<JournalEntry, 'taskId' | 'title' | 'status' | 'executionContext' | 'lockedAt'>;

export interface RecoveryJournalConfig {
  dir: string;
  now?: () => Date;
}

/** The part of the operation set reconciliation needs */
export type TaskLookup = Pick<CoordinatorOperations, 'getTask'>;

export type ReconcileVerdict = 'valid' | 'released' | 'reassigned' | 'status-changed' | 'missing';

export function snapshotFromTask(task: TaskRecord): JournalSnapshot {
  if (task.status !== 'locked' && task.status !== 'testing') {
    throw new Error(`Task ${task.id} is not held (status ${task.status})`);
  }
  if (task.lockedAt === null) {
    throw new Error(`Task ${task.id} has no lock timestamp`);
  }
  return {
    taskId: task.id,
    title: task.title,
    status: task.status,
    executionContext: task.executionContext,
    lockedAt: task.lockedAt,
  };
}

export function judgeEntry(entry: JournalEntry, task: TaskRecord | null): ReconcileVerdict {
  if (!task) return 'missing';
  if (task.lockedBy === null) return 'released';
  if (task.lockedBy !== entry.agentId) return 'reassigned';
  if (task.status !== entry.status) return 'status-changed';
  return 'valid';
}

export class RecoveryJournal {
  private dir: string;
  private now: () => Date;

  constructor(config: RecoveryJournalConfig) {
    this.dir = config.dir;
    this.now = config.now ?? (() => new Date());
    this.ensureDir();
  }

  private ensureDir(): void {
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
      logger.info(`Created journal directory: ${this.dir}`);
    }
  }

  pathFor(agentId: string): string {
    return path.join(this.dir, `agent-${encodeURIComponent(agentId)}.json`);
  }

  /**
   * Durably record the task an agent now holds. Returns only after the entry
   * is on disk.
   */
  record(agentId: string, snapshot: JournalSnapshot): JournalEntry {
    const entry: JournalEntry = JournalEntrySchema.parse({
      version: JOURNAL_VERSION,
      agentId,
      ...snapshot,
      recordedAt: this.now().toISOString(),
    });
    atomicWrite(this.pathFor(agentId), JSON.stringify(entry, null, 2));
    logger.info('Journal entry recorded', { agentId, taskId: entry.taskId, status: entry.status });
    return entry;
  }

  /** Replace the execution context of the current entry, if any */
  update(agentId: string, patch: { executionContext: string | null }): JournalEntry | null {
    const current = this.peek(agentId);
    if (!current) return null;

    const entry: JournalEntry = {
      ...current,
      executionContext: patch.executionContext,
      updatedAt: this.now().toISOString(),
    };
    atomicWrite(this.pathFor(agentId), JSON.stringify(entry, null, 2));
    logger.debug('Journal entry updated', { agentId, taskId: entry.taskId });
    return entry;
  }

  /** Remove the entry. Returns whether one existed. */
  clear(agentId: string): boolean {
    const file = this.pathFor(agentId);
    try {
      fs.unlinkSync(file);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
    logger.info('Journal entry cleared', { agentId });
    return true;
  }

  /**
   * Read the raw entry without consulting the store. An unreadable file is
   * moved aside and reported as no entry.
   */
  peek(agentId: string): JournalEntry | null {
    try {
      return this.read(agentId);
    } catch (error) {
      if (error instanceof JournalCorruptError) {
        logger.error('Journal entry is corrupt, moving it aside', { agentId, error });
        this.quarantine(agentId);
        return null;
      }
      throw error;
    }
  }

  private read(agentId: string): JournalEntry | null {
    const file = this.pathFor(agentId);
    let raw: string;
    try {
      raw = fs.readFileSync(file, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new JournalCorruptError(agentId, file, error);
    }
    const result = JournalEntrySchema.safeParse(parsed);
    if (!result.success || result.data.agentId !== agentId) {
      throw new JournalCorruptError(agentId, file, result.success ? new Error('entry belongs to another agent') : result.error);
    }
    return result.data;
  }

  /** Move a corrupt file to `<name>.corrupt.<timestamp>`; returns the new path */
  quarantine(agentId: string): string | null {
    const file = this.pathFor(agentId);
    if (!fs.existsSync(file)) return null;
    const target = `${file}.corrupt.${this.now().getTime()}`;
    fs.renameSync(file, target);
    return target;
  }

  /**
   * Return the entry only if the store still shows this agent holding the
   * task in the journaled status; otherwise delete it and return null.
   * A store outage propagates and leaves the entry in place.
   */
  async recover(agentId: string, store: TaskLookup): Promise<JournalEntry | null> {
    const entry = this.peek(agentId);
    if (!entry) return null;

    let task: TaskRecord | null;
    try {
      task = await store.getTask(entry.taskId);
    } catch (error) {
      if (!(error instanceof TaskNotFoundError)) {
        throw error;
      }
      task = null;
    }

    const verdict = judgeEntry(entry, task);
    if (verdict !== 'valid') {
      logger.warn('Discarding journal entry that no longer matches the store', {
        agentId,
        taskId: entry.taskId,
        status: verdict,
      });
      this.clear(agentId);
      return null;
    }

    logger.info('Recovered task from journal', { agentId, taskId: entry.taskId, status: entry.status });
    return entry;
  }

  /** Agent ids that currently have a journal file */
  listAgents(): string[] {
    if (!fs.existsSync(this.dir)) return [];
    return fs
      .readdirSync(this.dir)
      .filter((name) => name.startsWith('agent-') && name.endsWith('.json'))
      .map((name) => decodeURIComponent(name.slice('agent-'.length, -'.json'.length)));
  }
}
