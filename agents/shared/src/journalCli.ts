#!/usr/bin/env tsx
/**
 * Recovery Journal CLI
 *
 * Inspect and manage agent journal entries from the command line.
 *
 * Usage:
 *   tsx agents/shared/src/journalCli.ts list
 *   tsx agents/shared/src/journalCli.ts show <agent-id>
 *   tsx agents/shared/src/journalCli.ts verify <agent-id>
 *   tsx agents/shared/src/journalCli.ts clear <agent-id>
 */

import { fileURLToPath } from 'url';
import { resolve } from 'path';
import { getConfig } from './config.js';
import { CoordinatorClient } from './coordinatorClient.js';
import { RecoveryJournal, judgeEntry, type JournalEntry } from './recoveryJournal.js';
import { TaskNotFoundError } from './errors.js';
import type { TaskRecord } from './types.js';

const USAGE = `
Recovery Journal CLI - Inspect agent crash-recovery entries

Usage:
  tsx agents/shared/src/journalCli.ts <command> [agent-id]

Commands:
  list                  List agents that have a journal entry
  show <agent>          Print the raw entry (no store check)
  verify <agent>        Compare the entry with the coordinator, without changing anything
  clear <agent>         Delete the entry

Environment:
  COORD_JOURNAL_DIR, COORD_API_URL, COORD_API_KEY
`;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function describe(entry: JournalEntry): string[] {
  return [
    `Agent:     ${entry.agentId}`,
    `Task:      #${entry.taskId} ${entry.title}`,
    `Status:    ${entry.status}`,
    `Locked at: ${entry.lockedAt}`,
    `Recorded:  ${entry.recordedAt}${entry.updatedAt ? ` (updated ${entry.updatedAt})` : ''}`,
    `Context:   ${entry.executionContext ?? '-'}`,
  ];
}

export async function runJournalCli(
  args: string[],
  journal: RecoveryJournal,
  lookup: () => { getTask(taskId: number): Promise<TaskRecord> },
  io: CliIo = defaultIo
): Promise<number> {
  const [command, agentId] = args;

  if (command === 'list') {
    const agents = journal.listAgents();
    if (agents.length === 0) {
      io.out('No journal entries.');
      return 0;
    }
    for (const id of agents) {
      const entry = journal.peek(id);
      io.out(entry ? `${id}\ttask #${entry.taskId}\t${entry.status}` : `${id}\t(unreadable, moved aside)`);
    }
    return 0;
  }

  if (!command || !agentId) {
    io.err(USAGE);
    return 1;
  }

  switch (command) {
    case 'show': {
      const entry = journal.peek(agentId);
      if (!entry) {
        io.out(`No journal entry for ${agentId}`);
        return 0;
      }
      describe(entry).forEach((line) => io.out(line));
      return 0;
    }

    case 'verify': {
      const entry = journal.peek(agentId);
      if (!entry) {
        io.out(`No journal entry for ${agentId}`);
        return 0;
      }
      let task: TaskRecord | null;
      try {
        task = await lookup().getTask(entry.taskId);
      } catch (error) {
        if (!(error instanceof TaskNotFoundError)) throw error;
        task = null;
      }
      const verdict = judgeEntry(entry, task);
      io.out(`Task #${entry.taskId}: ${verdict}`);
      return verdict === 'valid' ? 0 : 2;
    }

    case 'clear': {
      const removed = journal.clear(agentId);
      io.out(removed ? `Cleared journal entry for ${agentId}` : `No journal entry for ${agentId}`);
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
  const journal = new RecoveryJournal({ dir: config.journal.dir });
  const lookup = () => new CoordinatorClient({ baseUrl: config.agent.apiUrl, apiKey: config.agent.apiKey });

  runJournalCli(process.argv.slice(2), journal, lookup)
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
