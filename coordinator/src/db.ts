/**
 * Database Service
 * SQLite connection and schema for the coordination store
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export interface OpenDatabaseOptions {
  busyTimeoutMs?: number;
  readonly?: boolean;
}

export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath, { readonly: options.readonly ?? false });

  // Enable WAL mode so readers never block the single writer
  db.pragma('journal_mode = WAL');
  db.pragma(`busy_timeout = ${Math.trunc(options.busyTimeoutMs ?? 5000)}`);
  db.pragma('foreign_keys = ON');

  if (!options.readonly) {
    initSchema(db);
  }
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    -- Registered agents
    CREATE TABLE IF NOT EXISTS agents (
      agent_id TEXT PRIMARY KEY,
      role TEXT NOT NULL CHECK(role IN ('frontend_dev', 'backend_dev', 'fullstack_dev', 'qa', 'architect', 'pm')),
      skill_level TEXT NOT NULL CHECK(skill_level IN ('junior', 'senior', 'principal')),
      registered_at TEXT NOT NULL,
      last_seen_at TEXT NOT NULL
    );

    -- Task backlog
    CREATE TABLE IF NOT EXISTS tasks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      target_role TEXT NOT NULL CHECK(target_role IN ('frontend_dev', 'backend_dev', 'fullstack_dev', 'qa', 'architect', 'pm')),
      skill_level TEXT NOT NULL CHECK(skill_level IN ('junior', 'senior', 'principal')),
      complexity TEXT NOT NULL DEFAULT 'minor' CHECK(complexity IN ('minor', 'major')),
      status TEXT NOT NULL CHECK(status IN ('pending', 'created', 'locked', 'dev_done', 'testing', 'qa_done', 'completed')),
      locked_by TEXT,
      locked_at TEXT,
      execution_context TEXT,
      branch TEXT,
      notes TEXT,
      created_by TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      CHECK((locked_by IS NULL) = (locked_at IS NULL)),
      CHECK((locked_by IS NOT NULL) = (status IN ('locked', 'testing')))
    );

    -- Append-only status changelog
    CREATE TABLE IF NOT EXISTS task_changes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id INTEGER NOT NULL REFERENCES tasks(id),
      old_status TEXT,
      new_status TEXT NOT NULL,
      changed_by TEXT,
      notes TEXT,
      changed_at TEXT NOT NULL
    );

    -- Indexes for common queries
    CREATE INDEX IF NOT EXISTS idx_tasks_pickup ON tasks(target_role, status, created_at);
    CREATE INDEX IF NOT EXISTS idx_tasks_locked_by ON tasks(locked_by);
    CREATE INDEX IF NOT EXISTS idx_changes_task ON task_changes(task_id);
    CREATE INDEX IF NOT EXISTS idx_changes_time ON task_changes(changed_at);
  `);
}
