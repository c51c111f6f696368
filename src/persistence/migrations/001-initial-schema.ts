/**
 * Migration 001: Initial schema.
 *
 * Creates:
 *  - tasks               (aggregate root, version column for optimistic concurrency)
 *  - task_steps          (ordered steps, optional split reference)
 *  - changelog_entries   (append-only)
 *  - gate_invocations    (one row per gate attempt)
 *  - external_sync_records (append-only audit of adapter calls)
 *  - indexes
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const initialSchemaMigration: Migration = {
  version: 1,
  name: '001-initial-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id                 TEXT PRIMARY KEY,
        title              TEXT NOT NULL,
        parent_id          TEXT REFERENCES tasks(id),
        status             TEXT NOT NULL DEFAULT 'Draft',
        gates_passed       TEXT NOT NULL DEFAULT '[]',
        branch_ref         TEXT,
        issue_ref          TEXT,
        change_request_ref TEXT,
        requirements       TEXT NOT NULL DEFAULT '',
        test_plan          TEXT NOT NULL DEFAULT '',
        handover           TEXT,
        revision_counts    TEXT NOT NULL DEFAULT '{}',
        revision_gate      TEXT,
        stuck_gate         TEXT,
        blocked_from       TEXT,
        open_invocation_id TEXT,
        version            INTEGER NOT NULL DEFAULT 1,
        created_at         TEXT NOT NULL,
        updated_at         TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS task_steps (
        task_id             TEXT NOT NULL REFERENCES tasks(id),
        step_index          INTEGER NOT NULL,
        description         TEXT NOT NULL,
        acceptance_criteria TEXT NOT NULL DEFAULT '[]',
        completion_state    TEXT NOT NULL DEFAULT 'pending',
        evidence            TEXT,
        split_task_id       TEXT REFERENCES tasks(id),
        PRIMARY KEY (task_id, step_index)
      );

      CREATE TABLE IF NOT EXISTS changelog_entries (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        task_id    TEXT NOT NULL REFERENCES tasks(id),
        timestamp  TEXT NOT NULL,
        component  TEXT NOT NULL,
        summary    TEXT NOT NULL,
        effect     TEXT NOT NULL DEFAULT '',
        actor      TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS gate_invocations (
        id             TEXT PRIMARY KEY,
        task_id        TEXT NOT NULL REFERENCES tasks(id),
        gate_id        TEXT NOT NULL,
        invoked_agent  TEXT,
        confirmed_by   TEXT,
        input_snapshot TEXT NOT NULL,
        verdict        TEXT,
        notes          TEXT,
        artifacts      TEXT,
        state          TEXT NOT NULL DEFAULT 'open',
        created_at     TEXT NOT NULL,
        decided_at     TEXT
      );

      CREATE TABLE IF NOT EXISTS external_sync_records (
        id                   INTEGER PRIMARY KEY AUTOINCREMENT,
        task_id              TEXT NOT NULL REFERENCES tasks(id),
        target_system        TEXT NOT NULL,
        operation            TEXT NOT NULL,
        request_payload_hash TEXT NOT NULL,
        detail               TEXT NOT NULL DEFAULT '',
        result               TEXT NOT NULL,
        error                TEXT,
        triggered_by         TEXT NOT NULL,
        timestamp            TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
      CREATE INDEX IF NOT EXISTS idx_tasks_parent ON tasks(parent_id);
      CREATE INDEX IF NOT EXISTS idx_changelog_task ON changelog_entries(task_id, id);
      CREATE INDEX IF NOT EXISTS idx_invocations_task_gate ON gate_invocations(task_id, gate_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_sync_task_op ON external_sync_records(task_id, operation, request_payload_hash, id);
    `)
  },
}
