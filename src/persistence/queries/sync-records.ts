/**
 * External sync record query functions. The table is append-only.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export interface SyncRecordRow {
  id: number
  task_id: string
  target_system: string
  operation: string
  request_payload_hash: string
  detail: string
  result: string
  error: string | null
  triggered_by: string
  timestamp: string
}

export function insertSyncRecord(
  db: BetterSqlite3Database,
  row: Omit<SyncRecordRow, 'id'>,
): number {
  const result = db.prepare(`
    INSERT INTO external_sync_records
      (task_id, target_system, operation, request_payload_hash, detail, result, error, triggered_by, timestamp)
    VALUES
      (@task_id, @target_system, @operation, @request_payload_hash, @detail, @result, @error, @triggered_by, @timestamp)
  `).run(row)
  return Number(result.lastInsertRowid)
}

export function listSyncRecords(db: BetterSqlite3Database, taskId: string): SyncRecordRow[] {
  return db
    .prepare('SELECT * FROM external_sync_records WHERE task_id = ? ORDER BY id ASC')
    .all(taskId) as SyncRecordRow[]
}

/**
 * Most recent record for one operation + payload of a task, if any.
 */
export function getLatestSyncRecord(
  db: BetterSqlite3Database,
  taskId: string,
  operation: string,
  requestPayloadHash: string,
): SyncRecordRow | undefined {
  return db
    .prepare(`
      SELECT * FROM external_sync_records
      WHERE task_id = ? AND operation = ? AND request_payload_hash = ?
      ORDER BY id DESC LIMIT 1
    `)
    .get(taskId, operation, requestPayloadHash) as SyncRecordRow | undefined
}

/**
 * Most recent record for an operation regardless of payload.
 */
export function getLatestSyncRecordForOperation(
  db: BetterSqlite3Database,
  taskId: string,
  operation: string,
): SyncRecordRow | undefined {
  return db
    .prepare(`
      SELECT * FROM external_sync_records
      WHERE task_id = ? AND operation = ?
      ORDER BY id DESC LIMIT 1
    `)
    .get(taskId, operation) as SyncRecordRow | undefined
}
