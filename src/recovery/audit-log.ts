/**
 * AuditLog: append-only record of every external sync attempt.
 *
 * Sync records are never updated or deleted (migration 002 enforces this
 * with triggers); reconciliation reads the latest record per operation.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { TaskInvariantError } from '../core/errors.js'
import type { Actor, TaskId } from '../core/types.js'
import {
  getLatestSyncRecord,
  getLatestSyncRecordForOperation,
  insertSyncRecord,
  listSyncRecords,
} from '../persistence/queries/sync-records.js'
import type { SyncRecordRow } from '../persistence/queries/sync-records.js'
import type {
  ExternalSyncRecord,
  NewSyncRecord,
  SyncOperation,
  SyncResultKind,
  TargetSystem,
} from '../modules/task-store/types.js'
import { nowIso } from '../utils/helpers.js'

const TARGET_SYSTEMS: readonly TargetSystem[] = ['version_control', 'issue_tracker']
const OPERATIONS: readonly SyncOperation[] = [
  'ensure_branch',
  'push_branch',
  'open_change_request',
  'merge_change_request',
  'ensure_issue',
  'sync_status',
  'post_comment',
]
const RESULTS: readonly SyncResultKind[] = ['success', 'failed', 'unknown']
const ACTORS: readonly Actor[] = ['controller', 'dispatcher', 'reconciler', 'operator']

function pick<T extends string>(allowed: readonly T[], value: string, field: string, id: number): T {
  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) {
    throw new TaskInvariantError(`Sync record ${String(id)} has unknown ${field} "${value}"`, { id, field })
  }
  return match
}

function fromRow(row: SyncRecordRow): ExternalSyncRecord {
  return {
    id: row.id,
    taskId: row.task_id,
    targetSystem: pick(TARGET_SYSTEMS, row.target_system, 'target_system', row.id),
    operation: pick(OPERATIONS, row.operation, 'operation', row.id),
    requestPayloadHash: row.request_payload_hash,
    detail: row.detail,
    result: pick(RESULTS, row.result, 'result', row.id),
    error: row.error,
    triggeredBy: pick(ACTORS, row.triggered_by, 'triggered_by', row.id),
    timestamp: row.timestamp,
  }
}

export class AuditLog {
  private readonly _db: BetterSqlite3Database

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  record(entry: NewSyncRecord): ExternalSyncRecord {
    const row = {
      task_id: entry.taskId,
      target_system: entry.targetSystem,
      operation: entry.operation,
      request_payload_hash: entry.requestPayloadHash,
      detail: entry.detail,
      result: entry.result,
      error: entry.error,
      triggered_by: entry.triggeredBy,
      timestamp: entry.timestamp ?? nowIso(),
    }
    const id = insertSyncRecord(this._db, row)
    return fromRow({ ...row, id })
  }

  list(taskId: TaskId): ExternalSyncRecord[] {
    return listSyncRecords(this._db, taskId).map(fromRow)
  }

  /**
   * Latest record for an operation; narrowed to one payload when
   * `requestPayloadHash` is given.
   */
  latest(taskId: TaskId, operation: SyncOperation, requestPayloadHash?: string): ExternalSyncRecord | undefined {
    const row =
      requestPayloadHash !== undefined
        ? getLatestSyncRecord(this._db, taskId, operation, requestPayloadHash)
        : getLatestSyncRecordForOperation(this._db, taskId, operation)
    return row !== undefined ? fromRow(row) : undefined
  }
}

export function createAuditLog(db: BetterSqlite3Database): AuditLog {
  return new AuditLog(db)
}
