import fs from 'fs'
import path from 'path'
import Database from 'better-sqlite3'
import type { DeadLetterNotice, EnqueueReceipt, FailOutcome, QueueBackend, QueueDelivery, QueueKind, QueueMessage, QueueStats } from '../../domain/contracts/index.js'
import { BackendUnavailableError, errorMessage } from '../../domain/errors.js'
import { systemClock, type Clock } from '../../utils/clock.js'
import { newId as defaultNewId, type IdGenerator } from '../../utils/ids.js'
import { logger } from '../log/logger.js'
import { DEFAULT_MAX_ATTEMPTS, makeHandle, parseHandle, type QueueOptions } from './handles.js'

const SCHEMA = `
CREATE TABLE IF NOT EXISTS queue_messages (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  job_id TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending',
  attempts INTEGER NOT NULL DEFAULT 0,
  lease_id TEXT,
  lease_expires_at INTEGER,
  position INTEGER NOT NULL,
  enqueued_at TEXT NOT NULL,
  last_error TEXT,
  reported INTEGER NOT NULL DEFAULT 1
);
CREATE INDEX IF NOT EXISTS idx_queue_ready ON queue_messages(status, position);
CREATE INDEX IF NOT EXISTS idx_queue_lease ON queue_messages(status, lease_expires_at);
`

type NoticeRow = { id: string; job_id: string; attempts: number; last_error: string | null }

type MessageRow = { seq: number; id: string; job_id: string; attempts: number; enqueued_at: string }

// 中文注释：position 决定出队顺序；重新入队的消息取当前最大值之后，排到队尾
const NEXT_POSITION = '(SELECT COALESCE(MAX(position), 0) FROM queue_messages)'

// 中文注释：关系型队列；status 取值 pending / leased / dead，ack 后删除行
export class SqliteQueue implements QueueBackend {
  readonly kind: QueueKind = 'sqlite'
  private db: Database.Database | null = null
  private readonly maxAttempts: number
  private readonly clock: Clock
  private readonly newId: IdGenerator

  constructor(private readonly opts: QueueOptions & { path: string; clock?: Clock; newId?: IdGenerator }) {
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    this.clock = opts.clock ?? systemClock
    this.newId = opts.newId ?? defaultNewId
  }

  async initialize(): Promise<void> {
    if (this.db) return
    try {
      if (this.opts.path !== ':memory:') fs.mkdirSync(path.dirname(path.resolve(this.opts.path)), { recursive: true })
      const db = new Database(this.opts.path)
      if (this.opts.path !== ':memory:') db.pragma('journal_mode = WAL')
      db.exec(SCHEMA)
      // 中文注释：旧库缺少 reported 列时补齐（已有死信视为已处理）
      const columns = db.prepare<[], { name: string }>('PRAGMA table_info(queue_messages)').all()
      if (!columns.some(c => c.name === 'reported')) db.exec('ALTER TABLE queue_messages ADD COLUMN reported INTEGER NOT NULL DEFAULT 1')
      this.db = db
    } catch (e) {
      throw new BackendUnavailableError('sqlite-queue', errorMessage(e), { cause: e })
    }
  }

  async close(): Promise<void> {
    if (!this.db) return
    this.db.close()
    this.db = null
  }

  private run<T>(fn: (db: Database.Database) => T): T {
    const db = this.db
    if (!db) throw new BackendUnavailableError('sqlite-queue', 'queue is not initialized')
    try {
      return fn(db)
    } catch (e) {
      throw new BackendUnavailableError('sqlite-queue', errorMessage(e), { cause: e })
    }
  }

  async enqueue(message: QueueMessage): Promise<EnqueueReceipt> {
    const now = this.clock()
    const id = this.newId()
    this.run(db => db.prepare(`INSERT INTO queue_messages (id, job_id, position, enqueued_at) VALUES (?, ?, ${NEXT_POSITION} + 1, ?)`)
      .run(id, message.jobId, now.toISOString()))
    return { messageId: id }
  }

  async dequeue(visibilityTimeoutMs: number): Promise<QueueDelivery | null> {
    const now = this.clock().getTime()
    const leaseId = this.newId()
    return this.run(db => db.transaction((): QueueDelivery | null => {
      const expired = db.prepare(`UPDATE queue_messages SET status = 'dead', lease_id = NULL, lease_expires_at = NULL, reported = 0,
          last_error = COALESCE(last_error, 'visibility timeout expired')
        WHERE status = 'leased' AND lease_expires_at <= ? AND attempts >= ?`).run(now, this.maxAttempts)
      if (expired.changes > 0) logger.warn('queue_messages_dead_lettered', { count: expired.changes })
      db.prepare(`UPDATE queue_messages SET status = 'pending', lease_id = NULL, lease_expires_at = NULL, position = ${NEXT_POSITION} + seq
        WHERE status = 'leased' AND lease_expires_at <= ?`).run(now)

      const row = db.prepare<[], MessageRow>(
        `SELECT seq, id, job_id, attempts, enqueued_at FROM queue_messages WHERE status = 'pending' ORDER BY position ASC LIMIT 1`
      ).get()
      if (!row) return null
      db.prepare(`UPDATE queue_messages SET status = 'leased', lease_id = ?, lease_expires_at = ?, attempts = attempts + 1
        WHERE seq = ?`).run(leaseId, now + visibilityTimeoutMs, row.seq)
      return {
        handle: makeHandle(row.id, leaseId),
        messageId: row.id,
        jobId: row.job_id,
        attempt: row.attempts + 1,
        enqueuedAt: row.enqueued_at
      }
    })())
  }

  async ack(handle: string): Promise<void> {
    const parsed = parseHandle(handle)
    if (!parsed) return
    this.run(db => db.prepare(`DELETE FROM queue_messages WHERE id = ? AND lease_id = ? AND status = 'leased'`)
      .run(parsed.messageId, parsed.leaseId))
  }

  async fail(handle: string, error: string): Promise<FailOutcome> {
    const parsed = parseHandle(handle)
    if (!parsed) return 'ignored'
    return this.run(db => db.transaction((): FailOutcome => {
      const row = db.prepare<[string, string], { attempts: number }>(
        `SELECT attempts FROM queue_messages WHERE id = ? AND lease_id = ? AND status = 'leased'`
      ).get(parsed.messageId, parsed.leaseId)
      if (!row) return 'ignored'
      if (row.attempts >= this.maxAttempts) {
        db.prepare(`UPDATE queue_messages SET status = 'dead', lease_id = NULL, lease_expires_at = NULL, last_error = ? WHERE id = ?`)
          .run(error, parsed.messageId)
        return 'dead_lettered'
      }
      db.prepare(`UPDATE queue_messages SET status = 'pending', lease_id = NULL, lease_expires_at = NULL, position = ${NEXT_POSITION} + 1, last_error = ? WHERE id = ?`)
        .run(error, parsed.messageId)
      return 'requeued'
    })())
  }

  async expiredDeadLetters(): Promise<DeadLetterNotice[]> {
    return this.run(db => db.prepare<[], NoticeRow>(
      `SELECT id, job_id, attempts, last_error FROM queue_messages WHERE status = 'dead' AND reported = 0 ORDER BY position ASC`
    ).all().map(r => ({ messageId: r.id, jobId: r.job_id, attempts: r.attempts, error: r.last_error ?? '' })))
  }

  async acknowledgeDeadLetter(messageId: string): Promise<void> {
    this.run(db => db.prepare(`UPDATE queue_messages SET reported = 1 WHERE id = ? AND status = 'dead'`).run(messageId))
  }

  async stats(): Promise<QueueStats> {
    return this.run(db => {
      const rows = db.prepare<[], { status: string; n: number }>('SELECT status, COUNT(*) AS n FROM queue_messages GROUP BY status').all()
      const count = (status: string) => rows.find(r => r.status === status)?.n ?? 0
      return { pending: count('pending'), inFlight: count('leased'), deadLettered: count('dead') }
    })
  }

  async healthCheck(): Promise<boolean> {
    if (!this.db) return false
    try {
      this.db.prepare('SELECT 1').get()
      return true
    } catch (e) {
      logger.warn('sqlite_queue_health_failed', { error: errorMessage(e) })
      return false
    }
  }
}
