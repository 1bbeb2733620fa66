/*
功能：存储后端（SQLite 实现，better-sqlite3）
用途：持久化作业、文章与审批历史；状态变更使用带条件的 UPDATE 并在同一事务内写历史。
参数：
- constructor({ path, clock?, newId? })：path 可为 ':memory:'
返回：
- 实现 StorageBackend；驱动层异常统一转为 BackendUnavailableError
示例：
// const storage = new SqliteStorage({ path: './data/jobs.db' }); await storage.initialize()
*/
import fs from 'fs'
import path from 'path'
import Database from 'better-sqlite3'
import {
  APPROVAL_STATUSES, JOB_STATUSES, HISTORY_ACTIONS,
  type ApprovalInput, type ApprovalStatus, type BlogPost, type HistoryAction, type HistoryDraft, type Job, type JobDraft,
  type JobError, type JobHistoryEntry, type JobQuery, type JobResult, type JobStats, type JobStatus, type JobTransition,
  type JsonObject, type PostDraft, type PostPatch, type PostQuery, type PublishInput, type ResubmitInput,
  type ScoringBreakdown, type StorageBackend, type StorageKind
} from '../../domain/contracts/index.js'
import {
  BackendUnavailableError, DuplicateJobError, InvalidTransitionError, JobOrchestratorError, NotFoundError, errorMessage
} from '../../domain/errors.js'
import { applyJobTransition, buildJob, submittedHistory, transitionHistory } from '../../domain/jobStateMachine.js'
import { applyApproval, type ApprovalAction, type ApprovalChange } from '../../domain/approvalStateMachine.js'
import { buildPost, duplicatePostForJob, patchPost } from '../../domain/posts.js'
import { computeStats } from '../../domain/stats.js'
import { resolvePage } from '../../utils/paging.js'
import { isoNow, systemClock, type Clock } from '../../utils/clock.js'
import { newId as defaultNewId, type IdGenerator } from '../../utils/ids.js'
import { logger } from '../log/logger.js'

export const SCHEMA_VERSION = 1

const SCHEMA = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS jobs (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  correlation_id TEXT,
  status TEXT NOT NULL,
  topics TEXT NOT NULL,
  sources TEXT NOT NULL,
  num_candidates INTEGER NOT NULL,
  max_results INTEGER NOT NULL,
  result TEXT,
  error TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  started_at TEXT,
  completed_at TEXT
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_jobs_live_correlation ON jobs(correlation_id)
  WHERE correlation_id IS NOT NULL AND status != 'failed';
CREATE INDEX IF NOT EXISTS idx_jobs_correlation ON jobs(correlation_id);
CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);

CREATE TABLE IF NOT EXISTS blog_posts (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  content TEXT NOT NULL,
  word_count INTEGER NOT NULL,
  topic TEXT NOT NULL,
  sources TEXT NOT NULL,
  job_id TEXT UNIQUE,
  approval_status TEXT NOT NULL DEFAULT 'pending',
  approval_feedback TEXT,
  scoring TEXT,
  metadata TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  approved_at TEXT,
  published_at TEXT
);
CREATE INDEX IF NOT EXISTS idx_posts_status ON blog_posts(approval_status);
CREATE INDEX IF NOT EXISTS idx_posts_created ON blog_posts(created_at);

CREATE TABLE IF NOT EXISTS job_history (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  job_id TEXT,
  post_id TEXT,
  action TEXT NOT NULL,
  previous_status TEXT,
  new_status TEXT,
  actor TEXT,
  feedback TEXT,
  metadata TEXT,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_history_job ON job_history(job_id);
CREATE INDEX IF NOT EXISTS idx_history_post ON job_history(post_id);
`

type JobRow = {
  id: string
  correlation_id: string | null
  status: string
  topics: string
  sources: string
  num_candidates: number
  max_results: number
  result: string | null
  error: string | null
  created_at: string
  updated_at: string
  started_at: string | null
  completed_at: string | null
}

type PostRow = {
  id: string
  title: string
  content: string
  word_count: number
  topic: string
  sources: string
  job_id: string | null
  approval_status: string
  approval_feedback: string | null
  scoring: string | null
  metadata: string | null
  created_at: string
  updated_at: string
  approved_at: string | null
  published_at: string | null
}

type HistoryRow = {
  id: string
  job_id: string | null
  post_id: string | null
  action: string
  previous_status: string | null
  new_status: string | null
  actor: string | null
  feedback: string | null
  metadata: string | null
  created_at: string
}

const JOB_COLUMNS = 'id, correlation_id, status, topics, sources, num_candidates, max_results, result, error, created_at, updated_at, started_at, completed_at'
const POST_COLUMNS = 'id, title, content, word_count, topic, sources, job_id, approval_status, approval_feedback, scoring, metadata, created_at, updated_at, approved_at, published_at'

function isJobStatus(v: string): v is JobStatus { return JOB_STATUSES.some(s => s === v) }
function isApprovalStatus(v: string): v is ApprovalStatus { return APPROVAL_STATUSES.some(s => s === v) }
function isHistoryAction(v: string): v is HistoryAction { return HISTORY_ACTIONS.some(s => s === v) }

function toJson(v: unknown): string | null {
  return v === undefined ? null : JSON.stringify(v)
}

// 中文注释：JSON 列由本模块写入，读取时按写入时的类型还原
function fromJson<T>(text: string | null): T | undefined {
  return text === null ? undefined : JSON.parse(text)
}

function opt(v: string | null): string | undefined {
  return v === null ? undefined : v
}

function sqliteCode(e: unknown): string | undefined {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined
}

function rowToJob(row: JobRow): Job {
  if (!isJobStatus(row.status)) throw new Error(`job ${row.id} has unknown status ${row.status}`)
  const base = {
    id: row.id,
    correlationId: opt(row.correlation_id),
    topics: fromJson<string[]>(row.topics) ?? [],
    sources: fromJson<string[]>(row.sources) ?? [],
    numCandidates: row.num_candidates,
    maxResults: row.max_results,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    startedAt: opt(row.started_at)
  }
  const completedAt = row.completed_at ?? row.updated_at
  if (row.status === 'completed') {
    const result = fromJson<JobResult>(row.result)
    if (!result) throw new Error(`completed job ${row.id} has no result`)
    return { ...base, status: 'completed', completedAt, result }
  }
  if (row.status === 'failed') {
    const error = fromJson<JobError>(row.error)
    if (!error) throw new Error(`failed job ${row.id} has no error`)
    return { ...base, status: 'failed', completedAt, error }
  }
  return { ...base, status: row.status }
}

function rowToPost(row: PostRow): BlogPost {
  if (!isApprovalStatus(row.approval_status)) throw new Error(`post ${row.id} has unknown approval status ${row.approval_status}`)
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    wordCount: row.word_count,
    topic: row.topic,
    sources: fromJson<string[]>(row.sources) ?? [],
    jobId: opt(row.job_id),
    approvalStatus: row.approval_status,
    approvalFeedback: opt(row.approval_feedback),
    scoring: fromJson<ScoringBreakdown>(row.scoring),
    metadata: fromJson<JsonObject>(row.metadata),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    approvedAt: opt(row.approved_at),
    publishedAt: opt(row.published_at)
  }
}

function rowToHistory(row: HistoryRow): JobHistoryEntry {
  if (!isHistoryAction(row.action)) throw new Error(`history ${row.id} has unknown action ${row.action}`)
  return {
    id: row.id,
    jobId: opt(row.job_id),
    postId: opt(row.post_id),
    action: row.action,
    previousStatus: opt(row.previous_status),
    newStatus: opt(row.new_status),
    actor: opt(row.actor),
    feedback: opt(row.feedback),
    metadata: fromJson<JsonObject>(row.metadata),
    createdAt: row.created_at
  }
}

export type SqliteStorageOptions = { path: string; clock?: Clock; newId?: IdGenerator }

export class SqliteStorage implements StorageBackend {
  readonly kind: StorageKind = 'sqlite'
  private db: Database.Database | null = null
  private readonly now: () => string
  private readonly newId: IdGenerator

  constructor(private readonly opts: SqliteStorageOptions) {
    const clock = opts.clock ?? systemClock
    this.now = () => isoNow(clock)
    this.newId = opts.newId ?? defaultNewId
  }

  async initialize(): Promise<void> {
    if (this.db) return
    try {
      if (this.opts.path !== ':memory:') fs.mkdirSync(path.dirname(path.resolve(this.opts.path)), { recursive: true })
      const db = new Database(this.opts.path)
      if (this.opts.path !== ':memory:') db.pragma('journal_mode = WAL')
      db.exec(SCHEMA)
      db.prepare('INSERT OR IGNORE INTO schema_version (version, applied_at) VALUES (?, ?)').run(SCHEMA_VERSION, this.now())
      this.db = db
    } catch (e) {
      throw new BackendUnavailableError('sqlite-storage', errorMessage(e), { cause: e })
    }
    logger.info('sqlite_storage_initialized', { path: this.opts.path, schemaVersion: SCHEMA_VERSION })
  }

  async close(): Promise<void> {
    if (!this.db) return
    this.db.close()
    this.db = null
  }

  /** 当前已应用的最高 schema 版本（未初始化时为 0） */
  schemaVersion(): number {
    if (!this.db) return 0
    const row = this.db.prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version').get()
    return row?.version ?? 0
  }

  // 中文注释：领域错误原样抛出，驱动错误包装为可重试的 BackendUnavailableError
  private run<T>(fn: (db: Database.Database) => T): T {
    const db = this.db
    if (!db) throw new BackendUnavailableError('sqlite-storage', 'storage is not initialized')
    try {
      return fn(db)
    } catch (e) {
      if (e instanceof JobOrchestratorError) throw e
      throw new BackendUnavailableError('sqlite-storage', errorMessage(e), { cause: e })
    }
  }

  private insertHistory(db: Database.Database, draft: HistoryDraft): JobHistoryEntry {
    const entry: JobHistoryEntry = { ...draft, id: this.newId(), createdAt: this.now() }
    db.prepare(`INSERT INTO job_history (id, job_id, post_id, action, previous_status, new_status, actor, feedback, metadata, created_at)
      VALUES (@id, @jobId, @postId, @action, @previousStatus, @newStatus, @actor, @feedback, @metadata, @createdAt)`).run({
      id: entry.id,
      jobId: entry.jobId ?? null,
      postId: entry.postId ?? null,
      action: entry.action,
      previousStatus: entry.previousStatus ?? null,
      newStatus: entry.newStatus ?? null,
      actor: entry.actor ?? null,
      feedback: entry.feedback ?? null,
      metadata: toJson(entry.metadata),
      createdAt: entry.createdAt
    })
    return entry
  }

  private selectJob(db: Database.Database, id: string): Job | null {
    const row = db.prepare<[string], JobRow>(`SELECT ${JOB_COLUMNS} FROM jobs WHERE id = ?`).get(id)
    return row ? rowToJob(row) : null
  }

  private selectLiveJob(db: Database.Database, correlationId: string): Job | null {
    const row = db.prepare<[string], JobRow>(
      `SELECT ${JOB_COLUMNS} FROM jobs WHERE correlation_id = ? AND status != 'failed' ORDER BY seq DESC LIMIT 1`
    ).get(correlationId)
    return row ? rowToJob(row) : null
  }

  private selectPost(db: Database.Database, id: string): BlogPost | null {
    const row = db.prepare<[string], PostRow>(`SELECT ${POST_COLUMNS} FROM blog_posts WHERE id = ?`).get(id)
    return row ? rowToPost(row) : null
  }

  // ---------- jobs ----------

  async createJob(draft: JobDraft): Promise<Job> {
    return this.run(db => {
      const tx = db.transaction((): Job => {
        if (draft.correlationId) {
          const live = this.selectLiveJob(db, draft.correlationId)
          if (live) throw new DuplicateJobError(live)
        }
        const job = buildJob(this.newId(), draft, this.now())
        db.prepare(`INSERT INTO jobs (id, correlation_id, status, topics, sources, num_candidates, max_results, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`).run(
          job.id, job.correlationId ?? null, job.status, JSON.stringify(job.topics), JSON.stringify(job.sources),
          job.numCandidates, job.maxResults, job.createdAt, job.updatedAt
        )
        this.insertHistory(db, submittedHistory(job))
        return job
      })
      try {
        return tx()
      } catch (e) {
        // 中文注释：另一连接抢先插入同一关联 ID 时由部分唯一索引拦截
        if (draft.correlationId && sqliteCode(e) === 'SQLITE_CONSTRAINT_UNIQUE') {
          const live = this.selectLiveJob(db, draft.correlationId)
          if (live) throw new DuplicateJobError(live)
        }
        throw e
      }
    })
  }

  async getJob(id: string): Promise<Job | null> {
    return this.run(db => this.selectJob(db, id))
  }

  async getJobByCorrelationId(correlationId: string): Promise<Job | null> {
    return this.run(db => {
      const row = db.prepare<[string], JobRow>(`SELECT ${JOB_COLUMNS} FROM jobs WHERE correlation_id = ? ORDER BY seq DESC LIMIT 1`).get(correlationId)
      return row ? rowToJob(row) : null
    })
  }

  async transitionJob(id: string, transition: JobTransition): Promise<Job> {
    return this.run(db => db.transaction((): Job => {
      const job = this.selectJob(db, id)
      if (!job) throw new NotFoundError('job', id)
      const next = applyJobTransition(job, transition, this.now())
      const info = db.prepare(`UPDATE jobs SET status = @status, result = @result, error = @error, updated_at = @updatedAt,
          started_at = @startedAt, completed_at = @completedAt
        WHERE id = @id AND status = @expected`).run({
        id,
        expected: transition.from,
        status: next.status,
        result: toJson(next.result),
        error: toJson(next.error),
        updatedAt: next.updatedAt,
        startedAt: next.startedAt ?? null,
        completedAt: next.completedAt ?? null
      })
      if (info.changes !== 1) {
        throw new InvalidTransitionError(transition.from, transition.to, `job ${id} changed concurrently`)
      }
      const entry = transitionHistory(next, transition)
      if (entry) this.insertHistory(db, entry)
      return next
    })())
  }

  async listJobs(query: JobQuery = {}): Promise<Job[]> {
    const { limit, offset } = resolvePage(query)
    if (limit === 0) return []
    return this.run(db => {
      const rows = query.status
        ? db.prepare<[string, number, number], JobRow>(
          `SELECT ${JOB_COLUMNS} FROM jobs WHERE status = ? ORDER BY created_at DESC, seq DESC LIMIT ? OFFSET ?`
        ).all(query.status, limit, offset)
        : db.prepare<[number, number], JobRow>(
          `SELECT ${JOB_COLUMNS} FROM jobs ORDER BY created_at DESC, seq DESC LIMIT ? OFFSET ?`
        ).all(limit, offset)
      return rows.map(rowToJob)
    })
  }

  // ---------- posts ----------

  async createPost(draft: PostDraft): Promise<BlogPost> {
    const post = buildPost(this.newId(), draft, this.now())
    return this.run(db => {
      try {
        db.prepare(`INSERT INTO blog_posts (id, title, content, word_count, topic, sources, job_id, approval_status, scoring, metadata, created_at, updated_at)
          VALUES (@id, @title, @content, @wordCount, @topic, @sources, @jobId, @approvalStatus, @scoring, @metadata, @createdAt, @updatedAt)`).run({
          id: post.id,
          title: post.title,
          content: post.content,
          wordCount: post.wordCount,
          topic: post.topic,
          sources: JSON.stringify(post.sources),
          jobId: post.jobId ?? null,
          approvalStatus: post.approvalStatus,
          scoring: toJson(post.scoring),
          metadata: toJson(post.metadata),
          createdAt: post.createdAt,
          updatedAt: post.updatedAt
        })
      } catch (e) {
        if (post.jobId && sqliteCode(e) === 'SQLITE_CONSTRAINT_UNIQUE') throw duplicatePostForJob(post.jobId)
        throw e
      }
      return post
    })
  }

  async getPost(id: string): Promise<BlogPost | null> {
    return this.run(db => this.selectPost(db, id))
  }

  async getPostByJobId(jobId: string): Promise<BlogPost | null> {
    return this.run(db => {
      const row = db.prepare<[string], PostRow>(`SELECT ${POST_COLUMNS} FROM blog_posts WHERE job_id = ?`).get(jobId)
      return row ? rowToPost(row) : null
    })
  }

  private writePost(db: Database.Database, post: BlogPost, expected: ApprovalStatus): boolean {
    const info = db.prepare(`UPDATE blog_posts SET title = @title, content = @content, word_count = @wordCount, topic = @topic,
        sources = @sources, metadata = @metadata, approval_status = @approvalStatus, approval_feedback = @approvalFeedback,
        updated_at = @updatedAt, approved_at = @approvedAt, published_at = @publishedAt
      WHERE id = @id AND approval_status = @expected`).run({
      id: post.id,
      expected,
      title: post.title,
      content: post.content,
      wordCount: post.wordCount,
      topic: post.topic,
      sources: JSON.stringify(post.sources),
      metadata: toJson(post.metadata),
      approvalStatus: post.approvalStatus,
      approvalFeedback: post.approvalFeedback ?? null,
      updatedAt: post.updatedAt,
      approvedAt: post.approvedAt ?? null,
      publishedAt: post.publishedAt ?? null
    })
    return info.changes === 1
  }

  async updatePost(id: string, patch: PostPatch): Promise<BlogPost | null> {
    return this.run(db => db.transaction((): BlogPost | null => {
      const post = this.selectPost(db, id)
      if (!post) return null
      const next = patchPost(post, patch, this.now())
      if (!this.writePost(db, next, post.approvalStatus)) {
        throw new InvalidTransitionError(post.approvalStatus, next.approvalStatus, `post ${id} changed concurrently`)
      }
      return next
    })())
  }

  async listPosts(query: PostQuery = {}): Promise<BlogPost[]> {
    const { limit, offset } = resolvePage(query)
    if (limit === 0) return []
    const where: string[] = []
    const params: Array<string | number> = []
    if (query.approvalStatus) { where.push('approval_status = ?'); params.push(query.approvalStatus) }
    if (query.topic) { where.push('topic = ?'); params.push(query.topic) }
    const clause = where.length ? `WHERE ${where.join(' AND ')}` : ''
    return this.run(db => db.prepare<Array<string | number>, PostRow>(
      `SELECT ${POST_COLUMNS} FROM blog_posts ${clause} ORDER BY created_at DESC, seq DESC LIMIT ? OFFSET ?`
    ).all(...params, limit, offset).map(rowToPost))
  }

  private async applyApprovalAction(id: string, action: ApprovalAction, change: ApprovalChange): Promise<BlogPost | null> {
    return this.run(db => db.transaction((): BlogPost | null => {
      const post = this.selectPost(db, id)
      if (!post) return null
      const { post: next, history } = applyApproval(post, action, change, this.now())
      if (!this.writePost(db, next, post.approvalStatus)) {
        throw new InvalidTransitionError(post.approvalStatus, next.approvalStatus, `post ${id} changed concurrently`)
      }
      this.insertHistory(db, history)
      return next
    })())
  }

  approvePost(id: string, input: ApprovalInput = {}): Promise<BlogPost | null> {
    return this.applyApprovalAction(id, 'approve', input)
  }

  rejectPost(id: string, input: ApprovalInput): Promise<BlogPost | null> {
    return this.applyApprovalAction(id, 'reject', input)
  }

  requestRevision(id: string, input: ApprovalInput): Promise<BlogPost | null> {
    return this.applyApprovalAction(id, 'request_revision', input)
  }

  resubmitPost(id: string, input: ResubmitInput = {}): Promise<BlogPost | null> {
    return this.applyApprovalAction(id, 'resubmit', input)
  }

  publishPost(id: string, input: PublishInput = {}): Promise<BlogPost | null> {
    return this.applyApprovalAction(id, 'publish', input)
  }

  // ---------- history ----------

  async addHistoryEntry(draft: HistoryDraft): Promise<JobHistoryEntry> {
    return this.run(db => this.insertHistory(db, draft))
  }

  async getJobHistory(jobId: string): Promise<JobHistoryEntry[]> {
    return this.run(db => db.prepare<[string], HistoryRow>('SELECT * FROM job_history WHERE job_id = ? ORDER BY seq ASC').all(jobId).map(rowToHistory))
  }

  async getPostHistory(postId: string): Promise<JobHistoryEntry[]> {
    return this.run(db => db.prepare<[string], HistoryRow>('SELECT * FROM job_history WHERE post_id = ? ORDER BY seq ASC').all(postId).map(rowToHistory))
  }

  async getStats(): Promise<JobStats> {
    return this.run(db => {
      const statuses = db.prepare<[], { status: string }>('SELECT status FROM jobs').all()
        .map(r => r.status)
        .filter(isJobStatus)
      const posts = db.prepare<[], Pick<PostRow, 'approval_status' | 'created_at' | 'approved_at' | 'published_at'>>(
        'SELECT approval_status, created_at, approved_at, published_at FROM blog_posts'
      ).all()
      return computeStats(statuses, posts.flatMap(p => isApprovalStatus(p.approval_status)
        ? [{ approvalStatus: p.approval_status, createdAt: p.created_at, approvedAt: opt(p.approved_at), publishedAt: opt(p.published_at) }]
        : []))
    })
  }

  async healthCheck(): Promise<boolean> {
    if (!this.db) return false
    try {
      this.db.prepare('SELECT 1').get()
      return true
    } catch (e) {
      logger.warn('sqlite_storage_health_failed', { error: errorMessage(e) })
      return false
    }
  }
}
