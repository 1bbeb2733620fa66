/*
功能：存储后端（内存实现）
用途：测试与单进程开发环境的参考实现；FileStorage 在其基础上增加落盘。
参数：
- constructor({ clock?, newId? })
返回：
- 实现 StorageBackend 的全部方法，所有返回值均为副本
示例：
// const storage = new MemoryStorage(); await storage.initialize(); await storage.createJob(draft)
*/
import type {
  ApprovalInput, BlogPost, HistoryDraft, Job, JobDraft, JobHistoryEntry, JobQuery, JobStats, JobTransition,
  PostDraft, PostPatch, PostQuery, PublishInput, ResubmitInput, StorageBackend, StorageKind
} from '../../domain/contracts/index.js'
import { DuplicateJobError, NotFoundError } from '../../domain/errors.js'
import { applyJobTransition, buildJob, submittedHistory, transitionHistory } from '../../domain/jobStateMachine.js'
import { applyApproval, type ApprovalAction, type ApprovalChange } from '../../domain/approvalStateMachine.js'
import { buildPost, duplicatePostForJob, patchPost } from '../../domain/posts.js'
import { computeStats } from '../../domain/stats.js'
import { resolvePage } from '../../utils/paging.js'
import { isoNow, systemClock, type Clock } from '../../utils/clock.js'
import { newId as defaultNewId, type IdGenerator } from '../../utils/ids.js'

export type MemoryStorageOptions = { clock?: Clock; newId?: IdGenerator }

export type StorageSnapshot = { version: number; jobs: Job[]; posts: BlogPost[]; history: JobHistoryEntry[] }

export type StorageState = { jobs: Map<string, Job>; posts: Map<string, BlogPost>; history: JobHistoryEntry[] }

function clone<T>(v: T): T {
  return structuredClone(v)
}

// 中文注释：浅拷贝即可，领域函数总是返回新对象而不修改旧对象
function fork(state: StorageState): StorageState {
  return { jobs: new Map(state.jobs), posts: new Map(state.posts), history: [...state.history] }
}

// 中文注释：createdAt 降序，同一时间戳按插入顺序（后插入者在前）
function newestFirst<T extends { createdAt: string }>(items: Map<string, T>): T[] {
  return [...items.values()]
    .map((item, seq) => ({ item, seq }))
    .sort((a, b) => b.item.createdAt.localeCompare(a.item.createdAt) || b.seq - a.seq)
    .map(x => x.item)
}

function findPostByJob(state: StorageState, jobId: string): BlogPost | undefined {
  for (const post of state.posts.values()) if (post.jobId === jobId) return post
  return undefined
}

export class MemoryStorage implements StorageBackend {
  readonly kind: StorageKind = 'memory'
  protected state: StorageState = { jobs: new Map(), posts: new Map(), history: [] }
  protected readonly now: () => string
  protected readonly newId: IdGenerator
  private commits: Promise<void> = Promise.resolve()

  constructor(opts: MemoryStorageOptions = {}) {
    const clock = opts.clock ?? systemClock
    this.now = () => isoNow(clock)
    this.newId = opts.newId ?? defaultNewId
  }

  async initialize(): Promise<void> {}

  async close(): Promise<void> {
    await this.commits
  }

  // 中文注释：子类在提交前将草稿状态落盘；失败时草稿被丢弃，内存状态保持不变
  protected async persist(_draft: StorageState): Promise<void> {}

  /**
   * 串行提交一次变更：在草稿上执行 mutate，persist 成功后才替换当前状态。
   * mutate 抛错（校验、非法迁移）或 persist 失败时不产生任何可见变化。
   */
  protected commit<T>(mutate: (draft: StorageState) => T): Promise<T> {
    const run = this.commits.then(async () => {
      const draft = fork(this.state)
      const result = mutate(draft)
      await this.persist(draft)
      this.state = draft
      return result
    })
    // 中文注释：错误已通过 run 交给本次调用方，提交链只负责排序
    this.commits = run.then(() => undefined, () => undefined)
    return run
  }

  protected snapshot(state: StorageState): StorageSnapshot {
    return { version: 1, jobs: [...state.jobs.values()], posts: [...state.posts.values()], history: state.history }
  }

  protected restore(snapshot: StorageSnapshot): void {
    this.state = {
      jobs: new Map(snapshot.jobs.map(j => [j.id, j])),
      posts: new Map(snapshot.posts.map(p => [p.id, p])),
      history: [...snapshot.history]
    }
  }

  private appendHistory(draft: StorageState, entryDraft: HistoryDraft): JobHistoryEntry {
    const entry: JobHistoryEntry = { ...clone(entryDraft), id: this.newId(), createdAt: this.now() }
    draft.history.push(entry)
    return entry
  }

  private liveJobFor(state: StorageState, correlationId: string): Job | undefined {
    let found: Job | undefined
    for (const job of state.jobs.values()) {
      if (job.correlationId === correlationId && job.status !== 'failed') found = job
    }
    return found
  }

  // ---------- jobs ----------

  async createJob(draft: JobDraft): Promise<Job> {
    const job = await this.commit(state => {
      if (draft.correlationId) {
        const live = this.liveJobFor(state, draft.correlationId)
        if (live) throw new DuplicateJobError(clone(live))
      }
      const created = buildJob(this.newId(), draft, this.now())
      state.jobs.set(created.id, created)
      this.appendHistory(state, submittedHistory(created))
      return created
    })
    return clone(job)
  }

  async getJob(id: string): Promise<Job | null> {
    const job = this.state.jobs.get(id)
    return job ? clone(job) : null
  }

  async getJobByCorrelationId(correlationId: string): Promise<Job | null> {
    let latest: Job | undefined
    for (const job of this.state.jobs.values()) {
      if (job.correlationId === correlationId) latest = job
    }
    return latest ? clone(latest) : null
  }

  async transitionJob(id: string, transition: JobTransition): Promise<Job> {
    const next = await this.commit(state => {
      const job = state.jobs.get(id)
      if (!job) throw new NotFoundError('job', id)
      const updated = applyJobTransition(job, transition, this.now())
      state.jobs.set(id, updated)
      const entry = transitionHistory(updated, transition)
      if (entry) this.appendHistory(state, entry)
      return updated
    })
    return clone(next)
  }

  async listJobs(query: JobQuery = {}): Promise<Job[]> {
    const { limit, offset } = resolvePage(query)
    if (limit === 0) return []
    return newestFirst(this.state.jobs)
      .filter(j => !query.status || j.status === query.status)
      .slice(offset, offset + limit)
      .map(clone)
  }

  // ---------- posts ----------

  async createPost(draft: PostDraft): Promise<BlogPost> {
    const post = await this.commit(state => {
      const created = buildPost(this.newId(), draft, this.now())
      if (draft.jobId && findPostByJob(state, draft.jobId)) throw duplicatePostForJob(draft.jobId)
      state.posts.set(created.id, created)
      return created
    })
    return clone(post)
  }

  async getPost(id: string): Promise<BlogPost | null> {
    const post = this.state.posts.get(id)
    return post ? clone(post) : null
  }

  async getPostByJobId(jobId: string): Promise<BlogPost | null> {
    const post = findPostByJob(this.state, jobId)
    return post ? clone(post) : null
  }

  async updatePost(id: string, patch: PostPatch): Promise<BlogPost | null> {
    const next = await this.commit(state => {
      const post = state.posts.get(id)
      if (!post) return null
      const updated = patchPost(post, patch, this.now())
      state.posts.set(id, updated)
      return updated
    })
    return next ? clone(next) : null
  }

  async listPosts(query: PostQuery = {}): Promise<BlogPost[]> {
    const { limit, offset } = resolvePage(query)
    if (limit === 0) return []
    return newestFirst(this.state.posts)
      .filter(p => (!query.approvalStatus || p.approvalStatus === query.approvalStatus) && (!query.topic || p.topic === query.topic))
      .slice(offset, offset + limit)
      .map(clone)
  }

  private async applyApprovalAction(id: string, action: ApprovalAction, change: ApprovalChange): Promise<BlogPost | null> {
    const next = await this.commit(state => {
      const post = state.posts.get(id)
      if (!post) return null
      const applied = applyApproval(post, action, change, this.now())
      state.posts.set(id, applied.post)
      this.appendHistory(state, applied.history)
      return applied.post
    })
    return next ? clone(next) : null
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
    const entry = await this.commit(state => this.appendHistory(state, draft))
    return clone(entry)
  }

  async getJobHistory(jobId: string): Promise<JobHistoryEntry[]> {
    return this.state.history.filter(h => h.jobId === jobId).map(clone)
  }

  async getPostHistory(postId: string): Promise<JobHistoryEntry[]> {
    return this.state.history.filter(h => h.postId === postId).map(clone)
  }

  async getStats(): Promise<JobStats> {
    return computeStats([...this.state.jobs.values()].map(j => j.status), this.state.posts.values())
  }

  async healthCheck(): Promise<boolean> {
    return true
  }
}
