/*
功能：作业服务（JobService）
用途：幂等提交（按 correlationId 去重）、作业状态机推进、流水线执行与失败归类、状态查询。
参数：
- constructor({ storage, queue, pipeline?, settings })
返回：
- submitJob → SubmitResult；executeJob → ExecutionOutcome；processNext → ProcessResult；getJobStatus → JobStatusResult
示例：
// const svc = new JobService({ storage, queue, pipeline, settings })
// const r = await svc.submitJob({ topics: ['dev tools'], correlationId: 'abc' })
*/
import type {
  ActiveJobStatus, BlogPost, ContentPipeline, Job, JobError, JobHistoryEntry, JobQuery, JobResult, JobStage, JobTransition,
  QueueBackend, ScoredPost, StorageBackend, SubmitResult
} from '../../domain/contracts/index.js'
import {
  BackendUnavailableError, DuplicateJobError, GenerationError, InvalidTransitionError, JobNotCompletedError,
  JobOrchestratorError, NotFoundError, ScoringError, TerminalStateError, ValidationError, errorMessage
} from '../../domain/errors.js'
import { isTerminal, stageRank } from '../../domain/jobStateMachine.js'
import { validateSubmission } from '../../validators/submissionValidator.js'
import { TimeoutError, withTimeout } from '../../utils/timeout.js'
import { callBackend } from './backendCall.js'
import { logger } from '../../infra/log/logger.js'
import { recordJobSubmission, recordJobTransition, recordQueueOutcome } from '../../services/metrics.js'

export type JobServiceSettings = {
  defaultTopics: readonly string[]
  allowedSources: readonly string[]
  backendTimeoutMs: number
  stageTimeoutMs: number
  visibilityTimeoutMs: number
}

export type JobServiceDeps = {
  storage: StorageBackend
  queue: QueueBackend
  pipeline?: ContentPipeline
  settings: JobServiceSettings
}

export type JobStatusResult =
  | { state: 'found'; job: Job }
  | { state: 'not_found' }
  | { state: 'unknown'; reason: string }

export type ExecutionOutcome = 'completed' | 'failed' | 'skipped' | 'superseded'

export type ProcessResult =
  | { state: 'idle' }
  | { state: 'processed'; jobId: string; attempt: number; outcome: ExecutionOutcome }
  | { state: 'errored'; jobId: string; attempt: number; error: string; queueOutcome: 'requeued' | 'dead_lettered' | 'ignored' }

// 中文注释：阶段失败（已归类），由 executeJob 写入 Job.error
class StageFailure extends Error {
  constructor(public readonly jobError: JobError) {
    super(jobError.message)
    this.name = 'StageFailure'
  }
}

function isSuperseded(e: unknown): boolean {
  return e instanceof InvalidTransitionError || e instanceof TerminalStateError
}

function classifyStageError(stage: JobStage, e: unknown, stageTimeoutMs: number): JobError {
  if (e instanceof TimeoutError) {
    return { code: 'STAGE_TIMEOUT', message: `${stage} stage timed out after ${stageTimeoutMs}ms`, stage }
  }
  const detail = e instanceof Error ? e.name : undefined
  const message = errorMessage(e)
  if (e instanceof GenerationError) return { code: 'GENERATION_FAILED', message, detail, stage }
  if (e instanceof ScoringError) return { code: 'SCORING_FAILED', message, detail, stage }
  switch (stage) {
    case 'generating': return { code: 'GENERATION_FAILED', message, detail, stage }
    case 'scoring': return { code: 'SCORING_FAILED', message, detail, stage }
    case 'refining': return { code: 'REFINEMENT_FAILED', message, detail, stage }
    default: return { code: 'PIPELINE_ERROR', message, detail, stage }
  }
}

export class JobService {
  private readonly storage: StorageBackend
  private readonly queue: QueueBackend
  private readonly pipeline?: ContentPipeline
  private readonly settings: JobServiceSettings

  constructor(deps: JobServiceDeps) {
    this.storage = deps.storage
    this.queue = deps.queue
    this.pipeline = deps.pipeline
    this.settings = deps.settings
  }

  private backend<T>(op: string, promise: Promise<T>): Promise<T> {
    return callBackend(op, promise, this.settings.backendTimeoutMs)
  }

  private duplicateResult(job: Job): SubmitResult {
    recordJobSubmission(true)
    logger.info('job_submission_duplicate', { jobId: job.id, correlationId: job.correlationId, status: job.status })
    return {
      jobId: job.id,
      correlationId: job.correlationId,
      status: job.status,
      isDuplicate: true,
      message: `Job with correlation id ${job.correlationId ?? ''} already exists`
    }
  }

  async submitJob(submission: unknown): Promise<SubmitResult> {
    const checked = validateSubmission(submission, { defaultTopics: this.settings.defaultTopics, allowedSources: this.settings.allowedSources })
    if (!checked.valid) throw new ValidationError(checked.errors.join('; '), checked.errors)
    const draft = checked.value

    if (draft.correlationId) {
      const existing = await this.backend('storage.getJobByCorrelationId', this.storage.getJobByCorrelationId(draft.correlationId))
      if (existing && existing.status !== 'failed') return this.duplicateResult(existing)
    }

    let job: Job
    try {
      job = await this.backend('storage.createJob', this.storage.createJob(draft))
    } catch (e) {
      if (e instanceof DuplicateJobError) return this.duplicateResult(e.existing)
      throw e
    }

    try {
      await this.backend('queue.enqueue', this.queue.enqueue({ jobId: job.id }))
    } catch (e) {
      logger.error('job_enqueue_failed', { jobId: job.id, error: errorMessage(e) })
      await this.markEnqueueFailed(job, e)
      throw e instanceof BackendUnavailableError ? e : new BackendUnavailableError('queue.enqueue', errorMessage(e), { cause: e })
    }

    recordJobSubmission(false)
    logger.info('job_submitted', { jobId: job.id, correlationId: job.correlationId, topics: job.topics })
    return {
      jobId: job.id,
      correlationId: job.correlationId,
      status: job.status,
      isDuplicate: false,
      message: 'Job queued for processing'
    }
  }

  private async markEnqueueFailed(job: Job, cause: unknown): Promise<void> {
    try {
      await this.transition(job.id, {
        from: 'pending',
        to: 'failed',
        error: { code: 'ENQUEUE_FAILED', message: `failed to enqueue job: ${errorMessage(cause)}` }
      })
    } catch (e) {
      // 中文注释：无法标记失败时作业保持 pending，同一 correlationId 的重试会被视为重复
      logger.error('job_mark_enqueue_failed_error', { jobId: job.id, error: errorMessage(e) })
    }
  }

  private async transition(jobId: string, t: JobTransition): Promise<Job> {
    const job = await this.backend('storage.transitionJob', this.storage.transitionJob(jobId, t))
    recordJobTransition(t.to)
    logger.info('job_transition', { jobId, from: t.from, to: t.to })
    return job
  }

  async getJobStatus(jobId: string): Promise<JobStatusResult> {
    return this.lookup('storage.getJob', () => this.storage.getJob(jobId), { jobId })
  }

  async getJobByCorrelationId(correlationId: string): Promise<JobStatusResult> {
    return this.lookup('storage.getJobByCorrelationId', () => this.storage.getJobByCorrelationId(correlationId), { correlationId })
  }

  private async lookup(op: string, read: () => Promise<Job | null>, meta: Record<string, string>): Promise<JobStatusResult> {
    try {
      const job = await this.backend(op, read())
      return job ? { state: 'found', job } : { state: 'not_found' }
    } catch (e) {
      if (!(e instanceof BackendUnavailableError)) throw e
      logger.warn('job_status_unknown', { ...meta, error: e.message })
      return { state: 'unknown', reason: e.message }
    }
  }

  async listJobs(query: JobQuery = {}): Promise<Job[]> {
    return this.backend('storage.listJobs', this.storage.listJobs(query))
  }

  async getJobHistory(jobId: string): Promise<JobHistoryEntry[]> {
    const job = await this.backend('storage.getJob', this.storage.getJob(jobId))
    if (!job) throw new NotFoundError('job', jobId)
    return this.backend('storage.getJobHistory', this.storage.getJobHistory(jobId))
  }

  /** 已完成作业的文章预览 */
  async getPreview(jobId: string): Promise<{ job: Job; post: BlogPost }> {
    const job = await this.backend('storage.getJob', this.storage.getJob(jobId))
    if (!job) throw new NotFoundError('job', jobId)
    if (job.status !== 'completed') throw new JobNotCompletedError(job.id, job.status)
    const post = await this.backend('storage.getPost', this.storage.getPost(job.result.postId))
    if (!post) throw new NotFoundError('post', job.result.postId)
    return { job, post }
  }

  // ---------- execution ----------

  private async stage<T>(stage: JobStage, run: () => Promise<T>): Promise<T> {
    const ms = this.settings.stageTimeoutMs
    try {
      return await withTimeout(run(), ms, () => new TimeoutError(ms, stage))
    } catch (e) {
      logger.warn('job_stage_failed', { stage, error: errorMessage(e) })
      throw new StageFailure(classifyStageError(stage, e, ms))
    }
  }

  /**
   * 执行一个作业的完整流水线。
   * 重投的作业只写入尚未到达的状态；终态作业直接跳过；CAS 失败说明已被其他 worker 接管。
   * 阶段错误写入 Job.error，不向外抛出；后端错误向外抛出以便队列重投。
   */
  async executeJob(jobId: string): Promise<ExecutionOutcome> {
    const pipeline = this.pipeline
    if (!pipeline) throw new JobOrchestratorError('no content pipeline configured', 'PIPELINE_ERROR')
    const job = await this.backend('storage.getJob', this.storage.getJob(jobId))
    if (!job) throw new NotFoundError('job', jobId)
    if (isTerminal(job.status)) {
      logger.info('job_already_terminal', { jobId, status: job.status })
      return 'skipped'
    }
    const cursor: { status: ActiveJobStatus } = { status: job.status }

    try {
      const result = await this.runPipeline(job, pipeline, cursor)
      await this.transition(jobId, { from: cursor.status, to: 'completed', result })
      logger.info('job_completed', { jobId, postId: result.postId, total: result.scoring.total })
      return 'completed'
    } catch (e) {
      if (isSuperseded(e)) {
        logger.warn('job_superseded', { jobId, status: cursor.status, error: errorMessage(e) })
        return 'superseded'
      }
      if (!(e instanceof StageFailure)) throw e
      try {
        await this.transition(jobId, { from: cursor.status, to: 'failed', error: e.jobError })
      } catch (inner) {
        if (isSuperseded(inner)) return 'superseded'
        throw inner
      }
      logger.warn('job_failed', { jobId, code: e.jobError.code, stage: e.jobError.stage, error: e.jobError.message })
      return 'failed'
    }
  }

  private async advance(jobId: string, cursor: { status: ActiveJobStatus }, to: JobStage): Promise<void> {
    if (stageRank(cursor.status) >= stageRank(to)) return
    await this.transition(jobId, { from: cursor.status, to })
    cursor.status = to
  }

  private async runPipeline(job: Job, pipeline: ContentPipeline, cursor: { status: ActiveJobStatus }): Promise<JobResult> {
    await this.advance(job.id, cursor, 'fetching')
    const articles = await this.stage('fetching', () => pipeline.fetchAllArticles(job.topics, job.sources, job.maxResults))
    if (!articles.length) {
      throw new StageFailure({ code: 'NO_ARTICLES', message: `no articles found for topics: ${job.topics.join(', ')}`, stage: 'fetching' })
    }

    await this.advance(job.id, cursor, 'generating')
    const candidates = await this.stage('generating', () => pipeline.generateCandidates(articles, job.numCandidates))
    if (!candidates.length) throw new StageFailure({ code: 'GENERATION_FAILED', message: 'no candidate posts were generated', stage: 'generating' })

    await this.advance(job.id, cursor, 'scoring')
    const scored = await this.stage('scoring', () => pipeline.scoreCandidates(candidates))
    const winner = scored[0]
    if (!winner) throw new StageFailure({ code: 'SCORING_FAILED', message: 'no candidates were scored', stage: 'scoring' })

    await this.advance(job.id, cursor, 'refining')
    const content = await this.stage('refining', () => pipeline.refineWinner(winner))
    const post = await this.persistPost(job, winner, content, { articlesFetched: articles.length, candidatesGenerated: candidates.length })

    return {
      postId: post.id,
      title: post.title,
      topic: post.topic,
      wordCount: post.wordCount,
      sources: post.sources,
      scoring: winner.score,
      articlesFetched: articles.length,
      candidatesGenerated: candidates.length
    }
  }

  // 中文注释：重投时复用已存在的文章，保证每个作业至多一篇
  private async persistPost(job: Job, winner: ScoredPost, content: string, counters: { articlesFetched: number; candidatesGenerated: number }): Promise<BlogPost> {
    try {
      const existing = await this.backend('storage.getPostByJobId', this.storage.getPostByJobId(job.id))
      if (existing) return existing
      return await this.backend('storage.createPost', this.storage.createPost({
        title: winner.candidate.title,
        content,
        topic: winner.candidate.topic,
        sources: winner.candidate.sources,
        jobId: job.id,
        scoring: winner.score,
        metadata: { ...counters }
      }))
    } catch (e) {
      throw new StageFailure({ code: 'PERSISTENCE_FAILED', message: `failed to persist post: ${errorMessage(e)}`, detail: e instanceof Error ? e.name : undefined, stage: 'refining' })
    }
  }

  /** 从队列取出一条消息并执行；空队列返回 idle */
  async processNext(): Promise<ProcessResult> {
    const delivery = await this.backend('queue.dequeue', this.queue.dequeue(this.settings.visibilityTimeoutMs))
    await this.settleExpiredDeadLetters()
    if (!delivery) return { state: 'idle' }
    const { jobId, attempt, handle } = delivery
    logger.debug('job_delivery_received', { jobId, attempt, messageId: delivery.messageId })

    let outcome: ExecutionOutcome
    try {
      outcome = await this.executeJob(jobId)
    } catch (e) {
      if (e instanceof NotFoundError) {
        logger.warn('job_delivery_unknown_job', { jobId, messageId: delivery.messageId })
        await this.backend('queue.ack', this.queue.ack(handle))
        recordQueueOutcome('acked')
        return { state: 'processed', jobId, attempt, outcome: 'skipped' }
      }
      const error = errorMessage(e)
      const queueOutcome = await this.backend('queue.fail', this.queue.fail(handle, error))
      recordQueueOutcome(queueOutcome)
      logger.error('job_delivery_failed', { jobId, attempt, error, queueOutcome })
      if (queueOutcome === 'dead_lettered') await this.markDeadLettered(jobId, error)
      return { state: 'errored', jobId, attempt, error, queueOutcome }
    }

    await this.backend('queue.ack', this.queue.ack(handle))
    recordQueueOutcome(outcome === 'superseded' ? 'superseded' : 'acked')
    return { state: 'processed', jobId, attempt, outcome }
  }

  // 中文注释：租约过期进入死信的消息由队列登记；作业标记为失败后才确认，失败则留到下次轮询重试
  private async settleExpiredDeadLetters(): Promise<void> {
    try {
      const notices = await this.backend('queue.expiredDeadLetters', this.queue.expiredDeadLetters())
      for (const notice of notices) {
        logger.warn('job_delivery_expired', { jobId: notice.jobId, messageId: notice.messageId, attempts: notice.attempts })
        if (!(await this.markDeadLettered(notice.jobId, notice.error))) continue
        await this.backend('queue.acknowledgeDeadLetter', this.queue.acknowledgeDeadLetter(notice.messageId))
        recordQueueOutcome('dead_lettered')
      }
    } catch (e) {
      logger.error('job_expired_dead_letters_error', { error: errorMessage(e) })
    }
  }

  // 中文注释：投递次数耗尽时将作业标记为失败，避免停留在中间状态；返回是否已处理完毕
  private async markDeadLettered(jobId: string, reason: string): Promise<boolean> {
    try {
      const job = await this.backend('storage.getJob', this.storage.getJob(jobId))
      if (!job || isTerminal(job.status)) return true
      await this.transition(jobId, {
        from: job.status,
        to: 'failed',
        error: { code: 'PIPELINE_ERROR', message: `delivery attempts exhausted: ${reason}` }
      })
      return true
    } catch (e) {
      logger.error('job_mark_dead_lettered_error', { jobId, error: errorMessage(e) })
      return false
    }
  }
}
