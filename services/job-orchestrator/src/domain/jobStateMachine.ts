import type {
  ActiveJob, ActiveJobStatus, CompletedJob, FailedJob, HistoryAction, HistoryDraft, Job, JobDraft, JobStage, JobStatus,
  JobTransition, JsonObject, TerminalJobStatus
} from './contracts/index.js'
import { InvalidTransitionError, TerminalStateError } from './errors.js'

// 中文注释：线性推进顺序；failed 可由任意非终态进入
export const JOB_STAGE_ORDER: readonly JobStatus[] = ['pending', 'fetching', 'generating', 'scoring', 'refining', 'completed']
export const PIPELINE_STAGES: readonly JobStage[] = ['fetching', 'generating', 'scoring', 'refining']

export function isTerminal(status: JobStatus): status is TerminalJobStatus {
  return status === 'completed' || status === 'failed'
}

export function isActive(status: JobStatus): status is ActiveJobStatus {
  return !isTerminal(status)
}

export function stageRank(status: JobStatus): number {
  return JOB_STAGE_ORDER.indexOf(status)
}

/**
 * 只允许前进一步（pending→fetching→…→completed）或进入 failed。
 * 终态不在这里处理：调用方持有 jobId，由其抛出 TerminalStateError。
 */
export function canTransition(from: ActiveJobStatus, to: JobStatus): boolean {
  if (to === 'failed') return true
  return stageRank(to) === stageRank(from) + 1
}

export function assertJobTransition(from: ActiveJobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to)
}

// 中文注释：哪些状态变化需要写入历史（中间阶段只更新状态，不写历史）
export function historyActionFor(from: JobStatus, to: JobStatus): HistoryAction | undefined {
  if (to === 'failed') return 'failed'
  if (to === 'completed') return 'completed'
  if (from === 'pending' && to !== 'pending') return 'started'
  return undefined
}

/**
 * 应用一次状态迁移（纯函数），返回新作业。
 * 调用方负责原子写入；`from` 与当前状态不一致视为并发冲突。
 */
export function applyJobTransition(job: Job, t: JobTransition, now: string): Job {
  if (isTerminal(job.status)) throw new TerminalStateError(job.id, job.status)
  if (job.status !== t.from) {
    throw new InvalidTransitionError(t.from, t.to, `job ${job.id} is ${job.status}, expected ${t.from}`)
  }
  assertJobTransition(job.status, t.to)
  const base = {
    id: job.id,
    correlationId: job.correlationId,
    topics: job.topics,
    sources: job.sources,
    numCandidates: job.numCandidates,
    maxResults: job.maxResults,
    createdAt: job.createdAt,
    updatedAt: now,
    startedAt: job.startedAt ?? (t.to === 'fetching' ? now : undefined)
  }
  if (t.to === 'completed') {
    const next: CompletedJob = { ...base, status: 'completed', completedAt: now, result: t.result }
    return next
  }
  if (t.to === 'failed') {
    const next: FailedJob = { ...base, status: 'failed', completedAt: now, error: t.error }
    return next
  }
  const next: ActiveJob = { ...base, status: t.to }
  return next
}

// 中文注释：迁移对应的历史条目（无需记录时返回 undefined）
export function transitionHistory(job: Job, t: JobTransition): HistoryDraft | undefined {
  const action = historyActionFor(t.from, t.to)
  if (!action) return undefined
  const draft: HistoryDraft = { jobId: job.id, action, previousStatus: t.from, newStatus: t.to }
  if (t.to === 'completed') {
    draft.postId = t.result.postId
    draft.metadata = { totalScore: t.result.scoring.total, wordCount: t.result.wordCount }
  } else if (t.to === 'failed') {
    const metadata: JsonObject = { code: t.error.code }
    if (t.error.stage) metadata.stage = t.error.stage
    draft.feedback = t.error.message
    draft.metadata = metadata
  }
  return draft
}

export function buildJob(id: string, draft: JobDraft, now: string): ActiveJob {
  return {
    id,
    correlationId: draft.correlationId,
    topics: [...draft.topics],
    sources: [...draft.sources],
    numCandidates: draft.numCandidates,
    maxResults: draft.maxResults,
    status: 'pending',
    createdAt: now,
    updatedAt: now
  }
}

export function submittedHistory(job: Job): HistoryDraft {
  const metadata: JsonObject = { topics: job.topics, sources: job.sources, numCandidates: job.numCandidates, maxResults: job.maxResults }
  if (job.correlationId) metadata.correlationId = job.correlationId
  return { jobId: job.id, action: 'submitted', newStatus: 'pending', metadata }
}
