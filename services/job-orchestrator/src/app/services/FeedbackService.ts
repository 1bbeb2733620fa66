/*
功能：审批/反馈服务（FeedbackService）
用途：驱动文章审批状态机（通过、驳回、要求修改、重新提交、发布），记录评分与问题类别，并提供反馈统计与学习数据。
参数：
- constructor({ storage, scoringWeights, backendTimeoutMs })
返回：
- 审批动作返回更新后的 BlogPost；未知文章抛出 NotFoundError，非法迁移抛出 InvalidTransitionError
示例：
// await feedback.rejectPost(postId, { feedback: 'needs more depth', categories: ['quality'] })
*/
import {
  LIMITS,
  type ApprovalInput, type ApproveRequest, type BlogPost, type FeedbackCategory, type FeedbackRating, type FeedbackStats,
  type JobHistoryEntry, type JsonObject, type LearningExample, type PostFeedback, type PostQuery, type PublishInput,
  type RejectRequest, type ResubmitInput, type ScoringWeights, type StorageBackend, type TopicFeedbackStats
} from '../../domain/contracts/index.js'
import { NotFoundError, ValidationError } from '../../domain/errors.js'
import type { ApprovalAction } from '../../domain/approvalStateMachine.js'
import { weightedScore } from '../../domain/stats.js'
import { validateCategories, validateRatings } from '../../validators/feedbackValidator.js'
import { logger } from '../../infra/log/logger.js'
import { recordApprovalAction } from '../../services/metrics.js'
import { callBackend } from './backendCall.js'

export type FeedbackServiceDeps = {
  storage: StorageBackend
  scoringWeights: ScoringWeights
  backendTimeoutMs: number
}

const DECISION_ACTIONS = new Set(['approved', 'rejected', 'revision_requested'])

function round2(n: number): number {
  return Math.round(n * 100) / 100
}

function average(values: number[]): number | null {
  return values.length ? round2(values.reduce((a, b) => a + b, 0) / values.length) : null
}

function ratingsToJson(ratings: FeedbackRating[]): JsonObject[] {
  return ratings.map((r): JsonObject => r.comment === undefined
    ? { category: r.category, score: r.score }
    : { category: r.category, score: r.score, comment: r.comment })
}

// 中文注释：历史中的 metadata 由本服务写入；读取时重新校验，跳过不合规的旧数据
function readRatings(entry: JobHistoryEntry): FeedbackRating[] {
  const r = validateRatings(entry.metadata?.ratings)
  return r.valid ? r.value : []
}

function readCategories(entry: JobHistoryEntry): FeedbackCategory[] {
  const r = validateCategories(entry.metadata?.categories)
  return r.valid ? r.value : []
}

function requireFeedback(feedback: string | undefined, action: string): string {
  if (typeof feedback !== 'string' || feedback.trim() === '') throw new ValidationError(`feedback is required to ${action} a post`)
  return feedback.trim()
}

export class FeedbackService {
  private readonly storage: StorageBackend
  private readonly weights: ScoringWeights
  private readonly timeoutMs: number

  constructor(deps: FeedbackServiceDeps) {
    this.storage = deps.storage
    this.weights = deps.scoringWeights
    this.timeoutMs = deps.backendTimeoutMs
  }

  private backend<T>(op: string, promise: Promise<T>): Promise<T> {
    return callBackend(op, promise, this.timeoutMs)
  }

  private buildMetadata(ratings: unknown, categories: unknown): JsonObject | undefined {
    const r = validateRatings(ratings)
    const c = validateCategories(categories)
    const errors = [...(r.valid ? [] : r.errors), ...(c.valid ? [] : c.errors)]
    if (errors.length) throw new ValidationError(errors.join('; '), errors)
    const metadata: JsonObject = {}
    if (r.valid && r.value.length) metadata.ratings = ratingsToJson(r.value)
    if (c.valid && c.value.length) metadata.categories = c.value
    return Object.keys(metadata).length ? metadata : undefined
  }

  private async decide(action: ApprovalAction, postId: string, op: Promise<BlogPost | null>, actor?: string): Promise<BlogPost> {
    const post = await this.backend(`storage.${action}`, op)
    if (!post) throw new NotFoundError('post', postId)
    recordApprovalAction(action)
    logger.info('post_approval_action', { postId, action, approvalStatus: post.approvalStatus, actor })
    return post
  }

  async approvePost(postId: string, req: ApproveRequest = {}): Promise<BlogPost> {
    const input: ApprovalInput = {
      feedback: req.feedback && req.feedback.trim() ? req.feedback.trim() : undefined,
      actor: req.actor,
      metadata: this.buildMetadata(req.ratings, undefined)
    }
    return this.decide('approve', postId, this.storage.approvePost(postId, input), req.actor)
  }

  async rejectPost(postId: string, req: RejectRequest): Promise<BlogPost> {
    const feedback = requireFeedback(req.feedback, 'reject')
    const metadata = this.buildMetadata(req.ratings, req.categories)
    return this.decide('reject', postId, this.storage.rejectPost(postId, { feedback, actor: req.actor, metadata }), req.actor)
  }

  async requestRevision(postId: string, req: RejectRequest): Promise<BlogPost> {
    const feedback = requireFeedback(req.feedback, 'request revision of')
    const metadata = this.buildMetadata(req.ratings, req.categories)
    return this.decide('request_revision', postId, this.storage.requestRevision(postId, { feedback, actor: req.actor, metadata }), req.actor)
  }

  async resubmitPost(postId: string, input: ResubmitInput = {}): Promise<BlogPost> {
    if (input.title !== undefined && input.title.trim() === '') throw new ValidationError('title must not be empty')
    if (input.content !== undefined && input.content.trim() === '') throw new ValidationError('content must not be empty')
    return this.decide('resubmit', postId, this.storage.resubmitPost(postId, input), input.actor)
  }

  async publishPost(postId: string, input: PublishInput = {}): Promise<BlogPost> {
    return this.decide('publish', postId, this.storage.publishPost(postId, input), input.actor)
  }

  // ---------- reads ----------

  async getPost(postId: string): Promise<BlogPost> {
    const post = await this.backend('storage.getPost', this.storage.getPost(postId))
    if (!post) throw new NotFoundError('post', postId)
    return post
  }

  async listPosts(query: PostQuery = {}): Promise<BlogPost[]> {
    return this.backend('storage.listPosts', this.storage.listPosts(query))
  }

  async getPostHistory(postId: string): Promise<JobHistoryEntry[]> {
    await this.getPost(postId)
    return this.backend('storage.getPostHistory', this.storage.getPostHistory(postId))
  }

  /** 某篇文章的审批决定（按时间先后） */
  async getPostFeedback(postId: string): Promise<PostFeedback[]> {
    const history = await this.getPostHistory(postId)
    return history
      .filter(h => DECISION_ACTIONS.has(h.action))
      .map(h => ({
        postId,
        action: h.action,
        previousStatus: h.previousStatus,
        newStatus: h.newStatus,
        actor: h.actor,
        feedback: h.feedback,
        categories: readCategories(h),
        ratings: readRatings(h),
        createdAt: h.createdAt
      }))
  }

  private async allPosts(): Promise<BlogPost[]> {
    const out: BlogPost[] = []
    for (let offset = 0; ; offset += LIMITS.MAX_LIST_LIMIT) {
      const page = await this.listPosts({ limit: LIMITS.MAX_LIST_LIMIT, offset })
      out.push(...page)
      if (page.length < LIMITS.MAX_LIST_LIMIT) return out
    }
  }

  async getFeedbackStats(): Promise<FeedbackStats> {
    const stats = await this.backend('storage.getStats', this.storage.getStats())
    const posts = await this.allPosts()

    const topics = new Map<string, TopicFeedbackStats>()
    const approvedScores: number[] = []
    const rejectedScores: number[] = []
    const categoryCounts = new Map<FeedbackCategory, number>()
    const ratingsByCategory = new Map<FeedbackCategory, number[]>()

    for (const post of posts) {
      const t = topics.get(post.topic) ?? { topic: post.topic, total: 0, approved: 0, rejected: 0, revisions: 0, approvalRate: null }
      t.total += 1
      if (post.approvalStatus === 'approved') t.approved += 1
      else if (post.approvalStatus === 'rejected') t.rejected += 1
      else if (post.approvalStatus === 'revision_requested') t.revisions += 1
      topics.set(post.topic, t)

      if (post.scoring) {
        const score = weightedScore(post.scoring, this.weights)
        if (post.approvalStatus === 'approved') approvedScores.push(score)
        else if (post.approvalStatus === 'rejected') rejectedScores.push(score)
      }

      const history = await this.backend('storage.getPostHistory', this.storage.getPostHistory(post.id))
      for (const entry of history) {
        if (entry.action === 'rejected' || entry.action === 'revision_requested') {
          for (const c of readCategories(entry)) categoryCounts.set(c, (categoryCounts.get(c) ?? 0) + 1)
        }
        for (const r of readRatings(entry)) {
          const list = ratingsByCategory.get(r.category) ?? []
          list.push(r.score)
          ratingsByCategory.set(r.category, list)
        }
      }
    }

    const avgRatingByCategory: FeedbackStats['avgRatingByCategory'] = {}
    for (const [category, scores] of ratingsByCategory) {
      const avg = average(scores)
      if (avg !== null) avgRatingByCategory[category] = avg
    }

    return {
      totalPosts: stats.totalPosts,
      approvals: stats.approvedPosts,
      rejections: stats.rejectedPosts,
      revisions: stats.revisionRequested,
      approvalRate: stats.approvalRate === null ? null : round2(stats.approvalRate),
      avgApprovalTimeHours: stats.avgApprovalTimeHours === null ? null : round2(stats.avgApprovalTimeHours),
      commonRejectionCategories: [...categoryCounts.entries()]
        .map(([category, count]) => ({ category, count }))
        .sort((a, b) => b.count - a.count || a.category.localeCompare(b.category)),
      avgRatingByCategory,
      byTopic: [...topics.values()]
        .map(t => ({ ...t, approvalRate: t.total ? round2((t.approved / t.total) * 100) : null }))
        .sort((a, b) => a.topic.localeCompare(b.topic)),
      avgScoreApproved: average(approvedScores),
      avgScoreRejected: average(rejectedScores)
    }
  }

  /** 已有最终结论（通过/驳回）的文章，最新在前 */
  async getLearningData(limit = 100): Promise<LearningExample[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > LIMITS.MAX_LIST_LIMIT) {
      throw new ValidationError(`limit must be an integer between 1 and ${LIMITS.MAX_LIST_LIMIT}`)
    }
    const approved = await this.listPosts({ approvalStatus: 'approved', limit })
    const rejected = await this.listPosts({ approvalStatus: 'rejected', limit })
    const decided = [...approved, ...rejected]
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, limit)

    const out: LearningExample[] = []
    for (const post of decided) {
      const history = await this.backend('storage.getPostHistory', this.storage.getPostHistory(post.id))
      const decision = [...history].reverse().find(h => h.action === 'approved' || h.action === 'rejected')
      out.push({
        postId: post.id,
        title: post.title,
        topic: post.topic,
        wordCount: post.wordCount,
        outcome: post.approvalStatus === 'approved' ? 'approved' : 'rejected',
        scoring: post.scoring,
        weightedScore: post.scoring ? round2(weightedScore(post.scoring, this.weights)) : null,
        feedback: post.approvalFeedback,
        categories: decision ? readCategories(decision) : [],
        decidedAt: post.approvedAt ?? decision?.createdAt
      })
    }
    return out
  }
}
