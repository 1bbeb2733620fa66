import type { ApprovalStatus, BlogPost, HistoryAction, HistoryDraft, JsonObject } from './contracts/index.js'
import { InvalidTransitionError } from './errors.js'
import { countWords } from '../utils/paging.js'

export type ApprovalAction = 'approve' | 'reject' | 'request_revision' | 'resubmit' | 'publish'

type Rule = { from: readonly ApprovalStatus[]; to: ApprovalStatus; history: HistoryAction }

// 中文注释：审批状态机；publish 不改变 approvalStatus，只写入 publishedAt
export const APPROVAL_RULES: Record<ApprovalAction, Rule> = {
  approve: { from: ['pending', 'revision_requested'], to: 'approved', history: 'approved' },
  reject: { from: ['pending', 'revision_requested'], to: 'rejected', history: 'rejected' },
  request_revision: { from: ['pending'], to: 'revision_requested', history: 'revision_requested' },
  resubmit: { from: ['revision_requested'], to: 'pending', history: 'submitted' },
  publish: { from: ['approved'], to: 'approved', history: 'published' }
}

export function canApply(action: ApprovalAction, post: Pick<BlogPost, 'approvalStatus' | 'publishedAt'>): boolean {
  if (action === 'publish' && post.publishedAt) return false
  return APPROVAL_RULES[action].from.includes(post.approvalStatus)
}

/** 校验通过时返回目标规则，否则抛出 InvalidTransitionError */
export function assertApprovalTransition(action: ApprovalAction, post: Pick<BlogPost, 'id' | 'approvalStatus' | 'publishedAt'>): Rule {
  const rule = APPROVAL_RULES[action]
  if (!canApply(action, post)) {
    const target = action === 'publish' ? 'published' : rule.to
    const current = post.publishedAt ? 'published' : post.approvalStatus
    throw new InvalidTransitionError(current, target, `post ${post.id} cannot ${action.replace('_', ' ')} from ${current}`)
  }
  return rule
}

export type ApprovalChange = {
  feedback?: string
  actor?: string
  metadata?: JsonObject
  // 中文注释：仅 resubmit 使用
  title?: string
  content?: string
}

/** 应用审批动作（纯函数）：返回新文章与对应的一条历史记录 */
export function applyApproval(post: BlogPost, action: ApprovalAction, change: ApprovalChange, now: string): { post: BlogPost; history: HistoryDraft } {
  const rule = assertApprovalTransition(action, post)
  const next: BlogPost = { ...post, updatedAt: now }
  switch (action) {
    case 'approve':
      next.approvalStatus = 'approved'
      next.approvedAt = now
      next.approvalFeedback = change.feedback
      break
    case 'reject':
    case 'request_revision':
      next.approvalStatus = rule.to
      next.approvalFeedback = change.feedback
      break
    case 'resubmit':
      next.approvalStatus = 'pending'
      if (change.title !== undefined) next.title = change.title
      if (change.content !== undefined) {
        next.content = change.content
        next.wordCount = countWords(change.content)
      }
      break
    case 'publish':
      next.publishedAt = now
      break
  }
  const history: HistoryDraft = {
    jobId: post.jobId,
    postId: post.id,
    action: rule.history,
    previousStatus: post.approvalStatus,
    newStatus: action === 'publish' ? 'published' : next.approvalStatus,
    actor: change.actor,
    feedback: change.feedback,
    metadata: change.metadata
  }
  return { post: next, history }
}
