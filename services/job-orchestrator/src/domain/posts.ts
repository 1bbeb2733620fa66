import type { BlogPost, PostDraft, PostPatch } from './contracts/index.js'
import { ValidationError } from './errors.js'
import { countWords } from '../utils/paging.js'

function isBlank(v: unknown): boolean {
  return typeof v !== 'string' || v.trim() === ''
}

export function buildPost(id: string, draft: PostDraft, now: string): BlogPost {
  const issues: string[] = []
  if (isBlank(draft.title)) issues.push('title is required')
  if (isBlank(draft.content)) issues.push('content is required')
  if (isBlank(draft.topic)) issues.push('topic is required')
  if (issues.length) throw new ValidationError(issues.join('; '), issues)
  return {
    id,
    title: draft.title,
    content: draft.content,
    wordCount: countWords(draft.content),
    topic: draft.topic,
    sources: [...(draft.sources ?? [])],
    jobId: draft.jobId,
    approvalStatus: 'pending',
    scoring: draft.scoring,
    metadata: draft.metadata,
    createdAt: now,
    updatedAt: now
  }
}

// 中文注释：合并可编辑字段；审批相关字段只能通过审批动作修改
export function patchPost(post: BlogPost, patch: PostPatch, now: string): BlogPost {
  if (patch.title !== undefined && isBlank(patch.title)) throw new ValidationError('title must not be empty')
  if (patch.content !== undefined && isBlank(patch.content)) throw new ValidationError('content must not be empty')
  if (patch.topic !== undefined && isBlank(patch.topic)) throw new ValidationError('topic must not be empty')
  const next: BlogPost = { ...post, updatedAt: now }
  if (patch.title !== undefined) next.title = patch.title
  if (patch.content !== undefined) {
    next.content = patch.content
    next.wordCount = countWords(patch.content)
  }
  if (patch.topic !== undefined) next.topic = patch.topic
  if (patch.sources !== undefined) next.sources = [...patch.sources]
  if (patch.metadata !== undefined) next.metadata = patch.metadata
  return next
}

export function duplicatePostForJob(jobId: string): ValidationError {
  return new ValidationError(`a post already exists for job ${jobId}`)
}
