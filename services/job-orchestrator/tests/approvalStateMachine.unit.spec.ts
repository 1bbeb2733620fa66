import { describe, it, expect } from 'vitest'
import { applyApproval, canApply } from '../src/domain/approvalStateMachine.js'
import { buildPost } from '../src/domain/posts.js'
import { InvalidTransitionError } from '../src/domain/errors.js'
import { postDraft } from './support/fixtures.js'

const T0 = '2024-01-01T00:00:00.000Z'
const T1 = '2024-01-01T02:00:00.000Z'

describe('approval state machine', () => {
  const pending = buildPost('p1', postDraft(), T0)

  it('approves a pending post and stamps approvedAt', () => {
    const { post, history } = applyApproval(pending, 'approve', { feedback: 'great', actor: 'ed' }, T1)
    expect(post.approvalStatus).toBe('approved')
    expect(post.approvedAt).toBe(T1)
    expect(post.approvalFeedback).toBe('great')
    expect(history).toEqual({
      jobId: undefined,
      postId: 'p1',
      action: 'approved',
      previousStatus: 'pending',
      newStatus: 'approved',
      actor: 'ed',
      feedback: 'great',
      metadata: undefined
    })
  })

  it('allows approve and reject after a revision request', () => {
    const { post: revision } = applyApproval(pending, 'request_revision', { feedback: 'tighten intro' }, T1)
    expect(revision.approvalStatus).toBe('revision_requested')
    expect(canApply('approve', revision)).toBe(true)
    expect(canApply('reject', revision)).toBe(true)
    expect(canApply('request_revision', revision)).toBe(false)
  })

  it('resubmits edited content back to pending and recounts words', () => {
    const { post: revision } = applyApproval(pending, 'request_revision', { feedback: 'shorter' }, T1)
    const { post, history } = applyApproval(revision, 'resubmit', { content: 'just three words' }, T1)
    expect(post.approvalStatus).toBe('pending')
    expect(post.content).toBe('just three words')
    expect(post.wordCount).toBe(3)
    expect(history.action).toBe('submitted')
    expect(history.previousStatus).toBe('revision_requested')
    expect(history.newStatus).toBe('pending')
  })

  it('publishes only approved posts, once', () => {
    expect(() => applyApproval(pending, 'publish', {}, T1)).toThrow('post p1 cannot publish from pending')
    const { post: approved } = applyApproval(pending, 'approve', {}, T1)
    const { post: published, history } = applyApproval(approved, 'publish', { actor: 'ed' }, T1)
    expect(published.approvalStatus).toBe('approved')
    expect(published.publishedAt).toBe(T1)
    expect(history.newStatus).toBe('published')
    expect(() => applyApproval(published, 'publish', {}, T1)).toThrow(InvalidTransitionError)
  })

  it('keeps rejected posts terminal', () => {
    const { post: rejected } = applyApproval(pending, 'reject', { feedback: 'off topic' }, T1)
    for (const action of ['approve', 'reject', 'request_revision', 'resubmit', 'publish'] as const) {
      expect(canApply(action, rejected)).toBe(false)
    }
    expect(() => applyApproval(rejected, 'approve', {}, T1)).toThrow('post p1 cannot approve from rejected')
  })
})
