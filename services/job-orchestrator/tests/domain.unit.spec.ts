import { describe, it, expect } from 'vitest'
import { buildPost, patchPost } from '../src/domain/posts.js'
import { computeStats, weightedScore } from '../src/domain/stats.js'
import { ValidationError } from '../src/domain/errors.js'
import { DEFAULT_SCORING_WEIGHTS } from '../src/config/defaults.js'
import { countWords, resolvePage } from '../src/utils/paging.js'
import { postDraft } from './support/fixtures.js'

const T0 = '2024-01-01T00:00:00.000Z'

describe('posts', () => {
  it('reports every blank required field', () => {
    try {
      buildPost('p1', postDraft({ title: ' ', topic: '' }), T0)
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ValidationError)
      if (e instanceof ValidationError) {
        expect(e.message).toBe('title is required; topic is required')
        expect(e.issues).toEqual(['title is required', 'topic is required'])
      }
    }
  })

  it('patches content and recomputes the word count', () => {
    const post = buildPost('p1', postDraft(), T0)
    expect(post.wordCount).toBe(4)
    const next = patchPost(post, { content: '  alpha   beta ' }, '2024-01-02T00:00:00.000Z')
    expect(next.wordCount).toBe(2)
    expect(next.updatedAt).toBe('2024-01-02T00:00:00.000Z')
    expect(next.approvalStatus).toBe('pending')
  })
})

describe('stats', () => {
  it('returns null rates when there are no posts', () => {
    const stats = computeStats(['pending', 'failed'], [])
    expect(stats.totalJobs).toBe(2)
    expect(stats.jobsByStatus.failed).toBe(1)
    expect(stats.approvalRate).toBeNull()
    expect(stats.avgApprovalTimeHours).toBeNull()
  })

  it('computes approval rate and mean approval time', () => {
    const stats = computeStats([], [
      { approvalStatus: 'approved', createdAt: T0, approvedAt: '2024-01-01T02:00:00.000Z', publishedAt: '2024-01-01T03:00:00.000Z' },
      { approvalStatus: 'approved', createdAt: T0, approvedAt: '2024-01-01T04:00:00.000Z' },
      { approvalStatus: 'rejected', createdAt: T0 },
      { approvalStatus: 'revision_requested', createdAt: T0 }
    ])
    expect(stats.approvalRate).toBe(50)
    expect(stats.avgApprovalTimeHours).toBe(3)
    expect(stats.publishedPosts).toBe(1)
    expect(stats.revisionRequested).toBe(1)
  })

  it('weights the score dimensions', () => {
    const s = { relevance: 10, originality: 10, depth: 10, clarity: 10, engagement: 10 }
    expect(weightedScore(s, DEFAULT_SCORING_WEIGHTS)).toBeCloseTo(10)
  })
})

describe('paging', () => {
  it('defaults and caps the limit', () => {
    expect(resolvePage({})).toEqual({ limit: 100, offset: 0 })
    expect(resolvePage({ limit: 5000, offset: 3 })).toEqual({ limit: 1000, offset: 3 })
  })

  it('rejects negative and fractional values', () => {
    expect(() => resolvePage({ limit: -1 })).toThrow('limit must be a non-negative integer, got -1')
    expect(() => resolvePage({ offset: 1.5 })).toThrow('offset must be a non-negative integer, got 1.5')
  })

  it('counts words on whitespace', () => {
    expect(countWords('')).toBe(0)
    expect(countWords('a\nb\tc')).toBe(3)
  })
})
