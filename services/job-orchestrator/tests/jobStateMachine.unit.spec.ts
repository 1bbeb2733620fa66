import { describe, it, expect } from 'vitest'
import { applyJobTransition, buildJob, canTransition, historyActionFor, transitionHistory } from '../src/domain/jobStateMachine.js'
import { InvalidTransitionError, TerminalStateError } from '../src/domain/errors.js'
import type { Job, JobResult } from '../src/domain/contracts/index.js'
import { jobDraft, sampleScoring } from './support/fixtures.js'

const T0 = '2024-01-01T00:00:00.000Z'
const T1 = '2024-01-01T00:05:00.000Z'

const result: JobResult = {
  postId: 'post-1',
  title: 'Title',
  topic: 'dev tools',
  wordCount: 120,
  sources: [],
  scoring: sampleScoring,
  articlesFetched: 4,
  candidatesGenerated: 3
}

function advance(job: Job, ...steps: Array<'fetching' | 'generating' | 'scoring' | 'refining'>): Job {
  let current = job
  for (const to of steps) {
    if (current.status === 'completed' || current.status === 'failed') throw new Error('terminal')
    current = applyJobTransition(current, { from: current.status, to }, T1)
  }
  return current
}

describe('job state machine', () => {
  it('allows only the next forward stage or failed', () => {
    expect(canTransition('pending', 'fetching')).toBe(true)
    expect(canTransition('pending', 'generating')).toBe(false)
    expect(canTransition('refining', 'completed')).toBe(true)
    expect(canTransition('scoring', 'fetching')).toBe(false)
    expect(canTransition('fetching', 'fetching')).toBe(false)
    expect(canTransition('generating', 'failed')).toBe(true)
    expect(canTransition('pending', 'failed')).toBe(true)
  })

  it('sets startedAt on the first move out of pending', () => {
    const job = buildJob('j1', jobDraft(), T0)
    const next = applyJobTransition(job, { from: 'pending', to: 'fetching' }, T1)
    expect(next.status).toBe('fetching')
    expect(next.startedAt).toBe(T1)
    expect(next.updatedAt).toBe(T1)
    expect(next.createdAt).toBe(T0)
  })

  it('completes with a result and no error', () => {
    const job = advance(buildJob('j1', jobDraft(), T0), 'fetching', 'generating', 'scoring', 'refining')
    const done = applyJobTransition(job, { from: 'refining', to: 'completed', result }, T1)
    expect(done.status).toBe('completed')
    expect(done.result).toEqual(result)
    expect(done.error).toBeUndefined()
    expect(done.completedAt).toBe(T1)
  })

  it('fails with an error and no result from any active state', () => {
    const job = advance(buildJob('j1', jobDraft(), T0), 'fetching', 'generating')
    const failed = applyJobTransition(job, { from: 'generating', to: 'failed', error: { code: 'GENERATION_FAILED', message: 'boom' } }, T1)
    expect(failed.status).toBe('failed')
    expect(failed.error).toEqual({ code: 'GENERATION_FAILED', message: 'boom' })
    expect(failed.result).toBeUndefined()
  })

  it('rejects skipping a stage', () => {
    const job = buildJob('j1', jobDraft(), T0)
    expect(() => applyJobTransition(job, { from: 'pending', to: 'scoring' }, T1)).toThrow(InvalidTransitionError)
  })

  it('treats a stale expected status as an invalid transition', () => {
    const job = advance(buildJob('j1', jobDraft(), T0), 'fetching')
    expect(() => applyJobTransition(job, { from: 'pending', to: 'fetching' }, T1)).toThrow('job j1 is fetching, expected pending')
  })

  it('refuses any transition out of a terminal state', () => {
    const job = buildJob('j1', jobDraft(), T0)
    const failed = applyJobTransition(job, { from: 'pending', to: 'failed', error: { code: 'PIPELINE_ERROR', message: 'x' } }, T1)
    expect(() => applyJobTransition(failed, { from: 'pending', to: 'fetching' }, T1)).toThrow(TerminalStateError)
    expect(() => applyJobTransition(failed, { from: 'pending', to: 'fetching' }, T1)).toThrow('job j1 is already failed')
  })

  it('records history only for start and terminal transitions', () => {
    expect(historyActionFor('pending', 'fetching')).toBe('started')
    expect(historyActionFor('fetching', 'generating')).toBeUndefined()
    expect(historyActionFor('refining', 'completed')).toBe('completed')
    expect(historyActionFor('scoring', 'failed')).toBe('failed')
  })

  it('builds failure history with the error code and stage', () => {
    const job = buildJob('j1', jobDraft(), T0)
    const t = { from: 'pending', to: 'failed', error: { code: 'NO_ARTICLES', message: 'none', stage: 'fetching' } } as const
    const failed = applyJobTransition(job, t, T1)
    expect(transitionHistory(failed, t)).toEqual({
      jobId: 'j1',
      action: 'failed',
      previousStatus: 'pending',
      newStatus: 'failed',
      feedback: 'none',
      metadata: { code: 'NO_ARTICLES', stage: 'fetching' }
    })
  })
})
