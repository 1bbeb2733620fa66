import type { JobDraft, PostDraft, QueueBackend, StorageBackend } from '../../src/domain/contracts/index.js'
import { MemoryStorage } from '../../src/infra/storage/MemoryStorage.js'
import { MemoryQueue } from '../../src/infra/queue/MemoryQueue.js'
import { JobService, type JobServiceSettings } from '../../src/app/services/JobService.js'
import { FeedbackService } from '../../src/app/services/FeedbackService.js'
import { DEFAULT_SCORING_WEIGHTS, DEFAULT_SOURCES } from '../../src/config/defaults.js'
import { manualClock } from '../../src/utils/clock.js'
import { FakePipeline, score } from './fakePipeline.js'

export function jobDraft(overrides: Partial<JobDraft> = {}): JobDraft {
  return { topics: ['dev tools'], sources: ['web'], numCandidates: 3, maxResults: 10, ...overrides }
}

export function postDraft(overrides: Partial<PostDraft> = {}): PostDraft {
  return { title: 'Shipping faster', content: 'one two three four', topic: 'dev tools', sources: ['https://example.test/1'], ...overrides }
}

// 中文注释：确定性 ID（前缀 + 自增序号）
export function sequentialIds(prefix = 'id') {
  let n = 0
  return () => `${prefix}-${++n}`
}

export const testSettings: JobServiceSettings = {
  defaultTopics: ['dev tools', 'cybersecurity'],
  allowedSources: DEFAULT_SOURCES,
  backendTimeoutMs: 1000,
  stageTimeoutMs: 1000,
  visibilityTimeoutMs: 30_000
}

export function buildServices(opts: { storage?: StorageBackend; queue?: QueueBackend; pipeline?: FakePipeline; settings?: Partial<JobServiceSettings> } = {}) {
  const time = manualClock()
  const storage = opts.storage ?? new MemoryStorage({ clock: time.clock, newId: sequentialIds('s') })
  const queue = opts.queue ?? new MemoryQueue({ clock: time.clock, newId: sequentialIds('q') })
  const pipeline = opts.pipeline ?? new FakePipeline()
  const jobs = new JobService({ storage, queue, pipeline, settings: { ...testSettings, ...opts.settings } })
  const feedback = new FeedbackService({ storage, scoringWeights: DEFAULT_SCORING_WEIGHTS, backendTimeoutMs: 1000 })
  return { time, storage, queue, pipeline, jobs, feedback }
}

export const sampleScoring = score(80)
