import { describe, it, expect } from 'vitest'
import { assertScoringWeights, loadConfig, validateRuntimeConfig } from '../src/config/config.js'
import { DEFAULT_SCORING_WEIGHTS } from '../src/config/defaults.js'

describe('loadConfig', () => {
  it('falls back to in-memory backends and documented defaults', () => {
    const cfg = loadConfig({})
    expect(cfg.port).toBe(4001)
    expect(cfg.basePath).toBe('/api/v1/job-orchestrator')
    expect(cfg.logLevel).toBe('info')
    expect(cfg.storage).toEqual({ kind: 'memory' })
    expect(cfg.queue).toEqual({ kind: 'memory' })
    expect(cfg.visibilityTimeoutMs).toBe(300_000)
    expect(cfg.queueMaxAttempts).toBe(3)
    expect(cfg.backendTimeoutMs).toBe(10_000)
    expect(cfg.stageTimeoutMs).toBe(600_000)
    expect(cfg.worker).toEqual({ enabled: false, pollIntervalMs: 1000 })
    expect(cfg.pipeline).toEqual({ url: undefined, timeoutMs: 300_000 })
    expect(cfg.defaultSources).toEqual(['hacker_news', 'web', 'youtube'])
    expect(cfg.scoringWeights).toEqual(DEFAULT_SCORING_WEIGHTS)
    expect(cfg.editorRole).toBeUndefined()
    expect(validateRuntimeConfig(cfg)).toEqual([])
  })

  it('parses backend urls', () => {
    const cfg = loadConfig({ STORAGE_URL: 'sqlite:./data/jobs.db', QUEUE_URL: 'redis://localhost:6379', REDIS_KEY_PREFIX: 'blog' })
    expect(cfg.storage).toEqual({ kind: 'sqlite', path: './data/jobs.db' })
    expect(cfg.queue).toEqual({ kind: 'redis', url: 'redis://localhost:6379', keyPrefix: 'blog' })
    expect(loadConfig({ STORAGE_URL: 'file:/var/lib/jobs', QUEUE_URL: 'sqlite:' })).toMatchObject({
      storage: { kind: 'file', dir: '/var/lib/jobs' },
      queue: { kind: 'sqlite', path: ':memory:' }
    })
  })

  it('collects problems instead of throwing', () => {
    const cfg = loadConfig({ STORAGE_URL: 'postgres://db/jobs', PORT: 'abc', LOG_LEVEL: 'loud', SCORING_WEIGHTS: 'not json' })
    expect(cfg.port).toBe(4001)
    expect(validateRuntimeConfig(cfg)).toEqual([
      'LOG_LEVEL must be one of debug, info, warn, error',
      'PORT must be a positive integer, got "abc"',
      'STORAGE_URL has an unsupported scheme: postgres://db/jobs',
      'SCORING_WEIGHTS must be a JSON object'
    ])
  })

  it('parses lists, flags and the pipeline url', () => {
    const cfg = loadConfig({
      DEFAULT_TOPICS: 'ai, security,,',
      WORKER_ENABLED: 'yes',
      PIPELINE_URL: 'http://pipeline:8000/',
      EDITOR_ROLE: ' editor '
    })
    expect(cfg.defaultTopics).toEqual(['ai', 'security'])
    expect(cfg.worker.enabled).toBe(true)
    expect(cfg.pipeline.url).toBe('http://pipeline:8000')
    expect(cfg.editorRole).toBe('editor')
    expect(validateRuntimeConfig(cfg)).toEqual([])
  })

  it('requires a pipeline url when the worker is enabled', () => {
    expect(validateRuntimeConfig(loadConfig({ WORKER_ENABLED: 'true' }))).toEqual(['Missing PIPELINE_URL: required when WORKER_ENABLED is set'])
    expect(validateRuntimeConfig(loadConfig({ PIPELINE_URL: 'ftp://pipeline' }))).toEqual(['PIPELINE_URL must use http:// or https://'])
    expect(validateRuntimeConfig(loadConfig({ BASE_PATH: 'api' }))).toEqual(['BASE_PATH must start with "/"'])
  })

  it('validates scoring weights', () => {
    const cfg = loadConfig({ SCORING_WEIGHTS: '{"relevance":0.5,"engagement":-1}' })
    expect(cfg.scoringWeights.relevance).toBe(0.5)
    expect(cfg.scoringWeights.engagement).toBe(0.1)
    const problems = validateRuntimeConfig(cfg)
    expect(problems[0]).toBe('SCORING_WEIGHTS.engagement must be a non-negative number')
    expect(problems[1]).toMatch(/^scoring weights must sum to 1\.0, got 1\.2/)
    expect(() => assertScoringWeights(DEFAULT_SCORING_WEIGHTS)).not.toThrow()
  })
})
