/*
功能：配置加载（loadConfig）
用途：集中读取环境变量/默认值，解析存储与队列后端为封闭联合类型，供工厂函数构造实例。
参数：
- env：环境变量表（默认 process.env；测试可传入对象）
返回：
- ServiceConfig 含端口、基础路径、后端选择、超时、worker 与流水线等字段
示例：
// const cfg = loadConfig({ STORAGE_URL: 'sqlite:./data/jobs.db' }); console.log(cfg.storage.kind)
*/
import type { ScoringWeights } from '../domain/contracts/index.js'
import type { LogLevel } from '../infra/log/logger.js'
import { DEFAULT_SCORING_WEIGHTS, DEFAULT_SOURCES, DEFAULT_TOPICS } from './defaults.js'

export type StorageConfig =
  | { kind: 'memory' }
  | { kind: 'file'; dir: string }
  | { kind: 'sqlite'; path: string }

export type QueueConfig =
  | { kind: 'memory' }
  | { kind: 'sqlite'; path: string }
  | { kind: 'redis'; url: string; keyPrefix: string }

export type ServiceConfig = {
  port: number
  basePath: string
  logLevel: LogLevel
  storage: StorageConfig
  queue: QueueConfig
  visibilityTimeoutMs: number
  queueMaxAttempts: number
  backendTimeoutMs: number
  stageTimeoutMs: number
  worker: { enabled: boolean; pollIntervalMs: number }
  pipeline: { url?: string; timeoutMs: number }
  defaultTopics: string[]
  defaultSources: string[]
  scoringWeights: ScoringWeights
  editorRole?: string
  // 中文注释：解析阶段收集的问题，由 validateRuntimeConfig 一并报告
  problems: string[]
}

type Env = Record<string, string | undefined>

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']
const WEIGHT_KEYS: readonly (keyof ScoringWeights)[] = ['relevance', 'originality', 'depth', 'clarity', 'engagement']

function parsePositiveInt(raw: string | undefined, fallback: number, name: string, problems: string[]): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n <= 0) {
    problems.push(`${name} must be a positive integer, got "${raw}"`)
    return fallback
  }
  return n
}

function parseList(raw: string | undefined, fallback: readonly string[]): string[] {
  if (!raw || raw.trim() === '') return [...fallback]
  const items = raw.split(',').map(s => s.trim()).filter(Boolean)
  return items.length ? items : [...fallback]
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase())
}

function isLogLevel(v: string): v is LogLevel {
  return LOG_LEVELS.some(l => l === v)
}

export function parseStorageUrl(raw: string | undefined, problems: string[]): StorageConfig {
  const v = (raw ?? '').trim()
  if (!v || v === 'memory:' || v === 'memory') return { kind: 'memory' }
  if (v.startsWith('sqlite:')) return { kind: 'sqlite', path: v.slice('sqlite:'.length) || ':memory:' }
  if (v.startsWith('file:')) {
    const dir = v.slice('file:'.length)
    if (!dir) problems.push('STORAGE_URL file: requires a directory')
    return { kind: 'file', dir: dir || './data' }
  }
  problems.push(`STORAGE_URL has an unsupported scheme: ${v}`)
  return { kind: 'memory' }
}

export function parseQueueUrl(raw: string | undefined, keyPrefix: string, problems: string[]): QueueConfig {
  const v = (raw ?? '').trim()
  if (!v || v === 'memory:' || v === 'memory') return { kind: 'memory' }
  if (v.startsWith('sqlite:')) return { kind: 'sqlite', path: v.slice('sqlite:'.length) || ':memory:' }
  if (v.startsWith('redis://') || v.startsWith('rediss://')) {
    try {
      new URL(v)
    } catch {
      problems.push('QUEUE_URL is not a valid URL (expected redis://host:port)')
    }
    return { kind: 'redis', url: v, keyPrefix }
  }
  problems.push(`QUEUE_URL has an unsupported scheme: ${v}`)
  return { kind: 'memory' }
}

export function parseScoringWeights(raw: string | undefined, problems: string[]): ScoringWeights {
  if (!raw || raw.trim() === '') return { ...DEFAULT_SCORING_WEIGHTS }
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    problems.push('SCORING_WEIGHTS must be a JSON object')
    return { ...DEFAULT_SCORING_WEIGHTS }
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    problems.push('SCORING_WEIGHTS must be a JSON object')
    return { ...DEFAULT_SCORING_WEIGHTS }
  }
  const weights: ScoringWeights = { ...DEFAULT_SCORING_WEIGHTS }
  for (const key of WEIGHT_KEYS) {
    const v: unknown = Reflect.get(parsed, key)
    if (v === undefined) continue
    if (typeof v !== 'number' || !Number.isFinite(v) || v < 0) {
      problems.push(`SCORING_WEIGHTS.${key} must be a non-negative number`)
      continue
    }
    weights[key] = v
  }
  return weights
}

/** 权重之和必须为 1（容差 1e-6） */
export function assertScoringWeights(weights: ScoringWeights): void {
  const sum = WEIGHT_KEYS.reduce((acc, k) => acc + weights[k], 0)
  if (Math.abs(sum - 1) > 1e-6) throw new Error(`scoring weights must sum to 1.0, got ${sum}`)
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  const problems: string[] = []
  const level = String(env.LOG_LEVEL || 'info').toLowerCase()
  if (!isLogLevel(level)) problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`)
  const keyPrefix = String(env.REDIS_KEY_PREFIX || 'jobs')
  const cfg: ServiceConfig = {
    port: parsePositiveInt(env.PORT, 4001, 'PORT', problems),
    basePath: String(env.BASE_PATH || '/api/v1/job-orchestrator'),
    logLevel: isLogLevel(level) ? level : 'info',
    storage: parseStorageUrl(env.STORAGE_URL, problems),
    queue: parseQueueUrl(env.QUEUE_URL, keyPrefix, problems),
    visibilityTimeoutMs: parsePositiveInt(env.VISIBILITY_TIMEOUT_MS, 300_000, 'VISIBILITY_TIMEOUT_MS', problems),
    queueMaxAttempts: parsePositiveInt(env.QUEUE_MAX_ATTEMPTS, 3, 'QUEUE_MAX_ATTEMPTS', problems),
    backendTimeoutMs: parsePositiveInt(env.BACKEND_TIMEOUT_MS, 10_000, 'BACKEND_TIMEOUT_MS', problems),
    stageTimeoutMs: parsePositiveInt(env.STAGE_TIMEOUT_MS, 600_000, 'STAGE_TIMEOUT_MS', problems),
    worker: {
      enabled: parseBool(env.WORKER_ENABLED, false),
      pollIntervalMs: parsePositiveInt(env.WORKER_POLL_INTERVAL_MS, 1000, 'WORKER_POLL_INTERVAL_MS', problems)
    },
    pipeline: {
      url: env.PIPELINE_URL && env.PIPELINE_URL.trim() ? env.PIPELINE_URL.trim().replace(/\/+$/, '') : undefined,
      timeoutMs: parsePositiveInt(env.PIPELINE_TIMEOUT_MS, 300_000, 'PIPELINE_TIMEOUT_MS', problems)
    },
    defaultTopics: parseList(env.DEFAULT_TOPICS, DEFAULT_TOPICS),
    defaultSources: parseList(env.DEFAULT_SOURCES, DEFAULT_SOURCES),
    scoringWeights: parseScoringWeights(env.SCORING_WEIGHTS, problems),
    editorRole: env.EDITOR_ROLE && env.EDITOR_ROLE.trim() ? env.EDITOR_ROLE.trim() : undefined,
    problems
  }
  return cfg
}

// 中文注释：校验运行时关键配置的可用性与完整性。
// 返回错误消息数组；若数组为空表示校验通过。
export function validateRuntimeConfig(cfg: ServiceConfig): string[] {
  const errors: string[] = [...cfg.problems]
  try {
    assertScoringWeights(cfg.scoringWeights)
  } catch (e) {
    errors.push(e instanceof Error ? e.message : String(e))
  }
  if (!cfg.basePath.startsWith('/')) errors.push('BASE_PATH must start with "/"')
  if (cfg.worker.enabled && !cfg.pipeline.url) {
    errors.push('Missing PIPELINE_URL: required when WORKER_ENABLED is set')
  }
  if (cfg.pipeline.url) {
    try {
      const u = new URL(cfg.pipeline.url)
      if (!(u.protocol === 'http:' || u.protocol === 'https:')) errors.push('PIPELINE_URL must use http:// or https://')
    } catch {
      errors.push('PIPELINE_URL is not a valid URL')
    }
  }
  return errors
}
