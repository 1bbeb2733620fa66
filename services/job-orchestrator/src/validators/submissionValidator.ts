/*
功能：作业提交参数校验
用途：将 HTTP/调用方传入的任意对象校验并规范化为 JobDraft（填充默认主题/来源/数量）。
参数：
- validateSubmission(input, { defaultTopics, allowedSources })
返回：
- { valid: true, value } 或 { valid: false, errors }
示例：
// const r = validateSubmission(req.body, { defaultTopics: cfg.defaultTopics, allowedSources: cfg.defaultSources })
*/
import type { JobDraft } from '../domain/contracts/index.js'
import { SubmissionDefaults } from '../config/defaults.js'

export type SubmissionRules = { defaultTopics: readonly string[]; allowedSources: readonly string[] }
export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] }

function get(obj: unknown, key: string): unknown {
  return typeof obj === 'object' && obj !== null ? Reflect.get(obj, key) : undefined
}

function stringList(v: unknown, name: string, errors: string[]): string[] | undefined {
  if (v === undefined || v === null) return undefined
  if (!Array.isArray(v)) {
    errors.push(`${name} must be an array of strings`)
    return undefined
  }
  const out: string[] = []
  v.forEach((item: unknown, i) => {
    if (typeof item !== 'string' || item.trim() === '') errors.push(`${name}[${i}] must be a non-empty string`)
    else out.push(item.trim())
  })
  return out
}

function intInRange(v: unknown, name: string, fallback: number, min: number, max: number, errors: string[]): number {
  if (v === undefined || v === null) return fallback
  if (typeof v !== 'number' || !Number.isInteger(v) || v < min || v > max) {
    errors.push(`${name} must be an integer between ${min} and ${max}`)
    return fallback
  }
  return v
}

export function validateSubmission(input: unknown, rules: SubmissionRules): ValidationResult<JobDraft> {
  const errors: string[] = []
  if (input !== undefined && input !== null && (typeof input !== 'object' || Array.isArray(input))) {
    return { valid: false, errors: ['submission must be an object'] }
  }

  const topics = stringList(get(input, 'topics'), 'topics', errors)
  const sources = stringList(get(input, 'sources'), 'sources', errors)
  for (const s of sources ?? []) {
    if (!rules.allowedSources.includes(s)) errors.push(`unknown source "${s}" (allowed: ${rules.allowedSources.join(', ')})`)
  }

  const numCandidates = intInRange(get(input, 'numCandidates'), 'numCandidates', SubmissionDefaults.numCandidates,
    SubmissionDefaults.minCandidates, SubmissionDefaults.maxCandidates, errors)
  const maxResults = intInRange(get(input, 'maxResults'), 'maxResults', SubmissionDefaults.maxResults, 1, SubmissionDefaults.maxResultsCap, errors)

  let correlationId: string | undefined
  const rawCorrelation = get(input, 'correlationId')
  if (rawCorrelation !== undefined && rawCorrelation !== null) {
    if (typeof rawCorrelation !== 'string' || rawCorrelation.trim() === '') errors.push('correlationId must be a non-empty string')
    else if (rawCorrelation.length > SubmissionDefaults.maxCorrelationIdLength) errors.push(`correlationId must be at most ${SubmissionDefaults.maxCorrelationIdLength} characters`)
    else correlationId = rawCorrelation
  }

  if (errors.length) return { valid: false, errors }
  return {
    valid: true,
    value: {
      correlationId,
      topics: topics && topics.length ? [...new Set(topics)] : [...rules.defaultTopics],
      sources: sources && sources.length ? [...new Set(sources)] : [...rules.allowedSources],
      numCandidates,
      maxResults
    }
  }
}
