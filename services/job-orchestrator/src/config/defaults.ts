/**
 * 默认配置：提交参数与评分权重的默认值
 *
 * 说明：DEFAULT_TOPICS / DEFAULT_SOURCES 可被环境变量覆盖，其余为校验边界。
 */
import type { ScoringWeights } from '../domain/contracts/index.js'

export const DEFAULT_TOPICS: readonly string[] = [
  'AI software engineering',
  'agentic AI development',
  'Copilot coding assistants',
  'developer productivity',
  'software engineering leadership',
  'cybersecurity',
  'AI security',
  'dev tools',
  'cloud infrastructure'
]

export const DEFAULT_SOURCES: readonly string[] = ['hacker_news', 'web', 'youtube']

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  relevance: 0.3,
  originality: 0.25,
  depth: 0.2,
  clarity: 0.15,
  engagement: 0.1
}

export const SubmissionDefaults = {
  numCandidates: 3,
  minCandidates: 1,
  maxCandidates: 10,
  maxResults: 10,
  maxResultsCap: 50,
  maxCorrelationIdLength: 128
}
