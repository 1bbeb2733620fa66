/*
功能：内容流水线 HTTP 客户端（RemotePipeline）
用途：将抓取/生成/评分/润色四个阶段委托给外部流水线服务，并校验响应结构。
参数：
- constructor(baseUrl, timeoutMs)
返回：
- 实现 ContentPipeline；fetch 阶段失败时返回 [] 并告警，generate/score 结构错误抛出 GenerationError/ScoringError
示例：
// const pipeline = new RemotePipeline('http://localhost:8000', 300000)
*/
import type { Article, CandidatePost, ContentPipeline, PostScore, ScoredPost } from '../../domain/contracts/index.js'
import { GenerationError, PipelineError, ScoringError, errorMessage } from '../../domain/errors.js'
import { logger } from '../log/logger.js'
import { postJson } from '../http/postJson.js'

function field(obj: unknown, key: string): unknown {
  return typeof obj === 'object' && obj !== null ? Reflect.get(obj, key) : undefined
}

function str(obj: unknown, key: string): string | undefined {
  const v = field(obj, key)
  return typeof v === 'string' ? v : undefined
}

function num(obj: unknown, key: string): number | undefined {
  const v = field(obj, key)
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined
}

function strList(obj: unknown, key: string): string[] | undefined {
  const v = field(obj, key)
  return Array.isArray(v) && v.every(x => typeof x === 'string') ? v : undefined
}

function list(body: unknown, key: string): unknown[] | undefined {
  const v = Array.isArray(body) ? body : field(body, key)
  return Array.isArray(v) ? v : undefined
}

export function parseArticle(v: unknown): Article | undefined {
  const title = str(v, 'title')
  const url = str(v, 'url')
  const source = str(v, 'source')
  const topic = str(v, 'topic')
  if (!title || !url || !source || !topic) return undefined
  const article: Article = { title, url, source, topic, summary: str(v, 'summary') ?? '' }
  const thumbnail = str(v, 'thumbnail')
  if (thumbnail) article.thumbnail = thumbnail
  return article
}

export function parseCandidate(v: unknown): CandidatePost | undefined {
  const title = str(v, 'title')
  const content = str(v, 'content')
  const topic = str(v, 'topic')
  if (!title || !content || !topic) return undefined
  return { title, content, topic, sources: strList(v, 'sources') ?? [] }
}

export function parseScore(v: unknown): PostScore | undefined {
  const relevance = num(v, 'relevance')
  const originality = num(v, 'originality')
  const depth = num(v, 'depth')
  const clarity = num(v, 'clarity')
  const engagement = num(v, 'engagement')
  const total = num(v, 'total')
  if (relevance === undefined || originality === undefined || depth === undefined || clarity === undefined || engagement === undefined || total === undefined) {
    return undefined
  }
  return { relevance, originality, depth, clarity, engagement, total, reasoning: str(v, 'reasoning') ?? '' }
}

export class RemotePipeline implements ContentPipeline {
  constructor(private readonly baseUrl: string, private readonly timeoutMs: number) {}

  private async post(stage: string, body: unknown): Promise<unknown> {
    const url = `${this.baseUrl}/${stage}`
    const resp = await postJson(url, body, this.timeoutMs)
    if (!resp.ok) {
      const detail = str(resp.body, 'error') ?? (typeof resp.body === 'string' ? resp.body.slice(0, 200) : '')
      throw new PipelineError(`pipeline ${stage} returned ${resp.status}${detail ? `: ${detail}` : ''}`, resp.status)
    }
    return resp.body
  }

  async fetchAllArticles(topics: string[], sources: string[], maxResults: number): Promise<Article[]> {
    let body: unknown
    try {
      body = await this.post('fetch', { topics, sources, maxResults })
    } catch (e) {
      // 中文注释：来源不可用不视为致命错误，由调用方按 NO_ARTICLES 处理
      logger.warn('pipeline_fetch_unavailable', { topics, sources, error: errorMessage(e) })
      return []
    }
    const items = list(body, 'articles')
    if (!items) {
      logger.warn('pipeline_fetch_malformed', { topics })
      return []
    }
    return items.flatMap(v => {
      const a = parseArticle(v)
      return a ? [a] : []
    })
  }

  async generateCandidates(articles: Article[], numCandidates: number): Promise<CandidatePost[]> {
    const body = await this.post('generate', { articles, numCandidates })
    const items = list(body, 'candidates')
    if (!items) throw new GenerationError('pipeline generate response has no candidates array')
    const candidates: CandidatePost[] = []
    for (const [i, v] of items.entries()) {
      const c = parseCandidate(v)
      if (!c) throw new GenerationError(`candidate ${i} is missing title, content or topic`)
      candidates.push(c)
    }
    return candidates
  }

  async scoreCandidates(candidates: CandidatePost[]): Promise<ScoredPost[]> {
    const body = await this.post('score', { candidates })
    const items = list(body, 'scored')
    if (!items) throw new ScoringError('pipeline score response has no scored array')
    const scored: ScoredPost[] = []
    for (const [i, v] of items.entries()) {
      const candidate = parseCandidate(field(v, 'candidate'))
      const score = parseScore(field(v, 'score'))
      if (!candidate || !score) throw new ScoringError(`scored entry ${i} is malformed`)
      scored.push({ candidate, score })
    }
    return scored.sort((a, b) => b.score.total - a.score.total)
  }

  async refineWinner(winner: ScoredPost): Promise<string> {
    const body = await this.post('refine', { winner })
    const content = typeof body === 'string' ? body : str(body, 'content')
    if (!content || !content.trim()) throw new PipelineError('pipeline refine response has no content')
    return content
  }
}
