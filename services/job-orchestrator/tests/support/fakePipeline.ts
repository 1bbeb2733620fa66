import type { Article, CandidatePost, ContentPipeline, PostScore, ScoredPost } from '../../src/domain/contracts/index.js'

export function article(topic: string, n = 1): Article {
  return { title: `${topic} news ${n}`, url: `https://example.test/${n}`, source: 'web', summary: 'summary', topic }
}

export function candidate(title: string, topic = 'dev tools'): CandidatePost {
  return { title, content: `draft body for ${title}`, sources: ['https://example.test/1'], topic }
}

export function score(total: number): PostScore {
  return { relevance: 8, originality: 7, depth: 6, clarity: 9, engagement: 5, total, reasoning: 'ok' }
}

// 中文注释：可编排的流水线替身；测试按需替换某一阶段的实现，calls 记录阶段调用顺序
export class FakePipeline implements ContentPipeline {
  calls: string[] = []

  fetch: (topics: string[]) => Promise<Article[]> = async topics => topics.map((t, i) => article(t, i + 1))
  generate: (articles: Article[], n: number) => Promise<CandidatePost[]> = async (_a, n) =>
    Array.from({ length: n }, (_, i) => candidate(`Candidate ${i + 1}`))
  score: (candidates: CandidatePost[]) => Promise<ScoredPost[]> = async candidates =>
    candidates.map((c, i) => ({ candidate: c, score: score(90 - i * 10) }))
  refine: (winner: ScoredPost) => Promise<string> = async winner => `# ${winner.candidate.title}\n\nrefined body text`

  async fetchAllArticles(topics: string[]): Promise<Article[]> {
    this.calls.push('fetch')
    return this.fetch(topics)
  }

  async generateCandidates(articles: Article[], numCandidates: number): Promise<CandidatePost[]> {
    this.calls.push('generate')
    return this.generate(articles, numCandidates)
  }

  async scoreCandidates(candidates: CandidatePost[]): Promise<ScoredPost[]> {
    this.calls.push('score')
    return this.score(candidates)
  }

  async refineWinner(winner: ScoredPost): Promise<string> {
    this.calls.push('refine')
    return this.refine(winner)
  }
}
