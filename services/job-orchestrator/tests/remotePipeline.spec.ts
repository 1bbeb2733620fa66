import { describe, it, expect, afterEach, vi } from 'vitest'
import { RemotePipeline } from '../src/infra/pipeline/RemotePipeline.js'
import { GenerationError, PipelineError, ScoringError } from '../src/domain/errors.js'
import { article, candidate, score } from './support/fakePipeline.js'

const BASE = 'http://pipeline.test'

function reply(body: unknown, status = 200) {
  return new Response(typeof body === 'string' ? body : JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

function stubFetch(handler: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(handler)
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

describe('RemotePipeline', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts fetch requests and keeps well-formed articles', async () => {
    const fetchMock = stubFetch(async () => reply({ articles: [article('ai'), { title: 'no url' }] }))
    const pipeline = new RemotePipeline(BASE, 1000)
    expect(await pipeline.fetchAllArticles(['ai'], ['web'], 5)).toEqual([article('ai')])
    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(url).toBe('http://pipeline.test/fetch')
    expect(init?.method).toBe('POST')
    expect(JSON.parse(String(init?.body))).toEqual({ topics: ['ai'], sources: ['web'], maxResults: 5 })
  })

  it('treats an unavailable fetch stage as no articles', async () => {
    stubFetch(async () => reply({ error: 'rate limited' }, 429))
    expect(await new RemotePipeline(BASE, 1000).fetchAllArticles(['ai'], ['web'], 5)).toEqual([])
    stubFetch(async () => { throw new TypeError('fetch failed') })
    expect(await new RemotePipeline(BASE, 1000).fetchAllArticles(['ai'], ['web'], 5)).toEqual([])
  })

  it('accepts a bare candidate array', async () => {
    stubFetch(async () => reply([candidate('One')]))
    expect(await new RemotePipeline(BASE, 1000).generateCandidates([article('ai')], 1)).toEqual([candidate('One')])
  })

  it('raises GenerationError on malformed candidates', async () => {
    const pipeline = new RemotePipeline(BASE, 1000)
    stubFetch(async () => reply({ result: 'text' }))
    await expect(pipeline.generateCandidates([], 1)).rejects.toThrow('pipeline generate response has no candidates array')
    stubFetch(async () => reply({ candidates: [{ title: 'x' }] }))
    await expect(pipeline.generateCandidates([], 1)).rejects.toBeInstanceOf(GenerationError)
    await expect(pipeline.generateCandidates([], 1)).rejects.toThrow('candidate 0 is missing title, content or topic')
  })

  it('raises PipelineError on error statuses', async () => {
    stubFetch(async () => reply({ error: 'overloaded' }, 500))
    const err = await new RemotePipeline(BASE, 1000).generateCandidates([], 1).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(PipelineError)
    expect(err instanceof PipelineError ? [err.message, err.status] : []).toEqual(['pipeline generate returned 500: overloaded', 500])
  })

  it('orders scored candidates by total', async () => {
    stubFetch(async () => reply({ scored: [{ candidate: candidate('Low'), score: score(40) }, { candidate: candidate('High'), score: score(95) }] }))
    const scored = await new RemotePipeline(BASE, 1000).scoreCandidates([candidate('Low'), candidate('High')])
    expect(scored.map(s => [s.candidate.title, s.score.total])).toEqual([['High', 95], ['Low', 40]])
  })

  it('raises ScoringError on malformed scores', async () => {
    stubFetch(async () => reply({ scored: [{ candidate: candidate('A'), score: { total: 5 } }] }))
    await expect(new RemotePipeline(BASE, 1000).scoreCandidates([])).rejects.toBeInstanceOf(ScoringError)
  })

  it('reads refined markdown from text or json', async () => {
    const winner = { candidate: candidate('A'), score: score(90) }
    stubFetch(async () => reply('---\ntitle: A\n---\nbody'))
    expect(await new RemotePipeline(BASE, 1000).refineWinner(winner)).toBe('---\ntitle: A\n---\nbody')
    stubFetch(async () => reply({ content: '# A' }))
    expect(await new RemotePipeline(BASE, 1000).refineWinner(winner)).toBe('# A')
    stubFetch(async () => reply({ content: '  ' }))
    await expect(new RemotePipeline(BASE, 1000).refineWinner(winner)).rejects.toThrow('pipeline refine response has no content')
  })

  it('aborts slow requests', async () => {
    stubFetch((_url, init) => new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
    }))
    await expect(new RemotePipeline(BASE, 20).generateCandidates([], 1)).rejects.toThrow('request to http://pipeline.test/generate timed out after 20ms')
  })
})
