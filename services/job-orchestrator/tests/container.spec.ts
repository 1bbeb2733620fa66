import { describe, it, expect } from 'vitest'
import { buildContainer } from '../src/bootstrap/container.js'
import { loadConfig } from '../src/config/config.js'
import { RemotePipeline } from '../src/infra/pipeline/RemotePipeline.js'
import { FakePipeline } from './support/fakePipeline.js'
import { jobDraft } from './support/fixtures.js'

describe('buildContainer', () => {
  it('wires sqlite backends from config and runs a job end to end', async () => {
    const cfg = loadConfig({ STORAGE_URL: 'sqlite::memory:', QUEUE_URL: 'sqlite::memory:', DEFAULT_TOPICS: 'dev tools' })
    const container = buildContainer(cfg, { pipeline: new FakePipeline() })
    expect([container.storage.kind, container.queue.kind]).toEqual(['sqlite', 'sqlite'])
    await container.start()
    const { jobId } = await container.jobs.submitJob(jobDraft())
    const results = await container.worker.drain()
    expect(results).toMatchObject([{ state: 'processed', jobId, outcome: 'completed' }])
    expect(await container.feedback.listPosts()).toHaveLength(1)
    await container.close()
  })

  it('uses the remote pipeline when a url is configured', () => {
    const container = buildContainer(loadConfig({ PIPELINE_URL: 'http://pipeline.test' }))
    expect(container.pipeline).toBeInstanceOf(RemotePipeline)
    expect(buildContainer(loadConfig({})).pipeline).toBeUndefined()
  })
})
