/*
功能：依赖装配（buildContainer）
用途：按 ServiceConfig 构造存储/队列/流水线与两个服务；server 与 worker 入口共用。
参数：
- buildContainer(cfg, overrides?)：overrides 可替换任一后端或流水线（测试使用）
返回：
- Container：含 storage/queue/pipeline/jobs/feedback 以及 start()/close()
示例：
// const c = buildContainer(loadConfig()); await c.start()
*/
import type { ContentPipeline, QueueBackend, StorageBackend } from '../domain/contracts/index.js'
import type { ServiceConfig } from '../config/config.js'
import { createStorage } from '../infra/storage/index.js'
import { createQueue } from '../infra/queue/index.js'
import { RemotePipeline } from '../infra/pipeline/RemotePipeline.js'
import { JobService } from '../app/services/JobService.js'
import { FeedbackService } from '../app/services/FeedbackService.js'
import { JobWorker } from '../app/services/JobWorker.js'
import { logger } from '../infra/log/logger.js'

export type Container = {
  storage: StorageBackend
  queue: QueueBackend
  pipeline?: ContentPipeline
  jobs: JobService
  feedback: FeedbackService
  worker: JobWorker
  start(): Promise<void>
  close(): Promise<void>
}

export function buildContainer(cfg: ServiceConfig, overrides: { storage?: StorageBackend; queue?: QueueBackend; pipeline?: ContentPipeline } = {}): Container {
  const storage = overrides.storage ?? createStorage(cfg.storage)
  const queue = overrides.queue ?? createQueue(cfg.queue, { maxAttempts: cfg.queueMaxAttempts })
  const pipeline = overrides.pipeline ?? (cfg.pipeline.url ? new RemotePipeline(cfg.pipeline.url, cfg.pipeline.timeoutMs) : undefined)
  const jobs = new JobService({
    storage,
    queue,
    pipeline,
    settings: {
      defaultTopics: cfg.defaultTopics,
      allowedSources: cfg.defaultSources,
      backendTimeoutMs: cfg.backendTimeoutMs,
      stageTimeoutMs: cfg.stageTimeoutMs,
      visibilityTimeoutMs: cfg.visibilityTimeoutMs
    }
  })
  const feedback = new FeedbackService({ storage, scoringWeights: cfg.scoringWeights, backendTimeoutMs: cfg.backendTimeoutMs })
  const worker = new JobWorker(jobs, { pollIntervalMs: cfg.worker.pollIntervalMs })

  return {
    storage,
    queue,
    pipeline,
    jobs,
    feedback,
    worker,
    async start() {
      await storage.initialize()
      await queue.initialize()
      logger.info('backends_ready', { storage: storage.kind, queue: queue.kind, pipeline: pipeline ? 'remote' : 'none' })
    },
    async close() {
      await worker.stop()
      await queue.close()
      await storage.close()
    }
  }
}
