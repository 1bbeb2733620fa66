import dotenv from 'dotenv'
import type { Server } from 'http'
import { loadConfig, validateRuntimeConfig } from '../config/config.js'
import { logger, setLogLevel } from '../infra/log/logger.js'
import { errorMessage } from '../domain/errors.js'
import { createApp } from '../interface/http/app.js'
import { buildContainer } from './container.js'

// 中文注释：加载环境变量（注意：不要将密钥写入日志）
dotenv.config()

async function main(): Promise<void> {
  const cfg = loadConfig()
  setLogLevel(cfg.logLevel)
  const problems = validateRuntimeConfig(cfg)
  if (problems.length) {
    logger.error('config_invalid', { problems })
    process.exitCode = 1
    return
  }

  const container = buildContainer(cfg)
  await container.start()

  const app = createApp({
    jobs: container.jobs,
    feedback: container.feedback,
    storage: container.storage,
    queue: container.queue,
    basePath: cfg.basePath,
    backendTimeoutMs: cfg.backendTimeoutMs,
    editorRole: cfg.editorRole
  })

  // 中文注释：可选在同一进程内运行 worker（开发环境）；生产建议单独运行 bootstrap/worker.ts
  if (cfg.worker.enabled) container.worker.start()

  const server: Server = app.listen(cfg.port, () => {
    logger.info('server_started', { url: `http://localhost:${cfg.port}${cfg.basePath}/health`, storage: cfg.storage.kind, queue: cfg.queue.kind })
  })

  const shutdown = (signal: string) => {
    logger.info('server_shutdown', { signal })
    server.close(() => {
      container.close().then(
        () => { process.exitCode = 0 },
        e => { logger.error('shutdown_failed', { error: errorMessage(e) }); process.exitCode = 1 }
      )
    })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch(e => {
  logger.error('server_start_failed', { error: errorMessage(e) })
  process.exitCode = 1
})
