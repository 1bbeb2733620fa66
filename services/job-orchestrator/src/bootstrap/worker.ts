import dotenv from 'dotenv'
import { loadConfig, validateRuntimeConfig } from '../config/config.js'
import { logger, setLogLevel } from '../infra/log/logger.js'
import { errorMessage } from '../domain/errors.js'
import { buildContainer } from './container.js'

dotenv.config()

// 中文注释：独立 worker 进程；需配置 PIPELINE_URL
async function main(): Promise<void> {
  const cfg = loadConfig()
  setLogLevel(cfg.logLevel)
  const problems = validateRuntimeConfig({ ...cfg, worker: { ...cfg.worker, enabled: true } })
  if (problems.length) {
    logger.error('config_invalid', { problems })
    process.exitCode = 1
    return
  }
  const container = buildContainer(cfg)
  await container.start()
  container.worker.start()

  const shutdown = (signal: string) => {
    logger.info('worker_shutdown', { signal })
    container.close().then(
      () => { process.exitCode = 0 },
      e => { logger.error('shutdown_failed', { error: errorMessage(e) }); process.exitCode = 1 }
    )
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch(e => {
  logger.error('worker_start_failed', { error: errorMessage(e) })
  process.exitCode = 1
})
