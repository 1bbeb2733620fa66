import type { Request, Response } from 'express'
import type { QueueBackend, StorageBackend } from '../../../domain/contracts/index.js'
import { withTimeout } from '../../../utils/timeout.js'
import { errorMessage } from '../../../domain/errors.js'
import { logger } from '../../../infra/log/logger.js'

// 中文注释：健康检查路由处理（health 仅表示进程存活；ready 需要存储与队列均可用）
export function makeHealthHandlers(deps: { storage: StorageBackend; queue: QueueBackend; backendTimeoutMs: number }) {
  const checkBackend = (name: string, check: () => Promise<boolean>) =>
    withTimeout(check(), deps.backendTimeoutMs).catch((e: unknown) => {
      logger.warn('readiness_check_failed', { backend: name, error: errorMessage(e) })
      return false
    })
  return {
    health: (_req: Request, res: Response) => {
      res.json({ status: 'ok', service: 'job-orchestrator', endpoint: 'health' })
    },
    ready: async (_req: Request, res: Response) => {
      const [storage, queue] = await Promise.all([checkBackend('storage', () => deps.storage.healthCheck()), checkBackend('queue', () => deps.queue.healthCheck())])
      const ok = storage && queue
      res.status(ok ? 200 : 503).json({
        status: ok ? 'ready' : 'unavailable',
        storage: { kind: deps.storage.kind, healthy: storage },
        queue: { kind: deps.queue.kind, healthy: queue }
      })
    }
  }
}
