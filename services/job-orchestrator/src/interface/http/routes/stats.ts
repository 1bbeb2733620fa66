import type { Request, Response } from 'express'
import type { QueueBackend, StorageBackend } from '../../../domain/contracts/index.js'
import type { FeedbackService } from '../../../app/services/FeedbackService.js'
import { callBackend } from '../../../app/services/backendCall.js'
import { sendError } from '../../../middleware/errorHandler.js'
import { snapshotMetrics } from '../../../services/metrics.js'
import { queryInt } from './params.js'

export function makeStatsHandlers(deps: { storage: StorageBackend; queue: QueueBackend; feedback: FeedbackService; backendTimeoutMs: number }) {
  return {
    stats: async (_req: Request, res: Response) => {
      try {
        const [storage, queue] = await Promise.all([
          callBackend('storage.getStats', deps.storage.getStats(), deps.backendTimeoutMs),
          callBackend('queue.stats', deps.queue.stats(), deps.backendTimeoutMs)
        ])
        res.json({ storage, queue })
      } catch (e) { sendError(res, e) }
    },
    feedbackStats: async (_req: Request, res: Response) => {
      try { res.json(await deps.feedback.getFeedbackStats()) } catch (e) { sendError(res, e) }
    },
    learning: async (req: Request, res: Response) => {
      try { res.json({ items: await deps.feedback.getLearningData(queryInt(req.query.limit) ?? 100) }) } catch (e) { sendError(res, e) }
    },
    metrics: (_req: Request, res: Response) => {
      res.json({ counters: snapshotMetrics() })
    }
  }
}
