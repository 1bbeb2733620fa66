/*
功能：作业路由
用途：提供作业提交/列表/状态/关联 ID 查询/预览/历史的 REST 处理器。
参数：
- makeJobsHandlers(jobs)
返回：
- { submit, list, status, byCorrelation, preview, history } 多个 Express 处理函数
示例：
// const h = makeJobsHandlers(jobs); app.post('/jobs', h.submit)
*/
import type { Request, Response } from 'express'
import type { JobService, JobStatusResult } from '../../../app/services/JobService.js'
import { sendError } from '../../../middleware/errorHandler.js'
import { queryInt, queryJobStatus } from './params.js'

function sendStatus(res: Response, result: JobStatusResult, what: string) {
  switch (result.state) {
    case 'found':
      res.json(result.job)
      return
    case 'not_found':
      res.status(404).json({ error: { code: 'NOT_FOUND', message: `${what} not found` } })
      return
    case 'unknown':
      res.status(503).json({ status: 'unknown', reason: result.reason })
  }
}

export function makeJobsHandlers(jobs: JobService) {
  return {
    submit: async (req: Request, res: Response) => {
      try {
        const result = await jobs.submitJob(req.body ?? {})
        res.status(result.isDuplicate ? 200 : 201).json(result)
      } catch (e) { sendError(res, e) }
    },
    list: async (req: Request, res: Response) => {
      try {
        const items = await jobs.listJobs({ status: queryJobStatus(req.query.status), limit: queryInt(req.query.limit), offset: queryInt(req.query.offset) })
        res.json({ items })
      } catch (e) { sendError(res, e) }
    },
    status: async (req: Request, res: Response) => {
      try {
        const id = String(req.params.id || '')
        sendStatus(res, await jobs.getJobStatus(id), `job ${id}`)
      } catch (e) { sendError(res, e) }
    },
    byCorrelation: async (req: Request, res: Response) => {
      try {
        const correlationId = String(req.params.correlationId || '')
        sendStatus(res, await jobs.getJobByCorrelationId(correlationId), `job with correlation id ${correlationId}`)
      } catch (e) { sendError(res, e) }
    },
    preview: async (req: Request, res: Response) => {
      try { res.json(await jobs.getPreview(String(req.params.id || ''))) } catch (e) { sendError(res, e) }
    },
    history: async (req: Request, res: Response) => {
      try { res.json({ items: await jobs.getJobHistory(String(req.params.id || '')) }) } catch (e) { sendError(res, e) }
    }
  }
}
