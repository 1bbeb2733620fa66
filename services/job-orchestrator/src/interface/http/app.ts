/*
功能：HTTP 应用装配（createApp）
用途：挂载 CORS、JSON 解析、请求超时、作业/文章/统计/健康路由与统一错误中间件；不负责监听端口。
参数：
- createApp({ jobs, feedback, storage, queue, basePath, editorRole?, backendTimeoutMs, requestTimeouts? })
返回：
- express.Express 实例
示例：
// const app = createApp(deps); app.listen(4001)
*/
import express from 'express'
import cors from 'cors'
import type { QueueBackend, StorageBackend } from '../../domain/contracts/index.js'
import type { JobService } from '../../app/services/JobService.js'
import type { FeedbackService } from '../../app/services/FeedbackService.js'
import { timeoutMiddleware } from '../../middleware/timeoutMiddleware.js'
import { requireRole } from '../../middleware/authorization.js'
import { errorMiddleware } from '../../middleware/errorHandler.js'
import { makeJobsHandlers } from './routes/jobs.js'
import { makePostsHandlers } from './routes/posts.js'
import { makeStatsHandlers } from './routes/stats.js'
import { makeHealthHandlers } from './routes/health.js'

export type AppDeps = {
  jobs: JobService
  feedback: FeedbackService
  storage: StorageBackend
  queue: QueueBackend
  basePath: string
  backendTimeoutMs: number
  editorRole?: string
  requestTimeouts?: { softMs?: number; hardMs?: number }
  corsOrigins?: string[]
}

export function createApp(deps: AppDeps): express.Express {
  const app = express()
  const base = deps.basePath

  // 中文注释：CORS 白名单（默认本地前端开发端口），放行 Content-Type 与角色/操作人头
  app.use(cors({
    origin: deps.corsOrigins ?? ['http://localhost:5173', 'http://127.0.0.1:5173', 'http://localhost:3002', 'http://127.0.0.1:3002'],
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'x-user-role', 'x-actor'],
    optionsSuccessStatus: 204,
    maxAge: 86400
  }))
  app.use(express.json({ limit: '2mb' }))
  app.use(timeoutMiddleware(deps.requestTimeouts))

  const health = makeHealthHandlers(deps)
  app.get(`${base}/health`, health.health)
  app.get(`${base}/ready`, health.ready)

  const jobs = makeJobsHandlers(deps.jobs)
  app.post(`${base}/jobs`, jobs.submit)
  app.get(`${base}/jobs`, jobs.list)
  app.get(`${base}/jobs/by-correlation/:correlationId`, jobs.byCorrelation)
  app.get(`${base}/jobs/:id`, jobs.status)
  app.get(`${base}/jobs/:id/preview`, jobs.preview)
  app.get(`${base}/jobs/:id/history`, jobs.history)

  // 中文注释：审批动作可按 EDITOR_ROLE 限制；读取接口不受限
  const editor = requireRole(deps.editorRole)
  const posts = makePostsHandlers(deps.feedback)
  app.get(`${base}/posts`, posts.list)
  app.get(`${base}/posts/:id`, posts.read)
  app.get(`${base}/posts/:id/history`, posts.history)
  app.get(`${base}/posts/:id/feedback`, posts.feedback)
  app.post(`${base}/posts/:id/approve`, editor, posts.approve)
  app.post(`${base}/posts/:id/reject`, editor, posts.reject)
  app.post(`${base}/posts/:id/revision`, editor, posts.revision)
  app.post(`${base}/posts/:id/resubmit`, editor, posts.resubmit)
  app.post(`${base}/posts/:id/publish`, editor, posts.publish)

  const stats = makeStatsHandlers(deps)
  app.get(`${base}/stats`, stats.stats)
  app.get(`${base}/feedback/stats`, stats.feedbackStats)
  app.get(`${base}/feedback/learning`, stats.learning)
  app.get(`${base}/metrics`, stats.metrics)

  app.use((req, res) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: `no route for ${req.method} ${req.path}` } })
  })
  app.use(errorMiddleware)
  return app
}
