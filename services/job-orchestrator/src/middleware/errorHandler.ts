/*
功能：错误映射（领域错误 → HTTP 状态码）
用途：路由处理器与兜底错误中间件共用，统一返回 { error: { code, message } }。
参数：
- sendError(res, err)
- errorMiddleware(err, req, res, next)
返回：
- 无（写出响应）
示例：
// try { ... } catch (e) { sendError(res, e) }
*/
import type { Request, Response, NextFunction } from 'express'
import {
  BackendUnavailableError, InvalidTransitionError, JobNotCompletedError, JobOrchestratorError, NotFoundError,
  TerminalStateError, ValidationError, errorMessage
} from '../domain/errors.js'
import { logger } from '../infra/log/logger.js'

export function statusFor(e: unknown): number {
  if (e instanceof ValidationError) return 400
  if (e instanceof NotFoundError) return 404
  if (e instanceof InvalidTransitionError || e instanceof TerminalStateError || e instanceof JobNotCompletedError) return 409
  if (e instanceof BackendUnavailableError) return 503
  return 500
}

function isBodyParseError(e: unknown): boolean {
  return e instanceof SyntaxError && 'type' in e && e.type === 'entity.parse.failed'
}

export function sendError(res: Response, e: unknown): void {
  if (isBodyParseError(e)) {
    res.status(400).json({ error: { code: 'INVALID_JSON', message: 'request body is not valid JSON' } })
    return
  }
  const status = statusFor(e)
  const code = e instanceof JobOrchestratorError ? e.code : 'INTERNAL_ERROR'
  const message = status === 500 ? 'internal error' : errorMessage(e)
  if (status >= 500) logger.error('request_failed', { status, code, error: errorMessage(e) })
  const body: { error: { code: string; message: string; issues?: string[] } } = { error: { code, message } }
  if (e instanceof ValidationError && e.issues.length > 1) body.error.issues = e.issues
  res.status(status).json(body)
}

// 中文注释：Express 依据参数个数识别错误中间件，next 参数必须保留
export function errorMiddleware(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) return next(err)
  sendError(res, err)
}
