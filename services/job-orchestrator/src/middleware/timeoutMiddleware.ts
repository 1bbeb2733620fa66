import type { Request, Response, NextFunction } from 'express'
import { logger } from '../infra/log/logger.js'

// 简单的请求级超时中间件，支持 soft/hard 超时（毫秒）
export function timeoutMiddleware(options?: { softMs?: number; hardMs?: number }) {
  const softMs = options?.softMs ?? 30_000
  const hardMs = options?.hardMs ?? 60_000
  return (req: Request, res: Response, next: NextFunction) => {
    let softTimer: NodeJS.Timeout | null = setTimeout(() => {
      // 软超时：记录警告但不关闭连接
      logger.warn('request_soft_timeout', { method: req.method, path: req.path, softMs })
      softTimer = null
    }, softMs)

    const hardTimer = setTimeout(() => {
      logger.error('request_hard_timeout', { method: req.method, path: req.path, hardMs })
      if (softTimer) { clearTimeout(softTimer); softTimer = null }
      if (!res.headersSent) res.status(504).json({ error: { code: 'REQUEST_TIMEOUT', message: `request exceeded ${hardMs}ms` } })
    }, hardMs)

    const clear = () => {
      if (softTimer) { clearTimeout(softTimer); softTimer = null }
      clearTimeout(hardTimer)
    }
    res.on('finish', clear)
    res.on('close', clear)

    next()
  }
}
