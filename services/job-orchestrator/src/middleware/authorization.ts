import type { Request, Response, NextFunction } from 'express'

// 简单 RBAC 中间件，依赖 req.headers['x-user-role']；未配置角色时放行
export function requireRole(role: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!role) return next()
    const r = String(req.headers['x-user-role'] || '')
    if (r !== role) {
      res.status(403).json({ error: { code: 'FORBIDDEN', message: `role "${role}" required` } })
      return
    }
    next()
  }
}
