import type { Request } from 'express'
import { APPROVAL_STATUSES, JOB_STATUSES, type ApprovalStatus, type JobStatus } from '../../../domain/contracts/index.js'
import { ValidationError } from '../../../domain/errors.js'

export function queryString(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim() !== '' ? v.trim() : undefined
}

// 中文注释：非整数交给存储层按 ValidationError 拒绝
export function queryInt(v: unknown): number | undefined {
  const s = queryString(v)
  return s === undefined ? undefined : Number(s)
}

export function queryJobStatus(v: unknown): JobStatus | undefined {
  const s = queryString(v)
  if (s === undefined) return undefined
  const found = JOB_STATUSES.find(x => x === s)
  if (!found) throw new ValidationError(`status must be one of ${JOB_STATUSES.join(', ')}`)
  return found
}

export function queryApprovalStatus(v: unknown): ApprovalStatus | undefined {
  const s = queryString(v)
  if (s === undefined) return undefined
  const found = APPROVAL_STATUSES.find(x => x === s)
  if (!found) throw new ValidationError(`status must be one of ${APPROVAL_STATUSES.join(', ')}`)
  return found
}

export function bodyField(req: Request, key: string): unknown {
  const body: unknown = req.body
  return typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined
}

export function bodyString(req: Request, key: string): string | undefined {
  const v = bodyField(req, key)
  if (v === undefined || v === null) return undefined
  if (typeof v !== 'string') throw new ValidationError(`${key} must be a string`)
  return v
}

// 中文注释：操作人优先取 body.actor，其次 x-actor 请求头
export function actorOf(req: Request): string | undefined {
  const fromBody = bodyString(req, 'actor')
  if (fromBody && fromBody.trim()) return fromBody.trim()
  return queryString(req.headers['x-actor'])
}
