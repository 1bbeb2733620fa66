import { LIMITS, type Page } from '../domain/contracts/index.js'
import { ValidationError } from '../domain/errors.js'

// 中文注释：分页参数校验（非负整数），limit 上限截断为 MAX_LIST_LIMIT
export function resolvePage(query?: Partial<Page>): Page {
  const limit = query?.limit ?? LIMITS.DEFAULT_LIST_LIMIT
  const offset = query?.offset ?? 0
  if (!Number.isInteger(limit) || limit < 0) throw new ValidationError(`limit must be a non-negative integer, got ${limit}`)
  if (!Number.isInteger(offset) || offset < 0) throw new ValidationError(`offset must be a non-negative integer, got ${offset}`)
  return { limit: Math.min(limit, LIMITS.MAX_LIST_LIMIT), offset }
}

export function countWords(content: string): number {
  const trimmed = content.trim()
  return trimmed ? trimmed.split(/\s+/).length : 0
}
