// 中文注释：投递句柄 = messageId + 租约 ID；租约过期重投后旧句柄自动失效
const SEP = '~'

export function makeHandle(messageId: string, leaseId: string): string {
  return `${messageId}${SEP}${leaseId}`
}

export function parseHandle(handle: string): { messageId: string; leaseId: string } | null {
  const i = handle.lastIndexOf(SEP)
  if (i <= 0 || i === handle.length - 1) return null
  return { messageId: handle.slice(0, i), leaseId: handle.slice(i + 1) }
}

export const DEFAULT_MAX_ATTEMPTS = 3

export type QueueOptions = {
  maxAttempts?: number
}
