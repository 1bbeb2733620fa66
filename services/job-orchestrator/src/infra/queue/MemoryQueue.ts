/*
功能：队列后端（内存实现）
用途：测试与单进程运行；支持租约、可见性超时回收、死信。
参数：
- constructor({ maxAttempts?, clock?, newId? })
返回：
- 实现 QueueBackend
示例：
// const q = new MemoryQueue(); await q.enqueue({ jobId }); const d = await q.dequeue(30000)
*/
import type { DeadLetterNotice, EnqueueReceipt, FailOutcome, QueueBackend, QueueDelivery, QueueKind, QueueMessage, QueueStats } from '../../domain/contracts/index.js'
import { systemClock, type Clock } from '../../utils/clock.js'
import { newId as defaultNewId, type IdGenerator } from '../../utils/ids.js'
import { logger } from '../log/logger.js'
import { DEFAULT_MAX_ATTEMPTS, makeHandle, parseHandle, type QueueOptions } from './handles.js'

type Entry = {
  messageId: string
  jobId: string
  enqueuedAt: string
  attempts: number
  lease?: { id: string; deadline: number }
  lastError?: string
}

export class MemoryQueue implements QueueBackend {
  readonly kind: QueueKind = 'memory'
  private pending: Entry[] = []
  private inflight = new Map<string, Entry>()
  private dead: Entry[] = []
  private notices: Entry[] = []
  private readonly maxAttempts: number
  private readonly clock: Clock
  private readonly newId: IdGenerator

  constructor(opts: QueueOptions & { clock?: Clock; newId?: IdGenerator } = {}) {
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    this.clock = opts.clock ?? systemClock
    this.newId = opts.newId ?? defaultNewId
  }

  async initialize(): Promise<void> {}

  async close(): Promise<void> {}

  async enqueue(message: QueueMessage): Promise<EnqueueReceipt> {
    const entry: Entry = { messageId: this.newId(), jobId: message.jobId, enqueuedAt: this.clock().toISOString(), attempts: 0 }
    this.pending.push(entry)
    return { messageId: entry.messageId }
  }

  // 中文注释：回收过期租约；投递次数已满的直接进入死信
  private reclaimExpired(now: number) {
    for (const [id, entry] of this.inflight) {
      if (!entry.lease || entry.lease.deadline > now) continue
      this.inflight.delete(id)
      entry.lease = undefined
      if (entry.attempts >= this.maxAttempts) {
        entry.lastError = entry.lastError ?? 'visibility timeout expired'
        this.dead.push(entry)
        this.notices.push(entry)
        logger.warn('queue_message_dead_lettered', { messageId: id, jobId: entry.jobId, attempts: entry.attempts })
      } else {
        this.pending.push(entry)
      }
    }
  }

  async dequeue(visibilityTimeoutMs: number): Promise<QueueDelivery | null> {
    const now = this.clock().getTime()
    this.reclaimExpired(now)
    const entry = this.pending.shift()
    if (!entry) return null
    entry.attempts += 1
    entry.lease = { id: this.newId(), deadline: now + visibilityTimeoutMs }
    this.inflight.set(entry.messageId, entry)
    return {
      handle: makeHandle(entry.messageId, entry.lease.id),
      messageId: entry.messageId,
      jobId: entry.jobId,
      attempt: entry.attempts,
      enqueuedAt: entry.enqueuedAt
    }
  }

  private leased(handle: string): Entry | undefined {
    const parsed = parseHandle(handle)
    if (!parsed) return undefined
    const entry = this.inflight.get(parsed.messageId)
    return entry && entry.lease?.id === parsed.leaseId ? entry : undefined
  }

  async ack(handle: string): Promise<void> {
    const entry = this.leased(handle)
    if (entry) this.inflight.delete(entry.messageId)
  }

  async fail(handle: string, error: string): Promise<FailOutcome> {
    const entry = this.leased(handle)
    if (!entry) return 'ignored'
    this.inflight.delete(entry.messageId)
    entry.lease = undefined
    entry.lastError = error
    if (entry.attempts >= this.maxAttempts) {
      this.dead.push(entry)
      return 'dead_lettered'
    }
    this.pending.push(entry)
    return 'requeued'
  }

  async expiredDeadLetters(): Promise<DeadLetterNotice[]> {
    return this.notices.map(e => ({ messageId: e.messageId, jobId: e.jobId, attempts: e.attempts, error: e.lastError ?? '' }))
  }

  async acknowledgeDeadLetter(messageId: string): Promise<void> {
    this.notices = this.notices.filter(e => e.messageId !== messageId)
  }

  async stats(): Promise<QueueStats> {
    return { pending: this.pending.length, inFlight: this.inflight.size, deadLettered: this.dead.length }
  }

  async healthCheck(): Promise<boolean> {
    return true
  }
}
