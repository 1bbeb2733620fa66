/*
功能：队列后端（Redis 实现）
用途：多进程 worker 共享的外部队列；pending 列表 + 消息哈希 + 以租约到期时间为分值的 inflight 有序集合。
参数：
- constructor(client: RedisQueueClient, { prefix?, maxAttempts?, clock?, newId? })
返回：
- 实现 QueueBackend；客户端异常统一转为 BackendUnavailableError
示例：
// const q = new RedisQueue(adaptRedisClient(createClient({ url })), { prefix: 'jobs' })
*/
import type { DeadLetterNotice, EnqueueReceipt, FailOutcome, QueueBackend, QueueDelivery, QueueKind, QueueMessage, QueueStats } from '../../domain/contracts/index.js'
import { BackendUnavailableError, errorMessage } from '../../domain/errors.js'
import { systemClock, type Clock } from '../../utils/clock.js'
import { newId as defaultNewId, type IdGenerator } from '../../utils/ids.js'
import { logger } from '../log/logger.js'
import { DEFAULT_MAX_ATTEMPTS, makeHandle, parseHandle, type QueueOptions } from './handles.js'

export type QueueScriptName = 'enqueue' | 'reclaim' | 'lease' | 'ack' | 'fail' | 'forgetNotice'
export type QueueScript = { name: QueueScriptName; lua: string }

// 中文注释：每个写操作是一段 Lua 脚本，在 Redis 内原子执行；消息哈希键 = ARGV[1] .. messageId
export const QUEUE_SCRIPTS: Record<QueueScriptName, QueueScript> = {
  // KEYS: pending | ARGV: msgPrefix, id, jobId, enqueuedAt
  enqueue: {
    name: 'enqueue',
    lua: `
local key = ARGV[1] .. ARGV[2]
redis.call('HSET', key, 'jobId', ARGV[3], 'enqueuedAt', ARGV[4], 'attempts', '0', 'lease', '', 'status', 'pending')
redis.call('RPUSH', KEYS[1], ARGV[2])
return 1`
  },
  // KEYS: inflight, pending, dead, expired | ARGV: msgPrefix, now, maxAttempts
  reclaim: {
    name: 'reclaim',
    lua: `
local ids = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[2])
local dead = {}
for _, id in ipairs(ids) do
  redis.call('ZREM', KEYS[1], id)
  local key = ARGV[1] .. id
  if tonumber(redis.call('HGET', key, 'attempts') or '0') >= tonumber(ARGV[3]) then
    redis.call('HSETNX', key, 'lastError', 'visibility timeout expired')
    redis.call('HSET', key, 'lease', '', 'status', 'dead')
    redis.call('RPUSH', KEYS[3], id)
    redis.call('RPUSH', KEYS[4], id)
    table.insert(dead, id)
  else
    redis.call('HSET', key, 'lease', '', 'status', 'pending')
    redis.call('RPUSH', KEYS[2], id)
  end
end
return dead`
  },
  // KEYS: pending, inflight | ARGV: msgPrefix, deadline, leaseId
  lease: {
    name: 'lease',
    lua: `
while true do
  local id = redis.call('LPOP', KEYS[1])
  if not id then return false end
  local key = ARGV[1] .. id
  local jobId = redis.call('HGET', key, 'jobId')
  if jobId then
    local attempt = redis.call('HINCRBY', key, 'attempts', 1)
    redis.call('HSET', key, 'lease', ARGV[3], 'status', 'leased')
    redis.call('ZADD', KEYS[2], ARGV[2], id)
    return { id, jobId, tostring(attempt), redis.call('HGET', key, 'enqueuedAt') or '' }
  end
end`
  },
  // KEYS: inflight | ARGV: msgPrefix, id, leaseId
  ack: {
    name: 'ack',
    lua: `
local key = ARGV[1] .. ARGV[2]
if redis.call('HGET', key, 'status') ~= 'leased' or redis.call('HGET', key, 'lease') ~= ARGV[3] then return 0 end
redis.call('ZREM', KEYS[1], ARGV[2])
redis.call('DEL', key)
return 1`
  },
  // KEYS: inflight, pending, dead | ARGV: msgPrefix, id, leaseId, error, maxAttempts
  fail: {
    name: 'fail',
    lua: `
local key = ARGV[1] .. ARGV[2]
if redis.call('HGET', key, 'status') ~= 'leased' or redis.call('HGET', key, 'lease') ~= ARGV[3] then return 'ignored' end
if redis.call('ZREM', KEYS[1], ARGV[2]) ~= 1 then return 'ignored' end
if tonumber(redis.call('HGET', key, 'attempts') or '0') >= tonumber(ARGV[5]) then
  redis.call('HSET', key, 'lease', '', 'status', 'dead', 'lastError', ARGV[4])
  redis.call('RPUSH', KEYS[3], ARGV[2])
  return 'dead_lettered'
end
redis.call('HSET', key, 'lease', '', 'status', 'pending', 'lastError', ARGV[4])
redis.call('RPUSH', KEYS[2], ARGV[2])
return 'requeued'`
  },
  // KEYS: expired | ARGV: id
  forgetNotice: {
    name: 'forgetNotice',
    lua: `return redis.call('LREM', KEYS[1], 0, ARGV[1])`
  }
}

// 中文注释：队列所需的最小 Redis 能力：只读命令 + 脚本执行；生产环境由 node-redis 客户端适配，测试使用进程内替身
export interface RedisQueueClient {
  connect(): Promise<void>
  quit(): Promise<void>
  ping(): Promise<string>
  hGetAll(key: string): Promise<Record<string, string>>
  lLen(key: string): Promise<number>
  lRange(key: string, start: number, stop: number): Promise<string[]>
  zCard(key: string): Promise<number>
  runScript(script: QueueScript, keys: string[], args: string[]): Promise<unknown>
}

export type RedisQueueOptions = QueueOptions & { prefix?: string; clock?: Clock; newId?: IdGenerator }

function replyStrings(reply: unknown): string[] {
  return Array.isArray(reply) ? reply.map(v => String(v)) : []
}

export class RedisQueue implements QueueBackend {
  readonly kind: QueueKind = 'redis'
  private readonly prefix: string
  private readonly maxAttempts: number
  private readonly clock: Clock
  private readonly newId: IdGenerator
  private connected = false

  constructor(private readonly client: RedisQueueClient, opts: RedisQueueOptions = {}) {
    this.prefix = opts.prefix ?? 'jobs'
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    this.clock = opts.clock ?? systemClock
    this.newId = opts.newId ?? defaultNewId
  }

  private get pendingKey() { return `${this.prefix}:pending` }
  private get inflightKey() { return `${this.prefix}:inflight` }
  private get deadKey() { return `${this.prefix}:dead` }
  private get expiredKey() { return `${this.prefix}:expired` }
  private get msgPrefix() { return `${this.prefix}:msg:` }

  private async call<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (e) {
      throw new BackendUnavailableError('redis-queue', `${op} failed: ${errorMessage(e)}`, { cause: e })
    }
  }

  async initialize(): Promise<void> {
    if (this.connected) return
    await this.call('connect', () => this.client.connect())
    this.connected = true
    logger.info('redis_queue_connected', { prefix: this.prefix })
  }

  async close(): Promise<void> {
    if (!this.connected) return
    this.connected = false
    await this.call('quit', () => this.client.quit())
  }

  async enqueue(message: QueueMessage): Promise<EnqueueReceipt> {
    const id = this.newId()
    await this.call('enqueue', () => this.client.runScript(QUEUE_SCRIPTS.enqueue, [this.pendingKey], [
      this.msgPrefix, id, message.jobId, this.clock().toISOString()
    ]))
    return { messageId: id }
  }

  async dequeue(visibilityTimeoutMs: number): Promise<QueueDelivery | null> {
    return this.call('dequeue', async () => {
      const now = this.clock().getTime()
      const dead = replyStrings(await this.client.runScript(QUEUE_SCRIPTS.reclaim,
        [this.inflightKey, this.pendingKey, this.deadKey, this.expiredKey],
        [this.msgPrefix, String(now), String(this.maxAttempts)]))
      if (dead.length) logger.warn('queue_messages_dead_lettered', { messageIds: dead })

      const leaseId = this.newId()
      const leased = replyStrings(await this.client.runScript(QUEUE_SCRIPTS.lease,
        [this.pendingKey, this.inflightKey],
        [this.msgPrefix, String(now + visibilityTimeoutMs), leaseId]))
      const [id, jobId, attempt, enqueuedAt] = leased
      if (id === undefined || jobId === undefined) return null
      return { handle: makeHandle(id, leaseId), messageId: id, jobId, attempt: Number(attempt), enqueuedAt: enqueuedAt ?? '' }
    })
  }

  async ack(handle: string): Promise<void> {
    const parsed = parseHandle(handle)
    if (!parsed) return
    await this.call('ack', () => this.client.runScript(QUEUE_SCRIPTS.ack, [this.inflightKey], [this.msgPrefix, parsed.messageId, parsed.leaseId]))
  }

  async fail(handle: string, error: string): Promise<FailOutcome> {
    const parsed = parseHandle(handle)
    if (!parsed) return 'ignored'
    const reply = await this.call('fail', () => this.client.runScript(QUEUE_SCRIPTS.fail,
      [this.inflightKey, this.pendingKey, this.deadKey],
      [this.msgPrefix, parsed.messageId, parsed.leaseId, error, String(this.maxAttempts)]))
    return reply === 'requeued' || reply === 'dead_lettered' ? reply : 'ignored'
  }

  async expiredDeadLetters(): Promise<DeadLetterNotice[]> {
    return this.call('expiredDeadLetters', async () => {
      const notices: DeadLetterNotice[] = []
      for (const id of await this.client.lRange(this.expiredKey, 0, -1)) {
        const msg = await this.client.hGetAll(`${this.msgPrefix}${id}`)
        if (!msg.jobId) continue
        notices.push({ messageId: id, jobId: msg.jobId, attempts: Number(msg.attempts || 0), error: msg.lastError ?? '' })
      }
      return notices
    })
  }

  async acknowledgeDeadLetter(messageId: string): Promise<void> {
    await this.call('acknowledgeDeadLetter', () => this.client.runScript(QUEUE_SCRIPTS.forgetNotice, [this.expiredKey], [messageId]))
  }

  async stats(): Promise<QueueStats> {
    return this.call('stats', async () => ({
      pending: await this.client.lLen(this.pendingKey),
      inFlight: await this.client.zCard(this.inflightKey),
      deadLettered: await this.client.lLen(this.deadKey)
    }))
  }

  async healthCheck(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG'
    } catch (e) {
      logger.warn('redis_queue_health_failed', { error: errorMessage(e) })
      return false
    }
  }
}
