import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import type { QueueBackend } from '../src/domain/contracts/index.js'
import { BackendUnavailableError } from '../src/domain/errors.js'
import { MemoryQueue } from '../src/infra/queue/MemoryQueue.js'
import { SqliteQueue } from '../src/infra/queue/SqliteQueue.js'
import { RedisQueue } from '../src/infra/queue/RedisQueue.js'
import { makeHandle, parseHandle } from '../src/infra/queue/handles.js'
import { manualClock, type Clock } from '../src/utils/clock.js'
import { FakeRedis } from './support/fakeRedis.js'
import { sequentialIds } from './support/fixtures.js'

type Factory = { name: string; make: (clock: Clock) => QueueBackend }

const MAX_ATTEMPTS = 2
const LEASE_MS = 1000

const backends: Factory[] = [
  { name: 'memory', make: clock => new MemoryQueue({ clock, newId: sequentialIds('m'), maxAttempts: MAX_ATTEMPTS }) },
  { name: 'sqlite', make: clock => new SqliteQueue({ path: ':memory:', clock, newId: sequentialIds('m'), maxAttempts: MAX_ATTEMPTS }) },
  { name: 'redis', make: clock => new RedisQueue(new FakeRedis(), { prefix: 'test', clock, newId: sequentialIds('m'), maxAttempts: MAX_ATTEMPTS }) }
]

describe('queue handles', () => {
  it('round-trips message and lease ids', () => {
    expect(parseHandle(makeHandle('msg-1', 'lease-1'))).toEqual({ messageId: 'msg-1', leaseId: 'lease-1' })
  })

  it('rejects malformed handles', () => {
    expect(parseHandle('no-separator')).toBeNull()
    expect(parseHandle('~lease')).toBeNull()
    expect(parseHandle('msg~')).toBeNull()
  })
})

describe.each(backends)('$name queue backend', ({ make }) => {
  let queue: QueueBackend
  let time: ReturnType<typeof manualClock>

  beforeEach(async () => {
    time = manualClock()
    queue = make(time.clock)
    await queue.initialize()
  })

  afterEach(async () => {
    await queue.close()
  })

  it('delivers in FIFO order and returns null when empty', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    await queue.enqueue({ jobId: 'job-b' })
    const first = await queue.dequeue(LEASE_MS)
    const second = await queue.dequeue(LEASE_MS)
    expect(first?.jobId).toBe('job-a')
    expect(second?.jobId).toBe('job-b')
    expect(await queue.dequeue(LEASE_MS)).toBeNull()
  })

  it('describes the delivery', async () => {
    const { messageId } = await queue.enqueue({ jobId: 'job-a' })
    const delivery = await queue.dequeue(LEASE_MS)
    expect(delivery?.messageId).toBe(messageId)
    expect(delivery?.attempt).toBe(1)
    expect(delivery?.enqueuedAt).toBe('2024-01-01T00:00:00.000Z')
    expect(parseHandle(delivery?.handle ?? '')?.messageId).toBe(messageId)
    expect(await queue.stats()).toEqual({ pending: 0, inFlight: 1, deadLettered: 0 })
  })

  it('removes acknowledged messages and treats repeated acks as no-ops', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    const delivery = await queue.dequeue(LEASE_MS)
    const handle = delivery?.handle ?? ''
    await queue.ack(handle)
    await queue.ack(handle)
    await queue.ack('garbage')
    expect(await queue.stats()).toEqual({ pending: 0, inFlight: 0, deadLettered: 0 })
    time.advance(LEASE_MS * 2)
    expect(await queue.dequeue(LEASE_MS)).toBeNull()
  })

  it('keeps a lease invisible until its deadline', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    await queue.dequeue(LEASE_MS)
    time.advance(LEASE_MS - 1)
    expect(await queue.dequeue(LEASE_MS)).toBeNull()
  })

  it('redelivers an expired lease under a new handle', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    const first = await queue.dequeue(LEASE_MS)
    time.advance(LEASE_MS)
    const second = await queue.dequeue(LEASE_MS)
    expect(second?.jobId).toBe('job-a')
    expect(second?.attempt).toBe(2)
    expect(second?.handle).not.toBe(first?.handle)

    // 旧句柄已失效
    expect(await queue.fail(first?.handle ?? '', 'late')).toBe('ignored')
    await queue.ack(first?.handle ?? '')
    expect(await queue.stats()).toEqual({ pending: 0, inFlight: 1, deadLettered: 0 })
    await queue.ack(second?.handle ?? '')
    expect(await queue.stats()).toEqual({ pending: 0, inFlight: 0, deadLettered: 0 })
  })

  it('requeues a failed message behind the waiting ones', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    await queue.enqueue({ jobId: 'job-b' })
    const a = await queue.dequeue(LEASE_MS)
    expect(await queue.fail(a?.handle ?? '', 'transient')).toBe('requeued')
    expect((await queue.dequeue(LEASE_MS))?.jobId).toBe('job-b')
    const again = await queue.dequeue(LEASE_MS)
    expect(again?.jobId).toBe('job-a')
    expect(again?.attempt).toBe(2)
  })

  it('dead-letters a message once attempts are exhausted', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    const first = await queue.dequeue(LEASE_MS)
    expect(await queue.fail(first?.handle ?? '', 'boom')).toBe('requeued')
    const second = await queue.dequeue(LEASE_MS)
    expect(await queue.fail(second?.handle ?? '', 'boom')).toBe('dead_lettered')
    expect(await queue.dequeue(LEASE_MS)).toBeNull()
    expect(await queue.stats()).toEqual({ pending: 0, inFlight: 0, deadLettered: 1 })
  })

  it('dead-letters an expired lease that used its last attempt', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    await queue.dequeue(LEASE_MS)
    time.advance(LEASE_MS)
    await queue.dequeue(LEASE_MS)
    time.advance(LEASE_MS)
    expect(await queue.dequeue(LEASE_MS)).toBeNull()
    expect(await queue.stats()).toEqual({ pending: 0, inFlight: 0, deadLettered: 1 })
  })

  it('reports expired dead letters until they are acknowledged', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    await queue.dequeue(LEASE_MS)
    time.advance(LEASE_MS)
    await queue.dequeue(LEASE_MS)
    time.advance(LEASE_MS)
    expect(await queue.dequeue(LEASE_MS)).toBeNull()
    expect(await queue.expiredDeadLetters()).toEqual([
      { messageId: 'm-1', jobId: 'job-a', attempts: 2, error: 'visibility timeout expired' }
    ])
    await queue.acknowledgeDeadLetter('m-1')
    expect(await queue.expiredDeadLetters()).toEqual([])
    expect(await queue.stats()).toEqual({ pending: 0, inFlight: 0, deadLettered: 1 })
  })

  it('keeps the failure reason of a requeued message that later expires', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    const first = await queue.dequeue(LEASE_MS)
    expect(await queue.fail(first?.handle ?? '', 'boom')).toBe('requeued')
    await queue.dequeue(LEASE_MS)
    time.advance(LEASE_MS)
    expect(await queue.dequeue(LEASE_MS)).toBeNull()
    expect(await queue.expiredDeadLetters()).toEqual([
      { messageId: 'm-1', jobId: 'job-a', attempts: 2, error: 'boom' }
    ])
  })

  it('does not report messages dead-lettered through fail', async () => {
    await queue.enqueue({ jobId: 'job-a' })
    const first = await queue.dequeue(LEASE_MS)
    await queue.fail(first?.handle ?? '', 'boom')
    const second = await queue.dequeue(LEASE_MS)
    expect(await queue.fail(second?.handle ?? '', 'boom')).toBe('dead_lettered')
    expect(await queue.expiredDeadLetters()).toEqual([])
  })

  it('ignores failures for unknown handles', async () => {
    expect(await queue.fail('garbage', 'x')).toBe('ignored')
    expect(await queue.fail(makeHandle('missing', 'lease'), 'x')).toBe('ignored')
  })

  it('reports healthy', async () => {
    expect(await queue.healthCheck()).toBe(true)
  })
})

describe('redis queue connectivity', () => {
  it('surfaces client errors as BackendUnavailableError', async () => {
    const redis = new FakeRedis()
    const queue = new RedisQueue(redis)
    await queue.initialize()
    redis.failNext()
    await expect(queue.enqueue({ jobId: 'job-a' })).rejects.toBeInstanceOf(BackendUnavailableError)
    redis.failNext()
    await expect(queue.dequeue(LEASE_MS)).rejects.toThrow('redis-queue: dequeue failed: ECONNREFUSED')
  })

  it('leaves the message pending when a dequeue fails', async () => {
    const redis = new FakeRedis()
    const queue = new RedisQueue(redis, { prefix: 'blog', newId: sequentialIds('m') })
    await queue.enqueue({ jobId: 'job-a' })
    redis.failNext()
    await expect(queue.dequeue(LEASE_MS)).rejects.toBeInstanceOf(BackendUnavailableError)
    expect(redis.lists.get('blog:pending')).toEqual(['m-1'])
    expect(redis.hashes.get('blog:msg:m-1')?.get('status')).toBe('pending')
    const delivery = await queue.dequeue(LEASE_MS)
    expect(delivery?.jobId).toBe('job-a')
    expect(delivery?.attempt).toBe(1)
    expect(redis.lists.get('blog:pending')).toEqual([])
    expect(redis.zsets.get('blog:inflight')?.has('m-1')).toBe(true)
  })

  it('skips pending ids whose message hash is gone', async () => {
    const redis = new FakeRedis()
    const queue = new RedisQueue(redis, { prefix: 'blog', newId: sequentialIds('m') })
    await queue.enqueue({ jobId: 'job-a' })
    await queue.enqueue({ jobId: 'job-b' })
    redis.hashes.delete('blog:msg:m-1')
    expect((await queue.dequeue(LEASE_MS))?.jobId).toBe('job-b')
    expect(await queue.stats()).toEqual({ pending: 0, inFlight: 1, deadLettered: 0 })
  })

  it('reports unhealthy when ping fails', async () => {
    const redis = new FakeRedis()
    const queue = new RedisQueue(redis)
    redis.failNext()
    expect(await queue.healthCheck()).toBe(false)
  })

  it('stores messages under the key prefix', async () => {
    const redis = new FakeRedis()
    const queue = new RedisQueue(redis, { prefix: 'blog', newId: sequentialIds('m') })
    await queue.initialize()
    expect(redis.connected).toBe(true)
    await queue.enqueue({ jobId: 'job-a' })
    expect(redis.lists.get('blog:pending')).toEqual(['m-1'])
    expect(redis.hashes.get('blog:msg:m-1')?.get('jobId')).toBe('job-a')
    await queue.close()
    expect(redis.connected).toBe(false)
  })
})

describe('sqlite queue durability', () => {
  let dir: string

  beforeEach(() => { dir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-queue-')) })
  afterEach(() => { fs.rmSync(dir, { recursive: true, force: true }) })

  it('keeps pending messages across reopen', async () => {
    const file = path.join(dir, 'queue.db')
    const first = new SqliteQueue({ path: file })
    await first.initialize()
    await first.enqueue({ jobId: 'job-a' })
    await first.close()

    const second = new SqliteQueue({ path: file })
    await second.initialize()
    expect((await second.dequeue(LEASE_MS))?.jobId).toBe('job-a')
    await second.close()
  })
})
