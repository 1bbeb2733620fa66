import { createClient } from 'redis'
import type { QueueBackend } from '../../domain/contracts/index.js'
import type { QueueConfig } from '../../config/config.js'
import type { Clock } from '../../utils/clock.js'
import type { IdGenerator } from '../../utils/ids.js'
import { logger } from '../log/logger.js'
import { MemoryQueue } from './MemoryQueue.js'
import { SqliteQueue } from './SqliteQueue.js'
import { RedisQueue, type RedisQueueClient } from './RedisQueue.js'

export { MemoryQueue, SqliteQueue, RedisQueue }
export type { RedisQueueClient }
export { QUEUE_SCRIPTS, type QueueScript } from './RedisQueue.js'

type NodeRedisClient = ReturnType<typeof createClient>

// 中文注释：将 node-redis v4 客户端收窄为队列所需的命令集；写操作均经 EVAL 原子执行
export function adaptRedisClient(client: NodeRedisClient): RedisQueueClient {
  return {
    connect: async () => { await client.connect() },
    quit: async () => { await client.quit() },
    ping: async () => String(await client.ping()),
    hGetAll: async key => {
      const raw = await client.hGetAll(key)
      return Object.fromEntries(Object.entries(raw).map(([k, v]) => [k, String(v)]))
    },
    lLen: async key => Number(await client.lLen(key)),
    lRange: async (key, start, stop) => (await client.lRange(key, start, stop)).map(String),
    zCard: async key => Number(await client.zCard(key)),
    runScript: (script, keys, args) => client.eval(script.lua, { keys, arguments: args })
  }
}

export type QueueFactoryOptions = {
  maxAttempts?: number
  clock?: Clock
  newId?: IdGenerator
  redisClient?: RedisQueueClient
}

export function createQueue(config: QueueConfig, opts: QueueFactoryOptions = {}): QueueBackend {
  const { redisClient, ...rest } = opts
  switch (config.kind) {
    case 'memory': return new MemoryQueue(rest)
    case 'sqlite': return new SqliteQueue({ path: config.path, ...rest })
    case 'redis': {
      const client = redisClient ?? adaptRedisClient(createRedisClient(config.url))
      return new RedisQueue(client, { prefix: config.keyPrefix, ...rest })
    }
  }
}

function createRedisClient(url: string): NodeRedisClient {
  const client = createClient({ url })
  client.on('error', (e: unknown) => logger.warn('redis_client_error', { error: e instanceof Error ? e.message : String(e) }))
  return client
}
