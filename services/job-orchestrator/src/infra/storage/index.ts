import type { StorageBackend } from '../../domain/contracts/index.js'
import type { StorageConfig } from '../../config/config.js'
import type { Clock } from '../../utils/clock.js'
import type { IdGenerator } from '../../utils/ids.js'
import { MemoryStorage } from './MemoryStorage.js'
import { FileStorage } from './FileStorage.js'
import { SqliteStorage } from './SqliteStorage.js'

export { MemoryStorage, FileStorage, SqliteStorage }

// 中文注释：按配置选择存储后端（封闭联合，新增后端需同时扩展 StorageConfig）
export function createStorage(config: StorageConfig, opts: { clock?: Clock; newId?: IdGenerator } = {}): StorageBackend {
  switch (config.kind) {
    case 'memory': return new MemoryStorage(opts)
    case 'file': return new FileStorage(config.dir, opts)
    case 'sqlite': return new SqliteStorage({ path: config.path, ...opts })
  }
}
