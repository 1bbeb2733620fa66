import fs from 'fs'
import path from 'path'
import type { StorageKind } from '../../domain/contracts/index.js'
import { BackendUnavailableError, errorMessage } from '../../domain/errors.js'
import { logger } from '../log/logger.js'
import { MemoryStorage, type MemoryStorageOptions, type StorageSnapshot, type StorageState } from './MemoryStorage.js'

const SNAPSHOT_FILE = 'storage.json'

function isSnapshot(v: unknown): v is StorageSnapshot {
  if (typeof v !== 'object' || v === null) return false
  return Array.isArray(Reflect.get(v, 'jobs')) && Array.isArray(Reflect.get(v, 'posts')) && Array.isArray(Reflect.get(v, 'history'))
}

// 中文注释：单写者 JSON 快照存储；每次提交先写出包含新状态的快照（临时文件 + rename），成功后才生效
export class FileStorage extends MemoryStorage {
  readonly kind: StorageKind = 'file'
  private initialized = false
  private readonly file: string

  constructor(private readonly dir: string, opts: MemoryStorageOptions = {}) {
    super(opts)
    this.file = path.join(dir, SNAPSHOT_FILE)
  }

  async initialize(): Promise<void> {
    if (this.initialized) return
    try {
      await fs.promises.mkdir(this.dir, { recursive: true })
      if (fs.existsSync(this.file)) {
        const parsed: unknown = JSON.parse(await fs.promises.readFile(this.file, 'utf8'))
        if (!isSnapshot(parsed)) throw new Error(`${this.file} is not a storage snapshot`)
        this.restore(parsed)
      } else {
        await this.writeSnapshot(this.state)
      }
    } catch (e) {
      throw new BackendUnavailableError('file-storage', errorMessage(e), { cause: e })
    }
    this.initialized = true
    logger.info('file_storage_initialized', { file: this.file, jobs: this.state.jobs.size, posts: this.state.posts.size })
  }

  async healthCheck(): Promise<boolean> {
    try {
      await fs.promises.access(this.dir, fs.constants.W_OK)
      return true
    } catch {
      return false
    }
  }

  protected async persist(draft: StorageState): Promise<void> {
    try {
      await this.writeSnapshot(draft)
    } catch (e) {
      logger.warn('file_storage_write_failed', { file: this.file, error: errorMessage(e) })
      throw new BackendUnavailableError('file-storage', errorMessage(e), { cause: e })
    }
  }

  private async writeSnapshot(state: StorageState): Promise<void> {
    const tmp = `${this.file}.${process.pid}.tmp`
    await fs.promises.writeFile(tmp, JSON.stringify(this.snapshot(state), null, 2), 'utf8')
    await fs.promises.rename(tmp, this.file)
  }
}
