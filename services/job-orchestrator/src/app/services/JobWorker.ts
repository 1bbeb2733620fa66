import type { JobService, ProcessResult } from './JobService.js'
import { errorMessage } from '../../domain/errors.js'
import { logger } from '../../infra/log/logger.js'

export type JobWorkerOptions = { pollIntervalMs: number; name?: string }

// 中文注释：轮询 worker；队列有消息时连续处理，空闲或出错时等待 pollIntervalMs
export class JobWorker {
  private running = false
  private timer: NodeJS.Timeout | null = null
  private current: Promise<void> | null = null
  private readonly name: string

  constructor(private readonly jobs: JobService, private readonly opts: JobWorkerOptions) {
    this.name = opts.name ?? 'worker'
  }

  get isRunning(): boolean { return this.running }

  start(): void {
    if (this.running) return
    this.running = true
    logger.info('worker_started', { worker: this.name, pollIntervalMs: this.opts.pollIntervalMs })
    this.schedule(0)
  }

  async stop(): Promise<void> {
    this.running = false
    if (this.timer) { clearTimeout(this.timer); this.timer = null }
    if (this.current) await this.current
    logger.info('worker_stopped', { worker: this.name })
  }

  private schedule(delayMs: number) {
    if (!this.running) return
    this.timer = setTimeout(() => {
      this.timer = null
      this.current = this.tick().finally(() => { this.current = null })
    }, delayMs)
  }

  private async tick(): Promise<void> {
    let result: ProcessResult | null = null
    try {
      result = await this.jobs.processNext()
    } catch (e) {
      logger.error('worker_tick_failed', { worker: this.name, error: errorMessage(e) })
    }
    this.schedule(result && result.state !== 'idle' ? 0 : this.opts.pollIntervalMs)
  }

  /** 处理队列直到为空（用于单次运行与测试），返回处理结果 */
  async drain(maxMessages = Number.POSITIVE_INFINITY): Promise<ProcessResult[]> {
    const results: ProcessResult[] = []
    while (results.length < maxMessages) {
      const r = await this.jobs.processNext()
      if (r.state === 'idle') break
      results.push(r)
    }
    return results
  }
}
