/*
功能：超时包装（withTimeout）
用途：为存储/队列调用与流水线阶段设置上限，超时后抛出调用方指定的错误。
参数：
- withTimeout(promise, ms, onTimeout)
返回：
- Promise<T>，超时时以 onTimeout() 的错误拒绝
示例：
// await withTimeout(storage.getJob(id), 10000, () => new BackendUnavailableError('storage', 'timed out'))
*/
export class TimeoutError extends Error {
  constructor(public readonly ms: number, label = 'operation') {
    super(`${label} timed out after ${ms}ms`)
    this.name = 'TimeoutError'
  }
}

export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error = () => new TimeoutError(ms)): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return promise
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms)
  })
  return Promise.race([promise, timeout]).finally(() => { if (timer) clearTimeout(timer) })
}
