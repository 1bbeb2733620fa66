import { BackendUnavailableError, JobOrchestratorError, errorMessage } from '../../domain/errors.js'
import { withTimeout } from '../../utils/timeout.js'

// 中文注释：存储/队列调用的统一上限；领域错误原样抛出，其余错误视为后端不可用
export async function callBackend<T>(op: string, promise: Promise<T>, timeoutMs: number): Promise<T> {
  try {
    return await withTimeout(promise, timeoutMs, () => new BackendUnavailableError(op, `timed out after ${timeoutMs}ms`))
  } catch (e) {
    if (e instanceof JobOrchestratorError) throw e
    throw new BackendUnavailableError(op, errorMessage(e), { cause: e })
  }
}
