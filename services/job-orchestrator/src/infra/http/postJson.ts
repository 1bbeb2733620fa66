// 中文注释：最小 JSON POST 客户端（Node 原生 fetch + AbortController 超时）
export type JsonResponse = { ok: boolean; status: number; body: unknown }

export class HttpTimeoutError extends Error {
  constructor(public readonly url: string, public readonly timeoutMs: number) {
    super(`request to ${url} timed out after ${timeoutMs}ms`)
    this.name = 'HttpTimeoutError'
  }
}

export async function postJson(url: string, body: unknown, timeoutMs: number, headers: Record<string, string> = {}): Promise<JsonResponse> {
  // 使用 AbortController 实现超时控制，避免请求无限挂起
  const controller = new AbortController()
  const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs)
  try {
    const resp = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: controller.signal
    })
    const text = await resp.text()
    let parsed: unknown = text
    if (text) {
      try { parsed = JSON.parse(text) } catch { parsed = text }
    }
    return { ok: resp.ok, status: resp.status, body: parsed }
  } catch (e) {
    if (controller.signal.aborted) throw new HttpTimeoutError(url, timeoutMs)
    throw e
  } finally {
    clearTimeout(timeoutHandle)
  }
}
