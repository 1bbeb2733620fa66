/*
功能：轻量日志器（JSON 行）
用途：在控制台输出结构化日志，便于本地/CI/收集系统统一检索与分析。
参数：
- logger.debug/info/warn/error(message: string, meta?: Record<string, unknown>)
- setLogLevel(level)：低于阈值的日志被丢弃（默认取 LOG_LEVEL，缺省 info）
返回：
- 无（副作用：输出一行 JSON 字符串到 stdout）
示例：
// logger.info('job_submitted', { jobId, correlationId })
*/
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogMeta = Record<string, unknown>

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

function initialLevel(): LogLevel {
  const v = String(process.env.LOG_LEVEL || 'info').toLowerCase()
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : 'info'
}

let threshold: LogLevel = initialLevel()

export function setLogLevel(level: LogLevel): void { threshold = level }
export function getLogLevel(): LogLevel { return threshold }

// 中文注释：Error 对象默认 JSON 化为 {}，这里展开为 name/message
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message }
  return value
}

function baseLog(level: LogLevel, message: string, meta?: LogMeta) {
  if (RANK[level] < RANK[threshold]) return
  let safeMeta: unknown
  try {
    // 避免循环引用
    safeMeta = meta === undefined ? undefined : JSON.parse(JSON.stringify(meta, replacer))
  } catch {
    safeMeta = { unserializable: true }
  }
  const line = { ts: new Date().toISOString(), level, message, meta: safeMeta }
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(line))
}

export const logger = {
  debug(message: string, meta?: LogMeta) { baseLog('debug', message, meta) },
  info(message: string, meta?: LogMeta) { baseLog('info', message, meta) },
  warn(message: string, meta?: LogMeta) { baseLog('warn', message, meta) },
  error(message: string, meta?: LogMeta) { baseLog('error', message, meta) }
}

export type Logger = typeof logger
