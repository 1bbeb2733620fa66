// 中文注释：可注入时钟；存储与队列的时间戳、租约到期均从这里取
export type Clock = () => Date

export const systemClock: Clock = () => new Date()

export function isoNow(clock: Clock = systemClock): string {
  return clock().toISOString()
}

/** 测试用手动时钟：advance(ms) 前进时间 */
export function manualClock(start = '2024-01-01T00:00:00.000Z') {
  let t = new Date(start).getTime()
  const clock: Clock = () => new Date(t)
  return {
    clock,
    advance(ms: number) { t += ms },
    set(iso: string) { t = new Date(iso).getTime() }
  }
}
