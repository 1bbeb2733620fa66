import { randomUUID } from 'crypto'

// 中文注释：统一 ID 生成入口，测试可注入确定性实现
export type IdGenerator = () => string

export const newId: IdGenerator = () => randomUUID()
