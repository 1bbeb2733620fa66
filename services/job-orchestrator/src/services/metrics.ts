/**
 * 轻量指标服务（进程内计数器）
 *
 * 提供通用计数器接口 incrementMetric/getMetric/resetMetrics，
 * 以及作业提交、状态迁移、审批动作的具名计数，由 /metrics 路由输出快照。
 */
import type { JobStatus } from '../domain/contracts/index.js'
import type { ApprovalAction } from '../domain/approvalStateMachine.js'

const counters = new Map<string, number>()

export function incrementMetric(name: string, value = 1): void {
  counters.set(name, (counters.get(name) ?? 0) + value)
}

export function getMetric(name: string): number {
  return counters.get(name) ?? 0
}

export function resetMetrics(): void {
  counters.clear()
}

export function snapshotMetrics(): Record<string, number> {
  return Object.fromEntries([...counters.entries()].sort(([a], [b]) => a.localeCompare(b)))
}

export function recordJobSubmission(isDuplicate: boolean): void {
  incrementMetric(isDuplicate ? 'jobs_submitted_duplicate' : 'jobs_submitted_new')
}

export function recordJobTransition(to: JobStatus): void {
  incrementMetric(`job_transition_${to}`)
}

export function recordApprovalAction(action: ApprovalAction): void {
  incrementMetric(`approval_${action}`)
}

export function recordQueueOutcome(outcome: 'acked' | 'requeued' | 'dead_lettered' | 'ignored' | 'superseded'): void {
  incrementMetric(`queue_${outcome}`)
}
