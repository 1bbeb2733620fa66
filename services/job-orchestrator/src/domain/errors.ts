/*
功能：错误分类（JobOrchestratorError 及其子类）
用途：统一错误码与可重试标记，供服务层、HTTP 层与作业错误归类使用。
示例：
// throw new ValidationError('topics[0] must not be empty')
*/
import type { Job } from './contracts/index.js'

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_TRANSITION'
  | 'TERMINAL_STATE'
  | 'NOT_FOUND'
  | 'BACKEND_UNAVAILABLE'
  | 'DUPLICATE_JOB'
  | 'GENERATION_ERROR'
  | 'SCORING_ERROR'
  | 'PIPELINE_ERROR'
  | 'JOB_NOT_COMPLETED'

export class JobOrchestratorError extends Error {
  constructor(message: string, public readonly code: ErrorCode, public readonly retryable = false) {
    super(message)
    this.name = 'JobOrchestratorError'
  }
}

export class ValidationError extends JobOrchestratorError {
  constructor(message: string, public readonly issues: string[] = [message]) {
    super(message, 'VALIDATION_ERROR')
    this.name = 'ValidationError'
  }
}

export class InvalidTransitionError extends JobOrchestratorError {
  constructor(public readonly from: string, public readonly to: string, message?: string) {
    super(message ?? `invalid transition ${from} -> ${to}`, 'INVALID_TRANSITION')
    this.name = 'InvalidTransitionError'
  }
}

export class TerminalStateError extends JobOrchestratorError {
  constructor(public readonly jobId: string, public readonly status: string) {
    super(`job ${jobId} is already ${status}`, 'TERMINAL_STATE')
    this.name = 'TerminalStateError'
  }
}

export class NotFoundError extends JobOrchestratorError {
  constructor(public readonly entity: 'job' | 'post', public readonly id: string) {
    super(`${entity} ${id} not found`, 'NOT_FOUND')
    this.name = 'NotFoundError'
  }
}

export class BackendUnavailableError extends JobOrchestratorError {
  constructor(public readonly backend: string, message: string, options?: { cause?: unknown }) {
    super(`${backend}: ${message}`, 'BACKEND_UNAVAILABLE', true)
    this.name = 'BackendUnavailableError'
    if (options && 'cause' in options) this.cause = options.cause
  }
}

// 中文注释：存储层在关联 ID 冲突时抛出，携带仍存活的作业
export class DuplicateJobError extends JobOrchestratorError {
  constructor(public readonly existing: Job) {
    super(`job ${existing.id} already holds correlation id ${existing.correlationId ?? ''}`, 'DUPLICATE_JOB')
    this.name = 'DuplicateJobError'
  }
}

export class GenerationError extends JobOrchestratorError {
  constructor(message: string) {
    super(message, 'GENERATION_ERROR')
    this.name = 'GenerationError'
  }
}

export class ScoringError extends JobOrchestratorError {
  constructor(message: string) {
    super(message, 'SCORING_ERROR')
    this.name = 'ScoringError'
  }
}

export class PipelineError extends JobOrchestratorError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'PIPELINE_ERROR', true)
    this.name = 'PipelineError'
  }
}

export class JobNotCompletedError extends JobOrchestratorError {
  constructor(public readonly jobId: string, public readonly status: string) {
    super(`job ${jobId} is ${status}, no preview until it completes`, 'JOB_NOT_COMPLETED')
    this.name = 'JobNotCompletedError'
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
