export * from './domain/contracts/index.js'
export * from './domain/errors.js'
export { JOB_STAGE_ORDER, applyJobTransition, assertJobTransition, canTransition, isTerminal } from './domain/jobStateMachine.js'
export { APPROVAL_RULES, assertApprovalTransition, canApply, type ApprovalAction } from './domain/approvalStateMachine.js'
export { computeStats, weightedScore } from './domain/stats.js'
export { loadConfig, validateRuntimeConfig, assertScoringWeights, type ServiceConfig, type StorageConfig, type QueueConfig } from './config/config.js'
export { createStorage, MemoryStorage, FileStorage, SqliteStorage } from './infra/storage/index.js'
export { createQueue, adaptRedisClient, MemoryQueue, SqliteQueue, RedisQueue, type RedisQueueClient } from './infra/queue/index.js'
export { RemotePipeline } from './infra/pipeline/RemotePipeline.js'
export { JobService, type JobStatusResult, type ExecutionOutcome, type ProcessResult } from './app/services/JobService.js'
export { FeedbackService } from './app/services/FeedbackService.js'
export { JobWorker } from './app/services/JobWorker.js'
export { createApp, type AppDeps } from './interface/http/app.js'
export { buildContainer, type Container } from './bootstrap/container.js'
export { logger, setLogLevel } from './infra/log/logger.js'
