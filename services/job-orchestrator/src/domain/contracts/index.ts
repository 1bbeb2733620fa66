// 中文注释：领域层抽象接口（高内聚、低耦合，不依赖基础设施）

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }
export type JsonObject = { [key: string]: JsonValue }

// ---------- Job ----------

export const JOB_STATUSES = ['pending', 'fetching', 'generating', 'scoring', 'refining', 'completed', 'failed'] as const
export type JobStatus = typeof JOB_STATUSES[number]
export type ActiveJobStatus = Exclude<JobStatus, 'completed' | 'failed'>
export type TerminalJobStatus = Extract<JobStatus, 'completed' | 'failed'>
// 中文注释：流水线阶段（与状态一一对应，不含 pending 与终态）
export type JobStage = Exclude<ActiveJobStatus, 'pending'>

export type JobErrorCode =
  | 'NO_ARTICLES'
  | 'GENERATION_FAILED'
  | 'SCORING_FAILED'
  | 'REFINEMENT_FAILED'
  | 'STAGE_TIMEOUT'
  | 'PERSISTENCE_FAILED'
  | 'ENQUEUE_FAILED'
  | 'PIPELINE_ERROR'

export type JobError = { code: JobErrorCode; message: string; detail?: string; stage?: JobStage }

export type ScoringBreakdown = {
  relevance: number
  originality: number
  depth: number
  clarity: number
  engagement: number
  total: number
  reasoning: string
}

export type JobResult = {
  postId: string
  title: string
  topic: string
  wordCount: number
  sources: string[]
  scoring: ScoringBreakdown
  articlesFetched: number
  candidatesGenerated: number
}

type JobBase = {
  id: string
  correlationId?: string
  topics: string[]
  sources: string[]
  numCandidates: number
  maxResults: number
  createdAt: string
  updatedAt: string
  startedAt?: string
}

// 中文注释：用判别联合保证 result/error 只在终态出现且互斥
export type ActiveJob = JobBase & { status: ActiveJobStatus; completedAt?: undefined; result?: undefined; error?: undefined }
export type CompletedJob = JobBase & { status: 'completed'; completedAt: string; result: JobResult; error?: undefined }
export type FailedJob = JobBase & { status: 'failed'; completedAt: string; error: JobError; result?: undefined }
export type Job = ActiveJob | CompletedJob | FailedJob

export type JobDraft = {
  correlationId?: string
  topics: string[]
  sources: string[]
  numCandidates: number
  maxResults: number
}

export type JobSubmission = {
  topics?: string[]
  sources?: string[]
  numCandidates?: number
  maxResults?: number
  correlationId?: string
}

export type SubmitResult = {
  jobId: string
  correlationId?: string
  status: JobStatus
  isDuplicate: boolean
  message: string
}

export type JobTransition =
  | { from: ActiveJobStatus; to: ActiveJobStatus }
  | { from: ActiveJobStatus; to: 'completed'; result: JobResult }
  | { from: ActiveJobStatus; to: 'failed'; error: JobError }

// ---------- BlogPost ----------

export const APPROVAL_STATUSES = ['pending', 'approved', 'rejected', 'revision_requested'] as const
export type ApprovalStatus = typeof APPROVAL_STATUSES[number]

export type BlogPost = {
  id: string
  title: string
  content: string
  wordCount: number
  topic: string
  sources: string[]
  jobId?: string
  approvalStatus: ApprovalStatus
  approvalFeedback?: string
  scoring?: ScoringBreakdown
  metadata?: JsonObject
  createdAt: string
  updatedAt: string
  approvedAt?: string
  publishedAt?: string
}

export type PostDraft = {
  title: string
  content: string
  topic: string
  sources?: string[]
  jobId?: string
  scoring?: ScoringBreakdown
  metadata?: JsonObject
}

export type PostPatch = {
  title?: string
  content?: string
  topic?: string
  sources?: string[]
  metadata?: JsonObject
}

export type ApprovalInput = { feedback?: string; actor?: string; metadata?: JsonObject }
export type PublishInput = { actor?: string }
export type ResubmitInput = { title?: string; content?: string; actor?: string }

// ---------- History ----------

export const HISTORY_ACTIONS = ['submitted', 'started', 'completed', 'failed', 'approved', 'rejected', 'revision_requested', 'published'] as const
export type HistoryAction = typeof HISTORY_ACTIONS[number]

export type JobHistoryEntry = {
  id: string
  // 中文注释：手工创建、未关联作业的文章其历史不带 jobId
  jobId?: string
  postId?: string
  action: HistoryAction
  previousStatus?: string
  newStatus?: string
  actor?: string
  feedback?: string
  metadata?: JsonObject
  createdAt: string
}

export type HistoryDraft = Omit<JobHistoryEntry, 'id' | 'createdAt'>

// ---------- Stats / paging ----------

export type JobStats = {
  totalJobs: number
  jobsByStatus: Record<JobStatus, number>
  totalPosts: number
  pendingApproval: number
  approvedPosts: number
  rejectedPosts: number
  revisionRequested: number
  publishedPosts: number
  // 中文注释：分母为零时为 null（不适用），不做除零
  approvalRate: number | null
  avgApprovalTimeHours: number | null
}

export type Page = { limit: number; offset: number }
export type PostQuery = Partial<Page> & { approvalStatus?: ApprovalStatus; topic?: string }
export type JobQuery = Partial<Page> & { status?: JobStatus }

// ---------- Storage ----------

export type StorageKind = 'memory' | 'file' | 'sqlite'

export interface StorageBackend {
  readonly kind: StorageKind
  initialize(): Promise<void>
  close(): Promise<void>

  createJob(draft: JobDraft): Promise<Job>
  getJob(id: string): Promise<Job | null>
  getJobByCorrelationId(correlationId: string): Promise<Job | null>
  transitionJob(id: string, transition: JobTransition): Promise<Job>
  listJobs(query?: JobQuery): Promise<Job[]>

  createPost(draft: PostDraft): Promise<BlogPost>
  getPost(id: string): Promise<BlogPost | null>
  getPostByJobId(jobId: string): Promise<BlogPost | null>
  updatePost(id: string, patch: PostPatch): Promise<BlogPost | null>
  listPosts(query?: PostQuery): Promise<BlogPost[]>

  approvePost(id: string, input?: ApprovalInput): Promise<BlogPost | null>
  rejectPost(id: string, input: ApprovalInput): Promise<BlogPost | null>
  requestRevision(id: string, input: ApprovalInput): Promise<BlogPost | null>
  resubmitPost(id: string, input?: ResubmitInput): Promise<BlogPost | null>
  publishPost(id: string, input?: PublishInput): Promise<BlogPost | null>

  addHistoryEntry(draft: HistoryDraft): Promise<JobHistoryEntry>
  getJobHistory(jobId: string): Promise<JobHistoryEntry[]>
  getPostHistory(postId: string): Promise<JobHistoryEntry[]>

  getStats(): Promise<JobStats>
  healthCheck(): Promise<boolean>
}

// ---------- Queue ----------

export type QueueKind = 'memory' | 'sqlite' | 'redis'

export type QueueMessage = { jobId: string }
export type EnqueueReceipt = { messageId: string }
export type QueueDelivery = {
  handle: string
  messageId: string
  jobId: string
  attempt: number
  enqueuedAt: string
}
export type FailOutcome = 'requeued' | 'dead_lettered' | 'ignored'
// 中文注释：租约过期导致的死信；作业服务处理后调用 acknowledgeDeadLetter
export type DeadLetterNotice = { messageId: string; jobId: string; attempts: number; error: string }
export type QueueStats = { pending: number; inFlight: number; deadLettered: number }

export interface QueueBackend {
  readonly kind: QueueKind
  initialize(): Promise<void>
  close(): Promise<void>
  enqueue(message: QueueMessage): Promise<EnqueueReceipt>
  dequeue(visibilityTimeoutMs: number): Promise<QueueDelivery | null>
  ack(handle: string): Promise<void>
  fail(handle: string, error: string): Promise<FailOutcome>
  expiredDeadLetters(): Promise<DeadLetterNotice[]>
  acknowledgeDeadLetter(messageId: string): Promise<void>
  stats(): Promise<QueueStats>
  healthCheck(): Promise<boolean>
}

// ---------- Pipeline collaborators ----------

export type Article = {
  title: string
  url: string
  source: string
  summary: string
  topic: string
  thumbnail?: string
}

export type CandidatePost = { title: string; content: string; sources: string[]; topic: string }
export type PostScore = ScoringBreakdown
export type ScoredPost = { candidate: CandidatePost; score: PostScore }

export interface ContentPipeline {
  fetchAllArticles(topics: string[], sources: string[], maxResults: number): Promise<Article[]>
  generateCandidates(articles: Article[], numCandidates: number): Promise<CandidatePost[]>
  scoreCandidates(candidates: CandidatePost[]): Promise<ScoredPost[]>
  refineWinner(winner: ScoredPost): Promise<string>
}

export type ScoringWeights = {
  relevance: number
  originality: number
  depth: number
  clarity: number
  engagement: number
}

export const LIMITS = {
  MAX_LIST_LIMIT: 1000 as const,
  DEFAULT_LIST_LIMIT: 100 as const
}

// ---------- Feedback ----------

export const FEEDBACK_CATEGORIES = ['quality', 'relevance', 'accuracy', 'clarity', 'engagement', 'length', 'style', 'sources', 'other'] as const
export type FeedbackCategory = typeof FEEDBACK_CATEGORIES[number]

export type FeedbackRating = { category: FeedbackCategory; score: number; comment?: string }

export type ApproveRequest = { feedback?: string; actor?: string; ratings?: FeedbackRating[] }
export type RejectRequest = { feedback: string; actor?: string; categories?: FeedbackCategory[]; ratings?: FeedbackRating[] }

export type PostFeedback = {
  postId: string
  action: HistoryAction
  previousStatus?: string
  newStatus?: string
  actor?: string
  feedback?: string
  categories: FeedbackCategory[]
  ratings: FeedbackRating[]
  createdAt: string
}

export type TopicFeedbackStats = { topic: string; total: number; approved: number; rejected: number; revisions: number; approvalRate: number | null }

export type FeedbackStats = {
  totalPosts: number
  approvals: number
  rejections: number
  revisions: number
  approvalRate: number | null
  avgApprovalTimeHours: number | null
  commonRejectionCategories: { category: FeedbackCategory; count: number }[]
  avgRatingByCategory: Partial<Record<FeedbackCategory, number>>
  byTopic: TopicFeedbackStats[]
  avgScoreApproved: number | null
  avgScoreRejected: number | null
}

export type LearningExample = {
  postId: string
  title: string
  topic: string
  wordCount: number
  outcome: 'approved' | 'rejected'
  scoring?: ScoringBreakdown
  weightedScore: number | null
  feedback?: string
  categories: FeedbackCategory[]
  decidedAt?: string
}
