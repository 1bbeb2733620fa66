import type { BlogPost, JobStats, JobStatus, ScoringBreakdown, ScoringWeights } from './contracts/index.js'

export type PostStatsRow = Pick<BlogPost, 'approvalStatus' | 'createdAt' | 'approvedAt' | 'publishedAt'>

export function emptyStatusCounts(): Record<JobStatus, number> {
  return { pending: 0, fetching: 0, generating: 0, scoring: 0, refining: 0, completed: 0, failed: 0 }
}

const HOUR_MS = 60 * 60 * 1000

// 中文注释：各存储后端共用的统计口径；分母为零时返回 null
export function computeStats(jobStatuses: Iterable<JobStatus>, posts: Iterable<PostStatsRow>): JobStats {
  const jobsByStatus = emptyStatusCounts()
  let totalJobs = 0
  for (const s of jobStatuses) { jobsByStatus[s] += 1; totalJobs += 1 }

  let totalPosts = 0
  let pendingApproval = 0
  let approvedPosts = 0
  let rejectedPosts = 0
  let revisionRequested = 0
  let publishedPosts = 0
  let approvalHours = 0
  let approvalCount = 0
  for (const p of posts) {
    totalPosts += 1
    if (p.approvalStatus === 'pending') pendingApproval += 1
    else if (p.approvalStatus === 'approved') approvedPosts += 1
    else if (p.approvalStatus === 'rejected') rejectedPosts += 1
    else revisionRequested += 1
    if (p.publishedAt) publishedPosts += 1
    if (p.approvedAt) {
      approvalHours += (Date.parse(p.approvedAt) - Date.parse(p.createdAt)) / HOUR_MS
      approvalCount += 1
    }
  }

  return {
    totalJobs,
    jobsByStatus,
    totalPosts,
    pendingApproval,
    approvedPosts,
    rejectedPosts,
    revisionRequested,
    publishedPosts,
    approvalRate: totalPosts > 0 ? (approvedPosts / totalPosts) * 100 : null,
    avgApprovalTimeHours: approvalCount > 0 ? approvalHours / approvalCount : null
  }
}

/** 加权总分（权重需已通过 assertScoringWeights 校验） */
export function weightedScore(scoring: Omit<ScoringBreakdown, 'total' | 'reasoning'>, weights: ScoringWeights): number {
  return scoring.relevance * weights.relevance
    + scoring.originality * weights.originality
    + scoring.depth * weights.depth
    + scoring.clarity * weights.clarity
    + scoring.engagement * weights.engagement
}
