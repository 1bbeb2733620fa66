import type { Request, Response } from 'express'
import type { FeedbackService } from '../../../app/services/FeedbackService.js'
import { sendError } from '../../../middleware/errorHandler.js'
import { validateCategories, validateRatings } from '../../../validators/feedbackValidator.js'
import { ValidationError } from '../../../domain/errors.js'
import type { FeedbackCategory, FeedbackRating } from '../../../domain/contracts/index.js'
import { actorOf, bodyField, bodyString, queryApprovalStatus, queryInt, queryString } from './params.js'

function ratingsOf(req: Request): FeedbackRating[] {
  const r = validateRatings(bodyField(req, 'ratings'))
  if (!r.valid) throw new ValidationError(r.errors.join('; '), r.errors)
  return r.value
}

function categoriesOf(req: Request): FeedbackCategory[] {
  const c = validateCategories(bodyField(req, 'categories'))
  if (!c.valid) throw new ValidationError(c.errors.join('; '), c.errors)
  return c.value
}

// 中文注释：文章读取与审批动作路由
export function makePostsHandlers(feedback: FeedbackService) {
  const id = (req: Request) => String(req.params.id || '')
  return {
    list: async (req: Request, res: Response) => {
      try {
        const items = await feedback.listPosts({
          approvalStatus: queryApprovalStatus(req.query.status),
          topic: queryString(req.query.topic),
          limit: queryInt(req.query.limit),
          offset: queryInt(req.query.offset)
        })
        res.json({ items })
      } catch (e) { sendError(res, e) }
    },
    read: async (req: Request, res: Response) => {
      try { res.json(await feedback.getPost(id(req))) } catch (e) { sendError(res, e) }
    },
    history: async (req: Request, res: Response) => {
      try { res.json({ items: await feedback.getPostHistory(id(req)) }) } catch (e) { sendError(res, e) }
    },
    feedback: async (req: Request, res: Response) => {
      try { res.json({ items: await feedback.getPostFeedback(id(req)) }) } catch (e) { sendError(res, e) }
    },
    approve: async (req: Request, res: Response) => {
      try {
        res.json(await feedback.approvePost(id(req), { feedback: bodyString(req, 'feedback'), actor: actorOf(req), ratings: ratingsOf(req) }))
      } catch (e) { sendError(res, e) }
    },
    reject: async (req: Request, res: Response) => {
      try {
        res.json(await feedback.rejectPost(id(req), {
          feedback: bodyString(req, 'feedback') ?? '',
          actor: actorOf(req),
          categories: categoriesOf(req),
          ratings: ratingsOf(req)
        }))
      } catch (e) { sendError(res, e) }
    },
    revision: async (req: Request, res: Response) => {
      try {
        res.json(await feedback.requestRevision(id(req), {
          feedback: bodyString(req, 'feedback') ?? '',
          actor: actorOf(req),
          categories: categoriesOf(req),
          ratings: ratingsOf(req)
        }))
      } catch (e) { sendError(res, e) }
    },
    resubmit: async (req: Request, res: Response) => {
      try {
        res.json(await feedback.resubmitPost(id(req), { title: bodyString(req, 'title'), content: bodyString(req, 'content'), actor: actorOf(req) }))
      } catch (e) { sendError(res, e) }
    },
    publish: async (req: Request, res: Response) => {
      try { res.json(await feedback.publishPost(id(req), { actor: actorOf(req) })) } catch (e) { sendError(res, e) }
    }
  }
}
