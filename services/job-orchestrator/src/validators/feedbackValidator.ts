import { FEEDBACK_CATEGORIES, type FeedbackCategory, type FeedbackRating } from '../domain/contracts/index.js'
import type { ValidationResult } from './submissionValidator.js'

export function isFeedbackCategory(v: unknown): v is FeedbackCategory {
  return FEEDBACK_CATEGORIES.some(c => c === v)
}

function get(obj: unknown, key: string): unknown {
  return typeof obj === 'object' && obj !== null ? Reflect.get(obj, key) : undefined
}

// 中文注释：评分为 1..5 的整数，类别取自封闭集合
export function validateRatings(v: unknown): ValidationResult<FeedbackRating[]> {
  if (v === undefined || v === null) return { valid: true, value: [] }
  if (!Array.isArray(v)) return { valid: false, errors: ['ratings must be an array'] }
  const errors: string[] = []
  const value: FeedbackRating[] = []
  v.forEach((item: unknown, i) => {
    const category = get(item, 'category')
    const score = get(item, 'score')
    const comment = get(item, 'comment')
    if (!isFeedbackCategory(category)) errors.push(`ratings[${i}].category must be one of ${FEEDBACK_CATEGORIES.join(', ')}`)
    if (typeof score !== 'number' || !Number.isInteger(score) || score < 1 || score > 5) errors.push(`ratings[${i}].score must be an integer between 1 and 5`)
    if (comment !== undefined && typeof comment !== 'string') errors.push(`ratings[${i}].comment must be a string`)
    if (isFeedbackCategory(category) && typeof score === 'number') {
      value.push(typeof comment === 'string' ? { category, score, comment } : { category, score })
    }
  })
  return errors.length ? { valid: false, errors } : { valid: true, value }
}

export function validateCategories(v: unknown): ValidationResult<FeedbackCategory[]> {
  if (v === undefined || v === null) return { valid: true, value: [] }
  if (!Array.isArray(v)) return { valid: false, errors: ['categories must be an array'] }
  const errors: string[] = []
  const value: FeedbackCategory[] = []
  v.forEach((item: unknown, i) => {
    if (isFeedbackCategory(item)) {
      if (!value.includes(item)) value.push(item)
    } else {
      errors.push(`categories[${i}] must be one of ${FEEDBACK_CATEGORIES.join(', ')}`)
    }
  })
  return errors.length ? { valid: false, errors } : { valid: true, value }
}
