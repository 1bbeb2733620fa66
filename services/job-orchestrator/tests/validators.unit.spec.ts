import { describe, it, expect } from 'vitest'
import { validateSubmission } from '../src/validators/submissionValidator.js'
import { validateCategories, validateRatings } from '../src/validators/feedbackValidator.js'

const rules = { defaultTopics: ['dev tools'], allowedSources: ['hacker_news', 'web'] }

describe('validateSubmission', () => {
  it('normalises and dedupes a valid submission', () => {
    expect(validateSubmission({ topics: [' ai ', 'ai'], sources: ['web', 'web'], numCandidates: 5, maxResults: 50, correlationId: 'abc' }, rules)).toEqual({
      valid: true,
      value: { correlationId: 'abc', topics: ['ai'], sources: ['web'], numCandidates: 5, maxResults: 50 }
    })
  })

  it('applies defaults for missing or empty fields', () => {
    expect(validateSubmission(undefined, rules)).toEqual({
      valid: true,
      value: { correlationId: undefined, topics: ['dev tools'], sources: ['hacker_news', 'web'], numCandidates: 3, maxResults: 10 }
    })
    const r = validateSubmission({ topics: [], sources: [] }, rules)
    expect(r.valid && r.value.topics).toEqual(['dev tools'])
  })

  it('rejects non-object input', () => {
    expect(validateSubmission('topics', rules)).toEqual({ valid: false, errors: ['submission must be an object'] })
    expect(validateSubmission([1], rules)).toEqual({ valid: false, errors: ['submission must be an object'] })
  })

  it('collects every problem', () => {
    expect(validateSubmission({
      topics: 'ai',
      sources: ['tiktok'],
      numCandidates: 0,
      maxResults: 51,
      correlationId: 'x'.repeat(129)
    }, rules)).toEqual({
      valid: false,
      errors: [
        'topics must be an array of strings',
        'unknown source "tiktok" (allowed: hacker_news, web)',
        'numCandidates must be an integer between 1 and 10',
        'maxResults must be an integer between 1 and 50',
        'correlationId must be at most 128 characters'
      ]
    })
  })

  it('rejects blank correlation ids and fractional counts', () => {
    expect(validateSubmission({ correlationId: ' ', numCandidates: 2.5 }, rules)).toEqual({
      valid: false,
      errors: ['numCandidates must be an integer between 1 and 10', 'correlationId must be a non-empty string']
    })
  })
})

describe('feedback validators', () => {
  it('accepts ratings in range', () => {
    expect(validateRatings([{ category: 'style', score: 1, comment: 'dry' }])).toEqual({ valid: true, value: [{ category: 'style', score: 1, comment: 'dry' }] })
    expect(validateRatings(undefined)).toEqual({ valid: true, value: [] })
  })

  it('reports bad ratings', () => {
    expect(validateRatings([{ category: 'vibes', score: 3 }])).toEqual({
      valid: false,
      errors: ['ratings[0].category must be one of quality, relevance, accuracy, clarity, engagement, length, style, sources, other']
    })
    expect(validateRatings({})).toEqual({ valid: false, errors: ['ratings must be an array'] })
  })

  it('dedupes categories and rejects unknown ones', () => {
    expect(validateCategories(['length', 'length', 'other'])).toEqual({ valid: true, value: ['length', 'other'] })
    expect(validateCategories(['length', 'vibes'])).toEqual({
      valid: false,
      errors: ['categories[1] must be one of quality, relevance, accuracy, clarity, engagement, length, style, sources, other']
    })
  })
})
