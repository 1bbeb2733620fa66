import { describe, it, expect, afterEach } from 'vitest'
import express from 'express'
import { timeoutMiddleware } from '../src/middleware/timeoutMiddleware.js'
import { requireRole } from '../src/middleware/authorization.js'
import { statusFor } from '../src/middleware/errorHandler.js'
import {
  BackendUnavailableError, InvalidTransitionError, JobNotCompletedError, NotFoundError, TerminalStateError, ValidationError
} from '../src/domain/errors.js'
import { listen, type Listening } from './support/http.js'

describe('statusFor', () => {
  it('maps domain errors to HTTP statuses', () => {
    expect(statusFor(new ValidationError('bad'))).toBe(400)
    expect(statusFor(new NotFoundError('post', 'p1'))).toBe(404)
    expect(statusFor(new InvalidTransitionError('pending', 'published'))).toBe(409)
    expect(statusFor(new TerminalStateError('j1', 'failed'))).toBe(409)
    expect(statusFor(new JobNotCompletedError('j1', 'pending'))).toBe(409)
    expect(statusFor(new BackendUnavailableError('storage.getJob', 'down'))).toBe(503)
    expect(statusFor(new Error('boom'))).toBe(500)
  })
})

describe('request middleware', () => {
  let server: Listening | undefined

  afterEach(async () => {
    await server?.close()
    server = undefined
  })

  it('answers 504 when a handler exceeds the hard timeout', async () => {
    const app = express()
    app.use(timeoutMiddleware({ softMs: 5, hardMs: 30 }))
    app.get('/slow', () => { /* never responds */ })
    server = await listen(app)
    const res = await fetch(`${server.url}/slow`)
    expect(res.status).toBe(504)
    expect(await res.json()).toEqual({ error: { code: 'REQUEST_TIMEOUT', message: 'request exceeded 30ms' } })
  })

  it('requires the configured role', async () => {
    const app = express()
    app.get('/guarded', requireRole('editor'), (_req, res) => { res.json({ ok: true }) })
    server = await listen(app)
    const denied = await fetch(`${server.url}/guarded`, { headers: { 'x-user-role': 'viewer' } })
    expect(denied.status).toBe(403)
    expect(await denied.json()).toEqual({ error: { code: 'FORBIDDEN', message: 'role "editor" required' } })
    const allowed = await fetch(`${server.url}/guarded`, { headers: { 'x-user-role': 'editor' } })
    expect(allowed.status).toBe(200)
  })
})
