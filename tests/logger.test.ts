import { afterEach, describe, expect, it, vi } from 'vitest'

import { logger, setLoggerMuted } from '../src/core/logger.js'

function captureStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
}

describe('logger', () => {
  afterEach(() => {
    setLoggerMuted(false)
    vi.restoreAllMocks()
  })

  it('suppresses output when muted', () => {
    const spy = captureStderr()
    setLoggerMuted(true)
    logger.info('test.event', { ok: true })
    expect(spy).not.toHaveBeenCalled()
  })

  it('writes one JSON line per event to stderr', () => {
    const spy = captureStderr()
    logger.warn('session.turn.failed', { kind: 'transport' })

    expect(spy).toHaveBeenCalledTimes(1)
    const line = String(spy.mock.calls[0]?.[0])
    expect(line.endsWith('\n')).toBe(true)
    expect(JSON.parse(line)).toMatchObject({ level: 'WARN', event: 'session.turn.failed', kind: 'transport' })
  })

  it('never writes credential fields', () => {
    const spy = captureStderr()
    logger.error('chat.request', { apiKey: 'test-secret', model: 'gemini-2.5-flash' })

    const payload = JSON.parse(String(spy.mock.calls[0]?.[0]))
    expect(payload.apiKey).toBe('[redacted]')
    expect(payload.model).toBe('gemini-2.5-flash')
  })
})
