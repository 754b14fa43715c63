import { describe, it, expect } from 'vitest'
import { BODY_EXCERPT_LENGTH, parseRetryAfter, toResponseSignal } from './response-signal.js'

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('120', 0)).toBe(120_000)
    expect(parseRetryAfter(' 5 ', 0)).toBe(5_000)
  })

  it('reads an HTTP date relative to now', () => {
    const at = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT')

    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT', at - 30_000)).toBe(30_000)
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT', at + 5_000)).toBe(0)
  })

  it('gives undefined for missing or unreadable values', () => {
    expect(parseRetryAfter(undefined, 0)).toBeUndefined()
    expect(parseRetryAfter('', 0)).toBeUndefined()
    expect(parseRetryAfter('soon', 0)).toBeUndefined()
  })
})

describe('toResponseSignal', () => {
  it('normalizes headers and reads Retry-After', () => {
    const signal = toResponseSignal({
      status: 429,
      headers: { 'Retry-After': '45', 'Set-Cookie': ['a=1', 'b=2'], 'X-Empty': undefined },
      body: 'slow down'
    })

    expect(signal).toEqual({
      status: 429,
      bodyExcerpt: 'slow down',
      captchaDetected: false,
      headers: { 'retry-after': '45', 'set-cookie': 'a=1, b=2' },
      retryAfterMs: 45_000
    })
  })

  it('omits retryAfterMs without a usable header', () => {
    const signal = toResponseSignal({ status: 200, headers: { 'retry-after': 'later' } })

    expect(signal).not.toHaveProperty('retryAfterMs')
    expect(signal.bodyExcerpt).toBe('')
  })

  it('keeps only the start of long bodies', () => {
    const signal = toResponseSignal({ status: 200, body: 'x'.repeat(3_000) })

    expect(signal.bodyExcerpt).toHaveLength(BODY_EXCERPT_LENGTH)
  })

  it('decodes buffers and serializes objects', () => {
    expect(toResponseSignal({ status: 200, body: Buffer.from('Access denied') }).bodyExcerpt).toBe(
      'Access denied'
    )
    expect(toResponseSignal({ status: 200, body: { error: 'blocked' } }).bodyExcerpt).toBe(
      '{"error":"blocked"}'
    )
  })

  it('flags CAPTCHA challenge pages', () => {
    const signal = toResponseSignal({
      status: 200,
      body: '<html><body><div id="cf-challenge-running"></div></body></html>'
    })

    expect(signal.captchaDetected).toBe(true)
  })
})
