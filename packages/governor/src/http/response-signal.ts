import type { ResponseSignal } from '../anti-blocking/types.js'
import { CaptchaDetector } from './captcha-detector.js'

const BODY_EXCERPT_LENGTH = 2048

type HeaderValue = string | number | boolean | readonly string[] | null | undefined

type RawResponse = {
  status: number
  headers?: Readonly<Record<string, HeaderValue>>
  body?: unknown
}

type SignalOptions = {
  detector?: CaptchaDetector
  /** Reference time for HTTP-date `Retry-After` values. */
  now?: number
}

const defaultDetector = new CaptchaDetector()

function normalizeHeaders(headers: RawResponse['headers']): Record<string, string> {
  const normalized: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (value === undefined || value === null) {
      continue
    }
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value)
  }
  return normalized
}

function bodyText(body: unknown): string {
  if (body === undefined || body === null) {
    return ''
  }
  if (typeof body === 'string') {
    return body
  }
  if (Buffer.isBuffer(body)) {
    return body.toString('utf-8')
  }
  try {
    return JSON.stringify(body) ?? ''
  } catch {
    return String(body)
  }
}

/**
 * `Retry-After` as milliseconds: delta-seconds, or an HTTP date relative to `now`.
 * Unparseable values give `undefined`.
 */
export function parseRetryAfter(value: string | undefined, now: number): number | undefined {
  const trimmed = value?.trim()
  if (!trimmed) {
    return undefined
  }

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000
  }

  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) {
    return undefined
  }
  return Math.max(0, date - now)
}

/**
 * Reduces an HTTP response to what ban detection looks at.
 */
export function toResponseSignal(response: RawResponse, options: SignalOptions = {}): ResponseSignal {
  const headers = normalizeHeaders(response.headers)
  const body = bodyText(response.body)
  const detector = options.detector ?? defaultDetector
  const retryAfterMs = parseRetryAfter(headers['retry-after'], options.now ?? Date.now())

  return {
    status: response.status,
    bodyExcerpt: body.slice(0, BODY_EXCERPT_LENGTH),
    captchaDetected: detector.detect(body) !== undefined,
    headers,
    ...(retryAfterMs === undefined ? {} : { retryAfterMs })
  }
}

export type { RawResponse, SignalOptions }
export { BODY_EXCERPT_LENGTH }
