import axios, { type AxiosInstance, type AxiosResponse } from 'axios'
import { createLogger } from '@workspace/logger'
import type { RequestOutcome, ResponseSignal } from '../anti-blocking/types.js'
import type { Policy } from '../config/types.js'
import { CircuitOpenError, RetryExhaustedError } from '../errors.js'
import type { RequestGovernor, Sleeper } from '../orchestrator/request-governor.js'
import type { Session } from '../session/session.js'
import { createSeededRandom } from '../utils/random.js'
import { sleep } from '../utils/sleep.js'
import { CaptchaDetector } from './captcha-detector.js'
import { toResponseSignal } from './response-signal.js'

const log = createLogger('GovernedHttpClient')

type GovernedClientOptions = {
  /** Preconfigured axios instance, e.g. with proxy agents or a test adapter. */
  http?: AxiosInstance
  timeoutMs?: number
  detector?: CaptchaDetector
  /** Waits out backoff between attempts. */
  sleep?: Sleeper
}

type GetOptions = {
  signal?: AbortSignal
  headers?: Record<string, string>
}

type GovernedResponse = {
  url: string
  status: number
  ok: boolean
  body: string
  headers: Record<string, string>
  attempts: number
  session: Session
}

const BROWSER_HEADERS: ReadonlyArray<readonly [string, string]> = [
  ['Accept', 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8'],
  ['Accept-Language', 'en-US,en;q=0.9'],
  ['Accept-Encoding', 'gzip, deflate, br'],
  ['Cache-Control', 'max-age=0'],
  ['Sec-Fetch-Dest', 'document'],
  ['Sec-Fetch-Mode', 'navigate'],
  ['Sec-Fetch-Site', 'none'],
  ['Upgrade-Insecure-Requests', '1'],
  ['Connection', 'keep-alive']
]

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      flat[name.toLowerCase()] = String(value)
    } else if (Array.isArray(value)) {
      flat[name.toLowerCase()] = value.map(String).join(', ')
    }
  }
  return flat
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 400
}

/**
 * Fetches pages through the governor: every attempt is admitted, paced, sent
 * with the session's identity and reported back. Follows the governor's retry
 * decisions until the page arrives or the governor gives up on the domain.
 */
export class GovernedHttpClient {
  private readonly governor: RequestGovernor
  private readonly http: AxiosInstance
  private readonly detector: CaptchaDetector
  private readonly sleep: Sleeper
  private readonly cookieJars: Map<string, Map<string, string>>

  constructor(governor: RequestGovernor, options: GovernedClientOptions = {}) {
    this.governor = governor
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? 10_000,
        maxRedirects: 5
      })
    this.detector = options.detector ?? new CaptchaDetector()
    this.sleep = options.sleep ?? sleep
    this.cookieJars = new Map()
  }

  async get(url: string, options: GetOptions = {}): Promise<GovernedResponse> {
    const { signal } = options

    for (let attempt = 0; ; attempt++) {
      const admission = await this.governor.acquire(url, { signal })
      const { session, policy } = admission

      const started = Date.now()
      let response: AxiosResponse<string> | undefined
      let failure: string | undefined
      try {
        response = await this.http.get<string>(url, {
          headers: this.headersFor(session, policy, url, options.headers),
          responseType: 'text',
          transformResponse: [(data: unknown) => data],
          validateStatus: () => true,
          signal
        })
      } catch (error) {
        if (signal?.aborted) {
          throw error
        }
        failure = error instanceof Error ? error.message : String(error)
        log.debug(`Transport error for ${url}`, { attempt, error: failure })
      }

      let responseSignal: ResponseSignal | undefined
      let headers: Record<string, string> = {}
      let body = ''
      if (response) {
        headers = flattenHeaders(response.headers)
        body = typeof response.data === 'string' ? response.data : String(response.data ?? '')
        this.storeCookies(session, headers)
        responseSignal = toResponseSignal(
          { status: response.status, headers, body },
          { detector: this.detector }
        )
      }

      const outcome: RequestOutcome = {
        success: response !== undefined && isSuccessStatus(response.status),
        attempt,
        trial: admission.trial,
        error: failure ?? (response && !isSuccessStatus(response.status) ? `HTTP ${response.status}` : undefined),
        durationMs: Date.now() - started
      }
      const result = await this.governor.report(url, session, outcome, responseSignal)
      const { decision } = result

      if (result.success || decision.action === 'done') {
        return this.toResponse(url, response, body, headers, attempt, session)
      }

      switch (decision.action) {
        case 'retry-now':
          continue
        case 'retry-after-backoff':
          await this.sleep(decision.delayMs, signal)
          continue
        case 'abandon':
          if (decision.reason === 'client-error') {
            return this.toResponse(url, response, body, headers, attempt, session)
          }
          if (decision.reason === 'circuit-open') {
            const retryAt = this.governor.stats(url).circuitRetryAt ?? Date.now()
            throw new CircuitOpenError(result.domain, retryAt)
          }
          throw new RetryExhaustedError(result.domain, attempt + 1, outcome.error ?? decision.failure)
      }
    }
  }

  private toResponse(
    url: string,
    response: AxiosResponse<string> | undefined,
    body: string,
    headers: Record<string, string>,
    attempt: number,
    session: Session
  ): GovernedResponse {
    const status = response?.status ?? 0
    return { url, status, ok: isSuccessStatus(status), body, headers, attempts: attempt + 1, session }
  }

  private headersFor(
    session: Session,
    policy: Policy,
    url: string,
    extra: Record<string, string> | undefined
  ): Record<string, string> {
    const origin = new URL(url).origin
    const entries: Array<readonly [string, string]> = [
      ['User-Agent', session.fingerprint.userAgent],
      ...BROWSER_HEADERS,
      ['Referer', `${origin}/`]
    ]

    if (policy.evasion.headerOrderRandomization) {
      // Same order for the whole session: a shuffle per request is a fingerprint of its own
      const random = createSeededRandom(session.fingerprint.headerOrderSeed)
      for (let i = entries.length - 1; i > 0; i--) {
        const j = Math.floor(random.next() * (i + 1))
        const current = entries[i]
        const swap = entries[j]
        if (current && swap) {
          entries[i] = swap
          entries[j] = current
        }
      }
    }

    const headers: Record<string, string> = Object.fromEntries(entries)
    const cookie = this.cookieHeader(session)
    if (cookie) {
      headers.Cookie = cookie
    }
    return { ...headers, ...extra }
  }

  private cookieHeader(session: Session): string | undefined {
    const jar = this.cookieJars.get(session.cookieJar)
    if (!jar || jar.size === 0) {
      return undefined
    }
    return [...jar].map(([name, value]) => `${name}=${value}`).join('; ')
  }

  private storeCookies(session: Session, headers: Record<string, string>): void {
    const setCookie = headers['set-cookie']
    if (!setCookie) {
      return
    }

    let jar = this.cookieJars.get(session.cookieJar)
    if (!jar) {
      jar = new Map()
      this.cookieJars.set(session.cookieJar, jar)
    }

    for (const cookie of setCookie.split(/,(?=\s*[^;,=\s]+=)/)) {
      const pair = cookie.split(';')[0]?.trim() ?? ''
      const separator = pair.indexOf('=')
      if (separator > 0) {
        jar.set(pair.slice(0, separator), pair.slice(separator + 1))
      }
    }
  }
}

export type { GovernedClientOptions, GetOptions, GovernedResponse }
