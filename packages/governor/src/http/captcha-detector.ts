import * as cheerio from 'cheerio'
import { createLogger } from '@workspace/logger'

const log = createLogger('CaptchaDetector')

type CaptchaKind =
  | 'cloudflare-challenge'
  | 'recaptcha-challenge'
  | 'hcaptcha-challenge'
  | 'generic-captcha-form'

// Pages with this much readable text are content pages that merely embed a widget
const CONTENT_PAGE_TEXT_LENGTH = 10_000

const CHALLENGE_PHRASES = [
  'verify you are human',
  'verify you are a human',
  'not a robot',
  'select all images',
  'select all squares',
  'complete the security check',
  'complete the verification'
]

/**
 * Recognises pages whose main purpose is a CAPTCHA challenge. Invisible badges
 * and widgets on otherwise normal pages are not challenges.
 */
export class CaptchaDetector {
  detect(html: string): CaptchaKind | undefined {
    if (html.trim().length === 0) {
      return undefined
    }

    let $: cheerio.CheerioAPI
    try {
      $ = cheerio.load(html)
    } catch (error) {
      log.debug('Could not parse body for CAPTCHA detection', error)
      return undefined
    }

    const pageText = $('body').text().toLowerCase()
    const isContentPage = pageText.length > CONTENT_PAGE_TEXT_LENGTH
    const hasChallengeText = CHALLENGE_PHRASES.some(phrase => pageText.includes(phrase))

    const cloudflare =
      $('#cf-challenge-running').length > 0 ||
      $('.cf-browser-verification').length > 0 ||
      $('script[src*="/cdn-cgi/challenge-platform/"]').length > 0 ||
      $('script[src*="challenges.cloudflare.com/turnstile"]').length > 0 ||
      ($('title:contains("Just a moment")').length > 0 && $('.ray-id').length > 0)
    if (cloudflare && !isContentPage) {
      return this.found('cloudflare-challenge')
    }

    // bframe is the visible challenge; anchor alone is only the badge
    if ($('iframe[src*="recaptcha/api2/bframe"]').length > 0 && !isContentPage) {
      return this.found('recaptcha-challenge')
    }
    const recaptchaBadgeOnly = $('iframe[src*="recaptcha/api2/anchor"]').length > 0
    if ($('.g-recaptcha, .recaptcha-challenge, #recaptcha').length > 0 && hasChallengeText && !recaptchaBadgeOnly) {
      return this.found('recaptcha-challenge')
    }

    if ($('.h-captcha, iframe[src*="hcaptcha.com/challenges"]').length > 0 && hasChallengeText) {
      return this.found('hcaptcha-challenge')
    }

    const forms = $('form[id*="captcha"], form[class*="captcha"], form[id*="challenge"]')
    if (forms.length > 0 && hasChallengeText && forms.find('input, textarea, button').length > 0) {
      return this.found('generic-captcha-form')
    }

    return undefined
  }

  private found(kind: CaptchaKind): CaptchaKind {
    log.debug(`Detected ${kind}`)
    return kind
  }
}

export type { CaptchaKind }
