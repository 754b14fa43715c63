import { createLogger } from '@workspace/logger'
import { parse as parseDomain } from 'psl'

const log = createLogger('Domain')

/**
 * Reduces a URL or hostname to the registrable domain used as the partition key
 * for policies, sessions and circuits: `https://static.itch.io/x` → `itch.io`.
 * Hosts the public suffix list does not know (localhost, IPs) are returned as-is.
 */
export const normalizeDomain = (input: string): string => {
  const trimmed = input.trim().toLowerCase()
  if (trimmed.length === 0) {
    return ''
  }

  let hostname: string
  try {
    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`
    hostname = new URL(withScheme).hostname
  } catch (error) {
    log.debug('Falling back to raw domain key', { input, error: String(error) })
    return trimmed.replace(/^www\./, '')
  }

  const parsed = parseDomain(hostname)
  if (!('listed' in parsed) || !parsed.listed || !parsed.domain) {
    return hostname.replace(/^www\./, '')
  }

  return parsed.domain
}
