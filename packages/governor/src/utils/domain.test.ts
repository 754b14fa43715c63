import { describe, it, expect } from 'vitest'
import { normalizeDomain } from './domain.js'

describe('normalizeDomain', () => {
  it('reduces a URL to its registrable domain', () => {
    expect(normalizeDomain('https://static.itch.io/games/page?id=3')).toBe('itch.io')
  })

  it('is case-insensitive and ignores a leading www', () => {
    expect(normalizeDomain('WWW.Kenney.NL')).toBe('kenney.nl')
  })

  it('keeps hosts the suffix list does not know', () => {
    expect(normalizeDomain('http://localhost:8080/health')).toBe('localhost')
    expect(normalizeDomain('127.0.0.1')).toBe('127.0.0.1')
  })

  it('returns an empty key for blank input', () => {
    expect(normalizeDomain('   ')).toBe('')
  })
})
