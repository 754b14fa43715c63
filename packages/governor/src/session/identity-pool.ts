import { randomSeed, type RandomSource } from '../utils/random.js';
import type { Fingerprint, IdentityPool } from './types.js';

const DEFAULT_USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:122.0) Gecko/20100101 Firefox/122.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:122.0) Gecko/20100101 Firefox/122.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36 Edg/121.0.0.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
];

/**
 * Draws user agents from a fixed list, never handing out the same one twice in a row.
 */
export class UserAgentIdentityPool implements IdentityPool {
  private readonly userAgents: readonly string[];
  private readonly random: RandomSource;
  private lastIndex: number;

  constructor(random: RandomSource, userAgents: readonly string[] = DEFAULT_USER_AGENTS) {
    if (userAgents.length === 0) {
      throw new Error('UserAgentIdentityPool needs at least one user agent');
    }
    this.userAgents = userAgents;
    this.random = random;
    this.lastIndex = -1;
  }

  nextFingerprint(): Fingerprint {
    let index = Math.floor(this.random.next() * this.userAgents.length);
    if (index === this.lastIndex && this.userAgents.length > 1) {
      index = (index + 1) % this.userAgents.length;
    }
    this.lastIndex = index;

    return {
      userAgent: this.userAgents[index] ?? this.userAgents[0] ?? '',
      headerOrderSeed: randomSeed(this.random),
      tlsProfileSeed: randomSeed(this.random),
    };
  }
}

export { DEFAULT_USER_AGENTS };
