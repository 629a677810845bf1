import type { IncomingMessage } from 'http';
import { LRUCache } from 'lru-cache';
import { DecodeError, InvalidSessionError } from '../errors';
import { cacheKey, refreshWithin } from '../trust';
import { InflightGroup } from '../utils/sync';
import type { JWTValidationResult } from '../oidc/jwt-validator';
import type { SessionCodec } from './codec';

export const DEFAULT_COOKIE_NAME = 'proxy-session';

const DEFAULT_CACHE_SIZE = 10000;
// Cached verifications are dropped after this share of the token's remaining lifetime
const CACHE_LIFETIME_FRACTION = 0.8;

export interface TokenVerifier {
  verify(token: string): Promise<JWTValidationResult>;
}

export interface SessionVerification {
  authenticated: boolean;
  subject?: string;
  reason?: string;
}

export interface SessionVerifierOptions {
  codec: SessionCodec;
  verifier: TokenVerifier;
  cookieName?: string;
  cacheSize?: number;
}

interface CachedSession {
  subject?: string;
}

export function findCookie(header: string | undefined, name: string): string | undefined {
  if (!header) {
    return undefined;
  }
  for (const part of header.split(';')) {
    const idx = part.indexOf('=');
    if (idx > 0 && part.slice(0, idx).trim() === name) {
      return part.slice(idx + 1).trim();
    }
  }
  return undefined;
}

/**
 * Resolves the encrypted session cookie into a verified identity. The cookie
 * holds the provider's id token; successful verifications are cached under
 * the token's cache key.
 */
export class SessionVerifier {
  readonly cookieName: string;
  private codec: SessionCodec;
  private verifier: TokenVerifier;
  private cache: LRUCache<string, CachedSession>;
  private inflight = new InflightGroup<JWTValidationResult>();

  constructor(options: SessionVerifierOptions) {
    this.codec = options.codec;
    this.verifier = options.verifier;
    this.cookieName = options.cookieName ?? DEFAULT_COOKIE_NAME;
    this.cache = new LRUCache<string, CachedSession>({ max: options.cacheSize ?? DEFAULT_CACHE_SIZE });
  }

  encodeSession(idToken: string): string {
    return this.codec.encodeText(idToken);
  }

  async verifyRequest(req: IncomingMessage): Promise<SessionVerification> {
    const value = findCookie(req.headers.cookie, this.cookieName);
    if (!value) {
      return { authenticated: false, reason: 'no session cookie' };
    }
    return this.verifyCookie(value);
  }

  async verifyCookie(value: string): Promise<SessionVerification> {
    let token: string;
    try {
      token = this.codec.decodeText(value);
    } catch (err) {
      if (err instanceof DecodeError || err instanceof InvalidSessionError) {
        return { authenticated: false, reason: 'invalid session' };
      }
      throw err;
    }

    const key = cacheKey(token);
    const cached = this.cache.get(key);
    if (cached) {
      return { authenticated: true, subject: cached.subject };
    }

    const result = await this.inflight.run(key, () => this.verifier.verify(token));
    if (!result.valid) {
      return { authenticated: false, reason: result.error ?? 'invalid token' };
    }

    if (result.exp !== undefined) {
      const ttl = refreshWithin(new Date(result.exp * 1000), CACHE_LIFETIME_FRACTION);
      if (ttl > 0) {
        this.cache.set(key, { subject: result.subject }, { ttl });
      }
    }
    return { authenticated: true, subject: result.subject };
  }
}
