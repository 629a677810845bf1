import type { Agent } from 'https';
import { EventEmitter } from 'events';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { TokenRequestError } from '../errors';
import { refreshWithin } from '../trust';
import { JWTValidator, type JWTValidationResult } from './jwt-validator';
import type { ProviderConfigFetcher } from './discovery';
import type { ProviderConfig, TokenResponse } from './types';

export const MIN_SYNC_INTERVAL_MS = 60 * 1000;
export const MAX_SYNC_INTERVAL_MS = 24 * 60 * 60 * 1000;

const tokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  id_token: z.string().optional(),
  refresh_token: z.string().optional(),
  expires_in: z.coerce.number().optional(),
  scope: z.string().optional()
});

export interface IdentityClientOptions {
  providerConfig: ProviderConfig;
  discoveryURL: string;
  clientID: string;
  clientSecret: string;
  redirectURL: string;
  scopes: readonly string[];
  http: AxiosInstance;
  fetcher: ProviderConfigFetcher;
  agent?: Agent;
  requestTimeoutMs?: number;
}

// Delay before the next provider sync: half the remaining cache lifetime, clamped.
export function nextSyncAfter(expiresAt?: Date): number {
  if (!expiresAt) {
    return MAX_SYNC_INTERVAL_MS;
  }
  const delay = refreshWithin(expiresAt, 0.5);
  return Math.min(Math.max(delay, MIN_SYNC_INTERVAL_MS), MAX_SYNC_INTERVAL_MS);
}

/**
 * Handle on the identity provider for code exchange and token verification.
 *
 * The provider config and the key set built from it are kept together as one
 * validator and replaced as a unit on every sync, so each call works against
 * a single consistent snapshot.
 */
export class IdentityClient extends EventEmitter {
  readonly clientID: string;
  readonly redirectURL: string;
  readonly scopes: readonly string[];
  readonly discoveryURL: string;
  private clientSecret: string;
  private http: AxiosInstance;
  private fetcher: ProviderConfigFetcher;
  private agent?: Agent;
  private requestTimeoutMs?: number;
  private current: JWTValidator;
  private syncTimer?: NodeJS.Timeout;
  private syncAbort?: AbortController;

  constructor(options: IdentityClientOptions) {
    super();
    this.clientID = options.clientID;
    this.clientSecret = options.clientSecret;
    this.redirectURL = options.redirectURL;
    this.scopes = Object.freeze([...options.scopes]);
    this.discoveryURL = options.discoveryURL;
    this.http = options.http;
    this.fetcher = options.fetcher;
    this.agent = options.agent;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.current = this.buildValidator(options.providerConfig);
  }

  providerConfig(): ProviderConfig {
    return this.current.config;
  }

  authCodeURL(state: string, params: Record<string, string> = {}): string {
    const url = new URL(this.current.config.authorizationEndpoint);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.clientID);
    url.searchParams.set('redirect_uri', this.redirectURL);
    url.searchParams.set('scope', this.scopes.join(' '));
    url.searchParams.set('state', state);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  async exchangeAuthCode(code: string): Promise<TokenResponse> {
    return this.requestToken({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.redirectURL
    });
  }

  async refreshToken(refreshToken: string): Promise<TokenResponse> {
    return this.requestToken({
      grant_type: 'refresh_token',
      refresh_token: refreshToken
    });
  }

  async verify(token: string): Promise<JWTValidationResult> {
    // Capture once; a concurrent sync must not change the config mid-verification
    const validator = this.current;
    return validator.validate(token);
  }

  // Fetches the provider config once and swaps it in.
  async refreshProviderConfig(signal?: AbortSignal): Promise<ProviderConfig> {
    const config = await this.fetcher.fetch(this.discoveryURL, signal);
    this.current = this.buildValidator(config);
    this.emit('providerConfigSynced', config);
    return config;
  }

  /**
   * Starts refreshing the provider config in the background for key
   * rotation. Returns a function that stops it. Calling it while a sync is
   * already running returns the same stop function.
   */
  syncProviderConfig(): () => void {
    if (this.syncAbort) {
      return () => this.stopSync();
    }
    const abort = new AbortController();
    this.syncAbort = abort;

    const schedule = (delay: number): void => {
      if (abort.signal.aborted) {
        return;
      }
      this.syncTimer = setTimeout(() => {
        void this.refreshProviderConfig(abort.signal).then(
          (config) => schedule(nextSyncAfter(config.expiresAt)),
          (err: unknown) => {
            if (abort.signal.aborted) {
              return;
            }
            this.emit('providerConfigSyncFailed', err);
            schedule(MIN_SYNC_INTERVAL_MS);
          }
        );
      }, delay);
      this.syncTimer.unref();
    };
    schedule(nextSyncAfter(this.current.config.expiresAt));

    return () => this.stopSync();
  }

  close(): void {
    this.stopSync();
  }

  private stopSync(): void {
    if (this.syncTimer) {
      clearTimeout(this.syncTimer);
      this.syncTimer = undefined;
    }
    if (this.syncAbort) {
      this.syncAbort.abort();
      this.syncAbort = undefined;
    }
  }

  private buildValidator(config: ProviderConfig): JWTValidator {
    return new JWTValidator(config, this.clientID, {
      agent: this.agent,
      requestTimeoutMs: this.requestTimeoutMs
    });
  }

  private async requestToken(params: Record<string, string>): Promise<TokenResponse> {
    const endpoint = this.current.config.tokenEndpoint;
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(endpoint, new URLSearchParams(params).toString(), {
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        auth: {
          username: encodeURIComponent(this.clientID),
          password: encodeURIComponent(this.clientSecret)
        }
      });
      data = response.data;
    } catch (err) {
      throw new TokenRequestError(endpoint, err);
    }

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TokenRequestError(endpoint, parsed.error);
    }
    const body = parsed.data;
    return {
      accessToken: body.access_token,
      tokenType: body.token_type,
      idToken: body.id_token,
      refreshToken: body.refresh_token,
      expiresIn: body.expires_in,
      scope: body.scope
    };
  }
}
