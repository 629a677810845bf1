import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import type { Agent } from 'https';
import type { AxiosInstance } from 'axios';
import { DiscoveryTimeoutError } from '../errors';
import { IdentityClient } from './identity-client';
import {
  HttpProviderConfigFetcher,
  createProviderAgent,
  createProviderHttpClient,
  normalizeDiscoveryURL,
  type ProviderConfigFetcher
} from './discovery';
import type { BootstrapOptions, ProviderConfig } from './types';

export const DEFAULT_SCOPES: readonly string[] = ['openid', 'email', 'profile'];

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_RETRY_INTERVAL_MS = 3000;
const DEFAULT_REQUEST_TIMEOUT_MS = 10000;
const DEFAULT_MAX_RETRY_INTERVAL_MS = 30000;

export interface BootstrapResult {
  client: IdentityClient;
  config: ProviderConfig;
}

export function redirectURLFor(redirectBase: string): string {
  return `${redirectBase.replace(/\/+$/, '')}/oauth/callback`;
}

export function mergeScopes(scopes: readonly string[] = []): string[] {
  return [...new Set([...scopes, ...DEFAULT_SCOPES])];
}

/**
 * Discovers the identity provider and builds the client used for the rest of
 * the process lifetime.
 *
 * Discovery is retried until it succeeds or the overall deadline passes. The
 * deadline aborts the retry loop (in-flight request and pending pause), and a
 * result that arrives after it is dropped.
 */
export class ProviderBootstrap extends EventEmitter {
  private options: BootstrapOptions;
  private discoveryURL: string;
  private agent: Agent;
  private http: AxiosInstance;
  private fetcher: ProviderConfigFetcher;
  private lastError?: unknown;

  constructor(options: BootstrapOptions, fetcher?: ProviderConfigFetcher) {
    super();
    this.options = options;
    this.discoveryURL = normalizeDiscoveryURL(options.discoveryURL);
    this.agent = createProviderAgent(options.skipTLSVerify);
    this.http = createProviderHttpClient({ requestTimeoutMs: options.requestTimeoutMs }, this.agent);
    this.fetcher = fetcher ?? new HttpProviderConfigFetcher(this.http);
  }

  async start(): Promise<BootstrapResult> {
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    let deadline: NodeJS.Timeout | undefined;

    // Only the deadline rejects this; clearing it on success leaves it pending
    const timedOut = new Promise<never>((_resolve, reject) => {
      deadline = setTimeout(() => {
        reject(new DiscoveryTimeoutError(this.discoveryURL, timeoutMs, { cause: this.lastError }));
        controller.abort();
      }, timeoutMs);
    });

    let config: ProviderConfig;
    try {
      config = await Promise.race([this.discover(controller.signal), timedOut]);
    } finally {
      clearTimeout(deadline);
      controller.abort();
    }

    const client = new IdentityClient({
      providerConfig: config,
      discoveryURL: this.discoveryURL,
      clientID: this.options.clientID,
      clientSecret: this.options.clientSecret,
      redirectURL: redirectURLFor(this.options.redirectBase),
      scopes: mergeScopes(this.options.scopes),
      http: this.http,
      fetcher: this.fetcher,
      agent: this.agent,
      requestTimeoutMs: this.options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    });

    if (this.options.syncProviderConfig ?? true) {
      client.syncProviderConfig();
    }

    return { client, config };
  }

  private async discover(signal: AbortSignal): Promise<ProviderConfig> {
    const backoffFactor = this.options.backoffFactor ?? 1;
    const maxInterval = this.options.maxRetryIntervalMs ?? DEFAULT_MAX_RETRY_INTERVAL_MS;
    let interval = this.options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;

    for (let attempt = 1; !signal.aborted; attempt++) {
      this.emit('discoveryAttempt', this.discoveryURL, attempt);
      try {
        const config = await this.fetcher.fetch(this.discoveryURL, signal);
        if (signal.aborted) {
          break;
        }
        this.emit('discoverySucceeded', this.discoveryURL, attempt);
        return config;
      } catch (err) {
        if (signal.aborted) {
          break;
        }
        this.lastError = err;
        this.emit('discoveryFailed', this.discoveryURL, attempt, err);
      }

      try {
        await sleep(interval, undefined, { signal });
      } catch {
        break;
      }
      interval = Math.min(interval * backoffFactor, maxInterval);
    }

    throw new DiscoveryTimeoutError(this.discoveryURL, this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS, { cause: this.lastError });
  }
}

export async function bootstrap(options: BootstrapOptions, fetcher?: ProviderConfigFetcher): Promise<BootstrapResult> {
  return new ProviderBootstrap(options, fetcher).start();
}
