import https from 'https';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ProviderConfig } from './types';

export const DISCOVERY_SUFFIX = '/.well-known/openid-configuration';

const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

const discoveryDocumentSchema = z.object({
  issuer: z.string().url(),
  authorization_endpoint: z.string().url(),
  token_endpoint: z.string().url(),
  jwks_uri: z.string().url(),
  userinfo_endpoint: z.string().url().optional(),
  end_session_endpoint: z.string().url().optional(),
  scopes_supported: z.array(z.string()).default([]),
  response_types_supported: z.array(z.string()).default([]),
  id_token_signing_alg_values_supported: z.array(z.string()).default([])
});

export interface ProviderConfigFetcher {
  fetch(issuerURL: string, signal?: AbortSignal): Promise<ProviderConfig>;
}

export interface ProviderHttpClientOptions {
  skipTLSVerify?: boolean;
  requestTimeoutMs?: number;
}

export function createProviderAgent(skipTLSVerify = false): https.Agent {
  return new https.Agent({ keepAlive: true, rejectUnauthorized: !skipTLSVerify });
}

// HTTP client used for every call to the identity provider
export function createProviderHttpClient(options: ProviderHttpClientOptions = {}, agent?: https.Agent): AxiosInstance {
  return axios.create({
    timeout: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    httpsAgent: agent ?? createProviderAgent(options.skipTLSVerify),
    headers: { accept: 'application/json' }
  });
}

// The fetcher appends the well-known suffix itself, so strip it when configured.
export function normalizeDiscoveryURL(discoveryURL: string): string {
  if (discoveryURL.endsWith(DISCOVERY_SUFFIX)) {
    return discoveryURL.slice(0, -DISCOVERY_SUFFIX.length);
  }
  return discoveryURL;
}

export function parseMaxAge(cacheControl: unknown): number | undefined {
  if (typeof cacheControl !== 'string') {
    return undefined;
  }
  const match = /(?:^|,)\s*max-age=(\d+)/i.exec(cacheControl);
  return match ? Number(match[1]) : undefined;
}

export function toProviderConfig(document: unknown, maxAgeSeconds?: number): ProviderConfig {
  const doc = discoveryDocumentSchema.parse(document);

  return Object.freeze({
    issuer: doc.issuer,
    authorizationEndpoint: doc.authorization_endpoint,
    tokenEndpoint: doc.token_endpoint,
    jwksURI: doc.jwks_uri,
    userinfoEndpoint: doc.userinfo_endpoint,
    endSessionEndpoint: doc.end_session_endpoint,
    scopesSupported: Object.freeze(doc.scopes_supported),
    responseTypesSupported: Object.freeze(doc.response_types_supported),
    idTokenSigningAlgValuesSupported: Object.freeze(doc.id_token_signing_alg_values_supported),
    expiresAt: maxAgeSeconds !== undefined && maxAgeSeconds > 0 ? new Date(Date.now() + maxAgeSeconds * 1000) : undefined
  });
}

export class HttpProviderConfigFetcher implements ProviderConfigFetcher {
  private http: AxiosInstance;

  constructor(http: AxiosInstance) {
    this.http = http;
  }

  async fetch(issuerURL: string, signal?: AbortSignal): Promise<ProviderConfig> {
    const url = `${issuerURL.replace(/\/$/, '')}${DISCOVERY_SUFFIX}`;
    const response = await this.http.get<unknown>(url, { signal });
    const cacheControl: unknown = response.headers['cache-control'];

    return toProviderConfig(response.data, parseMaxAge(cacheControl));
  }
}
