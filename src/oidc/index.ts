export { ProviderBootstrap, bootstrap, mergeScopes, redirectURLFor, DEFAULT_SCOPES } from './bootstrap';
export type { BootstrapResult } from './bootstrap';
export { IdentityClient, nextSyncAfter } from './identity-client';
export { JWTValidator, JWTValidationError } from './jwt-validator';
export type { JWTValidationResult } from './jwt-validator';
export {
  HttpProviderConfigFetcher,
  createProviderHttpClient,
  normalizeDiscoveryURL,
  toProviderConfig,
  DISCOVERY_SUFFIX
} from './discovery';
export type { ProviderConfigFetcher } from './discovery';
export * from './types';
