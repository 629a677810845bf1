export { SessionCodec, encodeText, decodeText, NONCE_SIZE, TAG_SIZE } from './session/codec';
export { SessionVerifier, findCookie, DEFAULT_COOKIE_NAME } from './session/verifier';
export type { SessionVerification, SessionVerifierOptions, TokenVerifier } from './session/verifier';
export { loadCertificate, refreshWithin, cacheKey } from './trust';
export type { TrustedCertificate } from './trust';
export { ProviderBootstrap, bootstrap, IdentityClient, JWTValidator, JWTValidationError } from './oidc';
export type { BootstrapOptions, BootstrapResult, ProviderConfig, TokenResponse, JWTValidationResult } from './oidc';
export { tunnel, TunnelSession, UpgradeTransport, ResponseTransport, dialTarget, dialUpstream } from './tunnel';
export type { ClientTransport, TunnelOptions } from './tunnel';
export { UpgradeProxy } from './proxy';
export type { UpgradeProxyConfig, UpgradeAuthorizer } from './proxy';
export { loadConfig, parseConfig } from './config';
export type { ProxyConfig } from './config';
export * from './errors';
