export interface ProviderConfig {
  issuer: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  jwksURI: string;
  userinfoEndpoint?: string;
  endSessionEndpoint?: string;
  scopesSupported: readonly string[];
  responseTypesSupported: readonly string[];
  idTokenSigningAlgValuesSupported: readonly string[];
  // From the discovery response's Cache-Control max-age, when present
  expiresAt?: Date;
}

export interface BootstrapOptions {
  discoveryURL: string;
  clientID: string;
  clientSecret: string;
  redirectBase: string;
  scopes?: readonly string[];
  skipTLSVerify?: boolean;

  // Timing
  timeoutMs?: number; // Overall deadline for discovery (default: 30000)
  retryIntervalMs?: number; // Pause between attempts (default: 3000)
  requestTimeoutMs?: number; // Per-request timeout (default: 10000)
  backoffFactor?: number; // Multiplier applied to the pause after each failure (default: 1)
  maxRetryIntervalMs?: number; // Upper bound for the pause (default: 30000)

  syncProviderConfig?: boolean; // Start background key-rotation sync (default: true)
}

export interface TokenResponse {
  accessToken: string;
  tokenType: string;
  idToken?: string;
  refreshToken?: string;
  expiresIn?: number;
  scope?: string;
}
