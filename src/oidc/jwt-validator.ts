import type { Agent } from 'https';
import { createRemoteJWKSet, jwtVerify, errors, type JWTPayload } from 'jose';
import type { ProviderConfig } from './types';

export enum JWTValidationError {
  EXPIRED = 'expired',
  AUDIENCE_MISMATCH = 'audience_mismatch',
  INVALID = 'invalid'
}

export interface JWTValidationResult {
  valid: boolean;
  payload?: JWTPayload;
  subject?: string;
  exp?: number;
  errorCode?: JWTValidationError;
  error?: string;
}

export interface JWTValidatorOptions {
  agent?: Agent;
  requestTimeoutMs?: number;
}

// Verifies token signatures against the key set of a single provider config.
export class JWTValidator {
  readonly config: ProviderConfig;
  private jwks: ReturnType<typeof createRemoteJWKSet>;
  private clientId: string;

  constructor(config: ProviderConfig, clientId: string, options: JWTValidatorOptions = {}) {
    this.config = config;
    this.clientId = clientId;
    const jwksUrl = new URL(config.jwksURI);
    this.jwks = createRemoteJWKSet(jwksUrl, {
      // An https agent cannot carry a plain http request
      agent: jwksUrl.protocol === 'https:' ? options.agent : undefined,
      timeoutDuration: options.requestTimeoutMs
    });
  }

  async validate(token: string): Promise<JWTValidationResult> {
    try {
      const { payload } = await jwtVerify(token, this.jwks, {
        issuer: this.config.issuer,
        audience: this.clientId
      });

      return {
        valid: true,
        payload,
        subject: payload.sub,
        exp: payload.exp
      };
    } catch (err) {
      let errorCode = JWTValidationError.INVALID;
      if (err instanceof errors.JWTExpired) {
        errorCode = JWTValidationError.EXPIRED;
      } else if (err instanceof errors.JWTClaimValidationFailed && err.claim === 'aud') {
        errorCode = JWTValidationError.AUDIENCE_MISMATCH;
      }
      return {
        valid: false,
        errorCode,
        error: err instanceof Error ? err.message : 'Unknown validation error'
      };
    }
  }
}
