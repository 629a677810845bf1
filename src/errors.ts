export class ProxyError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Cookie text that is not hex. Callers treat it as an invalid session.
export class DecodeError extends ProxyError {
  constructor(message = 'session value is not valid hex') {
    super('DECODE_ERROR', message);
  }
}

export class InvalidSessionError extends ProxyError {
  constructor() {
    super('INVALID_SESSION', 'invalid session');
  }
}

export class InvalidKeyError extends ProxyError {
  constructor(length: number) {
    super('INVALID_KEY', `encryption key must be 16, 24 or 32 bytes, got ${length}`);
  }
}

export class DiscoveryTimeoutError extends ProxyError {
  constructor(discoveryURL: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(
      'DISCOVERY_TIMEOUT',
      `failed to retrieve the provider configuration from discovery url ${discoveryURL} within ${timeoutMs}ms`,
      options
    );
  }
}

export class HijackUnsupportedError extends ProxyError {
  constructor(message = 'transport does not support connection takeover') {
    super('HIJACK_UNSUPPORTED', message);
  }
}

export class DialError extends ProxyError {
  constructor(address: string, cause: unknown) {
    super('DIAL_ERROR', `failed to dial upstream ${address}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class HandshakeError extends ProxyError {
  constructor(address: string, cause: unknown) {
    super('HANDSHAKE_ERROR', `failed to replay the handshake to ${address}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class IOError extends ProxyError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('IO_ERROR', `unable to read ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.path = path;
  }
}

export class KeyPairMismatchError extends ProxyError {
  constructor(message = 'private key does not match certificate', options?: { cause?: unknown }) {
    super('KEYPAIR_MISMATCH', message, options);
  }
}

export class CertificateParseError extends ProxyError {
  constructor(cause: unknown) {
    super('CERTIFICATE_PARSE', `failed to parse certificate: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class ConfigError extends ProxyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
  }
}

export class TokenRequestError extends ProxyError {
  constructor(endpoint: string, cause: unknown) {
    super('TOKEN_REQUEST', `token request to ${endpoint} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}
