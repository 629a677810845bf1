import { promises as fs } from 'fs';
import { createHash, createPrivateKey, X509Certificate, type KeyObject } from 'crypto';
import { CertificateParseError, IOError, KeyPairMismatchError } from './errors';

export interface TrustedCertificate {
  cert: Buffer;
  key: Buffer;
  leaf: X509Certificate;
}

async function readMaterial(path: string): Promise<Buffer> {
  try {
    return await fs.readFile(path);
  } catch (err) {
    throw new IOError(path, err);
  }
}

// Loads a PEM certificate/key pair from disk and checks they belong together.
export async function loadCertificate(certPath: string, keyPath: string): Promise<TrustedCertificate> {
  const cert = await readMaterial(certPath);
  const key = await readMaterial(keyPath);

  let leaf: X509Certificate;
  try {
    leaf = new X509Certificate(cert);
  } catch (err) {
    throw new CertificateParseError(err);
  }

  let privateKey: KeyObject;
  try {
    privateKey = createPrivateKey(key);
  } catch (err) {
    throw new KeyPairMismatchError(`unable to parse private key ${keyPath}`, { cause: err });
  }
  if (!leaf.checkPrivateKey(privateKey)) {
    throw new KeyPairMismatchError(`private key ${keyPath} does not match certificate ${certPath}`);
  }

  return { cert, key, leaf };
}

/**
 * Returns `fraction` of the time left until `expires`, in milliseconds
 * rounded down to whole seconds. Anything already expired yields 0.
 *
 * i.e. a token expiring in an hour with a fraction of 0.8 is due for a
 * refresh in 48 minutes.
 */
export function refreshWithin(expires: Date, fraction: number): number {
  if (!(fraction > 0 && fraction <= 1)) {
    throw new RangeError(`fraction must be within (0, 1], got ${fraction}`);
  }
  const left = (expires.getTime() - Date.now()) / 1000;
  if (left <= 0) {
    return 0;
  }

  return Math.floor(left * fraction) * 1000;
}

// Lookup key for an encoded token. Not a MAC; never compare it for access decisions.
export function cacheKey(encodedToken: string): string {
  return createHash('sha256').update(encodedToken).digest('hex');
}
