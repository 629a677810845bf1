import assert from 'assert';
import http from 'http';
import net from 'net';
import sinon from 'sinon';
import { SessionCodec } from '@src/session/codec';
import { SessionVerifier, findCookie, DEFAULT_COOKIE_NAME, type TokenVerifier } from '@src/session/verifier';
import type { JWTValidationResult } from '@src/oidc';

const KEY = 'test-secret-key-0123456789abcdef';

function requestWithCookie(cookie?: string): http.IncomingMessage {
  const req = new http.IncomingMessage(new net.Socket());
  if (cookie !== undefined) {
    req.headers.cookie = cookie;
  }
  return req;
}

function validResult(subject: string, lifetimeSeconds = 3600): JWTValidationResult {
  return { valid: true, subject, exp: Math.floor(Date.now() / 1000) + lifetimeSeconds };
}

describe('findCookie', function() {
  it('finds the named cookie among others', () => {
    assert.strictEqual(findCookie('a=1; proxy-session=abc; b=2', 'proxy-session'), 'abc');
    assert.strictEqual(findCookie('proxy-session=abc', 'proxy-session'), 'abc');
  });

  it('trims whitespace around names and values', () => {
    assert.strictEqual(findCookie(' proxy-session = abc ;b=2', 'proxy-session'), 'abc');
  });

  it('keeps = inside the value', () => {
    assert.strictEqual(findCookie('k=v=w', 'k'), 'v=w');
  });

  it('returns undefined when absent', () => {
    assert.strictEqual(findCookie('a=1; b=2', 'proxy-session'), undefined);
    assert.strictEqual(findCookie('', 'proxy-session'), undefined);
    assert.strictEqual(findCookie(undefined, 'proxy-session'), undefined);
    assert.strictEqual(findCookie('proxy-session-old=abc', 'proxy-session'), undefined);
  });
});

describe('SessionVerifier', function() {
  const codec = new SessionCodec(KEY);

  function makeVerifier(verify: TokenVerifier['verify'], cookieName?: string): SessionVerifier {
    return new SessionVerifier({ codec, verifier: { verify }, cookieName });
  }

  it('uses the default cookie name', () => {
    assert.strictEqual(makeVerifier(sinon.fake.resolves(validResult('alice'))).cookieName, DEFAULT_COOKIE_NAME);
  });

  it('rejects a request without the session cookie', async () => {
    const verify = sinon.fake.resolves(validResult('alice'));
    const verifier = makeVerifier(verify);

    assert.deepStrictEqual(await verifier.verifyRequest(requestWithCookie('other=1')), {
      authenticated: false,
      reason: 'no session cookie'
    });
    assert.deepStrictEqual(await verifier.verifyRequest(requestWithCookie()), {
      authenticated: false,
      reason: 'no session cookie'
    });
    sinon.assert.notCalled(verify);
  });

  it('rejects a cookie that does not decode', async () => {
    const verify = sinon.fake.resolves(validResult('alice'));
    const verifier = makeVerifier(verify);
    const sealed = verifier.encodeSession('test-id-token');
    const tampered = `${sealed.slice(0, -1)}${sealed.endsWith('0') ? '1' : '0'}`;

    for (const value of ['not-hex', tampered, '00'.repeat(8)]) {
      assert.deepStrictEqual(await verifier.verifyCookie(value), { authenticated: false, reason: 'invalid session' });
    }
    sinon.assert.notCalled(verify);
  });

  it('verifies the token held in the cookie', async () => {
    const verify = sinon.fake.resolves(validResult('alice'));
    const verifier = makeVerifier(verify);
    const req = requestWithCookie(`theme=dark; proxy-session=${verifier.encodeSession('test-id-token')}`);

    assert.deepStrictEqual(await verifier.verifyRequest(req), { authenticated: true, subject: 'alice' });
    sinon.assert.calledOnceWithExactly(verify, 'test-id-token');
  });

  it('reads a custom cookie name', async () => {
    const verifier = makeVerifier(sinon.fake.resolves(validResult('alice')), 'gate');
    const req = requestWithCookie(`gate=${verifier.encodeSession('test-id-token')}`);

    assert.strictEqual((await verifier.verifyRequest(req)).authenticated, true);
  });

  it('reports why the token was rejected', async () => {
    const verifier = makeVerifier(sinon.fake.resolves({ valid: false, error: 'token expired' }));
    assert.deepStrictEqual(await verifier.verifyCookie(verifier.encodeSession('test-id-token')), {
      authenticated: false,
      reason: 'token expired'
    });

    const silent = makeVerifier(sinon.fake.resolves({ valid: false }));
    assert.deepStrictEqual(await silent.verifyCookie(silent.encodeSession('test-id-token')), {
      authenticated: false,
      reason: 'invalid token'
    });
  });

  it('caches successful verifications by token', async () => {
    const verify = sinon.fake.resolves(validResult('alice'));
    const verifier = makeVerifier(verify);

    // Two encodings of the same token share one cache entry
    const first = await verifier.verifyCookie(verifier.encodeSession('test-id-token'));
    const second = await verifier.verifyCookie(verifier.encodeSession('test-id-token'));

    assert.deepStrictEqual(first, { authenticated: true, subject: 'alice' });
    assert.deepStrictEqual(second, { authenticated: true, subject: 'alice' });
    sinon.assert.calledOnce(verify);
  });

  it('does not cache failures or tokens without a usable expiry', async () => {
    const verify = sinon.stub<[string], Promise<JWTValidationResult>>();
    verify.withArgs('rejected-token').resolves({ valid: false, error: 'bad signature' });
    verify.withArgs('no-exp-token').resolves({ valid: true, subject: 'bob' });
    verify.withArgs('expired-token').resolves(validResult('carol', -60));
    const verifier = makeVerifier(verify);

    for (const token of ['rejected-token', 'no-exp-token', 'expired-token']) {
      await verifier.verifyCookie(verifier.encodeSession(token));
      await verifier.verifyCookie(verifier.encodeSession(token));
    }

    assert.strictEqual(verify.callCount, 6);
  });

  it('shares one verification between concurrent requests', async () => {
    const verify = sinon.fake(() => new Promise<JWTValidationResult>((resolve) => {
      setTimeout(() => resolve(validResult('alice')), 10);
    }));
    const verifier = makeVerifier(verify);
    const cookie = verifier.encodeSession('test-id-token');

    const results = await Promise.all([verifier.verifyCookie(cookie), verifier.verifyCookie(cookie)]);

    assert.deepStrictEqual(results, [
      { authenticated: true, subject: 'alice' },
      { authenticated: true, subject: 'alice' }
    ]);
    sinon.assert.calledOnce(verify);
  });
});
