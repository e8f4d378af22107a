import { describe, it, expect, afterEach } from '@jest/globals';
import jwt from 'jsonwebtoken';
import type { FastifyInstance } from 'fastify';
import { JwtVerifier } from '../src/auth';
import { AuthenticationError } from '../src/errors';
import { build } from '../src/server';
import { FakeEngine } from './helpers/fake-engine';
import { createTestConfig, TEST_JWT_SECRET } from './helpers/test-config';
import { bearer, createTestToken } from './helpers/auth';

const nowSeconds = () => Math.floor(Date.now() / 1000);

describe('JwtVerifier', () => {
  const verifier = new JwtVerifier({ secret: TEST_JWT_SECRET, issuer: 'test-issuer', audience: 'test-audience' });
  const valid = { iss: 'test-issuer', aud: 'test-audience' };

  describe('Positive Cases', () => {
    it('should return the decoded claims', () => {
      const decoded = verifier.verifyToken(createTestToken({ ...valid, scope: 'convert' }));

      expect(decoded.sub).toBe('test-client');
      expect(decoded.scope).toBe('convert');
    });

    it('should accept a token without issuer checks when none are configured', () => {
      const plain = new JwtVerifier({ secret: TEST_JWT_SECRET });

      expect(plain.verifyToken(createTestToken()).sub).toBe('test-client');
    });
  });

  describe('Negative Cases', () => {
    it('should reject an expired token', () => {
      const token = createTestToken({ ...valid, exp: nowSeconds() - 60 });

      expect(() => verifier.verifyToken(token)).toThrow(new AuthenticationError('Token has expired'));
    });

    it('should reject a token that is not yet valid', () => {
      const token = createTestToken({ ...valid, nbf: nowSeconds() + 3600 });

      expect(() => verifier.verifyToken(token)).toThrow('Token is not yet valid');
    });

    it('should reject the wrong audience', () => {
      const token = createTestToken({ iss: 'test-issuer', aud: 'someone-else' });

      expect(() => verifier.verifyToken(token)).toThrow('Invalid audience: expected test-audience');
    });

    it('should reject the wrong issuer', () => {
      const token = createTestToken({ iss: 'someone-else', aud: 'test-audience' });

      expect(() => verifier.verifyToken(token)).toThrow('Invalid issuer: expected test-issuer');
    });

    it('should reject a token signed with another secret', () => {
      const token = jwt.sign({ sub: 'x', ...valid }, 'other-secret', { algorithm: 'HS256' });

      expect(() => verifier.verifyToken(token)).toThrow('Invalid token signature');
    });

    it('should reject other algorithms', () => {
      const token = jwt.sign({ sub: 'x', ...valid }, TEST_JWT_SECRET, { algorithm: 'HS512' });

      expect(() => verifier.verifyToken(token)).toThrow('Invalid token: invalid algorithm');
    });

    it('should reject malformed tokens', () => {
      expect(() => verifier.verifyToken('not.a.jwt')).toThrow(AuthenticationError);
    });

    it('should reject string payloads', () => {
      const token = jwt.sign('just a string', TEST_JWT_SECRET, { algorithm: 'HS256' });
      const plain = new JwtVerifier({ secret: TEST_JWT_SECRET });

      expect(() => plain.verifyToken(token)).toThrow('Invalid token payload');
    });
  });
});

describe('Auth plugin', () => {
  let app: FastifyInstance | null = null;
  const payload = {
    document: Buffer.from('hello').toString('base64'),
    contentType: 'text/plain',
    targetFormat: 'pdf',
  };

  afterEach(async () => {
    if (app) {
      await app.close();
      app = null;
    }
  });

  it('should reject a non-bearer authorization header', async () => {
    app = await build({ config: createTestConfig(), engine: new FakeEngine() });

    const response = await app.inject({
      method: 'POST',
      url: '/convert',
      headers: { authorization: `Basic ${createTestToken()}` },
      payload,
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().message).toBe('Missing authorization header or invalid format');
  });

  it('should accept a valid bearer token', async () => {
    app = await build({ config: createTestConfig(), engine: new FakeEngine() });

    const response = await app.inject({ method: 'POST', url: '/convert', headers: bearer(), payload });

    expect(response.statusCode).toBe(202);
  });

  it('should enforce the configured issuer', async () => {
    app = await build({ config: createTestConfig({ auth: { issuer: 'test-issuer' } }), engine: new FakeEngine() });

    const response = await app.inject({
      method: 'POST',
      url: '/convert',
      headers: bearer(createTestToken({ iss: 'elsewhere' })),
      payload,
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().message).toBe('Invalid issuer: expected test-issuer');
  });

  it('should let requests through without a secret outside production', async () => {
    app = await build({
      config: createTestConfig({ nodeEnv: 'development', auth: { jwtSecret: undefined } }),
      engine: new FakeEngine(),
    });

    const response = await app.inject({ method: 'POST', url: '/convert', payload });

    expect(response.statusCode).toBe(202);
  });

  it('should refuse to start in production without a secret', async () => {
    await expect(
      build({ config: createTestConfig({ nodeEnv: 'production', auth: { jwtSecret: undefined } }), engine: new FakeEngine() })
    ).rejects.toThrow('Missing required configuration in production: JWT_SECRET');
  });
});
