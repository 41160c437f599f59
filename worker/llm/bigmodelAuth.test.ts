import { describe, it, expect } from 'vitest';
import { generateBigModelToken, getAuthorizationHeader, parseBigModelApiKey } from './bigmodelAuth';

const decode = (segment: string) => JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));

describe('bigmodelAuth', () => {
  it('splits id.secret keys', () => {
    expect(parseBigModelApiKey('abc.def')).toEqual({ id: 'abc', secret: 'def' });
    expect(parseBigModelApiKey('no-dot')).toBeNull();
    expect(parseBigModelApiKey('a.')).toBeNull();
  });

  it('signs a token carrying the key id and expiry', () => {
    const token = generateBigModelToken('key-id.test-secret', { now: 1_000, expSeconds: 60 });
    const [header, payload, signature] = token.split('.');

    expect(decode(header)).toEqual({ alg: 'HS256', sign_type: 'SIGN' });
    expect(decode(payload)).toEqual({ api_key: 'key-id', exp: 61_000, timestamp: 1_000 });
    expect(signature).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it('passes plain keys through for other hosts', () => {
    expect(getAuthorizationHeader('test-key', 'https://api.openai.com/v1')).toBe('Bearer test-key');
  });

  it('rejects malformed keys for BigModel hosts', () => {
    expect(() => getAuthorizationHeader('test-key', 'https://open.bigmodel.cn/api/paas/v4')).toThrow(
      'Invalid BigModel API key format'
    );
  });
});
