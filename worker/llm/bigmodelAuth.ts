/**
 * Zhipu BigModel endpoints take a short-lived HS256 JWT signed with the
 * secret half of an `id.secret` API key instead of the raw key.
 */

import { createHmac } from 'node:crypto';

export interface BigModelApiKey {
  id: string;
  secret: string;
}

export const parseBigModelApiKey = (apiKey: string): BigModelApiKey | null => {
  const parts = apiKey.split('.');
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null;
  return { id: parts[0], secret: parts[1] };
};

const base64Url = (value: string | Buffer) =>
  Buffer.from(value).toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');

export const generateBigModelToken = (apiKey: string, options: { expSeconds?: number; now?: number } = {}) => {
  const parsed = parseBigModelApiKey(apiKey);
  if (!parsed) {
    throw new Error('Invalid BigModel API key format. Expected: id.secret');
  }

  const issuedAt = options.now ?? Date.now();
  const header = base64Url(JSON.stringify({ alg: 'HS256', sign_type: 'SIGN' }));
  const payload = base64Url(
    JSON.stringify({ api_key: parsed.id, exp: issuedAt + (options.expSeconds ?? 3600) * 1000, timestamp: issuedAt })
  );
  const signature = base64Url(createHmac('sha256', parsed.secret).update(`${header}.${payload}`).digest());

  return `${header}.${payload}.${signature}`;
};

export const isBigModelApi = (baseUrl: string) => baseUrl.includes('bigmodel.cn');

export const getAuthorizationHeader = (apiKey: string, baseUrl: string) =>
  isBigModelApi(baseUrl) ? `Bearer ${generateBigModelToken(apiKey)}` : `Bearer ${apiKey}`;
