import { createHmac } from 'node:crypto';

/** 키 오름차순(ASCII) 정렬 query string */
export function canonicalQuery(query: Record<string, string>): string {
  return Object.keys(query)
    .sort()
    .map((k) => `${k}=${query[k] ?? ''}`)
    .join('&');
}

/**
 * Private API 서명: HMAC-SHA256(secret, METHOD + PATH + "?" + sortedQuery + body) 소문자 hex
 * timestamp(ms)는 항상 query에 포함되어야 한다 (재전송 방지).
 */
export function buildSignature(
  secret: string,
  method: 'GET' | 'POST' | 'DELETE',
  path: string,
  query: Record<string, string>,
  body?: string,
): string {
  if (!secret) {
    throw new Error('Pionex API secret not configured');
  }
  const qs = canonicalQuery(query);
  const pathUrl = qs ? `${path}?${qs}` : path;
  return createHmac('sha256', secret)
    .update(`${method}${pathUrl}${body ?? ''}`)
    .digest('hex');
}
