import { createHmac, timingSafeEqual } from 'crypto';

/** Per-job signature carried in the callback URL, for providers that cannot send custom headers. */
export function signCallback(secret: string, correlationId: string): string {
  return createHmac('sha256', secret).update(correlationId).digest('base64url');
}

export function secretMatches(expected: string, received: string | undefined): boolean {
  if (!received) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

export interface CallbackCredentials {
  /** Shared secret sent in `x-callback-token`. */
  token?: string;
  /** `sig` query parameter from a URL built by `callbackUrlBuilder`. */
  signature?: string;
}

export function verifyCallback(secret: string, correlationId: string, credentials: CallbackCredentials): boolean {
  return (
    secretMatches(secret, credentials.token) ||
    secretMatches(signCallback(secret, correlationId), credentials.signature)
  );
}

export function callbackUrlBuilder(baseUrl: string, secret: string) {
  return (correlationId: string): string =>
    `${baseUrl}/api/callback/${encodeURIComponent(correlationId)}?sig=${signCallback(secret, correlationId)}`;
}

/** Reads `Authorization: Bearer <token>`. */
export function bearerToken(authorization: string | undefined): string | undefined {
  const match = authorization ? /^Bearer\s+(.+)$/i.exec(authorization.trim()) : null;
  return match ? match[1] : undefined;
}
