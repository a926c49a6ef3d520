import { env } from '../../config/env';

const normalizeOrigin = (origin: string) => origin.toLowerCase().replace(/\/$/, '');

export function isAllowedOrigin(origin: string): boolean {
  return env.ALLOWED_ORIGINS_NORMALIZED.includes(normalizeOrigin(origin));
}

export function corsHeaders(origin: string | undefined, methods: string[] = ['GET', 'POST']): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': origin && isAllowedOrigin(origin) ? origin : env.ALLOWED_ORIGINS[0],
    'Access-Control-Allow-Methods': [...methods, 'OPTIONS'].join(', '),
    'Access-Control-Allow-Headers': 'Content-Type, Authorization, x-correlation-id, x-callback-token, x-request-id',
    'Access-Control-Allow-Credentials': 'false',
    Vary: 'Origin',
  };
}

export function headerValue(headers: Record<string, string | undefined> | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value) return value;
  }
  return undefined;
}
