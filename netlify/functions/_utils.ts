import { randomUUID } from 'crypto';
import type { HandlerContext, HandlerEvent, HandlerResponse } from '@netlify/functions';
import { HttpError, statusCodeOf } from '../../src/lib/http/httpError';
import { corsHeaders, headerValue, isAllowedOrigin } from '../../src/lib/http/httpUtils';
import { describeError } from '../../src/lib/jobs/errors';

type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

type HandlerUtilities = {
  json: (statusCode: number, body: unknown, headers?: Record<string, string>) => HandlerResponse;
  requestId: string;
};

/** Narrower than `Handler` from @netlify/functions so callers can read the response. */
export type FunctionHandler = (event: HandlerEvent, context?: HandlerContext) => Promise<HandlerResponse>;

type WrappedHandler = (event: HandlerEvent, utils: HandlerUtilities) => Promise<HandlerResponse>;

function createUtilities(requestId: string): HandlerUtilities {
  return {
    json(statusCode, body, headers = {}) {
      return {
        statusCode,
        headers: { 'Content-Type': 'application/json; charset=utf-8', ...headers },
        body: JSON.stringify(body ?? {}),
      };
    },
    requestId,
  };
}

function buildErrorResponse(err: unknown, utils: HandlerUtilities): HandlerResponse {
  const statusCode = statusCodeOf(err);
  const message = statusCode === 500 && !(err instanceof HttpError) ? 'Internal Server Error' : describeError(err);
  return utils.json(statusCode, { ok: false, error: message, requestId: utils.requestId });
}

/**
 * Wraps a function body with CORS, method checks, request ids and error
 * mapping. Thrown errors carrying a `statusCode` keep it; anything else is a 500.
 */
export function createHandler(methods: HttpMethod[], handler: WrappedHandler): FunctionHandler {
  const allowed = methods.map((method) => method.toUpperCase());

  return async (event) => {
    const requestId = headerValue(event.headers, 'x-request-id') || randomUUID();
    const utils = createUtilities(requestId);
    const origin = headerValue(event.headers, 'origin');
    const baseHeaders = { ...corsHeaders(origin, allowed), 'X-Request-ID': requestId };
    const method = (event.httpMethod || 'GET').toUpperCase();

    if (origin && !isAllowedOrigin(origin)) {
      return utils.json(403, { ok: false, error: 'Origin not allowed', requestId }, baseHeaders);
    }

    if (method === 'OPTIONS') {
      return { statusCode: 204, headers: baseHeaders, body: '' };
    }

    if (!allowed.includes(method)) {
      return utils.json(
        405,
        { ok: false, error: `Method ${method} not allowed`, requestId },
        { ...baseHeaders, Allow: allowed.join(', ') }
      );
    }

    let response: HandlerResponse;
    try {
      response = await handler(event, utils);
    } catch (err) {
      response = buildErrorResponse(err, utils);
    }
    return { ...response, headers: { ...baseHeaders, ...response.headers } };
  };
}

export function parseJsonBody(event: HandlerEvent): unknown {
  if (!event.body) {
    return {};
  }

  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;

  if (!raw.trim()) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, 'Invalid JSON body');
  }
}

export type { HandlerUtilities };
