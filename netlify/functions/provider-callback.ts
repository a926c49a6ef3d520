import { env } from '../../src/config/env';
import { verifyCallback } from '../../src/lib/http/callbackAuth';
import { HttpError } from '../../src/lib/http/httpError';
import { headerValue } from '../../src/lib/http/httpUtils';
import { parseNotification } from '../../src/lib/provider/http-gateway';
import { createHandler, parseJsonBody } from './_utils';
import { getRuntime, type Runtime } from './_runtime';

function correlationIdFrom(path: string, query: Record<string, string | undefined> | null): string | undefined {
  const match = /\/callback\/([^/]+)\/?$/.exec(path);
  if (match) return decodeURIComponent(match[1]);
  return query?.correlationId || undefined;
}

/**
 * Push notifications from the provider, authenticated by the `sig` the
 * callback URL carries or by `x-callback-token`. Late, duplicate and unknown
 * deliveries are acknowledged with 200 so the provider stops retrying.
 */
export function createCallbackHandler(runtime: () => Runtime) {
  return createHandler(['POST'], async (event, { json, requestId }) => {
    const secret = env.CALLBACK_TOKEN;
    if (!secret) {
      throw new HttpError(404, 'Push notifications are not configured');
    }

    const correlationId = correlationIdFrom(event.path, event.queryStringParameters);
    if (!correlationId) {
      throw new HttpError(400, 'correlationId is required');
    }

    const authorized = verifyCallback(secret, correlationId, {
      token: headerValue(event.headers, 'x-callback-token'),
      signature: event.queryStringParameters?.sig,
    });
    if (!authorized) {
      throw new HttpError(401, 'Invalid callback signature');
    }

    const status = parseNotification(parseJsonBody(event));
    if (!status) {
      throw new HttpError(400, 'Notification is not a terminal status');
    }

    const receipt = runtime().broker.notify(correlationId, status);
    return json(200, { ok: true, correlationId, receipt, requestId });
  });
}

export const handler = createCallbackHandler(getRuntime);
