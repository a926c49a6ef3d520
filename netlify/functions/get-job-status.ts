import { env } from '../../src/config/env';
import { bearerToken, secretMatches } from '../../src/lib/http/callbackAuth';
import { HttpError } from '../../src/lib/http/httpError';
import { headerValue } from '../../src/lib/http/httpUtils';
import { createHandler } from './_utils';
import { getRuntime, type Runtime } from './_runtime';

export function createJobStatusHandler(runtime: () => Runtime) {
  return createHandler(['GET'], async (event, { json }) => {
    const { registry } = runtime().broker;
    const correlationId = event.queryStringParameters?.correlationId;

    if (!correlationId) {
      // Listing exposes every in-flight id, which is all a forged callback needs.
      if (!env.CALLBACK_TOKEN) throw new HttpError(403, 'Job listing is disabled');
      if (!secretMatches(env.CALLBACK_TOKEN, bearerToken(headerValue(event.headers, 'authorization')))) {
        throw new HttpError(401, 'Job listing requires a bearer token');
      }
      return json(200, { ok: true, jobs: registry.list() });
    }

    const job = registry.describe(correlationId);
    if (!job) throw new HttpError(404, 'Job not found');
    return json(200, { ok: true, job });
  });
}

export const handler = createJobStatusHandler(getRuntime);
