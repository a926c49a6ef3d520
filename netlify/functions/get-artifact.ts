import { z } from 'zod';
import { env } from '../../src/config/env';
import { HttpError } from '../../src/lib/http/httpError';
import { createHandler } from './_utils';
import { getRuntime, type Runtime } from './_runtime';

const Q = z.object({ correlationId: z.string().min(1, 'correlationId is required') });

export function createArtifactHandler(runtime: () => Runtime) {
  return createHandler(['GET'], async (event, { json }) => {
    const { artifacts } = runtime();
    if (!artifacts) throw new HttpError(404, 'Artifact persistence is disabled');

    const parsed = Q.safeParse(event.queryStringParameters ?? {});
    if (!parsed.success) throw new HttpError(400, 'correlationId is required');

    const stored = await artifacts.describe(parsed.data.correlationId);
    if (!stored) throw new HttpError(404, 'Artifact not found');

    const downloadUrl = await artifacts.presignGet(stored.key, env.PRESIGN_TTL);
    return json(200, { ok: true, artifact: stored, downloadUrl, expiresIn: env.PRESIGN_TTL });
  });
}

export const handler = createArtifactHandler(getRuntime);
