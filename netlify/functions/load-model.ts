import { z } from 'zod';
import { HttpError } from '../../src/lib/http/httpError';
import { createHandler, parseJsonBody } from './_utils';
import { getRuntime, type Runtime } from './_runtime';

const loadRequestSchema = z.object({ resourceId: z.string().trim().min(1, 'resourceId is required') });

export function createLoadModelHandler(runtime: () => Runtime) {
  return createHandler(['POST'], async (event, { json }) => {
    const { slot } = runtime();
    if (!slot) throw new HttpError(404, 'No local runtime configured');

    const parsed = loadRequestSchema.safeParse(parseJsonBody(event));
    if (!parsed.success) {
      throw new HttpError(400, parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    await slot.ensure(parsed.data.resourceId);
    return json(200, { ok: true, slot: slot.status() });
  });
}

export const handler = createLoadModelHandler(getRuntime);
