import { HttpError } from '../../src/lib/http/httpError';
import { createHandler } from './_utils';
import { getRuntime, type Runtime } from './_runtime';

export function createReleaseModelHandler(runtime: () => Runtime) {
  return createHandler(['POST'], async (_event, { json }) => {
    const { slot } = runtime();
    if (!slot) throw new HttpError(404, 'No local runtime configured');
    await slot.release();
    return json(200, { ok: true, slot: slot.status() });
  });
}

export const handler = createReleaseModelHandler(getRuntime);
