import { createHandler } from './_utils';
import { getRuntime, type Runtime } from './_runtime';

export function createHealthHandler(runtime: () => Runtime) {
  return createHandler(['GET'], async (_event, { json }) => {
    const { broker, slot } = runtime();
    return json(200, {
      status: 'ok',
      pendingJobs: broker.registry.size,
      slot: slot ? slot.status() : null,
      time: new Date().toISOString(),
    });
  });
}

export const handler = createHealthHandler(getRuntime);
