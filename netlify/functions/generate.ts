import { z } from 'zod';
import type { GenerationResult } from '../../src/lib/jobs/model';
import { HttpError } from '../../src/lib/http/httpError';
import { createHandler, parseJsonBody } from './_utils';
import { getRuntime, type Runtime } from './_runtime';

const paramValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const generateRequestSchema = z.object({
  prompt: z.string().trim().min(1, 'prompt is required'),
  params: z.record(paramValue).optional(),
  resourceId: z.string().trim().min(1).optional(),
  correlationId: z.string().trim().min(1).max(128).optional(),
});

const OUTCOME_STATUS = {
  PROVIDER_REJECTED: 502,
  GENERATION_FAILED: 502,
  TIMEOUT: 504,
  RESOURCE_LOAD_FAILED: 503,
} as const;

function toBody(result: GenerationResult) {
  if (result.state === 'COMPLETE') {
    const { artifact } = result;
    return {
      ok: true,
      correlationId: result.correlationId,
      externalId: result.externalId,
      resolvedBy: result.resolvedBy,
      artifact: {
        ref: artifact.ref,
        contentType: artifact.contentType,
        size: artifact.bytes.byteLength,
        storedKey: artifact.storedKey,
        image: Buffer.from(artifact.bytes).toString('base64'),
      },
    };
  }
  return {
    ok: false,
    correlationId: result.correlationId,
    externalId: result.externalId,
    state: result.state,
    resolvedBy: result.resolvedBy,
    error: result.error,
  };
}

export function createGenerateHandler(runtime: () => Runtime) {
  return createHandler(['POST'], async (event, { json, requestId }) => {
    const parsed = generateRequestSchema.safeParse(parseJsonBody(event));
    if (!parsed.success) {
      throw new HttpError(400, parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    const result = await runtime().service.generate(parsed.data);
    const statusCode = result.state === 'COMPLETE' ? 200 : OUTCOME_STATUS[result.error.code];
    return json(statusCode, { ...toBody(result), requestId });
  });
}

export const handler = createGenerateHandler(getRuntime);
