import { z } from 'zod';
import { fetchSafe } from '../http/fetchSafe';
import { ProviderRejectedError, ProviderTransientError, describeError } from '../jobs/errors';
import type { ProviderStatus, TerminalStatus } from '../jobs/model';
import type { FetchedArtifact, ProviderGateway, RequestOptions, SubmitRequest } from './types';

export interface HttpProviderGatewayOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
}

// Providers disagree on where the job id lives; every accepted shape is listed here and nowhere else.
const submitResponseSchema = z.union([
  z.object({ generationId: z.string().min(1) }).transform((data) => data.generationId),
  z.object({ id: z.string().min(1) }).transform((data) => data.id),
  z.object({ job: z.object({ id: z.string().min(1) }) }).transform((data) => data.job.id),
]);

const STATUS_WORDS: Record<string, ProviderStatus['state']> = {
  QUEUED: 'PENDING',
  PENDING: 'PENDING',
  STARTING: 'PENDING',
  RUNNING: 'RUNNING',
  PROCESSING: 'RUNNING',
  IN_PROGRESS: 'RUNNING',
  COMPLETE: 'COMPLETE',
  COMPLETED: 'COMPLETE',
  SUCCEEDED: 'COMPLETE',
  FAILED: 'FAILED',
  ERROR: 'FAILED',
  CANCELLED: 'FAILED',
  CANCELED: 'FAILED',
};

const statusWord = z
  .string()
  .min(1)
  .transform((value) => STATUS_WORDS[value.trim().toUpperCase().replace(/[\s-]+/g, '_')] ?? 'RUNNING');

const statusResponseSchema = z.object({
  status: statusWord,
  images: z.array(z.object({ url: z.string().min(1) })).optional(),
  url: z.string().min(1).optional(),
  error: z.string().nullish(),
});

const notificationSchema = z.object({
  status: statusWord,
  url: z.string().min(1).optional(),
  images: z.array(z.object({ url: z.string().min(1) })).optional(),
  error: z.string().nullish(),
});

const NO_IMAGES = 'generation marked complete but no images found';

function toProviderStatus(data: z.infer<typeof statusResponseSchema>): ProviderStatus {
  switch (data.status) {
    case 'COMPLETE': {
      const artifactRef = data.images?.[0]?.url ?? data.url;
      return artifactRef ? { state: 'COMPLETE', artifactRef } : { state: 'FAILED', message: NO_IMAGES };
    }
    case 'FAILED':
      return { state: 'FAILED', message: data.error || 'unknown error' };
    case 'PENDING':
      return { state: 'PENDING' };
    default:
      return { state: 'RUNNING' };
  }
}

/**
 * Parses an inbound push payload. Returns null for anything that is not a
 * terminal status, so a progress ping cannot resolve a job.
 */
export function parseNotification(payload: unknown): TerminalStatus | null {
  const parsed = notificationSchema.safeParse(payload);
  if (!parsed.success) return null;
  const status = toProviderStatus(parsed.data);
  return status.state === 'COMPLETE' || status.state === 'FAILED' ? status : null;
}

async function readBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch (error) {
    return `<unreadable body: ${describeError(error)}>`;
  }
}

/**
 * JSON-over-HTTP gateway: `POST /generations`, `GET /generations/:id`, and a
 * plain GET of the artifact URL. Used for both the hosted provider and the
 * local runtime.
 */
export class HttpProviderGateway implements ProviderGateway {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpProviderGatewayOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
  }

  async submit(request: SubmitRequest): Promise<string> {
    let response: Response;
    try {
      response = await fetchSafe(`${this.baseUrl}/generations`, {
        method: 'POST',
        headers: this.headers({ 'content-type': 'application/json' }),
        body: JSON.stringify({
          prompt: request.prompt,
          ...request.params,
          ...(request.callbackUrl ? { webhookUrl: request.callbackUrl } : {}),
        }),
        correlationId: request.correlationId,
        timeoutMs: this.options.timeoutMs,
        retries: this.options.retries,
        retryDelayMs: this.options.retryDelayMs,
      });
    } catch (error) {
      throw new ProviderRejectedError(`submission failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new ProviderRejectedError(`submission rejected (${response.status}): ${await readBody(response)}`, {
        status: response.status,
      });
    }

    const body = await this.json(response, (message, cause) => new ProviderRejectedError(message, { cause }));
    const parsed = submitResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderRejectedError('submission response did not include a job id');
    }
    return parsed.data;
  }

  async status(externalId: string, options: RequestOptions = {}): Promise<ProviderStatus> {
    let response: Response;
    try {
      response = await fetchSafe(`${this.baseUrl}/generations/${encodeURIComponent(externalId)}`, {
        headers: this.headers(),
        signal: options.signal,
        timeoutMs: this.options.timeoutMs,
        retries: 0,
      });
    } catch (error) {
      throw new ProviderTransientError(`status request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new ProviderTransientError(`status request returned ${response.status}`, { status: response.status });
    }

    const body = await this.json(response, (message, cause) => new ProviderTransientError(message, { cause }));
    const parsed = statusResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderTransientError('status response was not understood');
    }
    return toProviderStatus(parsed.data);
  }

  async fetch(artifactRef: string, options: RequestOptions = {}): Promise<FetchedArtifact> {
    const response = await fetchSafe(artifactRef, {
      signal: options.signal,
      timeoutMs: this.options.timeoutMs ?? 30_000,
      retries: this.options.retries,
      retryDelayMs: this.options.retryDelayMs,
    });
    if (!response.ok) {
      throw new Error(`artifact download returned ${response.status}`);
    }
    return {
      bytes: new Uint8Array(await response.arrayBuffer()),
      contentType: response.headers.get('content-type') ?? 'application/octet-stream',
    };
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return {
      accept: 'application/json',
      ...(this.options.apiKey ? { authorization: `Bearer ${this.options.apiKey}` } : {}),
      ...extra,
    };
  }

  private async json(response: Response, fail: (message: string, cause: unknown) => Error): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw fail(`provider returned invalid JSON (${response.status})`, error);
    }
  }
}
