import { z } from 'zod';
import { fetchSafe } from '../http/fetchSafe';
import type { ModelRepository } from './slot';

export interface ModelHandle {
  handle: string;
  resourceId: string;
}

const loadResponseSchema = z.object({ handle: z.string().min(1) });

export interface HttpModelRepositoryOptions {
  baseUrl: string;
  /** Loading weights is slow; the default allows ten minutes. */
  loadTimeoutMs?: number;
}

/** Model repository backed by the local runtime's `/models` endpoints. */
export class HttpModelRepository implements ModelRepository<ModelHandle> {
  private readonly baseUrl: string;
  private readonly loadTimeoutMs: number;

  constructor(options: HttpModelRepositoryOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.loadTimeoutMs = options.loadTimeoutMs ?? 600_000;
  }

  async load(resourceId: string): Promise<ModelHandle> {
    const response = await fetchSafe(`${this.baseUrl}/models/load`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ model: resourceId }),
      timeoutMs: this.loadTimeoutMs,
      retries: 0,
    });
    if (!response.ok) {
      throw new Error(`runtime refused to load ${resourceId} (${response.status})`);
    }
    const { handle } = loadResponseSchema.parse(await response.json());
    return { handle, resourceId };
  }

  async unload(model: ModelHandle): Promise<void> {
    const response = await fetchSafe(`${this.baseUrl}/models/unload`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ handle: model.handle }),
      retries: 1,
    });
    if (!response.ok) {
      throw new Error(`runtime failed to unload ${model.resourceId} (${response.status})`);
    }
  }
}
