import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { CompletionBroker } from '../jobs/broker';
import { DuplicateCorrelationIdError, ResourceLoadFailedError } from '../jobs/errors';
import type { GenerationParams, GenerationResult } from '../jobs/model';
import type { ProviderGateway } from '../provider/types';
import type { ResourceSlot } from '../resources/slot';

export interface GenerationRequest {
  prompt: string;
  params?: GenerationParams;
  /** Local model to run on. Omitted for requests routed to the hosted provider. */
  resourceId?: string;
  correlationId?: string;
}

export interface LocalRuntime<THandle> {
  slot: ResourceSlot<THandle>;
  gateway: ProviderGateway;
}

export interface GenerationServiceOptions<THandle> {
  broker: CompletionBroker;
  provider: ProviderGateway;
  local?: LocalRuntime<THandle>;
  logger?: Logger;
}

export function newCorrelationId(): string {
  return `gen_${randomUUID()}`;
}

/**
 * `generate`: routes a request to the hosted provider, or makes its model
 * resident in the local slot and runs it there, then hands the job to the
 * broker. Resolves with a typed outcome; throws only for a duplicate id.
 */
export class GenerationService<THandle = unknown> {
  readonly broker: CompletionBroker;
  readonly local?: LocalRuntime<THandle>;
  private readonly provider: ProviderGateway;
  private readonly logger?: Logger;

  constructor(options: GenerationServiceOptions<THandle>) {
    this.broker = options.broker;
    this.provider = options.provider;
    this.local = options.local;
    this.logger = options.logger;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const correlationId = request.correlationId?.trim() || newCorrelationId();
    if (this.broker.registry.has(correlationId)) {
      throw new DuplicateCorrelationIdError(correlationId);
    }
    const submission = { correlationId, prompt: request.prompt, params: request.params };

    if (!request.resourceId) {
      return this.broker.run(this.provider, submission);
    }

    const resourceId = request.resourceId;
    const local = this.local;
    if (!local) {
      return {
        state: 'FAILED',
        error: { code: 'RESOURCE_LOAD_FAILED', message: `no local runtime configured for ${resourceId}` },
        resolvedBy: 'slot',
        correlationId,
      };
    }

    try {
      return await local.slot.use(resourceId, () =>
        this.broker.run(local.gateway, {
          ...submission,
          params: { ...submission.params, model: resourceId },
        })
      );
    } catch (error) {
      if (!(error instanceof ResourceLoadFailedError)) throw error;
      this.logger?.error({ correlationId, resourceId, err: error }, 'Local model unavailable');
      return {
        state: 'FAILED',
        error: { code: 'RESOURCE_LOAD_FAILED', message: error.message },
        resolvedBy: 'slot',
        correlationId,
      };
    }
  }
}
