import type { GenerationParams, ProviderStatus } from '../jobs/model';

export interface SubmitRequest {
  correlationId: string;
  prompt: string;
  params: GenerationParams;
  /** Where the provider should push its completion notification. */
  callbackUrl?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface FetchedArtifact {
  bytes: Uint8Array;
  contentType: string;
}

/**
 * Boundary to a generation provider. `submit` throws `ProviderRejectedError`,
 * `status` throws `ProviderTransientError` for failures worth retrying.
 */
export interface ProviderGateway {
  submit(request: SubmitRequest): Promise<string>;
  status(externalId: string, options?: RequestOptions): Promise<ProviderStatus>;
  fetch(artifactRef: string, options?: RequestOptions): Promise<FetchedArtifact>;
}
