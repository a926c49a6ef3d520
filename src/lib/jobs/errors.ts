export class DuplicateCorrelationIdError extends Error {
  readonly statusCode = 409;

  constructor(readonly correlationId: string) {
    super(`correlation id already in flight: ${correlationId}`);
    this.name = 'DuplicateCorrelationIdError';
  }
}

export class ProviderRejectedError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = 'ProviderRejectedError';
    this.status = options?.status;
  }
}

/** Network failure or 5xx while asking for status; the poll loop retries these. */
export class ProviderTransientError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = 'ProviderTransientError';
    this.status = options?.status;
  }
}

export class ResourceLoadFailedError extends Error {
  readonly statusCode = 503;

  constructor(readonly resourceId: string, cause?: unknown) {
    super(`failed to load ${resourceId}: ${describeError(cause)}`, { cause });
    this.name = 'ResourceLoadFailedError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'unknown error';
}
