export type JobState = 'SUBMITTED' | 'AWAITING_COMPLETION' | 'COMPLETE' | 'FAILED' | 'TIMED_OUT';

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set(['COMPLETE', 'FAILED', 'TIMED_OUT']);

export type ErrorCode = 'PROVIDER_REJECTED' | 'GENERATION_FAILED' | 'TIMEOUT' | 'RESOURCE_LOAD_FAILED';

export interface GenerationError {
  code: ErrorCode;
  message: string;
}

/** Which party resolved the job. */
export type ResolvedBy = 'push' | 'poll' | 'deadline' | 'submit' | 'slot';

export type CompletionPath = Extract<ResolvedBy, 'push' | 'poll'>;

export type GenerationParams = Record<string, string | number | boolean | null>;

export interface Artifact {
  ref: string;
  contentType: string;
  bytes: Uint8Array;
  storedKey?: string;
}

export type JobOutcome =
  | { state: 'COMPLETE'; artifact: Artifact; resolvedBy: CompletionPath }
  | { state: 'FAILED'; error: GenerationError; resolvedBy: ResolvedBy }
  | { state: 'TIMED_OUT'; error: GenerationError & { code: 'TIMEOUT' }; resolvedBy: 'deadline' };

export type GenerationResult = JobOutcome & {
  correlationId: string;
  externalId?: string;
};

/** Provider-reported job status, already normalised by the gateway adapter. */
export type ProviderStatus =
  | { state: 'PENDING' }
  | { state: 'RUNNING' }
  | { state: 'COMPLETE'; artifactRef: string }
  | { state: 'FAILED'; message: string };

export type TerminalStatus = Extract<ProviderStatus, { state: 'COMPLETE' | 'FAILED' }>;

export function isTerminalStatus(status: ProviderStatus): status is TerminalStatus {
  return status.state === 'COMPLETE' || status.state === 'FAILED';
}

export interface JobSnapshot {
  correlationId: string;
  externalId?: string;
  state: JobState;
  claimed: boolean;
  notified: boolean;
  remainingMs: number;
  ageMs: number;
}
