import type { Logger } from 'pino';
import type { Deadline } from '../clock/deadline';
import { DuplicateCorrelationIdError } from './errors';
import {
  TERMINAL_STATES,
  type JobOutcome,
  type JobSnapshot,
  type JobState,
  type TerminalStatus,
} from './model';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function defer<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/** Handle returned to the submitter of a job. */
export interface Waiter {
  readonly correlationId: string;
  /** Settles exactly once, when the claim winner records the result. */
  readonly outcome: Promise<JobOutcome>;
  /** Settles with the first push notification delivered for this job, if any. */
  readonly notification: Promise<TerminalStatus>;
  /** Aborts the moment the job is claimed; losing watchers stop on it. */
  readonly signal: AbortSignal;
}

export type DeliveryReceipt = 'accepted' | 'duplicate' | 'resolved' | 'unknown';

interface JobEntry {
  correlationId: string;
  externalId?: string;
  state: JobState;
  claimed: boolean;
  notified: boolean;
  deadline: Deadline;
  result?: JobOutcome;
  outcome: Deferred<JobOutcome>;
  notification: Deferred<TerminalStatus>;
  controller: AbortController;
}

export interface JobRegistryOptions {
  logger?: Logger;
}

/**
 * Correlation id → in-flight job. Every mutation below runs to completion
 * without yielding, so on the event loop a check-and-set is atomic: no other
 * task can observe or change an entry between the read and the write.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly logger?: Logger;

  constructor(options: JobRegistryOptions = {}) {
    this.logger = options.logger;
  }

  register(correlationId: string, deadline: Deadline): Waiter {
    if (this.jobs.has(correlationId)) {
      throw new DuplicateCorrelationIdError(correlationId);
    }

    const entry: JobEntry = {
      correlationId,
      state: 'SUBMITTED',
      claimed: false,
      notified: false,
      deadline,
      outcome: defer<JobOutcome>(),
      notification: defer<TerminalStatus>(),
      controller: new AbortController(),
    };
    this.jobs.set(correlationId, entry);

    return {
      correlationId,
      outcome: entry.outcome.promise,
      notification: entry.notification.promise,
      signal: entry.controller.signal,
    };
  }

  markAwaiting(correlationId: string, externalId: string): void {
    const entry = this.jobs.get(correlationId);
    if (!entry || entry.claimed) return;
    entry.externalId = externalId;
    entry.state = 'AWAITING_COMPLETION';
  }

  /** Flips `claimed` false → true. Returns true only for the call that flipped it. */
  claim(correlationId: string): boolean {
    const entry = this.jobs.get(correlationId);
    if (!entry || entry.claimed) {
      return false;
    }
    entry.claimed = true;
    entry.controller.abort();
    return true;
  }

  /** Records the terminal outcome and wakes the waiting caller. Only the claim winner may call this. */
  resolve(correlationId: string, outcome: JobOutcome): void {
    const entry = this.jobs.get(correlationId);
    if (!entry) {
      throw new Error(`cannot resolve unknown job: ${correlationId}`);
    }
    if (!entry.claimed) {
      throw new Error(`cannot resolve unclaimed job: ${correlationId}`);
    }
    if (TERMINAL_STATES.has(entry.state)) {
      throw new Error(`job ${correlationId} is already ${entry.state}`);
    }
    entry.state = outcome.state;
    entry.result = outcome;
    entry.outcome.resolve(outcome);
  }

  remove(correlationId: string): boolean {
    const entry = this.jobs.get(correlationId);
    if (!entry) return false;
    if (!entry.result) {
      this.logger?.warn({ correlationId, state: entry.state }, 'Removing job before a result was recorded');
    }
    return this.jobs.delete(correlationId);
  }

  /** Hands a push notification to the job's push watcher. First delivery wins. */
  deliver(correlationId: string, status: TerminalStatus): DeliveryReceipt {
    const entry = this.jobs.get(correlationId);
    if (!entry) return 'unknown';
    if (entry.claimed) return 'resolved';
    if (entry.notified) return 'duplicate';
    entry.notified = true;
    entry.notification.resolve(status);
    return 'accepted';
  }

  has(correlationId: string): boolean {
    return this.jobs.has(correlationId);
  }

  get size(): number {
    return this.jobs.size;
  }

  describe(correlationId: string): JobSnapshot | undefined {
    const entry = this.jobs.get(correlationId);
    return entry ? toSnapshot(entry) : undefined;
  }

  list(): JobSnapshot[] {
    return [...this.jobs.values()].map(toSnapshot);
  }
}

function toSnapshot(entry: JobEntry): JobSnapshot {
  return {
    correlationId: entry.correlationId,
    externalId: entry.externalId,
    state: entry.state,
    claimed: entry.claimed,
    notified: entry.notified,
    remainingMs: entry.deadline.remainingMs(),
    ageMs: entry.deadline.elapsedMs(),
  };
}
