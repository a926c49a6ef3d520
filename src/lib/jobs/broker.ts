import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { Deadline, systemClock, type Clock } from '../clock/deadline';
import type { FetchedArtifact, ProviderGateway } from '../provider/types';
import { ProviderRejectedError, describeError } from './errors';
import {
  isTerminalStatus,
  type Artifact,
  type CompletionPath,
  type GenerationParams,
  type GenerationResult,
  type JobOutcome,
  type ResolvedBy,
  type TerminalStatus,
} from './model';
import { JobRegistry, type DeliveryReceipt, type Waiter } from './registry';

export type PollMode = 'fallback' | 'parallel';

export interface BrokerTimings {
  /** How long to wait for a push before polling starts (fallback mode). */
  pushTimeoutMs: number;
  pollIntervalMs: number;
  /** Overall budget measured from registration. */
  totalTimeoutMs: number;
  pollMode: PollMode;
}

export const DEFAULT_TIMINGS: BrokerTimings = {
  pushTimeoutMs: 180_000,
  pollIntervalMs: 3_000,
  totalTimeoutMs: 360_000,
  pollMode: 'fallback',
};

export interface ArtifactRecord {
  correlationId: string;
  externalId: string;
  prompt: string;
  params: GenerationParams;
  resolvedBy: CompletionPath;
}

export interface ArtifactSink {
  /** Stores the artifact and returns its storage key. */
  persist(record: ArtifactRecord, artifact: FetchedArtifact): Promise<string>;
}

export interface JobSubmission {
  correlationId: string;
  prompt: string;
  params?: GenerationParams;
}

export interface CompletionBrokerEvents {
  resolved: (correlationId: string, outcome: JobOutcome) => void;
  discarded: (correlationId: string, path: CompletionPath) => void;
  pollStarted: (correlationId: string) => void;
}

export interface CompletionBrokerOptions {
  registry?: JobRegistry;
  clock?: Clock;
  timings?: Partial<BrokerTimings>;
  /**
   * Builds the push URL handed to the provider. Jobs without one poll from the
   * start; their push watcher still runs, so `notify` is never dropped.
   */
  callbackUrlFor?: (correlationId: string) => string | undefined;
  sink?: ArtifactSink;
  logger?: Logger;
}

interface ActiveJob {
  correlationId: string;
  externalId: string;
  prompt: string;
  params: GenerationParams;
  gateway: ProviderGateway;
  waiter: Waiter;
  deadline: Deadline;
}

type Watcher = CompletionPath | 'deadline';

/**
 * Resolves submitted jobs through whichever of push, poll or the deadline
 * gets there first. Every path goes through `registry.claim`; only the
 * winner fetches, records and removes.
 */
export class CompletionBroker extends EventEmitter<CompletionBrokerEvents> {
  readonly registry: JobRegistry;
  readonly timings: BrokerTimings;
  private readonly clock: Clock;
  private readonly callbackUrlFor?: (correlationId: string) => string | undefined;
  private readonly sink?: ArtifactSink;
  private readonly logger?: Logger;

  constructor(options: CompletionBrokerOptions = {}) {
    super();
    this.logger = options.logger;
    this.registry = options.registry ?? new JobRegistry({ logger: options.logger });
    this.clock = options.clock ?? systemClock;
    this.timings = { ...DEFAULT_TIMINGS, ...options.timings };
    this.callbackUrlFor = options.callbackUrlFor;
    this.sink = options.sink;
  }

  /**
   * Submits one job and waits for its single terminal result. Throws only
   * `DuplicateCorrelationIdError`; every other failure is a typed outcome.
   */
  async run(gateway: ProviderGateway, submission: JobSubmission): Promise<GenerationResult> {
    const { correlationId, prompt } = submission;
    const params = submission.params ?? {};
    const deadline = Deadline.after(this.clock, this.timings.totalTimeoutMs);
    const waiter = this.registry.register(correlationId, deadline);
    const callbackUrl = this.callbackUrlFor?.(correlationId);

    let externalId: string;
    try {
      externalId = await gateway.submit({ correlationId, prompt, params, callbackUrl });
    } catch (error) {
      const message = error instanceof ProviderRejectedError ? error.message : describeError(error);
      this.logger?.warn({ correlationId, err: error }, 'Provider rejected submission');
      if (this.registry.claim(correlationId)) {
        this.settle(correlationId, {
          state: 'FAILED',
          error: { code: 'PROVIDER_REJECTED', message },
          resolvedBy: 'submit',
        });
      }
      return { ...(await waiter.outcome), correlationId };
    }

    this.registry.markAwaiting(correlationId, externalId);
    this.logger?.info({ correlationId, externalId, push: Boolean(callbackUrl) }, 'Job submitted');

    const job: ActiveJob = { correlationId, externalId, prompt, params, gateway, waiter, deadline };
    const pollDelayMs = callbackUrl && this.timings.pollMode === 'fallback' ? this.timings.pushTimeoutMs : 0;

    const watchers = Promise.all([
      this.guard(job, 'push', () => this.watchPush(job)),
      this.guard(job, 'poll', () => this.watchPoll(job, pollDelayMs)),
      this.guard(job, 'deadline', () => this.watchDeadline(job)),
    ]);

    const outcome = await waiter.outcome;
    await watchers;
    return { ...outcome, correlationId, externalId };
  }

  /** Entry point for inbound push notifications. Late and unknown ones are no-ops. */
  notify(correlationId: string, status: TerminalStatus): DeliveryReceipt {
    const receipt = this.registry.deliver(correlationId, status);
    if (receipt === 'accepted') {
      this.logger?.info({ correlationId, state: status.state }, 'Push notification received');
    } else {
      this.logger?.debug({ correlationId, receipt }, 'Push notification ignored');
    }
    return receipt;
  }

  private async watchPush(job: ActiveJob): Promise<void> {
    const { signal } = job.waiter;
    const status = await Promise.race([
      job.waiter.notification,
      this.clock.sleep(job.deadline.remainingMs(), signal).then(() => undefined),
    ]);
    if (!status) return;
    await this.complete(job, 'push', status);
  }

  private async watchPoll(job: ActiveJob, delayMs: number): Promise<void> {
    const { signal } = job.waiter;
    if (delayMs > 0) {
      await this.clock.sleep(Math.min(delayMs, job.deadline.remainingMs()), signal);
      if (signal.aborted || job.deadline.expired()) return;
      this.logger?.info(
        { correlationId: job.correlationId, waitedMs: delayMs },
        'No push notification yet; falling back to polling'
      );
    }
    this.emit('pollStarted', job.correlationId);

    let attempt = 0;
    while (!signal.aborted && !job.deadline.expired()) {
      attempt += 1;
      try {
        const status = await job.gateway.status(job.externalId, { signal });
        if (isTerminalStatus(status)) {
          await this.complete(job, 'poll', status);
          return;
        }
        this.logger?.debug({ correlationId: job.correlationId, attempt, state: status.state }, 'Provider status');
      } catch (error) {
        if (signal.aborted) return;
        this.logger?.warn({ correlationId: job.correlationId, attempt, err: error }, 'Status poll failed; retrying');
      }
      await this.clock.sleep(Math.min(this.timings.pollIntervalMs, job.deadline.remainingMs()), signal);
    }
  }

  private async watchDeadline(job: ActiveJob): Promise<void> {
    await this.clock.sleep(job.deadline.remainingMs(), job.waiter.signal);
    if (!this.registry.claim(job.correlationId)) return;
    this.logger?.warn({ correlationId: job.correlationId, externalId: job.externalId }, 'Job timed out');
    this.settle(job.correlationId, {
      state: 'TIMED_OUT',
      error: { code: 'TIMEOUT', message: `no completion within ${this.timings.totalTimeoutMs}ms` },
      resolvedBy: 'deadline',
    });
  }

  private async complete(job: ActiveJob, path: CompletionPath, status: TerminalStatus): Promise<void> {
    if (!this.registry.claim(job.correlationId)) {
      this.logger?.debug({ correlationId: job.correlationId, path }, 'Completion already claimed; discarding');
      this.emit('discarded', job.correlationId, path);
      return;
    }

    let outcome: JobOutcome;
    if (status.state === 'FAILED') {
      outcome = { state: 'FAILED', error: { code: 'GENERATION_FAILED', message: status.message }, resolvedBy: path };
    } else {
      try {
        const artifact = await this.collect(job, path, status.artifactRef);
        outcome = { state: 'COMPLETE', artifact, resolvedBy: path };
      } catch (error) {
        outcome = {
          state: 'FAILED',
          error: { code: 'GENERATION_FAILED', message: `artifact fetch failed: ${describeError(error)}` },
          resolvedBy: path,
        };
      }
    }
    this.settle(job.correlationId, outcome);
  }

  private async collect(job: ActiveJob, path: CompletionPath, ref: string): Promise<Artifact> {
    const fetched = await job.gateway.fetch(ref);
    const artifact: Artifact = { ref, contentType: fetched.contentType, bytes: fetched.bytes };
    if (!this.sink) return artifact;

    try {
      artifact.storedKey = await this.sink.persist(
        {
          correlationId: job.correlationId,
          externalId: job.externalId,
          prompt: job.prompt,
          params: job.params,
          resolvedBy: path,
        },
        fetched
      );
    } catch (error) {
      this.logger?.warn({ correlationId: job.correlationId, err: error }, 'Artifact persistence failed');
    }
    return artifact;
  }

  /** Winner-only: record, remove, then announce. */
  private settle(correlationId: string, outcome: JobOutcome): void {
    this.registry.resolve(correlationId, outcome);
    this.registry.remove(correlationId);
    this.logger?.info({ correlationId, state: outcome.state, resolvedBy: outcome.resolvedBy }, 'Job resolved');
    this.emit('resolved', correlationId, outcome);
  }

  private async guard(job: ActiveJob, watcher: Watcher, work: () => Promise<void>): Promise<void> {
    try {
      await work();
    } catch (error) {
      this.logger?.error({ correlationId: job.correlationId, watcher, err: error }, 'Watcher failed');
      if (this.registry.claim(job.correlationId)) {
        const resolvedBy: ResolvedBy = watcher;
        this.settle(job.correlationId, {
          state: 'FAILED',
          error: { code: 'GENERATION_FAILED', message: describeError(error) },
          resolvedBy,
        });
      }
    }
  }
}
