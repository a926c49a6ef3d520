import { vi } from 'vitest';
import type { HandlerEvent } from '@netlify/functions';
import type { Runtime } from '../netlify/functions/_runtime';
import type { Clock } from '../src/lib/clock/deadline';
import { GenerationService } from '../src/lib/generation/service';
import { CompletionBroker, type BrokerTimings } from '../src/lib/jobs/broker';
import type { ProviderStatus } from '../src/lib/jobs/model';
import { createLogger } from '../src/lib/logger';
import type { FetchedArtifact, ProviderGateway, SubmitRequest } from '../src/lib/provider/types';
import type { ModelHandle } from '../src/lib/resources/http-repository';
import { ResourceSlot, type ModelRepository } from '../src/lib/resources/slot';
import type { ArtifactCatalog } from '../src/lib/storage/s3';

export const baseEnv = {
  PROVIDER_API_URL: 'https://provider.test/v1',
  PROVIDER_API_KEY: 'test-secret',
  PUBLIC_BASE_URL: 'https://relay.test',
  CALLBACK_TOKEN: 'test-secret',
  ALLOWED_ORIGINS: 'https://frontend.test',
  PUSH_TIMEOUT_MS: '180000',
  POLL_INTERVAL_MS: '3000',
  TOTAL_TIMEOUT_MS: '360000',
  POLL_MODE: 'fallback',
  FEATURES_PERSIST_ARTIFACTS: 'false',
  PRESIGN_TTL: '900',
  LOG_LEVEL: 'silent',
  NODE_ENV: 'test',
} as const;

type EnvOverrides = Record<string, string | undefined>;

export async function loadModule<T>(path: string, overrides: EnvOverrides = {}): Promise<T> {
  vi.resetModules();
  const nextEnv: NodeJS.ProcessEnv = { ...baseEnv };

  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value === 'undefined') {
      delete nextEnv[key];
    } else {
      nextEnv[key] = value;
    }
  }

  process.env = nextEnv;
  const module: T = await import(path);
  return module;
}

export const storageEnv: EnvOverrides = {
  FEATURES_PERSIST_ARTIFACTS: 'true',
  REGION: 'auto',
  R2_S3_ENDPOINT: 'https://example.r2.cloudflarestorage.com',
  R2_BUCKET: 'relay-test',
  R2_ACCESS_KEY_ID: 'test-access-key',
  R2_SECRET_ACCESS_KEY: 'test-secret',
};

async function settle(): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export async function waitFor(condition: () => boolean, attempts = 50): Promise<void> {
  for (let i = 0; i < attempts; i++) {
    if (condition()) return;
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  throw new Error('condition not met');
}

interface Sleeper {
  at: number;
  wake: () => void;
}

/** Clock that only moves when a test calls `advance`. */
export class ManualClock implements Clock {
  private current = 0;
  private sleepers = new Set<Sleeper>();

  now(): number {
    return this.current;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.resolve();
    return new Promise((resolve) => {
      const sleeper: Sleeper = {
        at: this.current + Math.max(0, ms),
        wake: () => {
          this.sleepers.delete(sleeper);
          signal?.removeEventListener('abort', sleeper.wake);
          resolve();
        },
      };
      this.sleepers.add(sleeper);
      signal?.addEventListener('abort', sleeper.wake, { once: true });
    });
  }

  /** Moves time forward, waking sleepers in order and letting each one run before the next. */
  async advance(ms: number): Promise<void> {
    const target = this.current + ms;
    for (;;) {
      await settle();
      let next: Sleeper | undefined;
      for (const sleeper of this.sleepers) {
        if (sleeper.at <= target && (!next || sleeper.at < next.at)) next = sleeper;
      }
      if (!next) break;
      this.current = Math.max(this.current, next.at);
      next.wake();
    }
    this.current = target;
    await settle();
  }

  get pendingSleepers(): number {
    return this.sleepers.size;
  }
}

export function artifactBytes(ref: string): Uint8Array {
  return new TextEncoder().encode(`image:${ref}`);
}

type StatusStep = ProviderStatus | Error;

/**
 * Scripted provider. `statuses` is consumed one per poll; the last entry
 * repeats. An Error entry is thrown instead of returned.
 */
export class FakeGateway implements ProviderGateway {
  readonly submitted: SubmitRequest[] = [];
  readonly statusCalls: number[] = [];
  readonly fetched: string[] = [];
  statuses: StatusStep[] = [{ state: 'RUNNING' }];
  submitError?: Error;
  fetchError?: Error;
  /** When set, artifact downloads wait for it. */
  fetchGate?: Promise<void>;
  onSubmit?: (request: SubmitRequest) => void;

  constructor(private readonly clock: Clock) {}

  async submit(request: SubmitRequest): Promise<string> {
    this.submitted.push(request);
    this.onSubmit?.(request);
    if (this.submitError) throw this.submitError;
    return `ext-${request.correlationId}`;
  }

  async status(): Promise<ProviderStatus> {
    this.statusCalls.push(this.clock.now());
    const step = this.statuses.length > 1 ? this.statuses.shift() : this.statuses[0];
    if (!step) return { state: 'RUNNING' };
    if (step instanceof Error) throw step;
    return step;
  }

  async fetch(artifactRef: string): Promise<FetchedArtifact> {
    this.fetched.push(artifactRef);
    await this.fetchGate;
    if (this.fetchError) throw this.fetchError;
    return { bytes: artifactBytes(artifactRef), contentType: 'image/png' };
  }
}

/** Records every repository call in order; `failing` ids throw on load. */
export class FakeRepository implements ModelRepository<string> {
  readonly calls: string[] = [];
  readonly failing = new Set<string>();
  failUnload = false;

  get loads(): number {
    return this.calls.filter((call) => call.startsWith('load:') && call.endsWith(':start')).length;
  }

  get unloads(): number {
    return this.calls.filter((call) => call.startsWith('unload:') && call.endsWith(':start')).length;
  }

  async load(resourceId: string): Promise<string> {
    this.calls.push(`load:${resourceId}:start`);
    await settle();
    if (this.failing.has(resourceId)) {
      this.calls.push(`load:${resourceId}:error`);
      throw new Error(`no weights for ${resourceId}`);
    }
    this.calls.push(`load:${resourceId}:end`);
    return `handle:${resourceId}`;
  }

  async unload(_handle: string, resourceId: string): Promise<void> {
    this.calls.push(`unload:${resourceId}:start`);
    await settle();
    if (this.failUnload) throw new Error('device busy');
    this.calls.push(`unload:${resourceId}:end`);
  }
}

export function buildEvent(overrides: Partial<HandlerEvent> = {}): HandlerEvent {
  return {
    rawUrl: 'https://relay.test/api/test',
    rawQuery: '',
    path: '/api/test',
    httpMethod: 'GET',
    headers: { origin: baseEnv.ALLOWED_ORIGINS },
    multiValueHeaders: {},
    queryStringParameters: {},
    multiValueQueryStringParameters: {},
    body: null,
    isBase64Encoded: false,
    ...overrides,
  };
}

export function parseBody(body: string | undefined): unknown {
  return JSON.parse(body ?? '{}');
}

/** Model repository that hands out `ModelHandle`s, for wiring a runtime in handler tests. */
export class FakeModelRepository implements ModelRepository<ModelHandle> {
  readonly failing = new Set<string>();
  readonly loaded: string[] = [];
  readonly unloaded: string[] = [];

  async load(resourceId: string): Promise<ModelHandle> {
    if (this.failing.has(resourceId)) throw new Error(`no weights for ${resourceId}`);
    this.loaded.push(resourceId);
    return { handle: `h-${resourceId}`, resourceId };
  }

  async unload(model: ModelHandle): Promise<void> {
    this.unloaded.push(model.resourceId);
  }
}

export interface TestRuntimeOptions {
  timings?: Partial<BrokerTimings>;
  push?: boolean;
  local?: boolean;
  artifacts?: ArtifactCatalog;
}

export function createTestRuntime({ timings = {}, push = false, local = false, artifacts }: TestRuntimeOptions = {}) {
  const clock = new ManualClock();
  const provider = new FakeGateway(clock);
  const localGateway = new FakeGateway(clock);
  const repository = new FakeModelRepository();
  const broker = new CompletionBroker({
    clock,
    timings: { pushTimeoutMs: 15_000, pollIntervalMs: 3_000, totalTimeoutMs: 60_000, ...timings },
    callbackUrlFor: push ? (correlationId) => `https://relay.test/api/callback/${correlationId}` : undefined,
  });
  const slot = local ? new ResourceSlot(repository) : undefined;
  const service = new GenerationService<ModelHandle>({
    broker,
    provider,
    local: slot ? { slot, gateway: localGateway } : undefined,
  });
  const runtime: Runtime = { service, broker, slot, artifacts, logger: createLogger({ level: 'silent' }) };
  return { clock, provider, localGateway, repository, broker, slot, runtime };
}
