import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { ResourceLoadFailedError } from '../jobs/errors';

export type SlotPhase = 'EMPTY' | 'LOADING' | 'READY' | 'UNLOADING';

export type UnloadReason = 'swap' | 'release';

/** Loads and frees heavyweight local resources (model weights). */
export interface ModelRepository<THandle> {
  load(resourceId: string): Promise<THandle>;
  unload(handle: THandle, resourceId: string): Promise<void>;
}

export interface SlotStatus {
  phase: SlotPhase;
  occupant: string | null;
  activeUses: number;
}

export interface ResourceSlotEvents {
  phase: (phase: SlotPhase, occupant: string | null) => void;
  loaded: (resourceId: string) => void;
  unloaded: (resourceId: string, reason: UnloadReason) => void;
}

export interface ResourceSlotOptions {
  logger?: Logger;
}

interface Occupant<THandle> {
  resourceId: string;
  handle: THandle;
}

/**
 * The single slot for one resident resource. Load and unload transitions
 * run one at a time behind `exclusive`; callers arriving mid-transition
 * queue behind it and re-check the occupant once they get their turn.
 */
export class ResourceSlot<THandle> extends EventEmitter<ResourceSlotEvents> {
  private phase: SlotPhase = 'EMPTY';
  private occupant: Occupant<THandle> | null = null;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private activeUses = 0;
  private drainWaiters: Array<() => void> = [];
  private readonly repository: ModelRepository<THandle>;
  private readonly logger?: Logger;

  constructor(repository: ModelRepository<THandle>, options: ResourceSlotOptions = {}) {
    super();
    this.repository = repository;
    this.logger = options.logger;
  }

  status(): SlotStatus {
    return {
      phase: this.phase,
      occupant: this.occupant?.resourceId ?? null,
      activeUses: this.activeUses,
    };
  }

  /** Makes `resourceId` the resident resource, unloading any other first. */
  async ensure(resourceId: string): Promise<THandle> {
    const resident = this.readyHandle(resourceId);
    if (resident) return resident.handle;
    return this.exclusive(() => this.swapTo(resourceId));
  }

  /**
   * Runs `work` against the resident `resourceId`, loading it if needed.
   * A swap to another resource waits until every in-flight use returns.
   */
  async use<T>(resourceId: string, work: (handle: THandle) => Promise<T>): Promise<T> {
    let handle: THandle;
    const resident = this.readyHandle(resourceId);
    if (resident) {
      handle = resident.handle;
      this.activeUses += 1;
    } else {
      handle = await this.exclusive(async () => {
        const loaded = await this.swapTo(resourceId);
        this.activeUses += 1;
        return loaded;
      });
    }

    try {
      return await work(handle);
    } finally {
      this.activeUses -= 1;
      if (this.activeUses === 0) {
        const waiters = this.drainWaiters;
        this.drainWaiters = [];
        for (const wake of waiters) wake();
      }
    }
  }

  /** Frees the slot without waiting for in-flight uses. No-op when empty. */
  async release(): Promise<void> {
    await this.exclusive(async () => {
      if (!this.occupant) return;
      await this.unloadOccupant('release');
    });
  }

  private readyHandle(resourceId: string): Occupant<THandle> | null {
    if (this.queued === 0 && this.phase === 'READY' && this.occupant?.resourceId === resourceId) {
      return this.occupant;
    }
    return null;
  }

  private async swapTo(resourceId: string): Promise<THandle> {
    if (this.phase === 'READY' && this.occupant?.resourceId === resourceId) {
      return this.occupant.handle;
    }
    if (this.occupant) {
      await this.waitForDrain();
      await this.unloadOccupant('swap');
    }
    return this.load(resourceId);
  }

  private async load(resourceId: string): Promise<THandle> {
    this.transition('LOADING', resourceId);
    const started = Date.now();
    try {
      const handle = await this.repository.load(resourceId);
      this.occupant = { resourceId, handle };
      this.transition('READY', resourceId);
      this.logger?.info({ resourceId, durationMs: Date.now() - started }, 'Resource loaded');
      this.emit('loaded', resourceId);
      return handle;
    } catch (error) {
      this.occupant = null;
      this.transition('EMPTY', null);
      this.logger?.error({ resourceId, err: error }, 'Resource load failed');
      throw new ResourceLoadFailedError(resourceId, error);
    }
  }

  private async unloadOccupant(reason: UnloadReason): Promise<void> {
    const current = this.occupant;
    if (!current) return;
    this.transition('UNLOADING', current.resourceId);
    try {
      await this.repository.unload(current.handle, current.resourceId);
    } catch (error) {
      this.logger?.warn({ resourceId: current.resourceId, reason, err: error }, 'Unload failed; treating slot as empty');
    } finally {
      this.occupant = null;
      this.transition('EMPTY', null);
    }
    this.logger?.info({ resourceId: current.resourceId, reason }, 'Resource unloaded');
    this.emit('unloaded', current.resourceId, reason);
  }

  private waitForDrain(): Promise<void> {
    if (this.activeUses === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  private transition(phase: SlotPhase, occupant: string | null): void {
    this.phase = phase;
    this.emit('phase', phase, occupant);
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    this.queued += 1;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run.finally(() => {
      this.queued -= 1;
    });
  }
}
