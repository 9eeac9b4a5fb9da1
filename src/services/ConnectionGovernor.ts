import { Logger } from '../utils/logger.js';
import { ClientDisconnectedError, GovernorTimeoutError } from '../utils/errors.js';
import { clampTimeout } from '../utils/timeouts.js';

export interface GovernorOptions {
  capacityPerHost: number;
  acquireTimeout: number;
}

export interface AcquireOptions {
  /** Overrides the governor's default acquire timeout */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface GovernorSlot {
  readonly id: number;
  readonly host: string;
  readonly acquiredAt: number;
}

export interface HostStats {
  host: string;
  inUse: number;
  queued: number;
  capacity: number;
}

interface Waiter {
  resolve: (slot: GovernorSlot) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

interface HostPool {
  inUse: number;
  queue: Waiter[];
}

/**
 * Per-host pool of upstream connection slots.
 *
 * Callers beyond capacity wait in arrival order. A released slot goes straight to the
 * oldest waiter, so a newer caller can never overtake a queued one.
 */
export class ConnectionGovernor {
  private readonly logger: Logger;
  private readonly pools: Map<string, HostPool> = new Map();
  private readonly live: Set<number> = new Set();
  private nextSlotId = 1;

  constructor(private readonly options: GovernorOptions) {
    if (!Number.isInteger(options.capacityPerHost) || options.capacityPerHost < 1) {
      throw new RangeError('Governor capacity must be a positive integer');
    }
    this.logger = new Logger('ConnectionGovernor');
  }

  get capacity(): number {
    return this.options.capacityPerHost;
  }

  acquire(host: string, options: AcquireOptions = {}): Promise<GovernorSlot> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new ClientDisconnectedError());
    }

    const pool = this.poolFor(host);
    if (pool.inUse < this.options.capacityPerHost && pool.queue.length === 0) {
      pool.inUse++;
      return Promise.resolve(this.createSlot(host));
    }

    const timeoutMs = clampTimeout(options.timeoutMs ?? this.options.acquireTimeout);

    return new Promise<GovernorSlot>((resolve, reject) => {
      const onAbort = (): void => {
        this.removeWaiter(host, waiter);
        reject(new ClientDisconnectedError());
      };

      const timer = setTimeout(() => {
        this.removeWaiter(host, waiter);
        this.logger.warn('Slot wait timed out', { host, timeoutMs, queued: pool.queue.length });
        reject(new GovernorTimeoutError(host, timeoutMs));
      }, timeoutMs);

      const waiter: Waiter = {
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        }
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      pool.queue.push(waiter);

      this.logger.debug('Waiting for upstream slot', {
        host,
        inUse: pool.inUse,
        queued: pool.queue.length
      });
    });
  }

  release(slot: GovernorSlot): void {
    if (!this.live.delete(slot.id)) {
      this.logger.error('Slot released more than once', { host: slot.host, slotId: slot.id });
      return;
    }

    const pool = this.poolFor(slot.host);
    const next = pool.queue.shift();

    if (next) {
      // Hand the slot over without decrementing, the waiter inherits it
      next.cleanup();
      next.resolve(this.createSlot(slot.host));
      return;
    }

    pool.inUse--;
    if (pool.inUse === 0) {
      this.pools.delete(slot.host);
    }
  }

  async withSlot<T>(host: string, fn: () => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const slot = await this.acquire(host, options);
    try {
      return await fn();
    } finally {
      this.release(slot);
    }
  }

  stats(host: string): HostStats {
    const pool = this.pools.get(host);
    return {
      host,
      inUse: pool?.inUse ?? 0,
      queued: pool?.queue.length ?? 0,
      capacity: this.options.capacityPerHost
    };
  }

  allStats(): HostStats[] {
    return Array.from(this.pools.keys()).map(host => this.stats(host));
  }

  private poolFor(host: string): HostPool {
    let pool = this.pools.get(host);
    if (!pool) {
      pool = { inUse: 0, queue: [] };
      this.pools.set(host, pool);
    }
    return pool;
  }

  private createSlot(host: string): GovernorSlot {
    const slot: GovernorSlot = { id: this.nextSlotId++, host, acquiredAt: Date.now() };
    this.live.add(slot.id);
    return slot;
  }

  private removeWaiter(host: string, waiter: Waiter): void {
    waiter.cleanup();
    const pool = this.pools.get(host);
    if (!pool) return;

    const index = pool.queue.indexOf(waiter);
    if (index !== -1) {
      pool.queue.splice(index, 1);
    }
  }
}

export function hostOf(url: string): string {
  return new URL(url).host;
}
