/**
 * @module coordinator
 *
 * Coordination state shared between decode workers, the tile cache and the
 * display loop.
 *
 * - {@link HighResolutionMarker}: the layer the viewer currently shows at
 *   full detail, stored in a `SharedArrayBuffer` so `worker_threads` can
 *   read and publish it with `Atomics`.
 * - {@link TileNotifier}: wake channel raised on every tile insert, so a
 *   refresh loop can await new data instead of polling.
 * - {@link LoadCoordinator}: binds one marker and one notifier, decides
 *   which decode requests are stale, and forwards cache inserts to the
 *   notifier until it is detached.
 *
 * Markers and notifiers may be created by the application and handed to
 * several slides or to an outer prefetch loop; the coordinator never takes
 * over their lifecycle.
 */

/**
 * Atomically updated layer index.
 *
 * @example
 * ```typescript
 * const marker = new HighResolutionMarker(2);
 * const worker = new Worker(url, { workerData: marker.buffer });
 * // in the worker: new HighResolutionMarker(undefined, workerData).get()
 * ```
 */
export class HighResolutionMarker {
  /** Backing memory; post it to a worker to share the marker. */
  readonly buffer: SharedArrayBuffer;
  private readonly cell: Int32Array;

  /**
   * @param initial - Starting layer, written only when a new buffer is created.
   * @param buffer - Existing marker memory (at least 4 bytes) to attach to.
   */
  constructor(initial: number = 0, buffer?: SharedArrayBuffer) {
    this.buffer = buffer ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    this.cell = new Int32Array(this.buffer, 0, 1);
    if (!buffer) this.set(initial);
  }

  get(): number {
    return Atomics.load(this.cell, 0);
  }

  /**
   * @throws {RangeError} If `layer` is not a non-negative 32-bit integer.
   */
  set(layer: number): void {
    if (!Number.isInteger(layer) || layer < 0 || layer > 0x7fffffff) {
      throw new RangeError(`Invalid layer index: ${layer}`);
    }
    Atomics.store(this.cell, 0, layer);
  }
}

/** Longest delay `setTimeout` honours; longer waits are capped to it. */
export const MAX_WAIT_MS = 0x7fffffff;

interface Waiter {
  resolve: (updated: boolean) => void;
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * Condition-style wake channel.
 *
 * Every {@link notify} resolves all pending {@link wait} calls with `true`;
 * a wait that reaches its timeout first resolves with `false`. Waiters are
 * resolved after the notifying call returns to the event loop, so anything
 * written before `notify()` is visible to them.
 */
export class TileNotifier {
  private readonly waiters = new Set<Waiter>();
  private count = 0;

  /** Number of notifications raised so far. */
  get notifications(): number {
    return this.count;
  }

  /** Number of pending waits. */
  get waiting(): number {
    return this.waiters.size;
  }

  notify(): void {
    this.count++;
    const pending = [...this.waiters];
    this.waiters.clear();
    for (const waiter of pending) {
      clearTimeout(waiter.timer);
      waiter.resolve(true);
    }
  }

  /**
   * Wait for the next {@link notify}.
   *
   * @param timeoutMs - Maximum wait in milliseconds. `Infinity` waits until
   *   notified or aborted; finite values above {@link MAX_WAIT_MS} are capped.
   * @param signal - Aborting rejects the wait with the signal's reason.
   * @returns `true` when woken by a notification, `false` on timeout.
   * @throws {RangeError} If `timeoutMs` is `NaN`.
   */
  wait(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (Number.isNaN(timeoutMs)) {
      return Promise.reject(new RangeError('Wait timeout must be a number of milliseconds'));
    }
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    return new Promise<boolean>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(waiter.timer);
        this.waiters.delete(waiter);
        reject(abortReason(signal));
      };

      const waiter: Waiter = {
        resolve: updated => {
          signal?.removeEventListener('abort', onAbort);
          resolve(updated);
        },
      };
      if (timeoutMs !== Infinity) {
        waiter.timer = setTimeout(() => {
          this.waiters.delete(waiter);
          waiter.resolve(false);
        }, Math.min(MAX_WAIT_MS, Math.max(0, timeoutMs)));
      }

      this.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/** Externally supplied coordination objects. */
export interface LoadCoordinatorOptions {
  marker?: HighResolutionMarker;
  notifier?: TileNotifier;
}

/**
 * Tracks the high-resolution layer and relays tile-insert notifications.
 *
 * A decode request is **stale** when its layer is neither the
 * high-resolution layer `HR` nor `HR - 1`. Staleness is advisory: workers
 * skip stale work, and the cache evicts stale layers first.
 */
export class LoadCoordinator {
  readonly marker: HighResolutionMarker;
  readonly notifier: TileNotifier;
  private attached = true;

  constructor(options?: LoadCoordinatorOptions) {
    this.marker = options?.marker ?? new HighResolutionMarker();
    this.notifier = options?.notifier ?? new TileNotifier();
  }

  get highResolutionLayer(): number {
    return this.marker.get();
  }

  /** Publish a new high-resolution layer; applies to every later staleness check. */
  setHighResolutionLayer(layer: number): void {
    this.marker.set(layer);
  }

  /** `true` iff `layer` is the high-resolution layer or the one below it. */
  isRelevant(layer: number): boolean {
    const hr = this.marker.get();
    return layer === hr || layer === hr - 1;
  }

  isStale(layer: number): boolean {
    return !this.isRelevant(layer);
  }

  /** `false` once {@link detach} has been called. */
  get isAttached(): boolean {
    return this.attached;
  }

  /** Raise the notifier; a no-op after {@link detach}. */
  notifyUpdate(): void {
    if (this.attached) this.notifier.notify();
  }

  /**
   * Wait until a tile insert is announced or `timeoutMs` elapses.
   *
   * @returns `true` when woken by an update, `false` on timeout.
   */
  waitForUpdate(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return this.notifier.wait(timeoutMs, signal);
  }

  /**
   * Stop relaying notifications. Called when the owning slide closes so an
   * externally owned notifier is never raised on its behalf again.
   */
  detach(): void {
    this.attached = false;
  }
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const err = new Error('The wait was aborted');
  err.name = 'AbortError';
  return err;
}
