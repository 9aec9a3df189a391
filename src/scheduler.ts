/**
 * @module scheduler
 *
 * Bounded pool of asynchronous tile decodes feeding a {@link TileCache}.
 *
 * Requests are queued first in, first out and deduplicated while pending
 * or in flight. Up to `concurrency` workers drain the queue; each worker
 * takes the next index, decodes it and commits the result to the cache,
 * whose insert wakes the render loop through the coordinator.
 *
 * Staleness is checked twice: before a decode starts, and again before its
 * result is committed, since the viewer may have zoomed away meanwhile.
 * Stale work is dropped, not reported as a failure.
 */

import type { DataBuffer } from './buffer.js';
import type { TileCache } from './cache.js';
import type { LoadCoordinator } from './coordinator.js';
import type { TileDecoder } from './format.js';
import type { Logger } from './logger.js';
import type { Pyramid } from './pyramid.js';
import type { TileIndex } from './types.js';

export interface DecodeQueueOptions {
  pyramid: Pyramid;
  cache: TileCache;
  coordinator: LoadCoordinator;
  decode: TileDecoder;
  /** Maximum decodes in flight. */
  concurrency: number;
  logger: Logger;
}

/** Counters reported by {@link DecodeQueue.stats}. */
export interface DecodeQueueStats {
  pending: number;
  inFlight: number;
  committed: number;
  dropped: number;
  failed: number;
}

/**
 * Decode scheduler of one open slide.
 *
 * @example
 * ```typescript
 * const queue = new DecodeQueue({ pyramid, cache, coordinator, decode, concurrency: 4, logger });
 * queue.request(pyramid.tileIndex(1, 0, 0));
 * await queue.idle();
 * cache.get(pyramid.tileIndex(1, 0, 0)); // decoded tile
 * ```
 */
export class DecodeQueue {
  private readonly pyramid: Pyramid;
  private readonly cache: TileCache;
  private readonly coordinator: LoadCoordinator;
  private readonly decode: TileDecoder;
  private readonly concurrency: number;
  private readonly logger: Logger;

  private readonly pending: TileIndex[] = [];
  /** Pending or in flight. */
  private readonly scheduled = new Set<TileIndex>();
  private readonly workers = new Set<Promise<void>>();
  private readonly controller = new AbortController();
  private active = 0;
  private stopped = false;

  private committed = 0;
  private dropped = 0;
  private failed = 0;

  constructor(options: DecodeQueueOptions) {
    this.pyramid = options.pyramid;
    this.cache = options.cache;
    this.coordinator = options.coordinator;
    this.decode = options.decode;
    this.concurrency = options.concurrency;
    this.logger = options.logger;
  }

  /** `true` once {@link stop} has been called. */
  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Schedule a decode.
   *
   * @returns `false` when the tile is already cached, already scheduled,
   *   stale, or the queue is stopped.
   * @throws {OutOfRangeError} If `index` is outside the pyramid.
   */
  request(index: TileIndex): boolean {
    const { layer } = this.pyramid.decodeTileIndex(index);
    if (this.stopped || this.scheduled.has(index) || this.cache.contains(index)) return false;
    if (this.coordinator.isStale(layer)) return false;

    this.scheduled.add(index);
    this.pending.push(index);
    if (this.active < this.concurrency) this.spawn();
    return true;
  }

  /** Whether `index` is pending or being decoded. */
  isScheduled(index: TileIndex): boolean {
    return this.scheduled.has(index);
  }

  /** Resolves once the queue is drained and no decode is in flight. */
  async idle(): Promise<void> {
    while (this.workers.size > 0) {
      await Promise.all(this.workers);
    }
  }

  /**
   * Discard pending requests, abort in-flight decodes and wait for the
   * workers to finish. Nothing is committed to the cache afterwards.
   */
  async stop(): Promise<void> {
    if (!this.stopped) {
      this.stopped = true;
      this.pending.length = 0;
      this.scheduled.clear();
      this.controller.abort();
    }
    await this.idle();
  }

  stats(): DecodeQueueStats {
    return {
      pending: this.pending.length,
      inFlight: this.scheduled.size - this.pending.length,
      committed: this.committed,
      dropped: this.dropped,
      failed: this.failed,
    };
  }

  // ─── Workers ────────────────────────────────────────────────────────

  private spawn(): void {
    this.active++;
    const worker: Promise<void> = this.work().then(() => {
      this.workers.delete(worker);
    });
    this.workers.add(worker);
  }

  private async work(): Promise<void> {
    try {
      while (!this.stopped) {
        const index = this.pending.shift();
        if (index === undefined) return;
        await this.process(index);
      }
    } finally {
      this.active--;
    }
  }

  private async process(index: TileIndex): Promise<void> {
    try {
      const address = this.pyramid.decodeTileIndex(index);
      if (this.coordinator.isStale(address.layer)) {
        this.drop(index, address.layer);
        return;
      }

      let buffer: DataBuffer;
      try {
        const decoded = await this.decode({ ...address, index, signal: this.controller.signal });
        buffer = decoded.strengthen();
      } catch (err) {
        if (this.stopped) return;
        this.failed++;
        this.logger.warn(`Decoding tile ${index} failed`, err);
        return;
      }

      if (this.stopped) return;
      if (this.coordinator.isStale(address.layer)) {
        this.drop(index, address.layer);
        return;
      }

      try {
        this.cache.put(index, buffer);
      } catch (err) {
        // The tile is resident; an eviction hook threw.
        this.logger.error(`Releasing evicted tiles after committing tile ${index} failed`, err);
      }
      this.committed++;
    } finally {
      this.scheduled.delete(index);
    }
  }

  private drop(index: TileIndex, layer: number): void {
    this.dropped++;
    this.logger.debug(
      `Dropping stale decode of tile ${index} (layer ${layer}, high-resolution layer ${this.coordinator.highResolutionLayer})`,
    );
  }
}
