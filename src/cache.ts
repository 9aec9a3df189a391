/**
 * @module cache
 *
 * Capacity-bounded store of decoded tiles.
 *
 * Maps {@link TileIndex} to {@link DataBuffer}. The resident count never
 * exceeds the configured capacity: every {@link TileCache.put} that pushes
 * the cache over its limit evicts synchronously before returning.
 *
 * Eviction uses a two-key priority:
 *
 * 1. **Relevance**: tiles on layers other than the high-resolution layer
 *    `HR` and `HR - 1` (as reported by the {@link LoadCoordinator}) go
 *    first.
 * 2. **Insertion order**: within a tier, the least recently inserted tile
 *    goes first. Each insertion (including a replacement) takes a fresh,
 *    unique sequence number, so two candidates never tie.
 *
 * Entries are also kept in per-layer maps in insertion order, so choosing a
 * victim only inspects the oldest entry of each layer.
 *
 * All operations are synchronous and run to completion on the event loop,
 * so the index mapping is never observed half-updated. Evicted and removed
 * buffers are handed to `onEvict` only after the mapping is consistent
 * again.
 */

import type { DataBuffer } from './buffer.js';
import type { LoadCoordinator } from './coordinator.js';
import type { TileIndex } from './types.js';

/** Default maximum number of resident tiles. */
export const DEFAULT_CACHE_CAPACITY = 1000;

/**
 * Configuration for {@link TileCache}.
 */
export interface TileCacheOptions {
  /**
   * Maximum number of resident tiles.
   *
   * @defaultValue 1000
   */
  capacity?: number;
  /** Resolve the pyramid layer of a tile index (e.g. `pyramid.layerOf`). */
  layerOf: (index: TileIndex) => number;
  /** Relevance source and notification target. Without one, eviction is insertion order only. */
  coordinator?: LoadCoordinator;
  /** Called for each buffer that leaves the cache through eviction, replacement, removal or clearing. */
  onEvict?: (index: TileIndex, buffer: DataBuffer) => void;
}

/** Counters reported by {@link TileCache.stats}. */
export interface TileCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  insertions: number;
  evictions: number;
}

interface Entry {
  readonly buffer: DataBuffer;
  readonly layer: number;
  readonly seq: number;
}

type Released = Array<[TileIndex, DataBuffer]>;

/**
 * Bounded tile store with relevance-first eviction.
 *
 * @example
 * ```typescript
 * const cache = new TileCache({
 *   capacity: 500,
 *   layerOf: index => pyramid.layerOf(index),
 *   coordinator,
 * });
 *
 * cache.put(index, buffer);           // raises coordinator's notifier once
 * const hit = cache.get(index);       // DataBuffer | undefined
 * ```
 */
export class TileCache {
  readonly capacity: number;
  private readonly layerOf: (index: TileIndex) => number;
  private readonly coordinator: LoadCoordinator | undefined;
  private readonly onEvict: ((index: TileIndex, buffer: DataBuffer) => void) | undefined;

  private readonly entries = new Map<TileIndex, Entry>();
  /** Per-layer views of `entries`; each map iterates oldest first. */
  private readonly layers = new Map<number, Map<TileIndex, Entry>>();
  private seq = 0;

  private hits = 0;
  private misses = 0;
  private insertions = 0;
  private evictions = 0;

  /**
   * @throws {RangeError} If `capacity` is not a positive integer.
   */
  constructor(options: TileCacheOptions) {
    const capacity = options.capacity ?? DEFAULT_CACHE_CAPACITY;
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.layerOf = options.layerOf;
    this.coordinator = options.coordinator;
    this.onEvict = options.onEvict;
  }

  /** Number of resident tiles. */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Look up a tile. A miss returns `undefined`; it is not an error.
   */
  get(index: TileIndex): DataBuffer | undefined {
    const entry = this.entries.get(index);
    if (entry) {
      this.hits++;
      return entry.buffer;
    }
    this.misses++;
    return undefined;
  }

  /** Like {@link get}, but leaves the hit and miss counters untouched. */
  peek(index: TileIndex): DataBuffer | undefined {
    return this.entries.get(index)?.buffer;
  }

  contains(index: TileIndex): boolean {
    return this.entries.has(index);
  }

  /**
   * Insert or replace a tile, evict until within capacity, then raise the
   * coordinator's notification exactly once.
   *
   * The buffer must be fully written before it is inserted; the cache
   * treats published buffers as immutable.
   *
   * @throws Whatever `layerOf` throws for an invalid index; the cache is
   *   left untouched in that case.
   */
  put(index: TileIndex, buffer: DataBuffer): void {
    const layer = this.layerOf(index);
    const released: Released = [];

    const previous = this.detach(index);
    if (previous && previous.buffer !== buffer) released.push([index, previous.buffer]);

    const entry: Entry = { buffer, layer, seq: this.seq++ };
    this.entries.set(index, entry);
    this.layerMap(layer).set(index, entry);
    this.insertions++;

    while (this.entries.size > this.capacity) {
      const victim = this.selectVictim();
      if (victim === undefined) break;
      const evicted = this.detach(victim);
      if (evicted) {
        this.evictions++;
        released.push([victim, evicted.buffer]);
      }
    }

    this.coordinator?.notifyUpdate();
    this.release(released);
  }

  /**
   * Drop one tile.
   *
   * @returns `true` if the tile was resident.
   */
  remove(index: TileIndex): boolean {
    const entry = this.detach(index);
    if (!entry) return false;
    this.release([[index, entry.buffer]]);
    return true;
  }

  /**
   * Drop every tile.
   *
   * @returns Number of tiles that were resident.
   */
  clear(): number {
    const released: Released = [];
    for (const [index, entry] of this.entries) released.push([index, entry.buffer]);
    this.entries.clear();
    this.layers.clear();
    this.release(released);
    return released.length;
  }

  /** Resident tile indices, oldest insertion first. */
  keys(): TileIndex[] {
    return [...this.entries.keys()];
  }

  stats(): TileCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      insertions: this.insertions,
      evictions: this.evictions,
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Pick the next tile to evict: the oldest tile on an irrelevant layer, or
   * the oldest tile overall when every resident layer is relevant.
   */
  private selectVictim(): TileIndex | undefined {
    let stale: [TileIndex, Entry] | undefined;
    let relevant: [TileIndex, Entry] | undefined;

    for (const [layer, map] of this.layers) {
      const oldest = map.entries().next();
      if (oldest.done) continue;
      const candidate = oldest.value;

      const isRelevant = this.coordinator?.isRelevant(layer) ?? true;
      if (isRelevant) {
        if (!relevant || candidate[1].seq < relevant[1].seq) relevant = candidate;
      } else if (!stale || candidate[1].seq < stale[1].seq) {
        stale = candidate;
      }
    }

    return (stale ?? relevant)?.[0];
  }

  private detach(index: TileIndex): Entry | undefined {
    const entry = this.entries.get(index);
    if (!entry) return undefined;
    this.entries.delete(index);

    const map = this.layers.get(entry.layer);
    if (map) {
      map.delete(index);
      if (map.size === 0) this.layers.delete(entry.layer);
    }
    return entry;
  }

  private layerMap(layer: number): Map<TileIndex, Entry> {
    let map = this.layers.get(layer);
    if (!map) {
      map = new Map();
      this.layers.set(layer, map);
    }
    return map;
  }

  /**
   * Hand released buffers to `onEvict`. Every callback runs even if an
   * earlier one throws; failures are rethrown afterwards.
   */
  private release(released: Released): void {
    if (!this.onEvict || released.length === 0) return;

    const errors: unknown[] = [];
    for (const [index, buffer] of released) {
      try {
        this.onEvict(index, buffer);
      } catch (err) {
        errors.push(err);
      }
    }

    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) throw new AggregateError(errors, 'onEvict callbacks failed');
  }
}
