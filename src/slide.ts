/**
 * @module slide
 *
 * Slide handle: the lifecycle owner of one opened slide.
 *
 * ```
 * closed ──open()──▶ opening ──▶ open ──close()──▶ closing ──▶ closed
 *                       │
 *                       └── failure ──▶ closed
 * ```
 *
 * Opening resolves a connector for the source, finds a {@link SlideFormat}
 * that recognises it, validates the pyramid and builds the cache, the load
 * coordinator and the decode queue around it. Closing tears them down in
 * reverse: in-flight decodes are stopped first, so no tile is committed and
 * no notification is raised once `close()` has resolved.
 *
 * @example
 * ```typescript
 * const slide = await openSlide({
 *   source: { type: 'local', path: './slides/biopsy.sldt' },
 *   options: { capacity: 500 },
 * });
 *
 * slide.setHighResolutionLayer(1);
 * for (const tile of slide.viewport(1, { minX: 0, minY: 0, maxX: 1920, maxY: 1080 })) {
 *   if (tile.status === 'hit') draw(tile.index, tile.buffer);
 *   else if (tile.fallback) drawScaled(tile.index, tile.fallback.buffer);
 * }
 * await slide.waitForUpdate(16);
 *
 * await slide.close();
 * ```
 */

import { AnnotationStore, type AnnotationId } from './annotations.js';
import { archiveFormat } from './archive/reader.js';
import type { DataBuffer } from './buffer.js';
import { TileCache, type TileCacheStats } from './cache.js';
import type { Connector } from './connectors/connector.js';
import { LocalConnector } from './connectors/local.js';
import { LoadCoordinator } from './coordinator.js';
import { InvalidSlideFormatError, OutOfRangeError, SlideStateError } from './errors.js';
import type { SlideFormat, SlideReader } from './format.js';
import { resolveSlideOptions, type ResolvedSlideOptions, type SlideOptions } from './options.js';
import { Pyramid } from './pyramid.js';
import { DecodeQueue, type DecodeQueueStats } from './scheduler.js';
import {
  bytesPerPixel,
  type BBox,
  type Extent,
  type PixelFormat,
  type SlideAnnotation,
  type TileIndex,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type SlideState = 'closed' | 'opening' | 'open' | 'closing';

/**
 * Where a slide's bytes come from.
 *
 * A local source is read through a {@link LocalConnector} the slide creates.
 * A network source brings its own connector; the slide takes ownership of
 * it and closes it with the slide. Without `format`, every candidate format
 * is probed in order.
 */
export type SlideSource =
  | { type: 'local'; path: string; format?: SlideFormat }
  | { type: 'network'; id: string; connector: Connector; format?: SlideFormat };

/** Everything needed to open a slide. */
export interface SlideOpenInfo {
  source: SlideSource;
  /** Candidate formats for probing. @defaultValue `[archiveFormat]` */
  formats?: readonly SlideFormat[];
  options?: SlideOptions;
  /** Middle level of the option cascade, e.g. viewer-wide settings. */
  defaults?: SlideOptions;
}

/** A coarser cached tile that can stand in for a missing one. */
export interface FallbackTile {
  index: TileIndex;
  layer: number;
  buffer: DataBuffer;
}

/** One entry of {@link Slide.viewport}. */
export type ViewportTile =
  | { status: 'hit'; index: TileIndex; buffer: DataBuffer }
  | {
      status: 'miss';
      index: TileIndex;
      /** A decode is pending or in flight. */
      scheduled: boolean;
      fallback?: FallbackTile;
    };

export interface SlideStats {
  cache: TileCacheStats;
  decode: DecodeQueueStats;
}

interface Session {
  readonly connector: Connector;
  readonly reader: SlideReader;
  readonly formatName: string;
  readonly pyramid: Pyramid;
  readonly pixelFormat: PixelFormat;
  readonly coordinator: LoadCoordinator;
  readonly cache: TileCache;
  readonly queue: DecodeQueue;
}

// ─── Slide ──────────────────────────────────────────────────────────────────

/**
 * Handle over one slide source.
 *
 * Construction only validates the open info; call {@link open} (or use
 * {@link openSlide}) before anything else.
 */
export class Slide {
  readonly source: SlideSource;
  private readonly formats: readonly SlideFormat[];
  private readonly options: ResolvedSlideOptions;
  private readonly annotationStore = new AnnotationStore();

  private current: SlideState = 'closed';
  private session: Session | undefined;
  private closing: Promise<void> | null = null;

  /**
   * @throws {TypeError} If the source lacks a path, identifier or connector,
   *   or no candidate format is given.
   * @throws {RangeError} If an option is out of range.
   */
  constructor(info: SlideOpenInfo) {
    validateSource(info.source);
    this.source = info.source;
    this.formats = info.formats ?? [archiveFormat];
    if (this.formats.length === 0 && !info.source.format) {
      throw new TypeError('At least one slide format is required');
    }
    this.options = resolveSlideOptions(info.options, info.defaults);
  }

  get state(): SlideState {
    return this.current;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Read the slide metadata and build the tile machinery.
   *
   * On failure the slide returns to `closed` and every resource acquired
   * so far is released.
   *
   * @throws {SlideStateError} If the slide is not closed.
   * @throws {InvalidSlideFormatError} If no format recognises the source or
   *   its metadata is invalid.
   * @throws {SlideIOError} If the source cannot be read.
   */
  async open(): Promise<void> {
    if (this.current !== 'closed') throw new SlideStateError(this.current, 'open');
    this.current = 'opening';
    try {
      this.session = await this.createSession();
      this.current = 'open';
    } catch (err) {
      this.current = 'closed';
      throw err;
    }
  }

  /**
   * Stop decoding, detach from the notifier, drop every cached tile and
   * annotation, then close the reader and connector. A no-op on a closed
   * slide; concurrent calls share one teardown.
   *
   * @throws {SlideStateError} If the slide is still opening.
   * @throws The first teardown failure, or an `AggregateError` of several.
   *   The slide is closed either way.
   */
  async close(): Promise<void> {
    if (this.current === 'closed') return;
    if (this.current === 'opening') throw new SlideStateError(this.current, 'close');
    if (!this.closing) this.closing = this.teardown();
    return this.closing;
  }

  // ─── Metadata ───────────────────────────────────────────────────────

  get pyramid(): Pyramid {
    return this.require('read the pyramid').pyramid;
  }

  get extent(): Extent {
    return this.pyramid.extent;
  }

  get pixelFormat(): PixelFormat {
    return this.require('read the pixel format').pixelFormat;
  }

  /** Name of the format that opened the slide. */
  get formatName(): string {
    return this.require('read the format').formatName;
  }

  get cache(): TileCache {
    return this.require('access the cache').cache;
  }

  get coordinator(): LoadCoordinator {
    return this.require('access the coordinator').coordinator;
  }

  // ─── Tiles ──────────────────────────────────────────────────────────

  /** Cached tile, or `undefined` on a miss. Does not schedule a decode. */
  getTile(index: TileIndex): DataBuffer | undefined {
    return this.require('read tiles').cache.get(index);
  }

  /**
   * Schedule decodes.
   *
   * @returns Number of indices newly scheduled; cached, already scheduled
   *   and stale tiles are skipped.
   * @throws {OutOfRangeError} If an index is outside the pyramid.
   */
  request(indices: Iterable<TileIndex>): number {
    const { queue } = this.require('request tiles');
    let scheduled = 0;
    for (const index of indices) {
      if (queue.request(index)) scheduled++;
    }
    return scheduled;
  }

  /**
   * Tiles covering `rect` at `layer`, in row-major order.
   *
   * Each miss schedules a decode and carries the nearest cached tile from a
   * lower-magnification layer, if any, to draw in the meantime. Misses on a
   * stale layer come back with `scheduled: false`; call
   * {@link setHighResolutionLayer} first when changing zoom. Fallback
   * lookups do not count towards the cache's hit statistics.
   *
   * @param rect - Pixel rectangle in `layer`'s pixel space.
   * @throws {OutOfRangeError} If `layer` is outside the pyramid.
   */
  viewport(layer: number, rect: BBox): ViewportTile[] {
    const { pyramid, cache, queue } = this.require('query the viewport');

    return pyramid.tilesOverlapping(layer, rect).map((index): ViewportTile => {
      const buffer = cache.get(index);
      if (buffer) return { status: 'hit', index, buffer };

      queue.request(index);
      const scheduled = queue.isScheduled(index);
      const fallback = this.findFallback(index, layer);
      return fallback
        ? { status: 'miss', index, scheduled, fallback }
        : { status: 'miss', index, scheduled };
    });
  }

  // ─── Coordination ───────────────────────────────────────────────────

  get highResolutionLayer(): number {
    return this.require('read the high-resolution layer').coordinator.highResolutionLayer;
  }

  /**
   * Publish the layer the viewer shows at full detail. Decodes for layers
   * other than this one and the one below it become stale.
   *
   * @throws {OutOfRangeError} If `layer` is outside the pyramid.
   */
  setHighResolutionLayer(layer: number): void {
    const { pyramid, coordinator } = this.require('set the high-resolution layer');
    if (!Number.isInteger(layer) || layer < 0 || layer >= pyramid.layerCount) {
      throw new OutOfRangeError(`Layer ${layer} outside pyramid (${pyramid.layerCount} layers)`);
    }
    coordinator.setHighResolutionLayer(layer);
  }

  /**
   * Wait for the next tile insert.
   *
   * @returns `true` when woken by an insert, `false` on timeout.
   */
  waitForUpdate(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return this.require('wait for updates').coordinator.waitForUpdate(timeoutMs, signal);
  }

  /** Resolves once every scheduled decode has finished. */
  idle(): Promise<void> {
    return this.require('wait for decodes').queue.idle();
  }

  stats(): SlideStats {
    const { cache, queue } = this.require('read statistics');
    return { cache: cache.stats(), decode: queue.stats() };
  }

  // ─── Annotations ────────────────────────────────────────────────────

  /**
   * Attach an image annotation.
   *
   * @throws {RangeError} If the annotation is invalid.
   */
  annotate(annotation: SlideAnnotation): AnnotationId {
    this.require('annotate');
    return this.annotationStore.add(annotation);
  }

  removeAnnotation(id: AnnotationId): boolean {
    this.require('remove annotations');
    return this.annotationStore.remove(id);
  }

  annotations(): Array<[AnnotationId, SlideAnnotation]> {
    this.require('list annotations');
    return this.annotationStore.entries();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private require(operation: string): Session {
    if (this.current !== 'open' || !this.session) {
      throw new SlideStateError(this.current, operation);
    }
    return this.session;
  }

  private async createSession(): Promise<Session> {
    const { source, options } = this;
    const connector = source.type === 'local' ? new LocalConnector() : source.connector;
    const path = source.type === 'local' ? source.path : source.id;

    let reader: SlideReader | undefined;
    try {
      const opened = await this.probe(connector, path);
      reader = opened.reader;

      const pyramid = new Pyramid(reader.metadata.extent);
      const pixelFormat = reader.metadata.format;
      if (bytesPerPixel(pixelFormat) === 0) {
        throw new InvalidSlideFormatError(`${path} has an undefined pixel format`);
      }

      const coordinator = new LoadCoordinator({
        marker: options.highResolutionMarker,
        notifier: options.notifier,
      });
      const cache = new TileCache({
        capacity: options.capacity,
        layerOf: index => pyramid.layerOf(index),
        coordinator,
        onEvict: options.onEvict,
      });
      const decoder = reader;
      const queue = new DecodeQueue({
        pyramid,
        cache,
        coordinator,
        decode: request => decoder.decode(request),
        concurrency: options.decodeConcurrency,
        logger: options.logger,
      });

      options.logger.debug(
        `Opened ${path} as ${opened.name}: ${pyramid.layerCount} layers, ${pyramid.tileCount} tiles`,
      );
      return {
        connector,
        reader,
        formatName: opened.name,
        pyramid,
        pixelFormat,
        coordinator,
        cache,
        queue,
      };
    } catch (err) {
      await releaseAfterFailure(reader, connector, err);
      throw err;
    }
  }

  private async probe(
    connector: Connector,
    path: string,
  ): Promise<{ name: string; reader: SlideReader }> {
    const candidates = this.source.format ? [this.source.format] : this.formats;

    let lastError: unknown;
    for (const format of candidates) {
      try {
        return { name: format.name, reader: await format.open(connector, path) };
      } catch (err) {
        if (!(err instanceof InvalidSlideFormatError)) throw err;
        this.options.logger.debug(`${path} is not readable as ${format.name}: ${err.message}`);
        lastError = err;
      }
    }

    if (candidates.length === 1) throw lastError;
    throw new InvalidSlideFormatError(
      `None of ${candidates.map(f => f.name).join(', ')} recognises ${path}`,
      { cause: lastError },
    );
  }

  private findFallback(index: TileIndex, layer: number): FallbackTile | undefined {
    const { pyramid, cache } = this.require('query the viewport');
    for (let target = layer - 1; target >= 0; target--) {
      const coarser = pyramid.coarserTile(index, target);
      const buffer = cache.peek(coarser);
      if (buffer) return { index: coarser, layer: target, buffer };
    }
    return undefined;
  }

  private async teardown(): Promise<void> {
    const session = this.session;
    this.current = 'closing';
    const errors: unknown[] = [];

    const attempt = async (step: () => unknown): Promise<void> => {
      try {
        await step();
      } catch (err) {
        errors.push(err);
      }
    };

    if (session) {
      await attempt(() => session.queue.stop());
      session.coordinator.detach();
      await attempt(() => session.cache.clear());
      await attempt(() => session.reader.close?.());
      await attempt(() => session.connector.close());
    }
    this.annotationStore.clear();

    this.session = undefined;
    this.current = 'closed';
    this.closing = null;
    this.options.logger.debug(`Closed ${describeSource(this.source)}`);

    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) throw new AggregateError(errors, 'Closing the slide failed');
  }
}

/**
 * Create and open a slide.
 *
 * Without a supplied `highResolutionMarker` the slide starts with layer 0
 * as its high-resolution layer, so only layers 0 and 1 are decoded until
 * {@link Slide.setHighResolutionLayer} names the layer on screen.
 *
 * @throws See {@link Slide.open} and the {@link Slide} constructor.
 */
export async function openSlide(info: SlideOpenInfo): Promise<Slide> {
  const slide = new Slide(info);
  await slide.open();
  return slide;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function validateSource(source: SlideSource): void {
  if (source.type === 'local') {
    if (typeof source.path !== 'string' || source.path.length === 0) {
      throw new TypeError('A local slide source needs a file path');
    }
    return;
  }
  if (typeof source.id !== 'string' || source.id.length === 0) {
    throw new TypeError('A network slide source needs a slide identifier');
  }
  if (typeof source.connector !== 'object' || source.connector === null) {
    throw new TypeError('A network slide source needs a connector');
  }
}

function describeSource(source: SlideSource): string {
  return source.type === 'local' ? source.path : source.id;
}

/**
 * Release what a failed open acquired. A cleanup failure is reported
 * together with the open error.
 */
async function releaseAfterFailure(
  reader: SlideReader | undefined,
  connector: Connector,
  openError: unknown,
): Promise<void> {
  const results = await Promise.allSettled([reader?.close?.(), connector.close()]);
  const failures: unknown[] = results.flatMap(r => (r.status === 'rejected' ? [r.reason] : []));
  if (failures.length > 0) {
    throw new AggregateError([openError, ...failures], 'Opening the slide failed and cleanup failed');
  }
}
