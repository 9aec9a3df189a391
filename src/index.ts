/**
 * @module slide-tiles
 *
 * Public API surface for the slide-tiles library.
 *
 * slide-tiles serves decoded tiles of gigapixel whole-slide images to a
 * real-time viewer. A slide is cut into a multi-resolution pyramid of
 * 256 × 256 tiles; tiles are decoded in the background into a bounded
 * cache, and the render loop reads whatever is resident while waiting for
 * the rest.
 *
 * ---
 *
 * ### Building blocks
 *
 * Leaf first, each usable on its own:
 *
 * | Export | Role |
 * |--------|------|
 * | {@link DataBuffer} | Byte container with strong (owned) or weak (borrowed) storage |
 * | {@link Pyramid} | Dense tile addressing and viewport coverage |
 * | {@link TileCache} | Capacity-bounded tile store, stale layers evicted first |
 * | {@link LoadCoordinator} | High-resolution layer marker plus tile-insert notification |
 * | {@link Slide} / {@link openSlide} | Open/close lifecycle tying them together |
 *
 * ---
 *
 * ### Sources and formats
 *
 * A {@link Connector} reads byte ranges; {@link LocalConnector} is built
 * in, network transports are supplied by the application. A
 * {@link SlideFormat} turns those bytes into pyramid metadata and decoded
 * tiles; {@link archiveFormat} reads the uncompressed slide archive written
 * by {@link writeSlideArchive}.
 */

// ─── Slide ──────────────────────────────────────────────────────────────────

export { Slide, openSlide } from './slide.js';
export { resolveSlideOptions, DEFAULT_SLIDE_OPTIONS } from './options.js';

// ─── Building blocks ────────────────────────────────────────────────────────

export { DataBuffer } from './buffer.js';
export { Pyramid, buildExtent, validateExtent, TILE_SIZE, MAX_LAYERS } from './pyramid.js';
export { TileCache, DEFAULT_CACHE_CAPACITY } from './cache.js';
export { HighResolutionMarker, TileNotifier, LoadCoordinator, MAX_WAIT_MS } from './coordinator.js';
export { DecodeQueue } from './scheduler.js';
export { AnnotationStore } from './annotations.js';

// ─── Sources and formats ────────────────────────────────────────────────────

export { LocalConnector } from './connectors/local.js';
export { archiveFormat, ArchiveReader } from './archive/reader.js';
export { writeSlideArchive, archiveTileByteLength } from './archive/writer.js';

// ─── Errors ─────────────────────────────────────────────────────────────────

export {
  SlideTilesError,
  AllocationError,
  OverflowError,
  OutOfRangeError,
  InvalidSlideFormatError,
  SlideIOError,
  DecodeError,
  SlideStateError,
} from './errors.js';

// ─── Misc ───────────────────────────────────────────────────────────────────

export { PixelFormat, AnnotationFormat, bytesPerPixel } from './types.js';
export { silentLogger } from './logger.js';
export { version, getMajorVersion, getMinorVersion, getBuildNumber } from './version.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { BufferOwnership } from './buffer.js';
export type { TileCacheOptions, TileCacheStats } from './cache.js';
export type { LoadCoordinatorOptions } from './coordinator.js';
export type { DecodeQueueOptions, DecodeQueueStats } from './scheduler.js';
export type { AnnotationId } from './annotations.js';
export type { Connector } from './connectors/connector.js';
export type { LocalConnectorOptions } from './connectors/local.js';
export type { SlideFormat, SlideReader, SlideMetadata, DecodeRequest, TileDecoder } from './format.js';
export type { Logger } from './logger.js';
export type { SlideOptions, ResolvedSlideOptions } from './options.js';
export type {
  SlideState,
  SlideSource,
  SlideOpenInfo,
  ViewportTile,
  FallbackTile,
  SlideStats,
} from './slide.js';
export type {
  Extent,
  LayerExtent,
  TileIndex,
  TileAddress,
  BBox,
  SlideAnnotation,
} from './types.js';
