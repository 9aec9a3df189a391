/**
 * @module options
 *
 * Slide option resolution.
 *
 * Option values cascade through three levels:
 *
 * 1. per-open {@link SlideOptions} (highest priority)
 * 2. caller defaults, e.g. shared by every slide a viewer opens
 * 3. {@link DEFAULT_SLIDE_OPTIONS}
 *
 * @example
 * ```typescript
 * const opts = resolveSlideOptions(
 *   { capacity: 200 },                        // this slide
 *   { capacity: 500, decodeConcurrency: 8 },  // viewer defaults
 * );
 * // → { capacity: 200, decodeConcurrency: 8, logger: silentLogger }
 * ```
 */

import type { DataBuffer } from './buffer.js';
import type { HighResolutionMarker, TileNotifier } from './coordinator.js';
import { silentLogger, type Logger } from './logger.js';
import type { TileIndex } from './types.js';

/** Options accepted when opening a slide. */
export interface SlideOptions {
  /** Maximum number of resident decoded tiles. @defaultValue 1000 */
  capacity?: number;
  /** Maximum number of tile decodes in flight. @defaultValue 4 */
  decodeConcurrency?: number;
  /**
   * Externally owned high-resolution layer marker. Share one between
   * slides, or with worker threads, to drive staleness from outside.
   */
  highResolutionMarker?: HighResolutionMarker;
  /** Externally owned notifier raised on every tile insert while the slide is open. */
  notifier?: TileNotifier;
  /** Called for every buffer that leaves the cache. */
  onEvict?: (index: TileIndex, buffer: DataBuffer) => void;
  /** Diagnostic sink. @defaultValue silent */
  logger?: Logger;
}

/** Options after the cascade; the shared objects stay optional. */
export interface ResolvedSlideOptions {
  capacity: number;
  decodeConcurrency: number;
  highResolutionMarker?: HighResolutionMarker;
  notifier?: TileNotifier;
  onEvict?: (index: TileIndex, buffer: DataBuffer) => void;
  logger: Logger;
}

/** Built-in fallbacks for the scalar options. */
export const DEFAULT_SLIDE_OPTIONS = {
  capacity: 1000,
  decodeConcurrency: 4,
  logger: silentLogger,
} as const satisfies Pick<ResolvedSlideOptions, 'capacity' | 'decodeConcurrency' | 'logger'>;

/**
 * Resolve effective slide options: per-open options → defaults → built-ins.
 *
 * @throws {RangeError} If `capacity` or `decodeConcurrency` is not a
 *   positive integer.
 */
export function resolveSlideOptions(
  options?: SlideOptions,
  defaults?: SlideOptions,
): ResolvedSlideOptions {
  const resolved: ResolvedSlideOptions = {
    capacity: options?.capacity ?? defaults?.capacity ?? DEFAULT_SLIDE_OPTIONS.capacity,
    decodeConcurrency:
      options?.decodeConcurrency ?? defaults?.decodeConcurrency ?? DEFAULT_SLIDE_OPTIONS.decodeConcurrency,
    highResolutionMarker: options?.highResolutionMarker ?? defaults?.highResolutionMarker,
    notifier: options?.notifier ?? defaults?.notifier,
    onEvict: options?.onEvict ?? defaults?.onEvict,
    logger: options?.logger ?? defaults?.logger ?? DEFAULT_SLIDE_OPTIONS.logger,
  };

  assertPositiveInteger('capacity', resolved.capacity);
  assertPositiveInteger('decodeConcurrency', resolved.decodeConcurrency);
  return resolved;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}
