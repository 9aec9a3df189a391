/**
 * @module types
 *
 * Shared type definitions for the slide-tiles library.
 *
 * - **Pixel formats**: byte orderings of decoded tile data
 * - **Extent / LayerExtent**: pyramid description of one slide
 * - **TileIndex / TileAddress**: dense tile keys and their decoded form
 * - **BBox**: axis-aligned pixel rectangle used by viewport queries
 * - **SlideAnnotation**: image overlays attached to an open slide
 */

import type { DataBuffer } from './buffer.js';

// ─── Pixel Formats ──────────────────────────────────────────────────────────

/**
 * Channel byte order of decoded tile pixels (little-endian).
 *
 * The numeric values are part of the slide archive header encoding.
 */
export const enum PixelFormat {
  Undefined = 0,
  B8G8R8 = 1,
  R8G8B8 = 2,
  B8G8R8A8 = 3,
  R8G8B8A8 = 4,
}

/**
 * Bytes per pixel for a pixel format, or `0` for {@link PixelFormat.Undefined}
 * and unknown values.
 */
export function bytesPerPixel(format: PixelFormat): number {
  switch (format) {
    case PixelFormat.B8G8R8:
    case PixelFormat.R8G8B8:
      return 3;
    case PixelFormat.B8G8R8A8:
    case PixelFormat.R8G8B8A8:
      return 4;
    default:
      return 0;
  }
}

// ─── Pyramid ────────────────────────────────────────────────────────────────

/**
 * Extent of one pyramid layer, measured in fixed-size tiles.
 */
export interface LayerExtent {
  /** Number of horizontal 256 px tiles. */
  xTiles: number;
  /** Number of vertical 256 px tiles. */
  yTiles: number;
  /** Magnification factor of this layer. */
  scale: number;
  /** Reciprocal magnification relative to the most magnified layer (1 at the top). */
  downsample: number;
}

/**
 * Pixel extent of a whole slide plus its ordered layer list.
 *
 * `width` and `height` are measured at full magnification (downsample 1).
 * `layers[0]` is the lowest magnification.
 */
export interface Extent {
  width: number;
  height: number;
  layers: LayerExtent[];
}

/**
 * Dense integer key of one tile within a slide's pyramid.
 *
 * Produced by {@link Pyramid.tileIndex}; only meaningful for the pyramid
 * that produced it.
 */
export type TileIndex = number;

/** Decoded form of a {@link TileIndex}. */
export interface TileAddress {
  layer: number;
  row: number;
  col: number;
}

// ─── Bounding Box ───────────────────────────────────────────────────────────

/**
 * Axis-aligned rectangle in layer pixel space.
 *
 * `minX`/`minY` are inclusive, `maxX`/`maxY` exclusive.
 */
export interface BBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// ─── Annotations ────────────────────────────────────────────────────────────

/** Encoding of an annotation image. */
export const enum AnnotationFormat {
  Undefined = -1,
  Png = 0,
  Jpeg = 1,
}

/**
 * Image annotation placed over the current view.
 *
 * Offsets are fractions of the view window (`0.5` starts half way across).
 */
export interface SlideAnnotation {
  format: AnnotationFormat;
  xOffset: number;
  yOffset: number;
  /** Horizontal pixel count of the image. */
  width: number;
  /** Vertical pixel count of the image. */
  height: number;
  /** Encoded image bytes. */
  data: DataBuffer;
}
