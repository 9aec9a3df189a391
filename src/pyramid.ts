/**
 * @module pyramid
 *
 * Tile addressing over a slide's multi-resolution pyramid.
 *
 * Every layer is cut into a grid of {@link TILE_SIZE} × {@link TILE_SIZE}
 * pixel tiles. A {@link TileIndex} packs `(layer, row, col)` densely:
 * layers are laid out one after another, each in row-major order, so
 *
 * ```
 * index = layerOffset[layer] + row * xTiles + col
 * ```
 *
 * Encoding is constant time; decoding scans the (at most
 * {@link MAX_LAYERS}) layer offsets. Indices are unique and contiguous
 * within one pyramid, which makes them usable as array offsets as well as
 * `Map` keys.
 *
 * All functions in this module are pure; a {@link Pyramid} is immutable
 * after construction.
 */

import { InvalidSlideFormatError, OutOfRangeError } from './errors.js';
import type { BBox, Extent, LayerExtent, TileAddress, TileIndex } from './types.js';

/** Edge length of a tile in pixels. */
export const TILE_SIZE = 256;

/** Upper bound on pyramid depth. */
export const MAX_LAYERS = 32;

/** Relative tolerance for the `scale × downsample` consistency check. */
const SCALE_TOLERANCE = 1e-4;

// ─── Extent helpers ─────────────────────────────────────────────────────────

/**
 * Check the pyramid invariants of an extent.
 *
 * - width and height are positive integers
 * - 1 to {@link MAX_LAYERS} layers with positive integer grids and
 *   positive finite scale/downsample
 * - each grid is exactly the tile count of its layer's pixel size,
 *   `ceil(ceil(width / downsample) / TILE_SIZE)` by the same for height
 * - downsample never grows with the layer index, so grids never shrink
 * - `scale × downsample` is the same for every layer
 *
 * @throws {InvalidSlideFormatError} Naming the first violated invariant.
 */
export function validateExtent(extent: Extent): void {
  const { width, height, layers } = extent;
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new InvalidSlideFormatError(`Invalid slide dimensions ${width}x${height}`);
  }
  if (layers.length === 0 || layers.length > MAX_LAYERS) {
    throw new InvalidSlideFormatError(`Slide must have 1-${MAX_LAYERS} layers, got ${layers.length}`);
  }

  const product = layers[0].scale * layers[0].downsample;

  layers.forEach((layer, i) => {
    if (!isPositiveInteger(layer.xTiles) || !isPositiveInteger(layer.yTiles)) {
      throw new InvalidSlideFormatError(`Layer ${i} has invalid grid ${layer.xTiles}x${layer.yTiles}`);
    }
    if (!isPositiveFinite(layer.scale) || !isPositiveFinite(layer.downsample)) {
      throw new InvalidSlideFormatError(`Layer ${i} has invalid scale or downsample`);
    }
    if (Math.abs(layer.scale * layer.downsample - product) > product * SCALE_TOLERANCE) {
      throw new InvalidSlideFormatError(`Layer ${i} scale is inconsistent with its downsample`);
    }
    const xTiles = gridSize(width, layer.downsample);
    const yTiles = gridSize(height, layer.downsample);
    if (layer.xTiles !== xTiles || layer.yTiles !== yTiles) {
      throw new InvalidSlideFormatError(
        `Layer ${i} grid ${layer.xTiles}x${layer.yTiles} does not match its pixel size (expected ${xTiles}x${yTiles})`,
      );
    }
    if (i === 0) return;

    if (layer.downsample > layers[i - 1].downsample) {
      throw new InvalidSlideFormatError(`Layer ${i} downsample exceeds layer ${i - 1}`);
    }
  });
}

/**
 * Derive an {@link Extent} from full-magnification pixel dimensions and a
 * list of downsample factors ordered from lowest magnification to highest
 * (e.g. `[16, 4, 1]`).
 *
 * Each layer's grid is `ceil(ceil(width / downsample) / TILE_SIZE)` by the
 * same for height, and its scale is `1 / downsample`.
 *
 * @throws {InvalidSlideFormatError} If the result violates the pyramid invariants.
 */
export function buildExtent(width: number, height: number, downsamples: readonly number[]): Extent {
  const extent: Extent = {
    width,
    height,
    layers: downsamples.map(downsample => ({
      xTiles: gridSize(width, downsample),
      yTiles: gridSize(height, downsample),
      scale: 1 / downsample,
      downsample,
    })),
  };
  validateExtent(extent);
  return extent;
}

// ─── Pyramid ────────────────────────────────────────────────────────────────

/**
 * Validated pyramid geometry of one slide.
 *
 * @example
 * ```typescript
 * const pyramid = new Pyramid(buildExtent(4096, 4096, [16, 1]));
 *
 * const index = pyramid.tileIndex(1, 2, 3);      // => 1 + 2 * 16 + 3 = 36
 * pyramid.decodeTileIndex(index);                // => { layer: 1, row: 2, col: 3 }
 * pyramid.tilesOverlapping(1, { minX: 0, minY: 0, maxX: 300, maxY: 10 });
 * // => [1, 2]
 * ```
 */
export class Pyramid {
  readonly extent: Extent;
  /** `offsets[l]` is the index of tile (l, 0, 0); the final entry is the tile count. */
  private readonly offsets: number[];

  /**
   * @throws {InvalidSlideFormatError} If `extent` violates the pyramid invariants.
   */
  constructor(extent: Extent) {
    validateExtent(extent);
    this.extent = {
      width: extent.width,
      height: extent.height,
      layers: extent.layers.map(layer => ({ ...layer })),
    };

    this.offsets = [0];
    for (const layer of this.extent.layers) {
      this.offsets.push(this.offsets[this.offsets.length - 1] + layer.xTiles * layer.yTiles);
    }
  }

  get layerCount(): number {
    return this.extent.layers.length;
  }

  /** Number of tiles across all layers; valid indices are `[0, tileCount)`. */
  get tileCount(): number {
    return this.offsets[this.offsets.length - 1];
  }

  /**
   * Extent of one layer.
   *
   * @throws {OutOfRangeError} If `layer >= layerCount`.
   */
  layerExtent(layer: number): LayerExtent {
    this.checkLayer(layer);
    return { ...this.extent.layers[layer] };
  }

  /**
   * Pixel dimensions of a layer: `ceil(width / downsample)` by
   * `ceil(height / downsample)`.
   *
   * @throws {OutOfRangeError} If `layer >= layerCount`.
   */
  layerSize(layer: number): { width: number; height: number } {
    this.checkLayer(layer);
    const { downsample } = this.extent.layers[layer];
    return {
      width: Math.ceil(this.extent.width / downsample),
      height: Math.ceil(this.extent.height / downsample),
    };
  }

  /**
   * Encode a tile position as a dense {@link TileIndex}.
   *
   * @throws {OutOfRangeError} If the layer, row or column is outside the pyramid.
   */
  tileIndex(layer: number, row: number, col: number): TileIndex {
    this.checkLayer(layer);
    const { xTiles, yTiles } = this.extent.layers[layer];
    if (!Number.isInteger(row) || row < 0 || row >= yTiles) {
      throw new OutOfRangeError(`Row ${row} outside layer ${layer} (${yTiles} rows)`);
    }
    if (!Number.isInteger(col) || col < 0 || col >= xTiles) {
      throw new OutOfRangeError(`Column ${col} outside layer ${layer} (${xTiles} columns)`);
    }
    return this.offsets[layer] + row * xTiles + col;
  }

  /**
   * Exact inverse of {@link tileIndex}.
   *
   * @throws {OutOfRangeError} If `index` is not in `[0, tileCount)`.
   */
  decodeTileIndex(index: TileIndex): TileAddress {
    const layer = this.layerOf(index);
    const local = index - this.offsets[layer];
    const { xTiles } = this.extent.layers[layer];
    return { layer, row: Math.floor(local / xTiles), col: local % xTiles };
  }

  /**
   * Layer a tile index belongs to.
   *
   * @throws {OutOfRangeError} If `index` is not in `[0, tileCount)`.
   */
  layerOf(index: TileIndex): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.tileCount) {
      throw new OutOfRangeError(`Tile index ${index} outside pyramid (${this.tileCount} tiles)`);
    }
    let layer = 0;
    while (index >= this.offsets[layer + 1]) layer++;
    return layer;
  }

  /**
   * Minimal set of tiles covering a pixel rectangle at `layer`, in
   * row-major order.
   *
   * The rectangle is clamped to the layer's tile grid, so a viewport that
   * hangs over the slide edge never yields out-of-range indices. An empty
   * or fully outside rectangle yields an empty array.
   *
   * @param layer - Layer whose pixel space `rect` is expressed in.
   * @param rect - Pixel rectangle; max edges are exclusive.
   * @throws {OutOfRangeError} If `layer >= layerCount`.
   */
  tilesOverlapping(layer: number, rect: BBox): TileIndex[] {
    this.checkLayer(layer);
    const { xTiles, yTiles } = this.extent.layers[layer];

    if (!(rect.maxX > rect.minX) || !(rect.maxY > rect.minY)) return [];

    const colStart = Math.max(0, Math.floor(rect.minX / TILE_SIZE));
    const colEnd = Math.min(xTiles - 1, Math.ceil(rect.maxX / TILE_SIZE) - 1);
    const rowStart = Math.max(0, Math.floor(rect.minY / TILE_SIZE));
    const rowEnd = Math.min(yTiles - 1, Math.ceil(rect.maxY / TILE_SIZE) - 1);

    if (colStart > colEnd || rowStart > rowEnd) return [];

    const base = this.offsets[layer];
    const result: TileIndex[] = [];
    for (let row = rowStart; row <= rowEnd; row++) {
      for (let col = colStart; col <= colEnd; col++) {
        result.push(base + row * xTiles + col);
      }
    }
    return result;
  }

  /**
   * Pixel rectangle covered by a tile within its own layer, clipped to the
   * layer's pixel size (edge tiles may be partial).
   *
   * @throws {OutOfRangeError} If `index` is not in `[0, tileCount)`.
   */
  tileBounds(index: TileIndex): BBox {
    const { layer, row, col } = this.decodeTileIndex(index);
    const { width, height } = this.layerSize(layer);
    return {
      minX: col * TILE_SIZE,
      minY: row * TILE_SIZE,
      maxX: Math.min((col + 1) * TILE_SIZE, width),
      maxY: Math.min((row + 1) * TILE_SIZE, height),
    };
  }

  /**
   * Tile at a lower-magnification layer that covers the top-left corner of
   * `index`. Used to substitute coarser data while a tile is decoding.
   *
   * @param index - Tile to map.
   * @param targetLayer - Layer at or below the tile's own layer.
   * @returns `index` itself when `targetLayer` is the tile's layer.
   * @throws {OutOfRangeError} If `index` is invalid or `targetLayer` is above
   *   the tile's layer.
   */
  coarserTile(index: TileIndex, targetLayer: number): TileIndex {
    const { layer, row, col } = this.decodeTileIndex(index);
    if (!Number.isInteger(targetLayer) || targetLayer < 0 || targetLayer > layer) {
      throw new OutOfRangeError(`Layer ${targetLayer} is not coarser than layer ${layer}`);
    }
    if (targetLayer === layer) return index;

    const source = this.extent.layers[layer];
    const target = this.extent.layers[targetLayer];
    const ratio = source.downsample / target.downsample;

    const targetRow = Math.min(target.yTiles - 1, Math.floor(row * ratio));
    const targetCol = Math.min(target.xTiles - 1, Math.floor(col * ratio));
    return this.offsets[targetLayer] + targetRow * target.xTiles + targetCol;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private checkLayer(layer: number): void {
    if (!Number.isInteger(layer) || layer < 0 || layer >= this.layerCount) {
      throw new OutOfRangeError(`Layer ${layer} outside pyramid (${this.layerCount} layers)`);
    }
  }
}

/** Tiles needed to span `size` full-magnification pixels at `downsample`. */
function gridSize(size: number, downsample: number): number {
  return Math.ceil(Math.ceil(size / downsample) / TILE_SIZE);
}

function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}
