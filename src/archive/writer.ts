/**
 * @module archive/writer
 *
 * Serialise a tile pyramid into the slide archive layout read by
 * {@link archiveFormat}. Used to produce fixtures and to export decoded
 * slides; tiles are stored uncompressed.
 */

import { OutOfRangeError } from '../errors.js';
import type { SlideMetadata } from '../format.js';
import { Pyramid, TILE_SIZE } from '../pyramid.js';
import { bytesPerPixel, type TileIndex } from '../types.js';
import { INITIAL_HEADER_READ_SIZE, MAGIC_BYTES } from './header.js';
import { PbfWriter } from './pbf-writer.js';

/** Byte length of one stored tile for `metadata`'s pixel format. */
export function archiveTileByteLength(metadata: SlideMetadata): number {
  return TILE_SIZE * TILE_SIZE * bytesPerPixel(metadata.format);
}

/**
 * Encode a complete slide archive.
 *
 * Tiles missing from `tiles` are recorded as absent. Tile data is laid out
 * in ascending index order.
 *
 * @param metadata - Pyramid and pixel format of the slide.
 * @param tiles - Raw pixel data keyed by tile index.
 * @throws {InvalidSlideFormatError} If the extent violates the pyramid invariants.
 * @throws {OutOfRangeError} If a tile index is outside the pyramid.
 * @throws {RangeError} If the pixel format is undefined or a tile has the
 *   wrong byte length.
 */
export function writeSlideArchive(
  metadata: SlideMetadata,
  tiles: Iterable<readonly [TileIndex, Uint8Array]>,
): Uint8Array {
  const pyramid = new Pyramid(metadata.extent);
  const tileBytes = archiveTileByteLength(metadata);
  if (tileBytes === 0) {
    throw new RangeError(`Cannot write tiles in pixel format ${metadata.format}`);
  }

  const byIndex = new Map<TileIndex, Uint8Array>();
  for (const [index, data] of tiles) {
    if (!Number.isInteger(index) || index < 0 || index >= pyramid.tileCount) {
      throw new OutOfRangeError(`Tile index ${index} outside pyramid (${pyramid.tileCount} tiles)`);
    }
    if (data.byteLength !== tileBytes) {
      throw new RangeError(`Tile ${index} holds ${data.byteLength} bytes, expected ${tileBytes}`);
    }
    byIndex.set(index, data);
  }

  const offsets = new Array<number>(pyramid.tileCount).fill(0);
  const lengths = new Array<number>(pyramid.tileCount).fill(0);
  let dataSize = 0;
  for (let index = 0; index < pyramid.tileCount; index++) {
    if (!byIndex.has(index)) continue;
    offsets[index] = dataSize;
    lengths[index] = tileBytes;
    dataSize += tileBytes;
  }

  const header = encodeHeader(metadata, offsets, lengths);

  const out = new Uint8Array(INITIAL_HEADER_READ_SIZE + header.byteLength + dataSize);
  out.set(MAGIC_BYTES, 0);
  new DataView(out.buffer).setUint32(MAGIC_BYTES.length, header.byteLength, true);
  out.set(header, INITIAL_HEADER_READ_SIZE);

  const dataOffset = INITIAL_HEADER_READ_SIZE + header.byteLength;
  for (const [index, data] of byIndex) {
    out.set(data, dataOffset + offsets[index]);
  }
  return out;
}

function encodeHeader(metadata: SlideMetadata, offsets: number[], lengths: number[]): Uint8Array {
  const { extent, format } = metadata;
  const writer = new PbfWriter();

  writer.writeVarintField(1, extent.width);
  writer.writeVarintField(2, extent.height);
  writer.writeVarintField(3, format);

  for (const layer of extent.layers) {
    writer.beginMessage(4);
    writer.writeVarintField(1, layer.xTiles);
    writer.writeVarintField(2, layer.yTiles);
    writer.writeDoubleField(3, layer.scale);
    writer.writeDoubleField(4, layer.downsample);
    writer.endMessage();
  }

  writer.writePackedVarint(5, offsets);
  writer.writePackedVarint(6, lengths);

  return writer.finish();
}
