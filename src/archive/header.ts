/**
 * @module archive/header
 *
 * Slide archive header parser.
 *
 * A slide archive stores an uncompressed tile pyramid behind a
 * protobuf-encoded header:
 * ```
 * [8 bytes magic] [4 bytes header size, uint32 LE] [header protobuf] [tile data...]
 * ```
 *
 * Header message fields:
 * |  #  | Field        | Type                   |
 * | --- | ------------ | ---------------------- |
 * |  1  | width        | varint                 |
 * |  2  | height       | varint                 |
 * |  3  | format       | varint (PixelFormat)   |
 * |  4  | layers       | repeated Layer message |
 * |  5  | tile_offsets | packed varint          |
 * |  6  | tile_lengths | packed varint          |
 *
 * Layer message: 1 xTiles (varint), 2 yTiles (varint), 3 scale (double),
 * 4 downsample (double).
 *
 * Tile tables are indexed by dense tile index. Offsets are relative to the
 * start of the data section; a length of 0 marks a tile the archive does
 * not contain.
 */

import Pbf from 'pbf';
import { InvalidSlideFormatError } from '../errors.js';
import { validateExtent } from '../pyramid.js';
import { bytesPerPixel, type Extent, type LayerExtent, type PixelFormat } from '../types.js';

/** `"SLDTILE"` followed by the format version byte. */
export const MAGIC_BYTES = new Uint8Array([0x53, 0x4c, 0x44, 0x54, 0x49, 0x4c, 0x45, 0x01]);

/** Highest archive version this reader understands. */
export const ARCHIVE_VERSION = 1;

const HEADER_MAGIC_SIZE = 8;

/**
 * Bytes needed from the start of an archive to learn the full header size
 * via {@link headerByteSize}.
 */
export const INITIAL_HEADER_READ_SIZE = HEADER_MAGIC_SIZE + 4;

/** Upper bound on the header message, enough for several million tiles. */
export const MAX_HEADER_SIZE = 64 * 1024 * 1024;

/** Parsed archive header. */
export interface ArchiveHeader {
  extent: Extent;
  format: PixelFormat;
  /** Tile offsets relative to {@link ArchiveHeader.dataOffset}, by tile index. */
  tileOffsets: number[];
  /** Tile byte lengths by tile index; 0 for absent tiles. */
  tileLengths: number[];
  /** Absolute byte offset of the tile data section. */
  dataOffset: number;
}

/**
 * Check the 7-byte signature and that the version byte is supported.
 */
export function verifyMagic(bytes: Uint8Array): boolean {
  if (bytes.length < HEADER_MAGIC_SIZE) return false;
  for (let i = 0; i < HEADER_MAGIC_SIZE - 1; i++) {
    if (bytes[i] !== MAGIC_BYTES[i]) return false;
  }
  const version = bytes[HEADER_MAGIC_SIZE - 1];
  return version >= 1 && version <= ARCHIVE_VERSION;
}

/**
 * Total byte length of magic, size prefix and header message.
 *
 * @param bytes - At least {@link INITIAL_HEADER_READ_SIZE} bytes from the
 *   start of the archive.
 * @throws {InvalidSlideFormatError} If fewer bytes are given or the size
 *   prefix exceeds {@link MAX_HEADER_SIZE}.
 */
export function headerByteSize(bytes: Uint8Array): number {
  if (bytes.length < INITIAL_HEADER_READ_SIZE) {
    throw new InvalidSlideFormatError('Not enough bytes to read archive header size');
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset + HEADER_MAGIC_SIZE, 4);
  const size = view.getUint32(0, true);
  if (size > MAX_HEADER_SIZE) {
    throw new InvalidSlideFormatError(`Archive header size ${size} exceeds ${MAX_HEADER_SIZE} bytes`);
  }
  return INITIAL_HEADER_READ_SIZE + size;
}

/**
 * Parse and validate a complete archive header.
 *
 * @param bytes - Archive bytes from offset 0, covering at least the whole
 *   header.
 * @throws {InvalidSlideFormatError} If the magic is wrong, the header is
 *   truncated or malformed, the pyramid is invalid, the pixel format is
 *   unknown, or the tile tables do not match the pyramid.
 */
export function parseArchiveHeader(bytes: Uint8Array): ArchiveHeader {
  if (!verifyMagic(bytes)) {
    throw new InvalidSlideFormatError('Invalid slide archive magic bytes');
  }
  const total = headerByteSize(bytes);
  if (bytes.length < total) {
    throw new InvalidSlideFormatError(`Truncated archive header: ${bytes.length} of ${total} bytes`);
  }

  const raw: RawHeader = {
    width: 0,
    height: 0,
    format: 0,
    layers: [],
    tileOffsets: [],
    tileLengths: [],
  };

  try {
    new Pbf(bytes.subarray(INITIAL_HEADER_READ_SIZE, total)).readFields(readHeaderField, raw);
  } catch (err) {
    throw new InvalidSlideFormatError('Malformed slide archive header', { cause: err });
  }

  const extent: Extent = { width: raw.width, height: raw.height, layers: raw.layers };
  validateExtent(extent);

  const format: PixelFormat = raw.format;
  if (bytesPerPixel(format) === 0) {
    throw new InvalidSlideFormatError(`Unsupported pixel format ${raw.format}`);
  }

  const tileCount = raw.layers.reduce((sum, layer) => sum + layer.xTiles * layer.yTiles, 0);
  if (raw.tileOffsets.length !== tileCount || raw.tileLengths.length !== tileCount) {
    throw new InvalidSlideFormatError(
      `Tile table holds ${raw.tileOffsets.length} offsets and ${raw.tileLengths.length} lengths, pyramid has ${tileCount} tiles`,
    );
  }

  return {
    extent,
    format,
    tileOffsets: raw.tileOffsets,
    tileLengths: raw.tileLengths,
    dataOffset: total,
  };
}

// ─── Field readers ──────────────────────────────────────────────────────────

interface RawHeader {
  width: number;
  height: number;
  format: number;
  layers: LayerExtent[];
  tileOffsets: number[];
  tileLengths: number[];
}

function readHeaderField(tag: number, header: RawHeader, pbf: Pbf): void {
  switch (tag) {
    case 1: header.width = pbf.readVarint(); break;
    case 2: header.height = pbf.readVarint(); break;
    case 3: header.format = pbf.readVarint(); break;
    case 4:
      header.layers.push(
        pbf.readMessage(readLayerField, { xTiles: 0, yTiles: 0, scale: 0, downsample: 0 }),
      );
      break;
    case 5: pbf.readPackedVarint(header.tileOffsets); break;
    case 6: pbf.readPackedVarint(header.tileLengths); break;
  }
}

function readLayerField(tag: number, layer: LayerExtent, pbf: Pbf): void {
  switch (tag) {
    case 1: layer.xTiles = pbf.readVarint(); break;
    case 2: layer.yTiles = pbf.readVarint(); break;
    case 3: layer.scale = pbf.readDouble(); break;
    case 4: layer.downsample = pbf.readDouble(); break;
  }
}
