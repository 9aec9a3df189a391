/**
 * @module format
 *
 * Seams through which slide codecs plug into a {@link Slide}.
 *
 * A {@link SlideFormat} recognises a file layout and opens a
 * {@link SlideReader} over a {@link Connector}. The reader exposes the
 * pyramid metadata parsed during opening and decodes individual tiles into
 * strong {@link DataBuffer}s. Vendor codecs live outside this library and
 * implement these interfaces; {@link archiveFormat} is the built-in reader
 * for uncompressed slide archives.
 */

import type { DataBuffer } from './buffer.js';
import type { Connector } from './connectors/connector.js';
import type { Extent, PixelFormat, TileAddress, TileIndex } from './types.js';

/** Pyramid metadata of an opened slide. */
export interface SlideMetadata {
  extent: Extent;
  format: PixelFormat;
}

/** One tile decode job. */
export interface DecodeRequest extends TileAddress {
  index: TileIndex;
  /** Aborted when the requesting slide stops its decode queue. */
  signal: AbortSignal;
}

/**
 * Decode one tile into a strong buffer of packed pixels.
 *
 * Implementations may check `request.signal` to abandon work early and
 * should reject with {@link DecodeError} when the source yields no usable
 * data for the tile.
 */
export type TileDecoder = (request: DecodeRequest) => Promise<DataBuffer>;

/** Per-file state of an opened format. */
export interface SlideReader {
  readonly metadata: SlideMetadata;
  decode: TileDecoder;
  /** Release reader resources. The connector is closed separately. */
  close?(): Promise<void>;
}

/** A slide file layout. */
export interface SlideFormat {
  readonly name: string;
  /**
   * Parse metadata from `path`.
   *
   * @throws {InvalidSlideFormatError} If the file is not in this format or
   *   its metadata is invalid; the next candidate format is then tried.
   * @throws {SlideIOError} If the source cannot be read.
   */
  open(connector: Connector, path: string): Promise<SlideReader>;
}
