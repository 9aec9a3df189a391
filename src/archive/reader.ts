/**
 * @module archive/reader
 *
 * Built-in {@link SlideFormat} for slide archives.
 *
 * Opening reads the header in two passes through the connector: the fixed
 * prefix first, to learn the header size, then the whole header. Each tile
 * decode is a single byte-range read; the stored pixels are already in the
 * slide's pixel format, so the bytes are adopted into a strong buffer as
 * they are.
 */

import { DataBuffer } from '../buffer.js';
import type { Connector } from '../connectors/connector.js';
import { DecodeError, InvalidSlideFormatError, SlideIOError } from '../errors.js';
import type { DecodeRequest, SlideFormat, SlideMetadata, SlideReader } from '../format.js';
import {
  headerByteSize,
  INITIAL_HEADER_READ_SIZE,
  parseArchiveHeader,
  verifyMagic,
  type ArchiveHeader,
} from './header.js';
import { archiveTileByteLength } from './writer.js';

/** Reader over one opened archive. */
export class ArchiveReader implements SlideReader {
  readonly metadata: SlideMetadata;
  private readonly tileBytes: number;

  constructor(
    private readonly connector: Connector,
    private readonly path: string,
    private readonly header: ArchiveHeader,
  ) {
    this.metadata = { extent: header.extent, format: header.format };
    this.tileBytes = archiveTileByteLength(this.metadata);
  }

  /**
   * Read one stored tile.
   *
   * @throws {DecodeError} If the archive does not contain the tile or the
   *   stored bytes are truncated.
   * @throws {SlideIOError} If the connector fails.
   */
  decode = async (request: DecodeRequest): Promise<DataBuffer> => {
    request.signal.throwIfAborted();

    const { index } = request;
    const length = this.header.tileLengths[index];
    if (length === undefined || length === 0) {
      throw new DecodeError(index, 'tile is absent from the archive');
    }
    if (length !== this.tileBytes) {
      throw new DecodeError(index, `stored tile holds ${length} bytes, expected ${this.tileBytes}`);
    }

    const offset = this.header.dataOffset + this.header.tileOffsets[index];
    let bytes: Uint8Array;
    try {
      bytes = await this.connector.read(this.path, offset, length);
    } catch (err) {
      throw new SlideIOError(this.path, { cause: err });
    }

    if (bytes.byteLength !== length) {
      throw new DecodeError(index, `read ${bytes.byteLength} of ${length} bytes`);
    }
    return DataBuffer.adopt(bytes);
  };
}

/**
 * Slide archive format.
 *
 * @example
 * ```typescript
 * const slide = await openSlide({
 *   source: { type: 'local', path: './slides/biopsy.sldt' },
 *   formats: [archiveFormat],
 * });
 * ```
 */
export const archiveFormat: SlideFormat = {
  name: 'archive',

  async open(connector: Connector, path: string): Promise<SlideReader> {
    const prefix = await readOrThrow(connector, path, 0, INITIAL_HEADER_READ_SIZE);
    if (prefix.byteLength < INITIAL_HEADER_READ_SIZE || !verifyMagic(prefix)) {
      throw new InvalidSlideFormatError(`${path} is not a slide archive`);
    }

    const total = headerByteSize(prefix);
    const headerBytes = await readOrThrow(connector, path, 0, total);
    const header = parseArchiveHeader(headerBytes);

    return new ArchiveReader(connector, path, header);
  },
};

async function readOrThrow(
  connector: Connector,
  path: string,
  offset: number,
  length: number,
): Promise<Uint8Array> {
  try {
    return await connector.read(path, offset, length);
  } catch (err) {
    throw new SlideIOError(path, { cause: err });
  }
}
