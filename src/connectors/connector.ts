/**
 * @module connector
 *
 * Abstract byte-range access to slide files.
 *
 * A {@link Connector} hides the transport behind a slide source (local
 * disk, a slide server, object storage) and exposes a uniform byte-range
 * read API. Slide formats read headers and tiles through a Connector
 * without knowing where the bytes live.
 *
 * Connectors are **path-agnostic**: one instance can serve several slide
 * files, with paths interpreted in a backend-specific way (filesystem
 * paths, slide identifiers, URLs).
 *
 * Implementations own their resources (file handles, sockets, clients) and
 * release them in {@link Connector.close}.
 *
 * Built-in implementation: {@link LocalConnector}. Network transports are
 * supplied by the application.
 */
export interface Connector {
  /**
   * Read a contiguous byte range from the resource at `path`.
   *
   * @param path - Connector-specific resource identifier.
   * @param offset - Zero-based byte offset to begin reading from.
   * @param length - Number of bytes to read.
   * @returns The requested byte range. May be shorter than `length` if the
   *   resource ends before `offset + length`. The caller owns the array.
   * @throws {Error} If the resource cannot be read.
   */
  read(path: string, offset: number, length: number): Promise<Uint8Array>;

  /**
   * Read several byte ranges from the same resource. The result preserves
   * the order of `ranges`.
   *
   * @throws {Error} If any individual range read fails.
   */
  readRanges(
    path: string,
    ranges: ReadonlyArray<{ offset: number; length: number }>,
  ): Promise<Uint8Array[]>;

  /**
   * Release all resources held by this connector. Calling `close()` twice
   * is a no-op.
   */
  close(): Promise<void>;
}
