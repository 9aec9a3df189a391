/**
 * @module connectors/local
 *
 * Local filesystem {@link Connector} implementation.
 *
 * Uses Node.js `FileHandle` objects for byte-range reads with an LRU pool
 * that bounds the number of open file descriptors. Concurrent decode
 * workers reading the same slide share one handle; ranges within a single
 * {@link LocalConnector.readRanges} call are issued in parallel.
 */

import { open, type FileHandle } from 'node:fs/promises';
import type { Connector } from './connector.js';

/**
 * Maximum number of bytes per `FileHandle.read()` call.
 *
 * Node's `fs.read` binding requires the length to fit in an Int32. Larger
 * reads are split into sequential chunks.
 */
const MAX_READ_CHUNK = 1024 * 1024 * 1024; // 1 GiB

/**
 * Configuration options for {@link LocalConnector}.
 */
export interface LocalConnectorOptions {
  /**
   * Maximum number of file handles kept open in the LRU pool. The
   * least-recently-used handle is closed when the pool overflows.
   *
   * @defaultValue 16
   */
  maxOpenFiles?: number;
}

/**
 * Local filesystem connector using `FileHandle` with LRU pooling.
 *
 * @example
 * ```typescript
 * const connector = new LocalConnector({ maxOpenFiles: 4 });
 * const header = await connector.read('./slides/biopsy.sldt', 0, 12);
 * await connector.close();
 * ```
 */
export class LocalConnector implements Connector {
  private readonly maxOpenFiles: number;
  /** LRU pool: Map preserves insertion order; most recently used is moved to end */
  private readonly handles = new Map<string, FileHandle>();
  /** Opens in flight, so concurrent first reads of one path share a handle. */
  private readonly opening = new Map<string, Promise<FileHandle>>();

  constructor(options?: LocalConnectorOptions) {
    this.maxOpenFiles = options?.maxOpenFiles ?? 16;
  }

  /**
   * Read a contiguous byte range from a local file.
   *
   * @returns The requested bytes; shorter than `length` at end of file.
   * @throws {Error} If the file cannot be opened or read (`ENOENT`, `EACCES`, ...).
   */
  async read(path: string, offset: number, length: number): Promise<Uint8Array> {
    const handle = await this.getHandle(path);
    const buf = Buffer.alloc(length);

    let totalRead = 0;
    while (totalRead < length) {
      const chunk = Math.min(length - totalRead, MAX_READ_CHUNK);
      const { bytesRead } = await handle.read(buf, totalRead, chunk, offset + totalRead);
      totalRead += bytesRead;
      if (bytesRead < chunk) break; // EOF
    }

    return new Uint8Array(buf.buffer, buf.byteOffset, totalRead);
  }

  async readRanges(
    path: string,
    ranges: ReadonlyArray<{ offset: number; length: number }>,
  ): Promise<Uint8Array[]> {
    return Promise.all(
      ranges.map(({ offset, length }) => this.read(path, offset, length)),
    );
  }

  /**
   * Close all pooled file handles. A later read reopens its file; opens
   * still in flight join the pool when they complete.
   */
  async close(): Promise<void> {
    const handles = [...this.handles.values()];
    this.handles.clear();
    await Promise.all(handles.map(h => h.close()));
  }

  // ─── Handle pool ────────────────────────────────────────────────────

  private async getHandle(path: string): Promise<FileHandle> {
    const existing = this.handles.get(path);
    if (existing) {
      // Move to end (most recently used)
      this.handles.delete(path);
      this.handles.set(path, existing);
      return existing;
    }

    const inFlight = this.opening.get(path);
    if (inFlight) return inFlight;

    const pending = open(path, 'r');
    this.opening.set(path, pending);
    let handle: FileHandle;
    try {
      handle = await pending;
    } finally {
      this.opening.delete(path);
    }
    this.handles.set(path, handle);

    // Evict LRU if over capacity
    if (this.handles.size > this.maxOpenFiles) {
      const oldest = this.handles.entries().next();
      if (!oldest.done) {
        const [oldestPath, oldestHandle] = oldest.value;
        this.handles.delete(oldestPath);
        await oldestHandle.close();
      }
    }

    return handle;
  }
}
