/**
 * @module buffer
 *
 * Shared byte container used for decoded tile pixels and annotation images.
 *
 * A {@link DataBuffer} is a handle over a contiguous byte region in one of
 * two shapes:
 *
 * | Ownership | Region   | Growth on write           | Lifetime                      |
 * |-----------|----------|---------------------------|-------------------------------|
 * | `strong`  | owned    | doubles capacity          | as long as any handle lives   |
 * | `weak`    | borrowed | never; throws on overflow | bound to the external owner   |
 *
 * Copying a handle shares the region. A weak buffer can be promoted with
 * {@link DataBuffer.strengthen}, which copies into a new strong buffer and
 * leaves every existing weak handle untouched. There is no demotion.
 *
 * Write views returned by {@link DataBuffer.write} address the region that
 * was current when they were handed out; a later growth moves the data to a
 * new region, so fill each view before requesting the next one.
 *
 * @example
 * ```typescript
 * const buf = DataBuffer.createWithCapacity(256 * 256 * 4);
 * buf.write(256 * 256 * 4).set(pixels);
 * cache.put(index, buf);
 * ```
 */

import { AllocationError, OverflowError } from './errors.js';

/** Whether a buffer owns (`strong`) or borrows (`weak`) its region. */
export type BufferOwnership = 'strong' | 'weak';

type Region =
  | { readonly kind: 'owned'; readonly bytes: Uint8Array }
  | { readonly kind: 'borrowed'; readonly bytes: Uint8Array; readonly owner: object | undefined };

const EMPTY_REGION = new Uint8Array(0);

/**
 * Reference-counted, resizable byte container with strong/weak ownership.
 *
 * Construct through the static factories.
 */
export class DataBuffer {
  private region: Region;
  private used: number;

  private constructor(region: Region, size: number) {
    this.region = region;
    this.used = size;
  }

  // ─── Factories ──────────────────────────────────────────────────────

  /**
   * Create a strong buffer without backing memory (capacity and size 0).
   * The first {@link write} allocates.
   */
  static createEmpty(): DataBuffer {
    return new DataBuffer({ kind: 'owned', bytes: EMPTY_REGION }, 0);
  }

  /**
   * Create a strong, blank buffer with `bytes` of capacity and size 0.
   *
   * @throws {AllocationError} If `bytes` is not a non-negative safe integer
   *   or the region cannot be allocated.
   */
  static createWithCapacity(bytes: number): DataBuffer {
    return new DataBuffer({ kind: 'owned', bytes: allocate(bytes) }, 0);
  }

  /**
   * Create a strong buffer holding a copy of the first `length` bytes of
   * `data`. The source may be reused or released as soon as this returns.
   *
   * @throws {RangeError} If `length` exceeds `data.byteLength`.
   * @throws {AllocationError} If the copy cannot be allocated.
   */
  static copyFrom(data: Uint8Array, length: number = data.byteLength): DataBuffer {
    if (length > data.byteLength) {
      throw new RangeError(`Cannot copy ${length} bytes from a ${data.byteLength}-byte source`);
    }
    const bytes = allocate(length);
    bytes.set(data.subarray(0, length));
    return new DataBuffer({ kind: 'owned', bytes }, length);
  }

  /**
   * Wrap a weak buffer around foreign memory without copying.
   *
   * Capacity is `data.byteLength`; `size` marks how much of it already
   * holds data (all of it by default). Pass `owner` to keep the object that
   * manages the region (a pool, a frame, a worker message) reachable for as
   * long as this handle lives. Using the handle after the owner recycled
   * the region is a contract violation.
   *
   * @throws {RangeError} If `size` is negative or exceeds the region.
   */
  static wrapWeak(data: Uint8Array, size: number = data.byteLength, owner?: object): DataBuffer {
    if (size < 0 || size > data.byteLength) {
      throw new RangeError(`Weak buffer size ${size} outside region of ${data.byteLength} bytes`);
    }
    return new DataBuffer({ kind: 'borrowed', bytes: data, owner }, size);
  }

  /**
   * Take ownership of a freshly produced region without copying.
   *
   * The caller must not keep writing to `data`; decoders use this to hand
   * over the bytes they allocated.
   */
  static adopt(data: Uint8Array): DataBuffer {
    return new DataBuffer({ kind: 'owned', bytes: data }, data.byteLength);
  }

  // ─── Accessors ──────────────────────────────────────────────────────

  get ownership(): BufferOwnership {
    return this.region.kind === 'owned' ? 'strong' : 'weak';
  }

  /** Bytes available in the current region. */
  get capacity(): number {
    return this.region.bytes.byteLength;
  }

  /** Bytes logically written. Always `<= capacity`. */
  get size(): number {
    return this.used;
  }

  /** External owner given to {@link wrapWeak}, if any. */
  get owner(): object | undefined {
    return this.region.kind === 'borrowed' ? this.region.owner : undefined;
  }

  // ─── Operations ─────────────────────────────────────────────────────

  /**
   * Expose the next `additionalBytes` of writable space and advance `size`.
   *
   * Strong buffers grow to `max(size + additionalBytes, 2 × capacity)` when
   * the region is too small. Weak buffers never grow.
   *
   * @returns A view of exactly `additionalBytes` bytes starting at the
   *   previous `size`.
   * @throws {RangeError} If `additionalBytes` is not a non-negative safe integer.
   * @throws {OverflowError} If the buffer is weak and the write does not fit.
   * @throws {AllocationError} If growing a strong buffer fails.
   */
  write(additionalBytes: number): Uint8Array {
    if (!Number.isSafeInteger(additionalBytes) || additionalBytes < 0) {
      throw new RangeError(`Invalid write length: ${additionalBytes}`);
    }

    const start = this.used;
    const end = start + additionalBytes;

    if (end > this.capacity) {
      if (this.region.kind === 'borrowed') {
        throw new OverflowError(this.capacity, end);
      }
      this.grow(end);
    }

    this.used = end;
    return this.region.bytes.subarray(start, end);
  }

  /** View of the written bytes `[0, size)`. Ownership stays with the buffer. */
  read(): Uint8Array {
    return this.region.bytes.subarray(0, this.used);
  }

  /**
   * Promote to a strong buffer.
   *
   * A weak buffer is copied into a new owned region (capacity = size); the
   * original handle and its region are left as they were. A strong buffer
   * is returned unchanged.
   */
  strengthen(): DataBuffer {
    if (this.region.kind === 'owned') return this;
    return DataBuffer.copyFrom(this.region.bytes, this.used);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private grow(required: number): void {
    const next = allocate(Math.max(required, this.capacity * 2));
    next.set(this.region.bytes.subarray(0, this.used));
    this.region = { kind: 'owned', bytes: next };
  }
}

/**
 * Allocate a zero-filled region, mapping every failure to
 * {@link AllocationError}.
 */
function allocate(bytes: number): Uint8Array {
  if (!Number.isSafeInteger(bytes) || bytes < 0) {
    throw new AllocationError(bytes);
  }
  try {
    return new Uint8Array(bytes);
  } catch (err) {
    throw new AllocationError(bytes, { cause: err });
  }
}
