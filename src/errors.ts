/**
 * @module errors
 *
 * Error taxonomy for slide-tiles.
 *
 * All errors raised by the library extend {@link SlideTilesError}, so callers
 * can separate library faults from anything else with one `instanceof`.
 * A cache miss is never an error: lookups return `undefined`.
 */

/** Base class of every error thrown by this library. */
export class SlideTilesError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SlideTilesError';
  }
}

/** Buffer allocation or growth failed. No partial state is retained. */
export class AllocationError extends SlideTilesError {
  constructor(public readonly requestedBytes: number, options?: { cause?: unknown }) {
    super(`Unable to allocate ${requestedBytes} bytes`, options);
    this.name = 'AllocationError';
  }
}

/** A write would run past the end of a weak buffer's borrowed region. */
export class OverflowError extends SlideTilesError {
  constructor(
    public readonly capacity: number,
    public readonly requestedSize: number,
  ) {
    super(`Weak buffer overflow: ${requestedSize} bytes requested, capacity is ${capacity}`);
    this.name = 'OverflowError';
  }
}

/** A layer, row, column or tile index outside the pyramid was queried. */
export class OutOfRangeError extends SlideTilesError {
  constructor(message: string) {
    super(message);
    this.name = 'OutOfRangeError';
  }
}

/** Slide metadata could not be parsed or violates pyramid invariants. */
export class InvalidSlideFormatError extends SlideTilesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidSlideFormatError';
  }
}

/** The slide source could not be read. */
export class SlideIOError extends SlideTilesError {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Unable to read slide source ${path}`, options);
    this.name = 'SlideIOError';
  }
}

/** A decoder produced no usable pixel data for a tile. */
export class DecodeError extends SlideTilesError {
  constructor(
    public readonly index: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Tile ${index}: ${message}`, options);
    this.name = 'DecodeError';
  }
}

/** An operation is not allowed in the slide's current lifecycle state. */
export class SlideStateError extends SlideTilesError {
  constructor(
    public readonly state: string,
    operation: string,
  ) {
    super(`Cannot ${operation} while slide is ${state}`);
    this.name = 'SlideStateError';
  }
}
