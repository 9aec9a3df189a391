/**
 * @module archive/pbf-writer
 *
 * Minimal Protocol Buffer binary writer for slide archive headers.
 *
 * Supports the wire types the header schema needs:
 *
 * | Wire Type | ID | Encoding             | Used For                          |
 * |-----------|----|----------------------|-----------------------------------|
 * | VARINT    |  0 | Variable-length int  | dimensions, pixel format, grids   |
 * | I64       |  1 | Fixed 64-bit         | scale, downsample                 |
 * | LEN       |  2 | Length-delimited     | layer messages, packed tile table |
 *
 * Varints cover every non-negative safe integer, so tile offsets in slides
 * larger than 4 GiB encode correctly.
 *
 * Nested messages are written using a begin/end pattern: {@link PbfWriter.beginMessage}
 * reserves a 5-byte length placeholder, and {@link PbfWriter.endMessage} patches
 * the actual length and shifts the payload to eliminate unused placeholder bytes.
 *
 * @see {@link https://protobuf.dev/programming-guides/encoding/ | Protobuf Encoding Guide}
 */

const WIRE_VARINT = 0;
const WIRE_I64 = 1;
const WIRE_LEN = 2;

const INITIAL_SIZE = 1024;

/**
 * Growable protobuf writer.
 *
 * @example
 * ```ts
 * const writer = new PbfWriter();
 * writer.writeVarintField(1, 4096);
 * writer.beginMessage(4);
 * writer.writeDoubleField(3, 0.25);
 * writer.endMessage();
 * const bytes = writer.finish();
 * ```
 */
export class PbfWriter {
  private buf: Uint8Array;
  private view: DataView;
  private pos: number = 0;
  /** Stack of length placeholder positions for nested messages. */
  private lengthStack: number[] = [];

  constructor(initialSize: number = INITIAL_SIZE) {
    this.buf = new Uint8Array(Math.max(16, initialSize));
    this.view = new DataView(this.buf.buffer);
  }

  // ─── Scalars ────────────────────────────────────────────────────────

  /**
   * Write an unsigned base-128 varint.
   *
   * @throws {RangeError} If `val` is negative or not a safe integer.
   */
  writeVarint(val: number): void {
    if (!Number.isSafeInteger(val) || val < 0) {
      throw new RangeError(`Cannot encode ${val} as an unsigned varint`);
    }
    this.ensure(varintSize(val));
    while (val > 0x7f) {
      this.buf[this.pos++] = (val % 0x80) | 0x80;
      val = Math.floor(val / 0x80);
    }
    this.buf[this.pos++] = val;
  }

  /** Write a 64-bit IEEE 754 double in little-endian byte order. */
  writeDouble(val: number): void {
    this.ensure(8);
    this.view.setFloat64(this.pos, val, true);
    this.pos += 8;
  }

  // ─── Field-level writes ─────────────────────────────────────────────

  writeVarintField(fieldNum: number, val: number): void {
    this.writeTag(fieldNum, WIRE_VARINT);
    this.writeVarint(val);
  }

  writeDoubleField(fieldNum: number, val: number): void {
    this.writeTag(fieldNum, WIRE_I64);
    this.writeDouble(val);
  }

  /**
   * Write a packed repeated varint field. Omitted entirely when `values`
   * is empty.
   */
  writePackedVarint(fieldNum: number, values: readonly number[]): void {
    if (values.length === 0) return;

    this.writeTag(fieldNum, WIRE_LEN);

    let byteLen = 0;
    for (const value of values) byteLen += varintSize(value);

    this.writeVarint(byteLen);
    for (const value of values) this.writeVarint(value);
  }

  // ─── Nested messages ────────────────────────────────────────────────

  /**
   * Start a nested message for `fieldNum`. Must be paired with
   * {@link endMessage}.
   */
  beginMessage(fieldNum: number): void {
    this.writeTag(fieldNum, WIRE_LEN);
    this.ensure(5);
    this.lengthStack.push(this.pos);
    this.pos += 5; // placeholder
  }

  /**
   * Finalize the most recently started nested message: write its length
   * into the placeholder and close the gap left by unused placeholder bytes.
   *
   * @throws {Error} If no message is open.
   */
  endMessage(): void {
    const placeholderPos = this.lengthStack.pop();
    if (placeholderPos === undefined) {
      throw new Error('endMessage() called without a matching beginMessage()');
    }
    const messageLen = this.pos - placeholderPos - 5;
    const lenSize = varintSize(messageLen);

    if (lenSize < 5) {
      this.buf.copyWithin(placeholderPos + lenSize, placeholderPos + 5, this.pos);
      this.pos -= 5 - lenSize;
    }

    let val = messageLen;
    let p = placeholderPos;
    while (val > 0x7f) {
      this.buf[p++] = (val & 0x7f) | 0x80;
      val >>>= 7;
    }
    this.buf[p] = val;
  }

  // ─── Output ─────────────────────────────────────────────────────────

  /**
   * Encoded bytes so far. A view of the internal buffer, valid until the
   * writer is used again.
   */
  finish(): Uint8Array {
    return this.buf.subarray(0, this.pos);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private writeTag(fieldNum: number, wireType: number): void {
    this.writeVarint(fieldNum * 8 + wireType);
  }

  private ensure(bytes: number): void {
    while (this.pos + bytes > this.buf.length) {
      const next = new Uint8Array(this.buf.length * 2);
      next.set(this.buf);
      this.buf = next;
      this.view = new DataView(this.buf.buffer);
    }
  }
}

/** Number of bytes needed to encode a non-negative integer as a varint. */
export function varintSize(val: number): number {
  let size = 1;
  while (val > 0x7f) {
    val = Math.floor(val / 0x80);
    size++;
  }
  return size;
}
