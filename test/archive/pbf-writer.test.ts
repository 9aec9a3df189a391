import { describe, it, expect } from 'vitest';
import Pbf from 'pbf';
import { PbfWriter, varintSize } from '../../src/archive/pbf-writer.js';

describe('PbfWriter', () => {
  describe('writeVarint', () => {
    it('should encode 0 as single byte', () => {
      const w = new PbfWriter(16);
      w.writeVarint(0);
      const buf = w.finish();
      expect(buf.length).toBe(1);
      expect(buf[0]).toBe(0);
    });

    it('should encode 128 as two bytes', () => {
      const w = new PbfWriter(16);
      w.writeVarint(128);
      const buf = w.finish();
      expect([...buf]).toEqual([0x80, 0x01]);
    });

    it('should encode 300 correctly', () => {
      const w = new PbfWriter(16);
      w.writeVarint(300);
      // 300 = 0b100101100 → 0xAC 0x02
      expect([...w.finish()]).toEqual([0xac, 0x02]);
    });

    it('should encode offsets past 4 GiB', () => {
      const w = new PbfWriter(16);
      w.writeVarint(2 ** 32 + 5);
      expect(new Pbf(w.finish()).readVarint()).toBe(4294967301);
    });

    it('should reject negative and unsafe values', () => {
      const w = new PbfWriter(16);
      expect(() => w.writeVarint(-1)).toThrow(RangeError);
      expect(() => w.writeVarint(2 ** 53)).toThrow(RangeError);
      expect(() => w.writeVarint(1.5)).toThrow(RangeError);
    });
  });

  describe('writeDouble', () => {
    it('should encode a little-endian double', () => {
      const w = new PbfWriter(16);
      w.writeDouble(0.0625);
      const buf = w.finish();
      expect(buf.length).toBe(8);
      const view = new DataView(buf.buffer, buf.byteOffset);
      expect(view.getFloat64(0, true)).toBe(0.0625);
    });

    it('should tag a double field with wire type I64', () => {
      const w = new PbfWriter(16);
      w.writeDoubleField(3, 1);
      // (3 << 3) | 1 = 0x19
      expect(w.finish()[0]).toBe(0x19);
    });
  });

  describe('nested messages', () => {
    it('should encode a nested message with correct length', () => {
      const w = new PbfWriter(64);
      w.beginMessage(1);
      w.writeVarintField(1, 42);
      w.endMessage();

      // tag(1, LEN) = 0x0A, length 2, tag(1, VARINT) = 0x08, 42
      expect([...w.finish()]).toEqual([0x0a, 2, 0x08, 42]);
    });

    it('should use a two-byte length for a 203-byte message', () => {
      const w = new PbfWriter(16);
      w.beginMessage(2);
      w.writePackedVarint(1, new Array<number>(200).fill(1));
      w.endMessage();

      const buf = w.finish();
      expect(buf.length).toBe(206);
      expect([...buf.subarray(0, 3)]).toEqual([0x12, 0xcb, 0x01]);
    });

    it('should decode with pbf', () => {
      const w = new PbfWriter();
      w.beginMessage(4);
      w.writeVarintField(1, 16);
      w.writeDoubleField(3, 0.25);
      w.endMessage();

      const read = new Pbf(w.finish()).readFields(
        (tag, out: { xTiles: number; scale: number }, pbf) => {
          if (tag === 4) {
            pbf.readMessage((inner, msg: { xTiles: number; scale: number }, p) => {
              if (inner === 1) msg.xTiles = p.readVarint();
              else if (inner === 3) msg.scale = p.readDouble();
            }, out);
          }
        },
        { xTiles: 0, scale: 0 },
      );
      expect(read).toEqual({ xTiles: 16, scale: 0.25 });
    });

    it('should throw when no message is open', () => {
      expect(() => new PbfWriter().endMessage()).toThrow(/without a matching beginMessage/);
    });
  });

  describe('packed varints', () => {
    it('should encode packed varint field', () => {
      const w = new PbfWriter(64);
      w.writePackedVarint(5, [1, 2, 300]);
      // tag(5, LEN) = 0x2A, length 4
      expect([...w.finish()]).toEqual([0x2a, 4, 1, 2, 0xac, 0x02]);
    });

    it('should skip empty arrays', () => {
      const w = new PbfWriter(16);
      w.writePackedVarint(1, []);
      expect(w.finish().length).toBe(0);
    });

    it('should round-trip through pbf', () => {
      const values = [0, 196608, 393216, 2 ** 33];
      const w = new PbfWriter();
      w.writePackedVarint(5, values);

      const read = new Pbf(w.finish()).readFields((tag, out: number[], pbf) => {
        if (tag === 5) pbf.readPackedVarint(out);
      }, []);
      expect(read).toEqual(values);
    });
  });

  describe('buffer growth', () => {
    it('should grow buffer when needed', () => {
      const w = new PbfWriter(4);
      for (let i = 0; i < 100; i++) w.writeVarint(i * 1000);
      const buf = w.finish();
      expect(buf.length).toBe(
        Array.from({ length: 100 }, (_, i) => varintSize(i * 1000)).reduce((a, b) => a + b, 0),
      );
    });
  });
});

describe('varintSize', () => {
  it('should count 7 bits per byte', () => {
    expect(varintSize(0)).toBe(1);
    expect(varintSize(127)).toBe(1);
    expect(varintSize(128)).toBe(2);
    expect(varintSize(2 ** 35)).toBe(6);
  });
});
