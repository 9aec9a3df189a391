import { describe, it, expect } from 'vitest';
import { DataBuffer } from '../src/buffer.js';
import { AllocationError, OverflowError } from '../src/errors.js';
import { thrown } from './helpers/assert.js';

describe('DataBuffer', () => {
  // ─── Factories ──────────────────────────────────────────────────────

  describe('createEmpty', () => {
    it('should create a strong buffer with no capacity', () => {
      const buf = DataBuffer.createEmpty();
      expect(buf.ownership).toBe('strong');
      expect(buf.capacity).toBe(0);
      expect(buf.size).toBe(0);
      expect(buf.read().length).toBe(0);
    });

    it('should allocate on first write', () => {
      const buf = DataBuffer.createEmpty();
      buf.write(3).set([1, 2, 3]);
      expect(buf.capacity).toBe(3);
      expect([...buf.read()]).toEqual([1, 2, 3]);
    });
  });

  describe('createWithCapacity', () => {
    it('should create a blank strong buffer', () => {
      const buf = DataBuffer.createWithCapacity(64);
      expect(buf.ownership).toBe('strong');
      expect(buf.capacity).toBe(64);
      expect(buf.size).toBe(0);
    });

    it('should throw AllocationError for a negative size', () => {
      expect(() => DataBuffer.createWithCapacity(-1)).toThrow(AllocationError);
    });

    it('should throw AllocationError for a fractional size', () => {
      expect(() => DataBuffer.createWithCapacity(1.5)).toThrow(AllocationError);
    });

    it('should report the requested size on AllocationError', () => {
      const err = thrown(() => DataBuffer.createWithCapacity(-8));
      expect(err).toBeInstanceOf(AllocationError);
      expect(err).toMatchObject({ requestedBytes: -8, name: 'AllocationError' });
    });
  });

  describe('copyFrom', () => {
    it('should read back the copied bytes', () => {
      const source = new Uint8Array([9, 8, 7, 6, 5]);
      const buf = DataBuffer.copyFrom(source);
      expect(buf.ownership).toBe('strong');
      expect(buf.size).toBe(5);
      expect([...buf.read()]).toEqual([9, 8, 7, 6, 5]);
    });

    it('should be independent of the source after copying', () => {
      const source = new Uint8Array([1, 2, 3]);
      const buf = DataBuffer.copyFrom(source);
      source.fill(0);
      expect([...buf.read()]).toEqual([1, 2, 3]);
    });

    it('should copy only the first length bytes', () => {
      const buf = DataBuffer.copyFrom(new Uint8Array([1, 2, 3, 4]), 2);
      expect(buf.size).toBe(2);
      expect(buf.capacity).toBe(2);
      expect([...buf.read()]).toEqual([1, 2]);
    });

    it('should reject a length longer than the source', () => {
      expect(() => DataBuffer.copyFrom(new Uint8Array(2), 3)).toThrow(RangeError);
    });

    it('should copy an empty source', () => {
      const buf = DataBuffer.copyFrom(new Uint8Array(0));
      expect(buf.size).toBe(0);
      expect(buf.capacity).toBe(0);
    });
  });

  describe('wrapWeak', () => {
    it('should share the region without copying', () => {
      const region = new Uint8Array([1, 2, 3, 4]);
      const buf = DataBuffer.wrapWeak(region);
      expect(buf.ownership).toBe('weak');
      expect(buf.capacity).toBe(4);
      expect(buf.size).toBe(4);

      region[0] = 42;
      expect(buf.read()[0]).toBe(42);
    });

    it('should accept a partial size', () => {
      const buf = DataBuffer.wrapWeak(new Uint8Array(8), 3);
      expect(buf.size).toBe(3);
      expect(buf.capacity).toBe(8);
    });

    it('should keep a reference to the owner', () => {
      const pool = { name: 'frame-pool' };
      const buf = DataBuffer.wrapWeak(new Uint8Array(4), 0, pool);
      expect(buf.owner).toBe(pool);
    });

    it('should reject a size beyond the region', () => {
      expect(() => DataBuffer.wrapWeak(new Uint8Array(4), 5)).toThrow(RangeError);
      expect(() => DataBuffer.wrapWeak(new Uint8Array(4), -1)).toThrow(RangeError);
    });
  });

  describe('adopt', () => {
    it('should take the region without copying', () => {
      const region = new Uint8Array([5, 6]);
      const buf = DataBuffer.adopt(region);
      expect(buf.ownership).toBe('strong');
      expect(buf.size).toBe(2);
      expect(buf.read().buffer).toBe(region.buffer);
    });
  });

  // ─── write ──────────────────────────────────────────────────────────

  describe('write', () => {
    it('should fail on a weak buffer wrapped at full size', () => {
      const buf = DataBuffer.wrapWeak(new Uint8Array(10));
      expect(() => buf.write(5)).toThrow(OverflowError);
    });

    it('should succeed twice on a strong buffer with capacity 10', () => {
      const buf = DataBuffer.createWithCapacity(10);
      buf.write(5);
      buf.write(5);
      expect(buf.size).toBe(10);
      expect(buf.capacity).toBe(10);
    });

    it('should leave a weak buffer unchanged after an overflow', () => {
      const region = new Uint8Array(6);
      const buf = DataBuffer.wrapWeak(region, 4);
      expect(() => buf.write(3)).toThrow(OverflowError);
      expect(buf.size).toBe(4);
      expect(buf.capacity).toBe(6);
    });

    it('should report capacity and requested size on OverflowError', () => {
      const buf = DataBuffer.wrapWeak(new Uint8Array(6), 4);
      const err = thrown(() => buf.write(3));
      expect(err).toBeInstanceOf(OverflowError);
      expect(err).toMatchObject({ capacity: 6, requestedSize: 7 });
    });

    it('should fill the remaining space of a weak buffer in place', () => {
      const region = new Uint8Array(4);
      const buf = DataBuffer.wrapWeak(region, 2);
      buf.write(2).set([7, 8]);
      expect(buf.size).toBe(4);
      expect([...region]).toEqual([0, 0, 7, 8]);
    });

    it('should double capacity when a strong buffer grows', () => {
      const buf = DataBuffer.createWithCapacity(8);
      buf.write(8);
      buf.write(1);
      expect(buf.capacity).toBe(16);
      expect(buf.size).toBe(9);
    });

    it('should grow to the required size when doubling is not enough', () => {
      const buf = DataBuffer.createWithCapacity(4);
      buf.write(20);
      expect(buf.capacity).toBe(20);
    });

    it('should preserve written bytes across growth', () => {
      const buf = DataBuffer.createWithCapacity(2);
      buf.write(2).set([1, 2]);
      buf.write(3).set([3, 4, 5]);
      expect([...buf.read()]).toEqual([1, 2, 3, 4, 5]);
    });

    it('should grow a copied buffer without touching its source', () => {
      const source = new Uint8Array([1, 2]);
      const buf = DataBuffer.copyFrom(source);
      buf.write(1).set([3]);
      expect([...source]).toEqual([1, 2]);
      expect([...buf.read()]).toEqual([1, 2, 3]);
    });

    it('should accept a zero-length write', () => {
      const buf = DataBuffer.wrapWeak(new Uint8Array(2));
      expect(buf.write(0).length).toBe(0);
      expect(buf.size).toBe(2);
    });

    it('should reject invalid lengths', () => {
      const buf = DataBuffer.createWithCapacity(4);
      expect(() => buf.write(-1)).toThrow(RangeError);
      expect(() => buf.write(0.5)).toThrow(RangeError);
      expect(() => buf.write(Number.NaN)).toThrow(RangeError);
    });
  });

  // ─── strengthen ─────────────────────────────────────────────────────

  describe('strengthen', () => {
    it('should copy a weak buffer into a new strong one', () => {
      const region = new Uint8Array([1, 2, 3, 4]);
      const weak = DataBuffer.wrapWeak(region, 3);
      const strong = weak.strengthen();

      expect(strong).not.toBe(weak);
      expect(strong.ownership).toBe('strong');
      expect(strong.size).toBe(3);
      expect([...strong.read()]).toEqual([1, 2, 3]);

      region.fill(0);
      expect([...strong.read()]).toEqual([1, 2, 3]);
    });

    it('should leave the weak handle weak', () => {
      const weak = DataBuffer.wrapWeak(new Uint8Array(2));
      weak.strengthen();
      expect(weak.ownership).toBe('weak');
    });

    it('should return a strong buffer unchanged', () => {
      const strong = DataBuffer.createWithCapacity(4);
      expect(strong.strengthen()).toBe(strong);
    });

    it('should let the promoted buffer grow', () => {
      const strong = DataBuffer.wrapWeak(new Uint8Array([1])).strengthen();
      strong.write(4);
      expect(strong.size).toBe(5);
    });
  });
});
