import { describe, it, expect, afterEach } from 'vitest';
import { openSlide, type Slide } from '../../src/slide.js';
import { DataBuffer } from '../../src/buffer.js';
import { buildExtent } from '../../src/pyramid.js';
import { PixelFormat } from '../../src/types.js';
import type { SlideOptions } from '../../src/options.js';
import { MemoryConnector } from '../helpers/memory-connector.js';
import { DeferredFormat, flush } from '../helpers/mock-slide.js';

const opened: Slide[] = [];

afterEach(async () => {
  await Promise.all(opened.splice(0).map(slide => slide.close()));
});

async function open(width: number, height: number, downsamples: number[], options: SlideOptions = {}) {
  const format = new DeferredFormat({ extent: buildExtent(width, height, downsamples), format: PixelFormat.B8G8R8A8 });
  const slide = await openSlide({
    source: { type: 'network', id: 'edge', connector: new MemoryConnector(), format },
    options,
  });
  opened.push(slide);
  return { slide, format };
}

describe('Slide edge cases', () => {
  // ─── Single-layer slides ────────────────────────────────────────────

  it('should serve a single-layer slide without fallbacks', async () => {
    const { slide } = await open(600, 256, [1]);
    expect(slide.viewport(0, { minX: 0, minY: 0, maxX: 600, maxY: 256 })).toEqual([
      { status: 'miss', index: 0, scheduled: true },
      { status: 'miss', index: 1, scheduled: true },
      { status: 'miss', index: 2, scheduled: true },
    ]);
  });

  // ─── Deep pyramids ──────────────────────────────────────────────────

  it('should leave layers above 1 unscheduled until the viewer selects them', async () => {
    const { slide, format } = await open(1024, 1024, [4, 2, 1]);
    const rect = { minX: 0, minY: 0, maxX: 256, maxY: 256 };

    expect(slide.highResolutionLayer).toBe(0);
    expect(slide.viewport(2, rect)).toEqual([{ status: 'miss', index: 5, scheduled: false }]);
    expect(format.pending.length).toBe(0);

    slide.setHighResolutionLayer(2);
    expect(slide.viewport(2, rect)).toEqual([{ status: 'miss', index: 5, scheduled: true }]);
    expect(format.pending.map(p => p.request.index)).toEqual([5]);
  });

  // ─── Tiny caches ────────────────────────────────────────────────────

  it('should thrash a capacity-1 cache without losing track of tiles', async () => {
    const { slide, format } = await open(512, 256, [1], { capacity: 1 });
    slide.viewport(0, { minX: 0, minY: 0, maxX: 512, maxY: 256 });
    format.complete(0);
    format.complete(1);
    await slide.idle();

    expect(slide.cache.keys()).toEqual([1]);
    expect(slide.viewport(0, { minX: 0, minY: 0, maxX: 512, maxY: 256 })).toEqual([
      { status: 'miss', index: 0, scheduled: true },
      { status: 'hit', index: 1, buffer: slide.getTile(1) },
    ]);
  });

  // ─── Waiting ────────────────────────────────────────────────────────

  it('should time out a zero-length wait', async () => {
    const { slide } = await open(256, 256, [1]);
    await expect(slide.waitForUpdate(0)).resolves.toBe(false);
  });

  it('should reject a wait aborted by the caller', async () => {
    const { slide } = await open(256, 256, [1]);
    const controller = new AbortController();
    const waiting = slide.waitForUpdate(1000, controller.signal);
    controller.abort(new Error('frame dropped'));
    await expect(waiting).rejects.toThrow('frame dropped');
  });

  // ─── Decoder results ────────────────────────────────────────────────

  it('should not let a recycled decoder region change a cached tile', async () => {
    const { slide, format } = await open(256, 256, [1]);
    const region = new Uint8Array([9, 9, 9, 9]);
    slide.request([0]);
    format.take(0).resolve(DataBuffer.wrapWeak(region));
    await slide.idle();

    region.fill(0);
    expect([...(slide.getTile(0)?.read() ?? [])]).toEqual([9, 9, 9, 9]);
  });

  it('should let a failed tile be requested again on the next frame', async () => {
    const { slide, format } = await open(256, 256, [1]);
    slide.request([0]);
    format.take(0).reject(new Error('corrupt'));
    await flush();

    expect(slide.request([0])).toBe(1);
    format.complete(0);
    await slide.idle();
    expect(slide.getTile(0)).toBeDefined();
  });
});
