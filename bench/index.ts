/**
 * Performance benchmarks for slide-tiles.
 *
 * These benchmarks exercise the hot paths of the tile subsystem: buffer
 * writes, pyramid addressing, viewport queries, cache inserts under
 * eviction pressure and archive header parsing.
 *
 * Run: npm run bench
 */

import { DataBuffer } from '../src/buffer.js';
import { TileCache } from '../src/cache.js';
import { LoadCoordinator } from '../src/coordinator.js';
import { buildExtent, Pyramid } from '../src/pyramid.js';
import { parseArchiveHeader } from '../src/archive/header.js';
import { writeSlideArchive } from '../src/archive/writer.js';
import { PixelFormat, type BBox, type TileIndex } from '../src/types.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

function bench(name: string, fn: () => void, iterations: number): void {
  // Warmup
  for (let i = 0; i < Math.min(iterations, 100); i++) fn();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) fn();
  const elapsed = performance.now() - start;

  const opsPerSec = (iterations / elapsed) * 1000;
  const usPerOp = (elapsed / iterations) * 1000;

  console.log(
    `  ${name.padEnd(45)} ${fmt(opsPerSec, 0).padStart(12)} ops/s  ${fmt(usPerOp, 1).padStart(10)} µs/op`,
  );
}

function fmt(n: number, decimals: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: decimals });
}

// ─── Synthetic slides ───────────────────────────────────────────────────────

/** 100k × 80k slide at 40x with 4x steps down to a thumbnail. */
const gigapixel = new Pyramid(buildExtent(100_000, 80_000, [256, 64, 16, 4, 1]));

function randomViewport(layer: number): BBox {
  const { width, height } = gigapixel.layerSize(layer);
  const minX = Math.random() * Math.max(0, width - 1920);
  const minY = Math.random() * Math.max(0, height - 1080);
  return { minX, minY, maxX: minX + 1920, maxY: minY + 1080 };
}

function randomIndices(count: number): TileIndex[] {
  return Array.from({ length: count }, () => Math.floor(Math.random() * gigapixel.tileCount));
}

// ─── Benchmark suites ───────────────────────────────────────────────────────

function benchBuffers() {
  console.log('\n── Buffers ──');

  const tile = new Uint8Array(256 * 256 * 4).fill(7);

  bench('copyFrom 256 KiB tile', () => DataBuffer.copyFrom(tile), 5000);
  bench('wrapWeak 256 KiB tile', () => DataBuffer.wrapWeak(tile), 200000);
  bench('wrapWeak + strengthen', () => DataBuffer.wrapWeak(tile).strengthen(), 5000);
  bench('1,024 × 256-byte strong writes', () => {
    const buf = DataBuffer.createEmpty();
    for (let i = 0; i < 1024; i++) buf.write(256).fill(i & 0xff);
  }, 2000);
}

function benchAddressing() {
  console.log(`\n── Pyramid Addressing (${gigapixel.tileCount.toLocaleString('en-US')} tiles) ──`);

  const indices = randomIndices(1000);

  bench('1,000 decodeTileIndex', () => {
    for (const index of indices) gigapixel.decodeTileIndex(index);
  }, 5000);

  bench('1,000 coarserTile → layer 0', () => {
    for (const index of indices) gigapixel.coarserTile(index, 0);
  }, 5000);

  for (const layer of [2, 4]) {
    const rects = Array.from({ length: 100 }, () => randomViewport(layer));
    bench(`100 × 1080p viewports at layer ${layer}`, () => {
      for (const rect of rects) gigapixel.tilesOverlapping(layer, rect);
    }, 2000);
  }
}

function benchCache() {
  console.log('\n── Tile Cache (eviction pressure) ──');

  for (const capacity of [100, 1000]) {
    const coordinator = new LoadCoordinator();
    coordinator.setHighResolutionLayer(4);
    const cache = new TileCache({
      capacity,
      layerOf: index => gigapixel.layerOf(index),
      coordinator,
    });
    const indices = randomIndices(capacity * 4);
    const buffer = DataBuffer.copyFrom(new Uint8Array(16));

    bench(`${(capacity * 4).toLocaleString('en-US')} puts, capacity ${capacity}`, () => {
      for (const index of indices) cache.put(index, buffer);
    }, 20);

    bench(`${(capacity * 4).toLocaleString('en-US')} gets, capacity ${capacity}`, () => {
      for (const index of indices) cache.get(index);
    }, 200);
  }
}

function benchArchiveHeader() {
  console.log('\n── Archive Header ──');

  for (const downsamples of [[4, 1], [64, 16, 4, 1]]) {
    const extent = buildExtent(16_384, 16_384, downsamples);
    const bytes = writeSlideArchive({ extent, format: PixelFormat.R8G8B8 }, []);
    const { tileCount } = new Pyramid(extent);

    bench(`parse ${tileCount.toLocaleString('en-US')}-tile header`, () => parseArchiveHeader(bytes), 2000);
  }
}

// ─── Main ───────────────────────────────────────────────────────────────────

console.log('╔══════════════════════════════════════════════════════════════════════╗');
console.log('║  slide-tiles Performance Benchmarks                                ║');
console.log('╚══════════════════════════════════════════════════════════════════════╝');

benchBuffers();
benchAddressing();
benchCache();
benchArchiveHeader();

console.log('\nDone.');
