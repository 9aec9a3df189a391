import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { Worker } from 'node:worker_threads';
import { HighResolutionMarker, LoadCoordinator, TileNotifier } from '../src/coordinator.js';
import { rejection } from './helpers/assert.js';

describe('HighResolutionMarker', () => {
  it('should start at the initial layer', () => {
    expect(new HighResolutionMarker().get()).toBe(0);
    expect(new HighResolutionMarker(3).get()).toBe(3);
  });

  it('should share state through its buffer', () => {
    const marker = new HighResolutionMarker(2);
    const view = new HighResolutionMarker(undefined, marker.buffer);
    expect(view.get()).toBe(2);

    view.set(5);
    expect(marker.get()).toBe(5);
  });

  it('should not reset an attached buffer to the initial value', () => {
    const marker = new HighResolutionMarker(4);
    new HighResolutionMarker(0, marker.buffer);
    expect(marker.get()).toBe(4);
  });

  it('should reject invalid layers', () => {
    const marker = new HighResolutionMarker();
    expect(() => marker.set(-1)).toThrow(RangeError);
    expect(() => marker.set(1.5)).toThrow(RangeError);
    expect(marker.get()).toBe(0);
  });

  it('should observe a store made by a worker thread', async () => {
    const marker = new HighResolutionMarker(1);
    const source = `
      const { parentPort, workerData } = require('node:worker_threads');
      Atomics.store(new Int32Array(workerData), 0, 3);
      parentPort.postMessage('stored');
    `;
    const worker = new Worker(source, { eval: true, workerData: marker.buffer });
    try {
      const message = await new Promise<unknown>((resolve, reject) => {
        worker.once('message', resolve);
        worker.once('error', reject);
      });
      expect(message).toBe('stored');
      expect(marker.get()).toBe(3);
    } finally {
      await worker.terminate();
    }
  });
});

describe('TileNotifier', () => {
  it('should resolve a wait with true on notify', async () => {
    const notifier = new TileNotifier();
    const waiting = notifier.wait(1000);
    notifier.notify();
    await expect(waiting).resolves.toBe(true);
  });

  it('should resolve with false when the timeout elapses', async () => {
    const notifier = new TileNotifier();
    await expect(notifier.wait(10)).resolves.toBe(false);
    expect(notifier.waiting).toBe(0);
  });

  it('should wake every pending waiter with one notify', async () => {
    const notifier = new TileNotifier();
    const waits = [notifier.wait(1000), notifier.wait(1000), notifier.wait(1000)];
    expect(notifier.waiting).toBe(3);

    notifier.notify();
    await expect(Promise.all(waits)).resolves.toEqual([true, true, true]);
    expect(notifier.waiting).toBe(0);
  });

  it('should not wake waits that start after the notify', async () => {
    const notifier = new TileNotifier();
    notifier.notify();
    await expect(notifier.wait(10)).resolves.toBe(false);
  });

  it('should count notifications', () => {
    const notifier = new TileNotifier();
    notifier.notify();
    notifier.notify();
    expect(notifier.notifications).toBe(2);
  });

  it('should reject with the abort reason', async () => {
    const notifier = new TileNotifier();
    const controller = new AbortController();
    const waiting = notifier.wait(1000, controller.signal);
    const reason = new Error('viewer closed');
    controller.abort(reason);

    await expect(waiting).rejects.toBe(reason);
    expect(notifier.waiting).toBe(0);
  });

  it('should reject with an AbortError for a non-error reason', async () => {
    const notifier = new TileNotifier();
    const controller = new AbortController();
    const waiting = notifier.wait(1000, controller.signal);
    controller.abort('stop');

    const err = await rejection(waiting);
    expect(err).toBeInstanceOf(Error);
    expect(err).toMatchObject({ name: 'AbortError' });
  });

  it('should reject immediately for an already aborted signal', async () => {
    const notifier = new TileNotifier();
    const reason = new Error('gone');
    await expect(notifier.wait(1000, AbortSignal.abort(reason))).rejects.toBe(reason);
    expect(notifier.waiting).toBe(0);
  });

  it('should ignore an abort after the wait resolved', async () => {
    const notifier = new TileNotifier();
    const controller = new AbortController();
    const waiting = notifier.wait(1000, controller.signal);
    notifier.notify();
    controller.abort(new Error('late'));
    await expect(waiting).resolves.toBe(true);
  });

  // ─── Long timeouts ──────────────────────────────────────────────────

  it('should keep an unbounded wait pending until notified', async () => {
    const notifier = new TileNotifier();
    const waiting = notifier.wait(Infinity);
    await sleep(20);
    expect(notifier.waiting).toBe(1);

    notifier.notify();
    await expect(waiting).resolves.toBe(true);
  });

  it('should cap a timeout beyond the timer range instead of firing at once', async () => {
    const notifier = new TileNotifier();
    const waiting = notifier.wait(2 ** 31);
    await sleep(20);
    expect(notifier.waiting).toBe(1);

    notifier.notify();
    await expect(waiting).resolves.toBe(true);
  });

  it('should release an unbounded wait on abort', async () => {
    const notifier = new TileNotifier();
    const controller = new AbortController();
    const reason = new Error('closed');
    const waiting = notifier.wait(Infinity, controller.signal);
    controller.abort(reason);

    await expect(waiting).rejects.toBe(reason);
    expect(notifier.waiting).toBe(0);
  });

  it('should reject a NaN timeout with RangeError', async () => {
    const notifier = new TileNotifier();
    await expect(notifier.wait(Number.NaN)).rejects.toBeInstanceOf(RangeError);
    expect(notifier.waiting).toBe(0);
  });
});

describe('LoadCoordinator', () => {
  it('should treat the high-resolution layer and the one below as relevant', () => {
    const coordinator = new LoadCoordinator();
    coordinator.setHighResolutionLayer(2);

    expect(coordinator.highResolutionLayer).toBe(2);
    expect(coordinator.isStale(2)).toBe(false);
    expect(coordinator.isStale(1)).toBe(false);
    expect(coordinator.isStale(0)).toBe(true);
    expect(coordinator.isStale(3)).toBe(true);
    expect(coordinator.isRelevant(1)).toBe(true);
  });

  it('should start with layer 0 as the high-resolution layer', () => {
    const coordinator = new LoadCoordinator();
    expect(coordinator.highResolutionLayer).toBe(0);
    expect(coordinator.isStale(0)).toBe(false);
    expect(coordinator.isStale(1)).toBe(true);
  });

  it('should apply a new layer to the very next check', () => {
    const coordinator = new LoadCoordinator();
    coordinator.setHighResolutionLayer(4);
    expect(coordinator.isStale(3)).toBe(false);
    coordinator.setHighResolutionLayer(1);
    expect(coordinator.isStale(3)).toBe(true);
  });

  it('should read an externally owned marker', () => {
    const marker = new HighResolutionMarker(1);
    const first = new LoadCoordinator({ marker });
    const second = new LoadCoordinator({ marker });

    first.setHighResolutionLayer(3);
    expect(second.highResolutionLayer).toBe(3);
    marker.set(0);
    expect(first.highResolutionLayer).toBe(0);
  });

  it('should raise an externally owned notifier', async () => {
    const notifier = new TileNotifier();
    const coordinator = new LoadCoordinator({ notifier });
    const waiting = notifier.wait(1000);
    coordinator.notifyUpdate();
    await expect(waiting).resolves.toBe(true);
  });

  it('should wake waitForUpdate on notifyUpdate', async () => {
    const coordinator = new LoadCoordinator();
    const waiting = coordinator.waitForUpdate(1000);
    setTimeout(() => coordinator.notifyUpdate(), 5);
    await expect(waiting).resolves.toBe(true);
  });

  it('should time out waitForUpdate without an update', async () => {
    const coordinator = new LoadCoordinator();
    await expect(coordinator.waitForUpdate(10)).resolves.toBe(false);
  });

  it('should not time out waitForUpdate for a timeout of 2^31 ms', async () => {
    const coordinator = new LoadCoordinator();
    const waiting = coordinator.waitForUpdate(2 ** 31);
    setTimeout(() => coordinator.notifyUpdate(), 20);
    await expect(waiting).resolves.toBe(true);
  });

  it('should stop relaying after detach', () => {
    const notifier = new TileNotifier();
    const coordinator = new LoadCoordinator({ notifier });
    coordinator.detach();
    coordinator.notifyUpdate();

    expect(coordinator.isAttached).toBe(false);
    expect(notifier.notifications).toBe(0);
  });
});
