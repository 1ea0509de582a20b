/**
 * Tests for FrameReceiver ingest, current-frame slot and diagnostics
 */

import { describe, it, expect, jest, beforeAll, afterAll } from '@jest/globals';
import { FrameReceiver } from '../receiver/FrameReceiver.js';
import { CurrentFrameSlot } from '../receiver/current-frame-slot.js';
import type { DecodedImage } from '../backends/node-av/jpeg/NodeAvJpegDecoder.js';
import type { DecodedFrame } from '../types.js';
import { dataError } from '../utils/errors.js';
import { setSilent } from '../utils/logger.js';
import { deferred } from './helpers/frames.js';

const PAYLOAD = Uint8Array.of(0xff, 0xd8, 0, 0xff, 0xd9);

function image(width = 4, height = 2): DecodedImage {
  return { data: new Uint8Array(width * height * 4), width, height };
}

function setup() {
  let clock = 10_000;
  const decoder = { decode: jest.fn(async (_data: Uint8Array): Promise<DecodedImage> => image()) };
  const receiver = new FrameReceiver({ decoder, now: () => clock });
  return {
    decoder,
    receiver,
    advance: (ms: number) => {
      clock += ms;
    },
    now: () => clock,
  };
}

describe('FrameReceiver', () => {
  beforeAll(() => setSilent(true));
  afterAll(() => setSilent(false));

  it('answers pings and records the time', () => {
    const { receiver, advance } = setup();
    advance(500);

    expect(receiver.ping()).toEqual({ status: 'ok', message: 'receiver is running' });
    expect(receiver.stats().lastPingAt).toBe(10_500);
  });

  it('stores a decoded frame and acknowledges it', async () => {
    const { receiver } = setup();
    const seen: DecodedFrame[] = [];
    receiver.on('frame', (frame: DecodedFrame) => seen.push(frame));

    const ack = await receiver.ingest(PAYLOAD, 1234);

    expect(ack).toEqual({ status: 'success', frameCount: 1, timestamp: 1234 });
    const current = receiver.currentFrame();
    expect(current).toMatchObject({ width: 4, height: 2, timestamp: 1234, frameNumber: 1, receivedAt: 10_000 });
    expect(seen).toEqual([current]);
  });

  it('falls back to receipt time when the timestamp is missing or not a number', async () => {
    const { receiver } = setup();

    await expect(receiver.ingest(PAYLOAD)).resolves.toMatchObject({ timestamp: 10_000 });
    await expect(receiver.ingest(PAYLOAD, Number.NaN)).resolves.toMatchObject({ timestamp: 10_000 });
  });

  it('acknowledges a corrupt payload, counts it and keeps the current frame', async () => {
    const { receiver, decoder } = setup();
    await receiver.ingest(PAYLOAD, 1);
    const before = receiver.currentFrame();
    decoder.decode.mockRejectedValueOnce(dataError('Payload is not a complete JPEG (3 bytes)'));

    const ack = await receiver.ingest(Uint8Array.of(1, 2, 3), 2);

    expect(ack).toEqual({ status: 'discarded', frameCount: 1, timestamp: 2 });
    expect(receiver.currentFrame()).toBe(before);
    expect(receiver.stats()).toMatchObject({ frameCount: 1, decodeFailures: 1 });
  });

  it('rejects a truncated JPEG with the default decoder', async () => {
    const receiver = new FrameReceiver({ now: () => 0 });

    const ack = await receiver.ingest(Uint8Array.of(0xff, 0xd8, 0xff, 0xe0, 0, 0), 5);

    expect(ack).toEqual({ status: 'discarded', frameCount: 0, timestamp: 5 });
    expect(receiver.stats().decodeFailures).toBe(1);
    expect(receiver.currentFrame()).toBeNull();
  });

  it('increases the frame counter by one per successful ingest', async () => {
    const { receiver, decoder } = setup();
    decoder.decode.mockRejectedValueOnce(dataError('bad'));
    const counts: number[] = [];

    for (let i = 0; i < 5; i++) {
      const ack = await receiver.ingest(PAYLOAD, i);
      counts.push(ack.frameCount);
    }

    expect(counts).toEqual([0, 1, 2, 3, 4]);
  });

  it('keeps the newest arrival when decodes finish out of order', async () => {
    const { receiver, decoder } = setup();
    const slow = deferred<DecodedImage>();
    const fast = deferred<DecodedImage>();
    decoder.decode.mockImplementationOnce(() => slow.promise).mockImplementationOnce(() => fast.promise);

    const older = receiver.ingest(PAYLOAD, 100);
    const newer = receiver.ingest(PAYLOAD, 200);
    fast.resolve(image(8, 8));
    await newer;
    expect(receiver.frameVersion).toBe(1);
    slow.resolve(image(2, 2));
    await older;

    expect(receiver.frameVersion).toBe(1);
    expect(receiver.currentFrame()).toMatchObject({ timestamp: 200, width: 8 });
    expect(receiver.stats()).toMatchObject({ frameCount: 2, latestFrame: { width: 8, height: 8 } });
  });

  it('records the arrival time of a decode that a newer frame superseded', async () => {
    const { receiver, decoder, advance } = setup();
    const slow = deferred<DecodedImage>();
    decoder.decode.mockImplementationOnce(() => slow.promise);

    const older = receiver.ingest(PAYLOAD, 100);
    await receiver.ingest(PAYLOAD, 200);
    receiver.reset();
    advance(100);
    slow.resolve(image());
    await expect(older).resolves.toEqual({ status: 'success', frameCount: 1, timestamp: 100 });

    expect(receiver.currentFrame()).toBeNull();
    expect(receiver.stats()).toMatchObject({ frameCount: 1, lastFrameAt: 10_000, isReceiving: true });
  });

  it('bumps the frame version on every replacement and resets it with the slot', async () => {
    const { receiver } = setup();
    expect(receiver.frameVersion).toBe(0);

    await receiver.ingest(PAYLOAD, 1);
    await receiver.ingest(PAYLOAD, 2);
    expect(receiver.frameVersion).toBe(2);

    receiver.reset();
    expect(receiver.frameVersion).toBe(0);
  });

  it('counts a new connection after an idle gap', async () => {
    const { receiver, advance } = setup();

    await receiver.ingest(PAYLOAD, 1);
    advance(1_000);
    await receiver.ingest(PAYLOAD, 2);
    advance(5_000);
    await receiver.ingest(PAYLOAD, 3);

    expect(receiver.stats().connectionCount).toBe(2);
  });

  it('reports throughput and receiving state', async () => {
    const { receiver, advance } = setup();
    await receiver.ingest(PAYLOAD, 1);
    await receiver.ingest(PAYLOAD, 2);
    advance(2_000);

    expect(receiver.stats()).toEqual({
      frameCount: 2,
      decodeFailures: 0,
      elapsedSeconds: 2,
      fps: 1,
      isReceiving: true,
      lastFrameAt: 10_000,
      lastPingAt: null,
      connectionCount: 1,
      latestFrame: { width: 4, height: 2 },
    });

    advance(3_001);
    expect(receiver.stats().isReceiving).toBe(false);
  });

  it('clears everything on reset', async () => {
    const { receiver } = setup();
    await receiver.ingest(PAYLOAD, 1);
    receiver.ping();

    receiver.reset();

    expect(receiver.currentFrame()).toBeNull();
    expect(receiver.stats()).toMatchObject({ frameCount: 0, connectionCount: 0, lastFrameAt: null, lastPingAt: null });
  });
});

describe('CurrentFrameSlot', () => {
  it('only accepts newer arrivals', () => {
    const slot = new CurrentFrameSlot<string>();

    expect(slot.swapIfNewer('b', 2)).toBe(true);
    expect(slot.swapIfNewer('a', 1)).toBe(false);
    expect(slot.read()).toBe('b');
    expect(slot.version).toBe(1);
  });

  it('does not let an arrival from before a clear repopulate it', () => {
    const slot = new CurrentFrameSlot<string>();
    slot.swapIfNewer('a', 3);

    slot.clear();

    expect(slot.swapIfNewer('stale', 2)).toBe(false);
    expect(slot.read()).toBeNull();
    expect(slot.swapIfNewer('fresh', 4)).toBe(true);
  });
});
