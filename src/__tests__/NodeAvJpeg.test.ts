/**
 * Tests for the node-av JPEG encoder and decoder
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { NodeAvJpegEncoder, qualityToQscale } from '../backends/node-av/jpeg/NodeAvJpegEncoder.js';
import { NodeAvJpegDecoder, hasJpegMarkers } from '../backends/node-av/jpeg/NodeAvJpegDecoder.js';
import { packYuv420 } from '../formats/conversions/chroma-interleave.js';
import { SyntheticCaptureSource, YUV_COLORS, type YuvColor } from '../capture/SyntheticCaptureSource.js';
import { FrameReceiver } from '../receiver/FrameReceiver.js';
import { setSilent } from '../utils/logger.js';
import { StreamError } from '../utils/errors.js';
import { averageRgba, captureFrame } from './helpers/frames.js';

type Channel = 'r' | 'g' | 'b';

const CHANNELS: Channel[] = ['r', 'g', 'b'];

function packedFrame(color: YuvColor, width: number, height: number, chromaPixelStride: 1 | 2 = 2) {
  const source = new SyntheticCaptureSource({ width, height, color, chromaPixelStride, poolSize: 1 });
  const frame = captureFrame(source);
  const packed = packYuv420(frame);
  frame.close();
  return packed;
}

describe('qualityToQscale', () => {
  it('maps quality onto the MJPEG quantizer range', () => {
    expect(qualityToQscale(100)).toBe(2);
    expect(qualityToQscale(80)).toBe(8);
    expect(qualityToQscale(0)).toBe(31);
    expect(qualityToQscale(-5)).toBe(31);
    expect(qualityToQscale(150)).toBe(2);
  });
});

describe('hasJpegMarkers', () => {
  it('requires SOI at the start and EOI near the end', () => {
    expect(hasJpegMarkers(Uint8Array.of(0xff, 0xd8, 0x00, 0xff, 0xd9))).toBe(true);
    expect(hasJpegMarkers(Uint8Array.of(0xff, 0xd8, 0xff, 0xd9, 0x00, 0x00))).toBe(true);
    expect(hasJpegMarkers(Uint8Array.of(0xff, 0xd8, 0x00, 0x00, 0x00))).toBe(false);
    expect(hasJpegMarkers(Uint8Array.of(0x89, 0x50, 0xff, 0xd9))).toBe(false);
    expect(hasJpegMarkers(Uint8Array.of(0xff, 0xd8))).toBe(false);
  });
});

describe('node-av JPEG codec', () => {
  const decoder = new NodeAvJpegDecoder();
  let encoder: NodeAvJpegEncoder;

  beforeAll(() => {
    setSilent(true);
    encoder = new NodeAvJpegEncoder(80);
  });

  afterAll(() => {
    encoder.close();
    setSilent(false);
  });

  const solidColors: [string, YuvColor, Channel][] = [
    ['red', YUV_COLORS.red, 'r'],
    ['green', YUV_COLORS.green, 'g'],
    ['blue', YUV_COLORS.blue, 'b'],
  ];

  it.each(solidColors)('round-trips solid %s', async (_name, color, dominant) => {
    const jpeg = await encoder.compress(packedFrame(color, 32, 32));
    const image = await decoder.decode(jpeg);

    expect(hasJpegMarkers(jpeg)).toBe(true);
    expect(image.data.length).toBe(32 * 32 * 4);
    const avg = averageRgba(image.data);
    const others = CHANNELS.filter((c) => c !== dominant);
    for (const other of others) {
      expect(avg[dominant]).toBeGreaterThan(avg[other] + 80);
    }
  });

  it('rebuilds the encoder when the frame geometry or layout changes', async () => {
    const small = await encoder.compress(packedFrame(YUV_COLORS.gray, 16, 16, 1));
    const large = await encoder.compress(packedFrame(YUV_COLORS.gray, 48, 32, 2));

    await expect(decoder.decode(small)).resolves.toMatchObject({ width: 16, height: 16 });
    await expect(decoder.decode(large)).resolves.toMatchObject({ width: 48, height: 32 });
  });

  it('serializes concurrent compress calls', async () => {
    const results = await Promise.all([
      encoder.compress(packedFrame(YUV_COLORS.red, 16, 16)),
      encoder.compress(packedFrame(YUV_COLORS.blue, 16, 16)),
    ]);

    for (const jpeg of results) {
      expect(hasJpegMarkers(jpeg)).toBe(true);
    }
  });

  it('rejects a truncated JPEG with a DataError', async () => {
    const jpeg = await encoder.compress(packedFrame(YUV_COLORS.green, 32, 32));
    const truncated = jpeg.subarray(0, Math.floor(jpeg.length / 2));

    await expect(decoder.decode(truncated)).rejects.toThrow(StreamError);
    await expect(decoder.decode(truncated)).rejects.toMatchObject({ name: 'DataError' });
  });

  it('lets the receiver display a frame produced by the encoder', async () => {
    const receiver = new FrameReceiver({ decoder });
    const jpeg = await encoder.compress(packedFrame(YUV_COLORS.red, 32, 16));

    const ack = await receiver.ingest(jpeg, 99);

    expect(ack).toEqual({ status: 'success', frameCount: 1, timestamp: 99 });
    expect(receiver.currentFrame()).toMatchObject({ width: 32, height: 16, timestamp: 99 });
  });

  it('refuses to compress after close', async () => {
    const closed = new NodeAvJpegEncoder(50);
    closed.close();

    await expect(closed.compress(packedFrame(YUV_COLORS.gray, 16, 16))).rejects.toMatchObject({
      name: 'EncodingError',
      message: 'Encoder is closed',
    });
  });
});
