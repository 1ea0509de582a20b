/**
 * Tests for planar 4:2:0 packing
 */

import { describe, it, expect } from '@jest/globals';
import { averageYuv, packYuv420, selectPackedLayout } from '../formats/conversions/chroma-interleave.js';
import { getChromaSize, getPackedAllocationSize, getRequiredPlaneLength } from '../formats/pixel-format/index.js';
import { StreamError } from '../utils/errors.js';
import { makeFrame } from './helpers/frames.js';

// 4x2 luma with two bytes of row padding
const LUMA = { data: Uint8Array.of(1, 2, 3, 4, 99, 99, 5, 6, 7, 8, 99, 99), rowStride: 6, pixelStride: 1 };

describe('packYuv420', () => {
  it('copies packed chroma planes as I420 and strips row padding', () => {
    const frame = makeFrame(
      [
        LUMA,
        { data: Uint8Array.of(10, 11), rowStride: 2, pixelStride: 1 },
        { data: Uint8Array.of(20, 21), rowStride: 2, pixelStride: 1 },
      ],
      4,
      2
    );

    const packed = packYuv420(frame);

    expect(packed.layout).toBe('I420');
    expect(Array.from(packed.data)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 10, 11, 20, 21]);
  });

  it('re-packs strided chroma as V/U pairs', () => {
    // V0 U0 V1 U1 in one buffer, exposed as two views with pixel stride 2
    const vu = Uint8Array.of(20, 10, 21, 11);
    const frame = makeFrame(
      [
        LUMA,
        { data: vu.subarray(1), rowStride: 4, pixelStride: 2 },
        { data: vu.subarray(0), rowStride: 4, pixelStride: 2 },
      ],
      4,
      2
    );

    const packed = packYuv420(frame);

    expect(packed.layout).toBe('NV21');
    expect(Array.from(packed.data.subarray(8))).toEqual([20, 10, 21, 11]);
  });

  it('writes V before U even when the source interleaves U first', () => {
    const uv = Uint8Array.of(10, 20, 11, 21);
    const frame = makeFrame(
      [
        LUMA,
        { data: uv.subarray(0), rowStride: 4, pixelStride: 2 },
        { data: uv.subarray(1), rowStride: 4, pixelStride: 2 },
      ],
      4,
      2
    );

    expect(Array.from(packYuv420(frame).data.subarray(8))).toEqual([20, 10, 21, 11]);
  });

  it('rounds chroma up for odd dimensions', () => {
    const frame = makeFrame(
      [
        { data: new Uint8Array(9).fill(50), rowStride: 3, pixelStride: 1 },
        { data: new Uint8Array(4).fill(60), rowStride: 2, pixelStride: 1 },
        { data: new Uint8Array(4).fill(70), rowStride: 2, pixelStride: 1 },
      ],
      3,
      3
    );

    const packed = packYuv420(frame);

    expect(packed.data.length).toBe(9 + 4 + 4);
    expect(averageYuv(packed)).toEqual({ y: 50, u: 60, v: 70 });
  });

  it('does not keep references into the source planes', () => {
    const y = new Uint8Array(8).fill(5);
    const frame = makeFrame(
      [
        { data: y, rowStride: 4, pixelStride: 1 },
        { data: Uint8Array.of(1, 1), rowStride: 2, pixelStride: 1 },
        { data: Uint8Array.of(2, 2), rowStride: 2, pixelStride: 1 },
      ],
      4,
      2
    );

    const packed = packYuv420(frame);
    y.fill(0);

    expect(packed.data[0]).toBe(5);
  });

  it('rejects a frame with a missing chroma plane', () => {
    const frame = makeFrame([LUMA], 4, 2);

    expect(() => packYuv420(frame)).toThrow(StreamError);
    expect(() => packYuv420(frame)).toThrow('Missing U plane');
  });

  it('rejects a plane shorter than its strides require', () => {
    const frame = makeFrame(
      [
        LUMA,
        { data: Uint8Array.of(10, 11), rowStride: 2, pixelStride: 1 },
        { data: Uint8Array.of(20), rowStride: 2, pixelStride: 1 },
      ],
      4,
      2
    );

    expect(() => packYuv420(frame)).toThrow('V plane too short: 1 < 2 bytes');
  });

  it('rejects non-positive dimensions', () => {
    const frame = makeFrame([LUMA], 0, 2);

    try {
      packYuv420(frame);
      throw new Error('expected packYuv420 to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(StreamError);
      expect(err instanceof StreamError && err.name).toBe('EncodingError');
    }
  });
});

describe('selectPackedLayout', () => {
  it('picks NV21 when either chroma plane is strided', () => {
    const frame = makeFrame(
      [
        LUMA,
        { data: new Uint8Array(4), rowStride: 4, pixelStride: 2 },
        { data: new Uint8Array(2), rowStride: 2, pixelStride: 1 },
      ],
      4,
      2
    );

    expect(selectPackedLayout(frame)).toBe('NV21');
  });
});

describe('pixel-format helpers', () => {
  it('computes sizes for 4:2:0 layouts', () => {
    expect(getChromaSize(5, 3)).toEqual({ width: 3, height: 2 });
    expect(getPackedAllocationSize('I420', 4, 2)).toBe(12);
    expect(getPackedAllocationSize('NV21', 640, 480)).toBe(460_800);
    expect(getRequiredPlaneLength(2, 2, 8, 2)).toBe(11);
    expect(getRequiredPlaneLength(0, 2, 8, 2)).toBe(0);
  });
});
