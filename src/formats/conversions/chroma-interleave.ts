/**
 * Planar sensor image packing
 *
 * Copies the three planes of a 4:2:0 sensor image into one tightly packed
 * buffer the compressor can consume. Row and pixel strides are honored on
 * every plane, so padded rows and interleaved chroma views are both handled.
 *
 * When the chroma pixel stride is 1 the U and V planes are already packed and
 * are copied as-is (I420). Otherwise the samples are walked at the given step
 * and re-packed as V/U pairs (NV21), the order the JPEG path expects; camera
 * stacks commonly expose the chroma planes the other way round.
 */

import type { RawFrame, RawPlane } from '../../types.js';
import type { PackedYuvLayout } from '../pixel-format/types.js';
import { getChromaSize, getRequiredPlaneLength } from '../pixel-format/helpers.js';
import { getPackedAllocationSize } from '../pixel-format/sizes.js';
import { encodingError } from '../../utils/errors.js';

/**
 * Packed 4:2:0 frame buffer descriptor
 */
export interface PackedYuvBuffer {
  data: Uint8Array;
  layout: PackedYuvLayout;
  width: number;
  height: number;
}

function assertPlane(plane: RawPlane | undefined, name: string, cols: number, rows: number): RawPlane {
  if (!plane) {
    throw encodingError(`Missing ${name} plane`);
  }
  if (plane.rowStride < 1 || plane.pixelStride < 1) {
    throw encodingError(`Invalid strides on ${name} plane: row=${plane.rowStride}, pixel=${plane.pixelStride}`);
  }
  const required = getRequiredPlaneLength(cols, rows, plane.rowStride, plane.pixelStride);
  if (plane.data.length < required) {
    throw encodingError(`${name} plane too short: ${plane.data.length} < ${required} bytes`);
  }
  return plane;
}

/**
 * Copy a strided plane into `dest` as tightly packed rows
 */
function copyPlane(plane: RawPlane, cols: number, rows: number, dest: Uint8Array, offset: number): number {
  const { data, rowStride, pixelStride } = plane;
  let out = offset;

  if (pixelStride === 1) {
    for (let row = 0; row < rows; row++) {
      const start = row * rowStride;
      dest.set(data.subarray(start, start + cols), out);
      out += cols;
    }
    return out;
  }

  for (let row = 0; row < rows; row++) {
    let src = row * rowStride;
    for (let col = 0; col < cols; col++) {
      dest[out++] = data[src];
      src += pixelStride;
    }
  }
  return out;
}

/**
 * Interleave U and V samples as V/U pairs
 */
function interleaveVu(u: RawPlane, v: RawPlane, cols: number, rows: number, dest: Uint8Array, offset: number): void {
  let out = offset;
  for (let row = 0; row < rows; row++) {
    let uIndex = row * u.rowStride;
    let vIndex = row * v.rowStride;
    for (let col = 0; col < cols; col++) {
      dest[out++] = v.data[vIndex];
      dest[out++] = u.data[uIndex];
      uIndex += u.pixelStride;
      vIndex += v.pixelStride;
    }
  }
}

/**
 * Choose the packed layout for a frame's chroma planes
 */
export function selectPackedLayout(frame: RawFrame): PackedYuvLayout {
  const u = frame.planes[1];
  const v = frame.planes[2];
  return u?.pixelStride === 1 && v?.pixelStride === 1 ? 'I420' : 'NV21';
}

/**
 * Pack a 4:2:0 planar frame into a newly allocated buffer.
 *
 * Reads the frame synchronously and keeps no reference into its planes, so
 * the caller may release the frame as soon as this returns.
 *
 * @throws StreamError (EncodingError) when planes are missing or too short
 */
export function packYuv420(frame: RawFrame): PackedYuvBuffer {
  const { width, height } = frame;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw encodingError(`Invalid frame dimensions: ${width}x${height}`);
  }

  const chroma = getChromaSize(width, height);
  const y = assertPlane(frame.planes[0], 'Y', width, height);
  const u = assertPlane(frame.planes[1], 'U', chroma.width, chroma.height);
  const v = assertPlane(frame.planes[2], 'V', chroma.width, chroma.height);

  const layout = selectPackedLayout(frame);
  const data = new Uint8Array(getPackedAllocationSize(layout, width, height));
  const ySize = copyPlane(y, width, height, data, 0);

  if (layout === 'I420') {
    const vOffset = copyPlane(u, chroma.width, chroma.height, data, ySize);
    copyPlane(v, chroma.width, chroma.height, data, vOffset);
  } else {
    interleaveVu(u, v, chroma.width, chroma.height, data, ySize);
  }

  return { data, layout, width, height };
}

/**
 * Average Y/U/V of a packed buffer, used for diagnostics and tests
 */
export function averageYuv(buffer: PackedYuvBuffer): { y: number; u: number; v: number } {
  const { data, layout, width, height } = buffer;
  const ySize = width * height;
  const chroma = getChromaSize(width, height);
  const chromaCount = chroma.width * chroma.height;

  let ySum = 0;
  for (let i = 0; i < ySize; i++) ySum += data[i];

  let uSum = 0;
  let vSum = 0;
  if (layout === 'I420') {
    for (let i = 0; i < chromaCount; i++) {
      uSum += data[ySize + i];
      vSum += data[ySize + chromaCount + i];
    }
  } else {
    for (let i = 0; i < chromaCount; i++) {
      vSum += data[ySize + 2 * i];
      uSum += data[ySize + 2 * i + 1];
    }
  }

  return { y: ySum / ySize, u: uSum / chromaCount, v: vSum / chromaCount };
}
