/**
 * Pixel format helper functions
 */

import type { RawPixelFormat } from './types.js';

/**
 * Check if a format carries an already-compressed still image
 */
export function isCompressedFormat(format: RawPixelFormat): boolean {
  return format === 'JPEG';
}

/**
 * Check if a format is a 4:2:0 YUV layout the planar path understands natively
 */
export function isYuv420Format(format: RawPixelFormat): boolean {
  return format === 'YUV_420_888' || format === 'NV21' || format === 'NV12';
}

/**
 * Chroma subsampled dimensions for 4:2:0 content
 */
export function getChromaSize(width: number, height: number): { width: number; height: number } {
  return { width: Math.ceil(width / 2), height: Math.ceil(height / 2) };
}

/**
 * Minimum number of bytes a plane buffer must hold to address
 * `rows` x `cols` samples with the given strides.
 */
export function getRequiredPlaneLength(
  cols: number,
  rows: number,
  rowStride: number,
  pixelStride: number
): number {
  if (cols === 0 || rows === 0) return 0;
  return (rows - 1) * rowStride + (cols - 1) * pixelStride + 1;
}
