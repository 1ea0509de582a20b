/**
 * Pixel format size calculations
 */

import type { PackedYuvLayout } from './types.js';
import { getChromaSize } from './helpers.js';

/**
 * Calculate total allocation size for a packed 4:2:0 buffer
 */
export function getPackedAllocationSize(layout: PackedYuvLayout, width: number, height: number): number {
  const chroma = getChromaSize(width, height);

  switch (layout) {
    case 'I420':
      return width * height + 2 * chroma.width * chroma.height;
    case 'NV21':
      // Interleaved pairs keep the same sample count as two separate planes
      return width * height + 2 * chroma.width * chroma.height;
  }
}

