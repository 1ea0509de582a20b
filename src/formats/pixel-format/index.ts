/**
 * Pixel format module
 *
 * Provides sensor pixel format types and layout utilities.
 */

// Types
export type { RawPixelFormat, PackedYuvLayout } from './types.js';

// Size calculations
export { getPackedAllocationSize } from './sizes.js';

// Helper functions
export {
  isCompressedFormat,
  isYuv420Format,
  getChromaSize,
  getRequiredPlaneLength,
} from './helpers.js';
