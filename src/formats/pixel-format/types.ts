/**
 * Pixel format type definitions
 */

/**
 * Formats a capture source can report.
 * - YUV_420_888: three planes (Y, U, V) with per-plane row and pixel strides
 * - JPEG: already-compressed still image in plane 0
 * - NV21 / NV12: two-plane semi-planar 4:2:0 reported as three plane views
 * - RGBA_8888: packed RGBA, not supported by the planar path
 */
export type RawPixelFormat = 'YUV_420_888' | 'JPEG' | 'NV21' | 'NV12' | 'RGBA_8888';

/**
 * Layout of a packed 4:2:0 buffer handed to the compressor.
 * - I420: Y plane, U plane, V plane
 * - NV21: Y plane, interleaved V/U pairs
 */
export type PackedYuvLayout = 'I420' | 'NV21';

