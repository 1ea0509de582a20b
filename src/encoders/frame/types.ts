/**
 * FrameEncoder types
 */

import type { PackedYuvBuffer } from '../../formats/conversions/chroma-interleave.js';

/**
 * Lossy still-image compressor used for planar input
 */
export interface StillImageCompressor {
  compress(image: PackedYuvBuffer): Promise<Uint8Array>;
  close(): void;
}

export interface FrameEncoderInit {
  /** JPEG quality factor, 0-100 */
  quality?: number;
  /** Frames whose compressed size exceeds this are skipped, never truncated */
  maxFrameBytes?: number;
  encodeTimeoutMs?: number;
  /** Defaults to the node-av MJPEG compressor at `quality` */
  compressor?: StillImageCompressor;
}
