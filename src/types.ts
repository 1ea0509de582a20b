/**
 * Core data model shared by the sender and receiver sides of the pipeline
 */

import type { StreamError } from './utils/errors.js';
import type { RawPixelFormat } from './formats/pixel-format/types.js';

export type { RawPixelFormat };

/**
 * One plane of a sensor image.
 *
 * `rowStride` is the distance in bytes between the starts of two rows and
 * `pixelStride` the distance between two samples of the same row. Chroma
 * planes reported by camera stacks often have a pixel stride of 2 because
 * U and V are views into one interleaved buffer.
 */
export interface RawPlane {
  data: Uint8Array;
  rowStride: number;
  pixelStride: number;
}

/**
 * A frame as delivered by the capture source.
 *
 * The pipeline owns the frame for the duration of one encode call and must
 * call `close()` exactly once afterwards so the source can reuse the buffer.
 * For `JPEG` frames plane 0 holds the compressed bytes.
 */
export interface RawFrame {
  readonly format: RawPixelFormat;
  readonly width: number;
  readonly height: number;
  readonly planes: readonly RawPlane[];
  /** Capture time in milliseconds since the epoch */
  readonly timestamp: number;
  close(): void;
}

/**
 * Compressed payload ready for transport. Lives for one transport call.
 */
export interface EncodedFrame {
  data: Uint8Array;
  byteLength: number;
  /** Capture time in milliseconds since the epoch */
  timestamp: number;
  /** Monotonic per session, assigned when the frame enters the encoder */
  sequence: number;
}

export type EncodeResult =
  | { ok: true; frame: EncodedFrame }
  | { ok: false; error: StreamError };

export type SessionState = 'idle' | 'probing' | 'streaming' | 'stopping';

/**
 * Outcome of one push. `status` is null when no HTTP response was received.
 */
export interface TransportResult {
  ok: boolean;
  status: number | null;
  error: StreamError | null;
  durationMs: number;
}

export interface SessionStats {
  state: SessionState;
  sentFrames: number;
  droppedBusy: number;
  skippedOversize: number;
  encodeFailures: number;
  rejectedFrames: number;
  consecutiveFailures: number;
  lastStatus: number | null;
  lastError: string | null;
}

/**
 * A decoded image as held by the receiver's current-frame slot. RGBA, 8 bits
 * per channel, tightly packed.
 */
export interface DecodedFrame {
  readonly data: Uint8Array;
  readonly width: number;
  readonly height: number;
  /** Capture timestamp reported by the sender */
  readonly timestamp: number;
  /** Cumulative frame number at the time this frame was stored */
  readonly frameNumber: number;
  /** Receiver-local arrival time */
  readonly receivedAt: number;
}

export interface IngestAck {
  status: 'success' | 'discarded';
  frameCount: number;
  timestamp: number;
}

export interface ReceiverStats {
  frameCount: number;
  decodeFailures: number;
  elapsedSeconds: number;
  fps: number;
  isReceiving: boolean;
  lastFrameAt: number | null;
  lastPingAt: number | null;
  connectionCount: number;
  latestFrame: { width: number; height: number } | null;
}
