/**
 * FrameEncoder - Converts capture frames into compressed JPEG payloads
 *
 * Planar 4:2:0 input is packed and compressed at a fixed quality factor.
 * Input that is already JPEG passes through untouched. Every result is
 * checked against the frame-size ceiling before it is handed on.
 */

import type { EncodeResult, RawFrame } from '../types.js';
import { packYuv420 } from '../formats/conversions/chroma-interleave.js';
import { isCompressedFormat, isYuv420Format } from '../formats/pixel-format/helpers.js';
import { NodeAvJpegEncoder } from '../backends/node-av/jpeg/NodeAvJpegEncoder.js';
import { createLogger } from '../utils/logger.js';
import { encodingError, quotaExceededError, wrapAsStreamError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { DEFAULT_ENCODE_TIMEOUT, DEFAULT_MAX_FRAME_BYTES, DEFAULT_QUALITY } from './frame/constants.js';
import type { FrameEncoderInit, StillImageCompressor } from './frame/types.js';

export type { FrameEncoderInit, StillImageCompressor } from './frame/types.js';

const logger = createLogger('FrameEncoder');

export class FrameEncoder {
  readonly quality: number;
  readonly maxFrameBytes: number;
  private readonly _encodeTimeoutMs: number;
  private readonly _compressor: StillImageCompressor;
  private readonly _warnedFormats = new Set<string>();
  private _closed = false;

  constructor(init: FrameEncoderInit = {}) {
    const quality = init.quality ?? DEFAULT_QUALITY;
    if (!Number.isInteger(quality) || quality < 0 || quality > 100) {
      throw new TypeError(`quality must be an integer in [0, 100], got ${quality}`);
    }
    const maxFrameBytes = init.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    if (!Number.isInteger(maxFrameBytes) || maxFrameBytes <= 0) {
      throw new TypeError(`maxFrameBytes must be a positive integer, got ${maxFrameBytes}`);
    }

    this.quality = quality;
    this.maxFrameBytes = maxFrameBytes;
    this._encodeTimeoutMs = init.encodeTimeoutMs ?? DEFAULT_ENCODE_TIMEOUT;
    this._compressor = init.compressor ?? new NodeAvJpegEncoder(quality);
  }

  /**
   * Encode one frame.
   *
   * Never rejects: failures come back as `{ ok: false }` with an
   * EncodingError or, for oversize payloads, a QuotaExceededError. The frame
   * is not referenced after the returned promise settles.
   */
  async encode(raw: RawFrame, sequence = 0): Promise<EncodeResult> {
    try {
      if (this._closed) {
        throw encodingError('FrameEncoder is closed');
      }

      const data = isCompressedFormat(raw.format)
        ? this.passThrough(raw)
        : await this.compressPlanar(raw);

      if (data.byteLength > this.maxFrameBytes) {
        logger.debug(`Skipping frame #${sequence}: ${data.byteLength} bytes exceeds ceiling of ${this.maxFrameBytes}`);
        return {
          ok: false,
          error: quotaExceededError(`Encoded frame is ${data.byteLength} bytes, limit is ${this.maxFrameBytes}`),
        };
      }

      return {
        ok: true,
        frame: { data, byteLength: data.byteLength, timestamp: raw.timestamp, sequence },
      };
    } catch (err) {
      const error = wrapAsStreamError(err, 'EncodingError');
      logger.debug(`Encode failed for frame #${sequence}: ${error.message}`);
      return { ok: false, error };
    }
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this._compressor.close();
  }

  private passThrough(raw: RawFrame): Uint8Array {
    const plane = raw.planes[0];
    if (!plane || plane.data.byteLength === 0) {
      throw encodingError('JPEG frame has no data');
    }
    // Copy out: the source may recycle the buffer once the frame is released
    return plane.data.slice();
  }

  private async compressPlanar(raw: RawFrame): Promise<Uint8Array> {
    if (!isYuv420Format(raw.format) && !this._warnedFormats.has(raw.format)) {
      this._warnedFormats.add(raw.format);
      logger.warn(`Unsupported pixel format ${raw.format}, falling back to planar conversion`);
    }

    const packed = packYuv420(raw);
    return withTimeout(this._compressor.compress(packed), this._encodeTimeoutMs, 'JPEG compression');
  }
}
