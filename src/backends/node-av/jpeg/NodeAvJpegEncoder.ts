/**
 * NodeAvJpegEncoder - node-av based JPEG compressor
 *
 * Compresses packed 4:2:0 buffers (I420 or NV21) with the FFmpeg MJPEG
 * encoder at a fixed quantizer derived from a 0-100 quality factor. The
 * encoder and its full-range conversion filter are created on the first
 * frame and rebuilt whenever the frame geometry or layout changes.
 */

import { Encoder, FilterAPI } from 'node-av/api';
import { Frame } from 'node-av/lib';
import {
  AV_PIX_FMT_NV21,
  AV_PIX_FMT_YUV420P,
  AV_PIX_FMT_YUVJ420P,
  type AVPixelFormat,
  type FFEncoderCodec,
} from 'node-av/constants';

import type { PackedYuvBuffer } from '../../../formats/conversions/chroma-interleave.js';
import type { PackedYuvLayout } from '../../../formats/pixel-format/types.js';
import { createLogger } from '../../../utils/logger.js';
import { encodingError, wrapAsStreamError } from '../../../utils/errors.js';
import { FILTER_RECEIVE_ATTEMPTS, MAX_QSCALE, MIN_QSCALE, STILL_TIME_BASE } from './constants.js';

const logger = createLogger('NodeAvJpegEncoder');

const MJPEG_ENCODER = 'mjpeg' as FFEncoderCodec;

interface JpegEncoderOptions {
  type: 'video';
  width: number;
  height: number;
  pixelFormat: AVPixelFormat;
  timeBase: typeof STILL_TIME_BASE;
  frameRate: typeof STILL_TIME_BASE;
  gopSize: number;
  maxBFrames: number;
  options: Record<string, string | number>;
}

/**
 * Map a 0-100 quality factor onto the MJPEG quantizer range.
 * 100 gives the finest quantizer, 0 the coarsest.
 */
export function qualityToQscale(quality: number): number {
  const clamped = Math.min(100, Math.max(0, quality));
  return Math.round(MIN_QSCALE + ((100 - clamped) * (MAX_QSCALE - MIN_QSCALE)) / 100);
}

function layoutToPixelFormat(layout: PackedYuvLayout): AVPixelFormat {
  return layout === 'NV21' ? AV_PIX_FMT_NV21 : AV_PIX_FMT_YUV420P;
}

export class NodeAvJpegEncoder {
  private encoder: Encoder | null = null;
  private filter: FilterAPI | null = null;
  private geometryKey: string | null = null;
  private frameIndex = 0;
  private pending: Promise<unknown> = Promise.resolve();
  private closed = false;
  private readonly qscale: number;

  constructor(readonly quality: number) {
    this.qscale = qualityToQscale(quality);
  }

  /**
   * Compress one packed frame. Calls are serialized; the encoder is not reentrant.
   *
   * @throws StreamError (EncodingError) on any compressor failure
   */
  compress(image: PackedYuvBuffer): Promise<Uint8Array> {
    const run = this.pending.then(() => this.encodeImage(image));
    this.pending = run.catch(() => undefined);
    return run;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.cleanup();
  }

  private async encodeImage(image: PackedYuvBuffer): Promise<Uint8Array> {
    if (this.closed) {
      throw encodingError('Encoder is closed');
    }

    try {
      await this.ensureEncoder(image);
      const { encoder, filter } = this.requireInitialized();

      const input = Frame.fromVideoBuffer(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
        width: image.width,
        height: image.height,
        format: layoutToPixelFormat(image.layout),
        timeBase: STILL_TIME_BASE,
      });
      input.pts = BigInt(this.frameIndex);

      await filter.process(input);
      input.unref();

      let converted = await filter.receive();
      let attempts = 0;
      while (converted === null && attempts < FILTER_RECEIVE_ATTEMPTS) {
        converted = await filter.receive();
        attempts++;
      }
      if (!converted) {
        throw encodingError('Format conversion failed: no output from filter');
      }

      await encoder.encode(converted);
      converted.unref();

      const chunks: Buffer[] = [];
      let packet = await encoder.receive();
      while (packet) {
        if (packet.data) {
          chunks.push(Buffer.from(packet.data));
        }
        packet.unref();
        packet = await encoder.receive();
      }

      this.frameIndex++;
      if (chunks.length === 0) {
        throw encodingError('Encoder produced no packet');
      }
      return new Uint8Array(chunks.length === 1 ? chunks[0] : Buffer.concat(chunks));
    } catch (err) {
      // A failed native encoder may be left mid-frame; start fresh next time
      this.cleanup();
      throw wrapAsStreamError(err, 'EncodingError');
    }
  }

  private requireInitialized(): { encoder: Encoder; filter: FilterAPI } {
    if (!this.encoder || !this.filter) {
      throw encodingError('Encoder not initialized');
    }
    return { encoder: this.encoder, filter: this.filter };
  }

  private async ensureEncoder(image: PackedYuvBuffer): Promise<void> {
    const key = `${image.layout}:${image.width}x${image.height}`;
    if (this.encoder && this.geometryKey === key) {
      return;
    }

    this.cleanup();

    const options: JpegEncoderOptions = {
      type: 'video',
      width: image.width,
      height: image.height,
      pixelFormat: AV_PIX_FMT_YUVJ420P,
      timeBase: STILL_TIME_BASE,
      frameRate: STILL_TIME_BASE,
      gopSize: 1,
      maxBFrames: 0,
      // Pin the quantizer so every frame is coded at the configured quality
      options: { qmin: this.qscale, qmax: this.qscale },
    };

    // MJPEG wants full-range YUV; swscale rescales limited-range sensor data
    this.filter = FilterAPI.create('format=yuvj420p');
    this.encoder = await Encoder.create(MJPEG_ENCODER, options);
    this.geometryKey = key;
    logger.info(`Created MJPEG encoder ${image.width}x${image.height} (${image.layout}), qscale=${this.qscale}`);
  }

  private cleanup(): void {
    this.filter?.close();
    this.filter = null;
    this.encoder?.close();
    this.encoder = null;
    this.geometryKey = null;
  }
}
