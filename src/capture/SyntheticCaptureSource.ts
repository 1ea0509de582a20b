/**
 * SyntheticCaptureSource - stand-in camera producing YUV_420_888 frames
 *
 * Frames are drawn from a fixed pool of plane buffers, as a camera HAL
 * does. A frame that is never closed keeps its buffer out of the pool;
 * `outstanding()` reports how many are out, and once the pool is empty new
 * captures are skipped (`starved`).
 */

import { EventEmitter } from 'events';

import type { RawFrame, RawPlane } from '../types.js';
import { getChromaSize } from '../formats/pixel-format/helpers.js';
import { createLogger } from '../utils/logger.js';
import { invalidStateError } from '../utils/errors.js';

const logger = createLogger('SyntheticCapture');

export interface YuvColor {
  y: number;
  u: number;
  v: number;
}

/** Limited-range BT.601 primaries */
export const YUV_COLORS = {
  red: { y: 81, u: 90, v: 240 },
  green: { y: 145, u: 54, v: 34 },
  blue: { y: 41, u: 240, v: 110 },
  gray: { y: 128, u: 128, v: 128 },
} as const satisfies Record<string, YuvColor>;

export interface SyntheticCaptureOptions {
  width?: number;
  height?: number;
  /** Number of frame buffers the source owns (default: 3) */
  poolSize?: number;
  color?: YuvColor;
  /** 'gradient' ramps luma left to right */
  pattern?: 'solid' | 'gradient';
  /**
   * 2 reports U and V as views into one interleaved V/U buffer, the usual
   * camera layout; 1 reports separate packed planes
   */
  chromaPixelStride?: 1 | 2;
  /** Extra bytes at the end of every row */
  rowPadding?: number;
  now?: () => number;
}

interface PoolBuffer {
  planes: RawPlane[];
}

export class SyntheticCaptureSource extends EventEmitter {
  readonly width: number;
  readonly height: number;
  private readonly color: YuvColor;
  private readonly pattern: 'solid' | 'gradient';
  private readonly poolSize: number;
  private readonly free: PoolBuffer[] = [];
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private _captured = 0;
  private _starved = 0;

  constructor(options: SyntheticCaptureOptions = {}) {
    super();
    this.width = options.width ?? 640;
    this.height = options.height ?? 480;
    if (!Number.isInteger(this.width) || !Number.isInteger(this.height) || this.width <= 0 || this.height <= 0) {
      throw new TypeError(`Invalid capture size ${this.width}x${this.height}`);
    }
    this.color = options.color ?? YUV_COLORS.gray;
    this.pattern = options.pattern ?? 'solid';
    this.poolSize = options.poolSize ?? 3;
    this.now = options.now ?? Date.now;

    const pixelStride = options.chromaPixelStride ?? 2;
    const padding = options.rowPadding ?? 0;
    for (let i = 0; i < this.poolSize; i++) {
      this.free.push(this.allocate(pixelStride, padding));
    }
  }

  get captured(): number {
    return this._captured;
  }

  /** Captures skipped because every buffer was still held downstream */
  get starved(): number {
    return this._starved;
  }

  /** Buffers handed out and not yet released */
  outstanding(): number {
    return this.poolSize - this.free.length;
  }

  /**
   * Produce one frame, or null when the pool is exhausted
   */
  emitFrame(): RawFrame | null {
    const buffer = this.free.pop();
    if (!buffer) {
      this._starved++;
      logger.debug(`Pool exhausted, skipping capture (${this._starved} skipped)`);
      return null;
    }

    this.fill(buffer);
    this._captured++;

    let released = false;
    const frame: RawFrame = {
      format: 'YUV_420_888',
      width: this.width,
      height: this.height,
      planes: buffer.planes,
      timestamp: this.now(),
      close: () => {
        if (released) {
          logger.warn('Frame released twice');
          return;
        }
        released = true;
        this.free.push(buffer);
      },
    };
    this.emit('frame', frame);
    return frame;
  }

  /**
   * Deliver frames to `onFrame` at a fixed rate until stop()
   */
  start(onFrame: (frame: RawFrame) => void, fps = 30): void {
    if (this.timer) {
      throw invalidStateError('Capture already running');
    }
    this.timer = setInterval(() => {
      const frame = this.emitFrame();
      if (frame) onFrame(frame);
    }, 1000 / fps);
    logger.info(`Capturing ${this.width}x${this.height} @ ${fps}fps (pool of ${this.poolSize})`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private allocate(pixelStride: 1 | 2, padding: number): PoolBuffer {
    const chroma = getChromaSize(this.width, this.height);
    const lumaStride = this.width + padding;
    const luma: RawPlane = {
      data: new Uint8Array(lumaStride * this.height),
      rowStride: lumaStride,
      pixelStride: 1,
    };

    if (pixelStride === 1) {
      const stride = chroma.width + padding;
      return {
        planes: [
          luma,
          { data: new Uint8Array(stride * chroma.height), rowStride: stride, pixelStride: 1 },
          { data: new Uint8Array(stride * chroma.height), rowStride: stride, pixelStride: 1 },
        ],
      };
    }

    // One V/U interleaved buffer; U starts one byte in
    const stride = chroma.width * 2 + padding;
    const vu = new Uint8Array(stride * chroma.height);
    return {
      planes: [
        luma,
        { data: vu.subarray(1), rowStride: stride, pixelStride: 2 },
        { data: vu.subarray(0), rowStride: stride, pixelStride: 2 },
      ],
    };
  }

  private fill(buffer: PoolBuffer): void {
    const [y, u, v] = buffer.planes;
    const chroma = getChromaSize(this.width, this.height);

    for (let row = 0; row < this.height; row++) {
      const start = row * y.rowStride;
      if (this.pattern === 'solid') {
        y.data.fill(this.color.y, start, start + this.width);
      } else {
        for (let col = 0; col < this.width; col++) {
          y.data[start + col] = Math.round((col * 255) / Math.max(1, this.width - 1));
        }
      }
    }

    for (let row = 0; row < chroma.height; row++) {
      for (let col = 0; col < chroma.width; col++) {
        u.data[row * u.rowStride + col * u.pixelStride] = this.color.u;
        v.data[row * v.rowStride + col * v.pixelStride] = this.color.v;
      }
    }
  }
}
