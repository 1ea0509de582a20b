/**
 * DisplaySink - polls the receiver's current frame at display cadence
 *
 * Each tick reads the current-frame slot and renders the frame if it has
 * not been shown yet. The sink only ever reads; a slow renderer makes it
 * skip ticks, it never holds up ingest.
 */

import type { DecodedFrame } from '../types.js';
import type { FrameReceiver } from '../receiver/FrameReceiver.js';
import { createLogger } from '../utils/logger.js';
import { invalidStateError } from '../utils/errors.js';

const logger = createLogger('DisplaySink');

const DEFAULT_DISPLAY_FPS = 30;
/** Throughput is recomputed every this many displayed frames */
const FPS_WINDOW = 10;

export type DisplaySinkState = 'idle' | 'running' | 'stopped';

export type FrameSource = Pick<FrameReceiver, 'currentFrame'>;

export type RenderCallback = (frame: DecodedFrame) => void | Promise<void>;

export interface DisplaySinkConfig {
  source: FrameSource;
  render: RenderCallback;
  /** Poll rate (default: 30) */
  fps?: number;
  now?: () => number;
}

export interface DisplayStats {
  displayed: number;
  fps: number;
  width: number;
  height: number;
}

export class DisplaySink {
  private readonly source: FrameSource;
  private readonly render: RenderCallback;
  private readonly intervalMs: number;
  private readonly now: () => number;

  private state: DisplaySinkState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private rendering = false;
  private lastShown: DecodedFrame | null = null;
  private displayed = 0;
  private fps = 0;
  private windowStart: number;

  constructor(config: DisplaySinkConfig) {
    const fps = config.fps ?? DEFAULT_DISPLAY_FPS;
    if (!(fps > 0) || !Number.isFinite(fps)) {
      throw new TypeError(`fps must be a positive number, got ${fps}`);
    }
    this.source = config.source;
    this.render = config.render;
    this.intervalMs = Math.max(1, Math.round(1000 / fps));
    this.now = config.now ?? Date.now;
    this.windowStart = this.now();
  }

  getState(): DisplaySinkState {
    return this.state;
  }

  start(): void {
    if (this.state === 'running') {
      throw invalidStateError('DisplaySink is already running');
    }
    this.state = 'running';
    this.windowStart = this.now();
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => logger.error('Render failed', err));
    }, this.intervalMs);
    logger.info(`Display started at ${Math.round(1000 / this.intervalMs)} fps`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.state === 'running') {
      this.state = 'stopped';
      logger.info(`Display stopped after ${this.displayed} frames`);
    }
  }

  /**
   * Show the current frame if it is new. Returns whether a frame was rendered.
   */
  async tick(): Promise<boolean> {
    if (this.rendering) return false;

    const frame = this.source.currentFrame();
    if (!frame || frame === this.lastShown) return false;

    this.rendering = true;
    try {
      await this.render(frame);
    } finally {
      this.rendering = false;
    }

    this.lastShown = frame;
    this.displayed++;
    if (this.displayed % FPS_WINDOW === 0) {
      const now = this.now();
      const elapsed = now - this.windowStart;
      this.fps = elapsed > 0 ? (FPS_WINDOW * 1000) / elapsed : 0;
      this.windowStart = now;
    }
    return true;
  }

  stats(): DisplayStats {
    return {
      displayed: this.displayed,
      fps: this.fps,
      width: this.lastShown?.width ?? 0,
      height: this.lastShown?.height ?? 0,
    };
  }
}
