/**
 * FrameReceiver - decodes pushed frames into the current-frame slot
 *
 * Ingest calls may overlap; decoding runs concurrently and only the final
 * swap into the slot is ordered. A payload that fails to decode is counted
 * and acknowledged as discarded; it never fails the request.
 */

import { EventEmitter } from 'events';

import type { DecodedFrame, IngestAck, ReceiverStats } from '../types.js';
import { NodeAvJpegDecoder, type DecodedImage } from '../backends/node-av/jpeg/NodeAvJpegDecoder.js';
import { CurrentFrameSlot } from './current-frame-slot.js';
import { createLogger } from '../utils/logger.js';
import { wrapAsStreamError } from '../utils/errors.js';

const logger = createLogger('FrameReceiver');

/** Without a frame for this long the sender counts as disconnected */
export const DEFAULT_IDLE_AFTER_MS = 3_000;

export interface ImageDecoder {
  decode(data: Uint8Array): Promise<DecodedImage>;
}

export interface FrameReceiverInit {
  decoder?: ImageDecoder;
  idleAfterMs?: number;
  /** Clock in milliseconds since the epoch */
  now?: () => number;
}

export interface PingReply {
  status: 'ok';
  message: string;
}

export class FrameReceiver extends EventEmitter {
  private readonly _decoder: ImageDecoder;
  private readonly _idleAfterMs: number;
  private readonly _now: () => number;
  private readonly _slot = new CurrentFrameSlot<DecodedFrame>();

  private _startedAt: number;
  private _arrivals = 0;
  private _frameCount = 0;
  private _decodeFailures = 0;
  private _connectionCount = 0;
  private _lastIngestAt: number | null = null;
  private _lastFrameAt: number | null = null;
  private _lastPingAt: number | null = null;

  constructor(init: FrameReceiverInit = {}) {
    super();
    this._decoder = init.decoder ?? new NodeAvJpegDecoder();
    this._idleAfterMs = init.idleAfterMs ?? DEFAULT_IDLE_AFTER_MS;
    this._now = init.now ?? Date.now;
    this._startedAt = this._now();
  }

  ping(): PingReply {
    this._lastPingAt = this._now();
    return { status: 'ok', message: 'receiver is running' };
  }

  /**
   * Decode one payload and, if it is the newest arrival, make it current.
   *
   * @param timestamp - sender capture time; receipt time is used when absent
   */
  async ingest(bytes: Uint8Array, timestamp?: number): Promise<IngestAck> {
    const arrival = ++this._arrivals;
    const receivedAt = this._now();
    const captureTime = timestamp !== undefined && Number.isFinite(timestamp) ? timestamp : receivedAt;

    if (this._lastIngestAt === null || receivedAt - this._lastIngestAt > this._idleAfterMs) {
      this._connectionCount++;
      logger.info(`Sender connected (connection #${this._connectionCount})`);
    }
    this._lastIngestAt = receivedAt;

    let image: DecodedImage;
    try {
      image = await this._decoder.decode(bytes);
    } catch (err) {
      this._decodeFailures++;
      const error = wrapAsStreamError(err, 'DataError');
      logger.warn(`Discarded ${bytes.byteLength}-byte payload: ${error.message}`);
      return { status: 'discarded', frameCount: this._frameCount, timestamp: captureTime };
    }

    this._frameCount++;
    const frame: DecodedFrame = {
      data: image.data,
      width: image.width,
      height: image.height,
      timestamp: captureTime,
      frameNumber: this._frameCount,
      receivedAt,
    };

    // Decodes finish out of order; keep the latest arrival time seen
    this._lastFrameAt = Math.max(this._lastFrameAt ?? receivedAt, receivedAt);

    if (this._slot.swapIfNewer(frame, arrival)) {
      if (this._frameCount === 1) {
        logger.info(`First frame received: ${frame.width}x${frame.height}`);
      }
      this.emit('frame', frame);
    } else {
      logger.debug(`Frame #${frame.frameNumber} superseded by a newer arrival`);
    }

    return { status: 'success', frameCount: this._frameCount, timestamp: captureTime };
  }

  currentFrame(): DecodedFrame | null {
    return this._slot.read();
  }

  /** Changes whenever the current frame is replaced */
  get frameVersion(): number {
    return this._slot.version;
  }

  stats(): ReceiverStats {
    const now = this._now();
    const elapsedSeconds = (now - this._startedAt) / 1000;
    const latest = this._slot.read();

    return {
      frameCount: this._frameCount,
      decodeFailures: this._decodeFailures,
      elapsedSeconds,
      fps: elapsedSeconds > 0 ? this._frameCount / elapsedSeconds : 0,
      isReceiving: this._lastFrameAt !== null && now - this._lastFrameAt <= this._idleAfterMs,
      lastFrameAt: this._lastFrameAt,
      lastPingAt: this._lastPingAt,
      connectionCount: this._connectionCount,
      latestFrame: latest ? { width: latest.width, height: latest.height } : null,
    };
  }

  reset(): void {
    this._slot.clear();
    this._startedAt = this._now();
    this._frameCount = 0;
    this._decodeFailures = 0;
    this._connectionCount = 0;
    this._lastIngestAt = null;
    this._lastFrameAt = null;
    this._lastPingAt = null;
  }
}
