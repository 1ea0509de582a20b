/**
 * StreamSession - start/stop state machine driving encode and transport
 *
 * idle -> probing -> streaming -> stopping -> idle. Frames are only
 * accepted while streaming, and at most one frame is being encoded or sent
 * at any time; frames arriving while that unit is busy are dropped and
 * released immediately.
 *
 * Each stop (or session-ending failure) bumps a generation counter. A unit
 * that finds its generation outdated after encoding, before sending or
 * after sending leaves session state untouched.
 */

import { EventEmitter } from 'events';

import type { EncodeResult, RawFrame, SessionState, SessionStats, TransportResult } from '../types.js';
import type { FrameEncoder } from '../encoders/FrameEncoder.js';
import type { FrameTransport } from '../transport/FrameTransport.js';
import { EncodeSlot } from './encode-slot.js';
import { createLogger } from '../utils/logger.js';
import { isStreamError, networkError, wrapAsStreamError, type StreamError } from '../utils/errors.js';

const logger = createLogger('StreamSession');

export type SessionEncoder = Pick<FrameEncoder, 'encode'>;
export type SessionTransport = Pick<FrameTransport, 'probe' | 'send'>;

export interface StreamSessionInit {
  encoder: SessionEncoder;
  transport: SessionTransport;
  /**
   * Consecutive network failures that end the session. 1 ends it on the
   * first failure; larger values tolerate transient errors.
   */
  maxConsecutiveFailures?: number;
}

interface Counters {
  sentFrames: number;
  droppedBusy: number;
  skippedOversize: number;
  encodeFailures: number;
  rejectedFrames: number;
  consecutiveFailures: number;
}

function zeroCounters(): Counters {
  return {
    sentFrames: 0,
    droppedBusy: 0,
    skippedOversize: 0,
    encodeFailures: 0,
    rejectedFrames: 0,
    consecutiveFailures: 0,
  };
}

export class StreamSession extends EventEmitter {
  private readonly _encoder: SessionEncoder;
  private readonly _transport: SessionTransport;
  private readonly _maxConsecutiveFailures: number;
  private readonly _slot = new EncodeSlot();

  private _state: SessionState = 'idle';
  private _generation = 0;
  private _sequence = 0;
  private _abort: AbortController | null = null;
  private _probe: Promise<boolean> | null = null;
  private _inFlight: Promise<void> | null = null;
  private _stopping: Promise<void> | null = null;
  private _counters: Counters = zeroCounters();
  private _lastStatus: number | null = null;
  private _lastError: string | null = null;

  constructor(init: StreamSessionInit) {
    super();
    const max = init.maxConsecutiveFailures ?? 1;
    if (!Number.isInteger(max) || max < 1) {
      throw new TypeError(`maxConsecutiveFailures must be a positive integer, got ${max}`);
    }
    this._encoder = init.encoder;
    this._transport = init.transport;
    this._maxConsecutiveFailures = max;
  }

  get state(): SessionState {
    return this._state;
  }

  /** True while a frame is being encoded or sent */
  get busy(): boolean {
    return this._slot.busy;
  }

  /**
   * Probe the receiver and enter streaming if it answers.
   * Resolves false, leaving the session idle, when the receiver is unreachable.
   */
  async start(): Promise<boolean> {
    if (this._state !== 'idle') {
      logger.warn(`start() ignored while ${this._state}`);
      return this._state === 'streaming';
    }

    const generation = ++this._generation;
    const abort = new AbortController();
    this._abort = abort;
    this.setState('probing');

    const probe = this._transport.probe(abort.signal);
    this._probe = probe;
    let reachable: boolean;
    try {
      reachable = await probe;
    } catch (err) {
      logger.error('Probe threw unexpectedly', err);
      reachable = false;
    } finally {
      this._probe = null;
    }

    // stop() ran while probing and owns the transition back to idle
    if (generation !== this._generation) {
      return false;
    }

    if (!reachable) {
      this._abort = null;
      this.recordFailure(networkError('Receiver is not reachable'));
      this.setState('idle');
      return false;
    }

    this._sequence = 0;
    this._counters = zeroCounters();
    this._lastStatus = null;
    this._lastError = null;
    this.setState('streaming');
    logger.info('Streaming started');
    return true;
  }

  /**
   * Cancel in-flight work and return to idle. No-op when already idle.
   * Resolves once any in-flight unit has settled.
   */
  stop(): Promise<void> {
    if (this._state === 'idle') {
      return Promise.resolve();
    }
    if (this._stopping) {
      return this._stopping;
    }

    this.setState('stopping');
    this._generation++;
    this._abort?.abort();
    this._abort = null;

    const pending: Promise<unknown>[] = [];
    if (this._probe) pending.push(this._probe);
    if (this._inFlight) pending.push(this._inFlight);
    this._stopping = Promise.allSettled(pending).then(() => {
      this._stopping = null;
      this.setState('idle');
      logger.info('Streaming stopped');
    });
    return this._stopping;
  }

  /**
   * Offer a captured frame. Returns true if the frame was taken for
   * encoding; otherwise the frame has already been released.
   * Never blocks the caller.
   */
  submitFrame(raw: RawFrame): boolean {
    const abort = this._abort;
    if (this._state !== 'streaming' || !abort) {
      raw.close();
      return false;
    }

    if (!this._slot.tryAcquire()) {
      this._counters.droppedBusy++;
      raw.close();
      logger.debug(`Dropped frame: encoder busy (${this._counters.droppedBusy} dropped)`);
      return false;
    }

    const sequence = this._sequence++;
    const generation = this._generation;
    this._inFlight = this.runUnit(raw, sequence, generation, abort.signal).finally(() => {
      this._slot.release();
      this._inFlight = null;
    });
    return true;
  }

  stats(): SessionStats {
    return {
      state: this._state,
      ...this._counters,
      lastStatus: this._lastStatus,
      lastError: this._lastError,
    };
  }

  /**
   * One-line status for a UI
   */
  statusText(): string {
    if (this._state === 'idle' && this._lastError) {
      return `error: ${this._lastError}`;
    }
    if (this._state === 'streaming') {
      return `streaming (${this._counters.sentFrames} sent)`;
    }
    return this._state;
  }

  private async runUnit(raw: RawFrame, sequence: number, generation: number, signal: AbortSignal): Promise<void> {
    try {
      let encoded: EncodeResult;
      try {
        encoded = await this._encoder.encode(raw, sequence);
      } finally {
        raw.close();
      }

      if (this.isStale(generation)) return;
      if (!encoded.ok) {
        this.handleEncodeFailure(encoded.error);
        return;
      }

      if (this.isStale(generation) || signal.aborted) return;
      const result = await this._transport.send(encoded.frame, signal);

      if (this.isStale(generation)) return;
      this.handleTransportResult(result, sequence);
    } catch (err) {
      if (this.isStale(generation)) return;
      logger.error(`Frame #${sequence} failed unexpectedly`, err);
      this.handleEncodeFailure(wrapAsStreamError(err, 'EncodingError'));
    }
  }

  private isStale(generation: number): boolean {
    return generation !== this._generation || this._state !== 'streaming';
  }

  private handleEncodeFailure(error: StreamError): void {
    if (isStreamError(error, 'QuotaExceededError')) {
      this._counters.skippedOversize++;
      logger.debug(`Frame skipped: ${error.message}`);
      return;
    }
    this._counters.encodeFailures++;
    this._lastError = error.message;
    logger.warn(`Frame skipped after encode failure: ${error.message}`);
  }

  private handleTransportResult(result: TransportResult, sequence: number): void {
    this._lastStatus = result.status;

    if (result.ok) {
      this._counters.sentFrames++;
      this._counters.consecutiveFailures = 0;
      return;
    }

    if (!result.error) {
      this._counters.rejectedFrames++;
      this._lastError = `HTTP ${result.status}`;
      return;
    }

    if (isStreamError(result.error, 'AbortError')) {
      return;
    }

    this._counters.consecutiveFailures++;
    this.recordFailure(result.error);

    if (this._counters.consecutiveFailures >= this._maxConsecutiveFailures) {
      logger.error(`Ending session after frame #${sequence}: ${result.error.message}`);
      this.endSession();
    } else {
      logger.warn(
        `Frame #${sequence} failed (${this._counters.consecutiveFailures}/${this._maxConsecutiveFailures}): ${result.error.message}`
      );
    }
  }

  /**
   * Leave streaming from inside a unit. The unit releases the slot itself,
   * so there is nothing to wait for.
   */
  private endSession(): void {
    this._generation++;
    this._abort?.abort();
    this._abort = null;
    this.setState('idle');
  }

  private recordFailure(error: StreamError): void {
    this._lastError = error.message;
    this.emit('failure', error);
  }

  private setState(next: SessionState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    logger.debug(`State ${previous} -> ${next}`);
    this.emit('statechange', next, previous);
  }
}
