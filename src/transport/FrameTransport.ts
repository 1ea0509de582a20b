/**
 * FrameTransport - pushes encoded frames to a receiver over HTTP
 *
 * One POST per frame, no retries. Every outcome, including connection
 * refusal and timeouts, is folded into a TransportResult; nothing thrown
 * by the HTTP client escapes `send()` or `probe()`.
 */

import http from 'http';
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import type { EncodedFrame, TransportResult } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { abortError, networkError, timeoutError, type StreamError } from '../utils/errors.js';
import { createTimeoutAbortController, DEFAULT_TIMEOUTS } from '../utils/timeout.js';
import {
  DEFAULT_PING_PATH,
  DEFAULT_UPLOAD_PATH,
  FRAME_SEQUENCE_HEADER,
  FRAME_TIMESTAMP_HEADER,
  JPEG_CONTENT_TYPE,
} from '../protocol/constants.js';

const logger = createLogger('FrameTransport');

export interface FrameTransportInit {
  host: string;
  port: number;
  pingPath?: string;
  uploadPath?: string;
  connectTimeoutMs?: number;
  writeTimeoutMs?: number;
  readTimeoutMs?: number;
  probeReadTimeoutMs?: number;
}

interface RequestPlan {
  method: 'GET' | 'POST';
  url: string;
  /** Socket inactivity allowed once connected */
  idleTimeoutMs: number;
  /** Hard deadline for the whole exchange, connect included */
  deadlineMs: number;
  data?: Buffer;
  headers?: Record<string, string>;
}

export class FrameTransport {
  readonly baseURL: string;
  private readonly _client: AxiosInstance;
  private readonly _agent: http.Agent;
  private readonly _pingPath: string;
  private readonly _uploadPath: string;
  private readonly _connectTimeoutMs: number;
  private readonly _writeTimeoutMs: number;
  private readonly _readTimeoutMs: number;
  private readonly _probeReadTimeoutMs: number;

  constructor(init: FrameTransportInit) {
    this.baseURL = `http://${init.host}:${init.port}`;
    this._pingPath = init.pingPath ?? DEFAULT_PING_PATH;
    this._uploadPath = init.uploadPath ?? DEFAULT_UPLOAD_PATH;
    this._connectTimeoutMs = init.connectTimeoutMs ?? DEFAULT_TIMEOUTS.connect;
    this._writeTimeoutMs = init.writeTimeoutMs ?? DEFAULT_TIMEOUTS.write;
    this._readTimeoutMs = init.readTimeoutMs ?? DEFAULT_TIMEOUTS.read;
    this._probeReadTimeoutMs = init.probeReadTimeoutMs ?? DEFAULT_TIMEOUTS.probeRead;

    this._agent = new http.Agent({ keepAlive: true, maxSockets: 1 });
    this._client = axios.create({
      baseURL: this.baseURL,
      httpAgent: this._agent,
      // The link is a local tunnel; an ambient HTTP_PROXY must not reroute it
      proxy: false,
      maxRedirects: 0,
      // Status is reported, not thrown
      validateStatus: () => true,
      responseType: 'arraybuffer',
    });
  }

  /**
   * Liveness check. True only on a 2xx response; every failure folds to false.
   */
  async probe(signal?: AbortSignal): Promise<boolean> {
    const result = await this.request(
      {
        method: 'GET',
        url: this._pingPath,
        idleTimeoutMs: this._probeReadTimeoutMs,
        deadlineMs: this._connectTimeoutMs + this._probeReadTimeoutMs,
      },
      signal
    );

    if (!result.ok) {
      logger.warn(`Probe of ${this.baseURL}${this._pingPath} failed: ${result.error?.message ?? `HTTP ${result.status}`}`);
    }
    return result.ok;
  }

  /**
   * Push one frame. Non-2xx statuses come back with `ok: false` and no error.
   */
  async send(frame: EncodedFrame, signal?: AbortSignal): Promise<TransportResult> {
    const body = Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.byteLength);
    const result = await this.request(
      {
        method: 'POST',
        url: this._uploadPath,
        idleTimeoutMs: Math.max(this._writeTimeoutMs, this._readTimeoutMs),
        deadlineMs: this._connectTimeoutMs + this._writeTimeoutMs + this._readTimeoutMs,
        data: body,
        headers: {
          'Content-Type': JPEG_CONTENT_TYPE,
          [FRAME_TIMESTAMP_HEADER]: String(frame.timestamp),
          [FRAME_SEQUENCE_HEADER]: String(frame.sequence),
        },
      },
      signal
    );

    if (result.error) {
      logger.debug(`Frame #${frame.sequence} not delivered: ${result.error.name}: ${result.error.message}`);
    } else if (!result.ok) {
      logger.warn(`Frame #${frame.sequence} rejected with HTTP ${result.status}`);
    }
    return result;
  }

  /**
   * Release pooled sockets
   */
  close(): void {
    this._agent.destroy();
  }

  private async request(plan: RequestPlan, signal?: AbortSignal): Promise<TransportResult> {
    const started = Date.now();
    const finish = (status: number | null, error: StreamError | null): TransportResult => ({
      ok: error === null && status !== null && status >= 200 && status < 300,
      status,
      error,
      durationMs: Date.now() - started,
    });

    if (signal?.aborted) {
      return finish(null, abortError('Request cancelled before it was sent'));
    }

    const { controller, cleanup } = createTimeoutAbortController(plan.deadlineMs);
    const onAbort = (): void => controller.abort(abortError('Request cancelled'));
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response: AxiosResponse<ArrayBuffer> = await this._client.request({
        method: plan.method,
        url: plan.url,
        data: plan.data,
        headers: plan.headers,
        timeout: plan.idleTimeoutMs,
        signal: controller.signal,
      });
      return finish(response.status, null);
    } catch (err) {
      return finish(null, this.classifyError(err, controller.signal, plan));
    } finally {
      cleanup();
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private classifyError(err: unknown, signal: AbortSignal, plan: RequestPlan): StreamError {
    if (signal.aborted) {
      const reason: unknown = signal.reason;
      if (reason instanceof Error && reason.name === 'TimeoutError') {
        return timeoutError(`${plan.method} ${plan.url} exceeded ${plan.deadlineMs}ms deadline`);
      }
      return abortError(`${plan.method} ${plan.url} cancelled`);
    }

    if (axios.isAxiosError(err)) {
      if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
        return timeoutError(`${plan.method} ${plan.url} idle for more than ${plan.idleTimeoutMs}ms`);
      }
      return networkError(`${plan.method} ${plan.url} failed: ${err.code ?? err.message}`, err);
    }

    const message = err instanceof Error ? err.message : String(err);
    return networkError(`${plan.method} ${plan.url} failed: ${message}`, err);
  }
}
