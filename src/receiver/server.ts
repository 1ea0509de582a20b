/**
 * HTTP surface of the receiver
 *
 *   GET  /ping           liveness, always 200
 *   POST /upload_frame   raw JPEG body, Frame-Timestamp header
 *   GET  /status         receiver statistics as JSON
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import type { Server } from 'net';
import { serve } from '@hono/node-server';

import type { FrameReceiver } from './FrameReceiver.js';
import { createLogger } from '../utils/logger.js';
import {
  DEFAULT_PING_PATH,
  DEFAULT_UPLOAD_PATH,
  FRAME_TIMESTAMP_HEADER,
  STATUS_PATH,
} from '../protocol/constants.js';
import { DEFAULT_MAX_FRAME_BYTES } from '../encoders/frame/constants.js';

const logger = createLogger('ReceiverServer');

export interface ReceiverAppOptions {
  pingPath?: string;
  uploadPath?: string;
  /** Bodies above this size are refused with 413 before decoding */
  maxFrameBytes?: number;
}

export interface ReceiverServerOptions {
  host: string;
  /** 0 picks an ephemeral port */
  port: number;
}

export interface RunningServer {
  server: Server;
  port: number;
  close(): Promise<void>;
}

function parseTimestamp(header: string | undefined): number | undefined {
  if (header === undefined || header.trim() === '') return undefined;
  const value = Number(header);
  return Number.isFinite(value) ? value : undefined;
}

export function createReceiverApp(receiver: FrameReceiver, options: ReceiverAppOptions = {}): Hono {
  const pingPath = options.pingPath ?? DEFAULT_PING_PATH;
  const uploadPath = options.uploadPath ?? DEFAULT_UPLOAD_PATH;
  const maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;

  const app = new Hono();

  app.get(pingPath, (c) => c.json(receiver.ping()));

  app.post(
    uploadPath,
    bodyLimit({
      maxSize: maxFrameBytes,
      onError: (c) => {
        logger.warn(`Refused upload above ${maxFrameBytes} bytes`);
        return c.json({ error: `Frame exceeds ${maxFrameBytes} bytes` }, 413);
      },
    }),
    async (c) => {
      const body = new Uint8Array(await c.req.arrayBuffer());
      if (body.byteLength === 0) {
        return c.json({ error: 'No image data received' }, 400);
      }

      const ack = await receiver.ingest(body, parseTimestamp(c.req.header(FRAME_TIMESTAMP_HEADER)));
      return c.json(ack);
    }
  );

  app.get(STATUS_PATH, (c) => c.json(receiver.stats()));

  app.onError((err, c) => {
    logger.error(`${c.req.method} ${c.req.path} failed`, err);
    return c.json({ error: err.message }, 500);
  });

  return app;
}

/**
 * Listen on `host:port`. Resolves once the socket is bound.
 */
export function startReceiverServer(app: Hono, options: ReceiverServerOptions): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = serve({ fetch: app.fetch, hostname: options.host, port: options.port }, (info) => {
      server.off('error', reject);
      logger.info(`Listening on http://${options.host}:${info.port}`);
      resolve({
        server,
        port: info.port,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
    server.once('error', reject);
  });
}
