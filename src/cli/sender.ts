#!/usr/bin/env node
/**
 * Sender process: synthetic capture -> StreamSession -> receiver
 *
 * Environment: FRAMEPIPE_CAPTURE_FPS (default 15), FRAMEPIPE_CAPTURE_SIZE
 * (WIDTHxHEIGHT, default 640x480).
 */

import { loadStreamConfig } from '../config/stream-config.js';
import { SyntheticCaptureSource } from '../capture/SyntheticCaptureSource.js';
import { FrameEncoder } from '../encoders/FrameEncoder.js';
import { FrameTransport } from '../transport/FrameTransport.js';
import { StreamSession } from '../session/StreamSession.js';
import type { SessionState } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('sender');

function parseSize(value: string | undefined): { width: number; height: number } {
  const match = /^(\d+)x(\d+)$/.exec(value ?? '');
  if (!match) return { width: 640, height: 480 };
  return { width: Number(match[1]), height: Number(match[2]) };
}

async function main(): Promise<void> {
  const config = await loadStreamConfig();
  const fps = Number(process.env.FRAMEPIPE_CAPTURE_FPS ?? 15);
  if (!(fps > 0)) {
    throw new TypeError(`FRAMEPIPE_CAPTURE_FPS must be positive, got ${process.env.FRAMEPIPE_CAPTURE_FPS}`);
  }

  const encoder = new FrameEncoder({ quality: config.quality, maxFrameBytes: config.maxFrameBytes });
  const transport = new FrameTransport(config);
  const session = new StreamSession({
    encoder,
    transport,
    maxConsecutiveFailures: config.maxConsecutiveFailures,
  });
  const capture = new SyntheticCaptureSource({ ...parseSize(process.env.FRAMEPIPE_CAPTURE_SIZE), pattern: 'gradient' });

  const release = (): void => {
    capture.stop();
    encoder.close();
    transport.close();
  };

  session.on('statechange', (state: SessionState) => {
    logger.info(`Session ${session.statusText()}`);
    if (state === 'idle') {
      release();
      const stats = session.stats();
      logger.info(`Sent ${stats.sentFrames}, dropped busy ${stats.droppedBusy}, skipped oversize ${stats.skippedOversize}`);
      process.exitCode = stats.lastError ? 1 : 0;
    }
  });

  if (!(await session.start())) {
    return;
  }
  capture.start((frame) => session.submitFrame(frame), fps);

  const shutdown = (): void => {
    session.stop().catch((err: unknown) => logger.error('Stop failed', err));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logger.error('Sender failed', err);
  process.exit(1);
});
