#!/usr/bin/env node
/**
 * Receiver process: HTTP endpoints, display loop and periodic status report
 */

import { loadStreamConfig } from '../config/stream-config.js';
import { FrameReceiver } from '../receiver/FrameReceiver.js';
import { createReceiverApp, startReceiverServer } from '../receiver/server.js';
import { formatStatusReport } from '../receiver/status-report.js';
import { DisplaySink } from '../display/DisplaySink.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('receiver');

async function main(): Promise<void> {
  const config = await loadStreamConfig();

  const receiver = new FrameReceiver();
  const app = createReceiverApp(receiver, {
    pingPath: config.pingPath,
    uploadPath: config.uploadPath,
    maxFrameBytes: config.maxFrameBytes,
  });

  const display = new DisplaySink({
    source: receiver,
    fps: config.displayFps,
    render: (frame) => {
      logger.debug(`Frame #${frame.frameNumber} ${frame.width}x${frame.height}, latency ${frame.receivedAt - frame.timestamp}ms`);
    },
  });

  const running = await startReceiverServer(app, { host: config.host, port: config.port });
  display.start();

  const monitor = setInterval(() => {
    logger.info(formatStatusReport(receiver.stats(), display.stats(), Date.now()));
  }, config.statusIntervalMs);

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    clearInterval(monitor);
    display.stop();
    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Server close failed', err);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error('Receiver failed to start', err);
  process.exit(1);
});
