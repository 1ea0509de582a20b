/**
 * Tests for the receiver HTTP routes
 */

import { describe, it, expect, jest, beforeAll, afterAll } from '@jest/globals';
import { FrameReceiver } from '../receiver/FrameReceiver.js';
import { createReceiverApp } from '../receiver/server.js';
import type { DecodedImage } from '../backends/node-av/jpeg/NodeAvJpegDecoder.js';
import { dataError } from '../utils/errors.js';
import { setSilent } from '../utils/logger.js';

function setup(options: Parameters<typeof createReceiverApp>[1] = {}) {
  const decoder = {
    decode: jest.fn(async (_data: Uint8Array): Promise<DecodedImage> => ({ data: new Uint8Array(16), width: 2, height: 2 })),
  };
  const receiver = new FrameReceiver({ decoder, now: () => 50_000 });
  const app = createReceiverApp(receiver, options);
  return { app, receiver, decoder };
}

function upload(body: Uint8Array, headers: Record<string, string> = {}): RequestInit {
  return { method: 'POST', body, headers: { 'Content-Type': 'image/jpeg', ...headers } };
}

describe('receiver routes', () => {
  beforeAll(() => setSilent(true));
  afterAll(() => setSilent(false));

  it('GET /ping answers with a status body', async () => {
    const { app, receiver } = setup();

    const res = await app.request('/ping');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', message: 'receiver is running' });
    expect(receiver.stats().lastPingAt).toBe(50_000);
  });

  it('POST /upload_frame acknowledges a decoded frame', async () => {
    const { app, receiver } = setup();

    const res = await app.request('/upload_frame', upload(Uint8Array.of(1, 2, 3), { 'Frame-Timestamp': '1700000000000' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'success', frameCount: 1, timestamp: 1700000000000 });
    expect(receiver.currentFrame()?.timestamp).toBe(1700000000000);
  });

  it('uses receipt time when the timestamp header is not numeric', async () => {
    const { app } = setup();

    const res = await app.request('/upload_frame', upload(Uint8Array.of(1), { 'Frame-Timestamp': 'soon' }));

    expect(await res.json()).toEqual({ status: 'success', frameCount: 1, timestamp: 50_000 });
  });

  it('still returns 200 when the payload cannot be decoded', async () => {
    const { app, decoder, receiver } = setup();
    decoder.decode.mockRejectedValueOnce(dataError('corrupt'));

    const res = await app.request('/upload_frame', upload(Uint8Array.of(9, 9), { 'Frame-Timestamp': '7' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'discarded', frameCount: 0, timestamp: 7 });
    expect(receiver.stats().decodeFailures).toBe(1);
  });

  it('refuses an empty body with 400', async () => {
    const { app, decoder } = setup();

    const res = await app.request('/upload_frame', upload(new Uint8Array(0)));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'No image data received' });
    expect(decoder.decode).not.toHaveBeenCalled();
  });

  it('refuses a body above the frame ceiling with 413', async () => {
    const { app, decoder } = setup({ maxFrameBytes: 16 });

    const res = await app.request('/upload_frame', upload(new Uint8Array(32), { 'Content-Length': '32' }));

    expect(res.status).toBe(413);
    expect(decoder.decode).not.toHaveBeenCalled();
  });

  it('GET /status reports receiver statistics', async () => {
    const { app } = setup();
    await app.request('/upload_frame', upload(Uint8Array.of(1)));

    const res = await app.request('/status');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      frameCount: 1,
      decodeFailures: 0,
      isReceiving: true,
      connectionCount: 1,
      latestFrame: { width: 2, height: 2 },
    });
  });

  it('serves configured paths', async () => {
    const { app } = setup({ pingPath: '/health', uploadPath: '/frames' });

    expect((await app.request('/health')).status).toBe(200);
    expect((await app.request('/frames', upload(Uint8Array.of(1)))).status).toBe(200);
    expect((await app.request('/ping')).status).toBe(404);
  });
});
