/**
 * NodeAvJpegDecoder - node-av based JPEG decoder
 *
 * Decodes one compressed still image to tightly packed RGBA using the FFmpeg
 * MJPEG decoder. Each call builds and tears down its own decoder and filter,
 * so concurrent calls never share native state.
 */

import { Decoder, FilterAPI } from 'node-av/api';
import { FormatContext, Packet, type Frame, type Stream } from 'node-av/lib';
import { AVMEDIA_TYPE_VIDEO, AV_CODEC_ID_MJPEG } from 'node-av/constants';

import { createLogger } from '../../../utils/logger.js';
import { dataError, wrapAsStreamError } from '../../../utils/errors.js';
import { EOI_SEARCH_WINDOW, FILTER_RECEIVE_ATTEMPTS, JPEG_EOI, JPEG_SOI, STILL_TIME_BASE } from './constants.js';

const logger = createLogger('NodeAvJpegDecoder');

export interface DecodedImage {
  data: Uint8Array;
  width: number;
  height: number;
}

/**
 * Check that a payload starts with SOI and ends with EOI.
 * A truncated upload fails this check before it reaches the decoder.
 */
export function hasJpegMarkers(data: Uint8Array): boolean {
  if (data.length < 4 || data[0] !== JPEG_SOI[0] || data[1] !== JPEG_SOI[1]) {
    return false;
  }
  const searchStart = Math.max(2, data.length - EOI_SEARCH_WINDOW);
  for (let i = data.length - 2; i >= searchStart; i--) {
    if (data[i] === JPEG_EOI[0] && data[i + 1] === JPEG_EOI[1]) {
      return true;
    }
  }
  return false;
}

/**
 * Decode JPEG payloads using node-av native bindings
 */
export class NodeAvJpegDecoder {
  /**
   * Decode a JPEG payload to RGBA
   *
   * @throws StreamError (DataError) when the payload is not a complete, decodable JPEG
   */
  async decode(data: Uint8Array): Promise<DecodedImage> {
    if (!hasJpegMarkers(data)) {
      throw dataError(`Payload is not a complete JPEG (${data.length} bytes)`);
    }

    let decoder: Decoder | null = null;
    let filter: FilterAPI | null = null;

    try {
      const formatContext = new FormatContext();
      formatContext.allocContext();
      const stream = formatContext.newStream();
      stream.timeBase = STILL_TIME_BASE;

      const params = stream.codecpar;
      params.codecType = AVMEDIA_TYPE_VIDEO;
      params.codecId = AV_CODEC_ID_MJPEG;
      // Dimensions are detected from the bitstream
      params.width = 0;
      params.height = 0;

      decoder = await Decoder.create(stream, { exitOnError: false });
      await this.sendPacket(decoder, stream, data);

      let frame = await decoder.receive();
      if (!frame) {
        await decoder.flush();
        frame = await decoder.receive();
      }
      if (!frame || frame.width === 0 || frame.height === 0) {
        frame?.unref();
        throw dataError('Decoder produced no image');
      }

      filter = FilterAPI.create('format=rgba');
      const image = await this.convertToRgba(filter, frame);
      frame.unref();
      logger.debug(`Decoded ${data.length} bytes -> ${image.width}x${image.height}`);
      return image;
    } catch (err) {
      throw wrapAsStreamError(err, 'DataError');
    } finally {
      filter?.close();
      decoder?.close();
    }
  }

  private async sendPacket(decoder: Decoder, stream: Stream, data: Uint8Array): Promise<void> {
    const packet = new Packet();
    packet.alloc();
    packet.streamIndex = stream.index;
    packet.pts = 0n;
    packet.dts = 0n;
    packet.timeBase = STILL_TIME_BASE;
    packet.data = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    packet.duration = 1n;

    await decoder.decode(packet);
    packet.unref();
  }

  private async convertToRgba(filter: FilterAPI, frame: Frame): Promise<DecodedImage> {
    await filter.process(frame);

    let filtered = await filter.receive();
    // The graph is configured lazily from the first frame and may need a few pulls
    let attempts = 0;
    while (filtered === null && attempts < FILTER_RECEIVE_ATTEMPTS) {
      filtered = await filter.receive();
      attempts++;
    }
    if (!filtered) {
      throw dataError('RGBA conversion produced no output');
    }

    const width = filtered.width;
    const height = filtered.height;
    const buffer = filtered.toBuffer();
    filtered.unref();

    return { data: new Uint8Array(buffer), width, height };
  }
}
