/**
 * framepipe - camera frame pipeline
 *
 * Sender side: FrameEncoder -> StreamSession -> FrameTransport.
 * Receiver side: FrameReceiver (+ HTTP app) -> DisplaySink.
 */

export type {
  RawPlane,
  RawFrame,
  EncodedFrame,
  EncodeResult,
  SessionState,
  TransportResult,
  SessionStats,
  DecodedFrame,
  IngestAck,
  ReceiverStats,
} from './types.js';

// Sender
export { FrameEncoder } from './encoders/FrameEncoder.js';
export * from './encoders/frame/index.js';
export { FrameTransport, type FrameTransportInit } from './transport/FrameTransport.js';
export {
  StreamSession,
  type StreamSessionInit,
  type SessionEncoder,
  type SessionTransport,
} from './session/StreamSession.js';
export { EncodeSlot } from './session/encode-slot.js';
export {
  SyntheticCaptureSource,
  YUV_COLORS,
  type SyntheticCaptureOptions,
  type YuvColor,
} from './capture/SyntheticCaptureSource.js';

// Receiver
export {
  FrameReceiver,
  DEFAULT_IDLE_AFTER_MS,
  type FrameReceiverInit,
  type ImageDecoder,
  type PingReply,
} from './receiver/FrameReceiver.js';
export { CurrentFrameSlot } from './receiver/current-frame-slot.js';
export {
  createReceiverApp,
  startReceiverServer,
  type ReceiverAppOptions,
  type ReceiverServerOptions,
  type RunningServer,
} from './receiver/server.js';
export { formatStatusReport } from './receiver/status-report.js';
export {
  DisplaySink,
  type DisplaySinkConfig,
  type DisplaySinkState,
  type DisplayStats,
  type FrameSource,
  type RenderCallback,
} from './display/DisplaySink.js';

// Codec
export { NodeAvJpegEncoder, NodeAvJpegDecoder, hasJpegMarkers, qualityToQscale, type DecodedImage } from './backends/node-av/jpeg/index.js';
export { packYuv420, selectPackedLayout, averageYuv, type PackedYuvBuffer } from './formats/conversions/chroma-interleave.js';
export * from './formats/pixel-format/index.js';

// Config
export {
  DEFAULT_STREAM_CONFIG,
  loadStreamConfig,
  resolveStreamConfig,
  resetStreamConfigCache,
  sanitizeConfig,
  type StreamConfig,
  type LoadConfigOptions,
} from './config/stream-config.js';

export * from './protocol/constants.js';
export * from './utils/index.js';
