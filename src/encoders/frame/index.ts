export { DEFAULT_QUALITY, DEFAULT_MAX_FRAME_BYTES, DEFAULT_ENCODE_TIMEOUT } from './constants.js';
export type { StillImageCompressor, FrameEncoderInit } from './types.js';
