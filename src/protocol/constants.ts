/**
 * Wire constants shared by the sender and the receiver
 */

export const DEFAULT_PING_PATH = '/ping';
export const DEFAULT_UPLOAD_PATH = '/upload_frame';
export const STATUS_PATH = '/status';

export const JPEG_CONTENT_TYPE = 'image/jpeg';

/** Capture time in milliseconds since the epoch */
export const FRAME_TIMESTAMP_HEADER = 'Frame-Timestamp';
/** Per-session frame sequence number */
export const FRAME_SEQUENCE_HEADER = 'Frame-Sequence';
