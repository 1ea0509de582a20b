/**
 * FrameEncoder constants
 */

/** Default JPEG quality factor (0-100) */
export const DEFAULT_QUALITY = 80;

/** Default encoded frame size ceiling: 1 MiB */
export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

/** Upper bound for a single compression call */
export const DEFAULT_ENCODE_TIMEOUT = 5_000;
