/**
 * JPEG codec constants
 */

import { Rational } from 'node-av/lib';

/** Start-of-image marker */
export const JPEG_SOI = [0xff, 0xd8] as const;

/** End-of-image marker */
export const JPEG_EOI = [0xff, 0xd9] as const;

/** Encoders may pad after EOI; search this many trailing bytes for it */
export const EOI_SEARCH_WINDOW = 32;

/** MJPEG quantizer range (lower is better quality) */
export const MIN_QSCALE = 2;
export const MAX_QSCALE = 31;

/** Still images need a time base; the value itself is irrelevant */
export const STILL_TIME_BASE = new Rational(1, 30);

/** Number of extra receive() attempts while a filter graph warms up */
export const FILTER_RECEIVE_ATTEMPTS = 10;
