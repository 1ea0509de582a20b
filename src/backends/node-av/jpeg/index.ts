/**
 * JPEG still-image codec backed by node-av
 */

export { NodeAvJpegEncoder, qualityToQscale } from './NodeAvJpegEncoder.js';
export { NodeAvJpegDecoder, hasJpegMarkers, type DecodedImage } from './NodeAvJpegDecoder.js';
