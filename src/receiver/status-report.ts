/**
 * One-line receiver status summary for the periodic report
 */

import type { ReceiverStats } from '../types.js';
import type { DisplayStats } from '../display/DisplaySink.js';

function formatAge(at: number | null, now: number): string {
  if (at === null) return 'never';
  return `${((now - at) / 1000).toFixed(1)}s ago`;
}

export function formatStatusReport(receiver: ReceiverStats, display: DisplayStats, now: number): string {
  return [
    `uptime ${Math.floor(receiver.elapsedSeconds)}s`,
    `received ${receiver.frameCount} (${receiver.fps.toFixed(1)} fps)`,
    `displayed ${display.displayed} (${display.fps.toFixed(1)} fps)`,
    `decode failures ${receiver.decodeFailures}`,
    `connections ${receiver.connectionCount}`,
    `last frame ${formatAge(receiver.lastFrameAt, now)}`,
    `last ping ${formatAge(receiver.lastPingAt, now)}`,
  ].join(' | ');
}
