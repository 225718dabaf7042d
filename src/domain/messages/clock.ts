/**
 * courier-bus - Message Clock
 *
 * Microsecond wall-clock timestamps derived from the high resolution
 * process clock, so they never run backwards within a process.
 */

import { performance } from 'perf_hooks';

let lastStamp = 0;

/**
 * Current time as whole microseconds since the Unix epoch.
 *
 * Consecutive calls within the same microsecond return the same value.
 */
export function currentMicroseconds(): number {
  const now = Math.floor((performance.timeOrigin + performance.now()) * 1000);
  if (now > lastStamp) {
    lastStamp = now;
  }
  return lastStamp;
}
