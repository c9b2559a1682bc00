/**
 * Shared fixtures for the test suite
 */

import type { Clock } from '../helpers.js';

/**
 * A clock that returns 0 on the first call and advances by `step` on every call after.
 */
export function steppingClock(step = 5): Clock {
  let now = -step;
  return () => {
    now += step;
    return now;
  };
}
