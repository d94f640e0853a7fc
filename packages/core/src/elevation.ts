/**
 * Elevation delta classification between consecutive fixes.
 */

import type { ElevationChange, TrackPoint } from './types.js';

/**
 * Contribution of one consecutive pair to ascent/descent.
 * A pair with a missing elevation on either side contributes nothing:
 * no interpolation, and no carry-over across the gap.
 */
export function classifyElevationDelta(
  from: Pick<TrackPoint, 'ele'>,
  to: Pick<TrackPoint, 'ele'>,
): ElevationChange {
  if (from.ele === undefined || to.ele === undefined) {
    return { ascentM: 0, descentM: 0 };
  }

  const delta = to.ele - from.ele;
  if (delta > 0) return { ascentM: delta, descentM: 0 };
  if (delta < 0) return { ascentM: 0, descentM: -delta };
  return { ascentM: 0, descentM: 0 };
}
