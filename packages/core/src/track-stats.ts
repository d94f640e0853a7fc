/**
 * Segment and track aggregates.
 *
 * Every figure is recomputed from the point sequence on demand. Parsed
 * tracks never change, so there is nothing to cache or invalidate.
 */

import type { ElevationChange, Track, TrackSegment, TrackSummary } from './types.js';
import { haversineDistance } from './haversine.js';
import { classifyElevationDelta } from './elevation.js';

// ─── Segment ────────────────────────────────────────────────────────────────

/** Sum of pairwise great-circle distances; 0 for fewer than two points. */
export function segmentDistanceM(segment: TrackSegment): number {
  const { points } = segment;
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += haversineDistance(points[i - 1], points[i]);
  }
  return total;
}

export function segmentElevationChange(segment: TrackSegment): ElevationChange {
  const { points } = segment;
  let ascentM = 0;
  let descentM = 0;
  for (let i = 1; i < points.length; i++) {
    const step = classifyElevationDelta(points[i - 1], points[i]);
    ascentM += step.ascentM;
    descentM += step.descentM;
  }
  return { ascentM, descentM };
}

// ─── Track ──────────────────────────────────────────────────────────────────

// Segments are folded independently: no distance or elevation is counted
// across the gap between the end of one segment and the start of the next.

export function trackDistanceM(track: Track): number {
  return track.segments.reduce((sum, segment) => sum + segmentDistanceM(segment), 0);
}

export function trackElevationChange(track: Track): ElevationChange {
  let ascentM = 0;
  let descentM = 0;
  for (const segment of track.segments) {
    const change = segmentElevationChange(segment);
    ascentM += change.ascentM;
    descentM += change.descentM;
  }
  return { ascentM, descentM };
}

export function trackSegmentCount(track: Track): number {
  return track.segments.length;
}

export function trackPointCount(track: Track): number {
  return track.segments.reduce((sum, segment) => sum + segment.points.length, 0);
}

/**
 * Every consumer-facing statistic for a track.
 */
export function summarizeTrack(track: Track): TrackSummary {
  const { ascentM, descentM } = trackElevationChange(track);
  return {
    segmentCount: trackSegmentCount(track),
    pointCount: trackPointCount(track),
    totalDistanceM: trackDistanceM(track),
    ascentM,
    descentM,
  };
}
