/**
 * @trackstat/core: type definitions
 *
 * Coordinate convention:
 *   lat / lon = WGS84 degrees, no reprojection
 *   ele       = meters
 *   distances = meters (kilometers only at the display layer)
 *
 * Ownership is strictly hierarchical: Track → TrackSegment → TrackPoint.
 * Nothing is mutated once a parse returns.
 */

// ─── Track data ─────────────────────────────────────────────────────────────

export interface TrackPoint {
  readonly lat: number;
  readonly lon: number;
  /** Elevation in meters, when the fix carried one */
  readonly ele?: number;
  /** Opaque timestamp text, never parsed as a date */
  readonly time?: string;
}

export interface TrackSegment {
  readonly points: readonly TrackPoint[];
}

export interface Track {
  readonly segments: readonly TrackSegment[];
}

// ─── Statistics ─────────────────────────────────────────────────────────────

export interface ElevationChange {
  /** Cumulative gain in meters */
  ascentM: number;
  /** Cumulative loss in meters, as a positive magnitude */
  descentM: number;
}

export interface TrackSummary extends ElevationChange {
  segmentCount: number;
  pointCount: number;
  totalDistanceM: number;
}

// ─── Input ──────────────────────────────────────────────────────────────────

export type TrackChunk = string | Uint8Array;

/**
 * A whole document, or its chunks in order.
 * Chunks are pulled lazily, one at a time.
 */
export type TrackInput = TrackChunk | Iterable<TrackChunk>;

// ─── Parse config ───────────────────────────────────────────────────────────

export interface ParseOptions {
  /** Read size for files; slice size for whole-document string/byte inputs */
  chunkSize: number;
  /** Log parse diagnostics through console */
  verbose: boolean;
}

export const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  chunkSize: 64 * 1024,
  verbose: false,
};
