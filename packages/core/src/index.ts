/**
 * @trackstat/core: main entry point
 */

// ─── Types ──────────────────────────────────────────────────────────────────

export type {
  TrackPoint,
  TrackSegment,
  Track,
  ElevationChange,
  TrackSummary,
  TrackChunk,
  TrackInput,
  ParseOptions,
} from './types.js';

export { DEFAULT_PARSE_OPTIONS } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────────────────

export { GpxError, GpxInternalError, isGpxError, toGpxError, describeError } from './errors.js';
export type { GpxErrorKind, GpxInternalReason } from './errors.js';

// ─── Geometry ───────────────────────────────────────────────────────────────

export { EARTH_RADIUS_M, haversineDistance, cumulativeDistances } from './haversine.js';
export { classifyElevationDelta } from './elevation.js';

// ─── Aggregates ─────────────────────────────────────────────────────────────

export {
  segmentDistanceM,
  segmentElevationChange,
  trackDistanceM,
  trackElevationChange,
  trackSegmentCount,
  trackPointCount,
  summarizeTrack,
} from './track-stats.js';

// ─── GPX ────────────────────────────────────────────────────────────────────

export { FIELD_HANDLERS, findFieldHandler, parseDecimal } from './field-handlers.js';
export type { FieldHandler, FieldUpdate, TrackPointDraft } from './field-handlers.js';

export { SaxesEventSource, readFileChunks, toChunks } from './xml-events.js';
export type { XmlAttributes, XmlEvent, XmlEventSource } from './xml-events.js';

export {
  parseTrack,
  parseTrackPoints,
  parseTrackFile,
  parseTrackPointsFile,
} from './gpx-parser.js';
