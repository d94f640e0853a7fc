/**
 * Streaming GPX track parser.
 *
 * One forward pass over the tokenizer's events, with bounded working state:
 *
 *   draft    the <trkpt> under construction (Idle when absent)
 *   field    the child-field update bound by the last recognized child start
 *   sink     where finished points go: segment buffers or one flat list
 *
 * Only trkseg, trkpt and the FIELD_HANDLERS children are recognized.
 * Waypoints, routes, metadata and extensions pass through as noise.
 */

import type { ParseOptions, Track, TrackInput, TrackPoint, TrackSegment } from './types.js';
import { DEFAULT_PARSE_OPTIONS } from './types.js';
import { GpxError, GpxInternalError, toGpxError } from './errors.js';
import type { FieldUpdate, TrackPointDraft } from './field-handlers.js';
import { findFieldHandler, parseDecimal } from './field-handlers.js';
import type { XmlAttributes, XmlEventSource } from './xml-events.js';
import { SaxesEventSource, readFileChunks, toChunks } from './xml-events.js';

const SEGMENT_ELEMENT = 'trkseg';
const POINT_ELEMENT = 'trkpt';

// ─── State machine ──────────────────────────────────────────────────────────

/** Receives structure from the state machine as it is closed. */
interface TrackSink {
  segmentStart(): void;
  segmentEnd(): void;
  point(point: TrackPoint): void;
}

function parseCoordinate(
  attributes: XmlAttributes,
  name: 'lat' | 'lon',
): number | undefined {
  const raw = attributes[name];
  if (raw === undefined) return undefined;
  // Attribute values are taken verbatim; only element text is trimmed
  const value = raw.trim() === raw ? parseDecimal(raw) : undefined;
  if (value === undefined) {
    throw new GpxInternalError('invalid-track-point', `${name} is not a number`);
  }
  return value;
}

/** Open a draft from <trkpt lat lon>. Both coordinates are mandatory. */
function startTrackPoint(attributes: XmlAttributes): TrackPointDraft {
  const lat = parseCoordinate(attributes, 'lat');
  const lon = parseCoordinate(attributes, 'lon');
  if (lat === undefined || lon === undefined) {
    throw new GpxInternalError('invalid-track-point', 'trkpt missing lat or lon');
  }
  return { lat, lon };
}

/** Seal a draft. Optional fields are only present when observed. */
function finishTrackPoint(draft: TrackPointDraft): TrackPoint {
  const { lat, lon, ele, time } = draft;
  return {
    lat,
    lon,
    ...(ele === undefined ? {} : { ele }),
    ...(time === undefined ? {} : { time }),
  };
}

function runStateMachine(source: XmlEventSource, sink: TrackSink): void {
  let draft: TrackPointDraft | undefined;
  let field: FieldUpdate | undefined;

  for (;;) {
    const event = source.next();

    switch (event.type) {
      case 'start':
        if (event.name === SEGMENT_ELEMENT) {
          sink.segmentStart();
        } else if (event.name === POINT_ELEMENT) {
          draft = startTrackPoint(event.attributes);
          field = undefined;
        } else if (draft !== undefined) {
          // Unknown children leave the field unbound, so their text is dropped
          field = findFieldHandler(event.name);
        }
        break;

      case 'end':
        if (event.name === SEGMENT_ELEMENT) {
          sink.segmentEnd();
        } else if (event.name === POINT_ELEMENT && draft !== undefined) {
          sink.point(finishTrackPoint(draft));
          draft = undefined;
        }
        field = undefined;
        break;

      case 'text':
        if (draft !== undefined && field !== undefined) {
          field(draft, event.text);
        }
        break;

      case 'eof':
        return;
    }
  }
}

// ─── Sinks ──────────────────────────────────────────────────────────────────

/**
 * Topology-aware sink. A point only lands in a segment while a <trkseg> is
 * open; points outside every segment are dropped here (the flat sink keeps
 * them). Empty segments are never materialized.
 *
 * Nested <trkseg> (invalid GPX) restarts the buffer on every start and
 * flushes it on every end, so points after an inner </trkseg> become their
 * own segment when the outer one closes.
 */
class SegmentSink implements TrackSink {
  readonly segments: TrackSegment[] = [];
  droppedPoints = 0;
  emptySegments = 0;
  private depth = 0;
  private buffer: TrackPoint[] | undefined;

  segmentStart(): void {
    this.depth++;
    this.buffer = [];
  }

  segmentEnd(): void {
    if (this.depth === 0 || this.buffer === undefined) return;
    this.depth--;
    if (this.buffer.length > 0) {
      this.segments.push({ points: this.buffer });
    } else {
      this.emptySegments++;
    }
    this.buffer = this.depth > 0 ? [] : undefined;
  }

  point(point: TrackPoint): void {
    if (this.buffer === undefined) {
      this.droppedPoints++;
      return;
    }
    this.buffer.push(point);
  }
}

class FlatSink implements TrackSink {
  readonly points: TrackPoint[] = [];

  segmentStart(): void {}

  segmentEnd(): void {}

  point(point: TrackPoint): void {
    this.points.push(point);
  }
}

// ─── Public entry points ────────────────────────────────────────────────────

function resolveOptions(options: Partial<ParseOptions>): ParseOptions {
  const resolved = { ...DEFAULT_PARSE_OPTIONS, ...options };
  if (!Number.isInteger(resolved.chunkSize) || resolved.chunkSize <= 0) {
    throw new GpxError('input', `chunkSize must be a positive integer, got ${resolved.chunkSize}`);
  }
  return resolved;
}

function parseWith(input: TrackInput, chunkSize: number, sink: TrackSink): void {
  const source = new SaxesEventSource(toChunks(input, chunkSize));
  try {
    runStateMachine(source, sink);
  } catch (err) {
    throw toGpxError(err);
  } finally {
    source.close();
  }
}

function logTrack(sink: SegmentSink): void {
  const pointCount = sink.segments.reduce((sum, s) => sum + s.points.length, 0);
  console.log(`[GPX] Parsed ${pointCount} trackpoints in ${sink.segments.length} segment(s)`);
  if (sink.droppedPoints > 0) {
    console.warn(`[GPX] Dropped ${sink.droppedPoints} trackpoint(s) outside any <trkseg>`);
  }
  if (sink.emptySegments > 0) {
    console.warn(`[GPX] Discarded ${sink.emptySegments} empty <trkseg> element(s)`);
  }
}

/**
 * Parse a GPX document into segments of points. A whole-document string or
 * byte array is fed to the tokenizer in `chunkSize` pieces.
 *
 * @throws {GpxError} `format` on malformed markup, `data` on an invalid
 *   point, `input` when the chunk source fails. Nothing partial is returned.
 */
export function parseTrack(input: TrackInput, options: Partial<ParseOptions> = {}): Track {
  const { chunkSize, verbose } = resolveOptions(options);
  const sink = new SegmentSink();
  parseWith(input, chunkSize, sink);
  if (verbose) logTrack(sink);
  return { segments: sink.segments };
}

/**
 * Parse every trackpoint in document order, ignoring segment boundaries.
 * Points outside any <trkseg> are kept.
 *
 * @throws {GpxError} same conditions as {@link parseTrack}
 */
export function parseTrackPoints(input: TrackInput, options: Partial<ParseOptions> = {}): TrackPoint[] {
  const { chunkSize, verbose } = resolveOptions(options);
  const sink = new FlatSink();
  parseWith(input, chunkSize, sink);
  if (verbose) console.log(`[GPX] Parsed ${sink.points.length} trackpoints`);
  return sink.points;
}

/** {@link parseTrack} over a file, read in `chunkSize` blocks. */
export function parseTrackFile(path: string, options: Partial<ParseOptions> = {}): Track {
  const resolved = resolveOptions(options);
  return parseTrack(readFileChunks(path, resolved.chunkSize), resolved);
}

/** {@link parseTrackPoints} over a file, read in `chunkSize` blocks. */
export function parseTrackPointsFile(path: string, options: Partial<ParseOptions> = {}): TrackPoint[] {
  const resolved = resolveOptions(options);
  return parseTrackPoints(readFileChunks(path, resolved.chunkSize), resolved);
}
