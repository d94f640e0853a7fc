/**
 * Trackpoint child fields.
 *
 * A static, order-searched table from child element name to a pure update
 * applied to the point under construction. Recognizing a new field means
 * appending a row here; the parser loop does not change.
 */

import { GpxInternalError } from './errors.js';

/** Mutable point state between <trkpt> and </trkpt> */
export interface TrackPointDraft {
  lat: number;
  lon: number;
  ele?: number;
  time?: string;
}

export type FieldUpdate = (draft: TrackPointDraft, text: string) => void;

export interface FieldHandler {
  readonly element: string;
  readonly apply: FieldUpdate;
}

const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Strict decimal parse. Unlike parseFloat / Number, rejects empty text,
 * trailing garbage, hex, NaN and Infinity.
 */
export function parseDecimal(text: string): number | undefined {
  const trimmed = text.trim();
  if (!DECIMAL_RE.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

function applyTime(draft: TrackPointDraft, text: string): void {
  draft.time = text;
}

function applyEle(draft: TrackPointDraft, text: string): void {
  const value = parseDecimal(text);
  if (value === undefined) {
    throw new GpxInternalError('invalid-track-point', 'ele is not a number');
  }
  draft.ele = value;
}

export const FIELD_HANDLERS: readonly FieldHandler[] = [
  { element: 'time', apply: applyTime },
  { element: 'ele', apply: applyEle },
];

export function findFieldHandler(element: string): FieldUpdate | undefined {
  return FIELD_HANDLERS.find((h) => h.element === element)?.apply;
}
