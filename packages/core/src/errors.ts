/**
 * Two-tier error model.
 *
 * Parser internals throw GpxInternalError, which records the root cause.
 * The public entry points convert it into a GpxError carrying one of three
 * outward kinds. Any failure aborts the whole parse.
 */

export type GpxInternalReason =
  /** The chunk source failed (open/read) */
  | 'io'
  /** The tokenizer rejected the markup */
  | 'xml'
  /** Well-formed markup, invalid point content */
  | 'invalid-track-point';

export type GpxErrorKind = 'input' | 'format' | 'data';

export class GpxInternalError extends Error {
  override name = 'GpxInternalError';

  constructor(
    readonly reason: GpxInternalReason,
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${reason}: ${detail}`, options);
  }
}

const KIND_BY_REASON: Record<GpxInternalReason, GpxErrorKind> = {
  io: 'input',
  xml: 'format',
  'invalid-track-point': 'data',
};

const KIND_LABEL: Record<GpxErrorKind, string> = {
  input: 'invalid input',
  format: 'invalid GPX format',
  data: 'invalid GPX data',
};

export class GpxError extends Error {
  override name = 'GpxError';

  constructor(
    readonly kind: GpxErrorKind,
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${KIND_LABEL[kind]}: ${detail}`, options);
  }

  static fromInternal(err: GpxInternalError): GpxError {
    return new GpxError(KIND_BY_REASON[err.reason], err.detail, { cause: err });
  }
}

export function isGpxError(value: unknown): value is GpxError {
  return value instanceof GpxError;
}

/**
 * Normalize anything thrown during a parse into a GpxError.
 * Errors that did not come from the parser are rethrown untouched.
 */
export function toGpxError(err: unknown): GpxError {
  if (err instanceof GpxError) return err;
  if (err instanceof GpxInternalError) return GpxError.fromInternal(err);
  throw err;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
