/**
 * Pull-based XML event source.
 *
 * saxes is a push tokenizer: it calls back for every tag and text node in
 * whatever chunk it is handed. This adapter inverts that into next(),
 * feeding the tokenizer one chunk only when its event queue runs dry, so
 * the parser never holds more than one chunk's worth of events.
 *
 * Events:
 *   start → element opened (self-closing tags produce start + end)
 *   end   → element closed
 *   text  → entity-decoded, trimmed, never whitespace-only (CDATA included)
 *   eof   → input exhausted and the document closed cleanly
 */

import { closeSync, openSync, readSync } from 'node:fs';
import { SaxesParser } from 'saxes';
import type { TrackChunk, TrackInput } from './types.js';
import { GpxInternalError, describeError } from './errors.js';

export type XmlAttributes = Readonly<Record<string, string | undefined>>;

export type XmlEvent =
  | { type: 'start'; name: string; attributes: XmlAttributes }
  | { type: 'end'; name: string }
  | { type: 'text'; text: string }
  | { type: 'eof' };

export interface XmlEventSource {
  next(): XmlEvent;
  /** Release the underlying input. Safe to call more than once. */
  close(): void;
}

const EOF: XmlEvent = { type: 'eof' };

export class SaxesEventSource implements XmlEventSource {
  private readonly tokenizer = new SaxesParser();
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });
  private readonly chunks: Iterator<TrackChunk>;
  // Tokenizer errors are queued in order, so events before the bad markup
  // are still delivered first.
  private readonly queue: Array<XmlEvent | GpxInternalError> = [];
  private exhausted = false;
  private closed = false;

  constructor(input: Iterable<TrackChunk>) {
    this.chunks = input[Symbol.iterator]();

    this.tokenizer.on('opentag', (tag) => {
      this.queue.push({ type: 'start', name: tag.name, attributes: tag.attributes });
    });
    this.tokenizer.on('closetag', (tag) => {
      this.queue.push({ type: 'end', name: tag.name });
    });
    this.tokenizer.on('text', (text) => this.pushText(text));
    this.tokenizer.on('cdata', (cdata) => this.pushText(cdata));
    this.tokenizer.on('error', (err) => {
      this.queue.push(new GpxInternalError('xml', err.message, { cause: err }));
    });
  }

  next(): XmlEvent {
    for (;;) {
      const item = this.queue.shift();
      if (item instanceof GpxInternalError) throw item;
      if (item !== undefined) return item;
      if (this.exhausted) return EOF;
      this.feed();
    }
  }

  /** Events tokenized but not yet pulled */
  get pending(): number {
    return this.queue.length;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.chunks.return?.();
  }

  private pushText(raw: string): void {
    const text = raw.trim();
    if (text.length > 0) this.queue.push({ type: 'text', text });
  }

  private feed(): void {
    let result: IteratorResult<TrackChunk>;
    try {
      result = this.chunks.next();
    } catch (err) {
      throw new GpxInternalError('io', describeError(err), { cause: err });
    }

    if (result.done) {
      this.exhausted = true;
      const tail = this.decode(undefined);
      if (tail.length > 0) this.tokenizer.write(tail);
      this.tokenizer.close();
      return;
    }

    this.tokenizer.write(this.decode(result.value));
  }

  private decode(chunk: TrackChunk | undefined): string {
    if (typeof chunk === 'string') return chunk;
    try {
      return chunk === undefined
        ? this.decoder.decode()
        : this.decoder.decode(chunk, { stream: true });
    } catch (err) {
      throw new GpxInternalError('xml', `input is not valid UTF-8 (${describeError(err)})`, {
        cause: err,
      });
    }
  }
}

/**
 * Slice whole-document inputs into `chunkSize` pieces (UTF-16 code units for
 * strings, bytes for arrays) so the tokenizer never sees more than one piece
 * at a time. Chunk iterables pass through as they are.
 */
export function toChunks(input: TrackInput, chunkSize: number): Iterable<TrackChunk> {
  if (typeof input === 'string') return sliceString(input, chunkSize);
  if (input instanceof Uint8Array) return sliceBytes(input, chunkSize);
  return input;
}

// A surrogate pair split across two slices is carried over by saxes.
function* sliceString(text: string, chunkSize: number): Generator<string, void, undefined> {
  for (let i = 0; i < text.length; i += chunkSize) {
    yield text.slice(i, i + chunkSize);
  }
}

function* sliceBytes(bytes: Uint8Array, chunkSize: number): Generator<Uint8Array, void, undefined> {
  for (let i = 0; i < bytes.length; i += chunkSize) {
    yield bytes.subarray(i, i + chunkSize);
  }
}

/**
 * Read a file in fixed-size chunks with blocking reads.
 * The descriptor is opened on the first pull and closed when iteration
 * completes, throws, or is abandoned through return().
 */
export function* readFileChunks(path: string, chunkSize: number): Generator<Uint8Array, void, undefined> {
  const fd = openSync(path, 'r');
  try {
    for (;;) {
      const buffer = new Uint8Array(chunkSize);
      const bytesRead = readSync(fd, buffer, 0, chunkSize, null);
      if (bytesRead === 0) return;
      yield bytesRead === chunkSize ? buffer : buffer.subarray(0, bytesRead);
    }
  } finally {
    closeSync(fd);
  }
}
