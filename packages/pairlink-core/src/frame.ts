// Frame codec for tagged messages.
//
// Stream transports carry each message as
//
//   u32le(tagByteLength) ++ utf8(tag) ++ u32le(payloadByteLength) ++ payload
//
// with no magic number, checksum or version byte. Message-oriented transports
// already delimit messages, so they carry the tag and payload as two parts
// without length prefixes.

import { LinkError } from "./link_error.ts";

/** A tagged message with an optional binary payload. */
export interface Message {
  readonly tag: string;
  /** Absent and zero-length payloads are equivalent on the wire. */
  readonly payload?: Uint8Array;
}

/** Bytes taken by each length prefix. */
export const LENGTH_PREFIX_SIZE = 4;

/** Default upper bound for a single encoded frame (64 MiB). */
export const DEFAULT_MAX_FRAME_SIZE = 64 * 1024 * 1024;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/** Build a frozen message. A zero-length payload is normalized to absent. */
export function createMessage(tag: string, payload?: Uint8Array): Message {
  if (typeof tag !== "string") {
    throw new TypeError("message tag must be a string");
  }
  if (payload === undefined || payload.length === 0) {
    return Object.freeze({ tag });
  }
  return Object.freeze({ tag, payload });
}

/** Total size of the frame that `encodeFrame` would produce. */
export function frameSize(tagByteLength: number, payloadByteLength: number): number {
  return LENGTH_PREFIX_SIZE + tagByteLength + LENGTH_PREFIX_SIZE + payloadByteLength;
}

/**
 * Encode a message as one length-prefixed frame.
 *
 * Throws a framing LinkError when the frame would exceed `maxFrameSize`.
 */
export function encodeFrame(
  message: Message,
  maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE,
): Uint8Array {
  const tagBytes = textEncoder.encode(message.tag);
  const payload = message.payload ?? new Uint8Array(0);
  const size = frameSize(tagBytes.length, payload.length);
  if (size > maxFrameSize) {
    throw LinkError.framing(`frame of ${size} bytes exceeds maximum of ${maxFrameSize}`);
  }

  const out = new Uint8Array(size);
  const view = new DataView(out.buffer);
  let offset = 0;
  view.setUint32(offset, tagBytes.length, true);
  offset += LENGTH_PREFIX_SIZE;
  out.set(tagBytes, offset);
  offset += tagBytes.length;
  view.setUint32(offset, payload.length, true);
  offset += LENGTH_PREFIX_SIZE;
  out.set(payload, offset);
  return out;
}

/** Result of a decode attempt against a possibly partial buffer. */
export type DecodeFrameResult =
  | { kind: "frame"; message: Message; consumed: number }
  | { kind: "incomplete" };

const INCOMPLETE: DecodeFrameResult = { kind: "incomplete" };

function readU32(buf: Uint8Array, offset: number): number {
  return new DataView(buf.buffer, buf.byteOffset + offset, LENGTH_PREFIX_SIZE).getUint32(0, true);
}

/**
 * Decode one frame starting at `offset`.
 *
 * Returns `incomplete` until the whole frame is present; otherwise the message
 * and the number of bytes it occupied. Each declared length is checked against
 * `maxFrameSize` as soon as its prefix arrives, so a corrupt prefix fails fast
 * instead of waiting for bytes that will never come.
 */
export function decodeFrame(
  buf: Uint8Array,
  offset = 0,
  maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE,
): DecodeFrameResult {
  const available = buf.length - offset;
  if (available < LENGTH_PREFIX_SIZE) return INCOMPLETE;

  const tagLength = readU32(buf, offset);
  if (frameSize(tagLength, 0) > maxFrameSize) {
    throw LinkError.framing(`declared tag length ${tagLength} exceeds maximum frame size`);
  }
  const payloadLengthAt = LENGTH_PREFIX_SIZE + tagLength;
  if (available < payloadLengthAt + LENGTH_PREFIX_SIZE) return INCOMPLETE;

  const payloadLength = readU32(buf, offset + payloadLengthAt);
  const size = frameSize(tagLength, payloadLength);
  if (size > maxFrameSize) {
    throw LinkError.framing(`declared frame size ${size} exceeds maximum of ${maxFrameSize}`);
  }
  if (available < size) return INCOMPLETE;

  const tag = decodeTag(buf.subarray(offset + LENGTH_PREFIX_SIZE, offset + payloadLengthAt));
  const payloadStart = offset + payloadLengthAt + LENGTH_PREFIX_SIZE;
  // Copy so the message does not pin the (possibly much larger) read buffer.
  const payload =
    payloadLength > 0
      ? new Uint8Array(buf.subarray(payloadStart, payloadStart + payloadLength))
      : undefined;

  return { kind: "frame", message: createMessage(tag, payload), consumed: size };
}

function decodeTag(bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch {
    throw LinkError.framing("message tag is not valid UTF-8");
  }
}

/**
 * Incremental reassembly of frames from a byte stream.
 *
 * Feed it chunks as they arrive; every frame a chunk completes is handed to
 * `onMessage` in order. A framing error is thrown after the frames preceding
 * the bad one were delivered, and from then on every push throws it again: the
 * format has no sync marker, so there is no safe place to resume.
 *
 * Chunks are kept as a list until the pending frame's next prefix, or the
 * frame itself, is complete, so each byte is copied a bounded number of times
 * however finely the frame was split.
 */
export class FrameAssembler {
  private chunks: Uint8Array[] = [];
  private total = 0;
  /** Bytes needed before decoding the pending frame can make progress. */
  private needed = LENGTH_PREFIX_SIZE;
  private failed: LinkError | null = null;

  constructor(private readonly maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE) {}

  /** Bytes received but not yet part of a complete frame. */
  get buffered(): number {
    return this.total;
  }

  push(chunk: Uint8Array, onMessage: (message: Message) => void): void {
    if (this.failed) throw this.failed;
    if (chunk.length === 0) return;

    this.chunks.push(chunk);
    this.total += chunk.length;
    if (this.total < this.needed) return;

    const buf = this.chunks.length === 1 ? chunk : concatChunks(this.chunks, this.total);
    let offset = 0;
    while (true) {
      let result: DecodeFrameResult;
      try {
        result = decodeFrame(buf, offset, this.maxFrameSize);
      } catch (e) {
        this.failed = LinkError.wrap(e, "frame decode failed");
        this.chunks = [];
        this.total = 0;
        throw this.failed;
      }
      if (result.kind === "incomplete") break;
      offset += result.consumed;
      onMessage(result.message);
    }

    if (offset === buf.length) {
      this.chunks = [];
      this.total = 0;
      this.needed = LENGTH_PREFIX_SIZE;
      return;
    }
    const rest = offset === 0 ? buf : new Uint8Array(buf.subarray(offset));
    this.chunks = [rest];
    this.total = rest.length;
    this.needed = pendingFrameNeeds(rest);
  }
}

/** Size `buf` must reach before the frame it starts with can decode further. */
function pendingFrameNeeds(buf: Uint8Array): number {
  if (buf.length < LENGTH_PREFIX_SIZE) return LENGTH_PREFIX_SIZE;
  const tagLength = readU32(buf, 0);
  const payloadLengthAt = LENGTH_PREFIX_SIZE + tagLength;
  if (buf.length < payloadLengthAt + LENGTH_PREFIX_SIZE) return payloadLengthAt + LENGTH_PREFIX_SIZE;
  return frameSize(tagLength, readU32(buf, payloadLengthAt));
}

function concatChunks(chunks: readonly Uint8Array[], total: number): Uint8Array {
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

// ============================================================================
// Message-oriented transports
// ============================================================================

/** A message split into native transport parts: tag text, then payload bytes. */
export type MessageParts = readonly [tag: string, payload: Uint8Array];

export function encodeParts(message: Message): MessageParts {
  return [message.tag, message.payload ?? new Uint8Array(0)];
}

export function decodeParts(tag: string, payload: Uint8Array): Message {
  return createMessage(tag, payload);
}
