/**
 * LD2410 frame encoding and decoding.
 *
 * Wire layout: 4-byte header, u16 little-endian length, body, 4-byte footer.
 * The header/footer pair selects the frame kind.
 */

import type { DecodeResult, FrameKind } from "./types.js";

export const FRAME_HEADER_COMMAND = Buffer.from([0xfd, 0xfc, 0xfb, 0xfa]);
export const FRAME_FOOTER_COMMAND = Buffer.from([0x04, 0x03, 0x02, 0x01]);
export const FRAME_HEADER_REPORT = Buffer.from([0xf4, 0xf3, 0xf2, 0xf1]);
export const FRAME_FOOTER_REPORT = Buffer.from([0xf8, 0xf7, 0xf6, 0xf5]);

const MARKER_SIZE = 4;
const LENGTH_SIZE = 2;
const PREAMBLE_SIZE = MARKER_SIZE + LENGTH_SIZE;
const MAX_BODY_LENGTH = 0xffff;

/** Header + length + footer, i.e. a frame with an empty body */
export const FRAME_MIN_SIZE = PREAMBLE_SIZE + MARKER_SIZE;

const MARKERS: Record<FrameKind, { header: Buffer; footer: Buffer }> = {
  command: { header: FRAME_HEADER_COMMAND, footer: FRAME_FOOTER_COMMAND },
  report: { header: FRAME_HEADER_REPORT, footer: FRAME_FOOTER_REPORT },
};

const KINDS: readonly FrameKind[] = ["command", "report"];

function matchesAt(buffer: Buffer, offset: number, marker: Buffer): boolean {
  return buffer.compare(marker, 0, marker.length, offset, offset + marker.length) === 0;
}

function kindAt(buffer: Buffer, offset: number): FrameKind | null {
  for (const kind of KINDS) {
    if (matchesAt(buffer, offset, MARKERS[kind].header)) return kind;
  }
  return null;
}

/** True when the bytes from `offset` could still grow into a known header */
function isHeaderPrefix(buffer: Buffer, offset: number): boolean {
  const tail = buffer.subarray(offset, offset + MARKER_SIZE);
  return KINDS.some((kind) => MARKERS[kind].header.subarray(0, tail.length).equals(tail));
}

/**
 * Encode a frame. The length field always comes from the body itself.
 */
export function encodeFrame(kind: FrameKind, body: Uint8Array): Buffer {
  if (body.length > MAX_BODY_LENGTH) {
    throw new RangeError(`Frame body too long: ${body.length}/${MAX_BODY_LENGTH} bytes`);
  }

  const { header, footer } = MARKERS[kind];
  const length = Buffer.alloc(LENGTH_SIZE);
  length.writeUInt16LE(body.length, 0);
  return Buffer.concat([header, length, body, footer]);
}

/**
 * Peek the header and declared length at `offset`, without requiring the body.
 */
export function readFrameHeader(buffer: Buffer, offset = 0): { kind: FrameKind; length: number } | null {
  if (buffer.length - offset < PREAMBLE_SIZE) return null;
  const kind = kindAt(buffer, offset);
  if (kind === null) return null;
  return { kind, length: buffer.readUInt16LE(offset + MARKER_SIZE) };
}

/**
 * Decode one frame at `offset`.
 */
export function decodeFrame(buffer: Buffer, offset = 0): DecodeResult {
  const available = buffer.length - offset;

  if (available < PREAMBLE_SIZE) {
    return isHeaderPrefix(buffer, offset) ? { status: "incomplete" } : { status: "invalid", reason: "unknown header" };
  }

  const header = readFrameHeader(buffer, offset);
  if (header === null) {
    return { status: "invalid", reason: "unknown header" };
  }

  const total = FRAME_MIN_SIZE + header.length;
  if (available < total) return { status: "incomplete" };

  const bodyStart = offset + PREAMBLE_SIZE;
  const bodyEnd = bodyStart + header.length;
  if (!matchesAt(buffer, bodyEnd, MARKERS[header.kind].footer)) {
    return { status: "invalid", reason: "footer mismatch" };
  }

  return {
    status: "frame",
    frame: { kind: header.kind, body: Buffer.from(buffer.subarray(bodyStart, bodyEnd)) },
    consumed: total,
  };
}

/**
 * Offset of the earliest header of either kind at or after `offset`, or -1.
 */
export function findFrameHeader(buffer: Buffer, offset = 0): number {
  const positions = KINDS.map((kind) => buffer.indexOf(MARKERS[kind].header, offset)).filter((pos) => pos >= 0);
  return positions.length > 0 ? Math.min(...positions) : -1;
}
