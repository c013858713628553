/**
 * Frame reassembly from a continuous serial byte stream.
 */

import { silentLogger, type Logger } from "../logger.js";
import { hex } from "../lib.js";
import { decodeFrame, findFrameHeader, FRAME_MIN_SIZE, readFrameHeader } from "./frame.js";
import type { Frame } from "./types.js";

const INITIAL_CAPACITY = 256;
const MARKER_SIZE = 4;

/**
 * Accumulates raw bytes and yields complete frames.
 *
 * Bytes before the cursor are consumed. Bytes after it hold zero or more frames
 * followed by at most one partial frame or undecodable data. Garbage is only
 * dropped once a header shows up after it.
 */
export class FrameStream implements Iterable<Frame> {
  private buffer = Buffer.alloc(INITIAL_CAPACITY);
  private end = 0;
  private cursor = 0;

  constructor(private readonly logger: Logger = silentLogger) {}

  /** Number of bytes after the read cursor */
  get remaining(): number {
    return this.end - this.cursor;
  }

  /**
   * Append data without moving the read cursor.
   */
  push(data: Uint8Array): number {
    this.reserve(data.length);
    this.buffer.set(data, this.end);
    this.end += data.length;
    return data.length;
  }

  [Symbol.iterator](): Iterator<Frame> {
    return this.frames();
  }

  /**
   * Yield every complete frame from the cursor onward.
   */
  *frames(): Generator<Frame, void, undefined> {
    for (;;) {
      const view = this.buffer.subarray(0, this.end);
      const result = decodeFrame(view, this.cursor);
      if (result.status === "frame") {
        this.cursor += result.consumed;
        yield result.frame;
        continue;
      }

      const remain = this.remaining;
      if (remain < FRAME_MIN_SIZE) {
        if (remain === 0) this.compact();
        return;
      }

      const pos = findFrameHeader(view, this.cursor);
      if (pos < 0) return;

      const skip = pos - this.cursor;
      if (skip > 0) {
        this.logger.warn(`Skipping ${skip} garbage bytes: ${hex(view.subarray(this.cursor, pos))}`);
        this.cursor = pos;
        continue;
      }

      const header = readFrameHeader(view, this.cursor);
      if (header === null || remain < FRAME_MIN_SIZE + header.length) return;

      this.logger.warn(`Skipping corrupted header: ${hex(view.subarray(this.cursor, this.cursor + MARKER_SIZE))}`);
      this.cursor += MARKER_SIZE;
    }
  }

  private reserve(extra: number): void {
    if (this.end + extra <= this.buffer.length) return;

    // Reclaim the consumed prefix before growing.
    if (this.cursor > 0) {
      this.buffer.copy(this.buffer, 0, this.cursor, this.end);
      this.end -= this.cursor;
      this.cursor = 0;
      if (this.end + extra <= this.buffer.length) return;
    }

    let capacity = this.buffer.length;
    while (capacity < this.end + extra) capacity *= 2;
    const grown = Buffer.alloc(capacity);
    this.buffer.copy(grown, 0, 0, this.end);
    this.buffer = grown;
  }

  private compact(): void {
    this.cursor = 0;
    this.end = 0;
  }
}
