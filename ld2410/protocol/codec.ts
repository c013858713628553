// Little-endian payload helpers shared by command and report layouts.

export type FormatErrorFactory = (message: string) => Error;

/**
 * Sequential reader over a payload. Short reads and constant mismatches go
 * through the provided error factory.
 */
export class PayloadReader {
  private offset = 0;

  constructor(
    private readonly data: Buffer,
    private readonly fail: FormatErrorFactory
  ) {}

  get remaining(): number {
    return this.data.length - this.offset;
  }

  u8(): number {
    this.need(1);
    return this.data.readUInt8(this.offset++);
  }

  u16(): number {
    this.need(2);
    const value = this.data.readUInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  u16be(): number {
    this.need(2);
    const value = this.data.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  u32(): number {
    this.need(4);
    const value = this.data.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  bytes(count: number): Buffer {
    this.need(count);
    const value = Buffer.from(this.data.subarray(this.offset, this.offset + count));
    this.offset += count;
    return value;
  }

  array(count: number): number[] {
    return Array.from(this.bytes(count));
  }

  /** Read a constant byte */
  expect(value: number, what: string): void {
    const actual = this.u8();
    if (actual !== value) {
      throw this.fail(`Bad ${what}: expected 0x${value.toString(16)}, got 0x${actual.toString(16)}`);
    }
  }

  private need(count: number): void {
    if (this.remaining < count) {
      throw this.fail(`Payload too short: need ${count} more byte(s) at offset ${this.offset}, have ${this.remaining}`);
    }
  }
}

/**
 * Append-only payload builder.
 */
export class PayloadWriter {
  private readonly parts: Buffer[] = [];

  u8(value: number): this {
    const part = Buffer.alloc(1);
    part.writeUInt8(value, 0);
    this.parts.push(part);
    return this;
  }

  u16(value: number): this {
    const part = Buffer.alloc(2);
    part.writeUInt16LE(value, 0);
    this.parts.push(part);
    return this;
  }

  u32(value: number): this {
    const part = Buffer.alloc(4);
    part.writeUInt32LE(value, 0);
    this.parts.push(part);
    return this;
  }

  bytes(value: Uint8Array): this {
    this.parts.push(Buffer.from(value));
    return this;
  }

  build(): Buffer {
    return Buffer.concat(this.parts);
  }
}
