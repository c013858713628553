/**
 * In-process transport for tests.
 */

import { ConnectionClosedError } from "../errors.js";
import { BufferedTransport } from "../transport.js";

export class FakeTransport extends BufferedTransport {
  readonly writes: Buffer[] = [];
  closed = false;
  /** Called synchronously with every written chunk */
  onWrite: ((data: Buffer) => void) | null = null;
  /** When set, writes never complete */
  stallWrites = false;

  async write(data: Uint8Array): Promise<void> {
    if (!this.connected) throw new ConnectionClosedError("not connected");
    const chunk = Buffer.from(data);
    this.writes.push(chunk);
    if (this.stallWrites) {
      return new Promise<void>(() => {});
    }
    this.onWrite?.(chunk);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.end();
  }

  /** Bytes coming from the device */
  receive(data: Uint8Array): void {
    this.feed(Buffer.from(data));
  }

  /** The device went away, optionally with a read error */
  hangup(err?: unknown): void {
    this.end(err);
  }
}
