/**
 * Byte transports for the LD2410 link.
 */

import { SerialPort } from "serialport";
import { ConnectionClosedError } from "./errors.js";
import { DEFAULT_BAUD_RATE, matchesUsbFilter } from "./lib.js";
import { silentLogger, type Logger } from "./logger.js";

/**
 * Bidirectional byte pipe. `read` resolves with `null` at end of stream.
 */
export interface Transport {
  readonly connected: boolean;
  read(signal?: AbortSignal): Promise<Buffer | null>;
  write(data: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export type TransportFactory = (path: string, baudRate: number) => Promise<Transport>;

interface PendingRead {
  resolve: (chunk: Buffer | null) => void;
  reject: (err: unknown) => void;
}

/**
 * Base for event-driven transports: subclasses `feed` incoming chunks and
 * `end` the stream, `read` hands them out in order.
 */
export abstract class BufferedTransport implements Transport {
  private chunks: Buffer[] = [];
  private pending: PendingRead | null = null;
  private ended = false;
  private failure: unknown = null;

  get connected(): boolean {
    return !this.ended;
  }

  abstract write(data: Uint8Array): Promise<void>;
  abstract close(): Promise<void>;

  read(signal?: AbortSignal): Promise<Buffer | null> {
    const chunk = this.chunks.shift();
    if (chunk) return Promise.resolve(chunk);
    if (this.failure !== null) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);
    if (this.pending) return Promise.reject(new Error("Concurrent read on transport"));
    if (signal?.aborted) return Promise.reject(signal.reason);

    return new Promise<Buffer | null>((resolve, reject) => {
      const pending: PendingRead = { resolve, reject };
      this.pending = pending;
      if (!signal) return;

      const abortSignal = signal;
      const onAbort = () => {
        if (this.pending === pending) this.pending = null;
        reject(abortSignal.reason);
      };
      abortSignal.addEventListener("abort", onAbort, { once: true });
      pending.resolve = (value) => {
        abortSignal.removeEventListener("abort", onAbort);
        resolve(value);
      };
      pending.reject = (err) => {
        abortSignal.removeEventListener("abort", onAbort);
        reject(err);
      };
    });
  }

  protected feed(chunk: Buffer): void {
    if (this.ended || chunk.length === 0) return;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(chunk);
      return;
    }
    this.chunks.push(chunk);
  }

  /**
   * Mark end of stream. With an error, reads fail once buffered data is drained.
   */
  protected end(err?: unknown): void {
    if (this.ended) return;
    this.ended = true;
    if (err !== undefined) this.failure = err;

    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    if (err !== undefined) {
      pending.reject(err);
    } else {
      pending.resolve(null);
    }
  }
}

/**
 * Transport over a `serialport` port. The port's close event is end of stream.
 */
export class SerialTransport extends BufferedTransport {
  private constructor(private readonly port: SerialPort) {
    super();
    port.on("data", (data: Buffer) => this.feed(data));
    port.on("close", () => this.end());
    port.on("error", (err: Error) => this.end(err));
  }

  /**
   * Open a serial port.
   */
  static async open(path: string, baudRate: number = DEFAULT_BAUD_RATE): Promise<SerialTransport> {
    const port = new SerialPort({ path, baudRate, autoOpen: false });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => (err ? reject(err) : resolve()));
    });

    return new SerialTransport(port);
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this.connected) throw new ConnectionClosedError("not connected");

    await new Promise<void>((resolve, reject) => {
      this.port.write(Buffer.from(data), (err) => (err ? reject(err) : resolve()));
    });
    await new Promise<void>((resolve, reject) => {
      this.port.drain((err) => (err ? reject(err) : resolve()));
    });
  }

  async close(): Promise<void> {
    if (!this.port.isOpen) {
      this.end();
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.port.close((err) => (err ? reject(err) : resolve()));
    });
    this.end();
  }
}

export const openSerialTransport: TransportFactory = (path, baudRate) => SerialTransport.open(path, baudRate);

/**
 * Find an LD2410 USB-serial bridge by scanning ports.
 * @param manualPort - Optional manual port path, auto-detects if not provided
 */
export async function findDevice(manualPort?: string, logger: Logger = silentLogger): Promise<string> {
  if (manualPort) return manualPort;

  const ports = await SerialPort.list();

  for (const port of ports) {
    if (matchesUsbFilter(port.vendorId, port.productId)) {
      logger.info(`Found LD2410 bridge: ${port.path} (VID: ${port.vendorId}, PID: ${port.productId})`);
      return port.path;
    }
  }

  for (const port of ports) {
    logger.debug(`Ignoring ${port.path} - ${port.manufacturer ?? "Unknown"} (VID: ${port.vendorId}, PID: ${port.productId})`);
  }

  throw new Error("No LD2410 device found. Connect device or specify --port.");
}

/**
 * List serial ports, flagging the ones that look like an LD2410 bridge.
 */
export async function listPorts(): Promise<{ path: string; manufacturer: string; likely: boolean }[]> {
  const ports = await SerialPort.list();
  return ports.map((port) => ({
    path: port.path,
    manufacturer: port.manufacturer ?? "Unknown",
    likely: matchesUsbFilter(port.vendorId, port.productId),
  }));
}
