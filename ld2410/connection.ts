/**
 * LD2410 connection: frame pump plus request/reply correlation.
 */

import { CommandStatusError, CommandTimeoutError, ConnectionClosedError } from "./errors.js";
import { DEFAULT_COMMAND_TIMEOUT_MS, getErrorMessage, hex } from "./lib.js";
import { silentLogger, type Logger } from "./logger.js";
import { buildCommand, encodeFrame, FrameStream, parseReply, parseReport, ReplyStatus } from "./protocol/index.js";
import type { Frame, Reply, ReportStatus } from "./protocol/index.js";
import { ReportChannel } from "./report-channel.js";
import { AsyncMutex, Mailbox, raceAbort } from "./sync.js";
import type { Transport } from "./transport.js";

const DISCONNECTED = Symbol("disconnected");

export interface ConnectionOptions {
  logger?: Logger;
  /** Milliseconds, `null` waits forever */
  commandTimeout?: number | null;
  /** Extra check on every reply before it is delivered; throwing drops it */
  validateReply?: (reply: Reply) => void;
  reports?: ReportChannel<ReportStatus>;
}

/**
 * An open link to the device.
 *
 * The pump is the only writer of the reply mailbox and of the report channel.
 * One request is in flight at a time.
 */
export class Connection {
  readonly reports: ReportChannel<ReportStatus>;

  private readonly logger: Logger;
  private readonly commandTimeout: number | null;
  private readonly validateReply: ((reply: Reply) => void) | undefined;
  private readonly replies = new Mailbox<Reply | typeof DISCONNECTED>();
  private readonly requestLock = new AsyncMutex();
  private readonly abort = new AbortController();
  private readonly stream: FrameStream;
  private pump: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;
  private _connected = true;

  private constructor(
    private readonly transport: Transport,
    options: ConnectionOptions
  ) {
    this.logger = options.logger ?? silentLogger;
    this.commandTimeout =
      options.commandTimeout === undefined ? DEFAULT_COMMAND_TIMEOUT_MS : options.commandTimeout;
    this.validateReply = options.validateReply;
    this.reports = options.reports ?? new ReportChannel<ReportStatus>();
    this.stream = new FrameStream(this.logger);
  }

  /**
   * Wrap an open transport and start reading from it.
   */
  static open(transport: Transport, options: ConnectionOptions = {}): Connection {
    const connection = new Connection(transport, options);
    connection.pump = connection.run();
    return connection;
  }

  get connected(): boolean {
    return this._connected;
  }

  /**
   * Send a command and wait for the reply with the same opcode.
   */
  async request(code: number, payload: Uint8Array = Buffer.alloc(0)): Promise<Reply> {
    return this.requestLock.runExclusive(() => this.exchange(code, payload));
  }

  /**
   * Stop the pump and close the transport. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.abort.abort(new ConnectionClosedError("connection closed"));
    await this.pump;
    await this.transport.close();
  }

  private async exchange(code: number, payload: Uint8Array): Promise<Reply> {
    if (!this._connected) {
      throw new ConnectionClosedError("not connected");
    }

    const timeout = this.commandTimeout;
    const controller = new AbortController();
    const timer =
      timeout === null
        ? undefined
        : setTimeout(() => controller.abort(new CommandTimeoutError(code, timeout)), timeout);

    try {
      const frame = encodeFrame("command", buildCommand(code, payload));
      this.logger.debug(`>>> ${hex(frame)}`);
      await raceAbort(this.transport.write(frame), controller.signal);

      for (;;) {
        const reply = await this.replies.take(controller.signal);
        if (reply === DISCONNECTED) {
          throw new ConnectionClosedError("device has disconnected");
        }
        if (reply.code !== code) {
          this.logger.warn(`Got reply code 0x${reply.code.toString(16)} (request was 0x${code.toString(16)})`);
          continue;
        }
        if (reply.status !== ReplyStatus.SUCCESS) {
          throw new CommandStatusError(code, reply.status);
        }
        return reply;
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(): Promise<void> {
    const signal = this.abort.signal;
    try {
      for (;;) {
        const chunk = await this.transport.read(signal);
        if (chunk === null) {
          this.logger.info("Device stream ended");
          break;
        }
        this.stream.push(chunk);
        for (const frame of this.stream) {
          this.dispatch(frame);
        }
      }
    } catch (err) {
      if (!signal.aborted) {
        this.logger.error(`Read failed: ${getErrorMessage(err)}`);
      }
    } finally {
      this._connected = false;
      this.replies.put(DISCONNECTED);
    }
  }

  private dispatch(frame: Frame): void {
    try {
      if (frame.kind === "command") {
        const reply = parseReply(frame.body);
        this.validateReply?.(reply);
        this.replies.put(reply);
      } else {
        this.reports.record(parseReport(frame.body));
      }
    } catch (err) {
      this.logger.error(`Unable to handle frame: ${hex(frame.body)} (${getErrorMessage(err)})`);
    }
  }
}
