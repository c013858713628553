import { afterEach, describe, it, expect, vi } from "vitest";
import { Connection } from "./connection.js";
import { CommandStatusError, CommandTimeoutError, ConnectionClosedError } from "./errors.js";
import { encodeFrame, validateReplyPayload } from "./protocol/index.js";
import { DeviceEmulator, encodeReply, encodeReport } from "./testing/emulator.js";
import { FakeTransport } from "./testing/fake-transport.js";
import { createRecordingLogger } from "./testing/logger.js";

/** Let the pump and pending requests run */
function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

const CONFIG_ENABLE_REQUEST = encodeFrame("command", Buffer.from([0xff, 0x00, 0x01, 0x00]));

describe("Connection", () => {
  let connection: Connection | null = null;

  afterEach(async () => {
    vi.useRealTimers();
    await connection?.close();
    connection = null;
  });

  it("sends a command and returns the matching reply", async () => {
    const emulator = new DeviceEmulator();
    connection = Connection.open(emulator.transport);

    const reply = await connection.request(0xff, Buffer.from([0x01, 0x00]));
    expect(reply).toEqual({ code: 0xff, status: 0, payload: Buffer.from([0x01, 0x00, 0x40, 0x00]) });
    expect(emulator.transport.writes).toEqual([CONFIG_ENABLE_REQUEST]);
  });

  it("keeps one request in flight at a time", async () => {
    const transport = new FakeTransport();
    connection = Connection.open(transport, { commandTimeout: null });

    const first = connection.request(0xa0);
    const second = connection.request(0x61);
    await settle();
    expect(transport.writes).toHaveLength(1);

    transport.receive(encodeReply(0xa0, 0));
    await expect(first).resolves.toMatchObject({ code: 0xa0 });
    await settle();
    expect(transport.writes).toHaveLength(2);

    transport.receive(encodeReply(0x61, 0));
    await expect(second).resolves.toMatchObject({ code: 0x61 });
  });

  it("ignores replies to another opcode", async () => {
    const logger = createRecordingLogger();
    const transport = new FakeTransport();
    connection = Connection.open(transport, { logger, commandTimeout: null });

    const pending = connection.request(0xff);
    await settle();
    transport.receive(encodeReply(0xfe, 0));
    transport.receive(encodeReply(0xff, 0));

    await expect(pending).resolves.toMatchObject({ code: 0xff, status: 0 });
    expect(logger.messages("warn")).toEqual(["Got reply code 0xfe (request was 0xff)"]);
  });

  it("raises on a failure status", async () => {
    const emulator = new DeviceEmulator().failCommand(0xff, 1);
    connection = Connection.open(emulator.transport);

    const err = await connection.request(0xff).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CommandStatusError);
    expect(err).toMatchObject({ code: 0xff, status: 1 });
  });

  it("fails a pending request when the device disconnects", async () => {
    const transport = new FakeTransport();
    connection = Connection.open(transport, { commandTimeout: null });

    const pending = connection.request(0xff);
    await settle();
    transport.hangup();

    await expect(pending).rejects.toThrow(new ConnectionClosedError("device has disconnected"));
    expect(connection.connected).toBe(false);
    await expect(connection.request(0xff)).rejects.toThrow(new ConnectionClosedError("not connected"));
    expect(transport.writes).toHaveLength(1);
  });

  it("marks the connection closed on a read error", async () => {
    const logger = createRecordingLogger();
    const transport = new FakeTransport();
    connection = Connection.open(transport, { logger });

    transport.hangup(new Error("port unplugged"));
    await settle();

    expect(connection.connected).toBe(false);
    expect(logger.messages("error")).toEqual(["Read failed: port unplugged"]);
  });

  it("times out when no reply arrives", async () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    connection = Connection.open(transport, { commandTimeout: 100 });

    const pending = expect(connection.request(0xff)).rejects.toThrow(new CommandTimeoutError(0xff, 100));
    await vi.advanceTimersByTimeAsync(100);
    await pending;

    const next = connection.request(0xfe);
    await vi.advanceTimersByTimeAsync(0);
    transport.receive(encodeReply(0xfe, 0));
    await expect(next).resolves.toMatchObject({ code: 0xfe });
  });

  it("times out a write that never completes", async () => {
    vi.useFakeTimers();
    const transport = new FakeTransport();
    transport.stallWrites = true;
    connection = Connection.open(transport, { commandTimeout: 50 });

    const pending = expect(connection.request(0xa0)).rejects.toThrow("Command 0xa0 timed out after 50ms");
    await vi.advanceTimersByTimeAsync(50);
    await pending;
  });

  it("logs undecodable frames and keeps going", async () => {
    const logger = createRecordingLogger();
    const transport = new FakeTransport();
    connection = Connection.open(transport, { logger, commandTimeout: null });

    const pending = connection.request(0x61);
    await settle();
    transport.receive(encodeFrame("command", Buffer.from([0x61, 0x00, 0x00, 0x00])));
    transport.receive(encodeReply(0x61, 0));

    await expect(pending).resolves.toMatchObject({ code: 0x61 });
    expect(logger.messages("error")).toEqual([
      "Unable to handle frame: 61 00 00 00 (Bad reply marker: expected 0x1, got 0x0)",
    ]);
  });

  it("drops replies rejected by the validation hook", async () => {
    const logger = createRecordingLogger();
    const transport = new FakeTransport();
    connection = Connection.open(transport, { logger, commandTimeout: null, validateReply: validateReplyPayload });

    const pending = connection.request(0xae);
    await settle();
    transport.receive(encodeReply(0xae, 0, Buffer.from([0x09, 0x80, 0x00, 0x00])));
    transport.receive(encodeReply(0xae, 0, Buffer.from([0x01, 0x80, 0x00, 0x00])));

    await expect(pending).resolves.toEqual({ code: 0xae, status: 0, payload: Buffer.from([0x01, 0x80, 0x00, 0x00]) });
    expect(logger.messages("error")).toHaveLength(1);
  });

  it("records reports", async () => {
    const emulator = new DeviceEmulator();
    connection = Connection.open(emulator.transport);
    const report = {
      basic: {
        targetStatus: 1,
        movingDistance: 80,
        movingEnergy: 70,
        staticDistance: 0,
        staticEnergy: 0,
        detectionDistance: 80,
      },
      engineering: null,
    };

    const next = connection.reports.waitNext();
    emulator.emitReport(report);
    await expect(next).resolves.toEqual(report);
    expect(connection.reports.getLatest()).toEqual(report);
  });

  it("routes a report arriving mid-request to the report channel", async () => {
    const transport = new FakeTransport();
    connection = Connection.open(transport, { commandTimeout: null });
    const report = {
      basic: {
        targetStatus: 2,
        movingDistance: 0,
        movingEnergy: 0,
        staticDistance: 120,
        staticEnergy: 45,
        detectionDistance: 120,
      },
      engineering: null,
    };

    const pending = connection.request(0xa0);
    const next = connection.reports.waitNext();
    await settle();
    transport.receive(Buffer.concat([encodeFrame("report", encodeReport(report)), encodeReply(0xa0, 0)]));

    await expect(pending).resolves.toEqual({ code: 0xa0, status: 0, payload: Buffer.alloc(0) });
    await expect(next).resolves.toEqual(report);
  });

  it("closes once", async () => {
    const transport = new FakeTransport();
    const opened = Connection.open(transport);

    await Promise.all([opened.close(), opened.close()]);
    expect(transport.closed).toBe(true);
    expect(opened.connected).toBe(false);
    await expect(opened.request(0xff)).rejects.toThrow(ConnectionClosedError);
  });
});
