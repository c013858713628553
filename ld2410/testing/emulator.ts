/**
 * In-process LD2410 emulator for tests.
 *
 * Replies are fed back synchronously from inside `write`, so a test only
 * needs to await the client call.
 */

import { PayloadReader, PayloadWriter } from "../protocol/codec.js";
import {
  CommandCode,
  decodeFrame,
  encodeFrame,
  LightControl,
  OutPinLevel,
  ReplyStatus,
  ReportType,
  ResolutionIndex,
  type FirmwareVersion,
  type LightControlConfig,
  type ParametersStatus,
  type ReportStatus,
} from "../protocol/index.js";
import type { TransportFactory } from "../transport.js";
import { FakeTransport } from "./fake-transport.js";

const PROTOCOL_VERSION = 1;
const BUFFER_SIZE = 64;

export interface EmulatorState {
  configuring: boolean;
  engineering: boolean;
  bluetooth: boolean;
  baudRateIndex: number;
  password: string;
  /** Raw index, may hold values the client does not know */
  resolution: number;
  parameters: ParametersStatus;
  lightControl: LightControlConfig;
  firmware: FirmwareVersion;
  bluetoothAddress: Buffer;
}

export function factoryState(): EmulatorState {
  return {
    configuring: false,
    engineering: false,
    bluetooth: true,
    baudRateIndex: 7,
    password: "HiLink",
    resolution: ResolutionIndex.RESOLUTION_75CM,
    parameters: {
      maxDistanceGate: 8,
      movingMaxDistanceGate: 8,
      staticMaxDistanceGate: 8,
      movingThreshold: [50, 50, 40, 30, 20, 15, 15, 15, 15],
      staticThreshold: [0, 0, 40, 40, 30, 30, 20, 20, 20],
      presenceTimeout: 5,
    },
    lightControl: { control: LightControl.DISABLED, threshold: 128, default: OutPinLevel.LOW },
    firmware: { type: 0x0000, major: 1, minor: 2, revision: 0x22062416 },
    bluetoothAddress: Buffer.from([0x8f, 0x27, 0x2e, 0xb8, 0x0f, 0x65]),
  };
}

/**
 * Encode a report body the way the device sends it.
 */
export function encodeReport(report: ReportStatus): Buffer {
  const { basic, engineering } = report;
  const writer = new PayloadWriter()
    .u8(engineering ? ReportType.ENGINEERING : ReportType.BASIC)
    .u8(0xaa)
    .u8(basic.targetStatus)
    .u16(basic.movingDistance)
    .u8(basic.movingEnergy)
    .u16(basic.staticDistance)
    .u8(basic.staticEnergy)
    .u16(basic.detectionDistance);

  if (engineering) {
    writer
      .u8(engineering.movingMaxDistanceGate)
      .u8(engineering.staticMaxDistanceGate)
      .bytes(Buffer.from(engineering.movingGateEnergy))
      .bytes(Buffer.from(engineering.staticGateEnergy))
      .u8(engineering.photosensitiveValue)
      .u8(engineering.outPinStatus);
  }
  return writer.u8(0x55).u8(0x00).build();
}

export function encodeReply(code: number, status: number, payload: Uint8Array = Buffer.alloc(0)): Buffer {
  return encodeFrame("command", new PayloadWriter().u8(code).u8(0x01).u16(status).bytes(payload).build());
}

type Handler = (args: PayloadReader) => Buffer;

export class DeviceEmulator {
  readonly transport = new FakeTransport();
  readonly state: EmulatorState = factoryState();
  /** Opcodes in the order they were received */
  readonly received: number[] = [];

  private readonly failures = new Map<number, number>();
  private readonly ignored = new Set<number>();
  private readonly spurious = new Map<number, number>();
  private hangupAfter: number | null = null;
  private readonly handlers: ReadonlyMap<number, Handler>;

  /** Hands out the emulator's transport, whatever the device path */
  readonly open: TransportFactory = async () => this.transport;

  constructor() {
    this.transport.onWrite = (data) => this.handle(data);
    this.handlers = new Map<number, Handler>([
      [CommandCode.CONFIG_ENABLE, () => new PayloadWriter().u16(PROTOCOL_VERSION).u16(BUFFER_SIZE).build()],
      [CommandCode.CONFIG_DISABLE, () => Buffer.alloc(0)],
      [CommandCode.PARAMETERS_READ, () => this.encodeParameters()],
      [CommandCode.PARAMETERS_WRITE, (args) => this.writeParameters(args)],
      [CommandCode.GATE_SENSITIVITY_SET, (args) => this.writeSensitivity(args)],
      [CommandCode.ENGINEERING_ENABLE, () => this.setEngineering(true)],
      [CommandCode.ENGINEERING_DISABLE, () => this.setEngineering(false)],
      [CommandCode.FIRMWARE_VERSION, () => this.encodeFirmware()],
      [CommandCode.BAUD_RATE_SET, (args) => this.ack(() => (this.state.baudRateIndex = args.u16()))],
      [CommandCode.FACTORY_RESET, () => this.ack(() => this.resetState())],
      [CommandCode.MODULE_RESTART, () => Buffer.alloc(0)],
      [CommandCode.BLUETOOTH_SET, (args) => this.ack(() => (this.state.bluetooth = args.u16() === 1))],
      [CommandCode.BLUETOOTH_MAC_GET, () => Buffer.from(this.state.bluetoothAddress)],
      [CommandCode.BLUETOOTH_PASSWORD_SET, (args) => this.ack(() => (this.state.password = readPassword(args)))],
      [CommandCode.DISTANCE_RESOLUTION_SET, (args) => this.ack(() => (this.state.resolution = args.u16()))],
      [CommandCode.DISTANCE_RESOLUTION_GET, () => new PayloadWriter().u16(this.state.resolution).build()],
      [CommandCode.LIGHT_CONTROL_SET, (args) => this.writeLightControl(args)],
      [CommandCode.LIGHT_CONTROL_GET, () => this.encodeLightControl()],
    ]);
  }

  // ===========================================================================
  // Fault Injection
  // ===========================================================================

  /** Reply to `code` with a failure status */
  failCommand(code: number, status: number = ReplyStatus.FAILURE): this {
    this.failures.set(code, status);
    return this;
  }

  /** Never reply to `code` */
  ignoreCommand(code: number): this {
    this.ignored.add(code);
    return this;
  }

  /** Send a successful reply to `other` before replying to `code` */
  replyWithSpurious(code: number, other: number): this {
    this.spurious.set(code, other);
    return this;
  }

  /** Close the link instead of replying to `code` */
  hangupOn(code: number): this {
    this.hangupAfter = code;
    return this;
  }

  // ===========================================================================
  // Device Output
  // ===========================================================================

  emitReport(report: ReportStatus): void {
    this.sendRaw(encodeFrame("report", encodeReport(report)));
  }

  sendRaw(data: Uint8Array): void {
    this.transport.receive(data);
  }

  // ===========================================================================
  // Command Handling
  // ===========================================================================

  private handle(data: Buffer): void {
    const result = decodeFrame(data);
    if (result.status !== "frame" || result.frame.kind !== "command") return;

    const body = result.frame.body;
    const code = body.readUInt8(0);
    this.received.push(code);

    if (this.hangupAfter === code) {
      this.transport.hangup();
      return;
    }
    if (this.ignored.has(code)) return;

    const other = this.spurious.get(code);
    if (other !== undefined) {
      this.sendRaw(encodeReply(other, ReplyStatus.SUCCESS));
    }

    const failure = this.failures.get(code);
    if (failure !== undefined) {
      this.sendRaw(encodeReply(code, failure));
      return;
    }

    const handler = this.handlers.get(code);
    const allowed = code === CommandCode.CONFIG_ENABLE || this.state.configuring;
    if (!handler || !allowed) {
      this.sendRaw(encodeReply(code, ReplyStatus.FAILURE));
      return;
    }

    const payload = handler(new PayloadReader(body.subarray(2), (message) => new Error(message)));
    this.sendRaw(encodeReply(code, ReplyStatus.SUCCESS, payload));
    this.afterReply(code);
  }

  private afterReply(code: number): void {
    if (code === CommandCode.CONFIG_ENABLE) this.state.configuring = true;
    if (code === CommandCode.CONFIG_DISABLE) this.state.configuring = false;
    if (code === CommandCode.MODULE_RESTART) {
      this.state.configuring = false;
      this.state.engineering = false;
    }
  }

  private ack(update: () => unknown): Buffer {
    update();
    return Buffer.alloc(0);
  }

  private resetState(): void {
    const { configuring, engineering } = this.state;
    Object.assign(this.state, factoryState(), { configuring, engineering });
  }

  private setEngineering(enabled: boolean): Buffer {
    this.state.engineering = enabled;
    return Buffer.alloc(0);
  }

  private encodeParameters(): Buffer {
    const params = this.state.parameters;
    return new PayloadWriter()
      .u8(0xaa)
      .u8(params.maxDistanceGate)
      .u8(params.movingMaxDistanceGate)
      .u8(params.staticMaxDistanceGate)
      .bytes(Buffer.from(params.movingThreshold))
      .bytes(Buffer.from(params.staticThreshold))
      .u16(params.presenceTimeout)
      .build();
  }

  private writeParameters(args: PayloadReader): Buffer {
    const values = readWords(args);
    const params = this.state.parameters;
    params.movingMaxDistanceGate = values.get(0) ?? params.movingMaxDistanceGate;
    params.staticMaxDistanceGate = values.get(1) ?? params.staticMaxDistanceGate;
    params.presenceTimeout = values.get(2) ?? params.presenceTimeout;
    return Buffer.alloc(0);
  }

  private writeSensitivity(args: PayloadReader): Buffer {
    const values = readWords(args);
    const gate = values.get(0) ?? 0;
    const moving = values.get(1) ?? 0;
    const still = values.get(2) ?? 0;
    const params = this.state.parameters;
    const gates = gate === 0xffff ? params.movingThreshold.map((_, index) => index) : [gate];
    for (const index of gates) {
      params.movingThreshold[index] = moving;
      params.staticThreshold[index] = still;
    }
    return Buffer.alloc(0);
  }

  private encodeFirmware(): Buffer {
    const firmware = this.state.firmware;
    const type = Buffer.alloc(2);
    type.writeUInt16BE(firmware.type, 0);
    return new PayloadWriter().bytes(type).u8(firmware.minor).u8(firmware.major).u32(firmware.revision).build();
  }

  private writeLightControl(args: PayloadReader): Buffer {
    const control = args.u8();
    const threshold = args.u8();
    const level = args.u16();
    const modes = [LightControl.DISABLED, LightControl.BELOW, LightControl.ABOVE];
    this.state.lightControl = {
      control: modes.find((mode) => mode === control) ?? LightControl.DISABLED,
      threshold,
      default: level === OutPinLevel.HIGH ? OutPinLevel.HIGH : OutPinLevel.LOW,
    };
    return Buffer.alloc(0);
  }

  private encodeLightControl(): Buffer {
    const config = this.state.lightControl;
    return new PayloadWriter().u8(config.control).u8(config.threshold).u16(config.default).build();
  }
}

/** Read `u16 key, u32 value` pairs */
function readWords(args: PayloadReader): Map<number, number> {
  const values = new Map<number, number>();
  while (args.remaining >= 6) {
    values.set(args.u16(), args.u32());
  }
  return values;
}

function readPassword(args: PayloadReader): string {
  return args.bytes(args.remaining).toString("ascii").replace(/\0+$/, "");
}
