/**
 * Command envelope and per-opcode payload layouts.
 *
 * The connection only needs `buildCommand` and `parseReply`. The catalog maps
 * each opcode to its request encoder and reply decoder.
 */

import { ReplyFormatError } from "../errors.js";
import { MAX_PASSWORD_LENGTH } from "../lib.js";
import { PayloadReader, PayloadWriter } from "./codec.js";
import {
  CommandCode,
  LightControl,
  OutPinLevel,
  ReplyStatus,
  ResolutionIndex,
  type ConfigModeStatus,
  type FirmwareVersion,
  type GateSensitivityConfig,
  type LightControlConfig,
  type ParametersConfig,
  type ParametersStatus,
  type Reply,
} from "./types.js";

/** Second byte of every inbound reply body */
const REPLY_MARKER = 0x01;
/** Second byte of every outbound command body */
const COMMAND_RESERVED = 0x00;
const PARAMETERS_HEADER = 0xaa;
const MAC_ADDRESS_LENGTH = 6;
const GATES = 9;

const replyError = (message: string) => new ReplyFormatError(message);

// =============================================================================
// Envelope
// =============================================================================

/**
 * Build a command body: opcode, reserved zero byte, opcode payload.
 */
export function buildCommand(code: number, payload: Uint8Array = Buffer.alloc(0)): Buffer {
  return Buffer.concat([Buffer.from([code, COMMAND_RESERVED]), payload]);
}

/**
 * Parse the envelope of a reply body. The payload is only kept on success.
 */
export function parseReply(body: Buffer): Reply {
  const reader = new PayloadReader(body, replyError);
  const code = reader.u8();
  reader.expect(REPLY_MARKER, "reply marker");
  const status = reader.u16();
  const payload = status === ReplyStatus.SUCCESS ? reader.bytes(reader.remaining) : Buffer.alloc(0);
  return { code, status, payload };
}

// =============================================================================
// Catalog
// =============================================================================

export interface CommandSpec<TArgs, TResult> {
  readonly code: CommandCode;
  encode(args: TArgs): Buffer;
  decode(payload: Buffer): TResult;
}

export type AnyCommandSpec = CommandSpec<never, unknown>;

function defineCommand<TArgs = void, TResult = void>(
  code: CommandCode,
  encode: (args: TArgs) => Buffer,
  decode: (payload: Buffer) => TResult
): CommandSpec<TArgs, TResult> {
  return { code, encode, decode };
}

const noPayload = (): Buffer => Buffer.alloc(0);
const ignorePayload = (): void => undefined;
const wordOne = (): Buffer => new PayloadWriter().u16(1).build();

function isEnumValue<E extends number>(values: Record<string, string | number>, value: number): value is E {
  return typeof values[value] === "string";
}

function readEnum<E extends number>(values: Record<string, string | number>, value: number, what: string): E {
  if (!isEnumValue<E>(values, value)) {
    throw new ReplyFormatError(`Unknown ${what}: ${value}`);
  }
  return value;
}

function encodeParameters(params: ParametersConfig): Buffer {
  return new PayloadWriter()
    .u16(0)
    .u32(params.movingMaxDistanceGate)
    .u16(1)
    .u32(params.staticMaxDistanceGate)
    .u16(2)
    .u32(params.presenceTimeout)
    .build();
}

function decodeParameters(payload: Buffer): ParametersStatus {
  const reader = new PayloadReader(payload, replyError);
  reader.expect(PARAMETERS_HEADER, "parameters header");
  return {
    maxDistanceGate: reader.u8(),
    movingMaxDistanceGate: reader.u8(),
    staticMaxDistanceGate: reader.u8(),
    movingThreshold: reader.array(GATES),
    staticThreshold: reader.array(GATES),
    presenceTimeout: reader.u16(),
  };
}

function encodeGateSensitivity(config: GateSensitivityConfig): Buffer {
  return new PayloadWriter()
    .u16(0)
    .u32(config.distanceGate)
    .u16(1)
    .u32(config.movingThreshold)
    .u16(2)
    .u32(config.staticThreshold)
    .build();
}

function decodeFirmwareVersion(payload: Buffer): FirmwareVersion {
  const reader = new PayloadReader(payload, replyError);
  const type = reader.u16be();
  const minor = reader.u8();
  const major = reader.u8();
  return { type, major, minor, revision: reader.u32() };
}

function encodePassword(password: string): Buffer {
  const out = Buffer.alloc(MAX_PASSWORD_LENGTH, 0);
  Buffer.from(password, "ascii").copy(out, 0, 0, MAX_PASSWORD_LENGTH);
  return out;
}

function encodeLightControl(config: LightControlConfig): Buffer {
  return new PayloadWriter().u8(config.control).u8(config.threshold).u16(config.default).build();
}

function decodeLightControl(payload: Buffer): LightControlConfig {
  const reader = new PayloadReader(payload, replyError);
  return {
    control: readEnum<LightControl>(LightControl, reader.u8(), "light control"),
    threshold: reader.u8(),
    default: readEnum<OutPinLevel>(OutPinLevel, reader.u16(), "OUT pin level"),
  };
}

function decodeConfigMode(payload: Buffer): ConfigModeStatus {
  const reader = new PayloadReader(payload, replyError);
  return { protocolVersion: reader.u16(), bufferSize: reader.u16() };
}

export const COMMANDS = {
  parametersWrite: defineCommand<ParametersConfig>(CommandCode.PARAMETERS_WRITE, encodeParameters, ignorePayload),
  parametersRead: defineCommand<void, ParametersStatus>(CommandCode.PARAMETERS_READ, noPayload, decodeParameters),
  engineeringEnable: defineCommand(CommandCode.ENGINEERING_ENABLE, noPayload, ignorePayload),
  engineeringDisable: defineCommand(CommandCode.ENGINEERING_DISABLE, noPayload, ignorePayload),
  gateSensitivitySet: defineCommand<GateSensitivityConfig>(
    CommandCode.GATE_SENSITIVITY_SET,
    encodeGateSensitivity,
    ignorePayload
  ),
  firmwareVersion: defineCommand<void, FirmwareVersion>(CommandCode.FIRMWARE_VERSION, noPayload, decodeFirmwareVersion),
  baudRateSet: defineCommand<number>(
    CommandCode.BAUD_RATE_SET,
    (index) => new PayloadWriter().u16(index).build(),
    ignorePayload
  ),
  factoryReset: defineCommand(CommandCode.FACTORY_RESET, noPayload, ignorePayload),
  moduleRestart: defineCommand(CommandCode.MODULE_RESTART, noPayload, ignorePayload),
  bluetoothSet: defineCommand<boolean>(
    CommandCode.BLUETOOTH_SET,
    (enabled) => new PayloadWriter().u16(enabled ? 1 : 0).build(),
    ignorePayload
  ),
  bluetoothMacGet: defineCommand<void, Buffer>(CommandCode.BLUETOOTH_MAC_GET, wordOne, (payload) =>
    new PayloadReader(payload, replyError).bytes(MAC_ADDRESS_LENGTH)
  ),
  bluetoothPasswordSet: defineCommand<string>(CommandCode.BLUETOOTH_PASSWORD_SET, encodePassword, ignorePayload),
  distanceResolutionSet: defineCommand<ResolutionIndex>(
    CommandCode.DISTANCE_RESOLUTION_SET,
    (index) => new PayloadWriter().u16(index).build(),
    ignorePayload
  ),
  distanceResolutionGet: defineCommand<void, number>(CommandCode.DISTANCE_RESOLUTION_GET, noPayload, (payload) =>
    new PayloadReader(payload, replyError).u16()
  ),
  lightControlSet: defineCommand<LightControlConfig>(CommandCode.LIGHT_CONTROL_SET, encodeLightControl, ignorePayload),
  lightControlGet: defineCommand<void, LightControlConfig>(CommandCode.LIGHT_CONTROL_GET, noPayload, decodeLightControl),
  configDisable: defineCommand(CommandCode.CONFIG_DISABLE, noPayload, ignorePayload),
  configEnable: defineCommand<void, ConfigModeStatus>(CommandCode.CONFIG_ENABLE, wordOne, decodeConfigMode),
} as const;

const REGISTRY: ReadonlyMap<number, AnyCommandSpec> = new Map(
  Object.values(COMMANDS).map((command): [number, AnyCommandSpec] => [command.code, command])
);

export function findCommand(code: number): AnyCommandSpec | undefined {
  return REGISTRY.get(code);
}

/**
 * Check a successful reply payload against its opcode layout.
 * Throws `ReplyFormatError` on mismatch; unknown opcodes pass through.
 */
export function validateReplyPayload(reply: Reply): void {
  if (reply.status !== ReplyStatus.SUCCESS) return;
  findCommand(reply.code)?.decode(reply.payload);
}
