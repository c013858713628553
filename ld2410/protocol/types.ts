/**
 * Protocol types for LD2410 serial communication.
 */

/** Frame family, selected by the 4-byte header */
export type FrameKind = "command" | "report";

/** Decoded frame: the length field is always `body.length` */
export interface Frame {
  kind: FrameKind;
  body: Buffer;
}

/** Outcome of a single decode attempt at a buffer offset */
export type DecodeResult =
  | { status: "frame"; frame: Frame; consumed: number }
  | { status: "incomplete" }
  | { status: "invalid"; reason: string };

/** Known command opcodes */
export enum CommandCode {
  PARAMETERS_WRITE = 0x60,
  PARAMETERS_READ = 0x61,
  ENGINEERING_ENABLE = 0x62,
  ENGINEERING_DISABLE = 0x63,
  GATE_SENSITIVITY_SET = 0x64,
  FIRMWARE_VERSION = 0xa0,
  BAUD_RATE_SET = 0xa1,
  FACTORY_RESET = 0xa2,
  MODULE_RESTART = 0xa3,
  BLUETOOTH_SET = 0xa4,
  BLUETOOTH_MAC_GET = 0xa5,
  BLUETOOTH_PASSWORD_SET = 0xa9,
  DISTANCE_RESOLUTION_SET = 0xaa,
  DISTANCE_RESOLUTION_GET = 0xab,
  LIGHT_CONTROL_SET = 0xad,
  LIGHT_CONTROL_GET = 0xae,
  CONFIG_DISABLE = 0xfe,
  CONFIG_ENABLE = 0xff,
}

/** Reply status word */
export enum ReplyStatus {
  SUCCESS = 0,
  FAILURE = 1,
}

/** Envelope of an inbound command-class frame */
export interface Reply {
  code: number;
  status: number;
  /** Opcode specific data, empty unless status is SUCCESS */
  payload: Buffer;
}

export enum ReportType {
  ENGINEERING = 1,
  BASIC = 2,
}

/** Bit flags in `ReportBasicStatus.targetStatus` */
export enum TargetStatus {
  NONE = 0,
  MOVING = 1,
  STATIC = 2,
}

export enum OutPinLevel {
  LOW = 0,
  HIGH = 1,
}

/** When the OUT pin follows the photo-sensor */
export enum LightControl {
  DISABLED = 0,
  BELOW = 1,
  ABOVE = 2,
}

export enum ResolutionIndex {
  RESOLUTION_75CM = 0x00,
  RESOLUTION_20CM = 0x01,
}

/** Reply to CONFIG_ENABLE */
export interface ConfigModeStatus {
  protocolVersion: number;
  bufferSize: number;
}

export interface FirmwareVersion {
  type: number;
  major: number;
  minor: number;
  revision: number;
}

export interface ParametersConfig {
  /** Furthest gate for moving targets (2-8) */
  movingMaxDistanceGate: number;
  /** Furthest gate for static targets (2-8) */
  staticMaxDistanceGate: number;
  /** Seconds a presence is kept after the target left (0-65535) */
  presenceTimeout: number;
}

export interface ParametersStatus extends ParametersConfig {
  maxDistanceGate: number;
  /** Per-gate moving threshold in percent (9 gates) */
  movingThreshold: number[];
  /** Per-gate static threshold in percent (9 gates) */
  staticThreshold: number[];
}

export interface GateSensitivityConfig {
  /** Gate 0-8, or `ALL_GATES` */
  distanceGate: number;
  movingThreshold: number;
  staticThreshold: number;
}

export interface LightControlConfig {
  control: LightControl;
  /** Photo-sensor threshold (0-255) */
  threshold: number;
  default: OutPinLevel;
}

export interface ReportBasicStatus {
  targetStatus: TargetStatus;
  /** Centimeters */
  movingDistance: number;
  /** Percent */
  movingEnergy: number;
  staticDistance: number;
  staticEnergy: number;
  detectionDistance: number;
}

export interface ReportEngineeringStatus {
  movingMaxDistanceGate: number;
  staticMaxDistanceGate: number;
  movingGateEnergy: number[];
  staticGateEnergy: number[];
  photosensitiveValue: number;
  outPinStatus: OutPinLevel;
}

export interface ReportStatus {
  basic: ReportBasicStatus;
  /** Only present in engineering mode */
  engineering: ReportEngineeringStatus | null;
}
