/**
 * LD2410 presence radar client.
 */

export { LD2410, SessionState } from "./client.js";
export type { ClientOptions, ConfigureOptions, RestartOptions } from "./client.js";
export { Connection } from "./connection.js";
export type { ConnectionOptions } from "./connection.js";
export * from "./errors.js";
export {
  ALL_GATES,
  BAUD_RATE_INDEX,
  DEFAULT_BAUD_RATE,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DISTANCE_RESOLUTIONS,
  formatFirmwareVersion,
  formatMacAddress,
  type DistanceResolution,
} from "./lib.js";
export { createConsoleLogger, resolveLogLevel, silentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export * from "./protocol/index.js";
export { ReportChannel } from "./report-channel.js";
export { AsyncMutex, Mailbox } from "./sync.js";
export { BufferedTransport, SerialTransport, findDevice, listPorts, openSerialTransport } from "./transport.js";
export type { Transport, TransportFactory } from "./transport.js";
