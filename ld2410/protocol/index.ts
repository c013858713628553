/**
 * LD2410 protocol module - frame codec, reassembly and payload layouts.
 */

export * from "./types.js";
export {
  encodeFrame,
  decodeFrame,
  readFrameHeader,
  findFrameHeader,
  FRAME_MIN_SIZE,
  FRAME_HEADER_COMMAND,
  FRAME_FOOTER_COMMAND,
  FRAME_HEADER_REPORT,
  FRAME_FOOTER_REPORT,
} from "./frame.js";
export { FrameStream } from "./stream.js";
export { buildCommand, parseReply, findCommand, validateReplyPayload, COMMANDS } from "./command.js";
export type { CommandSpec, AnyCommandSpec } from "./command.js";
export { parseReport } from "./report.js";
