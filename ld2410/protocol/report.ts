/**
 * Report payload decoding.
 */

import { ReportFormatError } from "../errors.js";
import { PayloadReader } from "./codec.js";
import { OutPinLevel, ReportType, type ReportBasicStatus, type ReportEngineeringStatus, type ReportStatus } from "./types.js";

const REPORT_HEAD = 0xaa;
const REPORT_TAIL = 0x55;
const REPORT_CALIBRATION = 0x00;
const GATES = 9;

const reportError = (message: string) => new ReportFormatError(message);

function readBasic(reader: PayloadReader): ReportBasicStatus {
  return {
    targetStatus: reader.u8(),
    movingDistance: reader.u16(),
    movingEnergy: reader.u8(),
    staticDistance: reader.u16(),
    staticEnergy: reader.u8(),
    detectionDistance: reader.u16(),
  };
}

function readEngineering(reader: PayloadReader): ReportEngineeringStatus {
  const movingMaxDistanceGate = reader.u8();
  const staticMaxDistanceGate = reader.u8();
  const movingGateEnergy = reader.array(GATES);
  const staticGateEnergy = reader.array(GATES);
  const photosensitiveValue = reader.u8();
  const outPin = reader.u8();
  return {
    movingMaxDistanceGate,
    staticMaxDistanceGate,
    movingGateEnergy,
    staticGateEnergy,
    photosensitiveValue,
    outPinStatus: outPin === OutPinLevel.HIGH ? OutPinLevel.HIGH : OutPinLevel.LOW,
  };
}

/**
 * Decode the body of a report-class frame.
 */
export function parseReport(body: Buffer): ReportStatus {
  const reader = new PayloadReader(body, reportError);
  const type = reader.u8();
  if (type !== ReportType.BASIC && type !== ReportType.ENGINEERING) {
    throw new ReportFormatError(`Unknown report type: ${type}`);
  }

  reader.expect(REPORT_HEAD, "report head");
  const basic = readBasic(reader);
  const engineering = type === ReportType.ENGINEERING ? readEngineering(reader) : null;
  reader.expect(REPORT_TAIL, "report tail");
  reader.expect(REPORT_CALIBRATION, "report calibration");

  if (reader.remaining !== 0) {
    throw new ReportFormatError(`Unexpected ${reader.remaining} trailing byte(s) in report`);
  }
  return { basic, engineering };
}
