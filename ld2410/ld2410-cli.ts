#!/usr/bin/env node
import { Option, program } from "commander";
import { LD2410 } from "./client.js";
import {
  DEFAULT_BAUD_RATE,
  DEFAULT_COMMAND_TIMEOUT_MS,
  formatFirmwareVersion,
  formatMacAddress,
  getErrorMessage,
  parseGate,
  parseInteger,
} from "./lib.js";
import { createConsoleLogger, resolveLogLevel, type Logger } from "./logger.js";
import { TargetStatus, type ParametersStatus, type ReportStatus } from "./protocol/index.js";
import { findDevice, listPorts } from "./transport.js";

// =============================================================================
// Options
// =============================================================================

type GlobalOptions = {
  port?: string;
  baud: number;
  timeout: number;
  verbose?: boolean;
};

interface ReportsOptions {
  count?: number;
  engineering?: boolean;
}

function integerOption(name: string): (value: string) => number {
  return (value) => parseInteger(value, name);
}

function createLogger(options: GlobalOptions): Logger {
  return createConsoleLogger(options.verbose ? "debug" : resolveLogLevel());
}

// =============================================================================
// Device Helpers
// =============================================================================

/**
 * Connect, run `fn`, disconnect.
 */
async function withDevice<T>(fn: (device: LD2410) => Promise<T>): Promise<T> {
  const options = program.opts<GlobalOptions>();
  const logger = createLogger(options);
  const path = await findDevice(options.port, logger);

  const device = new LD2410({
    device: path,
    baudRate: options.baud,
    commandTimeout: options.timeout > 0 ? options.timeout : null,
    logger,
  });
  return device.session(fn);
}

/**
 * Run `fn` in a configuration session of a freshly connected device.
 */
async function withConfiguration<T>(fn: (device: LD2410) => Promise<T>): Promise<T | undefined> {
  return withDevice((device) => device.configure(() => fn(device)));
}

/**
 * Wrap an action so failures end up on stderr with a non-zero exit code.
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args) => {
    try {
      await action(...args);
    } catch (err) {
      console.error(`Error: ${getErrorMessage(err)}`);
      process.exitCode = 1;
    }
  };
}

// =============================================================================
// Formatting
// =============================================================================

function describeTarget(status: number): string {
  const parts: string[] = [];
  if (status & TargetStatus.MOVING) parts.push("moving");
  if (status & TargetStatus.STATIC) parts.push("static");
  return parts.length > 0 ? parts.join("+") : "none";
}

function printReport(report: ReportStatus): void {
  const { basic, engineering } = report;
  console.log(
    `target=${describeTarget(basic.targetStatus)}` +
      ` moving=${basic.movingDistance}cm/${basic.movingEnergy}%` +
      ` static=${basic.staticDistance}cm/${basic.staticEnergy}%` +
      ` detection=${basic.detectionDistance}cm`
  );
  if (engineering) {
    console.log(`  moving gates: ${engineering.movingGateEnergy.join(" ")}`);
    console.log(`  static gates: ${engineering.staticGateEnergy.join(" ")}`);
    console.log(`  light: ${engineering.photosensitiveValue} out: ${engineering.outPinStatus}`);
  }
}

function printParameters(params: ParametersStatus): void {
  console.log(`Max distance gate:        ${params.maxDistanceGate}`);
  console.log(`Moving max distance gate: ${params.movingMaxDistanceGate}`);
  console.log(`Static max distance gate: ${params.staticMaxDistanceGate}`);
  console.log(`Presence timeout:         ${params.presenceTimeout}s`);
  console.log("\nGate  Moving  Static");
  params.movingThreshold.forEach((moving, gate) => {
    const still = params.staticThreshold[gate] ?? 0;
    console.log(`${String(gate).padStart(4)}  ${String(moving).padStart(5)}%  ${String(still).padStart(5)}%`);
  });
}

// =============================================================================
// Commands
// =============================================================================

program
  .name("ld2410-cli")
  .description("Talk to an LD2410 presence radar over a serial port")
  .addOption(new Option("-p, --port <path>", "Serial port path (auto-detect if not specified)").env("LD2410_PORT"))
  .addOption(
    new Option("-b, --baud <rate>", "Serial baud rate")
      .env("LD2410_BAUD")
      .argParser(integerOption("baud rate"))
      .default(DEFAULT_BAUD_RATE)
  )
  .addOption(
    new Option("-t, --timeout <ms>", "Command timeout in milliseconds, 0 to disable")
      .argParser(integerOption("timeout"))
      .default(DEFAULT_COMMAND_TIMEOUT_MS)
  )
  .option("-v, --verbose", "Log frames and protocol details");

program
  .command("ports")
  .description("List serial ports")
  .action(
    run(async () => {
      const ports = await listPorts();
      if (ports.length === 0) {
        console.log("No serial ports found.");
        return;
      }
      for (const port of ports) {
        console.log(`${port.likely ? "*" : " "} ${port.path} - ${port.manufacturer}`);
      }
    })
  );

program
  .command("reports")
  .description("Print presence reports as they arrive")
  .option("-n, --count <n>", "Stop after n reports", integerOption("count"))
  .option("-e, --engineering", "Enable per-gate engineering reports first")
  .action(
    run(async (options: ReportsOptions) => {
      await withDevice(async (device) => {
        if (options.engineering) {
          await device.configure(() => device.setEngineeringMode(true));
        }

        let received = 0;
        for await (const report of device.reports()) {
          printReport(report);
          received++;
          if (options.count !== undefined && received >= options.count) break;
        }
      });
    })
  );

program
  .command("firmware")
  .description("Show firmware version")
  .action(
    run(async () => {
      const version = await withConfiguration((device) => device.getFirmwareVersion());
      if (version) {
        console.log(`Firmware: v${formatFirmwareVersion(version)} (type 0x${version.type.toString(16)})`);
      }
    })
  );

program
  .command("params")
  .description("Show detection parameters and gate thresholds")
  .action(
    run(async () => {
      const params = await withConfiguration((device) => device.getParameters());
      if (params) printParameters(params);
    })
  );

program
  .command("set-params")
  .description("Set max distance gates and presence timeout")
  .argument("<moving>", "Moving max distance gate", integerOption("moving gate"))
  .argument("<static>", "Static max distance gate", integerOption("static gate"))
  .argument("<timeout>", "Presence timeout in seconds", integerOption("presence timeout"))
  .action(
    run(async (moving: number, still: number, timeout: number) => {
      await withConfiguration((device) =>
        device.setParameters({
          movingMaxDistanceGate: moving,
          staticMaxDistanceGate: still,
          presenceTimeout: timeout,
        })
      );
      console.log("Parameters updated.");
    })
  );

program
  .command("set-sensitivity")
  .description("Set moving/static thresholds of a gate")
  .argument("<gate>", 'Gate number (0-8) or "all"', parseGate)
  .argument("<moving>", "Moving threshold in percent", integerOption("moving threshold"))
  .argument("<static>", "Static threshold in percent", integerOption("static threshold"))
  .action(
    run(async (gate: number, moving: number, still: number) => {
      await withConfiguration((device) =>
        device.setGateSensitivity({ distanceGate: gate, movingThreshold: moving, staticThreshold: still })
      );
      console.log("Sensitivity updated.");
    })
  );

program
  .command("resolution")
  .description("Show or set gate distance resolution (restart required)")
  .argument("[cm]", "New resolution: 20 or 75", integerOption("resolution"))
  .action(
    run(async (resolution: number | undefined) => {
      if (resolution === undefined) {
        const current = await withConfiguration((device) => device.getDistanceResolution());
        if (current !== undefined) console.log(`Resolution: ${current}cm`);
        return;
      }
      await withConfiguration((device) => device.setDistanceResolution(resolution));
      console.log(`Resolution set to ${resolution}cm, restart the module to apply.`);
    })
  );

program
  .command("bluetooth-mac")
  .description("Show bluetooth MAC address")
  .action(
    run(async () => {
      const address = await withConfiguration((device) => device.getBluetoothAddress());
      if (address) console.log(`MAC: ${formatMacAddress(address)}`);
    })
  );

program
  .command("factory-reset")
  .description("Restore factory settings and restart the module")
  .action(
    run(async () => {
      await withConfiguration(async (device) => {
        await device.resetToFactory();
        await device.restartModule({ closeConfigContext: true });
      });
      console.log("Factory settings restored, module restarting.");
    })
  );

program
  .command("restart")
  .description("Restart the module")
  .action(
    run(async () => {
      await withConfiguration((device) => device.restartModule({ closeConfigContext: true }));
      console.log("Module restarting.");
    })
  );

await program.parseAsync();
