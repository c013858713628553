/**
 * Error hierarchy.
 *
 * Everything a caller is expected to handle derives from `LD2410Error`.
 * `ModuleRestartedError` deliberately does not: it is a control signal for the
 * configuration scope, not a failure.
 */

/**
 * Base error for all expected faults raised by this library.
 */
export class LD2410Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The serial link is gone, the only way forward is a new connection.
 */
export class ConnectionClosedError extends LD2410Error {}

/**
 * No matching reply arrived before the configured command timeout.
 */
export class CommandTimeoutError extends LD2410Error {
  constructor(
    public readonly code: number,
    public readonly timeout: number
  ) {
    super(`Command 0x${code.toString(16)} timed out after ${timeout}ms`);
  }
}

/** Base error for everything related to commands sent to the device */
export class CommandError extends LD2410Error {}

/** A configuration command was issued outside of a configuration session */
export class CommandContextError extends CommandError {}

/** Command arguments are not suitable for the device */
export class CommandParamError extends CommandError {}

/** The device replied with something we could not understand */
export class CommandReplyError extends CommandError {}

/**
 * The device answered with a failure status.
 */
export class CommandStatusError extends CommandError {
  constructor(
    public readonly code: number,
    public readonly status: number
  ) {
    super(`Command 0x${code.toString(16)} received bad status: ${status}`);
  }
}

/**
 * Raised after a successful MODULE_RESTART when the caller asked to close the
 * surrounding configuration scope. Do not catch it outside of that scope.
 */
export class ModuleRestartedError extends Error {
  public readonly name = "ModuleRestartedError";

  constructor(message = "Module is being restarted") {
    super(message);
  }
}

export function isModuleRestarted(err: unknown): err is ModuleRestartedError {
  return err instanceof ModuleRestartedError;
}

/** Payload of a structurally valid frame does not match its schema */
export class PayloadFormatError extends Error {
  public readonly name: string = "PayloadFormatError";
}

export class ReplyFormatError extends PayloadFormatError {
  public readonly name = "ReplyFormatError";
}

export class ReportFormatError extends PayloadFormatError {
  public readonly name = "ReportFormatError";
}
