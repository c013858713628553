/**
 * LD2410 client: connection lifecycle, configuration sessions and commands.
 */

import { Connection } from "./connection.js";
import {
  CommandContextError,
  CommandParamError,
  CommandReplyError,
  CommandStatusError,
  CommandTimeoutError,
  ConnectionClosedError,
  isModuleRestarted,
  ModuleRestartedError,
} from "./errors.js";
import {
  ALL_GATES,
  BAUD_RATE_INDEX,
  DEFAULT_BAUD_RATE,
  DEFAULT_COMMAND_TIMEOUT_MS,
  GATE_COUNT,
  isDistanceResolution,
  MAX_PASSWORD_LENGTH,
  type DistanceResolution,
} from "./lib.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  COMMANDS,
  LightControl,
  OutPinLevel,
  ResolutionIndex,
  validateReplyPayload,
  type CommandSpec,
  type ConfigModeStatus,
  type FirmwareVersion,
  type GateSensitivityConfig,
  type LightControlConfig,
  type ParametersConfig,
  type ParametersStatus,
  type Reply,
  type ReportStatus,
} from "./protocol/index.js";
import { ReportChannel } from "./report-channel.js";
import { AsyncMutex } from "./sync.js";
import { openSerialTransport, type TransportFactory } from "./transport.js";

const U32_MAX = 0xffffffff;
const U8_MAX = 0xff;

export enum SessionState {
  Idle = "idle",
  Configuring = "configuring",
  Restarting = "restarting",
}

export interface ClientOptions {
  /** Serial device path, e.g. /dev/ttyUSB0 */
  device: string;
  baudRate?: number;
  /** Milliseconds per command, `null` disables the timeout */
  commandTimeout?: number | null;
  logger?: Logger;
  /** Opens the byte transport, defaults to the serial port */
  openTransport?: TransportFactory;
}

export interface ConfigureOptions {
  /** Rethrow `ModuleRestartedError` once the session is closed */
  propagateRestart?: boolean;
}

export interface RestartOptions {
  /** Close the surrounding `configure` scope by throwing `ModuleRestartedError` */
  closeConfigContext?: boolean;
}

// =============================================================================
// Validation Helpers
// =============================================================================

function requireInteger(value: unknown, name: string, min: number, max: number): number {
  if (value === undefined || value === null) {
    throw new CommandParamError(`Missing parameter: ${name}`);
  }
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new CommandParamError(`Parameter ${name} must be an integer, got ${String(value)}`);
  }
  if (value < min || value > max) {
    throw new CommandParamError(`Parameter ${name} out of range: ${value} (expected ${min}-${max})`);
  }
  return value;
}

function requireEnum<E extends number>(values: readonly E[], value: unknown, name: string): E {
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new CommandParamError(`Invalid ${name}: ${String(value)}`);
  }
  return match;
}

const LIGHT_CONTROLS = [LightControl.DISABLED, LightControl.BELOW, LightControl.ABOVE] as const;
const OUT_PIN_LEVELS = [OutPinLevel.LOW, OutPinLevel.HIGH] as const;

/**
 * Client of the LD2410 presence radar.
 *
 * Configuration commands are only accepted inside a configuration session,
 * see `configure` or `enterConfiguration`/`exitConfiguration`.
 */
export class LD2410 {
  readonly device: string;
  readonly baudRate: number;

  private readonly commandTimeout: number | null;
  private readonly logger: Logger;
  private readonly openTransport: TransportFactory;
  private readonly configLock = new AsyncMutex();
  private readonly connectLock = new AsyncMutex();
  private readonly reportChannel = new ReportChannel<ReportStatus>();
  private connection: Connection | null = null;
  private releaseConfig: (() => void) | null = null;
  private state = SessionState.Idle;

  constructor(options: ClientOptions) {
    this.device = options.device;
    this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;
    this.commandTimeout = options.commandTimeout === undefined ? DEFAULT_COMMAND_TIMEOUT_MS : options.commandTimeout;
    this.logger = options.logger ?? silentLogger;
    this.openTransport = options.openTransport ?? openSerialTransport;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  get connected(): boolean {
    return this.connection?.connected ?? false;
  }

  /** True only while a configuration session is open and no restart is pending */
  get configuring(): boolean {
    return this.state === SessionState.Configuring;
  }

  get sessionState(): SessionState {
    return this.state;
  }

  /**
   * Open the transport and start the frame pump. Overlapping calls are
   * serialized, so all but the first see the live link and fail.
   */
  async connect(): Promise<void> {
    await this.connectLock.runExclusive(() => this.openConnection());
  }

  private async openConnection(): Promise<void> {
    if (this.connection?.connected) {
      throw new Error("already connected");
    }
    // The previous link died on its own, release it before opening a new one.
    await this.disconnect();

    const transport = await this.openTransport(this.device, this.baudRate);
    this.connection = Connection.open(transport, {
      logger: this.logger,
      commandTimeout: this.commandTimeout,
      validateReply: validateReplyPayload,
      reports: this.reportChannel,
    });
    this.logger.debug(`Connected to ${this.device} at ${this.baudRate} baud`);
  }

  /**
   * Close the connection. `connect` may be called again afterwards.
   */
  async disconnect(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;
    await connection.close();
    this.logger.debug(`Disconnected from ${this.device}`);
  }

  /**
   * Run `fn` with an open connection, always disconnecting afterwards.
   */
  async session<T>(fn: (client: this) => Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await fn(this);
    } finally {
      await this.disconnect();
    }
  }

  /**
   * Send any command without checking the session state.
   */
  async request(code: number, payload?: Uint8Array): Promise<Reply> {
    const connection = this.connection;
    if (!connection) {
      throw new ConnectionClosedError("not connected");
    }
    return connection.request(code, payload);
  }

  // ===========================================================================
  // Configuration Session
  // ===========================================================================

  /**
   * Open a configuration session. Waits while another session is open.
   */
  async enterConfiguration(): Promise<ConfigModeStatus> {
    const release = await this.configLock.acquire();
    try {
      const status = await this.execute(COMMANDS.configEnable, undefined);
      this.releaseConfig = release;
      this.state = SessionState.Configuring;
      return status;
    } catch (err) {
      release();
      throw err;
    }
  }

  /**
   * Close the configuration session. No-op when none is open.
   */
  async exitConfiguration(): Promise<void> {
    const release = this.releaseConfig;
    if (!release) return;
    this.releaseConfig = null;

    try {
      if (this.state === SessionState.Configuring && this.connected) {
        await this.execute(COMMANDS.configDisable, undefined);
      }
    } catch (err) {
      if (!(err instanceof CommandStatusError || err instanceof CommandTimeoutError)) throw err;
      this.logger.warn(`Unable to leave configuration mode: ${err.message}`);
    } finally {
      this.state = SessionState.Idle;
      release();
    }
  }

  /**
   * Run `fn` inside a configuration session.
   *
   * A `ModuleRestartedError` thrown by `fn` closes the session without sending
   * CONFIG_DISABLE; the result is then `undefined`.
   */
  async configure<T>(
    fn: (status: ConfigModeStatus) => Promise<T>,
    options: ConfigureOptions = {}
  ): Promise<T | undefined> {
    const status = await this.enterConfiguration();
    try {
      return await fn(status);
    } catch (err) {
      if (!isModuleRestarted(err)) throw err;
      this.logger.info("Configuration session closed due to module restart");
      if (options.propagateRestart) throw err;
      return undefined;
    } finally {
      await this.exitConfiguration();
    }
  }

  /**
   * Throw `CommandContextError` unless a configuration session is open.
   */
  requireConfiguration(): void {
    if (this.state !== SessionState.Configuring) {
      throw new CommandContextError("This method requires a configuration session");
    }
  }

  // ===========================================================================
  // Configuration Commands
  // ===========================================================================

  async getParameters(): Promise<ParametersStatus> {
    this.requireConfiguration();
    return this.execute(COMMANDS.parametersRead, undefined);
  }

  /**
   * Set max gates and presence timeout. Applies immediately and persists.
   */
  async setParameters(params: ParametersConfig): Promise<void> {
    this.requireConfiguration();
    const config: ParametersConfig = {
      movingMaxDistanceGate: requireInteger(params.movingMaxDistanceGate, "movingMaxDistanceGate", 0, U32_MAX),
      staticMaxDistanceGate: requireInteger(params.staticMaxDistanceGate, "staticMaxDistanceGate", 0, U32_MAX),
      presenceTimeout: requireInteger(params.presenceTimeout, "presenceTimeout", 0, U32_MAX),
    };
    await this.execute(COMMANDS.parametersWrite, config);
  }

  /**
   * Set thresholds of one gate, or of every gate with `ALL_GATES`.
   */
  async setGateSensitivity(config: GateSensitivityConfig): Promise<void> {
    this.requireConfiguration();
    const gate = requireInteger(config.distanceGate, "distanceGate", 0, U32_MAX);
    if (gate >= GATE_COUNT && gate !== ALL_GATES) {
      throw new CommandParamError(`Invalid distance gate: ${gate}`);
    }
    await this.execute(COMMANDS.gateSensitivitySet, {
      distanceGate: gate,
      movingThreshold: requireInteger(config.movingThreshold, "movingThreshold", 0, U32_MAX),
      staticThreshold: requireInteger(config.staticThreshold, "staticThreshold", 0, U32_MAX),
    });
  }

  /**
   * Toggle engineering reports. Lost on module restart.
   */
  async setEngineeringMode(enabled: boolean): Promise<void> {
    this.requireConfiguration();
    await this.execute(enabled ? COMMANDS.engineeringEnable : COMMANDS.engineeringDisable, undefined);
  }

  async getFirmwareVersion(): Promise<FirmwareVersion> {
    this.requireConfiguration();
    return this.execute(COMMANDS.firmwareVersion, undefined);
  }

  /**
   * Takes effect after a module restart.
   */
  async setBaudRate(baudRate: number): Promise<void> {
    this.requireConfiguration();
    const index = BAUD_RATE_INDEX.get(baudRate);
    if (index === undefined) {
      throw new CommandParamError(`Unknown index for baud rate ${baudRate}`);
    }
    await this.execute(COMMANDS.baudRateSet, index);
  }

  /**
   * Restore factory settings. Takes effect after a module restart.
   */
  async resetToFactory(): Promise<void> {
    this.requireConfiguration();
    await this.execute(COMMANDS.factoryReset, undefined);
  }

  /**
   * Restart the module. The session stays held but no longer accepts
   * commands, and closing it skips CONFIG_DISABLE.
   */
  async restartModule(options: RestartOptions = {}): Promise<void> {
    this.requireConfiguration();
    await this.execute(COMMANDS.moduleRestart, undefined);
    this.state = SessionState.Restarting;

    if (options.closeConfigContext) {
      throw new ModuleRestartedError("Module is being restarted from user's request");
    }
  }

  /**
   * Takes effect after a module restart.
   */
  async setBluetoothMode(enabled: boolean): Promise<void> {
    this.requireConfiguration();
    await this.execute(COMMANDS.bluetoothSet, enabled);
  }

  async getBluetoothAddress(): Promise<Buffer> {
    this.requireConfiguration();
    return this.execute(COMMANDS.bluetoothMacGet, undefined);
  }

  /**
   * Password of at most 6 ASCII characters.
   */
  async setBluetoothPassword(password: string): Promise<void> {
    this.requireConfiguration();
    if (password.length > MAX_PASSWORD_LENGTH || !/^[\x00-\x7f]*$/.test(password)) {
      throw new CommandParamError(`Bluetooth password must have at most ${MAX_PASSWORD_LENGTH} ASCII characters`);
    }
    await this.execute(COMMANDS.bluetoothPasswordSet, password);
  }

  /**
   * Gate resolution in centimeters.
   */
  async getDistanceResolution(): Promise<DistanceResolution> {
    this.requireConfiguration();
    const index = await this.execute(COMMANDS.distanceResolutionGet, undefined);
    if (index === ResolutionIndex.RESOLUTION_20CM) return 20;
    if (index === ResolutionIndex.RESOLUTION_75CM) return 75;
    throw new CommandReplyError(`Unhandled distance resolution index ${index}`);
  }

  /**
   * Takes effect after a module restart.
   */
  async setDistanceResolution(resolution: number): Promise<void> {
    this.requireConfiguration();
    if (!isDistanceResolution(resolution)) {
      throw new CommandParamError(`Unknown index for distance resolution ${resolution}`);
    }
    const index = resolution === 20 ? ResolutionIndex.RESOLUTION_20CM : ResolutionIndex.RESOLUTION_75CM;
    await this.execute(COMMANDS.distanceResolutionSet, index);
  }

  async getLightControl(): Promise<LightControlConfig> {
    this.requireConfiguration();
    return this.execute(COMMANDS.lightControlGet, undefined);
  }

  /**
   * Configure how the photo-sensor drives the OUT pin.
   */
  async setLightControl(config: LightControlConfig): Promise<void> {
    this.requireConfiguration();
    await this.execute(COMMANDS.lightControlSet, {
      control: requireEnum(LIGHT_CONTROLS, config.control, "light control"),
      threshold: requireInteger(config.threshold, "threshold", 0, U8_MAX),
      default: requireEnum(OUT_PIN_LEVELS, config.default, "OUT pin level"),
    });
  }

  // ===========================================================================
  // Reports
  // ===========================================================================

  /**
   * Latest report, possibly outdated after a configuration session.
   */
  getLastReport(): ReportStatus | undefined {
    return this.reportChannel.getLatest();
  }

  /**
   * Wait for the next report. The device sends none while configuring.
   */
  getNextReport(signal?: AbortSignal): Promise<ReportStatus> {
    return this.reportChannel.waitNext(signal);
  }

  async *reports(signal?: AbortSignal): AsyncGenerator<ReportStatus, void, undefined> {
    for (;;) {
      yield await this.getNextReport(signal);
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async execute<TArgs, TResult>(command: CommandSpec<TArgs, TResult>, args: TArgs): Promise<TResult> {
    const reply = await this.request(command.code, command.encode(args));
    return command.decode(reply.payload);
  }
}
