// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_BAUD_RATE = 256000;
export const DEFAULT_COMMAND_TIMEOUT_MS = 2000;
export const ALL_GATES = 0xffff;
export const GATE_COUNT = 9;
export const MAX_PASSWORD_LENGTH = 6;

/** Baud rate -> index sent with BAUD_RATE_SET */
export const BAUD_RATE_INDEX: ReadonlyMap<number, number> = new Map([
  [9600, 0x01],
  [19200, 0x02],
  [38400, 0x03],
  [57600, 0x04],
  [115200, 0x05],
  [230400, 0x06],
  [256000, 0x07],
  [460800, 0x08],
]);

/** Supported gate resolutions in centimeters */
export const DISTANCE_RESOLUTIONS = [75, 20] as const;
export type DistanceResolution = (typeof DISTANCE_RESOLUTIONS)[number];

export const USB_FILTERS = [
  { vendorId: "1a86", productId: "7523" }, // CH340
  { vendorId: "10c4", productId: "ea60" }, // CP210x
] as const;

// =============================================================================
// Device Helpers
// =============================================================================

export function matchesUsbFilter(vendorId: string | undefined, productId: string | undefined): boolean {
  if (!vendorId || !productId) return false;
  const vid = vendorId.toLowerCase();
  const pid = productId.toLowerCase();
  return USB_FILTERS.some((f) => f.vendorId === vid && f.productId === pid);
}

export function isDistanceResolution(value: number): value is DistanceResolution {
  return DISTANCE_RESOLUTIONS.some((resolution) => resolution === value);
}

// =============================================================================
// Formatting Helpers
// =============================================================================

/**
 * Hex dump with space separated bytes, e.g. "fd fc fb fa".
 */
export function hex(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/**
 * Firmware version as printed by the vendor tools: major.MM.rrrrrrrr
 */
export function formatFirmwareVersion(version: { major: number; minor: number; revision: number }): string {
  const minor = version.minor.toString(10).padStart(2, "0");
  const revision = version.revision.toString(16).padStart(8, "0");
  return `${version.major}.${minor}.${revision}`;
}

export function formatMacAddress(address: Uint8Array): string {
  return hex(address).replaceAll(" ", ":");
}

// =============================================================================
// Parsing Helpers
// =============================================================================

/**
 * Parse a base-10 integer from CLI input.
 */
export function parseInteger(value: string, name: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return parsed;
}

/**
 * Parse a gate number, accepting "all" for the broadcast gate.
 */
export function parseGate(value: string): number {
  if (value.toLowerCase() === "all") return ALL_GATES;
  const gate = parseInteger(value, "gate");
  if (gate < 0 || gate >= GATE_COUNT) {
    throw new Error(`Invalid gate: ${value}. Must be 0-${GATE_COUNT - 1} or "all".`);
  }
  return gate;
}

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * Extract error message from unknown error type.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
