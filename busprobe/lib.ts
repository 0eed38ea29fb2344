import { REGISTER_NAMES, type RegisterName, type Registers } from "./protocol/index.js";

// =============================================================================
// Constants
// =============================================================================

export const USB_FILTERS = [
  { vendorId: "2341", productId: "0042" }, // Arduino Mega 2560
  { vendorId: "2341", productId: "0010" }, // Arduino Mega
  { vendorId: "2341", productId: "003d" }, // Arduino Due programming port
  { vendorId: "2341", productId: "003e" }, // Arduino Due native port
  { vendorId: "1a86", productId: "7523" }, // CH340
] as const;

/** Bus cycle type from status lines S2..S0 */
export const BUS_STATES = ["INTA", "IOR", "IOW", "HALT", "CODE", "MEMR", "MEMW", "PASV"] as const;

/** Segment register in use from status lines S4..S3 */
export const SEGMENTS = ["ES", "SS", "CS", "DS"] as const;

// =============================================================================
// Number Helpers
// =============================================================================

/**
 * Parse a decimal or 0x-prefixed hexadecimal integer.
 */
export function parseNumber(value: string): number {
  const text = value.trim();
  const parsed = /^0x[0-9a-f]+$/i.test(text) ? parseInt(text.slice(2), 16) : /^\d+$/.test(text) ? parseInt(text, 10) : NaN;
  if (isNaN(parsed)) {
    throw new Error(`Invalid number: ${value}`);
  }
  return parsed;
}

/**
 * Parse a number and check it fits in the given bit width.
 */
export function parseUnsigned(value: string, bits: 8 | 16): number {
  const parsed = parseNumber(value);
  const max = 2 ** bits - 1;
  if (parsed > max) {
    throw new Error(`Value out of range (0-${max}): ${value}`);
  }
  return parsed;
}

export function formatHex(value: number, digits: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(digits, "0")}`;
}

// =============================================================================
// Register Helpers
// =============================================================================

export function isRegisterName(name: string): name is RegisterName {
  return REGISTER_NAMES.some((r) => r === name);
}

export function emptyRegisters(): Registers {
  return { AX: 0, BX: 0, CX: 0, DX: 0, SS: 0, SP: 0, FLAGS: 0, IP: 0, CS: 0, DS: 0, ES: 0, BP: 0, SI: 0, DI: 0 };
}

/**
 * Build a register snapshot from "NAME=value" assignments.
 * Registers not mentioned are zero.
 */
export function parseRegisterAssignments(assignments: string[]): Registers {
  const registers = emptyRegisters();
  for (const assignment of assignments) {
    const [rawName, rawValue, ...rest] = assignment.split("=");
    const name = rawName.trim().toUpperCase();
    if (rawValue === undefined || rest.length > 0) {
      throw new Error(`Invalid register assignment: ${assignment}. Expected NAME=value.`);
    }
    if (!isRegisterName(name)) {
      throw new Error(`Unknown register: ${rawName}. Expected one of ${REGISTER_NAMES.join(", ")}.`);
    }
    registers[name] = parseUnsigned(rawValue, 16);
  }
  return registers;
}

/**
 * Render a register snapshot as lines of four "NAME=0x0000" columns.
 */
export function formatRegisters(registers: Registers): string {
  const cells = REGISTER_NAMES.map((name) => `${name.padStart(5)}=${formatHex(registers[name], 4)}`);
  const lines: string[] = [];
  for (let i = 0; i < cells.length; i += 4) {
    lines.push(cells.slice(i, i + 4).join("  "));
  }
  return lines.join("\n");
}

// =============================================================================
// Status Helpers
// =============================================================================

/**
 * Describe the CPU status byte: bus cycle type from bits 0-2, segment from bits 3-4.
 */
export function describeBusStatus(status: number): string {
  const state = BUS_STATES[status & 0x07];
  const segment = SEGMENTS[(status >> 3) & 0x03];
  return `${state} ${segment}`;
}

export function matchesUsbFilter(vendorId: string | undefined, productId: string | undefined): boolean {
  if (!vendorId || !productId) return false;
  const vid = vendorId.toLowerCase();
  const pid = productId.toLowerCase();
  return USB_FILTERS.some((f) => f.vendorId === vid && f.productId === pid);
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

// =============================================================================
// Output Helpers
// =============================================================================

export function toHexDump(data: Uint8Array): string {
  return Buffer.from(data).toString("hex").match(/../g)?.join(" ") ?? "";
}
