/**
 * Request encoding and reply decoding.
 *
 * Framing is implied by the command table alone: a request is the opcode followed
 * by a fixed-length payload, a reply is a fixed number of bytes whose last byte is
 * the status. Nothing on the wire marks where a frame starts or ends.
 */

import { COMMANDS } from "./commands.js";
import { ProtocolUsageError } from "./errors.js";
import { REGISTER_NAMES, STATUS_FAILED, STATUS_OK, type CommandName, type Registers, type VersionInfo } from "./types.js";

/** Size of a register snapshot on the wire */
export const REGISTERS_SIZE = REGISTER_NAMES.length * 2;

const VERSION_NAME_LENGTH = 7;

/** Outcome of inspecting a raw reply */
export type ReplyResult =
  | { kind: "ok"; payload: Buffer }
  | { kind: "rejected" }
  | { kind: "out-of-sync"; statusByte: number }
  | { kind: "short"; received: number };

/**
 * Build the wire bytes for a command.
 * Throws ProtocolUsageError when the payload length does not match the command table.
 */
export function encodeRequest(command: CommandName, payload: Uint8Array = new Uint8Array(0)): Buffer {
  const { opcode, payloadLength } = COMMANDS[command];
  if (payload.length !== payloadLength) {
    throw new ProtocolUsageError(
      `${command}: payload must be ${payloadLength} bytes, got ${payload.length}`,
      command
    );
  }
  return Buffer.concat([Buffer.from([opcode]), payload]);
}

/**
 * Classify a reply of known length by its trailing status byte.
 */
export function decodeReply(reply: Uint8Array, expectedLength: number): ReplyResult {
  if (reply.length < expectedLength) {
    return { kind: "short", received: reply.length };
  }

  const statusByte = reply[expectedLength - 1];
  if (statusByte === STATUS_OK) {
    return { kind: "ok", payload: Buffer.from(reply.subarray(0, expectedLength - 1)) };
  }
  if (statusByte === STATUS_FAILED) {
    return { kind: "rejected" };
  }
  return { kind: "out-of-sync", statusByte };
}

/**
 * Serialize a register snapshot as 14 little-endian words in wire order.
 */
export function encodeRegisters(registers: Registers): Buffer {
  const out = Buffer.alloc(REGISTERS_SIZE);
  REGISTER_NAMES.forEach((name, i) => {
    const value = registers[name];
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new ProtocolUsageError(`Register ${name} out of range: ${value}`, "Load");
    }
    out.writeUInt16LE(value, i * 2);
  });
  return out;
}

/**
 * Inverse of encodeRegisters.
 */
export function decodeRegisters(payload: Uint8Array): Registers {
  if (payload.length !== REGISTERS_SIZE) {
    throw new ProtocolUsageError(`Register snapshot must be ${REGISTERS_SIZE} bytes, got ${payload.length}`, "Store");
  }
  const buf = Buffer.from(payload);
  const word = (index: number) => buf.readUInt16LE(index * 2);
  return {
    AX: word(0),
    BX: word(1),
    CX: word(2),
    DX: word(3),
    SS: word(4),
    SP: word(5),
    FLAGS: word(6),
    IP: word(7),
    CS: word(8),
    DS: word(9),
    ES: word(10),
    BP: word(11),
    SI: word(12),
    DI: word(13),
  };
}

/**
 * Version reply: 7 ASCII characters followed by the version number.
 */
export function parseVersion(payload: Uint8Array): VersionInfo {
  const buf = Buffer.from(payload);
  return {
    name: buf.toString("latin1", 0, VERSION_NAME_LENGTH),
    version: buf[VERSION_NAME_LENGTH],
  };
}

/**
 * Bus address, sent as three little-endian bytes.
 */
export function parseAddress(payload: Uint8Array): number {
  return payload[0] | (payload[1] << 8) | (payload[2] << 16);
}
